/**
 * @xdoc/core — option validation, taglet registry and class filtering.
 */

// Configuration
export {
	Configuration,
	buildConfiguration,
	resolveEncoding,
	DEFAULT_ENCODING,
	DEFAULT_FILENAME,
} from './configuration.js';
export type { BuildOptions, ConfigurationInit } from './configuration.js';

// Option table and matrix accessors
export { OPTION_SPEC, getOptionLength, getOptionUsage, toOptionMatrix } from './options.js';
export type { OptionDefinition } from './options.js';
export { hasOption, getOption, getAllOptions } from './matrix.js';

// Taglets
export { TagletRegistry, tagletKey } from './registry.js';
export { TagletCatalog } from './catalog.js';
export { parseCustomTag, createCustomTaglet } from './custom-tag.js';
export type { CustomTagDefinition } from './custom-tag.js';

// Class filter
export { ClassFilter, matchesAnnotation, matchesInterface, matchesSuperclass } from './filter.js';
export type { ClassFilterCriteria } from './filter.js';

// Reporters
export { ReporterManager, CollectingReporter } from './reporter.js';

// Errors
export {
	XdocError,
	ConfigError,
	OptionError,
	SchemaError,
	TagletNotFoundError,
	TagletRegistrationError,
	RegistryFrozenError,
} from './errors.js';
