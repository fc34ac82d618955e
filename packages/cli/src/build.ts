/**
 * Shared build step for the commands: doclet arguments in, Configuration out.
 */

import type { Configuration, TagletCatalog } from '@xdoc/core';
import { buildConfiguration, CollectingReporter, ReporterManager, toOptionMatrix } from '@xdoc/core';
import type { Diagnostic, DocErrorReporter } from '@xdoc/sdk';
import { createBundledCatalog } from './taglets.js';

export interface BuildResult {
	/** null when the options were rejected */
	config: Configuration | null;
	diagnostics: readonly Diagnostic[];
	errorCount: number;
	warningCount: number;
}

/**
 * Group the arguments, build the Configuration and collect every diagnostic.
 * `reporter` also receives each diagnostic as it happens.
 * Throws OptionError when an argument is not a known option.
 */
export function runBuild(
	args: readonly string[],
	reporter?: DocErrorReporter,
	catalog: TagletCatalog = createBundledCatalog(),
): BuildResult {
	const matrix = toOptionMatrix(args);
	const collector = new CollectingReporter();
	const manager = new ReporterManager().addReporter(collector);
	if (reporter) manager.addReporter(reporter);

	const config = buildConfiguration(matrix, manager, { catalog });
	return {
		config,
		diagnostics: collector.diagnostics,
		errorCount: collector.errorCount,
		warningCount: collector.warningCount,
	};
}
