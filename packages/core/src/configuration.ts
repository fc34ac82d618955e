/**
 * Configuration — validated options for one documentation run.
 *
 * buildConfiguration() walks the option matrix in a fixed order, reports
 * every decision to the reporter and either returns a frozen Configuration
 * or null when a required option is missing or malformed. Problems with
 * optional options are reported and the option is simply not applied.
 */

import type { ClassDescriptor, DocErrorReporter, OptionMatrix, Taglet } from '@xdoc/sdk';
import { TagletCatalog } from './catalog.js';
import charsetTable from './charsets.json' with { type: 'json' };
import { createCustomTaglet, parseCustomTag } from './custom-tag.js';
import { ClassFilter } from './filter.js';
import { getAllOptions, getOption, hasOption } from './matrix.js';
import { getOptionUsage } from './options.js';
import { TagletRegistry } from './registry.js';

export const DEFAULT_ENCODING = 'UTF-8';

export const DEFAULT_FILENAME = 'xmldoclet.xml';

export interface ConfigurationInit {
	outputDirectory: string;
	multipleFiles?: boolean;
	useSubFolders?: boolean;
	encoding?: string;
	filename?: string;
	extendsFilter?: string;
	implementsFilter?: string;
	annotationFilter?: string;
	taglets?: TagletRegistry;
}

export class Configuration {
	/** One output file per class instead of a single file */
	readonly multipleFiles: boolean;
	/** Package subfolders for multiple-file output */
	readonly useSubFolders: boolean;
	readonly outputDirectory: string;
	/** Canonical charset name, e.g. "UTF-8" */
	readonly encoding: string;
	/** Single-file output name; unused when multipleFiles is set */
	readonly filename: string;
	readonly extendsFilter?: string;
	readonly implementsFilter?: string;
	readonly annotationFilter?: string;
	readonly taglets: TagletRegistry;
	private readonly classFilter: ClassFilter;

	constructor(init: ConfigurationInit) {
		this.outputDirectory = init.outputDirectory;
		this.multipleFiles = init.multipleFiles ?? false;
		this.useSubFolders = init.useSubFolders ?? false;
		this.encoding = init.encoding ?? DEFAULT_ENCODING;
		this.filename = init.filename ?? DEFAULT_FILENAME;
		this.extendsFilter = init.extendsFilter;
		this.implementsFilter = init.implementsFilter;
		this.annotationFilter = init.annotationFilter;
		this.taglets = (init.taglets ?? new TagletRegistry()).freeze();
		this.classFilter = new ClassFilter({
			extendsType: init.extendsFilter,
			implementsType: init.implementsFilter,
			annotationType: init.annotationFilter,
		});
		Object.freeze(this);
	}

	/** Whether any of -extends, -implements or -annotated is in effect. */
	hasFilter(): boolean {
		return this.classFilter.hasFilter();
	}

	/** Whether the class passes every configured filter. */
	filter(descriptor: ClassDescriptor): boolean {
		return this.classFilter.shouldInclude(descriptor);
	}

	/**
	 * The taglet for a registry key: the bare name for block tags,
	 * `@` + name for inline tags.
	 */
	getTagletForName(name: string): Taglet | undefined {
		return this.taglets.get(name);
	}

	toJSON(): Record<string, unknown> {
		return {
			outputDirectory: this.outputDirectory,
			multipleFiles: this.multipleFiles,
			useSubFolders: this.useSubFolders,
			encoding: this.encoding,
			filename: this.filename,
			extendsFilter: this.extendsFilter ?? null,
			implementsFilter: this.implementsFilter ?? null,
			annotationFilter: this.annotationFilter ?? null,
			taglets: this.taglets.entries().map(([key, t]) => ({
				key,
				kind: t.kind,
				custom: t.enabled,
			})),
		};
	}
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/** Lower-cased charset name or alias → canonical name */
const CHARSETS = new Map<string, string>();
for (const { name, aliases } of charsetTable.charsets) {
	CHARSETS.set(name.toLowerCase(), name);
	for (const alias of aliases) CHARSETS.set(alias.toLowerCase(), name);
}

/**
 * Canonical name for a charset name or alias ("latin1" → "ISO-8859-1").
 * Matching ignores case. Returns undefined for an unknown charset.
 */
export function resolveEncoding(label: string): string | undefined {
	return CHARSETS.get(label.toLowerCase());
}

// ─── Builder ──────────────────────────────────────────────────────────────────

export interface BuildOptions {
	/** Registrations `-taglet` may load */
	catalog?: TagletCatalog;
	/** Taglets the registry starts with; the standard tags by default */
	builtins?: readonly Taglet[];
}

function reportMissingValue(reporter: DocErrorReporter, option: string, placeholder: string): void {
	reporter.printError(`Missing value for ${placeholder}, usage:`);
	reporter.printError(getOptionUsage(option) ?? option);
}

/**
 * Validate the option matrix and assemble a Configuration.
 *
 * Returns null after reporting an error when `-d` is missing or empty, or
 * when `-docencoding` has no value or names an unknown encoding.
 */
export function buildConfiguration(
	options: OptionMatrix,
	reporter: DocErrorReporter,
	buildOptions: BuildOptions = {},
): Configuration | null {
	const catalog = buildOptions.catalog ?? new TagletCatalog();
	const taglets = new TagletRegistry(buildOptions.builtins);

	// Flags
	const multipleFiles = hasOption(options, '-multiple');
	const useSubFolders = hasOption(options, '-subfolders');

	// Output directory
	if (!hasOption(options, '-d')) {
		reporter.printError('Output directory not specified; use -d <directory>');
		return null;
	}
	const outputDirectory = getOption(options, '-d');
	if (outputDirectory === undefined || outputDirectory === '') {
		reportMissingValue(reporter, '-d', '<directory>');
		return null;
	}
	reporter.printNotice(`Output directory: ${outputDirectory}`);

	// Output encoding
	let encoding: string | undefined;
	if (hasOption(options, '-docencoding')) {
		const label = getOption(options, '-docencoding');
		if (label === undefined) {
			reportMissingValue(reporter, '-docencoding', '<name>');
			return null;
		}
		encoding = resolveEncoding(label);
		if (encoding === undefined) {
			reporter.printError(`Unsupported encoding: ${label}`);
			return null;
		}
		reporter.printNotice(`Output encoding: ${encoding}`);
	}

	// File name
	let filename: string | undefined;
	if (hasOption(options, '-filename')) {
		const name = getOption(options, '-filename');
		if (name !== undefined && !multipleFiles) {
			filename = name;
			reporter.printNotice(`Using file name: ${name}`);
		} else {
			reporter.printWarning("'-filename' option ignored");
		}
	}

	// Extends
	let extendsFilter: string | undefined;
	if (hasOption(options, '-extends')) {
		const superclass = getOption(options, '-extends');
		if (superclass !== undefined) {
			extendsFilter = superclass;
			reporter.printNotice(`Filtering classes extending: ${superclass}`);
		} else {
			reporter.printWarning("'-extends' option ignored - superclass not specified");
		}
	}

	// Annotated
	let annotationFilter: string | undefined;
	if (hasOption(options, '-annotated')) {
		const annotation = getOption(options, '-annotated');
		if (annotation !== undefined) {
			annotationFilter = annotation;
			reporter.printNotice(`Filtering classes annotated: ${annotation}`);
		} else {
			reporter.printWarning("'-annotated' option ignored - annotation not specified");
		}
	}

	// Implements
	let implementsFilter: string | undefined;
	if (hasOption(options, '-implements')) {
		const iface = getOption(options, '-implements');
		if (iface !== undefined) {
			implementsFilter = iface;
			reporter.printNotice(`Filtering classes implementing: ${iface}`);
		} else {
			reporter.printWarning("'-implements' option ignored - interface not specified");
		}
	}

	// Custom tags
	for (const definition of getAllOptions(options, '-tag')) {
		const tag = parseCustomTag(definition);
		taglets.register(createCustomTaglet(tag));
		reporter.printNotice(`Using Tag ${tag.name}`);
	}

	// Taglets
	if (hasOption(options, '-taglet')) {
		const ids = getOption(options, '-taglet');
		if (ids !== undefined) {
			for (const id of ids.split(':')) {
				try {
					const registration = catalog.load(id, taglets);
					reporter.printNotice(`Using Taglet ${registration.id}`);
				} catch (err) {
					const reason = err instanceof Error ? err.message : String(err);
					reporter.printError(`'-taglet' option reported error - :${reason}`);
				}
			}
		} else {
			reporter.printWarning("'-taglet' option ignored - classes not specified");
		}
	}

	return new Configuration({
		outputDirectory,
		multipleFiles,
		useSubFolders,
		encoding,
		filename,
		extendsFilter,
		implementsFilter,
		annotationFilter,
		taglets,
	});
}
