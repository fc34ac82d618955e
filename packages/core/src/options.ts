/**
 * Option table — which command-line options xdoc understands and how many
 * tokens each occupies.
 *
 * Lengths count the option name itself: `-d <dir>` is 2, `-multiple` is 1.
 * The host uses them to split its argument list into an option matrix;
 * an unknown option has length 0.
 */

import type { OptionEntry, OptionMatrix } from '@xdoc/sdk';
import { OptionError } from './errors.js';

export interface OptionDefinition {
	name: string;
	length: number;
	usage: string;
	/** May appear more than once */
	repeatable?: boolean;
}

export const OPTION_SPEC: readonly OptionDefinition[] = [
	{ name: '-d', length: 2, usage: '-d <directory> Destination directory for output files' },
	{ name: '-docencoding', length: 2, usage: '-docencoding <name> \t Output encoding name' },
	{ name: '-multiple', length: 1, usage: '-multiple \t Write one file per class' },
	{ name: '-filename', length: 2, usage: '-filename <name> \t Name of the file for single output' },
	{
		name: '-implements',
		length: 2,
		usage: '-implements <type> \t Only classes directly implementing <type>',
	},
	{ name: '-extends', length: 2, usage: '-extends <type> \t Only classes directly extending <type>' },
	{ name: '-annotated', length: 2, usage: '-annotated <type> \t Only classes annotated with <type>' },
	{
		name: '-tag',
		length: 2,
		usage: '-tag <name>:<scope>:<title> \t Custom block tag',
		repeatable: true,
	},
	{ name: '-taglet', length: 2, usage: '-taglet <id>:<id>... \t Taglet registrations to load' },
	{ name: '-subfolders', length: 1, usage: '-subfolders \t Organise output files in package folders' },
];

const LENGTHS = new Map(OPTION_SPEC.map((o) => [o.name, o.length]));

/** Number of tokens the option occupies, name included; 0 if unknown. */
export function getOptionLength(option: string): number {
	return LENGTHS.get(option) ?? 0;
}

export function getOptionUsage(option: string): string | undefined {
	return OPTION_SPEC.find((o) => o.name === option)?.usage;
}

/**
 * Group a flat argument list into an option matrix.
 *
 * A trailing option with fewer tokens left than it needs becomes a short
 * entry, so the builder can report the missing value.
 */
export function toOptionMatrix(args: readonly string[]): OptionMatrix {
	const matrix: OptionEntry[] = [];
	let i = 0;
	while (i < args.length) {
		const name = args[i];
		const length = getOptionLength(name);
		if (length === 0) {
			throw new OptionError(name, `Unknown option: ${name}`);
		}
		matrix.push(args.slice(i, i + length));
		i += length;
	}
	return matrix;
}
