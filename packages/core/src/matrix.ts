/**
 * Lookups over the option matrix.
 *
 * The three accessors differ only in multiplicity: pick `getAllOptions` for
 * repeatable options and `getOption` for everything else (first one wins).
 */

import type { OptionEntry, OptionMatrix } from '@xdoc/sdk';

function findOption(matrix: OptionMatrix, name: string): OptionEntry | undefined {
	return matrix.find((entry) => entry[0] === name);
}

/** Whether the option appears at all. */
export function hasOption(matrix: OptionMatrix, name: string): boolean {
	return findOption(matrix, name) !== undefined;
}

/** Value of the first entry for the option, if it has one. */
export function getOption(matrix: OptionMatrix, name: string): string | undefined {
	const entry = findOption(matrix, name);
	return entry !== undefined && entry.length > 1 ? entry[1] : undefined;
}

/** Values of every entry for the option, in matrix order. Entries without a value are skipped. */
export function getAllOptions(matrix: OptionMatrix, name: string): string[] {
	const values: string[] = [];
	for (const entry of matrix) {
		if (entry[0] === name && entry.length > 1) {
			values.push(entry[1]);
		}
	}
	return values;
}
