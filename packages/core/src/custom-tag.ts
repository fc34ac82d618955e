/**
 * Custom tag definitions from `-tag name[:scope[:title]]`.
 */

import type { Taglet } from '@xdoc/sdk';

export interface CustomTagDefinition {
	name: string;
	scope?: string;
	title?: string;
}

/**
 * Split a `-tag` value on its first two colons.
 *
 * `see` → name only; `see:type` → name and scope; `see:type:See Also` → all
 * three. Anything after the second colon belongs to the title.
 */
export function parseCustomTag(definition: string): CustomTagDefinition {
	const colon = definition.indexOf(':');
	if (colon < 0) {
		return { name: definition };
	}

	const name = definition.slice(0, colon);
	const rest = definition.slice(colon + 1);
	const second = rest.indexOf(':');
	if (second < 0) {
		return { name, scope: rest };
	}
	return { name, scope: rest.slice(0, second), title: rest.slice(second + 1) };
}

/**
 * The registry entry for a custom tag.
 *
 * Only the name is carried over: scope and title from the definition are
 * not applied to the entry.
 */
export function createCustomTaglet(definition: CustomTagDefinition): Taglet {
	return { name: definition.name, kind: 'block', scopes: [], enabled: true };
}
