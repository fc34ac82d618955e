/**
 * The standard doc-comment tags every registry starts with.
 */

import type { TagScope, Taglet } from './types.js';

const ANYWHERE: readonly TagScope[] = [];
const MEMBERS: readonly TagScope[] = ['constructor', 'method', 'field'];
const EXECUTABLES: readonly TagScope[] = ['constructor', 'method'];

function block(name: string, scopes: readonly TagScope[], title?: string): Taglet {
	return { name, kind: 'block', scopes, enabled: false, ...(title ? { title } : {}) };
}

function inline(name: string): Taglet {
	return { name, kind: 'inline', scopes: ANYWHERE, enabled: false };
}

export const BUILTIN_BLOCK_TAGS: readonly Taglet[] = [
	block('author', ['overview', 'package', 'type'], 'Author'),
	block('deprecated', ['type', ...MEMBERS], 'Deprecated'),
	block('exception', EXECUTABLES, 'Throws'),
	block('param', [...EXECUTABLES, 'type'], 'Parameters'),
	block('return', ['method'], 'Returns'),
	block('see', ANYWHERE, 'See Also'),
	block('serial', ['package', 'type', 'field']),
	block('serialData', ['method']),
	block('serialField', ['field']),
	block('since', ANYWHERE, 'Since'),
	block('throws', EXECUTABLES, 'Throws'),
	block('version', ['overview', 'package', 'type'], 'Version'),
];

export const BUILTIN_INLINE_TAGS: readonly Taglet[] = [
	inline('code'),
	inline('docRoot'),
	inline('inheritDoc'),
	inline('link'),
	inline('linkplain'),
	inline('literal'),
	inline('value'),
];

export const BUILTIN_TAGLETS: readonly Taglet[] = [...BUILTIN_BLOCK_TAGS, ...BUILTIN_INLINE_TAGS];
