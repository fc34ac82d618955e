/**
 * TagletRegistry — tag name to handler mapping.
 *
 * Seeded from an explicit list of built-in taglets. Registering a key that
 * already exists replaces the previous handler; that is how `-tag` and
 * `-taglet` override built-ins. Once frozen the registry is read-only.
 */

import type { Taglet, TagletRegistrar } from '@xdoc/sdk';
import { BUILTIN_TAGLETS } from '@xdoc/sdk';
import { RegistryFrozenError } from './errors.js';

/**
 * Registry key for a taglet: the bare name for block tags, `@` + name for
 * inline tags. `see` and `@link` can therefore never collide.
 */
export function tagletKey(taglet: Pick<Taglet, 'name' | 'kind'>): string {
	return taglet.kind === 'inline' ? `@${taglet.name}` : taglet.name;
}

export class TagletRegistry implements TagletRegistrar {
	private readonly taglets = new Map<string, Taglet>();
	private frozen = false;

	constructor(builtins: readonly Taglet[] = BUILTIN_TAGLETS) {
		for (const taglet of builtins) {
			this.taglets.set(tagletKey(taglet), taglet);
		}
	}

	/** Register a taglet, replacing any handler under the same key. */
	register(taglet: Taglet): void {
		const key = tagletKey(taglet);
		if (this.frozen) {
			throw new RegistryFrozenError(key);
		}
		this.taglets.set(key, taglet);
	}

	/** Exact-key lookup. */
	get(key: string): Taglet | undefined {
		return this.taglets.get(key);
	}

	has(key: string): boolean {
		return this.taglets.has(key);
	}

	/** All entries in registration order. */
	entries(): Array<[string, Taglet]> {
		return [...this.taglets.entries()];
	}

	list(): Taglet[] {
		return [...this.taglets.values()];
	}

	get size(): number {
		return this.taglets.size;
	}

	freeze(): this {
		this.frozen = true;
		return this;
	}
}
