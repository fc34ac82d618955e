import type { TagletRegistration } from '@xdoc/sdk';
import { describe, expect, it, vi } from 'vitest';
import { TagletCatalog } from '../catalog.js';
import { TagletNotFoundError, TagletRegistrationError } from '../errors.js';
import { TagletRegistry } from '../registry.js';

function makeRegistration(id: string, tags: string[]): TagletRegistration {
	return {
		id,
		register: (taglets) => {
			for (const name of tags) {
				taglets.register({ name, kind: 'block', scopes: [], enabled: true });
			}
		},
	};
}

describe('TagletCatalog', () => {
	it('resolves registrations by id', () => {
		const reg = makeRegistration('com.example.Todo', ['todo']);
		const catalog = new TagletCatalog([reg]);

		expect(catalog.resolve('com.example.Todo')).toBe(reg);
		expect(catalog.list().length).toBe(1);
	});

	it('throws TagletNotFoundError for unknown ids', () => {
		const catalog = new TagletCatalog();

		expect(() => catalog.resolve('bad.Class')).toThrow(TagletNotFoundError);
		expect(() => catalog.resolve('bad.Class')).toThrowError('Taglet not found: bad.Class');
	});

	it('lets a later registration with the same id win', () => {
		const first = makeRegistration('x.Y', ['a']);
		const second = makeRegistration('x.Y', ['b']);
		const catalog = new TagletCatalog([first]).add(second);

		expect(catalog.resolve('x.Y')).toBe(second);
		expect(catalog.list()).toEqual([second]);
	});

	it('load() runs the registration against the registry', () => {
		const catalog = new TagletCatalog([makeRegistration('x.Notes', ['implNote', 'implSpec'])]);
		const registry = new TagletRegistry([]);

		const loaded = catalog.load('x.Notes', registry);

		expect(loaded.id).toBe('x.Notes');
		expect(registry.has('implNote')).toBe(true);
		expect(registry.has('implSpec')).toBe(true);
	});

	it('load() wraps failures thrown by the registration', () => {
		const register = vi.fn(() => {
			throw new Error('boom');
		});
		const catalog = new TagletCatalog([{ id: 'x.Broken', register }]);

		try {
			catalog.load('x.Broken', new TagletRegistry([]));
			expect.unreachable('should have thrown');
		} catch (err) {
			expect(err).toBeInstanceOf(TagletRegistrationError);
			expect((err as TagletRegistrationError).message).toBe('[x.Broken] boom');
			expect((err as TagletRegistrationError).cause).toBeInstanceOf(Error);
		}
		expect(register).toHaveBeenCalledTimes(1);
	});

	it('load() rethrows not-found errors unchanged', () => {
		expect(() => new TagletCatalog().load('missing.Id', new TagletRegistry([]))).toThrow(
			TagletNotFoundError,
		);
	});
});
