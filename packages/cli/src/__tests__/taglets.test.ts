import { TagletRegistry } from '@xdoc/core';
import { describe, expect, it } from 'vitest';
import {
	API_NOTE_TAGLET,
	BUNDLED_TAGLETS,
	createBundledCatalog,
	IMPL_TAGLETS,
	TODO_TAGLET,
} from '../taglets.js';

describe('bundled taglets', () => {
	it('are all available from the bundled catalog', () => {
		const catalog = createBundledCatalog();

		expect(catalog.list().length).toBe(BUNDLED_TAGLETS.length);
		for (const registration of BUNDLED_TAGLETS) {
			expect(catalog.resolve(registration.id)).toBe(registration);
		}
	});

	it('TodoTaglet registers @todo', () => {
		const registry = new TagletRegistry([]);
		TODO_TAGLET.register(registry);

		expect(registry.get('todo')).toEqual({
			name: 'todo',
			kind: 'block',
			scopes: [],
			enabled: true,
			title: 'To Do',
		});
	});

	it('ApiNoteTaglet registers @apiNote for types and members', () => {
		const registry = new TagletRegistry([]);
		API_NOTE_TAGLET.register(registry);

		expect(registry.get('apiNote')?.scopes).toEqual(['type', 'constructor', 'method', 'field']);
	});

	it('ImplSpecTaglets registers two tags', () => {
		const registry = new TagletRegistry([]);
		IMPL_TAGLETS.register(registry);

		expect(registry.list().map((t) => t.name)).toEqual(['implSpec', 'implNote']);
	});
});
