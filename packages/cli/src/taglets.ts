/**
 * Taglet registrations bundled with the CLI, available to `-taglet`.
 */

import { TagletCatalog } from '@xdoc/core';
import type { TagletRegistration } from '@xdoc/sdk';

export const TODO_TAGLET: TagletRegistration = {
	id: 'xdoc.taglets.TodoTaglet',
	description: 'Block tag @todo for pending work, allowed anywhere',
	register(taglets) {
		taglets.register({ name: 'todo', kind: 'block', scopes: [], enabled: true, title: 'To Do' });
	},
};

export const API_NOTE_TAGLET: TagletRegistration = {
	id: 'xdoc.taglets.ApiNoteTaglet',
	description: 'Block tag @apiNote on types and members',
	register(taglets) {
		taglets.register({
			name: 'apiNote',
			kind: 'block',
			scopes: ['type', 'constructor', 'method', 'field'],
			enabled: true,
			title: 'API Note',
		});
	},
};

export const IMPL_TAGLETS: TagletRegistration = {
	id: 'xdoc.taglets.ImplSpecTaglets',
	description: 'Block tags @implSpec and @implNote on types and methods',
	register(taglets) {
		taglets.register({
			name: 'implSpec',
			kind: 'block',
			scopes: ['type', 'method'],
			enabled: true,
			title: 'Implementation Requirements',
		});
		taglets.register({
			name: 'implNote',
			kind: 'block',
			scopes: ['type', 'method'],
			enabled: true,
			title: 'Implementation Note',
		});
	},
};

export const BUNDLED_TAGLETS: readonly TagletRegistration[] = [TODO_TAGLET, API_NOTE_TAGLET, IMPL_TAGLETS];

export function createBundledCatalog(): TagletCatalog {
	return new TagletCatalog(BUNDLED_TAGLETS);
}
