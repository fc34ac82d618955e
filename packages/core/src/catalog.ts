/**
 * TagletCatalog — the lookup table behind `-taglet`.
 *
 * Taglet ids are resolved against registrations supplied up front instead
 * of being loaded by name at run time. Unknown ids are ordinary errors.
 */

import type { TagletRegistrar, TagletRegistration } from '@xdoc/sdk';
import { TagletNotFoundError, TagletRegistrationError, XdocError } from './errors.js';

export class TagletCatalog {
	private readonly registrations = new Map<string, TagletRegistration>();

	constructor(registrations: Iterable<TagletRegistration> = []) {
		for (const registration of registrations) {
			this.add(registration);
		}
	}

	/** Add a registration. A later registration with the same id wins. */
	add(registration: TagletRegistration): this {
		this.registrations.set(registration.id, registration);
		return this;
	}

	/** Throws TagletNotFoundError for unknown ids. */
	resolve(id: string): TagletRegistration {
		const registration = this.registrations.get(id);
		if (!registration) {
			throw new TagletNotFoundError(id);
		}
		return registration;
	}

	/**
	 * Resolve `id` and let it register its taglets.
	 * Failures inside the registration are wrapped in TagletRegistrationError.
	 */
	load(id: string, taglets: TagletRegistrar): TagletRegistration {
		const registration = this.resolve(id);
		try {
			registration.register(taglets);
		} catch (err) {
			if (err instanceof XdocError) throw err;
			const reason = err instanceof Error ? err.message : String(err);
			throw new TagletRegistrationError(id, reason, { cause: err });
		}
		return registration;
	}

	list(): TagletRegistration[] {
		return [...this.registrations.values()];
	}
}
