/**
 * Error taxonomy for xdoc.
 *
 * Every error in the system extends XdocError, giving callers
 * a consistent shape to catch and inspect.
 */

export class XdocError extends Error {
	readonly code: string;

	constructor(code: string, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'XdocError';
		this.code = code;
	}
}

export class ConfigError extends XdocError {
	constructor(message: string, options?: ErrorOptions) {
		super('CONFIG_ERROR', message, options);
		this.name = 'ConfigError';
	}
}

export class OptionError extends XdocError {
	readonly option: string;

	constructor(option: string, message: string, options?: ErrorOptions) {
		super('OPTION_ERROR', message, options);
		this.name = 'OptionError';
		this.option = option;
	}
}

export class SchemaError extends XdocError {
	readonly validationErrors: string[];

	constructor(message: string, validationErrors: string[] = [], options?: ErrorOptions) {
		super('SCHEMA_ERROR', message, options);
		this.name = 'SchemaError';
		this.validationErrors = validationErrors;
	}
}

export class TagletNotFoundError extends XdocError {
	readonly tagletId: string;

	constructor(tagletId: string, message?: string, options?: ErrorOptions) {
		super('TAGLET_NOT_FOUND', message ?? `Taglet not found: ${tagletId}`, options);
		this.name = 'TagletNotFoundError';
		this.tagletId = tagletId;
	}
}

export class TagletRegistrationError extends XdocError {
	readonly tagletId: string;

	constructor(tagletId: string, message: string, options?: ErrorOptions) {
		super('TAGLET_REGISTRATION', `[${tagletId}] ${message}`, options);
		this.name = 'TagletRegistrationError';
		this.tagletId = tagletId;
	}
}

export class RegistryFrozenError extends XdocError {
	readonly key: string;

	constructor(key: string, options?: ErrorOptions) {
		super('REGISTRY_FROZEN', `Cannot register taglet "${key}": registry is frozen`, options);
		this.name = 'RegistryFrozenError';
		this.key = key;
	}
}
