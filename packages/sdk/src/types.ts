/**
 * Core type definitions for xdoc.
 *
 * These types are shared by the option engine, the CLI and any taglet
 * registration contributed from outside. The documentation model types
 * (ClassDescriptor, AnnotationDescriptor) describe a graph owned by the host
 * tool; xdoc only ever reads them.
 */

// ─── Option Matrix ────────────────────────────────────────────────────────────

/**
 * One option group as split by the host: the option name first, then its values.
 * e.g. `['-d', 'out']`, `['-multiple']`
 */
export type OptionEntry = readonly string[];

/** The raw command-line options, grouped per option. Names may repeat. */
export type OptionMatrix = readonly OptionEntry[];

// ─── Taglets ──────────────────────────────────────────────────────────────────

/** Block tags stand alone (`@see Foo`); inline tags sit inside text (`{@link Foo}`). */
export type TagletKind = 'block' | 'inline';

/** Where a tag may legally appear */
export type TagScope = 'overview' | 'package' | 'type' | 'constructor' | 'method' | 'field';

/** A named tag handler held by the taglet registry */
export interface Taglet {
	/** Tag name without the leading `@` (e.g. "param", "link") */
	readonly name: string;
	readonly kind: TagletKind;
	/** Empty when the tag may appear anywhere */
	readonly scopes: readonly TagScope[];
	/**
	 * Origin marker: `false` for the built-in tags, `true` for tags defined
	 * with `-tag` or contributed by a `-taglet` registration.
	 */
	readonly enabled: boolean;
	/** Heading used when the tag is rendered as a section */
	readonly title?: string;
}

/**
 * The part of the taglet registry a registration is allowed to touch.
 *
 * Keys follow one convention: block tags use the bare name, inline tags
 * use `@` + name. `register` overwrites whatever was stored under the key.
 */
export interface TagletRegistrar {
	register(taglet: Taglet): void;
	has(key: string): boolean;
	get(key: string): Taglet | undefined;
}

/**
 * A named contribution of taglets, resolved from `-taglet` by its id.
 *
 * Ids look like qualified class names (`com.example.TodoTaglet`) so existing
 * doclet command lines keep working.
 */
export interface TagletRegistration {
	id: string;
	description?: string;
	register(taglets: TagletRegistrar): void;
}

// ─── Diagnostics ──────────────────────────────────────────────────────────────

export type DiagnosticLevel = 'error' | 'warning' | 'notice';

export interface Diagnostic {
	level: DiagnosticLevel;
	message: string;
}

/** The diagnostic sink handed to the configuration builder by the host */
export interface DocErrorReporter {
	printError(message: string): void;
	printWarning(message: string): void;
	printNotice(message: string): void;
}

// ─── Documentation Model ──────────────────────────────────────────────────────

/** The type of an annotation, as seen by the documentation model */
export interface AnnotationTypeDescriptor {
	readonly qualifiedName: string;
}

/** One annotation attached to a documented class */
export interface AnnotationDescriptor {
	annotationType(): AnnotationTypeDescriptor;
}

/**
 * One documented class. Owned by the host's documentation model and only
 * borrowed for the duration of a filter call.
 */
export interface ClassDescriptor {
	readonly qualifiedName: string;
	/** Direct superclass, or undefined for roots and interfaces */
	superclass(): ClassDescriptor | undefined;
	/** Interfaces declared directly on this class */
	interfaces(): readonly ClassDescriptor[];
	annotations(): readonly AnnotationDescriptor[];
	/** The qualified name */
	toString(): string;
}
