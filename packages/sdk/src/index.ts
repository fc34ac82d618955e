/**
 * @xdoc/sdk — shared contracts for xdoc.
 *
 * Types for the option matrix, taglets and the documentation model,
 * the built-in tag table, and test helpers.
 */

// Core types
export type {
	OptionEntry,
	OptionMatrix,
	TagletKind,
	TagScope,
	Taglet,
	TagletRegistrar,
	TagletRegistration,
	DiagnosticLevel,
	Diagnostic,
	DocErrorReporter,
	AnnotationTypeDescriptor,
	AnnotationDescriptor,
	ClassDescriptor,
} from './types.js';

// Built-in tags
export { BUILTIN_BLOCK_TAGS, BUILTIN_INLINE_TAGS, BUILTIN_TAGLETS } from './tags.js';

// Test harness
export { MockReporter, createTestAnnotation, createTestClass } from './testing.js';
export type { TestClassOptions } from './testing.js';
