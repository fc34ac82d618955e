/**
 * Test harness for xdoc.
 *
 * A recording reporter and small builders for documentation-model fixtures,
 * so tests never need a real host tool.
 */

import type {
	AnnotationDescriptor,
	ClassDescriptor,
	Diagnostic,
	DiagnosticLevel,
	DocErrorReporter,
} from './types.js';

// ─── MockReporter ─────────────────────────────────────────────────────────────

export class MockReporter implements DocErrorReporter {
	readonly diagnostics: Diagnostic[] = [];

	printError(message: string): void {
		this.diagnostics.push({ level: 'error', message });
	}

	printWarning(message: string): void {
		this.diagnostics.push({ level: 'warning', message });
	}

	printNotice(message: string): void {
		this.diagnostics.push({ level: 'notice', message });
	}

	messages(level: DiagnosticLevel): string[] {
		return this.diagnostics.filter((d) => d.level === level).map((d) => d.message);
	}

	get errors(): string[] {
		return this.messages('error');
	}

	get warnings(): string[] {
		return this.messages('warning');
	}

	get notices(): string[] {
		return this.messages('notice');
	}

	reset(): void {
		this.diagnostics.length = 0;
	}
}

// ─── Model fixtures ───────────────────────────────────────────────────────────

export function createTestAnnotation(qualifiedName: string): AnnotationDescriptor {
	return {
		annotationType: () => ({ qualifiedName }),
	};
}

export interface TestClassOptions {
	/** A descriptor, or a bare name that becomes a root class */
	superclass?: ClassDescriptor | string;
	interfaces?: Array<ClassDescriptor | string>;
	/** Annotation type names */
	annotations?: string[];
}

class TestClass implements ClassDescriptor {
	constructor(
		readonly qualifiedName: string,
		private readonly parent: ClassDescriptor | undefined,
		private readonly declaredInterfaces: readonly ClassDescriptor[],
		private readonly declaredAnnotations: readonly AnnotationDescriptor[],
	) {}

	superclass(): ClassDescriptor | undefined {
		return this.parent;
	}

	interfaces(): readonly ClassDescriptor[] {
		return this.declaredInterfaces;
	}

	annotations(): readonly AnnotationDescriptor[] {
		return this.declaredAnnotations;
	}

	toString(): string {
		return this.qualifiedName;
	}
}

function toDescriptor(ref: ClassDescriptor | string): ClassDescriptor {
	return typeof ref === 'string' ? createTestClass(ref) : ref;
}

/** Create a class descriptor fixture. */
export function createTestClass(qualifiedName: string, options: TestClassOptions = {}): ClassDescriptor {
	return new TestClass(
		qualifiedName,
		options.superclass === undefined ? undefined : toDescriptor(options.superclass),
		(options.interfaces ?? []).map(toDescriptor),
		(options.annotations ?? []).map(createTestAnnotation),
	);
}
