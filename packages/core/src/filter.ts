/**
 * ClassFilter — decides whether a documented class is emitted.
 *
 * Three independent dimensions, combined with AND:
 * - extends:    the direct superclass is exactly the target
 * - implements: one of the directly declared interfaces is the target
 * - annotated:  one of the annotations has the target as its type
 *
 * Matching is plain string equality on qualified names. Ancestry is not
 * followed: a grandchild of the target class does not match `extends`.
 * A dimension without a target passes every class.
 */

import type { ClassDescriptor } from '@xdoc/sdk';

export interface ClassFilterCriteria {
	/** Qualified name of the required direct superclass */
	extendsType?: string;
	/** Qualified name of an interface the class must declare */
	implementsType?: string;
	/** Qualified name of an annotation type the class must carry */
	annotationType?: string;
}

export function matchesSuperclass(descriptor: ClassDescriptor, base: string): boolean {
	const superclass = descriptor.superclass();
	return superclass !== undefined && base === superclass.toString();
}

export function matchesInterface(descriptor: ClassDescriptor, iface: string): boolean {
	return descriptor.interfaces().some((i) => iface === i.toString());
}

export function matchesAnnotation(descriptor: ClassDescriptor, annotation: string): boolean {
	return descriptor.annotations().some((a) => annotation === a.annotationType().qualifiedName);
}

export class ClassFilter {
	readonly criteria: Readonly<ClassFilterCriteria>;

	constructor(criteria: ClassFilterCriteria = {}) {
		this.criteria = Object.freeze({ ...criteria });
	}

	/** True when at least one dimension has a target. */
	hasFilter(): boolean {
		const { extendsType, implementsType, annotationType } = this.criteria;
		return extendsType !== undefined || implementsType !== undefined || annotationType !== undefined;
	}

	shouldInclude(descriptor: ClassDescriptor): boolean {
		const { extendsType, implementsType, annotationType } = this.criteria;

		if (extendsType !== undefined && !matchesSuperclass(descriptor, extendsType)) {
			return false;
		}
		if (implementsType !== undefined && !matchesInterface(descriptor, implementsType)) {
			return false;
		}
		if (annotationType !== undefined && !matchesAnnotation(descriptor, annotationType)) {
			return false;
		}
		return true;
	}
}
