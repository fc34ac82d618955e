/**
 * Class model files — a YAML stand-in for the host's documentation model.
 *
 *   classes:
 *     - name: com.example.Widget
 *       superclass: com.example.Base
 *       interfaces: [com.example.Named]
 *       annotations: [com.example.Api]
 *
 * Names that are referenced but never declared resolve to bare classes
 * with no superclass, interfaces or annotations.
 */

import { SchemaError } from '@xdoc/core';
import type { AnnotationDescriptor, ClassDescriptor } from '@xdoc/sdk';
import AjvModule from 'ajv';
import { formatSchemaErrors, loadYamlFile, resolveInputPath } from './config.js';

const Ajv = AjvModule.default;

// ─── Schema ──────────────────────────────────────────────────────────────────

export interface ClassEntry {
	name: string;
	superclass?: string;
	interfaces?: string[];
	annotations?: string[];
}

export interface ClassModelFile {
	classes: ClassEntry[];
}

export const classModelSchema = {
	type: 'object',
	required: ['classes'],
	properties: {
		classes: {
			type: 'array',
			items: {
				type: 'object',
				required: ['name'],
				properties: {
					name: { type: 'string', minLength: 1 },
					superclass: { type: 'string', minLength: 1 },
					interfaces: { type: 'array', items: { type: 'string', minLength: 1 } },
					annotations: { type: 'array', items: { type: 'string', minLength: 1 } },
				},
				additionalProperties: false,
			},
		},
	},
	additionalProperties: false,
};

// ─── Descriptors ─────────────────────────────────────────────────────────────

class ModelClass implements ClassDescriptor {
	constructor(
		private readonly model: ClassModel,
		readonly qualifiedName: string,
		private readonly entry: ClassEntry | undefined,
	) {}

	superclass(): ClassDescriptor | undefined {
		const name = this.entry?.superclass;
		return name === undefined ? undefined : this.model.lookup(name);
	}

	interfaces(): readonly ClassDescriptor[] {
		return (this.entry?.interfaces ?? []).map((name) => this.model.lookup(name));
	}

	annotations(): readonly AnnotationDescriptor[] {
		return (this.entry?.annotations ?? []).map((qualifiedName) => ({
			annotationType: () => ({ qualifiedName }),
		}));
	}

	toString(): string {
		return this.qualifiedName;
	}
}

export class ClassModel {
	private readonly entries = new Map<string, ClassEntry>();
	private readonly descriptors = new Map<string, ModelClass>();

	constructor(entries: readonly ClassEntry[]) {
		for (const entry of entries) {
			if (this.entries.has(entry.name)) {
				throw new SchemaError(`Class "${entry.name}" is declared more than once`);
			}
			this.entries.set(entry.name, entry);
		}
	}

	/** The descriptor for a name, declared or not. */
	lookup(name: string): ClassDescriptor {
		let descriptor = this.descriptors.get(name);
		if (!descriptor) {
			descriptor = new ModelClass(this, name, this.entries.get(name));
			this.descriptors.set(name, descriptor);
		}
		return descriptor;
	}

	/** Declared classes, in file order. */
	classes(): ClassDescriptor[] {
		return [...this.entries.keys()].map((name) => this.lookup(name));
	}

	get size(): number {
		return this.entries.size;
	}
}

// ─── Loading ─────────────────────────────────────────────────────────────────

export function parseClassModel(data: unknown, source = 'class model'): ClassModel {
	const ajv = new Ajv({ allErrors: true });
	const validate = ajv.compile<ClassModelFile>(classModelSchema);
	if (!validate(data)) {
		const errors = formatSchemaErrors(validate.errors);
		throw new SchemaError(`Invalid ${source}: ${errors.join(', ')}`, errors);
	}
	return new ClassModel(data.classes);
}

export async function loadClassModel(filePath: string): Promise<ClassModel> {
	const resolved = resolveInputPath(filePath);
	return parseClassModel(await loadYamlFile(resolved), resolved);
}
