/**
 * Argument files for the CLI.
 *
 * An args file is a YAML document listing doclet options, so long option
 * sets can live beside the project:
 *
 *   args:
 *     - -d
 *     - ${OUT_DIR}/xml
 *     - -tag
 *     - todo:a:To Do
 *
 * `${VAR}` references are replaced from the environment.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { ConfigError, SchemaError } from '@xdoc/core';
import type { ErrorObject } from 'ajv';
import AjvModule from 'ajv';
import { load } from 'js-yaml';

const Ajv = AjvModule.default;

// ─── Schema ──────────────────────────────────────────────────────────────────

interface ArgsFile {
	args: string[];
}

const argsFileSchema = {
	type: 'object',
	required: ['args'],
	properties: {
		args: { type: 'array', items: { type: 'string' } },
	},
	additionalProperties: false,
};

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
	return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
}

// ─── Env var substitution ────────────────────────────────────────────────────

export function substituteEnvVars(value: unknown): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
			const envVal = process.env[varName];
			if (envVal === undefined) {
				throw new ConfigError(`Environment variable "${varName}" is not set`);
			}
			return envVal;
		});
	}
	if (Array.isArray(value)) {
		return value.map(substituteEnvVars);
	}
	if (value !== null && typeof value === 'object') {
		const result: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(value)) {
			result[k] = substituteEnvVars(v);
		}
		return result;
	}
	return value;
}

// ─── YAML loader ─────────────────────────────────────────────────────────────

export function resolveInputPath(filePath: string): string {
	return isAbsolute(filePath) ? filePath : resolve(process.cwd(), filePath);
}

export async function loadYamlFile(filePath: string): Promise<unknown> {
	let content: string;
	try {
		content = await readFile(filePath, 'utf-8');
	} catch (err) {
		throw new ConfigError(`File not found: ${filePath}`, { cause: err });
	}
	try {
		return load(content);
	} catch (err) {
		throw new ConfigError(`Failed to parse YAML file: ${filePath}`, { cause: err });
	}
}

// ─── Public API ──────────────────────────────────────────────────────────────

/** Parse and validate args-file content already loaded from YAML. */
export function parseArgsFile(data: unknown, filePath: string): string[] {
	const ajv = new Ajv({ allErrors: true });
	const validate = ajv.compile<ArgsFile>(argsFileSchema);
	if (!validate(data)) {
		const errors = formatSchemaErrors(validate.errors);
		throw new SchemaError(`Invalid args file ${filePath}: ${errors.join(', ')}`, errors);
	}
	const args = substituteEnvVars(data.args);
	return Array.isArray(args) ? args.map(String) : [];
}

export async function loadArgsFile(filePath: string): Promise<string[]> {
	const resolved = resolveInputPath(filePath);
	return parseArgsFile(await loadYamlFile(resolved), resolved);
}

/**
 * Doclet arguments for a command: the args file first (if any),
 * then whatever was given on the command line.
 */
export async function resolveDocletArgs(args: readonly string[], argsFile?: string): Promise<string[]> {
	const fromFile = argsFile ? await loadArgsFile(argsFile) : [];
	return [...fromFile, ...args];
}
