#!/usr/bin/env node

/**
 * xdoc CLI — check doclet options and preview class filtering.
 *
 * Entry point: reads the package version and runs the program.
 * Doclet options use a single dash, so pass them after `--`:
 *
 *   xdoc check -- -d out -multiple -tag todo:a:To\ Do
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createProgram } from './program.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

async function getVersion(): Promise<string> {
	try {
		const pkgPath = resolve(__dirname, '..', 'package.json');
		const content = await readFile(pkgPath, 'utf-8');
		const pkg = JSON.parse(content) as { version: string };
		return pkg.version;
	} catch {
		return '0.0.0';
	}
}

async function main(): Promise<void> {
	const version = await getVersion();
	const program = createProgram(version);
	await program.parseAsync(process.argv);
}

main().catch((err) => {
	console.error('Fatal error:', err instanceof Error ? err.message : String(err));
	process.exitCode = 1;
});
