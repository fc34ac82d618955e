import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as output from '../output.js';
import { createProgram } from '../program.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

async function run(...argv: string[]) {
	const log = vi.spyOn(console, 'log').mockImplementation(() => {});
	vi.spyOn(console, 'error').mockImplementation(() => {});
	await createProgram('0.0.0').parseAsync(argv, { from: 'user' });
	const lines = log.mock.calls.map((call) => String(call[0]));
	return { lines, exitCode: process.exitCode };
}

async function runJson(...argv: string[]) {
	const { lines, exitCode } = await run('--json', ...argv);
	const payload: unknown = JSON.parse(lines.join('\n'));
	return { payload, exitCode };
}

let tempDir: string;

beforeEach(async () => {
	process.exitCode = undefined;
	tempDir = await mkdtemp(join(tmpdir(), 'xdoc-program-test-'));
});

afterEach(async () => {
	output.setJsonMode(false);
	output.setQuietMode(false);
	output.setVerboseMode(false);
	process.exitCode = undefined;
	vi.restoreAllMocks();
	await rm(tempDir, { recursive: true, force: true });
});

// ─── check ────────────────────────────────────────────────────────────────────

describe('xdoc check', () => {
	it('reports a rejected build with exit status 1', async () => {
		const { payload, exitCode } = await runJson('check', '--', '-multiple');

		expect(exitCode).toBe(1);
		expect(payload).toEqual({
			valid: false,
			configuration: null,
			diagnostics: [{ level: 'error', message: 'Output directory not specified; use -d <directory>' }],
		});
	});

	it('prints the configuration of a valid build', async () => {
		const { payload, exitCode } = await runJson('check', '--', '-d', 'out', '-multiple', '-docencoding', 'latin1');

		expect(exitCode).toBeUndefined();
		expect(payload).toMatchObject({
			valid: true,
			configuration: {
				outputDirectory: 'out',
				multipleFiles: true,
				useSubFolders: false,
				encoding: 'ISO-8859-1',
				extendsFilter: null,
			},
			diagnostics: [
				{ level: 'notice', message: 'Output directory: out' },
				{ level: 'notice', message: 'Output encoding: ISO-8859-1' },
			],
		});
	});

	it('rejects an unknown doclet option with exit status 1', async () => {
		const { payload, exitCode } = await runJson('check', '--', '-d', 'out', '-bogus');

		expect(exitCode).toBe(1);
		expect(payload).toEqual({ valid: false, error: 'Unknown option: -bogus' });
	});

	it('rejects an invalid args file with exit status 2', async () => {
		const file = join(tempDir, 'args.yaml');
		await writeFile(file, 'args: 5\n');

		const { payload, exitCode } = await runJson('check', '--args-file', file);

		expect(exitCode).toBe(2);
		expect(payload).toEqual({ valid: false, error: `Invalid args file ${file}: /args: must be array` });
	});

	it('reads arguments from an args file', async () => {
		const file = join(tempDir, 'args.yaml');
		await writeFile(file, 'args: [-d, site]\n');

		const { payload, exitCode } = await runJson('check', '--args-file', file);

		expect(exitCode).toBeUndefined();
		expect(payload).toMatchObject({ valid: true, configuration: { outputDirectory: 'site' } });
	});

	it('prints a summary table outside JSON mode', async () => {
		const { lines, exitCode } = await run('check', '--', '-d', 'out');

		expect(exitCode).toBeUndefined();
		expect(lines).toContain('  Output directory  out');
		expect(lines).toContain('  Encoding          UTF-8');
	});
});

// ─── filter ───────────────────────────────────────────────────────────────────

describe('xdoc filter', () => {
	async function writeModel(content: string): Promise<string> {
		const file = join(tempDir, 'model.yaml');
		await writeFile(file, content);
		return file;
	}

	it('splits the model by the configured filter', async () => {
		const model = await writeModel(
			[
				'classes:',
				'  - name: com.example.Widget',
				'    superclass: com.example.Base',
				'  - name: com.example.Plain',
				'',
			].join('\n'),
		);

		const { payload, exitCode } = await runJson('filter', model, '--', '-d', 'out', '-extends', 'com.example.Base');

		expect(exitCode).toBeUndefined();
		expect(payload).toEqual({
			valid: true,
			included: ['com.example.Widget'],
			excluded: ['com.example.Plain'],
		});
	});

	it('rejects an invalid class model with exit status 2', async () => {
		const model = await writeModel('classes:\n  - superclass: com.example.Base\n');

		const { payload, exitCode } = await runJson('filter', model, '--', '-d', 'out');

		expect(exitCode).toBe(2);
		expect(payload).toEqual({
			valid: false,
			error: `Invalid ${model}: /classes/0: must have required property 'name'`,
		});
	});

	it('exits with status 1 when the options are rejected', async () => {
		const model = await writeModel('classes: []\n');

		const { payload, exitCode } = await runJson('filter', model, '--', '-d');

		expect(exitCode).toBe(1);
		expect(payload).toEqual({
			valid: false,
			diagnostics: [
				{ level: 'error', message: 'Missing value for <directory>, usage:' },
				{ level: 'error', message: '-d <directory> Destination directory for output files' },
			],
		});
	});
});

// ─── taglets ──────────────────────────────────────────────────────────────────

describe('xdoc taglets', () => {
	it('lists custom tags with the registry', async () => {
		const { payload, exitCode } = await runJson('taglets', '--', '-d', 'out', '-tag', 'todo:a:To Do');

		expect(exitCode).toBeUndefined();
		expect(Array.isArray(payload)).toBe(true);
		expect(payload).toContainEqual({ key: 'todo', name: 'todo', kind: 'block', scopes: [], enabled: true });
		expect(payload).toContainEqual({ key: '@link', name: 'link', kind: 'inline', scopes: expect.any(Array), enabled: false });
	});

	it('lists the bundled registrations with --available', async () => {
		const { payload } = await runJson('taglets', '--available');

		expect(payload).toEqual([
			{ id: 'xdoc.taglets.TodoTaglet', description: 'Block tag @todo for pending work, allowed anywhere' },
			{ id: 'xdoc.taglets.ApiNoteTaglet', description: 'Block tag @apiNote on types and members' },
			{
				id: 'xdoc.taglets.ImplSpecTaglets',
				description: 'Block tags @implSpec and @implNote on types and methods',
			},
		]);
	});
});
