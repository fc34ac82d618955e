/**
 * xdoc taglets — show the taglet registry a set of doclet options produces.
 */

import type { Configuration, TagletCatalog } from '@xdoc/core';
import type { Command } from 'commander';
import { runBuild } from '../build.js';
import { resolveDocletArgs } from '../config.js';
import * as output from '../output.js';
import { ConsoleReporter } from '../reporter.js';
import { createBundledCatalog } from '../taglets.js';
import type { DocletCommandOptions } from './check.js';
import { reportFailure } from './check.js';

/** One line per registry entry: key, kind and origin. */
export function renderTagletTable(config: Configuration): string[] {
	const entries = config.taglets.entries();
	const width = Math.max(0, ...entries.map(([key]) => key.length));
	return entries.map(
		([key, taglet]) =>
			`${key.padEnd(width)}  ${taglet.kind.padEnd(6)}  ${taglet.enabled ? 'custom' : 'built-in'}`,
	);
}

/** One line per registration `-taglet` can load. */
export function renderCatalog(catalog: TagletCatalog): string[] {
	return catalog.list().map((r) => (r.description ? `${r.id} - ${r.description}` : r.id));
}

interface TagletsCommandOptions extends DocletCommandOptions {
	available?: boolean;
}

export function registerTagletsCommand(program: Command): void {
	program
		.command('taglets')
		.description('Show the taglet registry built from doclet options')
		.argument('[args...]', 'Doclet options (put them after --, e.g. -- -d out -tag todo)')
		.option('--args-file <path>', 'YAML file with doclet arguments')
		.option('--available', 'List the taglet registrations -taglet can load')
		.allowUnknownOption()
		.action(async (args: string[], opts: TagletsCommandOptions) => {
			try {
				if (opts.available) {
					const catalog = createBundledCatalog();
					if (output.isJsonMode()) {
						output.json(catalog.list().map(({ id, description }) => ({ id, description })));
						return;
					}
					for (const line of renderCatalog(catalog)) output.info(`  ${line}`);
					return;
				}

				const docletArgs = await resolveDocletArgs(args, opts.argsFile);
				const result = runBuild(docletArgs, output.isJsonMode() ? undefined : new ConsoleReporter());
				if (!result.config) {
					if (output.isJsonMode()) {
						output.json({ valid: false, diagnostics: result.diagnostics });
					}
					process.exitCode = 1;
					return;
				}

				if (output.isJsonMode()) {
					output.json(result.config.taglets.entries().map(([key, taglet]) => ({ key, ...taglet })));
					return;
				}

				for (const line of renderTagletTable(result.config)) output.info(`  ${line}`);
			} catch (err) {
				reportFailure('Taglets', err);
			}
		});
}
