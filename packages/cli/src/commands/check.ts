/**
 * xdoc check — validate doclet options and show the configuration they produce.
 *
 * Exit status 1 when the options are rejected, 2 when an input file is invalid.
 */

import type { Configuration } from '@xdoc/core';
import { SchemaError } from '@xdoc/core';
import chalk from 'chalk';
import type { Command } from 'commander';
import { runBuild } from '../build.js';
import { resolveDocletArgs } from '../config.js';
import * as output from '../output.js';
import { ConsoleReporter } from '../reporter.js';

export interface DocletCommandOptions {
	argsFile?: string;
}

function row(label: string, value: string): string {
	return `${label.padEnd(18)}${value}`;
}

/** Plain-text summary of a configuration, one line per setting. */
export function describeConfiguration(config: Configuration): string[] {
	const custom = config.taglets.list().filter((t) => t.enabled).length;
	const builtin = config.taglets.size - custom;

	let mode: string;
	if (config.multipleFiles) {
		mode = config.useSubFolders ? 'multiple files, package subfolders' : 'multiple files';
	} else {
		mode = `single file ${config.filename}`;
	}

	return [
		row('Output directory', config.outputDirectory),
		row('Output', mode),
		row('Encoding', config.encoding),
		row('Extends', config.extendsFilter ?? '-'),
		row('Implements', config.implementsFilter ?? '-'),
		row('Annotated', config.annotationFilter ?? '-'),
		row('Taglets', `${builtin} built-in, ${custom} custom`),
	];
}

/** Map a thrown error to the exit status the commands use. */
export function exitCodeFor(err: unknown): number {
	return err instanceof SchemaError ? 2 : 1;
}

/** Print a command failure (as a JSON payload in JSON mode) and set the exit status. */
export function reportFailure(command: string, err: unknown): void {
	const message = err instanceof Error ? err.message : String(err);
	if (output.isJsonMode()) {
		output.json({ valid: false, error: message });
	} else {
		output.error(`${command} failed: ${message}`);
	}
	process.exitCode = exitCodeFor(err);
}

export function registerCheckCommand(program: Command): void {
	program
		.command('check')
		.description('Validate doclet options and show the resulting configuration')
		.argument('[args...]', 'Doclet options (put them after --, e.g. -- -d out -multiple)')
		.option('--args-file <path>', 'YAML file with doclet arguments')
		.allowUnknownOption()
		.action(async (args: string[], opts: DocletCommandOptions) => {
			try {
				const docletArgs = await resolveDocletArgs(args, opts.argsFile);
				const result = runBuild(docletArgs, output.isJsonMode() ? undefined : new ConsoleReporter());

				if (output.isJsonMode()) {
					output.json({
						valid: result.config !== null,
						configuration: result.config?.toJSON() ?? null,
						diagnostics: result.diagnostics,
					});
					if (!result.config) process.exitCode = 1;
					return;
				}

				if (!result.config) {
					output.blank();
					output.info(chalk.dim('Fix the options above, then re-run `xdoc check`.'));
					process.exitCode = 1;
					return;
				}

				output.blank();
				for (const line of describeConfiguration(result.config)) {
					output.info(`  ${line}`);
				}
				output.blank();
				output.success(
					`Options valid: ${result.errorCount} error${result.errorCount !== 1 ? 's' : ''}, ${result.warningCount} warning${result.warningCount !== 1 ? 's' : ''}`,
				);
			} catch (err) {
				reportFailure('Check', err);
			}
		});
}
