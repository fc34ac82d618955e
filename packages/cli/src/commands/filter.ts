/**
 * xdoc filter — preview which classes of a model pass the class filter.
 */

import type { Configuration } from '@xdoc/core';
import chalk from 'chalk';
import type { Command } from 'commander';
import { runBuild } from '../build.js';
import { resolveDocletArgs } from '../config.js';
import type { ClassModel } from '../model.js';
import { loadClassModel } from '../model.js';
import * as output from '../output.js';
import { ConsoleReporter } from '../reporter.js';
import type { DocletCommandOptions } from './check.js';
import { reportFailure } from './check.js';

export interface FilterPreview {
	included: string[];
	excluded: string[];
}

/** Split the declared classes of a model by the configuration's filter. */
export function previewFilter(config: Configuration, model: ClassModel): FilterPreview {
	const preview: FilterPreview = { included: [], excluded: [] };
	const filtering = config.hasFilter();
	for (const descriptor of model.classes()) {
		const name = descriptor.toString();
		if (!filtering || config.filter(descriptor)) {
			preview.included.push(name);
		} else {
			preview.excluded.push(name);
		}
	}
	return preview;
}

export function registerFilterCommand(program: Command): void {
	program
		.command('filter')
		.description('Show which classes of a YAML class model pass -extends/-implements/-annotated')
		.argument('<model>', 'Path to the class model YAML file')
		.argument('[args...]', 'Doclet options (put them after --, e.g. -- -d out -extends a.Base)')
		.option('--args-file <path>', 'YAML file with doclet arguments')
		.allowUnknownOption()
		.action(async (modelPath: string, args: string[], opts: DocletCommandOptions) => {
			try {
				const model = await loadClassModel(modelPath);
				const docletArgs = await resolveDocletArgs(args, opts.argsFile);
				const result = runBuild(docletArgs, output.isJsonMode() ? undefined : new ConsoleReporter());

				if (!result.config) {
					if (output.isJsonMode()) {
						output.json({ valid: false, diagnostics: result.diagnostics });
					}
					process.exitCode = 1;
					return;
				}

				const preview = previewFilter(result.config, model);

				if (output.isJsonMode()) {
					output.json({ valid: true, ...preview });
					return;
				}

				output.blank();
				for (const name of preview.included) {
					output.info(`  ${chalk.green('✓')} ${name}`);
				}
				if (output.isVerboseMode()) {
					for (const name of preview.excluded) {
						output.info(`  ${chalk.dim(`✗ ${name}`)}`);
					}
				}
				output.blank();
				output.info(`${preview.included.length} of ${model.size} classes included`);
				if (!result.config.hasFilter()) {
					output.info(chalk.dim('No -extends, -implements or -annotated filter set.'));
				}
			} catch (err) {
				reportFailure('Filter', err);
			}
		});
}
