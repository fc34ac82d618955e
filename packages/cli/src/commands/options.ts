/**
 * xdoc options — list the doclet options xdoc understands.
 */

import type { OptionDefinition } from '@xdoc/core';
import { OPTION_SPEC } from '@xdoc/core';
import chalk from 'chalk';
import type { Command } from 'commander';
import * as output from '../output.js';

/** One line per option: name, token count, usage. */
export function renderOptionTable(options: readonly OptionDefinition[] = OPTION_SPEC): string[] {
	const width = Math.max(...options.map((o) => o.name.length));
	return options.map((o) => {
		const repeat = o.repeatable ? ' (repeatable)' : '';
		return `${o.name.padEnd(width)}  ${o.length}  ${o.usage.replace(/\s*\t\s*/g, ' - ')}${repeat}`;
	});
}

export function registerOptionsCommand(program: Command): void {
	program
		.command('options')
		.description('List recognised doclet options and how many tokens each takes')
		.action(() => {
			if (output.isJsonMode()) {
				output.json(OPTION_SPEC);
				return;
			}
			output.heading('Doclet options');
			output.blank();
			for (const line of renderOptionTable()) {
				output.info(`  ${line}`);
			}
			output.blank();
			output.info(chalk.dim('Token counts include the option name itself.'));
		});
}
