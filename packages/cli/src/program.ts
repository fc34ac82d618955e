/**
 * The xdoc Commander program: global flags and every command.
 */

import { Command } from 'commander';
import { registerCheckCommand } from './commands/check.js';
import { registerFilterCommand } from './commands/filter.js';
import { registerOptionsCommand } from './commands/options.js';
import { registerTagletsCommand } from './commands/taglets.js';
import { setJsonMode, setQuietMode, setVerboseMode } from './output.js';

export function createProgram(version: string): Command {
	const program = new Command();

	program
		.name('xdoc')
		.description('xdoc — doclet option checking and class filter preview')
		.version(version, '-V, --version', 'Print version number')
		.option('-v, --verbose', 'Verbose output (show notices)')
		.option('--json', 'Output as JSON (for scripting)')
		.option('--quiet', 'Errors only')
		.hook('preAction', (thisCommand) => {
			const opts = thisCommand.opts();
			if (opts.json) setJsonMode(true);
			if (opts.verbose) setVerboseMode(true);
			if (opts.quiet) setQuietMode(true);
		});

	registerOptionsCommand(program);
	registerCheckCommand(program);
	registerFilterCommand(program);
	registerTagletsCommand(program);

	return program;
}
