/**
 * Terminal output helpers shared by all commands.
 *
 * Modes are set once from the global flags: --json suppresses decorated
 * output, --quiet keeps errors only, --verbose adds notices.
 */

import chalk from 'chalk';

let jsonMode = false;
let quietMode = false;
let verboseMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function setVerboseMode(enabled: boolean): void {
	verboseMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

export function isVerboseMode(): boolean {
	return verboseMode;
}

function silenced(): boolean {
	return jsonMode || quietMode;
}

export function info(message: string): void {
	if (silenced()) return;
	console.log(message);
}

export function success(message: string): void {
	if (silenced()) return;
	console.log(`${chalk.green('✓')} ${message}`);
}

export function notice(message: string): void {
	if (silenced() || !verboseMode) return;
	console.log(chalk.dim(`  ${message}`));
}

export function warn(message: string): void {
	if (silenced()) return;
	console.error(`${chalk.yellow('⚠')} ${message}`);
}

/** Errors are printed in every mode except JSON, where they go into the payload. */
export function error(message: string): void {
	if (jsonMode) return;
	console.error(`${chalk.red('✗')} ${message}`);
}

export function blank(): void {
	if (silenced()) return;
	console.log('');
}

export function heading(message: string): void {
	if (silenced()) return;
	console.log(chalk.bold(message));
}

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}
