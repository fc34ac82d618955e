/**
 * ConsoleReporter — prints builder diagnostics through the output module.
 */

import type { DocErrorReporter } from '@xdoc/sdk';
import * as output from './output.js';

export class ConsoleReporter implements DocErrorReporter {
	printError(message: string): void {
		output.error(message);
	}

	printWarning(message: string): void {
		output.warn(message);
	}

	printNotice(message: string): void {
		output.notice(message);
	}
}
