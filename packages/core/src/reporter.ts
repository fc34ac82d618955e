/**
 * Diagnostic reporters.
 *
 * ReporterManager fans each diagnostic out to every attached reporter, in
 * the order they were added. CollectingReporter keeps diagnostics in memory
 * so a caller can decide on an exit status afterwards.
 */

import type { Diagnostic, DiagnosticLevel, DocErrorReporter } from '@xdoc/sdk';

export class ReporterManager implements DocErrorReporter {
	private readonly reporters: DocErrorReporter[] = [];

	addReporter(reporter: DocErrorReporter): this {
		this.reporters.push(reporter);
		return this;
	}

	printError(message: string): void {
		for (const reporter of this.reporters) reporter.printError(message);
	}

	printWarning(message: string): void {
		for (const reporter of this.reporters) reporter.printWarning(message);
	}

	printNotice(message: string): void {
		for (const reporter of this.reporters) reporter.printNotice(message);
	}
}

export class CollectingReporter implements DocErrorReporter {
	private readonly collected: Diagnostic[] = [];

	printError(message: string): void {
		this.collected.push({ level: 'error', message });
	}

	printWarning(message: string): void {
		this.collected.push({ level: 'warning', message });
	}

	printNotice(message: string): void {
		this.collected.push({ level: 'notice', message });
	}

	get diagnostics(): readonly Diagnostic[] {
		return this.collected;
	}

	count(level: DiagnosticLevel): number {
		return this.collected.filter((d) => d.level === level).length;
	}

	get errorCount(): number {
		return this.count('error');
	}

	get warningCount(): number {
		return this.count('warning');
	}
}
