/**
 * Output formatting utilities for the CLI.
 *
 * Provides colored output, JSON mode and quiet mode. Diagnostics from
 * writers go to stderr separately, through the console renderer.
 */

import chalk from 'chalk';

// ─── Global output state ─────────────────────────────────────────────────────

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

// ─── Basic output ────────────────────────────────────────────────────────────

export function info(message: string): void {
	if (quietMode || jsonMode) return;
	console.log(message);
}

export function success(message: string): void {
	if (quietMode || jsonMode) return;
	console.log(chalk.green(`  ✓ ${message}`));
}

export function error(message: string): void {
	if (jsonMode) return;
	console.error(chalk.red(`  ✗ ${message}`));
}

export function warn(message: string): void {
	if (quietMode || jsonMode) return;
	console.warn(chalk.yellow(`  ! ${message}`));
}

/** Aligned `label  value` line, as used by `lock` and `version`. */
export function field(label: string, value: string, width = 10): void {
	if (quietMode || jsonMode) return;
	console.log(`${chalk.dim(label.padEnd(width))}${value}`);
}

// ─── JSON output ─────────────────────────────────────────────────────────────

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
