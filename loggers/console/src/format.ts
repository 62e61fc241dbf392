/**
 * Formatting for diagnostic entries: level filtering, compact and verbose lines.
 */

import type { DiagnosticEntry, DiagnosticLevel } from '@logsink/sdk';

// ─── ANSI ─────────────────────────────────────────────────────────────────────

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

const LEVEL_ORDER: Record<DiagnosticLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const LEVEL_COLOR: Record<DiagnosticLevel, string> = {
	debug: DIM,
	info: CYAN,
	warn: YELLOW,
	error: RED,
};

const LEVEL_ICON: Record<DiagnosticLevel, string> = {
	debug: '\u00b7', // ·
	info: '\u25cf', // ●
	warn: '\u26a0', // ⚠
	error: '\u2717', // ✗
};

export function isDiagnosticLevel(value: string): value is DiagnosticLevel {
	return value in LEVEL_ORDER;
}

/** Unknown minimum levels show everything. */
export function shouldLog(level: DiagnosticLevel, minimum: string): boolean {
	if (!isDiagnosticLevel(minimum)) return true;
	return LEVEL_ORDER[level] >= LEVEL_ORDER[minimum];
}

function paint(text: string, code: string, color: boolean): string {
	return color ? `${code}${text}${RESET}` : text;
}

function formatTime(timestamp: string): string {
	const date = new Date(timestamp);
	if (Number.isNaN(date.getTime())) return timestamp;
	const hh = String(date.getHours()).padStart(2, '0');
	const mm = String(date.getMinutes()).padStart(2, '0');
	const ss = String(date.getSeconds()).padStart(2, '0');
	const ms = String(date.getMilliseconds()).padStart(3, '0');
	return `${hh}:${mm}:${ss}.${ms}`;
}

// ─── Formatters ───────────────────────────────────────────────────────────────

/** One line: time, icon, level, source, message, then error when present. */
export function formatCompact(entry: DiagnosticEntry, color: boolean): string {
	const parts = [
		paint(formatTime(entry.timestamp), DIM, color),
		paint(`${LEVEL_ICON[entry.level]} ${entry.level.padEnd(5)}`, LEVEL_COLOR[entry.level], color),
		`[${entry.source}]`,
		entry.message,
	];
	if (entry.error !== undefined) {
		parts.push(paint(`err=${entry.error}`, RED, color));
	}
	return parts.join(' ');
}

/** Compact line followed by the destination path on its own line. */
export function formatVerbose(entry: DiagnosticEntry, color: boolean): string {
	const line = formatCompact(entry, color);
	if (entry.path === undefined) return line;
	return `${line}\n${paint(`  path: ${entry.path}`, DIM, color)}`;
}
