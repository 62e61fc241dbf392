/**
 * Tests for ConsoleDiagnostics — level filtering, formatting, color, error resilience.
 */

import type { DiagnosticEntry } from '@logsink/sdk';
import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConsoleDiagnostics } from '../console-logger.js';
import { formatCompact, formatVerbose, isDiagnosticLevel, shouldLog } from '../format.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

function makeEntry(overrides: Partial<DiagnosticEntry> = {}): DiagnosticEntry {
	return {
		timestamp: '2026-01-15T10:30:45.123Z',
		level: 'warn',
		source: 'mutex',
		message: 'Shared file lock could not be acquired within 10000 ms; record dropped',
		path: '/var/log/app/shared.log',
		...overrides,
	};
}

// ANSI codes for assertion
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';

// ─── shouldLog ───────────────────────────────────────────────────────────────

describe('shouldLog', () => {
	it('shows every level at debug', () => {
		expect(shouldLog('debug', 'debug')).toBe(true);
		expect(shouldLog('info', 'debug')).toBe(true);
		expect(shouldLog('warn', 'debug')).toBe(true);
		expect(shouldLog('error', 'debug')).toBe(true);
	});

	it('filters below the minimum', () => {
		expect(shouldLog('debug', 'info')).toBe(false);
		expect(shouldLog('info', 'warn')).toBe(false);
		expect(shouldLog('warn', 'error')).toBe(false);
		expect(shouldLog('error', 'error')).toBe(true);
	});

	it('shows everything for an unknown minimum', () => {
		expect(shouldLog('debug', 'verbose')).toBe(true);
	});
});

describe('isDiagnosticLevel', () => {
	it('accepts the four levels only', () => {
		expect(['debug', 'info', 'warn', 'error', 'trace'].map(isDiagnosticLevel)).toEqual([
			true,
			true,
			true,
			true,
			false,
		]);
	});
});

// ─── formatCompact ───────────────────────────────────────────────────────────

describe('formatCompact', () => {
	it('produces one line with icon, level, source and message', () => {
		const output = formatCompact(makeEntry(), false);

		expect(output).toMatch(
			/^\d{2}:\d{2}:\d{2}\.\d{3} ⚠ warn  \[mutex\] Shared file lock could not be acquired within 10000 ms; record dropped$/,
		);
	});

	it('appends the error text', () => {
		const output = formatCompact(makeEntry({ level: 'error', error: 'EACCES' }), false);
		expect(output.endsWith('err=EACCES')).toBe(true);
	});

	it('keeps an unparseable timestamp as is', () => {
		const output = formatCompact(makeEntry({ timestamp: 'later' }), false);
		expect(output.startsWith('later ')).toBe(true);
	});

	it('uses ANSI colors when color=true', () => {
		const output = formatCompact(makeEntry(), true);
		expect(output).toContain(`${YELLOW}⚠ warn ${RESET}`);
		expect(output).toContain(DIM);
	});

	it('shows the error in red when color=true', () => {
		const output = formatCompact(makeEntry({ error: 'timeout' }), true);
		expect(output).toContain(`${RED}err=timeout${RESET}`);
	});

	it('no ANSI codes when color=false', () => {
		expect(formatCompact(makeEntry(), false)).not.toContain('\x1b[');
	});
});

// ─── formatVerbose ───────────────────────────────────────────────────────────

describe('formatVerbose', () => {
	it('adds the destination path on a second line', () => {
		const lines = formatVerbose(makeEntry(), false).split('\n');
		expect(lines).toHaveLength(2);
		expect(lines[1]).toBe('  path: /var/log/app/shared.log');
	});

	it('is single line without a path', () => {
		const output = formatVerbose(makeEntry({ path: undefined }), false);
		expect(output).not.toContain('\n');
	});

	it('dims the path when color=true', () => {
		const output = formatVerbose(makeEntry(), true);
		expect(output).toContain(`${DIM}  path: /var/log/app/shared.log${RESET}`);
	});
});

// ─── ConsoleDiagnostics ──────────────────────────────────────────────────────

describe('ConsoleDiagnostics', () => {
	let writeSpy: MockInstance<typeof process.stderr.write>;

	beforeEach(() => {
		writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	function firstWrite(): unknown {
		return writeSpy.mock.calls[0]?.[0];
	}

	it('writes to stderr with a trailing newline', () => {
		new ConsoleDiagnostics({ color: false }).log(makeEntry());

		expect(writeSpy).toHaveBeenCalledTimes(1);
		const output = firstWrite();
		expect(typeof output).toBe('string');
		expect(String(output).endsWith('record dropped\n')).toBe(true);
	});

	it('filters by level', () => {
		const logger = new ConsoleDiagnostics({ level: 'error' });
		logger.log(makeEntry({ level: 'warn' }));
		expect(writeSpy).not.toHaveBeenCalled();

		logger.log(makeEntry({ level: 'error' }));
		expect(writeSpy).toHaveBeenCalledTimes(1);
	});

	it('hides debug entries by default', () => {
		new ConsoleDiagnostics().log(makeEntry({ level: 'debug' }));
		expect(writeSpy).not.toHaveBeenCalled();
	});

	it('uses verbose mode when compact=false', () => {
		new ConsoleDiagnostics({ compact: false, color: false }).log(makeEntry());
		expect(String(firstWrite())).toContain('\n  path: /var/log/app/shared.log\n');
	});

	it('respects color=false', () => {
		new ConsoleDiagnostics({ color: false }).log(makeEntry());
		expect(String(firstWrite())).not.toContain('\x1b[');
	});

	it('does not throw when stderr fails', () => {
		writeSpy.mockImplementation(() => {
			throw new Error('write failed');
		});
		expect(() => new ConsoleDiagnostics().log(makeEntry())).not.toThrow();
	});
});
