/**
 * Test harness for writer and formatter authors.
 *
 * Provides a recording formatter, a counting header provider and an
 * in-memory diagnostics reporter for assertions.
 */

import { readFile } from 'node:fs/promises';
import type { DiagnosticEvent, DiagnosticReporter } from './logger.js';
import type { HeaderProvider, TextFormatter, TextSink } from './types.js';

// ─── Test entries ─────────────────────────────────────────────────────────────

export interface TestEntry {
	text: string;
}

export function testEntry(text: string): TestEntry {
	return { text };
}

/**
 * Build an entry whose rendered form (text plus newline) is exactly `bytes`
 * long in utf8. `label` is padded with dots or cut to fit.
 */
export function sizedEntry(label: string, bytes: number): TestEntry {
	const width = bytes - 1;
	const text = label.length >= width ? label.slice(0, width) : label.padEnd(width, '.');
	return { text };
}

// ─── Mock Formatter ───────────────────────────────────────────────────────────

/**
 * Formatter for tests.
 * Writes `text` plus a newline, counts calls, and can be told to fail
 * part-way through a record.
 */
export class MockFormatter implements TextFormatter<TestEntry> {
	private failure: ((entry: TestEntry) => boolean) | null = null;
	private writesPerEntry = 1;
	calls = 0;

	/** Throw instead of rendering entries matching the predicate (null to stop) */
	failWhen(predicate: ((entry: TestEntry) => boolean) | null): void {
		this.failure = predicate;
	}

	/** Split each rendering into several sink writes */
	splitInto(pieces: number): void {
		this.writesPerEntry = Math.max(1, pieces);
	}

	format(entry: TestEntry, output: TextSink): void {
		this.calls++;
		const rendered = `${entry.text}\n`;
		if (this.failure?.(entry)) {
			// Leave half a record behind in the sink before failing
			output.write(rendered.slice(0, Math.floor(rendered.length / 2)));
			throw new Error(`Mock formatter failure on "${entry.text}"`);
		}
		const size = Math.ceil(rendered.length / this.writesPerEntry);
		for (let i = 0; i < rendered.length; i += size) {
			output.write(rendered.slice(i, i + size));
		}
	}
}

// ─── Counting Headers ─────────────────────────────────────────────────────────

/**
 * Header provider that records how often it was invoked.
 */
export class CountingHeaders {
	private readonly entries: TestEntry[];
	invocations = 0;

	constructor(...lines: string[]) {
		this.entries = lines.map(testEntry);
	}

	readonly provider: HeaderProvider<TestEntry> = () => {
		this.invocations++;
		return [...this.entries];
	};
}

// ─── Memory Diagnostics ───────────────────────────────────────────────────────

/**
 * Diagnostics reporter that keeps every event for assertion.
 */
export class MemoryDiagnostics implements DiagnosticReporter {
	readonly events: DiagnosticEvent[] = [];

	report(event: DiagnosticEvent): void {
		this.events.push(event);
	}

	messages(): string[] {
		return this.events.map((e) => e.message);
	}

	clear(): void {
		this.events.length = 0;
	}
}

// ─── File helpers ─────────────────────────────────────────────────────────────

/** Lines of a text file, without the trailing empty element. */
export async function readLines(path: string): Promise<string[]> {
	const content = await readFile(path, 'utf-8');
	const lines = content.split('\n');
	if (lines[lines.length - 1] === '') lines.pop();
	return lines;
}
