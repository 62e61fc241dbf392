import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MemoryDiagnostics } from '@logsink/sdk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { type WriteCommandOptions, runWrite, settingsFromFlags } from '../commands/write.js';

async function* linesOf(...lines: string[]): AsyncGenerator<string> {
	for (const line of lines) {
		yield line;
	}
}

function flags(overrides: Partial<WriteCommandOptions> = {}): WriteCommandOptions {
	return { header: [], ...overrides };
}

describe('settingsFromFlags', () => {
	it('parses limits, timeouts and mode', () => {
		expect(
			settingsFromFlags('app.log', flags({ mode: 'mutex', limit: '1KB', lockTimeout: '2s', encoding: 'utf16le' })),
		).toEqual({
			path: 'app.log',
			headers: [],
			mode: 'mutex',
			fileSizeLimitBytes: 1024,
			encoding: 'utf16le',
			lockTimeoutMs: 2000,
		});
	});

	it('rejects --limit together with --unlimited', () => {
		expect(() => settingsFromFlags('app.log', flags({ limit: '10', unlimited: true }))).toThrow(
			'command line: --limit and --unlimited are mutually exclusive',
		);
	});

	it('rejects an unknown mode', () => {
		expect(() => settingsFromFlags('app.log', flags({ mode: 'fast' }))).toThrow(
			'command line: --mode must be one of exclusive, atomic-append, mutex (got "fast")',
		);
	});

	it('rejects an unknown format', () => {
		expect(() => settingsFromFlags('app.log', flags({ format: 'xml' }))).toThrow(
			'command line: --format must be line or json (got "xml")',
		);
	});

	it('rejects an unknown encoding', () => {
		expect(() => settingsFromFlags('app.log', flags({ encoding: 'ebcdic' }))).toThrow(
			'command line: --encoding "ebcdic" is not a Node.js buffer encoding',
		);
	});
});

describe('runWrite', () => {
	let tempDir: string;
	let path: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'logsink-cli-'));
		path = join(tempDir, 'out.log');
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it('writes each input line with headers first', async () => {
		const summary = await runWrite(path, flags({ header: ['# started'] }), linesOf('one', 'two'));

		expect(summary).toEqual({ path, mode: 'exclusive', format: 'line', written: 2, refused: 0 });
		expect(await readFile(path, 'utf-8')).toBe('# started\none\ntwo\n');
	});

	it('counts lines refused at the size limit', async () => {
		const summary = await runWrite(
			path,
			flags({ mode: 'atomic-append', limit: '8' }),
			linesOf('1234', '5678', 'overflow'),
		);

		expect(summary).toEqual({ path, mode: 'atomic-append', format: 'line', written: 2, refused: 1 });
		expect(await readFile(path, 'utf-8')).toBe('1234\n5678\n');
	});

	it('takes settings from a config file with flags winning', async () => {
		const configPath = join(tempDir, 'logsink.yaml');
		await writeFile(
			configPath,
			`mode: mutex
lock_directory: ${join(tempDir, 'locks')}
headers:
  - "# from config"
file_size_limit: 1KB
`,
		);

		const diagnostics = new MemoryDiagnostics();
		const summary = await runWrite(
			path,
			flags({ config: configPath, unlimited: true }),
			linesOf('a', 'b'),
			diagnostics,
		);

		expect(summary).toEqual({ path, mode: 'mutex', format: 'line', written: 2, refused: 0 });
		expect(await readFile(path, 'utf-8')).toBe('# from config\na\nb\n');
		expect(diagnostics.events).toHaveLength(0);
	});

	it('does not rewrite headers into a file that already has content', async () => {
		await writeFile(path, 'existing\n');
		await runWrite(path, flags({ header: ['# started'] }), linesOf('more'));

		expect(await readFile(path, 'utf-8')).toBe('existing\nmore\n');
	});

	it('stores json input re-serialized, one document per line', async () => {
		const summary = await runWrite(
			path,
			flags({ format: 'json', header: ['{"schema": 1}'] }),
			linesOf('{ "level": "info", "n": 1 }', '', '["a", "b"]'),
		);

		expect(summary).toEqual({ path, mode: 'exclusive', format: 'json', written: 2, refused: 0 });
		expect(await readFile(path, 'utf-8')).toBe('{"schema":1}\n{"level":"info","n":1}\n["a","b"]\n');
	});

	it('stops at the first line that is not valid json', async () => {
		await expect(runWrite(path, flags({ format: 'json' }), linesOf('{"ok":true}', 'plain text'))).rejects.toThrow(
			'Input line 2 is not a valid json entry',
		);
		expect(await readFile(path, 'utf-8')).toBe('{"ok":true}\n');
	});
});
