/**
 * logsink write — Append stdin to a file, one entry per line.
 *
 * Exits 2 when the file reached its size limit and lines were refused,
 * so a calling script can roll the file and retry.
 */

import { createInterface } from 'node:readline';
import { createFileWriter, selfLog } from '@logsink/core';
import { ConsoleDiagnostics } from '@logsink/diagnostics-console';
import type { DiagnosticReporter, FileWriter, WriterMode } from '@logsink/sdk';
import { LogSinkError, isWriterMode } from '@logsink/sdk';
import type { Command } from 'commander';
import {
	type CliWriterSettings,
	ConfigError,
	type EntryCodec,
	type EntryFormat,
	buildWriterConfig,
	isEntryFormat,
	jsonCodec,
	lineCodec,
	loadConfigFile,
	mergeSettings,
	parseLimit,
	parseTimeout,
} from '../config.js';
import * as output from '../output.js';

export const EXIT_REFUSED = 2;

export interface WriteCommandOptions {
	mode?: string;
	limit?: string;
	unlimited?: boolean;
	buffered?: boolean;
	header: string[];
	encoding?: string;
	lockTimeout?: string;
	lockDirectory?: string;
	format?: string;
	config?: string;
}

export interface AppendResult {
	written: number;
	refused: number;
}

export interface WriteSummary extends AppendResult {
	path: string;
	mode: WriterMode;
	format: EntryFormat;
}

// ─── Flags ───────────────────────────────────────────────────────────────────

export function settingsFromFlags(file: string, opts: WriteCommandOptions): CliWriterSettings {
	const source = 'command line';
	const settings: CliWriterSettings = { path: file, headers: opts.header };

	if (opts.mode !== undefined) {
		if (!isWriterMode(opts.mode)) {
			throw new ConfigError(source, `--mode must be one of exclusive, atomic-append, mutex (got "${opts.mode}")`);
		}
		settings.mode = opts.mode;
	}

	if (opts.unlimited && opts.limit !== undefined) {
		throw new ConfigError(source, '--limit and --unlimited are mutually exclusive');
	}
	if (opts.unlimited) settings.fileSizeLimitBytes = null;
	if (opts.limit !== undefined) {
		const limit = opts.limit;
		settings.fileSizeLimitBytes = parseFlag(source, () => parseLimit(limit));
	}

	if (opts.encoding !== undefined) {
		if (!Buffer.isEncoding(opts.encoding)) {
			throw new ConfigError(source, `--encoding "${opts.encoding}" is not a Node.js buffer encoding`);
		}
		settings.encoding = opts.encoding;
	}

	if (opts.buffered) settings.buffered = true;

	if (opts.lockTimeout !== undefined) {
		const timeout = opts.lockTimeout;
		settings.lockTimeoutMs = parseFlag(source, () => parseTimeout(timeout));
	}
	if (opts.lockDirectory !== undefined) settings.lockDirectory = opts.lockDirectory;

	if (opts.format !== undefined) {
		if (!isEntryFormat(opts.format)) {
			throw new ConfigError(source, `--format must be line or json (got "${opts.format}")`);
		}
		settings.format = opts.format;
	}

	return settings;
}

function parseFlag<T>(source: string, parse: () => T): T {
	try {
		return parse();
	} catch (err) {
		throw new ConfigError(source, output.describeError(err), { cause: err });
	}
}

// ─── Append ──────────────────────────────────────────────────────────────────

/**
 * Emit every line as one entry; lines refused for overflow are counted, not
 * retried. Blank lines are skipped in json format.
 */
export async function appendLines<TEntry>(
	writer: FileWriter<TEntry>,
	lines: AsyncIterable<string>,
	codec: EntryCodec<TEntry>,
): Promise<AppendResult> {
	const result: AppendResult = { written: 0, refused: 0 };
	let lineNumber = 0;
	for await (const line of lines) {
		lineNumber++;
		if (codec.format === 'json' && line.trim() === '') continue;

		let entry: TEntry;
		try {
			entry = codec.parse(line);
		} catch (err) {
			throw new LogSinkError(`Input line ${lineNumber} is not a valid ${codec.format} entry`, { cause: err });
		}

		if (await writer.emitOrOverflow(entry)) {
			result.written++;
		} else {
			result.refused++;
		}
	}
	return result;
}

async function writeWith<TEntry>(
	settings: CliWriterSettings,
	codec: EntryCodec<TEntry>,
	input: AsyncIterable<string>,
	diagnostics: DiagnosticReporter | undefined,
): Promise<WriteSummary> {
	const writer = await createFileWriter(buildWriterConfig(settings, codec, diagnostics));
	let result: AppendResult;
	try {
		result = await appendLines(writer, input, codec);
		await writer.flushToDisk();
	} finally {
		await writer.dispose();
	}
	return { path: writer.path, mode: writer.mode, format: codec.format, ...result };
}

export async function runWrite(
	file: string,
	opts: WriteCommandOptions,
	input: AsyncIterable<string>,
	diagnostics?: DiagnosticReporter,
): Promise<WriteSummary> {
	const fromFile = opts.config !== undefined ? await loadConfigFile(opts.config) : {};
	const settings = mergeSettings(fromFile, settingsFromFlags(file, opts));

	return settings.format === 'json'
		? writeWith(settings, jsonCodec, input, diagnostics)
		: writeWith(settings, lineCodec, input, diagnostics);
}

// ─── Command ─────────────────────────────────────────────────────────────────

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

export function registerWriteCommand(program: Command): void {
	program
		.command('write')
		.description('Append lines from stdin to a file')
		.argument('<file>', 'Destination file')
		.option('--mode <mode>', 'Writer variant: exclusive, atomic-append or mutex')
		.option('--limit <size>', 'Size limit in bytes or as 64KB, 100MB, 1GB')
		.option('--unlimited', 'Disable the size limit')
		.option('--buffered', 'Defer flushing until the end of input (exclusive mode)')
		.option('--header <line>', 'Header line for a new or empty file (repeatable)', collect, [])
		.option('--encoding <encoding>', 'Text encoding of the file')
		.option('--lock-timeout <ms>', 'Lock wait in ms or as 5s (mutex mode)')
		.option('--lock-directory <dir>', 'Directory for lock files (mutex mode)')
		.option('--format <format>', 'Entry format: line (default) or json')
		.option('--config <file>', 'YAML file with writer settings; flags win')
		.action(async (file: string, opts: WriteCommandOptions) => {
			const logger = new ConsoleDiagnostics({
				level: output.isVerboseMode() ? 'debug' : 'warn',
				color: process.stderr.isTTY === true,
			});
			selfLog.addLogger(logger);

			const lines = createInterface({ input: process.stdin, crlfDelay: Number.POSITIVE_INFINITY });
			try {
				const summary = await runWrite(file, opts, lines);

				if (output.isJsonMode()) {
					output.json(summary);
				} else {
					output.success(`${summary.written} written to ${summary.path} (${summary.mode})`);
					if (summary.refused > 0) {
						output.warn(`${summary.refused} refused: size limit reached`);
					}
				}
				if (summary.refused > 0) process.exitCode = EXIT_REFUSED;
			} catch (err) {
				output.error(`Write failed: ${output.describeError(err)}`);
				process.exitCode = 1;
			} finally {
				lines.close();
				selfLog.removeLogger(logger.id);
			}
		});
}
