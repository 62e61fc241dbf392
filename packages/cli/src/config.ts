/**
 * Writer configuration for the CLI.
 *
 * Settings come from an optional YAML file and from command-line flags;
 * flags win. The merged result is validated into a WriterConfig.
 *
 *   # logsink.yaml
 *   mode: mutex
 *   file_size_limit: 100MB     # or a byte count, or null for unlimited
 *   encoding: utf8
 *   headers:
 *     - "# service log"
 *   lock_timeout: 5s           # or milliseconds
 *   lock_directory: /var/lock/logsink
 *   format: json               # each line is a JSON document; default line
 */

import { readFile } from 'node:fs/promises';
import type { DiagnosticReporter, TextFormatter, WriterConfig, WriterMode } from '@logsink/sdk';
import {
	LogSinkError,
	isWriterMode,
	jsonLinesFormatter,
	lineFormatter,
	parseDuration,
	parseSize,
} from '@logsink/sdk';
import yaml from 'js-yaml';

export class ConfigError extends LogSinkError {
	constructor(source: string, message: string, options?: ErrorOptions) {
		super(`${source}: ${message}`, options);
		this.name = 'ConfigError';
	}
}

/** Everything the CLI can set on a writer. Undefined means "not given here". */
export interface CliWriterSettings {
	path?: string;
	mode?: WriterMode;
	/** null → unlimited */
	fileSizeLimitBytes?: number | null;
	encoding?: BufferEncoding;
	buffered?: boolean;
	headers?: string[];
	lockTimeoutMs?: number;
	lockDirectory?: string;
	format?: EntryFormat;
}

// ─── Entry formats ────────────────────────────────────────────────────────────

export type EntryFormat = 'line' | 'json';

export function isEntryFormat(value: string): value is EntryFormat {
	return value === 'line' || value === 'json';
}

/** How an input line becomes an entry, and how that entry is rendered. */
export interface EntryCodec<TEntry> {
	readonly format: EntryFormat;
	readonly formatter: TextFormatter<TEntry>;
	/** Throws when the line is not a valid entry */
	parse(line: string): TEntry;
}

/** Lines are stored verbatim. */
export const lineCodec: EntryCodec<string> = {
	format: 'line',
	formatter: lineFormatter,
	parse: (line) => line,
};

/** Lines must be JSON documents; they are stored re-serialized, one per line. */
export const jsonCodec: EntryCodec<unknown> = {
	format: 'json',
	formatter: jsonLinesFormatter,
	parse(line) {
		const value: unknown = JSON.parse(line);
		return value;
	},
};

// ─── Value parsing ────────────────────────────────────────────────────────────

/** Plain byte count or a size string such as "64KB". */
export function parseLimit(value: string): number {
	const trimmed = value.trim();
	return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : parseSize(trimmed);
}

/** Plain milliseconds or a duration string such as "5s". */
export function parseTimeout(value: string): number {
	const trimmed = value.trim();
	return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : parseDuration(trimmed);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── YAML ─────────────────────────────────────────────────────────────────────

const KNOWN_KEYS = new Set([
	'path',
	'mode',
	'file_size_limit',
	'encoding',
	'buffered',
	'headers',
	'lock_timeout',
	'lock_directory',
	'format',
]);

/**
 * Validate a parsed YAML document. `source` names the file in error messages.
 */
export function parseConfigDocument(doc: unknown, source: string): CliWriterSettings {
	if (doc === undefined || doc === null) return {};
	if (!isRecord(doc)) {
		throw new ConfigError(source, 'expected a mapping at the top level');
	}

	for (const key of Object.keys(doc)) {
		if (!KNOWN_KEYS.has(key)) throw new ConfigError(source, `unknown key "${key}"`);
	}

	const settings: CliWriterSettings = {};

	const { path, mode, file_size_limit, encoding, buffered, headers, lock_timeout, lock_directory, format } = doc;

	if (path !== undefined) {
		if (typeof path !== 'string') throw new ConfigError(source, '"path" must be a string');
		settings.path = path;
	}

	if (mode !== undefined) {
		if (typeof mode !== 'string' || !isWriterMode(mode)) {
			throw new ConfigError(source, `"mode" must be one of exclusive, atomic-append, mutex`);
		}
		settings.mode = mode;
	}

	if (file_size_limit !== undefined) {
		if (file_size_limit === null || file_size_limit === 'unlimited') {
			settings.fileSizeLimitBytes = null;
		} else if (typeof file_size_limit === 'number') {
			settings.fileSizeLimitBytes = file_size_limit;
		} else if (typeof file_size_limit === 'string') {
			settings.fileSizeLimitBytes = wrap(source, () => parseLimit(file_size_limit));
		} else {
			throw new ConfigError(source, '"file_size_limit" must be a number, a size string or null');
		}
	}

	if (encoding !== undefined) {
		if (typeof encoding !== 'string' || !Buffer.isEncoding(encoding)) {
			throw new ConfigError(source, `"encoding" must be a Node.js buffer encoding`);
		}
		settings.encoding = encoding;
	}

	if (buffered !== undefined) {
		if (typeof buffered !== 'boolean') throw new ConfigError(source, '"buffered" must be true or false');
		settings.buffered = buffered;
	}

	if (headers !== undefined) {
		if (!Array.isArray(headers) || !headers.every((h): h is string => typeof h === 'string')) {
			throw new ConfigError(source, '"headers" must be a list of strings');
		}
		settings.headers = headers;
	}

	if (lock_timeout !== undefined) {
		if (typeof lock_timeout === 'number') {
			settings.lockTimeoutMs = lock_timeout;
		} else if (typeof lock_timeout === 'string') {
			settings.lockTimeoutMs = wrap(source, () => parseTimeout(lock_timeout));
		} else {
			throw new ConfigError(source, '"lock_timeout" must be milliseconds or a duration string');
		}
	}

	if (lock_directory !== undefined) {
		if (typeof lock_directory !== 'string') throw new ConfigError(source, '"lock_directory" must be a string');
		settings.lockDirectory = lock_directory;
	}

	if (format !== undefined) {
		if (typeof format !== 'string' || !isEntryFormat(format)) {
			throw new ConfigError(source, '"format" must be line or json');
		}
		settings.format = format;
	}

	return settings;
}

function wrap<T>(source: string, parse: () => T): T {
	try {
		return parse();
	} catch (err) {
		throw new ConfigError(source, err instanceof Error ? err.message : String(err), { cause: err });
	}
}

/** Read and validate a YAML settings file. */
export async function loadConfigFile(path: string): Promise<CliWriterSettings> {
	let content: string;
	try {
		content = await readFile(path, 'utf-8');
	} catch (err) {
		throw new ConfigError(path, 'could not read configuration file', { cause: err });
	}

	let doc: unknown;
	try {
		doc = yaml.load(content);
	} catch (err) {
		throw new ConfigError(path, 'invalid YAML', { cause: err });
	}
	return parseConfigDocument(doc, path);
}

// ─── Merge ────────────────────────────────────────────────────────────────────

/** Layer `override` on `base`, ignoring keys whose value is undefined. */
export function mergeSettings(base: CliWriterSettings, override: CliWriterSettings): CliWriterSettings {
	const merged: CliWriterSettings = { ...base };
	if (override.path !== undefined) merged.path = override.path;
	if (override.mode !== undefined) merged.mode = override.mode;
	if (override.fileSizeLimitBytes !== undefined) merged.fileSizeLimitBytes = override.fileSizeLimitBytes;
	if (override.encoding !== undefined) merged.encoding = override.encoding;
	if (override.buffered !== undefined) merged.buffered = override.buffered;
	if (override.headers !== undefined && override.headers.length > 0) merged.headers = override.headers;
	if (override.lockTimeoutMs !== undefined) merged.lockTimeoutMs = override.lockTimeoutMs;
	if (override.lockDirectory !== undefined) merged.lockDirectory = override.lockDirectory;
	if (override.format !== undefined) merged.format = override.format;
	return merged;
}

/**
 * Turn merged settings into a WriterConfig for `codec`. Mode defaults to
 * exclusive; options that belong to another mode are rejected. Header lines
 * are parsed with the codec, like input lines.
 */
export function buildWriterConfig<TEntry>(
	settings: CliWriterSettings,
	codec: EntryCodec<TEntry>,
	diagnostics?: DiagnosticReporter,
): WriterConfig<TEntry> {
	const source = 'configuration';
	if (settings.path === undefined || settings.path === '') {
		throw new ConfigError(source, 'a destination path is required');
	}

	const mode = settings.mode ?? 'exclusive';
	if (settings.buffered === true && mode !== 'exclusive') {
		throw new ConfigError(source, `"buffered" applies to exclusive mode, not ${mode}`);
	}
	if ((settings.lockTimeoutMs !== undefined || settings.lockDirectory !== undefined) && mode !== 'mutex') {
		throw new ConfigError(source, `lock settings apply to mutex mode, not ${mode}`);
	}

	const headerEntries = (settings.headers ?? []).map((line) => {
		try {
			return codec.parse(line);
		} catch (err) {
			throw new ConfigError(source, `header "${line}" is not a valid ${codec.format} entry`, { cause: err });
		}
	});
	const base = {
		path: settings.path,
		formatter: codec.formatter,
		fileSizeLimitBytes: settings.fileSizeLimitBytes,
		encoding: settings.encoding,
		headers: headerEntries.length > 0 ? () => headerEntries : undefined,
		diagnostics,
	};

	switch (mode) {
		case 'exclusive':
			return { mode, ...base, buffered: settings.buffered };
		case 'atomic-append':
			return { mode, ...base };
		case 'mutex':
			return { mode, ...base, lockTimeoutMs: settings.lockTimeoutMs, lockDirectory: settings.lockDirectory };
	}
}
