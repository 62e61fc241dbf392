/**
 * Construction-time validation shared by every writer variant.
 *
 * Runs synchronously: a bad argument throws from open() itself rather than
 * surfacing as a rejected promise.
 */

import {
	DEFAULT_ENCODING,
	DEFAULT_FILE_SIZE_LIMIT_BYTES,
	DEFAULT_LOCK_TIMEOUT_MS,
	type DiagnosticReporter,
	type HeaderProvider,
	InvalidArgumentError,
	type TextFormatter,
	type WriterOptions,
} from '@logsink/sdk';
import { selfLog } from './self-log.js';

export interface WriterSettings<TEntry> {
	readonly path: string;
	readonly formatter: TextFormatter<TEntry>;
	/** null when unlimited */
	readonly fileSizeLimitBytes: number | null;
	readonly encoding: BufferEncoding;
	readonly headers: HeaderProvider<TEntry> | undefined;
	readonly diagnostics: DiagnosticReporter;
}

export function resolveSettings<TEntry>(options: WriterOptions<TEntry> | undefined): WriterSettings<TEntry> {
	if (options === undefined || options === null) {
		throw new InvalidArgumentError('options', 'writer options are required');
	}

	const { path, formatter } = options;
	if (typeof path !== 'string' || path.length === 0) {
		throw new InvalidArgumentError('path', 'a destination path is required');
	}
	if (!formatter || typeof formatter.format !== 'function') {
		throw new InvalidArgumentError('formatter', 'a formatter with a format() method is required');
	}

	const limit = options.fileSizeLimitBytes === undefined ? DEFAULT_FILE_SIZE_LIMIT_BYTES : options.fileSizeLimitBytes;
	if (limit !== null && !(Number.isSafeInteger(limit) && limit >= 0)) {
		throw new InvalidArgumentError(
			'fileSizeLimitBytes',
			`${limit} provided; file size limit must be a non-negative integer or null`,
		);
	}

	const encoding = options.encoding ?? DEFAULT_ENCODING;
	if (!Buffer.isEncoding(encoding)) {
		throw new InvalidArgumentError('encoding', `unsupported encoding "${encoding}"`);
	}

	if (options.headers !== undefined && typeof options.headers !== 'function') {
		throw new InvalidArgumentError('headers', 'header provider must be a function');
	}

	return {
		path,
		formatter,
		fileSizeLimitBytes: limit,
		encoding,
		headers: options.headers,
		diagnostics: options.diagnostics ?? selfLog,
	};
}

export function resolveLockTimeout(value: number | undefined): number {
	if (value === undefined) return DEFAULT_LOCK_TIMEOUT_MS;
	if (!Number.isFinite(value) || value < 0) {
		throw new InvalidArgumentError('lockTimeoutMs', `${value} provided; lock timeout must be a non-negative number`);
	}
	return value;
}

export function assertEntry<TEntry>(entry: TEntry): void {
	if (entry === null || entry === undefined) {
		throw new InvalidArgumentError('entry', 'an entry is required');
	}
}
