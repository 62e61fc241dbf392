/**
 * Writer contract — the whole surface a rolling/rotation owner consumes.
 *
 * Every variant implements FileWriter. The owner picks a variant once, by
 * configuration, and retires the writer when emitOrOverflow() returns false.
 */

import type { DiagnosticReporter } from './logger.js';
import type { HeaderProvider, TextFormatter, WriterMode } from './types.js';

// ─── Contract ─────────────────────────────────────────────────────────────────

export interface FileWriter<TEntry> {
	/** Destination path as given at construction */
	readonly path: string;

	readonly mode: WriterMode;

	/**
	 * Record one entry, preceded by the header sequence if it is still pending.
	 *
	 * Resolves false when the file had already reached the size limit before
	 * this call; nothing is written in that case. Throws InvalidArgumentError
	 * synchronously when the entry is null or undefined.
	 */
	emitOrOverflow(entry: TEntry): Promise<boolean>;

	/** emitOrOverflow() without the overflow signal. */
	emit(entry: TEntry): Promise<void>;

	/** Flush everything written so far through to the storage device. */
	flushToDisk(): Promise<void>;

	/** Flush pending bytes and release file and lock handles. Idempotent. */
	dispose(): Promise<void>;
}

// ─── Options ──────────────────────────────────────────────────────────────────

export interface WriterOptions<TEntry> {
	/** Destination file; missing parent directories are created */
	path: string;
	formatter: TextFormatter<TEntry>;
	/**
	 * Approximate maximum file size. The last record under the limit is
	 * written in full even if it crosses it.
	 * undefined → 1 GiB, null → unlimited.
	 */
	fileSizeLimitBytes?: number | null;
	/** Default utf8. No byte-order mark is ever written. */
	encoding?: BufferEncoding;
	/** Only invoked when the file is absent or empty at construction */
	headers?: HeaderProvider<TEntry>;
	/** Defaults to the process-wide self-log */
	diagnostics?: DiagnosticReporter;
}

export interface ExclusiveWriterOptions<TEntry> extends WriterOptions<TEntry> {
	/**
	 * Defer flushing the text layer until flushToDisk(), dispose() or the
	 * buffer filling up. Faster, but a crash loses the unflushed tail.
	 */
	buffered?: boolean;
}

export interface MutexWriterOptions<TEntry> extends WriterOptions<TEntry> {
	/** How long to wait for the cross-process lock before dropping the record. Default 10s. */
	lockTimeoutMs?: number;
	/** Where lock files live. Default os.tmpdir(). */
	lockDirectory?: string;
}

/** Writer selection by configuration: one tagged variant per mode. */
export type WriterConfig<TEntry> =
	| ({ mode: 'exclusive' } & ExclusiveWriterOptions<TEntry>)
	| ({ mode: 'atomic-append' } & WriterOptions<TEntry>)
	| ({ mode: 'mutex' } & MutexWriterOptions<TEntry>);
