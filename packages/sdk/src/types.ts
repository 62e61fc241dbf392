/**
 * Core types for logsink writers.
 *
 * A writer never interprets the entries it records. Rendering belongs to a
 * TextFormatter, the header sequence to a HeaderProvider, and the choice of
 * destination path to whoever constructs the writer.
 */

// ─── Rendering ────────────────────────────────────────────────────────────────

/** Receives rendered text. Where the characters end up is the writer's business. */
export interface TextSink {
	write(text: string): void;
}

/**
 * Renders one entry into a text sink.
 *
 * Writers add no framing of their own: a line-oriented formatter must end
 * each record with its own line terminator.
 */
export interface TextFormatter<TEntry> {
	format(entry: TEntry, output: TextSink): void;
}

/**
 * Produces the entries written at the top of a new or empty file.
 * Called lazily, at most once per writer instance.
 */
export type HeaderProvider<TEntry> = () => Iterable<TEntry>;

// ─── Writer modes ─────────────────────────────────────────────────────────────

/**
 * - `exclusive`     — one writer owns the file; fastest, single process only
 * - `atomic-append` — one write call per record; safe across processes on append-atomic platforms
 * - `mutex`         — every write serialized through a named cross-process lock
 */
export type WriterMode = 'exclusive' | 'atomic-append' | 'mutex';

export const WRITER_MODES: readonly WriterMode[] = ['exclusive', 'atomic-append', 'mutex'];

export function isWriterMode(value: string): value is WriterMode {
	return WRITER_MODES.some((mode) => mode === value);
}

/** 1 GiB */
export const DEFAULT_FILE_SIZE_LIMIT_BYTES = 1024 * 1024 * 1024;

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;

export const DEFAULT_ENCODING: BufferEncoding = 'utf8';

// ─── Size and duration strings ────────────────────────────────────────────────

const DURATION_UNITS: Record<string, number> = {
	ms: 1,
	s: 1000,
	m: 60 * 1000,
	h: 60 * 60 * 1000,
	d: 24 * 60 * 60 * 1000,
};

/**
 * Parse a duration string ("250ms", "10s", "5m") into milliseconds.
 */
export function parseDuration(value: string): number {
	const match = /^(\d+)(ms|s|m|h|d)$/.exec(value.trim());
	if (!match) {
		throw new Error(`Invalid duration format: "${value}"`);
	}
	return Number.parseInt(match[1], 10) * DURATION_UNITS[match[2]];
}

const SIZE_UNITS: Record<string, number> = {
	B: 1,
	KB: 1024,
	MB: 1024 ** 2,
	GB: 1024 ** 3,
};

/**
 * Parse a size string ("512B", "64KB", "100MB", "1GB") into bytes.
 * Units are binary multiples.
 */
export function parseSize(value: string): number {
	const match = /^(\d+)\s*(B|KB|MB|GB)$/i.exec(value.trim());
	if (!match) {
		throw new Error(`Invalid size format: "${value}"`);
	}
	return Number.parseInt(match[1], 10) * SIZE_UNITS[match[2].toUpperCase()];
}
