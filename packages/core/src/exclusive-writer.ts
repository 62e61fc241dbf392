/**
 * Exclusive writer — sole owner of its destination file.
 *
 * The file is opened once for append and never shared: two exclusive
 * writers on one path, in one process or several, interleave their output.
 * The size check reads a byte counter instead of the filesystem.
 *
 * Pending headers are written before the limit is consulted, so a new file
 * always starts with its header sequence even under a zero limit.
 */

import { type FileHandle, open } from 'node:fs/promises';
import type { ExclusiveWriterOptions, FileWriter } from '@logsink/sdk';
import { WriterDisposedError } from '@logsink/sdk';
import { Mutex } from 'async-mutex';
import { ByteCounter, type ByteSink, FileHandleSink } from './byte-counter.js';
import { isMissingOrEmpty, prepareDestination } from './files.js';
import { type WriterSettings, assertEntry, resolveSettings } from './settings.js';
import { TextBuffer } from './text-buffer.js';

/** Buffered mode still drains the text layer once this much is pending. */
export const BUFFERED_FLUSH_THRESHOLD_BYTES = 64 * 1024;

export class ExclusiveFileWriter<TEntry> implements FileWriter<TEntry> {
	readonly mode = 'exclusive' as const;
	readonly path: string;
	private readonly settings: WriterSettings<TEntry>;
	private readonly handle: FileHandle;
	private readonly output: TextBuffer;
	private readonly sink: ByteSink;
	/** Present only when a size limit is configured */
	private readonly counter: ByteCounter | null;
	private readonly buffered: boolean;
	private readonly mutex = new Mutex();
	private pendingHeaders: boolean;
	/** Header entries produced but not yet stored; the provider is never asked twice */
	private headerEntries: TEntry[] | null = null;
	private disposed = false;

	private constructor(
		settings: WriterSettings<TEntry>,
		handle: FileHandle,
		initialLength: number,
		buffered: boolean,
		pendingHeaders: boolean,
	) {
		this.settings = settings;
		this.path = settings.path;
		this.handle = handle;
		this.buffered = buffered;
		this.pendingHeaders = pendingHeaders;
		this.output = new TextBuffer(settings.encoding);

		const fileSink = new FileHandleSink(handle, settings.path);
		this.counter = settings.fileSizeLimitBytes !== null ? new ByteCounter(fileSink, initialLength) : null;
		this.sink = this.counter ?? fileSink;
	}

	/**
	 * Open (creating if needed) the destination for exclusive append.
	 * Throws InvalidArgumentError synchronously for bad options.
	 */
	static open<TEntry>(options: ExclusiveWriterOptions<TEntry>): Promise<ExclusiveFileWriter<TEntry>> {
		const settings = resolveSettings(options);
		return ExclusiveFileWriter.create(settings, options.buffered ?? false);
	}

	private static async create<TEntry>(
		settings: WriterSettings<TEntry>,
		buffered: boolean,
	): Promise<ExclusiveFileWriter<TEntry>> {
		await prepareDestination(settings.path);
		const pendingHeaders = settings.headers !== undefined && (await isMissingOrEmpty(settings.path));

		const handle = await open(settings.path, 'a');
		let initialLength: number;
		try {
			initialLength = (await handle.stat()).size;
		} catch (err) {
			await handle.close();
			throw err;
		}
		return new ExclusiveFileWriter(settings, handle, initialLength, buffered, pendingHeaders);
	}

	emitOrOverflow(entry: TEntry): Promise<boolean> {
		assertEntry(entry);
		return this.mutex.runExclusive(async () => {
			this.assertOpen();
			await this.writeHeaders();

			if (this.isAtLimit()) return false;

			await this.append([entry]);
			return true;
		});
	}

	emit(entry: TEntry): Promise<void> {
		return this.emitOrOverflow(entry).then(() => undefined);
	}

	flushToDisk(): Promise<void> {
		return this.mutex.runExclusive(async () => {
			this.assertOpen();
			await this.flushOutput();
			await this.handle.sync();
		});
	}

	dispose(): Promise<void> {
		return this.mutex.runExclusive(async () => {
			if (this.disposed) return;
			this.disposed = true;
			try {
				await this.flushOutput();
			} finally {
				await this.handle.close();
			}
		});
	}

	// ─── Internal ─────────────────────────────────────────────────────────────

	/** The whole header sequence is rendered as one batch, or not at all. */
	private async writeHeaders(): Promise<void> {
		const provider = this.settings.headers;
		if (!this.pendingHeaders || !provider) return;

		this.headerEntries ??= [...provider()];
		await this.append(this.headerEntries);
		this.pendingHeaders = false;
		this.headerEntries = null;
	}

	private async append(entries: readonly TEntry[]): Promise<void> {
		const mark = this.output.mark();
		try {
			for (const entry of entries) {
				this.settings.formatter.format(entry, this.output);
			}
		} catch (err) {
			this.output.rollback(mark);
			throw err;
		}
		if (!this.buffered || this.output.byteLength >= BUFFERED_FLUSH_THRESHOLD_BYTES) {
			await this.flushOutput();
		}
	}

	/** Size observed so far: bytes counted on disk plus text still in the buffer. */
	private isAtLimit(): boolean {
		const limit = this.settings.fileSizeLimitBytes;
		if (limit === null || this.counter === null) return false;
		return this.counter.countedLength + this.output.byteLength >= limit;
	}

	private async flushOutput(): Promise<void> {
		if (this.output.isEmpty) return;
		await this.sink.write(this.output.drain());
	}

	private assertOpen(): void {
		if (this.disposed) throw new WriterDisposedError(this.path);
	}
}
