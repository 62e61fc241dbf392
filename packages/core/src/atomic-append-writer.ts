/**
 * Atomic-append writer — several processes may append to one path.
 *
 * Relies on the platform guarantee that one write call on an O_APPEND
 * handle lands as a unit relative to other appenders. Every call therefore
 * renders its whole record, pending headers included, into a reusable
 * arena and stores it with exactly one write of exactly that length.
 *
 * The handle carries a record capacity. A record longer than the current
 * capacity makes the writer reopen the file with a capacity that fits;
 * capacity only ever grows.
 *
 * The size check stats the path rather than counting bytes, since other
 * processes grow the file too. A missing file during that check is taken
 * to mean an external rotation is in progress and counts as under the
 * limit. If the file was instead deleted out from under the writer, the
 * handle keeps appending to the unlinked inode.
 */

import { type FileHandle, open, stat } from 'node:fs/promises';
import type { FileWriter, WriterOptions } from '@logsink/sdk';
import { PartialWriteError, WriterDisposedError } from '@logsink/sdk';
import { Mutex } from 'async-mutex';
import { isMissingOrEmpty, isNotFound, prepareDestination } from './files.js';
import { DEFAULT_RENDER_CAPACITY, RenderBuffer } from './render-buffer.js';
import { type WriterSettings, assertEntry, resolveSettings } from './settings.js';

export const DEFAULT_HANDLE_CAPACITY = 4096;

export class AtomicAppendFileWriter<TEntry> implements FileWriter<TEntry> {
	readonly mode = 'atomic-append' as const;
	readonly path: string;
	private readonly settings: WriterSettings<TEntry>;
	private readonly render: RenderBuffer;
	private readonly mutex = new Mutex();
	private handle: FileHandle;
	private capacity = DEFAULT_HANDLE_CAPACITY;
	private pendingHeaders: boolean;
	/** Header entries produced but not yet stored; the provider is never asked twice */
	private headerEntries: TEntry[] | null = null;
	private disposed = false;

	private constructor(settings: WriterSettings<TEntry>, handle: FileHandle, pendingHeaders: boolean) {
		this.settings = settings;
		this.path = settings.path;
		this.handle = handle;
		this.pendingHeaders = pendingHeaders;
		this.render = new RenderBuffer(settings.encoding, DEFAULT_RENDER_CAPACITY);
	}

	/**
	 * Open (creating if needed) the destination in append mode.
	 * Throws InvalidArgumentError synchronously for bad options.
	 */
	static open<TEntry>(options: WriterOptions<TEntry>): Promise<AtomicAppendFileWriter<TEntry>> {
		const settings = resolveSettings(options);
		return AtomicAppendFileWriter.create(settings);
	}

	private static async create<TEntry>(settings: WriterSettings<TEntry>): Promise<AtomicAppendFileWriter<TEntry>> {
		await prepareDestination(settings.path);
		const pendingHeaders = settings.headers !== undefined && (await isMissingOrEmpty(settings.path));
		const handle = await open(settings.path, 'a');
		return new AtomicAppendFileWriter(settings, handle, pendingHeaders);
	}

	/** Largest record the current handle is sized for */
	get handleCapacity(): number {
		return this.capacity;
	}

	emitOrOverflow(entry: TEntry): Promise<boolean> {
		assertEntry(entry);
		return this.mutex.runExclusive(async () => {
			this.assertOpen();
			try {
				const headers = this.takeHeaders();
				for (const header of headers) {
					this.settings.formatter.format(header, this.render);
				}

				const overflowed = await this.isAtLimit(this.render.length);
				if (!overflowed) {
					this.settings.formatter.format(entry, this.render);
				}

				if (this.render.length > 0) {
					await this.writeRecord(this.render.contents());
				}
				if (this.pendingHeaders) {
					this.pendingHeaders = false;
					this.headerEntries = null;
				}
				return !overflowed;
			} finally {
				this.render.reset();
			}
		});
	}

	emit(entry: TEntry): Promise<void> {
		return this.emitOrOverflow(entry).then(() => undefined);
	}

	flushToDisk(): Promise<void> {
		return this.mutex.runExclusive(async () => {
			this.assertOpen();
			await this.handle.sync();
		});
	}

	dispose(): Promise<void> {
		return this.mutex.runExclusive(async () => {
			if (this.disposed) return;
			this.disposed = true;
			this.render.reset();
			await this.handle.close();
		});
	}

	// ─── Internal ─────────────────────────────────────────────────────────────

	private takeHeaders(): readonly TEntry[] {
		const provider = this.settings.headers;
		if (!this.pendingHeaders || !provider) return [];
		this.headerEntries ??= [...provider()];
		return this.headerEntries;
	}

	/** `pendingBytes` are already rendered for this call and count toward the observed size. */
	private async isAtLimit(pendingBytes: number): Promise<boolean> {
		const limit = this.settings.fileSizeLimitBytes;
		if (limit === null) return false;
		try {
			const { size } = await stat(this.path);
			return size + pendingBytes >= limit;
		} catch (err) {
			if (!isNotFound(err)) throw err;
			this.settings.diagnostics.report({
				level: 'debug',
				source: this.mode,
				path: this.path,
				message: 'Destination missing during size check; assuming under limit',
			});
			return false;
		}
	}

	private async writeRecord(bytes: Buffer): Promise<void> {
		if (bytes.length > this.capacity) {
			await this.reopen(bytes.length);
		}
		const { bytesWritten } = await this.handle.write(bytes, 0, bytes.length);
		if (bytesWritten !== bytes.length) {
			throw new PartialWriteError(this.path, bytes.length, bytesWritten);
		}
	}

	private async reopen(capacity: number): Promise<void> {
		const previous = this.handle;
		this.handle = await open(this.path, 'a');
		this.capacity = capacity;
		await previous.close();
		this.settings.diagnostics.report({
			level: 'debug',
			source: this.mode,
			path: this.path,
			message: `Reopened append handle with record capacity ${capacity} bytes`,
		});
	}

	private assertOpen(): void {
		if (this.disposed) throw new WriterDisposedError(this.path);
	}
}
