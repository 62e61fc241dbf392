/**
 * Mutex-coordinated writer — several processes share one path through a
 * named cross-process lock, for platforms where append atomicity cannot be
 * relied upon.
 *
 * Each emit takes the lock, positions at the current end of file (another
 * process may have appended since), checks the limit, writes, and releases
 * the lock whatever happened. A lock left behind by a crashed holder is
 * inherited.
 *
 * If the lock cannot be had within the timeout the record is dropped and
 * the call reports "not overflowed".
 */

import { constants } from 'node:fs';
import { type FileHandle, open } from 'node:fs/promises';
import type { FileWriter, MutexWriterOptions } from '@logsink/sdk';
import { PartialWriteError, WriterDisposedError } from '@logsink/sdk';
import { Mutex } from 'async-mutex';
import { isMissingOrEmpty, prepareDestination } from './files.js';
import { NamedLock } from './named-lock.js';
import { type WriterSettings, assertEntry, resolveLockTimeout, resolveSettings } from './settings.js';
import { TextBuffer } from './text-buffer.js';

export class MutexFileWriter<TEntry> implements FileWriter<TEntry> {
	readonly mode = 'mutex' as const;
	readonly path: string;
	readonly lock: NamedLock;
	private readonly settings: WriterSettings<TEntry>;
	private readonly handle: FileHandle;
	private readonly output: TextBuffer;
	private readonly lockTimeoutMs: number;
	private readonly mutex = new Mutex();
	private position = 0;
	private pendingHeaders: boolean;
	/** Header entries produced but not yet stored; the provider is never asked twice */
	private headerEntries: TEntry[] | null = null;
	private disposed = false;

	private constructor(
		settings: WriterSettings<TEntry>,
		handle: FileHandle,
		lock: NamedLock,
		lockTimeoutMs: number,
		pendingHeaders: boolean,
	) {
		this.settings = settings;
		this.path = settings.path;
		this.handle = handle;
		this.lock = lock;
		this.lockTimeoutMs = lockTimeoutMs;
		this.pendingHeaders = pendingHeaders;
		this.output = new TextBuffer(settings.encoding);
	}

	/**
	 * Open (creating if needed) the destination for lock-coordinated writing.
	 * Throws InvalidArgumentError synchronously for bad options.
	 */
	static open<TEntry>(options: MutexWriterOptions<TEntry>): Promise<MutexFileWriter<TEntry>> {
		const settings = resolveSettings(options);
		const lockTimeoutMs = resolveLockTimeout(options.lockTimeoutMs);
		return MutexFileWriter.create(settings, lockTimeoutMs, options.lockDirectory);
	}

	private static async create<TEntry>(
		settings: WriterSettings<TEntry>,
		lockTimeoutMs: number,
		lockDirectory: string | undefined,
	): Promise<MutexFileWriter<TEntry>> {
		await prepareDestination(settings.path);
		const pendingHeaders = settings.headers !== undefined && (await isMissingOrEmpty(settings.path));
		const lock = NamedLock.forPath(settings.path, { directory: lockDirectory });
		// Not O_APPEND: every write goes to an explicit end-of-file offset taken under the lock
		const handle = await open(settings.path, constants.O_WRONLY | constants.O_CREAT);
		return new MutexFileWriter(settings, handle, lock, lockTimeoutMs, pendingHeaders);
	}

	emitOrOverflow(entry: TEntry): Promise<boolean> {
		assertEntry(entry);
		return this.mutex.runExclusive(async () => {
			this.assertOpen();
			if (!(await this.acquireLock())) {
				// Not overflowed; the record is dropped and rolling should not be attempted
				return true;
			}

			try {
				this.position = (await this.handle.stat()).size;
				await this.writeHeaders();

				const limit = this.settings.fileSizeLimitBytes;
				if (limit !== null && this.position >= limit) return false;

				await this.append([entry]);
				return true;
			} finally {
				await this.lock.release();
			}
		});
	}

	emit(entry: TEntry): Promise<void> {
		return this.emitOrOverflow(entry).then(() => undefined);
	}

	flushToDisk(): Promise<void> {
		return this.mutex.runExclusive(async () => {
			this.assertOpen();
			if (!(await this.acquireLock())) return;
			try {
				await this.handle.sync();
			} finally {
				await this.lock.release();
			}
		});
	}

	dispose(): Promise<void> {
		return this.mutex.runExclusive(async () => {
			if (this.disposed) return;
			this.disposed = true;
			this.output.clear();
			try {
				await this.handle.close();
			} finally {
				await this.lock.release();
			}
		});
	}

	// ─── Internal ─────────────────────────────────────────────────────────────

	private async acquireLock(): Promise<boolean> {
		const result = await this.lock.acquire(this.lockTimeoutMs);
		switch (result.status) {
			case 'acquired':
				return true;
			case 'inherited':
				this.settings.diagnostics.report({
					level: 'warn',
					source: this.mode,
					path: this.path,
					message:
						result.previous !== null
							? `Inherited shared file lock after abandonment by process ${result.previous.pid}`
							: 'Inherited shared file lock after abandonment by an unknown process',
				});
				return true;
			case 'timeout':
				this.settings.diagnostics.report({
					level: 'warn',
					source: this.mode,
					path: this.path,
					message: `Shared file lock could not be acquired within ${this.lockTimeoutMs} ms; record dropped`,
				});
				return false;
		}
	}

	/** The whole header sequence is rendered and written as one batch, or not at all. */
	private async writeHeaders(): Promise<void> {
		const provider = this.settings.headers;
		if (!this.pendingHeaders || !provider) return;

		this.headerEntries ??= [...provider()];
		await this.append(this.headerEntries);
		this.pendingHeaders = false;
		this.headerEntries = null;
	}

	/** Render entries and write them at the tracked end-of-file position. */
	private async append(entries: readonly TEntry[]): Promise<void> {
		try {
			for (const entry of entries) {
				this.settings.formatter.format(entry, this.output);
			}
		} catch (err) {
			this.output.clear();
			throw err;
		}

		const bytes = this.output.drain();
		let offset = 0;
		while (offset < bytes.length) {
			const { bytesWritten } = await this.handle.write(
				bytes,
				offset,
				bytes.length - offset,
				this.position + offset,
			);
			if (bytesWritten === 0) {
				throw new PartialWriteError(this.path, bytes.length, offset);
			}
			offset += bytesWritten;
		}
		this.position += bytes.length;
	}

	private assertOpen(): void {
		if (this.disposed) throw new WriterDisposedError(this.path);
	}
}
