/**
 * Byte sinks and the counting wrapper the exclusive writer checks its limit against.
 */

import type { FileHandle } from 'node:fs/promises';
import { PartialWriteError } from '@logsink/sdk';

export interface ByteSink {
	write(bytes: Uint8Array): Promise<void>;
}

// ─── File handle sink ─────────────────────────────────────────────────────────

/**
 * Writes to an open file handle at its current position, looping until
 * every byte is stored.
 */
export class FileHandleSink implements ByteSink {
	private readonly handle: FileHandle;
	private readonly path: string;

	constructor(handle: FileHandle, path: string) {
		this.handle = handle;
		this.path = path;
	}

	async write(bytes: Uint8Array): Promise<void> {
		let offset = 0;
		while (offset < bytes.length) {
			const { bytesWritten } = await this.handle.write(bytes, offset, bytes.length - offset);
			if (bytesWritten === 0) {
				throw new PartialWriteError(this.path, bytes.length, offset);
			}
			offset += bytesWritten;
		}
	}
}

// ─── Byte counter ─────────────────────────────────────────────────────────────

/**
 * Forwards writes and keeps a running total, so the current size is known
 * without a stat call. Failures propagate and leave the total untouched.
 */
export class ByteCounter implements ByteSink {
	private readonly inner: ByteSink;
	private counted: number;

	constructor(inner: ByteSink, initialLength = 0) {
		this.inner = inner;
		this.counted = initialLength;
	}

	async write(bytes: Uint8Array): Promise<void> {
		await this.inner.write(bytes);
		this.counted += bytes.length;
	}

	get countedLength(): number {
		return this.counted;
	}
}
