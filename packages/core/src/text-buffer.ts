/**
 * Text layer between a formatter and a byte sink.
 *
 * Collects rendered text until drained, then encodes it in one piece so a
 * multi-byte character split across formatter writes is encoded whole.
 */

import type { TextSink } from '@logsink/sdk';

export class TextBuffer implements TextSink {
	private readonly encoding: BufferEncoding;
	private chunks: string[] = [];
	private pendingBytes = 0;

	constructor(encoding: BufferEncoding) {
		this.encoding = encoding;
	}

	write(text: string): void {
		if (text.length === 0) return;
		this.chunks.push(text);
		this.pendingBytes += Buffer.byteLength(text, this.encoding);
	}

	/** Approximate encoded size of the pending text */
	get byteLength(): number {
		return this.pendingBytes;
	}

	get isEmpty(): boolean {
		return this.chunks.length === 0;
	}

	/** Position to roll back to if a formatter fails part-way through a record. */
	mark(): number {
		return this.chunks.length;
	}

	rollback(mark: number): void {
		const discarded = this.chunks.splice(mark);
		for (const chunk of discarded) {
			this.pendingBytes -= Buffer.byteLength(chunk, this.encoding);
		}
	}

	/** Encode and hand over everything pending, leaving the buffer empty. */
	drain(): Buffer {
		const bytes = Buffer.from(this.chunks.join(''), this.encoding);
		this.clear();
		return bytes;
	}

	clear(): void {
		this.chunks = [];
		this.pendingBytes = 0;
	}
}
