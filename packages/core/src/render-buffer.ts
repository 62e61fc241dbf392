/**
 * Reusable byte arena for the atomic-append writer.
 *
 * A whole record (headers included) is rendered here before the single
 * write call that stores it. Capacity only grows; reset() keeps the memory.
 */

import type { TextSink } from '@logsink/sdk';

export const DEFAULT_RENDER_CAPACITY = 4096;

export class RenderBuffer implements TextSink {
	private readonly encoding: BufferEncoding;
	private arena: Buffer;
	private used = 0;

	constructor(encoding: BufferEncoding, initialCapacity = DEFAULT_RENDER_CAPACITY) {
		this.encoding = encoding;
		this.arena = Buffer.alloc(Math.max(1, initialCapacity));
	}

	write(text: string): void {
		const needed = Buffer.byteLength(text, this.encoding);
		if (needed === 0) return;
		this.ensureCapacity(this.used + needed);
		this.used += this.arena.write(text, this.used, needed, this.encoding);
	}

	get length(): number {
		return this.used;
	}

	get capacity(): number {
		return this.arena.length;
	}

	/** View of the rendered bytes. Valid until the next write or reset. */
	contents(): Buffer {
		return this.arena.subarray(0, this.used);
	}

	reset(): void {
		this.used = 0;
	}

	private ensureCapacity(required: number): void {
		if (required <= this.arena.length) return;
		let next = this.arena.length * 2;
		while (next < required) next *= 2;
		const grown = Buffer.alloc(next);
		this.arena.copy(grown, 0, 0, this.used);
		this.arena = grown;
	}
}
