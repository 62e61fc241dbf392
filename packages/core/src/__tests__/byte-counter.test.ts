import { mkdtemp, open, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ByteCounter, type ByteSink, FileHandleSink } from '../byte-counter.js';

class CollectingSink implements ByteSink {
	readonly chunks: Uint8Array[] = [];
	fail = false;

	async write(bytes: Uint8Array): Promise<void> {
		if (this.fail) throw new Error('disk full');
		this.chunks.push(bytes);
	}
}

describe('ByteCounter', () => {
	it('starts from the initial length', () => {
		const counter = new ByteCounter(new CollectingSink(), 42);
		expect(counter.countedLength).toBe(42);
	});

	it('forwards writes and adds their length', async () => {
		const inner = new CollectingSink();
		const counter = new ByteCounter(inner);

		await counter.write(Buffer.from('hello'));
		await counter.write(Buffer.from('!'));

		expect(counter.countedLength).toBe(6);
		expect(inner.chunks.map((c) => Buffer.from(c).toString())).toEqual(['hello', '!']);
	});

	it('propagates failures and leaves the count unchanged', async () => {
		const inner = new CollectingSink();
		const counter = new ByteCounter(inner, 10);
		inner.fail = true;

		await expect(counter.write(Buffer.from('lost'))).rejects.toThrow('disk full');
		expect(counter.countedLength).toBe(10);
	});
});

describe('FileHandleSink', () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'logsink-sink-'));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it('appends every byte to the file', async () => {
		const path = join(tempDir, 'out.bin');
		const handle = await open(path, 'a');
		try {
			const sink = new FileHandleSink(handle, path);
			await sink.write(Buffer.from('abc'));
			await sink.write(Buffer.from('def'));
		} finally {
			await handle.close();
		}
		expect(await readFile(path, 'utf-8')).toBe('abcdef');
	});
});
