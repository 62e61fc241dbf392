import { describe, expect, it } from 'vitest';
import { RenderBuffer } from '../render-buffer.js';
import { TextBuffer } from '../text-buffer.js';

describe('TextBuffer', () => {
	it('tracks encoded length, not character count', () => {
		const buffer = new TextBuffer('utf8');
		buffer.write('é');
		buffer.write('a');
		expect(buffer.byteLength).toBe(3);
	});

	it('encodes a character split across writes as one', () => {
		const buffer = new TextBuffer('utf8');
		const [high, low] = ['\ud83d', '\ude00'];
		buffer.write(high);
		buffer.write(low);
		expect(buffer.drain().toString('utf8')).toBe('😀');
	});

	it('never emits a byte-order mark', () => {
		const buffer = new TextBuffer('utf8');
		buffer.write('a');
		expect([...buffer.drain()]).toEqual([0x61]);
	});

	it('honors the configured encoding', () => {
		const buffer = new TextBuffer('utf16le');
		buffer.write('ab');
		expect(buffer.byteLength).toBe(4);
		expect([...buffer.drain()]).toEqual([0x61, 0x00, 0x62, 0x00]);
	});

	it('is empty after drain', () => {
		const buffer = new TextBuffer('utf8');
		buffer.write('line\n');
		buffer.drain();
		expect(buffer.isEmpty).toBe(true);
		expect(buffer.byteLength).toBe(0);
		expect(buffer.drain().length).toBe(0);
	});

	it('rolls back to a mark', () => {
		const buffer = new TextBuffer('utf8');
		buffer.write('kept\n');
		const mark = buffer.mark();
		buffer.write('par');
		buffer.write('tial');
		buffer.rollback(mark);

		expect(buffer.byteLength).toBe(5);
		expect(buffer.drain().toString()).toBe('kept\n');
	});
});

describe('RenderBuffer', () => {
	it('grows and keeps what was already rendered', () => {
		const buffer = new RenderBuffer('utf8', 4);
		buffer.write('abc');
		buffer.write('defgh');

		expect(buffer.length).toBe(8);
		expect(buffer.capacity).toBe(8);
		expect(buffer.contents().toString()).toBe('abcdefgh');
	});

	it('keeps its capacity across reset', () => {
		const buffer = new RenderBuffer('utf8', 4);
		buffer.write('x'.repeat(20));
		buffer.reset();

		expect(buffer.length).toBe(0);
		expect(buffer.capacity).toBe(32);
		buffer.write('y');
		expect(buffer.contents().toString()).toBe('y');
	});

	it('ignores empty writes', () => {
		const buffer = new RenderBuffer('utf8', 4);
		buffer.write('');
		expect(buffer.length).toBe(0);
	});
});
