import { describe, expect, it } from 'vitest';
import { InvalidArgumentError, LogSinkError, PartialWriteError, WriterDisposedError } from '../errors.js';
import { jsonLinesFormatter, lineFormatter } from '../formatters.js';
import type { TextSink } from '../types.js';

class StringSink implements TextSink {
	text = '';

	write(text: string): void {
		this.text += text;
	}
}

describe('stock formatters', () => {
	it('lineFormatter writes the entry and a newline', () => {
		const sink = new StringSink();
		lineFormatter.format('hello', sink);
		lineFormatter.format('', sink);
		expect(sink.text).toBe('hello\n\n');
	});

	it('jsonLinesFormatter writes one compact document per line', () => {
		const sink = new StringSink();
		jsonLinesFormatter.format({ level: 'info', n: 1 }, sink);
		jsonLinesFormatter.format(['a'], sink);
		expect(sink.text).toBe('{"level":"info","n":1}\n["a"]\n');
	});
});

describe('errors', () => {
	it('prefix invalid arguments with the argument name', () => {
		const err = new InvalidArgumentError('path', 'a destination path is required');
		expect(err.message).toBe('Invalid path: a destination path is required');
		expect(err.argument).toBe('path');
		expect(err.name).toBe('InvalidArgumentError');
		expect(err).toBeInstanceOf(LogSinkError);
	});

	it('describe disposal and short writes', () => {
		expect(new WriterDisposedError('/tmp/a.log').message).toBe('Writer for /tmp/a.log has been disposed');
		expect(new PartialWriteError('/tmp/a.log', 10, 4).message).toBe('Short write to /tmp/a.log: 4 of 10 bytes');
	});

	it('keep the cause', () => {
		const cause = new Error('EACCES');
		expect(new LogSinkError('wrapped', { cause }).cause).toBe(cause);
	});
});
