/**
 * Error taxonomy shared by every writer.
 *
 * Filesystem failures are not wrapped: they reach the caller as the
 * NodeJS.ErrnoException the runtime raised.
 */

export class LogSinkError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'LogSinkError';
	}
}

/**
 * A precondition on a constructor or operation argument was violated:
 * absent path, formatter or entry, a negative size limit, and so on.
 */
export class InvalidArgumentError extends LogSinkError {
	readonly argument: string;

	constructor(argument: string, message: string, options?: ErrorOptions) {
		super(`Invalid ${argument}: ${message}`, options);
		this.name = 'InvalidArgumentError';
		this.argument = argument;
	}
}

/** An operation was attempted on a writer after dispose(). */
export class WriterDisposedError extends LogSinkError {
	readonly path: string;

	constructor(path: string) {
		super(`Writer for ${path} has been disposed`);
		this.name = 'WriterDisposedError';
		this.path = path;
	}
}

/**
 * A single write call stored fewer bytes than the record it was given.
 * The record on disk may be torn.
 */
export class PartialWriteError extends LogSinkError {
	readonly path: string;
	readonly expected: number;
	readonly written: number;

	constructor(path: string, expected: number, written: number) {
		super(`Short write to ${path}: ${written} of ${expected} bytes`);
		this.name = 'PartialWriteError';
		this.path = path;
		this.expected = expected;
		this.written = written;
	}
}
