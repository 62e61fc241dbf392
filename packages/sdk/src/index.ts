/**
 * @logsink/sdk — public API surface for writer owners, formatter authors and tests.
 */

export type { FileWriter, WriterConfig, WriterOptions, ExclusiveWriterOptions, MutexWriterOptions } from './writer.js';
export type { TextSink, TextFormatter, HeaderProvider, WriterMode } from './types.js';
export {
	DEFAULT_ENCODING,
	DEFAULT_FILE_SIZE_LIMIT_BYTES,
	DEFAULT_LOCK_TIMEOUT_MS,
	WRITER_MODES,
	isWriterMode,
	parseDuration,
	parseSize,
} from './types.js';

export type {
	DiagnosticEntry,
	DiagnosticEvent,
	DiagnosticLevel,
	DiagnosticLogger,
	DiagnosticReporter,
} from './logger.js';

export { InvalidArgumentError, LogSinkError, PartialWriteError, WriterDisposedError } from './errors.js';

export { jsonLinesFormatter, lineFormatter } from './formatters.js';

export {
	CountingHeaders,
	MemoryDiagnostics,
	MockFormatter,
	readLines,
	sizedEntry,
	testEntry,
} from './testing.js';
export type { TestEntry } from './testing.js';
