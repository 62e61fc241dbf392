/**
 * @logsink/core — append-only file writers and their supporting pieces.
 */

export { AtomicAppendFileWriter, DEFAULT_HANDLE_CAPACITY } from './atomic-append-writer.js';
export { ByteCounter, FileHandleSink } from './byte-counter.js';
export type { ByteSink } from './byte-counter.js';
export { BUFFERED_FLUSH_THRESHOLD_BYTES, ExclusiveFileWriter } from './exclusive-writer.js';
export { createFileWriter } from './factory.js';
export { MutexFileWriter } from './mutex-writer.js';
export {
	DEFAULT_POLL_INTERVAL_MS,
	LOCK_NAME_SUFFIX,
	NamedLock,
	isProcessAlive,
	lockNameFor,
} from './named-lock.js';
export type { LockAcquisition, LockRecord, LockState, NamedLockOptions } from './named-lock.js';
export { DEFAULT_RENDER_CAPACITY, RenderBuffer } from './render-buffer.js';
export { SelfLog, selfLog } from './self-log.js';
export { TextBuffer } from './text-buffer.js';
