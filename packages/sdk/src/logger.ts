/**
 * Diagnostic logger interface — passive observers of writer internals.
 *
 * Writers report the events they absorb instead of raising: an inherited
 * cross-process lock, a lock wait that timed out and dropped a record,
 * a handle reopened for a larger record, a tolerated missing file.
 */

export type DiagnosticLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DiagnosticEntry {
	/** ISO 8601 */
	timestamp: string;
	level: DiagnosticLevel;
	/** Reporting component, usually the writer mode */
	source: string;
	message: string;
	/** Destination file the event concerns */
	path?: string;
	/** Message of the underlying error, when there was one */
	error?: string;
}

/** What a writer hands to its reporter. Timestamp and error text are filled in by the reporter. */
export interface DiagnosticEvent {
	level: DiagnosticLevel;
	source: string;
	message: string;
	path?: string;
	error?: unknown;
}

/**
 * Logger interface.
 *
 * Implement this to send writer diagnostics somewhere.
 * Called synchronously from inside writer operations: must be fast and must not throw.
 */
export interface DiagnosticLogger {
	/** Unique logger ID */
	readonly id: string;

	log(entry: DiagnosticEntry): void;
}

/** Accepts diagnostic events from writers. */
export interface DiagnosticReporter {
	report(event: DiagnosticEvent): void;
}
