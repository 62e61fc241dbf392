/**
 * Self-log — fans writer diagnostics out to registered loggers.
 *
 * Writers never raise for the conditions they absorb; they report them here.
 * With no logger registered, reports are discarded.
 */

import type {
	DiagnosticEntry,
	DiagnosticEvent,
	DiagnosticLogger,
	DiagnosticReporter,
} from '@logsink/sdk';

export class SelfLog implements DiagnosticReporter {
	private readonly loggers = new Map<string, DiagnosticLogger>();

	addLogger(logger: DiagnosticLogger): void {
		this.loggers.set(logger.id, logger);
	}

	removeLogger(id: string): boolean {
		return this.loggers.delete(id);
	}

	get size(): number {
		return this.loggers.size;
	}

	report(event: DiagnosticEvent): void {
		if (this.loggers.size === 0) return;

		const entry: DiagnosticEntry = {
			timestamp: new Date().toISOString(),
			level: event.level,
			source: event.source,
			message: event.message,
			...(event.path !== undefined ? { path: event.path } : {}),
			...(event.error !== undefined ? { error: describeError(event.error) } : {}),
		};

		for (const logger of this.loggers.values()) {
			try {
				logger.log(entry);
			} catch {
				// Loggers must not throw
			}
		}
	}
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** Process-wide default used by writers constructed without `diagnostics`. */
export const selfLog = new SelfLog();
