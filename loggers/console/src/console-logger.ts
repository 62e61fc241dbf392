/**
 * Console diagnostics — human-readable colored output for development.
 *
 * Writes to process.stderr so stdout stays clean for JSON output.
 */

import type { DiagnosticEntry, DiagnosticLevel, DiagnosticLogger } from '@logsink/sdk';
import { formatCompact, formatVerbose, shouldLog } from './format.js';

export interface ConsoleDiagnosticsConfig {
	level?: DiagnosticLevel;
	color?: boolean;
	compact?: boolean;
}

export class ConsoleDiagnostics implements DiagnosticLogger {
	readonly id = 'console';
	private readonly level: DiagnosticLevel;
	private readonly useColor: boolean;
	private readonly compact: boolean;

	constructor(config: ConsoleDiagnosticsConfig = {}) {
		this.level = config.level ?? 'info';
		this.useColor = config.color ?? true;
		this.compact = config.compact ?? true;
	}

	log(entry: DiagnosticEntry): void {
		try {
			if (!shouldLog(entry.level, this.level)) return;

			const formatted = this.compact
				? formatCompact(entry, this.useColor)
				: formatVerbose(entry, this.useColor);

			process.stderr.write(`${formatted}\n`);
		} catch {
			// Loggers must not throw
		}
	}
}
