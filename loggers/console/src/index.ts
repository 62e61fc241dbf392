/**
 * @logsink/diagnostics-console — stderr renderer for writer diagnostics.
 */

export { ConsoleDiagnostics } from './console-logger.js';
export type { ConsoleDiagnosticsConfig } from './console-logger.js';
export { formatCompact, formatVerbose, isDiagnosticLevel, shouldLog } from './format.js';
