/**
 * Logger module
 *
 * Provides structured, trace-aware logging with:
 * - Explicit logger passing via constructor injection
 * - Pretty printing for local runs
 * - JSON output for scheduled jobs (picked up by the platform's log sink)
 * - Log level configuration
 *
 * Usage:
 *
 * ```typescript
 * const logger = createLogger({ component: 'orchestrator', runId: 'r1a2b3c4' });
 * const detector = new ScaleToZeroDetector(metrics, logger);
 *
 * const serviceLogger = logger.child({ service: 'go-gin', iteration: 3 });
 * serviceLogger.info('Probe complete');
 * ```
 */
import { BenchLogger } from './logger.js';
import { TraceContext } from './trace-context.js';
import type { LogComponent, LogContext, Logger } from './types.js';
import { LogLevel } from './types.js';

export type { LogComponent, LogContext, Logger };
export type { LogSink } from './logger.js';
export { BenchLogger } from './logger.js';
export { TraceContext } from './trace-context.js';
export { LogLevel } from './types.js';

/**
 * Create a no-op logger for testing
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => createNoOpLogger()
  };
}

export interface LoggerSettings {
  level?: string;
  format?: string;
}

/**
 * Create a new logger instance
 *
 * @param context Base context for the logger. Must include 'component'.
 *                TraceId will be auto-generated if not provided.
 * @param settings Level and format, usually read once from the environment
 *                 by the CLI entry point.
 */
export function createLogger(
  context: Partial<LogContext> & { component: LogComponent },
  settings: LoggerSettings = {}
): Logger {
  const baseContext: LogContext = {
    ...context,
    traceId: context.traceId || TraceContext.generate(),
    component: context.component
  };

  return new BenchLogger(
    baseContext,
    parseLogLevel(settings.level),
    settings.format?.toLowerCase() === 'pretty'
  );
}

/**
 * Map a level name to a LogLevel. Unknown names fall back to info.
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  switch ((level || 'info').toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}
