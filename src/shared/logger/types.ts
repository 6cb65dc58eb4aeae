/**
 * Logger types shared by every component of the benchmark
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export type LogComponent =
  | 'cli'
  | 'orchestrator'
  | 'deployer'
  | 'scale-to-zero'
  | 'prober'
  | 'warm-load'
  | 'storage'
  | 'platform';

/**
 * Context carried on every log line. Child loggers merge additional keys.
 */
export interface LogContext {
  traceId: string;
  component: LogComponent;
  runId?: string;
  service?: string;
  iteration?: number;
  phase?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: Partial<LogContext>): void;
  info(message: string, context?: Partial<LogContext>): void;
  warn(message: string, context?: Partial<LogContext>): void;
  error(message: string, error?: Error, context?: Partial<LogContext>): void;
  child(context: Partial<LogContext>): Logger;
}
