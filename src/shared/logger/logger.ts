import type { LogContext, Logger } from './types.js';
import { LogLevel } from './types.js';

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error'
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[2m',
  [LogLevel.INFO]: '\x1b[34m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.ERROR]: '\x1b[31m'
};

const RESET = '\x1b[0m';

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const processSink: LogSink = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`)
};

/**
 * Structured logger writing either JSON lines or a compact coloured format.
 *
 * Warnings and errors go to stderr so command output on stdout stays readable.
 */
export class BenchLogger implements Logger {
  constructor(
    private readonly baseContext: LogContext,
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly pretty = false,
    private readonly sink: LogSink = processSink
  ) {}

  debug(message: string, context?: Partial<LogContext>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Partial<LogContext>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Partial<LogContext>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Partial<LogContext>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  child(context: Partial<LogContext>): Logger {
    return new BenchLogger(
      { ...this.baseContext, ...context },
      this.minLevel,
      this.pretty,
      this.sink
    );
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Partial<LogContext>,
    error?: Error
  ): void {
    if (level < this.minLevel) return;

    const merged = { ...this.baseContext, ...context };
    const line = this.pretty
      ? this.formatPretty(level, message, merged, error)
      : this.formatJson(level, message, merged, error);

    if (level >= LogLevel.WARN) {
      this.sink.err(line);
    } else {
      this.sink.out(line);
    }
  }

  private formatJson(
    level: LogLevel,
    message: string,
    context: LogContext,
    error?: Error
  ): string {
    return JSON.stringify({
      level: LEVEL_NAMES[level],
      msg: message,
      timestamp: new Date().toISOString(),
      ...context,
      ...(error && {
        error: { name: error.name, message: error.message, stack: error.stack }
      })
    });
  }

  private formatPretty(
    level: LogLevel,
    message: string,
    context: LogContext,
    error?: Error
  ): string {
    const { traceId: _traceId, component, ...rest } = context;
    const time = new Date().toISOString().slice(11, 23);
    const levelTag = `${LEVEL_COLORS[level]}${LEVEL_NAMES[level].toUpperCase().padEnd(5)}${RESET}`;
    const fields = Object.entries(rest)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${formatValue(value)}`)
      .join(' ');

    let line = `${time} ${levelTag} [${component}] ${message}`;
    if (fields) line += ` \x1b[2m${fields}${RESET}`;
    if (error) line += `\n  ${error.stack ?? error.message}`;
    return line;
  }
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}
