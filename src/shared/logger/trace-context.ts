import { randomBytes } from 'node:crypto';

/**
 * Trace IDs correlate every log line of one benchmark invocation.
 *
 * Format: `tr_` followed by 16 lowercase hex characters.
 */
export class TraceContext {
  static readonly PREFIX = 'tr_';

  static generate(): string {
    return `${TraceContext.PREFIX}${randomBytes(8).toString('hex')}`;
  }

  static isValid(traceId: string): boolean {
    return /^tr_[0-9a-f]{16}$/.test(traceId);
  }
}
