import { isoDate, runIdForDate } from '../../deploy/naming.js';
import { ConfigError } from '../../errors.js';
import type { Logger } from '../../shared/logger/index.js';
import { applyStartupJitter } from '../../utils/timing.js';
import type { BenchContext } from './context.js';

export const distributedOptions = {
  date: { type: 'string' },
  'run-id': { type: 'string' },
  'no-jitter': { type: 'boolean' }
} as const;

export interface DistributedRun {
  date: string;
  runId: string;
}

export function resolveDistributedRun(values: {
  date?: string;
  'run-id'?: string;
}): DistributedRun {
  const date = values.date ?? isoDate(new Date());
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date) || Number.isNaN(Date.parse(date))) {
    throw new ConfigError(`--date must be YYYY-MM-DD, got "${date}"`);
  }
  return { date, runId: values['run-id'] ?? runIdForDate(date) };
}

/**
 * Scheduled invocations start at the same instant; spread their first
 * platform calls out.
 */
export async function startupJitter(
  context: BenchContext,
  skip: boolean | undefined,
  logger: Logger
): Promise<void> {
  if (skip) return;
  const delayMs = await applyStartupJitter(
    context.config.benchmark.startupJitterMs,
    context.signal
  );
  logger.debug('Startup jitter applied', { delayMs });
}
