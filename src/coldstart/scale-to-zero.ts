import { CancelledError, ScaleToZeroTimeoutError, errorMessage } from '../errors.js';
import type { MetricsSource } from '../platform/types.js';
import type { Logger } from '../shared/logger/index.js';
import { sleep, throwIfAborted } from '../utils/timing.js';

// Instance-count points are aligned to 60s, so look back a few alignment periods
const METRIC_LOOKBACK_MS = 3 * 60 * 1000;

export interface ScaleToZeroWaitOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  signal?: AbortSignal;
}

export interface ScaleToZeroWaitResult {
  waitedMs: number;
  polls: number;
}

/**
 * Detects when a workload has no running instances left.
 */
export class ScaleToZeroDetector {
  private readonly logger: Logger;

  constructor(
    private readonly metrics: MetricsSource,
    logger: Logger,
    private readonly now: () => number = Date.now
  ) {
    this.logger = logger.child({ component: 'scale-to-zero' });
  }

  async instanceCount(workloadName: string, signal?: AbortSignal): Promise<number> {
    const end = new Date(this.now());
    const start = new Date(end.getTime() - METRIC_LOOKBACK_MS);
    return this.metrics.instanceCount(workloadName, { start, end }, signal);
  }

  async isScaledToZero(workloadName: string, signal?: AbortSignal): Promise<boolean> {
    return (await this.instanceCount(workloadName, signal)) === 0;
  }

  /**
   * Poll until a zero reading is observed. Metric query failures are retried
   * until the overall timeout.
   */
  async waitForScaleToZero(
    workloadName: string,
    options: ScaleToZeroWaitOptions
  ): Promise<ScaleToZeroWaitResult> {
    const { timeoutMs, pollIntervalMs, signal } = options;
    const started = this.now();
    const deadline = started + timeoutMs;
    let polls = 0;
    let lastCount: number | null = null;

    for (;;) {
      throwIfAborted(signal);
      polls++;
      try {
        lastCount = await this.instanceCount(workloadName, signal);
        if (lastCount === 0) {
          const waitedMs = this.now() - started;
          this.logger.info('Scaled to zero', { workload: workloadName, waitedMs, polls });
          return { waitedMs, polls };
        }
        this.logger.debug('Instances still running', {
          workload: workloadName,
          instances: lastCount
        });
      } catch (error) {
        if (error instanceof CancelledError || signal?.aborted) {
          throw new CancelledError();
        }
        this.logger.warn('Instance count query failed, retrying', {
          workload: workloadName,
          reason: errorMessage(error)
        });
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        throw new ScaleToZeroTimeoutError(workloadName, timeoutMs, lastCount);
      }
      await sleep(Math.min(pollIntervalMs, remaining), signal);
    }
  }
}
