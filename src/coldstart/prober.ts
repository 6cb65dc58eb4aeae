/**
 * Cold-start probe
 *
 * Sends exactly one signed request and times it end to end. A failed probe
 * is a failed sample, never an exception, so one bad iteration cannot abort
 * a run.
 */
import type { RequestType } from '../config/schema.js';
import { CancelledError, errorMessage } from '../errors.js';
import type { ProbeHttpClient } from '../http/probe-client.js';
import type { ColdStartMeasurement } from '../model.js';
import type { LogSearch } from '../platform/types.js';
import type { Logger } from '../shared/logger/index.js';
import type { Signer } from '../signing/signer.js';
import { pollUntil } from '../utils/timing.js';

export const INSTANCE_STARTED_TEXT = 'Starting new instance';

export interface LogCorrelation {
  workloadName: string;
  timeoutMs: number;
  pollIntervalMs?: number;
}

export interface ProbeOptions {
  iteration: number;
  requestType: RequestType;
  /** Fetched by the caller before the probe; never inside the timed window */
  authToken?: string;
  correlate?: LogCorrelation;
  signal?: AbortSignal;
}

export class ColdStartProber {
  private readonly logger: Logger;

  constructor(
    private readonly http: ProbeHttpClient,
    private readonly signer: Signer,
    private readonly logs: LogSearch | undefined,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'prober' });
  }

  async measure(url: string, options: ProbeOptions): Promise<ColdStartMeasurement> {
    const request = this.signer.signedRequest(options.requestType);
    const response = await this.http.post(url, request, {
      authToken: options.authToken,
      signal: options.signal
    });
    if (options.signal?.aborted) {
      throw new CancelledError();
    }

    const measurement: ColdStartMeasurement = {
      timestamp: response.sentAt.toISOString(),
      iteration: options.iteration,
      ttfbMs: response.latencyMs,
      totalMs: response.latencyMs,
      statusCode: response.statusCode,
      error: response.error
    };

    this.logger.info('Cold start probe complete', {
      iteration: options.iteration,
      statusCode: response.statusCode,
      latencyMs: response.latencyMs
    });

    if (options.correlate && this.logs && response.error === undefined) {
      const startupMs = await this.containerStartup(
        response.sentAt,
        options.correlate,
        options.signal
      );
      if (startupMs !== undefined) {
        measurement.containerStartupMs = startupMs;
      }
    }
    return measurement;
  }

  /**
   * Time from probe send to the platform's instance-start log entry, or
   * undefined when no entry shows up in time.
   */
  private async containerStartup(
    sentAt: Date,
    correlation: LogCorrelation,
    signal?: AbortSignal
  ): Promise<number | undefined> {
    const logs = this.logs;
    if (!logs || correlation.timeoutMs <= 0) return undefined;

    try {
      const entry = await pollUntil(
        async () => {
          const entries = await logs.search(
            {
              workloadName: correlation.workloadName,
              since: sentAt,
              until: new Date(),
              text: INSTANCE_STARTED_TEXT
            },
            signal
          );
          return entries.find((e) => e.timestamp.getTime() >= sentAt.getTime());
        },
        {
          operation: 'Instance start log search',
          timeoutMs: correlation.timeoutMs,
          intervalMs: correlation.pollIntervalMs ?? 5000,
          signal
        }
      );
      return entry.timestamp.getTime() - sentAt.getTime();
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      this.logger.debug('No instance start log entry', {
        workload: correlation.workloadName,
        reason: errorMessage(error)
      });
      return undefined;
    }
  }
}
