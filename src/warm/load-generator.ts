/**
 * Warm request load
 *
 * A fixed pool of workers drains a queue of `count` request slots. All
 * workers go through one ProbeHttpClient so connections are reused and the
 * numbers reflect steady-state latency rather than handshakes.
 */
import type { RequestType } from '../config/schema.js';
import type { ProbeHttpClient } from '../http/probe-client.js';
import type { WarmRequestStats } from '../model.js';
import type { Logger } from '../shared/logger/index.js';
import type { Signer } from '../signing/signer.js';
import { calculateWarmStats } from '../stats/calculate.js';
import { throwIfAborted } from '../utils/timing.js';
import { ResultCollector } from './result-collector.js';

export interface WarmBenchmarkOptions {
  url: string;
  count: number;
  concurrency: number;
  signer: Signer;
  requestType: RequestType;
  http: ProbeHttpClient;
  authToken?: string;
  signal?: AbortSignal;
  logger?: Logger;
  now?: () => number;
}

export type WarmRunner = (options: WarmBenchmarkOptions) => Promise<WarmRequestStats>;

export async function runWarmRequestBenchmark(
  options: WarmBenchmarkOptions
): Promise<WarmRequestStats> {
  const { url, count, signer, requestType, http, authToken, signal } = options;
  const now = options.now ?? (() => performance.now());
  const workers = Math.max(1, Math.min(options.concurrency, count));
  const collector = new ResultCollector();
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < count) {
      throwIfAborted(signal);
      next++;
      // Sign per request: the target rejects stale timestamps
      const response = await http.post(url, signer.signedRequest(requestType), {
        authToken,
        signal
      });
      collector.record({
        latencyMs: response.latencyMs,
        statusCode: response.statusCode,
        error: response.error
      });
    }
  };

  const started = now();
  await Promise.all(Array.from({ length: workers }, () => worker()));
  throwIfAborted(signal);
  const durationMs = now() - started;

  const stats = calculateWarmStats(collector.snapshot(), durationMs);
  options.logger?.child({ component: 'warm-load' }).info('Warm load complete', {
    url,
    requests: stats.totalRequests,
    failures: stats.failureCount,
    requestsPerSecond: stats.requestsPerSecond
  });
  return stats;
}
