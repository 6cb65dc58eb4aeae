/**
 * Statistical aggregation of benchmark samples
 *
 * Percentiles are nearest-rank (index into the sorted list), not
 * interpolated, so expected values are exact and reproducible.
 */
import type {
  ColdStartMeasurement,
  ColdStartStats,
  LatencySummary,
  WarmRequestResult,
  WarmRequestStats
} from '../model.js';

const MAX_SAMPLE_ERRORS = 5;

/**
 * Nearest-rank percentile of an ascending list.
 *
 * p ≤ 0 returns the first element, p ≥ 100 the last, anything else the
 * element at floor(p·n/100) clamped to n−1. An empty list yields 0.
 */
export function percentile(sortedAsc: readonly number[], p: number): number {
  const n = sortedAsc.length;
  if (n === 0) return 0;
  if (p <= 0) return sortedAsc[0];
  if (p >= 100) return sortedAsc[n - 1];
  const index = Math.min(Math.floor((p * n) / 100), n - 1);
  return sortedAsc[index];
}

export function emptySummary(): LatencySummary {
  return { minMs: 0, maxMs: 0, avgMs: 0, p50Ms: 0, p95Ms: 0, p99Ms: 0 };
}

/**
 * min/max/avg/p50/p95/p99 over the given latencies; all zero when empty.
 */
export function summarize(latencies: readonly number[]): LatencySummary {
  if (latencies.length === 0) return emptySummary();

  const sorted = [...latencies].sort((a, b) => a - b);
  const sum = sorted.reduce((acc, v) => acc + v, 0);
  return {
    minMs: sorted[0],
    maxMs: sorted[sorted.length - 1],
    avgMs: sum / sorted.length,
    p50Ms: percentile(sorted, 50),
    p95Ms: percentile(sorted, 95),
    p99Ms: percentile(sorted, 99)
  };
}

export function isSuccessfulSample(sample: {
  statusCode: number;
  error?: string;
}): boolean {
  return sample.error === undefined && sample.statusCode === 200;
}

export function calculateColdStartStats(
  samples: readonly ColdStartMeasurement[]
): ColdStartStats {
  const successful = samples.filter(isSuccessfulSample);
  const startups = successful
    .map((s) => s.containerStartupMs)
    .filter((v): v is number => v !== undefined);

  return {
    ...summarize(successful.map((s) => s.ttfbMs)),
    samples: samples.length,
    successCount: successful.length,
    failureCount: samples.length - successful.length,
    avgContainerStartupMs:
      startups.length > 0
        ? startups.reduce((acc, v) => acc + v, 0) / startups.length
        : undefined
  };
}

/**
 * @param durationMs Wall-clock duration of the whole batch; throughput is
 *                   every issued request over it, failures included.
 */
export function calculateWarmStats(
  results: readonly WarmRequestResult[],
  durationMs: number
): WarmRequestStats {
  const successful = results.filter(isSuccessfulSample);
  const sampleErrors = [
    ...new Set(
      results
        .filter((r) => !isSuccessfulSample(r))
        .map((r) => r.error ?? `HTTP ${r.statusCode}`)
    )
  ].slice(0, MAX_SAMPLE_ERRORS);

  return {
    ...summarize(successful.map((r) => r.latencyMs)),
    totalRequests: results.length,
    successCount: successful.length,
    failureCount: results.length - successful.length,
    durationMs,
    requestsPerSecond: durationMs > 0 ? results.length / (durationMs / 1000) : 0,
    sampleErrors
  };
}

export function emptyWarmStats(): WarmRequestStats {
  return calculateWarmStats([], 0);
}
