import { describe, expect, it } from 'vitest';
import type { ColdStartMeasurement, WarmRequestResult } from '../src/model.js';
import {
  calculateColdStartStats,
  calculateWarmStats,
  percentile,
  summarize
} from '../src/stats/calculate.js';

function sample(
  iteration: number,
  ttfbMs: number,
  extra: Partial<ColdStartMeasurement> = {}
): ColdStartMeasurement {
  return {
    timestamp: '2026-10-19T00:00:00.000Z',
    iteration,
    ttfbMs,
    totalMs: ttfbMs,
    statusCode: 200,
    ...extra
  };
}

describe('percentile', () => {
  const values = [10, 20, 30, 40, 50];

  it('uses nearest rank without interpolation', () => {
    expect(percentile(values, 50)).toBe(30);
    expect(percentile(values, 95)).toBe(50);
    expect(percentile(values, 99)).toBe(50);
  });

  it('clamps the extremes', () => {
    expect(percentile(values, 0)).toBe(10);
    expect(percentile(values, -5)).toBe(10);
    expect(percentile(values, 100)).toBe(50);
    expect(percentile(values, 150)).toBe(50);
  });

  it('returns 0 for an empty list', () => {
    expect(percentile([], 50)).toBe(0);
  });

  it('indexes by floor(p * n / 100)', () => {
    const hundred = Array.from({ length: 100 }, (_, i) => i + 1);
    expect(percentile(hundred, 50)).toBe(51);
    expect(percentile(hundred, 95)).toBe(96);
    expect(percentile(hundred, 99)).toBe(100);
  });
});

describe('summarize', () => {
  it('sorts before computing', () => {
    expect(summarize([50, 10, 40, 20, 30])).toEqual({
      minMs: 10,
      maxMs: 50,
      avgMs: 30,
      p50Ms: 30,
      p95Ms: 50,
      p99Ms: 50
    });
  });
});

describe('calculateColdStartStats', () => {
  it('excludes failed samples from the percentiles', () => {
    const stats = calculateColdStartStats([
      sample(0, 100),
      sample(1, 5000, { statusCode: 503, error: 'HTTP 503' }),
      sample(2, 300),
      sample(3, 0, { statusCode: 0, error: 'scale-to-zero timeout' }),
      sample(4, 200)
    ]);

    expect(stats.samples).toBe(5);
    expect(stats.successCount).toBe(3);
    expect(stats.failureCount).toBe(2);
    expect(stats.maxMs).toBe(300);
    expect(stats.p50Ms).toBe(200);
    expect(stats.avgMs).toBe(200);
  });

  it('keeps every aggregate at zero when nothing succeeded', () => {
    const stats = calculateColdStartStats([
      sample(0, 0, { statusCode: 0, error: 'fetch failed' }),
      sample(1, 0, { statusCode: 500, error: 'HTTP 500' })
    ]);

    expect(stats).toEqual({
      minMs: 0,
      maxMs: 0,
      avgMs: 0,
      p50Ms: 0,
      p95Ms: 0,
      p99Ms: 0,
      samples: 2,
      successCount: 0,
      failureCount: 2,
      avgContainerStartupMs: undefined
    });
  });

  it('averages container startup over successful samples that have it', () => {
    const stats = calculateColdStartStats([
      sample(0, 900, { containerStartupMs: 400 }),
      sample(1, 800),
      sample(2, 700, { containerStartupMs: 600 }),
      sample(3, 0, { statusCode: 0, error: 'timeout', containerStartupMs: 10_000 })
    ]);
    expect(stats.avgContainerStartupMs).toBe(500);
  });
});

describe('calculateWarmStats', () => {
  it('counts failures in totals and throughput only', () => {
    const results: WarmRequestResult[] = [
      { latencyMs: 10, statusCode: 200 },
      { latencyMs: 30, statusCode: 200 },
      { latencyMs: 900, statusCode: 500, error: 'HTTP 500' },
      { latencyMs: 20, statusCode: 200 }
    ];
    const stats = calculateWarmStats(results, 2000);

    expect(stats.totalRequests).toBe(4);
    expect(stats.successCount).toBe(3);
    expect(stats.failureCount).toBe(1);
    expect(stats.successCount + stats.failureCount).toBe(stats.totalRequests);
    expect(stats.requestsPerSecond).toBe(2);
    expect(stats.maxMs).toBe(30);
    expect(stats.p50Ms).toBe(20);
    expect(stats.sampleErrors).toEqual(['HTTP 500']);
  });

  it('keeps at most five distinct error messages', () => {
    const results: WarmRequestResult[] = Array.from({ length: 8 }, (_, i) => ({
      latencyMs: 1,
      statusCode: 0,
      error: `error ${i % 7}`
    }));
    const stats = calculateWarmStats(results, 1000);
    expect(stats.sampleErrors).toEqual(['error 0', 'error 1', 'error 2', 'error 3', 'error 4']);
    expect(stats.p99Ms).toBe(0);
  });

  it('reports zero throughput for an empty batch', () => {
    expect(calculateWarmStats([], 0).requestsPerSecond).toBe(0);
  });
});
