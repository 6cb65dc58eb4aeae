/**
 * Cross-run comparison of cold-start and warm p50 latencies
 */
import type { BenchmarkResult, ServiceResult } from '../model.js';

export interface MetricDelta {
  baselineMs: number;
  currentMs: number;
  deltaMs: number;
  /** current ÷ baseline; null when the baseline is zero */
  ratio: number | null;
}

export interface ServiceComparison {
  name: string;
  coldStartP50: MetricDelta;
  warmP50: MetricDelta;
}

export interface Comparison {
  baselineRunId: string;
  currentRunId: string;
  services: ServiceComparison[];
  onlyInBaseline: string[];
  onlyInCurrent: string[];
  findings: string[];
}

export function delta(baselineMs: number, currentMs: number): MetricDelta {
  return {
    baselineMs,
    currentMs,
    deltaMs: currentMs - baselineMs,
    ratio: baselineMs > 0 ? currentMs / baselineMs : null
  };
}

function byName(result: BenchmarkResult): Map<string, ServiceResult> {
  return new Map(result.services.map((s) => [s.name, s]));
}

export function compareResults(
  baseline: BenchmarkResult,
  current: BenchmarkResult
): Comparison {
  const before = byName(baseline);
  const after = byName(current);

  const services: ServiceComparison[] = [];
  for (const [name, now] of after) {
    const then = before.get(name);
    if (!then) continue;
    services.push({
      name,
      coldStartP50: delta(then.coldStart.p50Ms, now.coldStart.p50Ms),
      warmP50: delta(then.warm?.p50Ms ?? 0, now.warm?.p50Ms ?? 0)
    });
  }
  services.sort((a, b) => a.name.localeCompare(b.name));

  return {
    baselineRunId: baseline.runId,
    currentRunId: current.runId,
    services,
    onlyInBaseline: [...before.keys()].filter((n) => !after.has(n)).sort(),
    onlyInCurrent: [...after.keys()].filter((n) => !before.has(n)).sort(),
    findings: findings(services, current)
  };
}

function findings(
  services: ServiceComparison[],
  current: BenchmarkResult
): string[] {
  if (services.length === 0) {
    return ['No services in common between the two runs'];
  }

  const notes: string[] = [];
  const measured = current.services
    .filter((s) => s.coldStart.successCount > 0)
    .sort((a, b) => a.coldStart.p50Ms - b.coldStart.p50Ms);

  if (measured.length > 0) {
    const fastest = measured[0];
    const slowest = measured[measured.length - 1];
    notes.push(
      `Fastest cold start: ${fastest.name} (p50 ${fastest.coldStart.p50Ms.toFixed(1)}ms)`
    );
    notes.push(
      `Slowest cold start: ${slowest.name} (p50 ${slowest.coldStart.p50Ms.toFixed(1)}ms)`
    );
  }

  const ratios = services
    .map((s) => s.coldStartP50.ratio)
    .filter((r): r is number => r !== null);
  if (ratios.length > 0) {
    const average = ratios.reduce((acc, r) => acc + r, 0) / ratios.length;
    notes.push(`Average cold-start ratio (current/baseline): ${average.toFixed(2)}x`);
  }

  let worst: ServiceComparison | undefined;
  for (const service of services) {
    const ratio = service.coldStartP50.ratio;
    if (ratio !== null && ratio > 1 && ratio > (worst?.coldStartP50.ratio ?? 1)) {
      worst = service;
    }
  }
  if (worst?.coldStartP50.ratio) {
    notes.push(
      `Largest cold-start regression: ${worst.name} (${worst.coldStartP50.ratio.toFixed(2)}x)`
    );
  }

  return notes;
}
