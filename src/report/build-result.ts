import type { BenchConfig } from '../config/schema.js';
import type {
  BenchmarkMode,
  BenchmarkResult,
  ColdStartMeasurement,
  DeploymentInfo,
  ServiceResult,
  WarmRequestStats
} from '../model.js';
import { calculateColdStartStats } from '../stats/calculate.js';

/**
 * Everything the orchestrator gathered about one service during a run
 */
export interface ServiceRun {
  name: string;
  deployment: DeploymentInfo;
  coldStartSamples: ColdStartMeasurement[];
  warm?: WarmRequestStats;
  errors: string[];
}

export interface BuildResultInput {
  runId: string;
  mode: BenchmarkMode;
  startedAt: Date;
  finishedAt: Date;
  config: BenchConfig;
  services: ServiceRun[];
}

/**
 * Assemble the single BenchmarkResult both report formats are rendered from.
 */
export function buildBenchmarkResult(input: BuildResultInput): BenchmarkResult {
  const services: ServiceResult[] = input.services.map((run) => {
    const samples = [...run.coldStartSamples].sort(
      (a, b) => a.iteration - b.iteration
    );
    return {
      name: run.name,
      deployment: run.deployment,
      coldStart: calculateColdStartStats(samples),
      coldStartSamples: samples,
      warm: run.warm,
      errors: [...run.errors]
    };
  });

  return {
    version: 1,
    runId: input.runId,
    mode: input.mode,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    config: {
      project: input.config.project,
      region: input.config.region,
      benchmark: input.config.benchmark,
      profiles: input.config.profiles
    },
    services
  };
}
