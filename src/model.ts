// Data model of a benchmark run. Anything read back from storage is parsed
// through these schemas, so they double as the persisted format.
import { z } from 'zod';
import { BenchmarkParamsSchema } from './config/schema.js';

export const ColdStartMeasurementSchema = z.object({
  timestamp: z.string(),
  iteration: z.number().int().nonnegative(),
  /** Defined as total request latency, not true time-to-first-byte */
  ttfbMs: z.number().nonnegative(),
  totalMs: z.number().nonnegative(),
  /** Probe send time to the platform's "instance started" log entry */
  containerStartupMs: z.number().optional(),
  statusCode: z.number().int(),
  error: z.string().optional()
});

export const WarmRequestResultSchema = z.object({
  latencyMs: z.number().nonnegative(),
  statusCode: z.number().int(),
  error: z.string().optional()
});

export const LatencySummarySchema = z.object({
  minMs: z.number(),
  maxMs: z.number(),
  avgMs: z.number(),
  p50Ms: z.number(),
  p95Ms: z.number(),
  p99Ms: z.number()
});

export const ColdStartStatsSchema = LatencySummarySchema.extend({
  samples: z.number().int().nonnegative(),
  successCount: z.number().int().nonnegative(),
  failureCount: z.number().int().nonnegative(),
  /** Average container startup over successful samples that had log correlation */
  avgContainerStartupMs: z.number().optional()
});

export const WarmRequestStatsSchema = LatencySummarySchema.extend({
  totalRequests: z.number().int().nonnegative(),
  successCount: z.number().int().nonnegative(),
  failureCount: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
  requestsPerSecond: z.number().nonnegative(),
  /** First few distinct error messages, for the report */
  sampleErrors: z.array(z.string())
});

export const DeploymentInfoSchema = z.object({
  serviceName: z.string(),
  image: z.string(),
  profile: z.string(),
  url: z.string().optional(),
  deployDurationMs: z.number().nonnegative(),
  imageSizeBytes: z.number().nullable().optional(),
  error: z.string().optional()
});

export const ServiceResultSchema = z.object({
  name: z.string(),
  deployment: DeploymentInfoSchema,
  coldStart: ColdStartStatsSchema,
  coldStartSamples: z.array(ColdStartMeasurementSchema),
  warm: WarmRequestStatsSchema.optional(),
  errors: z.array(z.string())
});

export const BenchmarkResultSchema = z.object({
  version: z.literal(1),
  runId: z.string(),
  mode: z.enum(['batch', 'adhoc', 'sequential', 'distributed']),
  startedAt: z.string(),
  finishedAt: z.string(),
  config: z.object({
    project: z.string(),
    region: z.string(),
    benchmark: BenchmarkParamsSchema,
    profiles: z.record(z.unknown())
  }),
  services: z.array(ServiceResultSchema)
});

export const ReadingSchema = z.object({
  runId: z.string(),
  date: z.string(),
  iteration: z.number().int().nonnegative(),
  takenAt: z.string(),
  measurements: z.record(ColdStartMeasurementSchema),
  /** Failure message per service whose sample failed this iteration */
  errors: z.record(z.string()).default({})
});

export type ColdStartMeasurement = z.infer<typeof ColdStartMeasurementSchema>;
export type WarmRequestResult = z.infer<typeof WarmRequestResultSchema>;
export type LatencySummary = z.infer<typeof LatencySummarySchema>;
export type ColdStartStats = z.infer<typeof ColdStartStatsSchema>;
export type WarmRequestStats = z.infer<typeof WarmRequestStatsSchema>;
export type DeploymentInfo = z.infer<typeof DeploymentInfoSchema>;
export type ServiceResult = z.infer<typeof ServiceResultSchema>;
export type BenchmarkResult = z.infer<typeof BenchmarkResultSchema>;
export type BenchmarkMode = BenchmarkResult['mode'];
export type Reading = z.infer<typeof ReadingSchema>;
