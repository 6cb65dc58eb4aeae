/**
 * Library entry point
 */
export { createSigner, requestBody, SIGNATURE_HEADER, TIMESTAMP_HEADER } from './signing/signer.js';
export type { Signature, SignedRequest, Signer } from './signing/signer.js';

export { loadConfig, resolveConfig, loadStorageCredentials, DEFAULT_CONFIG_PATH } from './config/load.js';
export * from './config/schema.js';
export * from './model.js';
export * from './errors.js';

export { DeploymentController, RUN_ID_LABEL, SERVICE_LABEL, PUBLIC_KEY_ENV } from './deploy/deployment-controller.js';
export type { DeployOutcome, DeployRequest, DeleteOutcome, DeploymentControllerOptions } from './deploy/deployment-controller.js';
export { generateRunId, runIdForDate, workloadName } from './deploy/naming.js';

export { ScaleToZeroDetector } from './coldstart/scale-to-zero.js';
export type { ScaleToZeroWaitOptions, ScaleToZeroWaitResult } from './coldstart/scale-to-zero.js';
export { ColdStartProber, INSTANCE_STARTED_TEXT } from './coldstart/prober.js';
export type { ProbeOptions, LogCorrelation } from './coldstart/prober.js';
export { ProbeHttpClient, joinUrl } from './http/probe-client.js';
export type { TimedResponse } from './http/probe-client.js';
export { runWarmRequestBenchmark } from './warm/load-generator.js';
export type { WarmBenchmarkOptions, WarmRunner } from './warm/load-generator.js';

export { BatchOrchestrator } from './orchestrator/orchestrator.js';
export type { OrchestratorDeps, RunContext } from './orchestrator/orchestrator.js';
export { joinAll } from './orchestrator/task-group.js';
export { silentProgress } from './orchestrator/progress.js';
export type { ProgressReporter } from './orchestrator/progress.js';

export { percentile, summarize, calculateColdStartStats, calculateWarmStats } from './stats/calculate.js';
export { compareResults } from './stats/comparison.js';
export type { Comparison, MetricDelta, ServiceComparison } from './stats/comparison.js';
export { buildBenchmarkResult } from './report/build-result.js';
export { renderJsonReport, parseJsonReport } from './report/json-report.js';
export { renderMarkdownReport, renderComparisonMarkdown } from './report/markdown-report.js';

export type { ObjectStore } from './storage/object-store.js';
export { contentTypeFor } from './storage/object-store.js';
export { S3ObjectStore, createS3Client } from './storage/s3-object-store.js';
export { LocalObjectStore } from './storage/local-object-store.js';
export { ResultStore, resultKeys, readingKey } from './storage/result-store.js';

export type * from './platform/types.js';
export { createCloudRunPlatform } from './platform/cloud-run/index.js';

export { createLogger, createNoOpLogger } from './shared/logger/index.js';
export type { Logger, LogContext } from './shared/logger/index.js';
export { VERSION } from './version.js';
