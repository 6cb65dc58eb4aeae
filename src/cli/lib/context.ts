/**
 * Wiring shared by every command: config, logger, platform adapters and
 * result stores.
 */
import type { ParseArgsConfig } from 'node:util';
import { DEFAULT_CONFIG_PATH, loadConfig, loadStorageCredentials, parseServiceList } from '../../config/load.js';
import type { BenchConfig } from '../../config/schema.js';
import { ColdStartProber } from '../../coldstart/prober.js';
import { ScaleToZeroDetector } from '../../coldstart/scale-to-zero.js';
import { DeploymentController } from '../../deploy/deployment-controller.js';
import { assertDistinctWorkloadNames } from '../../deploy/naming.js';
import { ProbeHttpClient } from '../../http/probe-client.js';
import { BatchOrchestrator } from '../../orchestrator/orchestrator.js';
import { createCloudRunPlatform } from '../../platform/cloud-run/index.js';
import type { Platform } from '../../platform/types.js';
import { createLogger, type Logger } from '../../shared/logger/index.js';
import { createSigner, type Signer } from '../../signing/signer.js';
import { LocalObjectStore } from '../../storage/local-object-store.js';
import { ResultStore } from '../../storage/result-store.js';
import { createS3Client, S3ObjectStore } from '../../storage/s3-object-store.js';
import { runWarmRequestBenchmark } from '../../warm/load-generator.js';
import { consoleProgress } from './ui.js';

export const DEFAULT_OUTPUT_DIR = './results';

export const commonOptions = {
  config: { type: 'string', short: 'c' },
  output: { type: 'string', short: 'o' },
  services: { type: 'string', short: 's' },
  'gcs-bucket': { type: 'string' }
} satisfies ParseArgsConfig['options'];

export interface CommonValues {
  config: string;
  output: string;
  services?: string;
  'gcs-bucket'?: string;
}

export function toCommonValues(values: Partial<CommonValues>): CommonValues {
  return {
    config: values.config ?? DEFAULT_CONFIG_PATH,
    output: values.output ?? DEFAULT_OUTPUT_DIR,
    services: values.services,
    'gcs-bucket': values['gcs-bucket']
  };
}

export interface BenchContext {
  config: BenchConfig;
  logger: Logger;
  platform: Platform;
  signer: Signer;
  http: ProbeHttpClient;
  deployer: DeploymentController;
  /** Remote store when a bucket is configured */
  remote?: ResultStore;
  /** Reports under --output, always written */
  local: ResultStore;
  signal: AbortSignal;
}

let controller: AbortController | undefined;

/**
 * Abort signal tripped by SIGINT/SIGTERM. A second signal exits immediately.
 */
export function shutdownSignal(): AbortSignal {
  if (!controller) {
    const abort = new AbortController();
    const onSignal = (name: NodeJS.Signals) => {
      if (abort.signal.aborted) process.exit(130);
      console.error(`\nReceived ${name}, cancelling...`);
      abort.abort();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
    controller = abort;
  }
  return controller.signal;
}

export function createCliLogger(runId?: string): Logger {
  return createLogger(
    { component: 'cli', runId },
    { level: process.env.BENCH_LOG_LEVEL, format: process.env.BENCH_LOG_FORMAT }
  );
}

export async function createContext(
  values: CommonValues,
  runId?: string
): Promise<BenchContext> {
  const config = await loadConfig(values.config, process.env, {
    services: parseServiceList(values.services),
    bucket: values['gcs-bucket']
  });
  if (runId) {
    assertDistinctWorkloadNames(
      config.services.map((service) => service.name),
      runId
    );
  }
  const logger = createCliLogger(runId);
  const { benchmark } = config;

  const platform = createCloudRunPlatform({
    project: config.project,
    region: config.region,
    logger,
    requestTimeoutMs: benchmark.requestTimeoutSec * 1000
  });
  const signer = createSigner({ seed: config.signing.seed });
  const http = new ProbeHttpClient({ timeoutMs: benchmark.requestTimeoutSec * 1000 });

  const deployer = new DeploymentController({
    platform: platform.deployments,
    http,
    logger,
    publicKeyHex: signer.publicKeyHex,
    operationTimeoutMs: benchmark.deployTimeoutSec * 1000,
    readyTimeoutMs: benchmark.readyTimeoutSec * 1000,
    publicInvoke: !config.authenticatedInvoke,
    identity: platform.identity,
    images: platform.images
  });

  const { bucket, endpoint, region } = config.storage;
  const remote = bucket
    ? new ResultStore(
        new S3ObjectStore(
          createS3Client(
            endpoint,
            region,
            loadStorageCredentials(process.env),
            benchmark.requestTimeoutSec * 1000
          ),
          bucket,
          { requestTimeoutMs: benchmark.requestTimeoutSec * 1000 }
        ),
        logger
      )
    : undefined;

  return {
    config,
    logger,
    platform,
    signer,
    http,
    deployer,
    remote,
    local: new ResultStore(new LocalObjectStore(values.output), logger),
    signal: shutdownSignal()
  };
}

/**
 * @param store Where distributed readings live; defaults to the remote store
 */
export function createOrchestrator(
  context: BenchContext,
  runId: string,
  store: ResultStore | undefined = context.remote
): BatchOrchestrator {
  const { config, logger, platform, signer, http } = context;
  return new BatchOrchestrator(
    {
      deployer: context.deployer,
      detector: new ScaleToZeroDetector(platform.metrics, logger),
      prober: new ColdStartProber(http, signer, platform.logs, logger),
      warmRunner: runWarmRequestBenchmark,
      http,
      signer,
      logger,
      identity: platform.identity,
      results: store,
      progress: consoleProgress
    },
    { runId, config, signal: context.signal }
  );
}
