/**
 * Deployment control for services under test
 *
 * deploy() never throws for a per-service failure: the outcome carries the
 * error so the batch can continue with the remaining services.
 */
import type { ResourceProfile, ServiceConfig } from '../config/schema.js';
import {
  CancelledError,
  DeployError,
  errorMessage,
  toError
} from '../errors.js';
import { joinUrl, type ProbeHttpClient } from '../http/probe-client.js';
import type {
  DeploymentPlatform,
  IdentityTokenSource,
  ImageMetadataSource,
  PlatformOperation,
  WorkloadSpec,
  WorkloadStatus
} from '../platform/types.js';
import type { Logger } from '../shared/logger/index.js';
import { pollUntil } from '../utils/timing.js';
import { runSuffix, workloadName } from './naming.js';

export const RUN_ID_LABEL = 'bench-run-id';
export const SERVICE_LABEL = 'bench-service';
export const PUBLIC_KEY_ENV = 'DISCORD_PUBLIC_KEY';

export interface DeploymentControllerOptions {
  platform: DeploymentPlatform;
  http: ProbeHttpClient;
  logger: Logger;
  /** Verification key injected into every service */
  publicKeyHex: string;
  operationTimeoutMs: number;
  readyTimeoutMs: number;
  pollIntervalMs?: number;
  /** Grant allUsers invoke; when false, health checks use an identity token */
  publicInvoke: boolean;
  identity?: IdentityTokenSource;
  images?: ImageMetadataSource;
}

export interface DeployRequest {
  service: ServiceConfig;
  profile: ResourceProfile;
  runId: string;
}

interface DeployOutcomeBase {
  serviceName: string;
  workloadName: string;
  durationMs: number;
  imageSizeBytes: number | null;
}

export type DeployOutcome =
  | (DeployOutcomeBase & { ok: true; url: string })
  | (DeployOutcomeBase & { ok: false; error: string });

export interface DeleteOutcome {
  name: string;
  error?: string;
}

export class DeploymentController {
  private readonly platform: DeploymentPlatform;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;

  constructor(private readonly options: DeploymentControllerOptions) {
    this.platform = options.platform;
    this.logger = options.logger.child({ component: 'deployer' });
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
  }

  buildSpec(request: DeployRequest): WorkloadSpec {
    const { service, profile, runId } = request;
    return {
      name: workloadName(service.name, runId),
      image: service.image,
      cpu: profile.cpu,
      memory: profile.memory,
      concurrency: profile.concurrency,
      executionEnvironment: profile.executionEnvironment,
      startupCpuBoost: profile.startupCpuBoost,
      minInstances: 0,
      maxInstances: profile.maxInstances,
      env: { ...service.env, [PUBLIC_KEY_ENV]: this.options.publicKeyHex },
      labels: { [RUN_ID_LABEL]: runId, [SERVICE_LABEL]: service.name }
    };
  }

  async deploy(request: DeployRequest, signal?: AbortSignal): Promise<DeployOutcome> {
    const spec = this.buildSpec(request);
    const logger = this.logger.child({
      service: request.service.name,
      runId: request.runId
    });
    const started = Date.now();
    const imageSize = this.resolveImageSize(spec.image, logger, signal);

    try {
      const url = await this.deployWorkload(spec, logger, signal);
      const durationMs = Date.now() - started;
      logger.info('Service deployed', { url, durationMs });
      return {
        ok: true,
        serviceName: request.service.name,
        workloadName: spec.name,
        url,
        durationMs,
        imageSizeBytes: await imageSize
      };
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      const durationMs = Date.now() - started;
      logger.error('Deploy failed', toError(error), { durationMs });
      return {
        ok: false,
        serviceName: request.service.name,
        workloadName: spec.name,
        error: errorMessage(error),
        durationMs,
        imageSizeBytes: await imageSize
      };
    }
  }

  private async deployWorkload(
    spec: WorkloadSpec,
    logger: Logger,
    signal?: AbortSignal
  ): Promise<string> {
    const existing = await this.platform.getWorkload(spec.name, signal);
    logger.debug(existing ? 'Updating workload' : 'Creating workload', {
      workload: spec.name
    });
    const operation = existing
      ? await this.platform.updateWorkload(spec, signal)
      : await this.platform.createWorkload(spec, signal);

    await this.waitForOperation(spec.name, operation, signal);
    const status = await this.waitForReady(spec.name, signal);
    if (!status.url) {
      throw new DeployError(spec.name, 'workload is ready but has no URL');
    }

    if (this.options.publicInvoke) {
      await this.platform.setPublicInvoker(spec.name, signal);
    }
    await this.waitForHealthy(status.url, signal);
    return status.url;
  }

  private async waitForOperation(
    name: string,
    initial: PlatformOperation,
    signal?: AbortSignal
  ): Promise<void> {
    let operation = initial;
    if (!operation.done) {
      operation = await pollUntil(
        async () => {
          const current = await this.platform.getOperation(initial.name, signal);
          return current.done ? current : undefined;
        },
        {
          operation: `Deployment operation for ${name}`,
          timeoutMs: this.options.operationTimeoutMs,
          intervalMs: this.pollIntervalMs,
          signal
        }
      );
    }
    if (operation.error) {
      throw new DeployError(name, operation.error);
    }
  }

  private async waitForReady(
    name: string,
    signal?: AbortSignal
  ): Promise<WorkloadStatus> {
    return pollUntil(
      async () => {
        const status = await this.platform.getWorkload(name, signal);
        if (!status) {
          throw new DeployError(name, 'workload disappeared while waiting for readiness');
        }
        if (status.failed) {
          throw new DeployError(name, status.message ?? 'readiness condition failed');
        }
        return status.ready ? status : undefined;
      },
      {
        operation: `Readiness of ${name}`,
        timeoutMs: this.options.readyTimeoutMs,
        intervalMs: this.pollIntervalMs,
        signal
      }
    );
  }

  private async waitForHealthy(url: string, signal?: AbortSignal): Promise<void> {
    const authToken = this.options.publicInvoke
      ? undefined
      : await this.options.identity?.fetchIdToken(url, signal);
    const healthUrl = joinUrl(url, '/health');

    await pollUntil(
      async () => {
        const response = await this.options.http.get(healthUrl, { authToken, signal });
        return response.statusCode === 200 ? true : undefined;
      },
      {
        operation: `Health check of ${url}`,
        timeoutMs: this.options.readyTimeoutMs,
        intervalMs: this.pollIntervalMs,
        signal
      }
    );
  }

  private async resolveImageSize(
    image: string,
    logger: Logger,
    signal?: AbortSignal
  ): Promise<number | null> {
    if (!this.options.images) return null;
    try {
      return await this.options.images.imageSizeBytes(image, signal);
    } catch (error) {
      logger.debug('Image size lookup failed', { image, reason: errorMessage(error) });
      return null;
    }
  }

  async delete(name: string, signal?: AbortSignal): Promise<void> {
    await this.platform.deleteWorkload(name, signal);
    this.logger.info('Workload deleted', { workload: name });
  }

  async listByPrefix(prefix: string, signal?: AbortSignal): Promise<WorkloadStatus[]> {
    return this.platform.listWorkloads(prefix, signal);
  }

  /**
   * Workloads belonging to a run, matched by label or by name suffix.
   */
  async listByRunId(runId: string, signal?: AbortSignal): Promise<WorkloadStatus[]> {
    const suffix = runSuffix(runId);
    const all = await this.platform.listWorkloads('', signal);
    return all.filter(
      (w) => w.labels[RUN_ID_LABEL] === runId || w.name.endsWith(suffix)
    );
  }

  /**
   * Best-effort bulk delete; one failure does not stop the others.
   */
  async deleteByRunId(runId: string, signal?: AbortSignal): Promise<DeleteOutcome[]> {
    const workloads = await this.listByRunId(runId, signal);
    const outcomes: DeleteOutcome[] = [];
    for (const workload of workloads) {
      try {
        await this.delete(workload.name, signal);
        outcomes.push({ name: workload.name });
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        this.logger.warn('Failed to delete workload', {
          workload: workload.name,
          reason: errorMessage(error)
        });
        outcomes.push({ name: workload.name, error: errorMessage(error) });
      }
    }
    return outcomes;
  }
}
