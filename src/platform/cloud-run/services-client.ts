/**
 * Cloud Run Admin API (v2) client for benchmark workloads
 */
import { z } from 'zod';
import type {
  DeploymentPlatform,
  PlatformOperation,
  WorkloadSpec,
  WorkloadStatus
} from '../types.js';
import { GoogleApiClient, type GoogleApiClientOptions } from './base-client.js';

const RUN_API = 'https://run.googleapis.com/v2';

const ConditionSchema = z
  .object({
    type: z.string().optional(),
    state: z.string().optional(),
    message: z.string().optional()
  })
  .passthrough();

const ServiceSchema = z
  .object({
    name: z.string(),
    uri: z.string().optional(),
    labels: z.record(z.string()).optional(),
    reconciling: z.boolean().optional(),
    terminalCondition: ConditionSchema.optional()
  })
  .passthrough();

const ServiceListSchema = z.object({
  services: z.array(ServiceSchema).optional(),
  nextPageToken: z.string().optional()
});

const OperationSchema = z
  .object({
    name: z.string(),
    done: z.boolean().optional(),
    error: z
      .object({ code: z.number().optional(), message: z.string().optional() })
      .optional()
  })
  .passthrough();

const PolicySchema = z.object({}).passthrough();

type CloudRunService = z.infer<typeof ServiceSchema>;

export interface CloudRunLocation {
  project: string;
  region: string;
}

const EXECUTION_ENVIRONMENTS = {
  gen1: 'EXECUTION_ENVIRONMENT_GEN1',
  gen2: 'EXECUTION_ENVIRONMENT_GEN2'
} as const;

export class CloudRunServicesClient
  extends GoogleApiClient
  implements DeploymentPlatform
{
  private readonly parent: string;

  constructor(
    location: CloudRunLocation,
    options: GoogleApiClientOptions
  ) {
    super(options);
    this.parent = `projects/${location.project}/locations/${location.region}`;
  }

  async getWorkload(
    name: string,
    signal?: AbortSignal
  ): Promise<WorkloadStatus | null> {
    const service = await this.requestOrNull(
      'services.get',
      `${RUN_API}/${this.servicePath(name)}`,
      ServiceSchema,
      signal
    );
    return service ? toWorkloadStatus(service) : null;
  }

  async createWorkload(
    spec: WorkloadSpec,
    signal?: AbortSignal
  ): Promise<PlatformOperation> {
    const url = `${RUN_API}/${this.parent}/services?serviceId=${encodeURIComponent(spec.name)}`;
    const operation = await this.request('services.create', 'POST', url, OperationSchema, {
      body: toServiceBody(spec),
      signal
    });
    return toOperation(operation);
  }

  async updateWorkload(
    spec: WorkloadSpec,
    signal?: AbortSignal
  ): Promise<PlatformOperation> {
    const operation = await this.request(
      'services.patch',
      'PATCH',
      `${RUN_API}/${this.servicePath(spec.name)}`,
      OperationSchema,
      { body: toServiceBody(spec), signal }
    );
    return toOperation(operation);
  }

  async getOperation(
    name: string,
    signal?: AbortSignal
  ): Promise<PlatformOperation> {
    const operation = await this.request(
      'operations.get',
      'GET',
      `${RUN_API}/${name}`,
      OperationSchema,
      { signal }
    );
    return toOperation(operation);
  }

  async setPublicInvoker(name: string, signal?: AbortSignal): Promise<void> {
    await this.request(
      'services.setIamPolicy',
      'POST',
      `${RUN_API}/${this.servicePath(name)}:setIamPolicy`,
      PolicySchema,
      {
        body: {
          policy: {
            bindings: [{ role: 'roles/run.invoker', members: ['allUsers'] }]
          }
        },
        signal
      }
    );
  }

  async listWorkloads(
    prefix: string,
    signal?: AbortSignal
  ): Promise<WorkloadStatus[]> {
    const results: WorkloadStatus[] = [];
    let pageToken: string | undefined;

    do {
      const params = new URLSearchParams({ pageSize: '100' });
      if (pageToken) params.set('pageToken', pageToken);
      const page = await this.request(
        'services.list',
        'GET',
        `${RUN_API}/${this.parent}/services?${params}`,
        ServiceListSchema,
        { signal }
      );
      for (const service of page.services ?? []) {
        const status = toWorkloadStatus(service);
        if (status.name.startsWith(prefix)) results.push(status);
      }
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);

    return results;
  }

  async deleteWorkload(name: string, signal?: AbortSignal): Promise<void> {
    await this.request(
      'services.delete',
      'DELETE',
      `${RUN_API}/${this.servicePath(name)}`,
      OperationSchema,
      { signal }
    );
  }

  private servicePath(name: string): string {
    return `${this.parent}/services/${encodeURIComponent(name)}`;
  }
}

function shortName(resourceName: string): string {
  const index = resourceName.lastIndexOf('/');
  return index === -1 ? resourceName : resourceName.slice(index + 1);
}

function toWorkloadStatus(service: CloudRunService): WorkloadStatus {
  const state = service.terminalCondition?.state;
  return {
    name: shortName(service.name),
    url: service.uri || undefined,
    ready: state === 'CONDITION_SUCCEEDED' && !service.reconciling,
    failed: state === 'CONDITION_FAILED',
    message: service.terminalCondition?.message,
    labels: service.labels ?? {}
  };
}

function toOperation(operation: z.infer<typeof OperationSchema>): PlatformOperation {
  return {
    name: operation.name,
    done: operation.done ?? false,
    error: operation.error
      ? operation.error.message || `operation failed with code ${operation.error.code ?? 'unknown'}`
      : undefined
  };
}

export function toServiceBody(spec: WorkloadSpec): Record<string, unknown> {
  return {
    labels: spec.labels,
    ingress: 'INGRESS_TRAFFIC_ALL',
    template: {
      labels: spec.labels,
      scaling: {
        minInstanceCount: spec.minInstances,
        maxInstanceCount: spec.maxInstances
      },
      maxInstanceRequestConcurrency: spec.concurrency,
      executionEnvironment: EXECUTION_ENVIRONMENTS[spec.executionEnvironment],
      containers: [
        {
          image: spec.image,
          resources: {
            limits: { cpu: spec.cpu, memory: spec.memory },
            cpuIdle: true,
            startupCpuBoost: spec.startupCpuBoost
          },
          env: Object.entries(spec.env).map(([name, value]) => ({ name, value }))
        }
      ]
    }
  };
}
