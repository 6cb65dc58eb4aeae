/**
 * Vendor-neutral boundary of the serverless platform
 *
 * The orchestrator only talks to these interfaces. The Cloud Run adapter in
 * ./cloud-run implements them over REST; tests use in-process fakes.
 */
import type { ExecutionEnvironment } from '../config/schema.js';

export interface WorkloadSpec {
  name: string;
  image: string;
  cpu: string;
  memory: string;
  concurrency: number;
  executionEnvironment: ExecutionEnvironment;
  startupCpuBoost: boolean;
  /** Always 0: scale-to-zero is the precondition for every cold-start sample */
  minInstances: 0;
  maxInstances: number;
  env: Record<string, string>;
  labels: Record<string, string>;
}

export interface WorkloadStatus {
  name: string;
  url?: string;
  ready: boolean;
  /** Terminal failure reported by the platform's readiness condition */
  failed: boolean;
  message?: string;
  labels: Record<string, string>;
}

export interface PlatformOperation {
  name: string;
  done: boolean;
  error?: string;
}

export interface DeploymentPlatform {
  getWorkload(name: string, signal?: AbortSignal): Promise<WorkloadStatus | null>;
  createWorkload(spec: WorkloadSpec, signal?: AbortSignal): Promise<PlatformOperation>;
  updateWorkload(spec: WorkloadSpec, signal?: AbortSignal): Promise<PlatformOperation>;
  getOperation(name: string, signal?: AbortSignal): Promise<PlatformOperation>;
  setPublicInvoker(name: string, signal?: AbortSignal): Promise<void>;
  listWorkloads(prefix: string, signal?: AbortSignal): Promise<WorkloadStatus[]>;
  deleteWorkload(name: string, signal?: AbortSignal): Promise<void>;
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface MetricsSource {
  /**
   * Instance count of a workload summed over all of its revisions, using the
   * latest point of each series inside the window. No series in the window
   * reads as zero.
   */
  instanceCount(
    workloadName: string,
    window: TimeWindow,
    signal?: AbortSignal
  ): Promise<number>;
}

export interface LogEntry {
  timestamp: Date;
  text: string;
}

export interface LogQuery {
  workloadName: string;
  since: Date;
  until: Date;
  text: string;
}

export interface LogSearch {
  search(query: LogQuery, signal?: AbortSignal): Promise<LogEntry[]>;
}

export interface IdentityTokenSource {
  fetchIdToken(audience: string, signal?: AbortSignal): Promise<string>;
}

export interface ImageMetadataSource {
  /** Compressed image size in bytes, or null when the registry does not know it */
  imageSizeBytes(image: string, signal?: AbortSignal): Promise<number | null>;
}

export interface Platform {
  deployments: DeploymentPlatform;
  metrics: MetricsSource;
  logs: LogSearch;
  identity: IdentityTokenSource;
  images: ImageMetadataSource;
}
