import type { Logger } from '../../shared/logger/index.js';
import type { Platform } from '../types.js';
import { ArtifactRegistryClient } from './artifact-registry.js';
import { GoogleCredentials } from './auth.js';
import { CloudLoggingClient } from './logging-client.js';
import { CloudMonitoringClient } from './monitoring-client.js';
import { CloudRunServicesClient } from './services-client.js';

export { ArtifactRegistryClient, parseArtifactImageRef } from './artifact-registry.js';
export { GoogleCredentials } from './auth.js';
export type { AdcClient, GoogleCredentialsOptions } from './auth.js';
export type { AccessTokenProvider, GoogleApiClientOptions } from './base-client.js';
export { CloudLoggingClient } from './logging-client.js';
export { CloudMonitoringClient } from './monitoring-client.js';
export { CloudRunServicesClient, toServiceBody } from './services-client.js';

export interface CloudRunPlatformOptions {
  project: string;
  region: string;
  logger: Logger;
  requestTimeoutMs: number;
  credentials?: GoogleCredentials;
}

/**
 * Wire the Cloud Run adapters behind the vendor-neutral Platform interface.
 */
export function createCloudRunPlatform(options: CloudRunPlatformOptions): Platform {
  const credentials =
    options.credentials ??
    new GoogleCredentials({ requestTimeoutMs: options.requestTimeoutMs });
  const logger = options.logger.child({ component: 'platform' });
  const clientOptions = {
    tokens: credentials,
    logger,
    requestTimeoutMs: options.requestTimeoutMs
  };

  const location = { project: options.project, region: options.region };

  return {
    deployments: new CloudRunServicesClient(location, clientOptions),
    metrics: new CloudMonitoringClient(location, clientOptions),
    logs: new CloudLoggingClient(options.project, clientOptions),
    identity: credentials,
    images: new ArtifactRegistryClient(clientOptions)
  };
}
