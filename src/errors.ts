/**
 * Error classes for the benchmark orchestrator
 *
 * Only ConfigError, and NoReadingsError for finalize, are fatal to a
 * command. Everything else is caught at the service or iteration boundary
 * and recorded in the run's result.
 */

export const ErrorCode = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  DEPLOY_FAILED: 'DEPLOY_FAILED',
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',
  SCALE_TO_ZERO_TIMEOUT: 'SCALE_TO_ZERO_TIMEOUT',
  PLATFORM_API_ERROR: 'PLATFORM_API_ERROR',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
  NO_READINGS: 'NO_READINGS',
  CANCELLED: 'CANCELLED'
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class BenchError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = 'BenchError';
  }
}

export class ConfigError extends BenchError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, ErrorCode.CONFIG_INVALID);
    this.name = 'ConfigError';
  }
}

export class DeployError extends BenchError {
  constructor(
    public readonly service: string,
    message: string
  ) {
    super(`Deploy of ${service} failed: ${message}`, ErrorCode.DEPLOY_FAILED);
    this.name = 'DeployError';
  }
}

export class OperationTimeoutError extends BenchError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(
      `${operation} did not complete within ${Math.round(timeoutMs / 1000)}s`,
      ErrorCode.OPERATION_TIMEOUT
    );
    this.name = 'OperationTimeoutError';
  }
}

export class ScaleToZeroTimeoutError extends BenchError {
  constructor(
    public readonly service: string,
    public readonly timeoutMs: number,
    public readonly lastInstanceCount: number | null
  ) {
    super(
      `${service} did not scale to zero within ${Math.round(timeoutMs / 1000)}s` +
        (lastInstanceCount === null
          ? ''
          : ` (last instance count: ${lastInstanceCount})`),
      ErrorCode.SCALE_TO_ZERO_TIMEOUT
    );
    this.name = 'ScaleToZeroTimeoutError';
  }
}

export class PlatformApiError extends BenchError {
  constructor(
    public readonly operation: string,
    public readonly status: number,
    detail: string
  ) {
    super(
      `${operation} failed with HTTP ${status}: ${detail}`,
      ErrorCode.PLATFORM_API_ERROR
    );
    this.name = 'PlatformApiError';
  }
}

export class PersistenceError extends BenchError {
  constructor(
    public readonly key: string,
    message: string
  ) {
    super(`Persisting ${key} failed: ${message}`, ErrorCode.PERSISTENCE_FAILED);
    this.name = 'PersistenceError';
  }
}

export class NoReadingsError extends BenchError {
  constructor(public readonly date: string) {
    super(`no readings found for ${date}`, ErrorCode.NO_READINGS);
    this.name = 'NoReadingsError';
  }
}

export class CancelledError extends BenchError {
  constructor(message = 'Operation cancelled') {
    super(message, ErrorCode.CANCELLED);
    this.name = 'CancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
