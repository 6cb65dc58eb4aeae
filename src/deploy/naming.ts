import { randomBytes } from 'node:crypto';
import { ConfigError } from '../errors.js';

const MAX_WORKLOAD_NAME = 49;

/**
 * Run IDs are `YYYYMMDD-xxxx`: sortable by day and unique enough that two
 * concurrent runs never share resource names.
 */
export function generateRunId(now: Date = new Date()): string {
  return `${dateStamp(now)}-${randomBytes(2).toString('hex')}`;
}

/**
 * Stable run ID shared by every scheduled measure/finalize invocation of one day.
 */
export function runIdForDate(date: string): string {
  return `d${date.replace(/-/g, '')}`;
}

export function dateStamp(date: Date): string {
  return isoDate(date).replace(/-/g, '');
}

/** UTC calendar date as YYYY-MM-DD */
export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Platform resource name for one service in one run: `<service>-<runId>`,
 * with the service part shortened so the run suffix always survives.
 */
export function workloadName(service: string, runId: string): string {
  const suffix = `-${sanitize(runId)}`;
  const head = sanitize(service)
    .slice(0, MAX_WORKLOAD_NAME - suffix.length)
    .replace(/-+$/, '');
  return `${head}${suffix}`;
}

/**
 * Reject service sets whose names collapse onto one workload after
 * sanitising and truncation; they would overwrite each other's deployment.
 */
export function assertDistinctWorkloadNames(
  services: readonly string[],
  runId: string
): void {
  const owners = new Map<string, string>();
  const issues: string[] = [];
  for (const service of services) {
    const name = workloadName(service, runId);
    const owner = owners.get(name);
    if (owner === undefined) {
      owners.set(name, service);
    } else {
      issues.push(`"${owner}" and "${service}" both map to workload "${name}"`);
    }
  }
  if (issues.length > 0) {
    throw new ConfigError(
      `Service names must stay distinct as workload names for run ${runId}`,
      issues
    );
  }
}

export function runSuffix(runId: string): string {
  return `-${sanitize(runId)}`;
}

function sanitize(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9-]/g, '-');
}
