/**
 * Configuration loading: JSON file, then environment, then CLI overrides
 */
import { readFile } from 'node:fs/promises';
import { ConfigError, errorMessage } from '../errors.js';
import { getEnvPositiveInt, getEnvString } from '../shared/env.js';
import { type BenchConfig, BenchConfigSchema } from './schema.js';

export const DEFAULT_CONFIG_PATH = 'bench.config.json';

export interface ConfigOverrides {
  /** Restrict the run to these service names */
  services?: string[];
  bucket?: string;
}

export interface StorageCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function loadConfig(
  path: string,
  env: Env,
  overrides: ConfigOverrides = {}
): Promise<BenchConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${path}: ${errorMessage(error)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(error)}`);
  }

  return resolveConfig(raw, env, overrides);
}

/**
 * Validate a raw config object after applying environment and CLI overrides.
 */
export function resolveConfig(
  raw: unknown,
  env: Env,
  overrides: ConfigOverrides = {}
): BenchConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Config must be a JSON object');
  }

  let merged: Record<string, unknown>;
  try {
    merged = applyEnvOverrides(raw, env);
  } catch (error) {
    throw new ConfigError(errorMessage(error));
  }

  if (overrides.bucket) {
    const storage = isRecord(merged.storage) ? merged.storage : {};
    merged = { ...merged, storage: { ...storage, bucket: overrides.bucket } };
  }

  const result = BenchConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
  }

  return filterServices(result.data, overrides.services);
}

function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: Env
): Record<string, unknown> {
  const benchmark = isRecord(raw.benchmark) ? { ...raw.benchmark } : {};
  const storage = isRecord(raw.storage) ? { ...raw.storage } : {};

  const numeric: Array<[string, string]> = [
    ['BENCH_COLD_START_ITERATIONS', 'coldStartIterations'],
    ['BENCH_WARM_REQUESTS', 'warmRequests'],
    ['BENCH_WARM_CONCURRENCY', 'warmConcurrency'],
    ['BENCH_SCALE_TO_ZERO_TIMEOUT_SEC', 'scaleToZeroTimeoutSec']
  ];
  for (const [envKey, field] of numeric) {
    const value = getEnvPositiveInt(env, envKey);
    if (value !== undefined) benchmark[field] = value;
  }

  const bucket = getEnvString(env, 'GCS_RESULTS_BUCKET');
  if (bucket) storage.bucket = bucket;
  const endpoint = getEnvString(env, 'BENCH_STORAGE_ENDPOINT');
  if (endpoint) storage.endpoint = endpoint;

  return {
    ...raw,
    project: getEnvString(env, 'BENCH_PROJECT') ?? raw.project,
    region: getEnvString(env, 'BENCH_REGION') ?? raw.region,
    benchmark,
    storage
  };
}

function filterServices(
  config: BenchConfig,
  names: string[] | undefined
): BenchConfig {
  if (!names || names.length === 0) {
    const enabled = config.services.filter((s) => s.enabled);
    if (enabled.length === 0) {
      throw new ConfigError('No enabled services in configuration');
    }
    return { ...config, services: enabled };
  }

  const known = new Set(config.services.map((s) => s.name));
  const unknown = names.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown service(s): ${unknown.join(', ')}`);
  }

  // An explicit --services list overrides the enabled flag
  const wanted = new Set(names);
  return {
    ...config,
    services: config.services.filter((s) => wanted.has(s.name))
  };
}

/**
 * HMAC credentials for the S3-compatible results bucket. Absent credentials
 * mean the default AWS provider chain is used.
 */
export function loadStorageCredentials(env: Env): StorageCredentials | undefined {
  const accessKeyId = getEnvString(env, 'BENCH_HMAC_ACCESS_KEY_ID');
  const secretAccessKey = getEnvString(env, 'BENCH_HMAC_SECRET');
  if (!accessKeyId || !secretAccessKey) return undefined;
  return { accessKeyId, secretAccessKey };
}

export function parseServiceList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);
  return names.length > 0 ? names : undefined;
}
