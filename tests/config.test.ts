import { describe, expect, it } from 'vitest';
import { loadConfig, loadStorageCredentials, parseServiceList, resolveConfig } from '../src/config/load.js';
import { ConfigError } from '../src/errors.js';

const minimal = {
  project: 'test-project',
  region: 'us-central1',
  services: [
    { name: 'alpha', image: 'img-a' },
    { name: 'beta', image: 'img-b', enabled: false }
  ]
};

function configIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('resolveConfig', () => {
  it('fills defaults', () => {
    const config = resolveConfig(minimal, {});

    expect(config.benchmark.coldStartIterations).toBe(10);
    expect(config.benchmark.scaleToZeroTimeoutSec).toBe(1200);
    expect(config.benchmark.warmRequests).toBe(100);
    expect(config.benchmark.warmConcurrency).toBe(10);
    expect(config.benchmark.requestType).toBe('ping');
    expect(config.profiles.default).toEqual({
      cpu: '1',
      memory: '512Mi',
      concurrency: 80,
      executionEnvironment: 'gen2',
      startupCpuBoost: false,
      maxInstances: 10
    });
    expect(config.storage.endpoint).toBe('https://storage.googleapis.com');
    expect(config.storage.bucket).toBeUndefined();
    expect(config.authenticatedInvoke).toBe(false);
  });

  it('looks up custom profiles by the name a service references', () => {
    const config = resolveConfig(
      {
        ...minimal,
        profiles: { small: { cpu: '0.5', memory: '256Mi', executionEnvironment: 'gen1' } },
        services: [{ name: 'alpha', image: 'img-a', profile: 'small' }]
      },
      {}
    );
    const service = config.services[0];

    expect(config.profiles[service.profile]).toEqual({
      cpu: '0.5',
      memory: '256Mi',
      concurrency: 80,
      executionEnvironment: 'gen1',
      startupCpuBoost: false,
      maxInstances: 10
    });
    expect(Object.keys(config.profiles).sort()).toEqual(['default', 'small']);
    expect(config.benchmark.startupJitterMs).toBe(37_300);
  });

  it('drops disabled services unless they are named explicitly', () => {
    expect(resolveConfig(minimal, {}).services.map((s) => s.name)).toEqual(['alpha']);
    expect(
      resolveConfig(minimal, {}, { services: ['beta'] }).services.map((s) => s.name)
    ).toEqual(['beta']);
  });

  it('rejects unknown service names in the filter', () => {
    expect(() => resolveConfig(minimal, {}, { services: ['alpha', 'zeta'] })).toThrow(
      'Unknown service(s): zeta'
    );
  });

  it('applies environment overrides, then CLI overrides', () => {
    const env = {
      BENCH_PROJECT: 'env-project',
      BENCH_COLD_START_ITERATIONS: '3',
      BENCH_WARM_CONCURRENCY: '4',
      GCS_RESULTS_BUCKET: 'env-bucket'
    };

    const fromEnv = resolveConfig(minimal, env);
    expect(fromEnv.project).toBe('env-project');
    expect(fromEnv.benchmark.coldStartIterations).toBe(3);
    expect(fromEnv.benchmark.warmConcurrency).toBe(4);
    expect(fromEnv.storage.bucket).toBe('env-bucket');

    expect(resolveConfig(minimal, env, { bucket: 'cli-bucket' }).storage.bucket).toBe(
      'cli-bucket'
    );
  });

  it('rejects a malformed numeric override', () => {
    expect(() => resolveConfig(minimal, { BENCH_WARM_REQUESTS: 'lots' })).toThrow(
      'BENCH_WARM_REQUESTS must be a positive integer, got "lots"'
    );
  });

  it('reports every schema issue with its path', () => {
    const issues = configIssues(() =>
      resolveConfig(
        {
          region: 'us-central1',
          services: [
            { name: 'alpha', image: 'img-a', profile: 'fast' },
            { name: 'alpha', image: 'img-b' }
          ]
        },
        {}
      )
    );
    expect(issues).toContain('project: Required');
  });

  it('rejects duplicate names and unknown profiles', () => {
    const issues = configIssues(() =>
      resolveConfig(
        {
          ...minimal,
          services: [
            { name: 'alpha', image: 'img-a', profile: 'fast' },
            { name: 'alpha', image: 'img-b' }
          ]
        },
        {}
      )
    );
    expect(issues).toEqual([
      'services.0.profile: Unknown profile "fast"',
      'services.1.name: Duplicate service name "alpha"'
    ]);
  });

  it('rejects service names the platform cannot use', () => {
    const issues = configIssues(() =>
      resolveConfig({ ...minimal, services: [{ name: 'Go_Gin', image: 'img' }] }, {})
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^services\.0\.name: /);
  });

  it('fails when no service is enabled', () => {
    expect(() =>
      resolveConfig({ ...minimal, services: [{ name: 'alpha', image: 'img', enabled: false }] }, {})
    ).toThrow('No enabled services in configuration');
  });
});

describe('loadConfig', () => {
  it('raises a ConfigError for a missing file', async () => {
    await expect(loadConfig('/nonexistent/bench.config.json', {})).rejects.toBeInstanceOf(
      ConfigError
    );
  });
});

describe('loadStorageCredentials', () => {
  it('needs both halves of the key pair', () => {
    expect(loadStorageCredentials({ BENCH_HMAC_ACCESS_KEY_ID: 'test-key' })).toBeUndefined();
    expect(
      loadStorageCredentials({
        BENCH_HMAC_ACCESS_KEY_ID: 'test-key',
        BENCH_HMAC_SECRET: 'test-secret'
      })
    ).toEqual({ accessKeyId: 'test-key', secretAccessKey: 'test-secret' });
  });
});

describe('parseServiceList', () => {
  it('splits and trims', () => {
    expect(parseServiceList(' alpha, beta ,,')).toEqual(['alpha', 'beta']);
    expect(parseServiceList('')).toBeUndefined();
    expect(parseServiceList(undefined)).toBeUndefined();
  });
});
