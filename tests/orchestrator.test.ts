import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ColdStartProber } from '../src/coldstart/prober.js';
import {
  ScaleToZeroDetector,
  type ScaleToZeroWaitOptions,
  type ScaleToZeroWaitResult
} from '../src/coldstart/scale-to-zero.js';
import type { BenchConfig } from '../src/config/schema.js';
import { DeploymentController } from '../src/deploy/deployment-controller.js';
import {
  CancelledError,
  ConfigError,
  NoReadingsError,
  ScaleToZeroTimeoutError
} from '../src/errors.js';
import type { ColdStartMeasurement, Reading } from '../src/model.js';
import type { IdentityTokenSource } from '../src/platform/types.js';
import { BatchOrchestrator } from '../src/orchestrator/orchestrator.js';
import { createNoOpLogger } from '../src/shared/logger/index.js';
import { createSigner } from '../src/signing/signer.js';
import { calculateWarmStats } from '../src/stats/calculate.js';
import { ResultStore } from '../src/storage/result-store.js';
import type { WarmBenchmarkOptions } from '../src/warm/load-generator.js';
import { FakeMetrics, FakePlatform, MemoryObjectStore, okHttp, testConfig } from './helpers/fakes.js';

const signer = createSigner({ seed: 'test-secret' });
const logger = createNoOpLogger();

class StubDetector extends ScaleToZeroDetector {
  readonly waits: string[] = [];

  constructor(private readonly stuck: Set<string> = new Set()) {
    super(new FakeMetrics(), createNoOpLogger());
  }

  override async waitForScaleToZero(
    workloadName: string,
    _options: ScaleToZeroWaitOptions
  ): Promise<ScaleToZeroWaitResult> {
    this.waits.push(workloadName);
    if (this.stuck.has(workloadName)) {
      throw new ScaleToZeroTimeoutError(workloadName, 1000, 2);
    }
    return { waitedMs: 0, polls: 1 };
  }
}

function warmRunner() {
  return vi.fn(async (_options: WarmBenchmarkOptions) =>
    calculateWarmStats(
      [
        { latencyMs: 12, statusCode: 200 },
        { latencyMs: 18, statusCode: 200 }
      ],
      100
    )
  );
}

describe('BatchOrchestrator', () => {
  let platform: FakePlatform;
  let detector: StubDetector;
  let warm: ReturnType<typeof warmRunner>;
  let store: MemoryObjectStore;
  let identity: IdentityTokenSource | undefined;

  beforeEach(() => {
    platform = new FakePlatform();
    detector = new StubDetector();
    warm = warmRunner();
    store = new MemoryObjectStore();
    identity = undefined;
  });

  function orchestrator(
    config: BenchConfig,
    runId = 'r1',
    signal?: AbortSignal
  ): BatchOrchestrator {
    const http = okHttp();
    return new BatchOrchestrator(
      {
        deployer: new DeploymentController({
          platform,
          http,
          logger,
          publicKeyHex: signer.publicKeyHex,
          operationTimeoutMs: 1000,
          readyTimeoutMs: 1000,
          pollIntervalMs: 1,
          publicInvoke: true
        }),
        detector,
        prober: new ColdStartProber(http, signer, undefined, logger),
        warmRunner: warm,
        http,
        signer,
        logger,
        identity,
        results: new ResultStore(store, logger),
        now: () => new Date('2026-10-19T23:00:00Z')
      },
      { runId, config, signal }
    );
  }

  const threeServices = () =>
    testConfig({
      benchmark: { coldStartIterations: 3, warmRequests: 5, warmConcurrency: 2 },
      services: [
        { name: 'alpha', image: 'img-a' },
        { name: 'broken', image: 'img-b' },
        { name: 'gamma', image: 'img-c', path: '/interactions' }
      ]
    });

  it('refuses services that would share a workload', () => {
    const config = testConfig({
      services: [
        { name: 'a-very-long-service-name-that-keeps-going-alpha', image: 'img-a' },
        { name: 'a-very-long-service-name-that-keeps-going-beta', image: 'img-b' }
      ]
    });

    expect(() => orchestrator(config, '20261019-ab12')).toThrow(ConfigError);
    expect(platform.calls).toEqual([]);
  });

  describe('runBatch', () => {
    it('measures every deployed service and records the failed deploy', async () => {
      platform.createFailures.set('broken', 'invalid image');

      const result = await orchestrator(threeServices()).runBatch();

      expect(result.mode).toBe('batch');
      expect(result.services.map((s) => s.name)).toEqual(['alpha', 'broken', 'gamma']);

      const [alpha, broken, gamma] = result.services;
      expect(alpha.coldStart.samples).toBe(3);
      expect(alpha.coldStart.successCount).toBe(3);
      expect(alpha.coldStartSamples.map((s) => s.iteration)).toEqual([0, 1, 2]);
      expect(alpha.deployment.url).toBe('https://alpha-r1.example.run.app');
      expect(gamma.coldStart.successCount).toBe(3);

      expect(broken.deployment.error).toBe(
        'services.create failed with HTTP 400: invalid image'
      );
      expect(broken.coldStart.samples).toBe(0);
      expect(broken.warm).toBeUndefined();
      expect(broken.errors).toEqual([
        'deploy: services.create failed with HTTP 400: invalid image'
      ]);

      expect(warm).toHaveBeenCalledTimes(2);
      expect(warm.mock.calls.map(([options]) => options.url)).toEqual([
        'https://alpha-r1.example.run.app/',
        'https://gamma-r1.example.run.app/interactions'
      ]);
      expect(warm.mock.calls[0][0]).toMatchObject({ count: 5, concurrency: 2 });
      expect(alpha.warm?.p50Ms).toBe(18);
    });

    it('fetches one identity token per service for probes and warm runs', async () => {
      const fetchIdToken = vi.fn(
        async (audience: string, _signal?: AbortSignal) => `token-for-${audience}`
      );
      identity = { fetchIdToken };
      const config = testConfig({
        authenticatedInvoke: true,
        benchmark: { coldStartIterations: 3, warmRequests: 5, warmConcurrency: 2 }
      });

      const result = await orchestrator(config).runBatch();

      expect(result.services.map((s) => s.coldStart.successCount)).toEqual([3, 3]);
      expect(fetchIdToken.mock.calls.map(([audience]) => audience)).toEqual([
        'https://alpha-r1.example.run.app',
        'https://beta-r1.example.run.app'
      ]);
      expect(warm.mock.calls.map(([options]) => options.authToken)).toEqual([
        'token-for-https://alpha-r1.example.run.app',
        'token-for-https://beta-r1.example.run.app'
      ]);
    });

    it('skips the scale-to-zero wait on the first iteration only', async () => {
      platform.createFailures.set('broken', 'invalid image');

      await orchestrator(threeServices()).runBatch();

      // Two deployed services, iterations 1 and 2
      expect(detector.waits).toEqual(['alpha-r1', 'gamma-r1', 'alpha-r1', 'gamma-r1']);
    });

    it('turns a scale-to-zero timeout into a failed sample for that service', async () => {
      detector = new StubDetector(new Set(['gamma-r1']));

      const result = await orchestrator(threeServices()).runBatch();
      const gamma = result.services[2];
      const alpha = result.services[0];

      expect(gamma.coldStart.samples).toBe(3);
      expect(gamma.coldStart.successCount).toBe(1);
      expect(gamma.coldStart.failureCount).toBe(2);
      expect(gamma.errors).toEqual([
        'iteration 1: gamma-r1 did not scale to zero within 1s (last instance count: 2)',
        'iteration 2: gamma-r1 did not scale to zero within 1s (last instance count: 2)'
      ]);
      expect(alpha.coldStart.successCount).toBe(3);
      expect(gamma.warm).toBeDefined();
    });

    it('stops on cancellation', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        orchestrator(threeServices(), 'r1', controller.signal).runBatch()
      ).rejects.toBeInstanceOf(CancelledError);
    });
  });

  describe('runAdhoc', () => {
    it('takes one sample per service after a single wait', async () => {
      const result = await orchestrator(testConfig()).runAdhoc();

      expect(result.mode).toBe('adhoc');
      expect(detector.waits).toEqual(['alpha-r1', 'beta-r1']);
      expect(result.services.map((s) => s.coldStart.samples)).toEqual([1, 1]);
      expect(warm).toHaveBeenCalledTimes(2);
    });

    it('can skip the wait', async () => {
      await orchestrator(testConfig()).runAdhoc({ skipWait: true });
      expect(detector.waits).toEqual([]);
    });
  });

  describe('runSequential', () => {
    it('finishes each service before deploying the next', async () => {
      const result = await orchestrator(
        testConfig({ benchmark: { coldStartIterations: 2 } })
      ).runSequential();

      expect(result.mode).toBe('sequential');
      expect(result.services.map((s) => s.coldStart.samples)).toEqual([2, 2]);
      const creates = platform.calls.filter((c) => c.startsWith('create:'));
      expect(creates).toEqual(['create:alpha-r1', 'create:beta-r1']);
      expect(platform.calls.indexOf('create:beta-r1')).toBeGreaterThan(
        platform.calls.lastIndexOf('get:alpha-r1')
      );
      expect(detector.waits).toEqual(['alpha-r1', 'beta-r1']);
    });
  });

  describe('measure', () => {
    it('probes the deployed services and persists one reading', async () => {
      platform.addWorkload('alpha-d20261019', { 'bench-run-id': 'd20261019' });
      platform.addWorkload('beta-d20261019', { 'bench-run-id': 'd20261019' });

      const reading = await orchestrator(testConfig(), 'd20261019').measure('2026-10-19', 4);

      expect(detector.waits).toEqual(['alpha-d20261019', 'beta-d20261019']);
      expect(Object.keys(reading.measurements)).toEqual(['alpha', 'beta']);
      expect(reading.measurements.alpha).toMatchObject({ iteration: 4, statusCode: 200 });
      expect(reading.errors).toEqual({});
      expect(platform.calls.some((c) => c.startsWith('create:'))).toBe(false);

      const saved = await store.get('runs/2026-10-19/reading-004.json');
      expect(saved).not.toBeNull();
      expect(JSON.parse(saved ?? '')).toEqual(reading);
    });

    it('deploys services missing from the run and records their failures', async () => {
      platform.addWorkload('alpha-d20261019', { 'bench-run-id': 'd20261019' });
      platform.createFailures.set('beta', 'invalid image');

      const reading = await orchestrator(testConfig(), 'd20261019').measure('2026-10-19', 0);

      expect(platform.calls).toContain('create:beta-d20261019');
      expect(reading.measurements.beta).toMatchObject({
        iteration: 0,
        statusCode: 0,
        error: 'services.create failed with HTTP 400: invalid image'
      });
      expect(reading.errors).toEqual({
        beta: 'services.create failed with HTTP 400: invalid image'
      });
      expect(detector.waits).toEqual([]);
    });
  });

  describe('finalize', () => {
    function measurement(iteration: number, ttfbMs: number, failed = false): ColdStartMeasurement {
      return {
        timestamp: `2026-10-19T0${iteration}:00:00.000Z`,
        iteration,
        ttfbMs,
        totalMs: ttfbMs,
        statusCode: failed ? 503 : 200,
        ...(failed ? { error: 'HTTP 503' } : {})
      };
    }

    function reading(iteration: number, betaFailed = false): Reading {
      return {
        runId: 'd20261019',
        date: '2026-10-19',
        iteration,
        takenAt: `2026-10-19T0${iteration}:00:05.000Z`,
        measurements: {
          alpha: measurement(iteration, 100 + iteration * 10),
          beta: measurement(iteration, 200 + iteration * 10, betaFailed)
        },
        errors: betaFailed ? { beta: 'HTTP 503' } : {}
      };
    }

    it('consolidates readings regardless of load order', async () => {
      platform.addWorkload('alpha-d20261019', { 'bench-run-id': 'd20261019' });
      platform.addWorkload('beta-d20261019', { 'bench-run-id': 'd20261019' });
      const results = new ResultStore(store, logger);
      for (const iteration of [3, 0, 4, 1, 2]) {
        await results.saveReading('2026-10-19', iteration, reading(iteration, iteration === 2));
      }

      const result = await orchestrator(testConfig(), 'd20261019').finalize('2026-10-19');
      const [alpha, beta] = result.services;

      expect(result.mode).toBe('distributed');
      expect(result.startedAt).toBe('2026-10-19T00:00:05.000Z');
      expect(alpha.coldStart.samples).toBe(5);
      expect(alpha.coldStart.successCount).toBe(5);
      expect(alpha.coldStartSamples.map((s) => s.iteration)).toEqual([0, 1, 2, 3, 4]);
      expect(alpha.coldStart.p50Ms).toBe(120);
      expect(beta.coldStart.samples).toBe(5);
      expect(beta.coldStart.successCount + beta.coldStart.failureCount).toBe(5);
      expect(beta.coldStart.failureCount).toBe(1);
      expect(beta.errors).toEqual(['iteration 2: HTTP 503']);
      expect(warm).toHaveBeenCalledTimes(2);

      expect(await store.list('runs/2026-10-19/')).toEqual([]);
      expect(await store.get('2026/10/19/d20261019/results.json')).not.toBeNull();
      expect(await store.get('2026/10/19/d20261019/results.md')).not.toBeNull();
    });

    it('reports services that are no longer deployed', async () => {
      platform.addWorkload('alpha-d20261019', { 'bench-run-id': 'd20261019' });
      await new ResultStore(store, logger).saveReading('2026-10-19', 0, reading(0));

      const result = await orchestrator(testConfig(), 'd20261019').finalize('2026-10-19');
      const beta = result.services[1];

      expect(beta.deployment.error).toBe('service not found for run');
      expect(beta.warm).toBeUndefined();
      expect(warm).toHaveBeenCalledTimes(1);
    });

    it('fails without publishing when the date has no readings', async () => {
      platform.addWorkload('alpha-d20261019', { 'bench-run-id': 'd20261019' });
      platform.addWorkload('beta-d20261019', { 'bench-run-id': 'd20261019' });
      await new ResultStore(store, logger).saveReading('2026-10-18', 0, reading(0));

      const pending = orchestrator(testConfig(), 'd20261019').finalize('2026-10-19');

      await expect(pending).rejects.toBeInstanceOf(NoReadingsError);
      await expect(pending).rejects.toThrow('no readings found for 2026-10-19');
      expect(warm).not.toHaveBeenCalled();
      expect(await store.list('2026/')).toEqual([]);
      expect(await store.list('runs/2026-10-18/')).toEqual(['runs/2026-10-18/reading-000.json']);
    });
  });
});
