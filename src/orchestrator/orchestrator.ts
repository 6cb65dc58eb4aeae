/**
 * Benchmark orchestration
 *
 * Sequences deploy, scale-to-zero waits, cold-start probes and warm load for
 * every configured service. Per-service and per-iteration failures are
 * recorded in the result; only cancellation, missing collaborators and a
 * finalize without readings throw.
 *
 * Modes:
 * - batch: deploy all, then N iterations across all services, then warm load
 * - adhoc: deploy all, one wait, one probe each, warm load
 * - sequential: the batch phases one service at a time
 * - measure/finalize: one iteration per invocation, readings persisted in
 *   between, consolidated by finalize
 */
import type { BenchConfig, ServiceConfig } from '../config/schema.js';
import {
  CancelledError,
  ConfigError,
  errorMessage,
  NoReadingsError,
  toError
} from '../errors.js';
import type { DeploymentController, DeployOutcome } from '../deploy/deployment-controller.js';
import { assertDistinctWorkloadNames, workloadName } from '../deploy/naming.js';
import type { ColdStartProber } from '../coldstart/prober.js';
import type { ScaleToZeroDetector } from '../coldstart/scale-to-zero.js';
import { joinUrl, type ProbeHttpClient } from '../http/probe-client.js';
import type {
  BenchmarkMode,
  BenchmarkResult,
  ColdStartMeasurement,
  DeploymentInfo,
  Reading
} from '../model.js';
import type { IdentityTokenSource } from '../platform/types.js';
import { buildBenchmarkResult, type ServiceRun } from '../report/build-result.js';
import type { Logger } from '../shared/logger/index.js';
import type { Signer } from '../signing/signer.js';
import type { ResultKeys, ResultStore } from '../storage/result-store.js';
import { throwIfAborted } from '../utils/timing.js';
import type { WarmRunner } from '../warm/load-generator.js';
import { type ProgressReporter, silentProgress } from './progress.js';
import { joinAll } from './task-group.js';

export interface OrchestratorDeps {
  deployer: DeploymentController;
  detector: ScaleToZeroDetector;
  prober: ColdStartProber;
  warmRunner: WarmRunner;
  http: ProbeHttpClient;
  signer: Signer;
  logger: Logger;
  identity?: IdentityTokenSource;
  results?: ResultStore;
  progress?: ProgressReporter;
  now?: () => Date;
}

export interface RunContext {
  runId: string;
  config: BenchConfig;
  signal?: AbortSignal;
}

interface ServiceState {
  config: ServiceConfig;
  workload: string;
  url?: string;
  token?: { value: string; fetchedAt: number };
  run: ServiceRun;
}

// Identity tokens live for an hour; refresh well before a probe could see one expire
const TOKEN_MAX_AGE_MS = 45 * 60 * 1000;

export class BatchOrchestrator {
  private readonly logger: Logger;
  private readonly progress: ProgressReporter;
  private readonly now: () => Date;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly context: RunContext
  ) {
    assertDistinctWorkloadNames(
      context.config.services.map((service) => service.name),
      context.runId
    );
    this.logger = deps.logger.child({
      component: 'orchestrator',
      runId: context.runId
    });
    this.progress = deps.progress ?? silentProgress;
    this.now = deps.now ?? (() => new Date());
  }

  private get config(): BenchConfig {
    return this.context.config;
  }

  private get signal(): AbortSignal | undefined {
    return this.context.signal;
  }

  async runBatch(): Promise<BenchmarkResult> {
    const startedAt = this.now();
    const states = await this.deployAll();

    const iterations = this.config.benchmark.coldStartIterations;
    for (let iteration = 0; iteration < iterations; iteration++) {
      this.progress.phase(`Cold start iteration ${iteration + 1}/${iterations}`);
      await this.prepareTokens(deployed(states));
      const ready = await this.waitForAll(deployed(states), iteration);
      for (const state of ready) {
        state.run.coldStartSamples.push(await this.probe(state, iteration));
      }
    }

    await this.warmAll(states);
    return this.finish('batch', startedAt, states);
  }

  async runAdhoc(options: { skipWait?: boolean } = {}): Promise<BenchmarkResult> {
    const startedAt = this.now();
    const states = await this.deployAll();

    this.progress.phase('Cold start measurement');
    await this.prepareTokens(deployed(states));
    const ready = await this.waitForAll(deployed(states), 0, !options.skipWait);
    for (const state of ready) {
      state.run.coldStartSamples.push(await this.probe(state, 0));
    }

    await this.warmAll(states);
    return this.finish('adhoc', startedAt, states);
  }

  async runSequential(): Promise<BenchmarkResult> {
    const startedAt = this.now();
    const states = this.config.services.map((service) => this.initialState(service));
    const iterations = this.config.benchmark.coldStartIterations;

    for (const state of states) {
      this.progress.phase(`Service ${state.config.name}`);
      await this.deployOne(state);
      if (!state.url) continue;

      for (let iteration = 0; iteration < iterations; iteration++) {
        await this.prepareTokens([state]);
        const ready = await this.waitForAll([state], iteration);
        if (ready.length > 0) {
          state.run.coldStartSamples.push(await this.probe(state, iteration));
        }
      }
      await this.warmOne(state);
    }
    return this.finish('sequential', startedAt, states);
  }

  /**
   * One distributed iteration: make sure every service is deployed, wait for
   * scale-to-zero (skipped on iteration 0), probe each and persist the reading.
   */
  async measure(date: string, iteration: number): Promise<Reading> {
    const results = this.requireResultStore();
    const states = await this.resolveDeployed();

    const missing = states.filter((state) => !state.url);
    if (missing.length > 0) {
      this.progress.phase(`Deploying ${missing.length} missing service(s)`);
      await Promise.all(missing.map((state) => this.deployOne(state)));
    }

    this.progress.phase(`Measurement ${iteration}`);
    await this.prepareTokens(deployed(states));
    const ready = await this.waitForAll(deployed(states), iteration);
    for (const state of ready) {
      state.run.coldStartSamples.push(await this.probe(state, iteration));
    }

    const reading: Reading = {
      runId: this.context.runId,
      date,
      iteration,
      takenAt: this.now().toISOString(),
      measurements: {},
      errors: {}
    };
    for (const state of states) {
      const sample = state.run.coldStartSamples.find((s) => s.iteration === iteration);
      const measurement =
        sample ?? this.failedSample(iteration, state.run.deployment.error ?? 'not deployed');
      reading.measurements[state.config.name] = measurement;
      if (measurement.error) {
        reading.errors[state.config.name] = measurement.error;
      }
    }

    await results.saveReading(date, iteration, reading, this.signal);
    return reading;
  }

  /**
   * Consolidate every reading of the day, run the warm phase and publish the
   * result. Intermediate readings are removed once the reports are out.
   */
  async finalize(date: string): Promise<BenchmarkResult> {
    const results = this.requireResultStore();
    const readings = await results.loadAllReadings(date, this.signal);
    if (readings.length === 0) {
      throw new NoReadingsError(date);
    }

    const states = await this.resolveDeployed();
    for (const state of states) {
      const name = state.config.name;
      if (!state.url) {
        state.run.deployment.error = 'service not found for run';
        state.run.errors.push(`${name} is not deployed for run ${this.context.runId}`);
      }
      for (const reading of readings) {
        const sample = reading.measurements[name];
        if (sample) state.run.coldStartSamples.push(sample);
        const error = reading.errors[name];
        if (error) state.run.errors.push(`iteration ${reading.iteration}: ${error}`);
      }
    }

    await this.warmAll(states);

    const startedAt = readings
      .map((r) => new Date(r.takenAt))
      .reduce((earliest, d) => (d < earliest ? d : earliest), this.now());
    const result = this.finish('distributed', startedAt, states);

    const keys = await this.publish(result);
    if (keys) {
      try {
        await results.cleanupRun(date, this.signal);
      } catch (error) {
        this.logger.warn('Failed to remove readings', { date, reason: errorMessage(error) });
      }
    }
    return result;
  }

  /**
   * Upload both reports. Failures are warnings: the caller still has the
   * result and writes it locally.
   */
  async publish(result: BenchmarkResult): Promise<ResultKeys | null> {
    if (!this.deps.results) return null;
    try {
      return await this.deps.results.uploadReports(result, this.signal);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      this.logger.warn('Report upload failed', { reason: errorMessage(error) });
      this.progress.failure('reports', `upload failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private requireResultStore(): ResultStore {
    if (!this.deps.results) {
      throw new ConfigError('Distributed runs need a result store');
    }
    return this.deps.results;
  }

  private initialState(service: ServiceConfig): ServiceState {
    return {
      config: service,
      workload: workloadName(service.name, this.context.runId),
      run: {
        name: service.name,
        deployment: {
          serviceName: service.name,
          image: service.image,
          profile: service.profile,
          deployDurationMs: 0
        },
        coldStartSamples: [],
        errors: []
      }
    };
  }

  private async deployAll(): Promise<ServiceState[]> {
    this.progress.phase(`Deploying ${this.config.services.length} service(s)`);
    const states = this.config.services.map((service) => this.initialState(service));
    await Promise.all(states.map((state) => this.deployOne(state)));
    return states;
  }

  private async deployOne(state: ServiceState): Promise<void> {
    const profile = this.config.profiles[state.config.profile];
    const outcome = await this.deps.deployer.deploy(
      { service: state.config, profile, runId: this.context.runId },
      this.signal
    );
    this.applyDeployOutcome(state, outcome);
  }

  private applyDeployOutcome(state: ServiceState, outcome: DeployOutcome): void {
    const deployment: DeploymentInfo = {
      ...state.run.deployment,
      deployDurationMs: outcome.durationMs,
      imageSizeBytes: outcome.imageSizeBytes
    };
    if (outcome.ok) {
      state.url = outcome.url;
      state.run.deployment = { ...deployment, url: outcome.url };
      this.progress.step(state.config.name, `deployed in ${(outcome.durationMs / 1000).toFixed(1)}s`);
    } else {
      state.run.deployment = { ...deployment, error: outcome.error };
      state.run.errors.push(`deploy: ${outcome.error}`);
      this.progress.failure(state.config.name, `deploy failed: ${outcome.error}`);
    }
  }

  /**
   * Services already deployed under this run ID, matched to the configured
   * services. Unmatched services come back without a URL.
   */
  private async resolveDeployed(): Promise<ServiceState[]> {
    const workloads = await this.deps.deployer.listByRunId(this.context.runId, this.signal);
    const byName = new Map(workloads.map((w) => [w.name, w]));

    return this.config.services.map((service) => {
      const state = this.initialState(service);
      const workload = byName.get(state.workload);
      if (workload?.url && workload.ready) {
        state.url = workload.url;
        state.run.deployment.url = workload.url;
      }
      return state;
    });
  }

  /**
   * Wait for every service to scale to zero concurrently. By default
   * iteration 0 runs against freshly deployed services and skips the wait. Returns the
   * services that may be probed; the others get a failed sample.
   */
  private async waitForAll(
    states: ServiceState[],
    iteration: number,
    wait = iteration > 0
  ): Promise<ServiceState[]> {
    throwIfAborted(this.signal);
    if (!wait || states.length === 0) return states;

    const { benchmark } = this.config;
    const { failures } = await joinAll(
      states.map((state) => ({
        name: state.config.name,
        run: () =>
          this.deps.detector.waitForScaleToZero(state.workload, {
            timeoutMs: benchmark.scaleToZeroTimeoutSec * 1000,
            pollIntervalMs: benchmark.scaleToZeroPollIntervalSec * 1000,
            signal: this.signal
          })
      }))
    );

    const failed = new Set<string>();
    for (const { name, error } of failures) {
      if (error instanceof CancelledError) throw error;
      failed.add(name);
      const state = states.find((s) => s.config.name === name);
      if (!state) continue;
      state.run.coldStartSamples.push(this.failedSample(iteration, error.message));
      state.run.errors.push(`iteration ${iteration}: ${error.message}`);
      this.progress.failure(name, error.message);
    }
    throwIfAborted(this.signal);
    return states.filter((state) => !failed.has(state.config.name));
  }

  private async probe(state: ServiceState, iteration: number): Promise<ColdStartMeasurement> {
    const url = state.url;
    if (!url) {
      return this.failedSample(iteration, 'service has no URL');
    }
    const { benchmark } = this.config;
    let authToken: string | undefined;
    try {
      authToken = await this.authToken(state);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      const message = `identity token: ${errorMessage(error)}`;
      state.run.errors.push(`iteration ${iteration}: ${message}`);
      return this.failedSample(iteration, message);
    }

    const sample = await this.deps.prober.measure(joinUrl(url, state.config.path), {
      iteration,
      requestType: benchmark.requestType,
      authToken,
      signal: this.signal,
      correlate: {
        workloadName: state.workload,
        timeoutMs: benchmark.logCorrelationTimeoutSec * 1000
      }
    });
    throwIfAborted(this.signal);

    if (sample.error) {
      this.progress.failure(state.config.name, `iteration ${iteration}: ${sample.error}`);
    } else {
      this.progress.step(
        state.config.name,
        `iteration ${iteration}: ${sample.ttfbMs.toFixed(1)}ms`
      );
    }
    return sample;
  }

  /**
   * Identity token for a restricted service, fetched once and reused until
   * it nears expiry.
   */
  private async authToken(state: ServiceState): Promise<string | undefined> {
    const identity = this.deps.identity;
    if (!this.config.authenticatedInvoke || !identity || !state.url) return undefined;

    const now = this.now().getTime();
    if (state.token && now - state.token.fetchedAt < TOKEN_MAX_AGE_MS) {
      return state.token.value;
    }
    const value = await identity.fetchIdToken(state.url, this.signal);
    state.token = { value, fetchedAt: now };
    return value;
  }

  /**
   * Fetch tokens before the scale-to-zero wait so none is fetched between
   * the wait and the probe. Failures surface again when the probe asks.
   */
  private async prepareTokens(states: ServiceState[]): Promise<void> {
    for (const state of states) {
      try {
        await this.authToken(state);
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        this.logger.warn('Identity token fetch failed', {
          service: state.config.name,
          reason: errorMessage(error)
        });
      }
    }
  }

  private async warmAll(states: ServiceState[]): Promise<void> {
    const targets = deployed(states);
    if (targets.length === 0) return;
    this.progress.phase('Warm request benchmark');
    for (const state of targets) {
      await this.warmOne(state);
    }
  }

  private async warmOne(state: ServiceState): Promise<void> {
    const url = state.url;
    if (!url) return;
    const { benchmark } = this.config;
    try {
      const authToken = await this.authToken(state);
      const stats = await this.deps.warmRunner({
        url: joinUrl(url, state.config.path),
        count: benchmark.warmRequests,
        concurrency: benchmark.warmConcurrency,
        signer: this.deps.signer,
        requestType: benchmark.requestType,
        http: this.deps.http,
        authToken,
        signal: this.signal,
        logger: this.logger.child({ service: state.config.name })
      });
      state.run.warm = stats;
      this.progress.step(
        state.config.name,
        `warm p50 ${stats.p50Ms.toFixed(1)}ms, ${stats.requestsPerSecond.toFixed(1)} req/s`
      );
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      this.logger.error('Warm benchmark failed', toError(error), {
        service: state.config.name
      });
      state.run.errors.push(`warm: ${errorMessage(error)}`);
      this.progress.failure(state.config.name, `warm benchmark failed: ${errorMessage(error)}`);
    }
  }

  private failedSample(iteration: number, error: string): ColdStartMeasurement {
    return {
      timestamp: this.now().toISOString(),
      iteration,
      ttfbMs: 0,
      totalMs: 0,
      statusCode: 0,
      error
    };
  }

  private finish(
    mode: BenchmarkMode,
    startedAt: Date,
    states: ServiceState[]
  ): BenchmarkResult {
    const result = buildBenchmarkResult({
      runId: this.context.runId,
      mode,
      startedAt,
      finishedAt: this.now(),
      config: this.config,
      services: states.map((state) => state.run)
    });
    this.logger.info('Run complete', {
      mode,
      services: result.services.length,
      failedDeploys: result.services.filter((s) => s.deployment.error).length
    });
    return result;
  }

  /**
   * Delete every workload created for this run. Best effort.
   */
  async cleanupWorkloads(): Promise<void> {
    try {
      const outcomes = await this.deps.deployer.deleteByRunId(this.context.runId, this.signal);
      for (const outcome of outcomes) {
        if (outcome.error) {
          this.progress.failure(outcome.name, `delete failed: ${outcome.error}`);
        } else {
          this.progress.step(outcome.name, 'deleted');
        }
      }
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      this.logger.warn('Cleanup failed', { reason: errorMessage(error) });
      this.progress.failure('cleanup', errorMessage(error));
    }
  }
}

function deployed(states: ServiceState[]): ServiceState[] {
  return states.filter((state) => state.url !== undefined);
}
