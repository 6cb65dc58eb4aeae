/**
 * Key layout and (de)serialization of everything a run persists
 *
 * Reports: `<yyyy>/<mm>/<dd>/<runId>/results.{json,md}` (UTC date).
 * Readings: `runs/<yyyy-mm-dd>/reading-<NNN>.json`, one per measure invocation.
 */
import { CancelledError, PersistenceError, errorMessage } from '../errors.js';
import { type BenchmarkResult, type Reading, ReadingSchema } from '../model.js';
import { renderJsonReport } from '../report/json-report.js';
import { renderMarkdownReport } from '../report/markdown-report.js';
import type { Logger } from '../shared/logger/index.js';
import { type ObjectStore, contentTypeFor } from './object-store.js';

export interface ResultKeys {
  json: string;
  markdown: string;
}

export function resultKeys(runId: string, date: Date): ResultKeys {
  const yyyy = String(date.getUTCFullYear());
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  const base = `${yyyy}/${mm}/${dd}/${runId}`;
  return { json: `${base}/results.json`, markdown: `${base}/results.md` };
}

export function readingsPrefix(date: string): string {
  return `runs/${date}/`;
}

export function readingKey(date: string, iteration: number): string {
  return `${readingsPrefix(date)}reading-${String(iteration).padStart(3, '0')}.json`;
}

export class ResultStore {
  private readonly logger: Logger;

  constructor(
    private readonly store: ObjectStore,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'storage' });
  }

  get description(): string {
    return this.store.description;
  }

  private async put(key: string, body: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.store.put(key, body, contentTypeFor(key), signal);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      throw new PersistenceError(key, errorMessage(error));
    }
  }

  /**
   * Upload both report formats, keyed by the run's start date.
   */
  async uploadReports(result: BenchmarkResult, signal?: AbortSignal): Promise<ResultKeys> {
    const keys = resultKeys(result.runId, new Date(result.startedAt));
    await this.put(keys.json, renderJsonReport(result), signal);
    await this.put(keys.markdown, renderMarkdownReport(result), signal);
    this.logger.info('Reports uploaded', { runId: result.runId, key: keys.json });
    return keys;
  }

  async saveReading(
    date: string,
    iteration: number,
    reading: Reading,
    signal?: AbortSignal
  ): Promise<string> {
    const key = readingKey(date, iteration);
    await this.put(key, `${JSON.stringify(reading, null, 2)}\n`, signal);
    this.logger.info('Reading saved', { key, iteration });
    return key;
  }

  /**
   * Every reading under the date's prefix. Objects that fail to parse are
   * skipped with a warning.
   */
  async loadAllReadings(date: string, signal?: AbortSignal): Promise<Reading[]> {
    const keys = (await this.store.list(readingsPrefix(date), signal)).filter((key) =>
      key.endsWith('.json')
    );
    const readings: Reading[] = [];
    for (const key of keys) {
      const body = await this.store.get(key, signal);
      if (body === null) continue;
      try {
        readings.push(ReadingSchema.parse(JSON.parse(body)));
      } catch (error) {
        this.logger.warn('Skipping unreadable reading', {
          key,
          reason: errorMessage(error)
        });
      }
    }
    return readings.sort((a, b) => a.iteration - b.iteration);
  }

  /**
   * Remove the intermediate readings of a distributed run.
   */
  async cleanupRun(date: string, signal?: AbortSignal): Promise<number> {
    const keys = await this.store.list(readingsPrefix(date), signal);
    for (const key of keys) {
      await this.store.delete(key, signal);
    }
    this.logger.info('Readings removed', { date, count: keys.length });
    return keys.length;
  }
}
