import { type BenchmarkResult, BenchmarkResultSchema } from '../model.js';
import { roundMs } from './format.js';

/**
 * Serialise a result. Every `*Ms` number is rounded the same way the
 * Markdown report rounds it.
 */
export function renderJsonReport(result: BenchmarkResult): string {
  return `${JSON.stringify(
    result,
    (key, value: unknown) =>
      typeof value === 'number' && key.endsWith('Ms') ? roundMs(value) : value,
    2
  )}\n`;
}

export function parseJsonReport(text: string): BenchmarkResult {
  return BenchmarkResultSchema.parse(JSON.parse(text));
}
