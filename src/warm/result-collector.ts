import type { WarmRequestResult } from '../model.js';

/**
 * Sink every worker appends to. Workers share one event loop, so appends
 * never interleave.
 */
export class ResultCollector {
  private readonly results: WarmRequestResult[] = [];

  record(result: WarmRequestResult): void {
    this.results.push(result);
  }

  get size(): number {
    return this.results.length;
  }

  snapshot(): WarmRequestResult[] {
    return [...this.results];
  }
}
