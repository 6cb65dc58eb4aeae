/**
 * Minimal object storage contract used for reports and distributed readings.
 *
 * `put` must be atomic per object: a reader sees either the previous object
 * or the complete new one at a key.
 */
export interface ObjectStore {
  /** Human-readable location for CLI output, e.g. `s3://bucket` */
  readonly description: string;
  put(key: string, body: string, contentType: string, signal?: AbortSignal): Promise<void>;
  /** null when no object exists at the key */
  get(key: string, signal?: AbortSignal): Promise<string | null>;
  /** Keys under the prefix, in lexical order */
  list(prefix: string, signal?: AbortSignal): Promise<string[]>;
  delete(key: string, signal?: AbortSignal): Promise<void>;
}

export function contentTypeFor(key: string): string {
  if (key.endsWith('.json')) return 'application/json';
  if (key.endsWith('.md')) return 'text/markdown; charset=utf-8';
  return 'application/octet-stream';
}
