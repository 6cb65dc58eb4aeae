/**
 * HTTP client used for every request sent to a service under test
 *
 * One instance is shared by all warm-load workers: Node's fetch keeps a
 * keep-alive connection pool per origin, so concurrent workers reuse
 * connections rather than paying a handshake per request.
 */
import type { SignedRequest } from '../signing/signer.js';
import { errorMessage } from '../errors.js';
import { withTimeout } from '../utils/timing.js';

export interface TimedResponse {
  /** 0 when the request never produced a response */
  statusCode: number;
  /** Send to fully-read body */
  latencyMs: number;
  sentAt: Date;
  body: string;
  error?: string;
}

export interface ProbeHttpClientOptions {
  timeoutMs: number;
  fetch?: typeof fetch;
  now?: () => number;
}

export class ProbeHttpClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(options: ProbeHttpClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => performance.now());
  }

  async post(
    url: string,
    request: SignedRequest,
    options: { authToken?: string; signal?: AbortSignal } = {}
  ): Promise<TimedResponse> {
    const headers = { ...request.headers };
    if (options.authToken) {
      headers.Authorization = `Bearer ${options.authToken}`;
    }
    return this.timed(url, {
      method: 'POST',
      headers,
      body: request.body,
      signal: withTimeout(this.timeoutMs, options.signal)
    });
  }

  async get(
    url: string,
    options: { authToken?: string; signal?: AbortSignal } = {}
  ): Promise<TimedResponse> {
    const headers: Record<string, string> = {};
    if (options.authToken) {
      headers.Authorization = `Bearer ${options.authToken}`;
    }
    return this.timed(url, {
      method: 'GET',
      headers,
      signal: withTimeout(this.timeoutMs, options.signal)
    });
  }

  private async timed(url: string, init: RequestInit): Promise<TimedResponse> {
    const sentAt = new Date();
    const start = this.now();
    try {
      const response = await this.fetchImpl(url, init);
      const body = await response.text();
      const latencyMs = this.now() - start;
      return {
        statusCode: response.status,
        latencyMs,
        sentAt,
        body,
        error: response.status === 200 ? undefined : `HTTP ${response.status}`
      };
    } catch (error) {
      return {
        statusCode: 0,
        latencyMs: this.now() - start,
        sentAt,
        body: '',
        error: errorMessage(error)
      };
    }
  }
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}${path.startsWith('/') ? path : `/${path}`}`;
}
