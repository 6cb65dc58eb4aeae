import type { z } from 'zod';
import { errorMessage, PlatformApiError } from '../../errors.js';
import type { Logger } from '../../shared/logger/index.js';
import { createNoOpLogger } from '../../shared/logger/index.js';
import { withTimeout } from '../../utils/timing.js';

export interface AccessTokenProvider {
  getAccessToken(signal?: AbortSignal): Promise<string>;
}

export interface GoogleApiClientOptions {
  tokens: AccessTokenProvider;
  logger?: Logger;
  /** Per-request timeout in milliseconds */
  requestTimeoutMs?: number;
  fetch?: typeof fetch;
}

type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Abstract base class for the Google Cloud REST clients
 *
 * Handles bearer auth, per-request timeouts threaded with the caller's
 * signal, response validation and mapping of non-2xx responses to
 * PlatformApiError. No retries: callers that need to wait poll explicitly.
 */
export abstract class GoogleApiClient {
  protected readonly logger: Logger;
  private readonly tokens: AccessTokenProvider;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GoogleApiClientOptions) {
    this.tokens = options.tokens;
    this.logger = options.logger ?? createNoOpLogger();
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  protected async request<T>(
    operation: string,
    method: HttpMethod,
    url: string,
    schema: ResponseSchema<T>,
    options: { body?: unknown; signal?: AbortSignal } = {}
  ): Promise<T> {
    const response = await this.send(operation, method, url, options);
    if (!response.ok) {
      await this.handleErrorResponse(operation, response);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new PlatformApiError(
        operation,
        response.status,
        `Invalid JSON response: ${errorMessage(error)}`
      );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new PlatformApiError(
        operation,
        response.status,
        `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`
      );
    }
    return parsed.data;
  }

  /**
   * Like request(), but resolves null on 404 instead of throwing.
   */
  protected async requestOrNull<T>(
    operation: string,
    url: string,
    schema: ResponseSchema<T>,
    signal?: AbortSignal
  ): Promise<T | null> {
    try {
      return await this.request(operation, 'GET', url, schema, { signal });
    } catch (error) {
      if (error instanceof PlatformApiError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  private async send(
    operation: string,
    method: HttpMethod,
    url: string,
    options: { body?: unknown; signal?: AbortSignal }
  ): Promise<Response> {
    const token = await this.tokens.getAccessToken(options.signal);
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    this.logger.debug('Platform API request', { operation, method, url });

    return this.fetchImpl(url, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: withTimeout(this.requestTimeoutMs, options.signal)
    });
  }

  private async handleErrorResponse(
    operation: string,
    response: Response
  ): Promise<never> {
    const text = await response.text().catch(() => '');
    const detail =
      extractGoogleErrorMessage(parseJson(text)) ??
      (text || response.statusText || 'request failed');
    throw new PlatformApiError(operation, response.status, detail);
  }
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function extractGoogleErrorMessage(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('error' in body)) {
    return undefined;
  }
  const error = body.error;
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return typeof error.message === 'string' ? error.message : undefined;
  }
  return undefined;
}
