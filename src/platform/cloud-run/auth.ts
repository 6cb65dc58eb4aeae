import { GoogleAuth } from 'google-auth-library';
import { withDeadline } from '../../utils/timing.js';
import type { IdentityTokenSource } from '../types.js';
import type { AccessTokenProvider } from './base-client.js';

const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

/** The parts of GoogleAuth the benchmark uses */
export type AdcClient = Pick<GoogleAuth, 'getAccessToken' | 'getIdTokenClient'>;

export interface GoogleCredentialsOptions {
  auth?: AdcClient;
  /** Bound on each token fetch, metadata server or OAuth endpoint alike */
  requestTimeoutMs?: number;
}

/**
 * Application Default Credentials for both API access tokens and the
 * identity tokens restricted services require.
 */
export class GoogleCredentials implements AccessTokenProvider, IdentityTokenSource {
  private readonly auth: AdcClient;
  private readonly requestTimeoutMs: number;

  constructor(options: GoogleCredentialsOptions = {}) {
    this.auth = options.auth ?? new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] });
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
  }

  async getAccessToken(signal?: AbortSignal): Promise<string> {
    const token = await withDeadline(this.auth.getAccessToken(), {
      operation: 'Access token fetch',
      timeoutMs: this.requestTimeoutMs,
      signal
    });
    if (!token) {
      throw new Error('Application Default Credentials returned no access token');
    }
    return token;
  }

  async fetchIdToken(audience: string, signal?: AbortSignal): Promise<string> {
    return withDeadline(this.idToken(audience), {
      operation: 'Identity token fetch',
      timeoutMs: this.requestTimeoutMs,
      signal
    });
  }

  private async idToken(audience: string): Promise<string> {
    const client = await this.auth.getIdTokenClient(audience);
    return client.idTokenProvider.fetchIdToken(audience);
  }
}
