import { describe, expect, it } from 'vitest';
import { CancelledError, OperationTimeoutError } from '../src/errors.js';
import { type AdcClient, GoogleCredentials } from '../src/platform/cloud-run/auth.js';

function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

// Stands in for a metadata server that accepts the request and never answers
const unresponsive: AdcClient = {
  getAccessToken: () => never(),
  getIdTokenClient: () => never()
};

describe('GoogleCredentials', () => {
  it('times out an access token fetch that never completes', async () => {
    const credentials = new GoogleCredentials({ auth: unresponsive, requestTimeoutMs: 50 });

    await expect(credentials.getAccessToken()).rejects.toThrow(
      new OperationTimeoutError('Access token fetch', 50)
    );
  });

  it('times out an identity token fetch that never completes', async () => {
    const credentials = new GoogleCredentials({ auth: unresponsive, requestTimeoutMs: 50 });

    await expect(credentials.fetchIdToken('https://alpha.example.run.app')).rejects.toThrow(
      new OperationTimeoutError('Identity token fetch', 50)
    );
  });

  it('stops waiting as soon as the caller aborts', async () => {
    const credentials = new GoogleCredentials({ auth: unresponsive, requestTimeoutMs: 60_000 });
    const controller = new AbortController();
    const pending = credentials.fetchIdToken('https://alpha.example.run.app', controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('rejects an empty access token', async () => {
    const credentials = new GoogleCredentials({
      auth: { getAccessToken: async () => null, getIdTokenClient: () => never() }
    });

    await expect(credentials.getAccessToken()).rejects.toThrow(
      'Application Default Credentials returned no access token'
    );
  });
});
