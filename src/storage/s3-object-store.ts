/**
 * Object store over any S3-compatible endpoint. Defaults target the Cloud
 * Storage XML API with HMAC keys.
 */
import {
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException
} from '@aws-sdk/client-s3';
import type { StorageCredentials } from '../config/load.js';
import { CancelledError, OperationTimeoutError } from '../errors.js';
import { throwIfAborted, withTimeout } from '../utils/timing.js';
import type { ObjectStore } from './object-store.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export function createS3Client(
  endpoint: string,
  region: string,
  credentials?: StorageCredentials,
  requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS
): S3Client {
  return new S3Client({
    region,
    endpoint,
    forcePathStyle: true,
    // The interop endpoint rejects the SDK's default trailing checksums
    requestChecksumCalculation: 'WHEN_REQUIRED',
    responseChecksumValidation: 'WHEN_REQUIRED',
    requestHandler: {
      connectionTimeout: requestTimeoutMs,
      requestTimeout: requestTimeoutMs
    },
    credentials: credentials && {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey
    }
  });
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof S3ServiceException &&
    (error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404)
  );
}

export interface S3ObjectStoreOptions {
  /** Deadline for one call, retries and body download included */
  requestTimeoutMs?: number;
}

export class S3ObjectStore implements ObjectStore {
  readonly description: string;
  private readonly requestTimeoutMs: number;

  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    options: S3ObjectStoreOptions = {}
  ) {
    this.description = `s3://${bucket}`;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async put(
    key: string,
    body: string,
    contentType: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.call('PutObject', signal, (abortSignal) =>
      this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType
        }),
        { abortSignal }
      )
    );
  }

  async get(key: string, signal?: AbortSignal): Promise<string | null> {
    try {
      return await this.call('GetObject', signal, async (abortSignal) => {
        const response = await this.client.send(
          new GetObjectCommand({ Bucket: this.bucket, Key: key }),
          { abortSignal }
        );
        return response.Body ? response.Body.transformToString('utf-8') : '';
      });
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async list(prefix: string, signal?: AbortSignal): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;
    do {
      const page = await this.call('ListObjectsV2', signal, (abortSignal) =>
        this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken
          }),
          { abortSignal }
        )
      );
      for (const object of page.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
    return keys.sort();
  }

  async delete(key: string, signal?: AbortSignal): Promise<void> {
    await this.call('DeleteObject', signal, (abortSignal) =>
      this.client.send(
        new DeleteObjectCommand({ Bucket: this.bucket, Key: key }),
        { abortSignal }
      )
    );
  }

  /**
   * Run one SDK call under the per-call deadline and the caller's signal.
   */
  private async call<T>(
    operation: string,
    signal: AbortSignal | undefined,
    run: (abortSignal: AbortSignal) => Promise<T>
  ): Promise<T> {
    throwIfAborted(signal);
    const deadline = withTimeout(this.requestTimeoutMs, signal);
    try {
      return await run(deadline);
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      if (deadline.aborted) {
        throw new OperationTimeoutError(`S3 ${operation}`, this.requestTimeoutMs);
      }
      throw error;
    }
  }
}
