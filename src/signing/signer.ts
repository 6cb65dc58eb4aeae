/**
 * Request signing for probes
 *
 * The services under test verify an Ed25519 signature over
 * `timestamp + body` and reject stale timestamps, so every request gets a
 * fresh timestamp unless the caller pins one.
 */
import {
  createHash,
  createPrivateKey,
  createPublicKey,
  type KeyObject,
  sign
} from 'node:crypto';
import type { RequestType } from '../config/schema.js';

export const SIGNATURE_HEADER = 'X-Signature-Ed25519';
export const TIMESTAMP_HEADER = 'X-Signature-Timestamp';

// PKCS#8 wrapper for a raw 32-byte Ed25519 seed (RFC 8410)
const ED25519_PKCS8_PREFIX = Buffer.from(
  '302e020100300506032b657004220420',
  'hex'
);

export interface Signature {
  signature: string;
  timestamp: string;
}

export interface SignedRequest {
  body: string;
  headers: Record<string, string>;
}

export interface Signer {
  readonly publicKeyHex: string;
  sign(body: string, timestamp?: string): Signature;
  signedRequest(type: RequestType, timestamp?: string): SignedRequest;
}

export function requestBody(type: RequestType): string {
  if (type === 'ping') {
    return JSON.stringify({ type: 1 });
  }
  return JSON.stringify({
    type: 2,
    id: '100000000000000001',
    application_id: '100000000000000002',
    token: 'bench-interaction-token',
    guild_id: '100000000000000003',
    channel_id: '100000000000000004',
    data: { id: '100000000000000005', name: 'bench', type: 1 },
    member: { user: { id: '100000000000000006', username: 'bench-user' } }
  });
}

export function unixTimestamp(now: number = Date.now()): string {
  return String(Math.floor(now / 1000));
}

class Ed25519Signer implements Signer {
  readonly publicKeyHex: string;

  constructor(
    private readonly privateKey: KeyObject,
    private readonly clock: () => number
  ) {
    const spki = createPublicKey(privateKey).export({
      format: 'der',
      type: 'spki'
    });
    // The raw 32-byte key is the tail of the SPKI encoding
    this.publicKeyHex = spki.subarray(spki.length - 32).toString('hex');
  }

  sign(body: string, timestamp?: string): Signature {
    const ts = timestamp ?? unixTimestamp(this.clock());
    const signature = sign(
      null,
      Buffer.from(ts + body, 'utf-8'),
      this.privateKey
    ).toString('hex');
    return { signature, timestamp: ts };
  }

  signedRequest(type: RequestType, timestamp?: string): SignedRequest {
    const body = requestBody(type);
    const { signature, timestamp: ts } = this.sign(body, timestamp);
    return {
      body,
      headers: {
        'Content-Type': 'application/json',
        [SIGNATURE_HEADER]: signature,
        [TIMESTAMP_HEADER]: ts
      }
    };
  }
}

/**
 * Derive a signer deterministically from a seed string: the Ed25519 private
 * key is sha256(seed).
 */
export function createSigner(options: {
  seed: string;
  clock?: () => number;
}): Signer {
  const rawSeed = createHash('sha256').update(options.seed).digest();
  const privateKey = createPrivateKey({
    key: Buffer.concat([ED25519_PKCS8_PREFIX, rawSeed]),
    format: 'der',
    type: 'pkcs8'
  });
  return new Ed25519Signer(privateKey, options.clock ?? Date.now);
}
