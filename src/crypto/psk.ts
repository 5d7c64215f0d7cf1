/**
 * Pre-shared key derivation.
 *
 * PSK = HMAC-SHA256(epochSecret, participantId), truncated to the key length.
 * Longer keys are expanded HKDF-Expand style:
 *   T(1) = HMAC(secret, id || 0x01), T(n) = HMAC(secret, T(n-1) || id || n)
 * For lengths up to 32 bytes the plain HMAC form is used, so existing
 * 32-byte keys stay stable.
 */

import { createHash, createHmac, randomBytes } from 'crypto';
import { PreconditionViolation } from '../errors.js';

export const DEFAULT_SECRET_LENGTH = 32;
export const DEFAULT_KEY_LENGTH = 32;
const HMAC_OUTPUT_LENGTH = 32;
const MAX_KEY_LENGTH = 255 * HMAC_OUTPUT_LENGTH;

function assertSecret(secret: Buffer, expectedLength: number): void {
  if (secret.length !== expectedLength) {
    throw new PreconditionViolation(`epoch secret must be ${expectedLength} bytes, got ${secret.length}`);
  }
}

function assertKeyLength(keyLength: number): void {
  if (!Number.isInteger(keyLength) || keyLength <= 0 || keyLength > MAX_KEY_LENGTH) {
    throw new PreconditionViolation(`key length must be an integer in 1..${MAX_KEY_LENGTH}, got ${keyLength}`);
  }
}

export function createSecret(length: number = DEFAULT_SECRET_LENGTH): Buffer {
  if (!Number.isInteger(length) || length <= 0) {
    throw new PreconditionViolation(`secret length must be a positive integer, got ${length}`);
  }
  return randomBytes(length);
}

export interface DeriveOptions {
  keyLength?: number;
  secretLength?: number;
}

export function derivePsk(secret: Buffer, participantId: string, opts: DeriveOptions = {}): Buffer {
  const { keyLength = DEFAULT_KEY_LENGTH, secretLength = DEFAULT_SECRET_LENGTH } = opts;
  assertSecret(secret, secretLength);
  assertKeyLength(keyLength);
  if (participantId.length === 0) {
    throw new PreconditionViolation('participant id must be non-empty');
  }

  const info = Buffer.from(participantId, 'utf8');
  if (keyLength <= HMAC_OUTPUT_LENGTH) {
    return createHmac('sha256', secret).update(info).digest().subarray(0, keyLength);
  }

  const blocks: Buffer[] = [];
  let previous: Buffer = Buffer.alloc(0);
  for (let counter = 1; blocks.length * HMAC_OUTPUT_LENGTH < keyLength; counter++) {
    previous = createHmac('sha256', secret)
      .update(previous)
      .update(info)
      .update(Buffer.from([counter]))
      .digest();
    blocks.push(previous);
  }
  return Buffer.concat(blocks).subarray(0, keyLength);
}

/** One-way, display-safe identifier of a secret: `sha256:` + 16 hex chars. */
export function secretFingerprint(secret: Buffer): string {
  return 'sha256:' + createHash('sha256').update(secret).digest('hex').slice(0, 16);
}
