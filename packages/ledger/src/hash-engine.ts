/**
 * @mirrorchain/ledger/hash-engine - Φ-weighted Digests
 *
 * Every record carries two 256-bit digests derived from its payload:
 *
 *   base    = SHA3-256(payload) as a big-endian unsigned integer
 *   primary = floor(base * Φ)  mod 2^256
 *   mirror  = primary                       (forward records)
 *             floor(base * Φ²) mod 2^256    (backward records)
 *
 * Φ is the fixed-point constant from @mirrorchain/core, so digests are
 * reproducible bit-for-bit.
 *
 * @module
 */

import { createHash } from 'node:crypto';
import {
  Direction,
  PHI_FIXED,
  PHI_SCALE,
  PHI_SQUARED_FIXED,
  type Digest,
  type Payload,
} from '@mirrorchain/core';

export const DIGEST_ALGORITHM = 'sha3-256';

const DIGEST_HEX_LENGTH = 64;
const DIGEST_MODULUS = 1n << 256n;
const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

/**
 * The digest functions the ledger consumes
 */
export interface HashEngine {
  primaryDigest(payload: Payload): Digest;
  mirrorDigest(payload: Payload, direction: Direction): Digest;
}

const encoder = new TextEncoder();

export function toBytes(payload: Payload): Uint8Array {
  return typeof payload === 'string' ? encoder.encode(payload) : payload;
}

export function isDigest(value: string): value is Digest {
  return DIGEST_PATTERN.test(value);
}

export function digestToBigInt(digest: Digest): bigint {
  return BigInt(`0x${digest}`);
}

/**
 * Fixed-width lowercase hex, reduced mod 2^256
 */
export function bigIntToDigest(value: bigint): Digest {
  const reduced = ((value % DIGEST_MODULUS) + DIGEST_MODULUS) % DIGEST_MODULUS;
  return reduced.toString(16).padStart(DIGEST_HEX_LENGTH, '0');
}

/**
 * SHA3-256 of the payload as an unsigned integer
 */
export function baseHash(payload: Payload): bigint {
  const hex = createHash(DIGEST_ALGORITHM).update(toBytes(payload)).digest('hex');
  return BigInt(`0x${hex}`);
}

/**
 * floor(base * factor / PHI_SCALE) mod 2^256, as a digest
 */
export function scaleDigest(base: bigint, factor: bigint): Digest {
  return bigIntToDigest((base * factor) / PHI_SCALE);
}

export class PhiHashEngine implements HashEngine {
  primaryDigest(payload: Payload): Digest {
    return scaleDigest(baseHash(payload), PHI_FIXED);
  }

  mirrorDigest(payload: Payload, direction: Direction): Digest {
    if (direction === Direction.Forward) {
      return this.primaryDigest(payload);
    }
    return scaleDigest(baseHash(payload), PHI_SQUARED_FIXED);
  }
}

export function createHashEngine(): HashEngine {
  return new PhiHashEngine();
}
