/**
 * Ledger records.
 *
 * Records are only ever built by TemporalLedger.append, which is what keeps
 * predecessor linkage intact, so createRecord stays internal to the package.
 * The record type and payloadText are public.
 */

import type { Digest, Direction, Payload, Timestamp } from '@mirrorchain/core';
import { toBytes, type HashEngine } from './hash-engine.js';

export interface TemporalRecord {
  /** A fresh copy of the stored bytes on every read */
  readonly payload: Uint8Array;
  readonly direction: Direction;
  /** Wall-clock seconds */
  readonly createdAt: Timestamp;
  /** primaryDigest of the previous record in the same chain, or GENESIS_DIGEST */
  readonly predecessorDigest: Digest;
  readonly primaryDigest: Digest;
  readonly mirrorDigest: Digest;
}

export interface RecordInput {
  payload: Payload;
  direction: Direction;
  predecessorDigest: Digest;
  createdAt: Timestamp;
}

export function createRecord(engine: HashEngine, input: RecordInput): TemporalRecord {
  // Only this closure holds the stored bytes; readers get copies
  const bytes = Uint8Array.from(toBytes(input.payload));

  return Object.freeze({
    get payload(): Uint8Array {
      return bytes.slice();
    },
    direction: input.direction,
    createdAt: input.createdAt,
    predecessorDigest: input.predecessorDigest,
    primaryDigest: engine.primaryDigest(bytes.slice()),
    mirrorDigest: engine.mirrorDigest(bytes.slice(), input.direction),
  });
}

/**
 * Payload decoded as UTF-8, for logs and UIs
 */
export function payloadText(record: TemporalRecord): string {
  return new TextDecoder().decode(record.payload);
}
