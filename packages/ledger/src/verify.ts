/**
 * Chain verification: recompute each record's digests and check that every
 * record links to the primary digest of the one before it.
 */

import { DIRECTIONS, GENESIS_DIGEST, type Digest, type Direction } from '@mirrorchain/core';
import type { HashEngine } from './hash-engine.js';
import type { TemporalRecord } from './record.js';

export interface LedgerVerification {
  valid: boolean;
  recordsVerified: number;
  /** First record that failed, null if valid */
  invalidAt: { direction: Direction; index: number } | null;
  error?: string;
}

export type ChainSet = Readonly<Record<Direction, readonly TemporalRecord[]>>;

function checkRecord(
  record: TemporalRecord,
  direction: Direction,
  expectedPredecessor: Digest,
  engine: HashEngine
): string | undefined {
  if (record.predecessorDigest !== expectedPredecessor) {
    return `predecessor mismatch: expected ${expectedPredecessor.slice(0, 8)}..., got ${record.predecessorDigest.slice(0, 8)}...`;
  }
  const payload = record.payload;
  if (engine.primaryDigest(payload) !== record.primaryDigest) {
    return 'primary digest mismatch';
  }
  if (engine.mirrorDigest(payload, direction) !== record.mirrorDigest) {
    return 'mirror digest mismatch';
  }
  return undefined;
}

/**
 * Walk both chains, forward first, stopping at the first bad record
 */
export function verifyChains(chains: ChainSet, engine: HashEngine): LedgerVerification {
  let recordsVerified = 0;

  for (const direction of DIRECTIONS) {
    const chain = chains[direction];
    let expectedPredecessor = GENESIS_DIGEST;

    for (let index = 0; index < chain.length; index++) {
      const record = chain[index];
      recordsVerified++;

      const error = checkRecord(record, direction, expectedPredecessor, engine);
      if (error !== undefined) {
        return {
          valid: false,
          recordsVerified,
          invalidAt: { direction, index },
          error: `${direction}[${index}]: ${error}`,
        };
      }

      expectedPredecessor = record.primaryDigest;
    }
  }

  return { valid: true, recordsVerified, invalidAt: null };
}
