/**
 * Φ-ratio symmetry between a forward and a backward record.
 *
 * ratio = forward.primaryDigest / backward.mirrorDigest, evaluated in fixed
 * point at PHI_SCALE, and the pair is symmetric when |ratio - Φ| / Φ is
 * below SYMMETRY_TOLERANCE.
 */

import {
  Direction,
  PHI_FIXED,
  PHI_SCALE,
  SYMMETRY_TOLERANCE,
  fixedToNumber,
} from '@mirrorchain/core';
import { digestToBigInt } from './hash-engine.js';
import type { TemporalRecord } from './record.js';

const TOLERANCE_DIVISOR = BigInt(Math.round(1 / SYMMETRY_TOLERANCE));

interface OrientedPair {
  forward: bigint;
  backward: bigint;
}

function orient(a: TemporalRecord, b: TemporalRecord): OrientedPair | null {
  if (a.direction === b.direction) {
    return null;
  }
  const [forward, backward] = a.direction === Direction.Forward ? [a, b] : [b, a];
  return {
    forward: digestToBigInt(forward.primaryDigest),
    backward: digestToBigInt(backward.mirrorDigest),
  };
}

/**
 * floor(forward / backward * PHI_SCALE), or null for a same-direction pair
 * or a zero backward digest
 */
export function symmetryRatioFixed(a: TemporalRecord, b: TemporalRecord): bigint | null {
  const pair = orient(a, b);
  if (pair === null || pair.backward === 0n) {
    return null;
  }
  return (pair.forward * PHI_SCALE) / pair.backward;
}

export function symmetryRatio(a: TemporalRecord, b: TemporalRecord): number | null {
  const ratio = symmetryRatioFixed(a, b);
  return ratio === null ? null : fixedToNumber(ratio);
}

export function isSymmetric(a: TemporalRecord, b: TemporalRecord): boolean {
  const ratio = symmetryRatioFixed(a, b);
  if (ratio === null) {
    return false;
  }
  const deviation = ratio > PHI_FIXED ? ratio - PHI_FIXED : PHI_FIXED - ratio;
  // deviation / PHI < 1 / TOLERANCE_DIVISOR
  return deviation * TOLERANCE_DIVISOR < PHI_FIXED;
}
