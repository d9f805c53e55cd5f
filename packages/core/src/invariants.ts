/**
 * @mirrorchain/core/invariants - Golden Ratio Constants
 *
 * Floating-point Φ values for statistics and display. Digest scaling never
 * uses these; see phi-math for the fixed-point constants.
 *
 * @module
 */

/**
 * Golden ratio φ = (1 + √5) / 2 ≈ 1.618033988749895
 */
export const PHI = (1 + Math.sqrt(5)) / 2;

/**
 * Inverse golden ratio 1/φ ≈ 0.618033988749895
 */
export const INV_PHI = 1 / PHI;

/**
 * φ² ≈ 2.618033988749895
 */
export const PHI_SQUARED = PHI * PHI;

/**
 * Relative tolerance |ratio - φ| / φ under which a forward/backward pair
 * counts as symmetric (0.1%)
 */
export const SYMMETRY_TOLERANCE = 0.001;

/**
 * Relative deviation of a value from φ
 */
export function phiDeviation(value: number): number {
  return Math.abs(value - PHI) / PHI;
}
