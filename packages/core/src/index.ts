/**
 * @mirrorchain/core - Numeric and value foundations for the temporal ledger
 *
 * - PhiMath: fixed-point Φ, Fibonacci and Zeckendorf helpers
 * - Invariants: floating-point Φ constants and the symmetry tolerance
 * - Result: explicit success/failure values
 * - Types: Direction, Digest, Payload
 *
 * @module
 * @example
 * ```typescript
 * import { PHI_FIXED, PHI_SCALE, Direction, ok } from '@mirrorchain/core';
 *
 * const scaled = (base * PHI_FIXED) / PHI_SCALE;
 * ```
 */

export * from './phi-math.js';
export * from './invariants.js';
export * from './result.js';
export * from './types.js';

export const VERSION = '0.1.0';
