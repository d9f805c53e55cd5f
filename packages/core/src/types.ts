/**
 * Shared value types for the ledger packages
 */

/**
 * Which of the two chains a record belongs to
 */
export enum Direction {
  Forward = 'forward',
  Backward = 'backward',
}

export const DIRECTIONS: readonly Direction[] = [Direction.Forward, Direction.Backward];

export function opposite(direction: Direction): Direction {
  return direction === Direction.Forward ? Direction.Backward : Direction.Forward;
}

/**
 * Boundary guard for direction values arriving as plain strings
 */
export function isDirection(value: unknown): value is Direction {
  return value === Direction.Forward || value === Direction.Backward;
}

/**
 * 256-bit value as 64 lowercase hex characters
 */
export type Digest = string;

/**
 * Record payload; strings are UTF-8 encoded
 */
export type Payload = Uint8Array | string;

/**
 * Wall-clock seconds
 */
export type Timestamp = number;

/**
 * Predecessor of the first record in a chain (64 zeros)
 */
export const GENESIS_DIGEST: Digest = '0'.repeat(64);
