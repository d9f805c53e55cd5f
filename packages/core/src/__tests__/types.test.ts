import { describe, it, expect } from 'vitest';
import { DIRECTIONS, Direction, GENESIS_DIGEST, isDirection, opposite } from '../types.js';

describe('Direction', () => {
  it('has exactly two values', () => {
    expect(DIRECTIONS).toEqual(['forward', 'backward']);
  });

  it('flips to the opposite chain', () => {
    expect(opposite(Direction.Forward)).toBe(Direction.Backward);
    expect(opposite(Direction.Backward)).toBe(Direction.Forward);
  });

  it('guards untyped input', () => {
    expect(isDirection('forward')).toBe(true);
    expect(isDirection('backward')).toBe(true);
    expect(isDirection('sideways')).toBe(false);
    expect(isDirection(undefined)).toBe(false);
  });
});

describe('GENESIS_DIGEST', () => {
  it('is 64 zeros', () => {
    expect(GENESIS_DIGEST).toBe('0'.repeat(64));
    expect(GENESIS_DIGEST).toHaveLength(64);
  });
});
