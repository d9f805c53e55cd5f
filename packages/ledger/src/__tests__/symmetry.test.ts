import { describe, it, expect } from 'vitest';
import { Direction, GENESIS_DIGEST } from '@mirrorchain/core';
import { createRecord, type TemporalRecord } from '../record.js';
import { isSymmetric, symmetryRatio, symmetryRatioFixed } from '../symmetry.js';
import { NumericHashEngine } from './helpers.js';

const engine = new NumericHashEngine();

function record(value: string, direction: Direction): TemporalRecord {
  return createRecord(engine, {
    payload: value,
    direction,
    predecessorDigest: GENESIS_DIGEST,
    createdAt: 0,
  });
}

const forward = (value: string) => record(value, Direction.Forward);
const backward = (value: string) => record(value, Direction.Backward);

describe('isSymmetric', () => {
  it('accepts a forward/backward ratio close to Φ', () => {
    expect(isSymmetric(forward('1618'), backward('1000'))).toBe(true);
  });

  it('does not depend on argument order', () => {
    expect(isSymmetric(backward('1000'), forward('1618'))).toBe(true);
    expect(isSymmetric(backward('1000'), forward('2000'))).toBe(false);
  });

  it('uses a 0.1% relative tolerance on both sides of Φ', () => {
    // Φ * 0.999 ≈ 1.616416, Φ * 1.001 ≈ 1.619651
    expect(isSymmetric(forward('16196'), backward('10000'))).toBe(true);
    expect(isSymmetric(forward('16197'), backward('10000'))).toBe(false);
    expect(isSymmetric(forward('16165'), backward('10000'))).toBe(true);
    expect(isSymmetric(forward('16164'), backward('10000'))).toBe(false);
  });

  it('treats same-direction pairs as non-symmetric', () => {
    expect(isSymmetric(forward('1618'), forward('1000'))).toBe(false);
    expect(isSymmetric(backward('1618'), backward('1000'))).toBe(false);
  });

  it('guards a zero backward digest', () => {
    expect(isSymmetric(forward('0'), backward('0'))).toBe(false);
    expect(isSymmetric(forward('1618'), backward('0'))).toBe(false);
  });

  it('reads the backward record through its mirror digest', () => {
    const b = backward('1000');
    expect(b.mirrorDigest).toBe(b.primaryDigest);
    expect(isSymmetric(forward('1618'), b)).toBe(true);
  });
});

describe('symmetryRatio', () => {
  it('divides forward by backward', () => {
    expect(symmetryRatio(forward('3236'), backward('2000'))).toBeCloseTo(1.618, 12);
    expect(symmetryRatio(backward('1000'), forward('2000'))).toBeCloseTo(2, 12);
  });

  it('is null when undefined', () => {
    expect(symmetryRatio(forward('1'), forward('1'))).toBeNull();
    expect(symmetryRatio(forward('1'), backward('0'))).toBeNull();
    expect(symmetryRatioFixed(forward('1'), backward('0'))).toBeNull();
  });

  it('is exact in fixed point', () => {
    expect(symmetryRatioFixed(forward('3'), backward('2'))).toBe(15n * 10n ** 99n);
  });
});
