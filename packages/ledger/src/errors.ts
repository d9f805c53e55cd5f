/**
 * Typed ledger errors.
 *
 * A rejected append is an expected outcome and travels as a value inside a
 * Result. Precondition violations (bad arguments, bad config) are thrown as
 * LedgerError, which carries the same typed shape.
 */

import type { Digest, Direction } from '@mirrorchain/core';

export type LedgerErrorCode =
  | 'E_REJECTED_SYMMETRY'
  | 'E_INVALID_STEPS'
  | 'E_INVALID_POSITION'
  | 'E_INVALID_CONFIG';

export interface LedgerTypedError<
  C extends LedgerErrorCode = LedgerErrorCode,
  D extends Record<string, unknown> = Record<string, unknown>,
> {
  code: C;
  op: string;
  reason: string;
  details?: D;
}

export type RejectedSymmetryDetails = {
  direction: Direction;
  candidateDigest: Digest;
  pairedDigest: Digest;
  /** forward / backward digest ratio; null when the backward digest is zero */
  ratio: number | null;
  tolerance: number;
};

export type RejectedSymmetry = LedgerTypedError<'E_REJECTED_SYMMETRY', RejectedSymmetryDetails>;

export function makeLedgerError<C extends LedgerErrorCode, D extends Record<string, unknown>>(
  code: C,
  op: string,
  reason: string,
  details?: D,
): LedgerTypedError<C, D> {
  const error: LedgerTypedError<C, D> = { code, op, reason };
  if (details && typeof details === 'object' && !Array.isArray(details)) {
    error.details = details;
  }
  return error;
}

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly op: string;
  readonly details?: Record<string, unknown>;

  constructor(typed: LedgerTypedError) {
    super(`${typed.op}: ${typed.reason}`);
    this.name = 'LedgerError';
    this.code = typed.code;
    this.op = typed.op;
    this.details = typed.details;
  }
}

export function isRejectedSymmetry(value: unknown): value is RejectedSymmetry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    value.code === 'E_REJECTED_SYMMETRY'
  );
}
