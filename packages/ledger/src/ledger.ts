/**
 * @mirrorchain/ledger/ledger - Temporal Ledger
 *
 * Two append-only chains, forward and backward. Each record links to the
 * previous record of its own chain by primary digest, and a new record is
 * accepted only if it is Φ-symmetric with the latest record of the
 * opposite chain (when that chain has one).
 *
 * All operations are synchronous, so each call completes without
 * interleaving with any other call on the same ledger. Bus notifications
 * are sent after the state change.
 *
 * @module
 */

import {
  Direction,
  GENESIS_DIGEST,
  SYMMETRY_TOLERANCE,
  err,
  ok,
  opposite,
  phiDeviation,
  type Digest,
  type Payload,
  type Result,
  type Timestamp,
} from '@mirrorchain/core';
import type { EmitOptions } from './bus.js';
import { resolveLedgerConfig, type LedgerConfig, type ResolvedLedgerConfig } from './config.js';
import { LedgerError, makeLedgerError, type RejectedSymmetry } from './errors.js';
import type { HashEngine } from './hash-engine.js';
import type { Logger } from './logger.js';
import { createRecord, type TemporalRecord } from './record.js';
import { isSymmetric, symmetryRatio } from './symmetry.js';
import { verifyChains, type LedgerVerification } from './verify.js';

export interface AppendOptions {
  /** Overrides the configured clock */
  createdAt?: Timestamp;
}

export interface TemporalState {
  forward: TemporalRecord | null;
  backward: TemporalRecord | null;
  symmetric: boolean;
}

export interface LedgerStats {
  forwardCount: number;
  backwardCount: number;
  totalCount: number;
  /** Fraction of index-aligned forward/backward pairs that are symmetric, in [0, 1] */
  symmetryScore: number;
  /** | forwardCount / backwardCount - Φ | / Φ; Infinity while the backward chain is empty */
  temporalBalance: number;
}

export const LEDGER_TOPICS = {
  appended: 'ledger.record.appended',
  rejected: 'ledger.record.rejected',
  rewound: 'ledger.rewound',
} as const;

export interface AppendedEvent {
  direction: Direction;
  index: number;
  primaryDigest: Digest;
  predecessorDigest: Digest;
}

export interface RewoundEvent {
  steps: number;
  removed: number;
  digests: Digest[];
}

function tail(chain: readonly TemporalRecord[]): TemporalRecord | null {
  return chain.length > 0 ? chain[chain.length - 1] : null;
}

function resolvePosition(chain: readonly TemporalRecord[], position: number): TemporalRecord | null {
  const index = position < 0 ? chain.length + position : position;
  return index >= 0 && index < chain.length ? chain[index] : null;
}

export class TemporalLedger {
  private readonly config: ResolvedLedgerConfig;
  private readonly logger: Logger;
  private readonly chains: Record<Direction, TemporalRecord[]> = {
    [Direction.Forward]: [],
    [Direction.Backward]: [],
  };

  constructor(config: LedgerConfig = {}) {
    this.config = resolveLedgerConfig(config);
    this.logger = this.config.logger;
  }

  /**
   * Append a record to the chain for `direction`.
   *
   * Returns an Err (and leaves both chains untouched) when the opposite
   * chain is non-empty and its latest record is not symmetric with the
   * candidate.
   */
  append(
    payload: Payload,
    direction: Direction,
    options: AppendOptions = {}
  ): Result<TemporalRecord, RejectedSymmetry> {
    const target = this.chains[direction];
    const candidate = createRecord(this.config.hashEngine, {
      payload,
      direction,
      predecessorDigest: tail(target)?.primaryDigest ?? GENESIS_DIGEST,
      createdAt: options.createdAt ?? this.config.clock(),
    });

    const paired = tail(this.chains[opposite(direction)]);
    if (paired !== null && !isSymmetric(candidate, paired)) {
      const rejection = makeLedgerError(
        'E_REJECTED_SYMMETRY',
        'ledger.append',
        `${direction} record is not Φ-symmetric with the latest ${paired.direction} record`,
        {
          direction,
          candidateDigest: candidate.primaryDigest,
          pairedDigest: paired.primaryDigest,
          ratio: symmetryRatio(candidate, paired),
          tolerance: SYMMETRY_TOLERANCE,
        }
      );

      this.logger.debug(`Rejected ${direction} append`, rejection.details);
      if (this.config.emitRejections) {
        this.emitEvent(LEDGER_TOPICS.rejected, rejection, { level: 'warn' });
      }
      return err(rejection);
    }

    target.push(candidate);
    this.logger.debug(`Appended ${direction} #${target.length - 1} ${candidate.primaryDigest.slice(0, 12)}`);
    this.emitEvent<AppendedEvent>(LEDGER_TOPICS.appended, {
      direction,
      index: target.length - 1,
      primaryDigest: candidate.primaryDigest,
      predecessorDigest: candidate.predecessorDigest,
    });

    return ok(candidate);
  }

  /**
   * Φ-ratio symmetry between two records of opposite direction
   */
  isSymmetric(a: TemporalRecord, b: TemporalRecord): boolean {
    return isSymmetric(a, b);
  }

  /**
   * Records at `position` in both chains. Negative positions count from
   * the tail (-1 is the most recent).
   */
  temporalState(position: number): TemporalState {
    if (!Number.isInteger(position)) {
      throw new LedgerError(
        makeLedgerError('E_INVALID_POSITION', 'ledger.temporalState', `position must be an integer, got ${position}`)
      );
    }

    const forward = resolvePosition(this.chains[Direction.Forward], position);
    const backward = resolvePosition(this.chains[Direction.Backward], position);

    return {
      forward,
      backward,
      symmetric: forward !== null && backward !== null && isSymmetric(forward, backward),
    };
  }

  /**
   * Pop up to `steps` records from each chain. Each step pops the forward
   * tail, then the backward tail; an empty chain contributes nothing.
   * Returns the removed records most recent first.
   */
  rewind(steps: number): TemporalRecord[] {
    if (!Number.isInteger(steps) || steps < 0) {
      throw new LedgerError(
        makeLedgerError('E_INVALID_STEPS', 'ledger.rewind', `steps must be a non-negative integer, got ${steps}`)
      );
    }

    const forward = this.chains[Direction.Forward];
    const backward = this.chains[Direction.Backward];
    const removed: TemporalRecord[] = [];

    for (let step = 0; step < steps && (forward.length > 0 || backward.length > 0); step++) {
      const f = forward.pop();
      if (f) {
        removed.push(f);
      }
      const b = backward.pop();
      if (b) {
        removed.push(b);
      }
    }

    this.logger.debug(`Rewound ${steps} step(s), removed ${removed.length} record(s)`);
    this.emitEvent<RewoundEvent>(LEDGER_TOPICS.rewound, {
      steps,
      removed: removed.length,
      digests: removed.map((record) => record.primaryDigest),
    });

    return removed;
  }

  stats(): LedgerStats {
    const forward = this.chains[Direction.Forward];
    const backward = this.chains[Direction.Backward];
    const pairs = Math.min(forward.length, backward.length);

    let symmetricPairs = 0;
    for (let i = 0; i < pairs; i++) {
      if (isSymmetric(forward[i], backward[i])) {
        symmetricPairs++;
      }
    }

    return {
      forwardCount: forward.length,
      backwardCount: backward.length,
      totalCount: forward.length + backward.length,
      symmetryScore: pairs === 0 ? 0 : symmetricPairs / pairs,
      temporalBalance: backward.length === 0 ? Infinity : phiDeviation(forward.length / backward.length),
    };
  }

  /**
   * Recompute every record's digests and check predecessor links in both
   * chains. Pass a different engine to audit against a reference.
   */
  verify(engine: HashEngine = this.config.hashEngine): LedgerVerification {
    return verifyChains(this.chains, engine);
  }

  /**
   * Snapshot of one chain, oldest first
   */
  chain(direction: Direction): readonly TemporalRecord[] {
    return [...this.chains[direction]];
  }

  head(direction: Direction): TemporalRecord | null {
    return tail(this.chains[direction]);
  }

  size(direction: Direction): number {
    return this.chains[direction].length;
  }

  isEmpty(): boolean {
    return this.size(Direction.Forward) === 0 && this.size(Direction.Backward) === 0;
  }

  private emitEvent<T>(topic: string, data: T, options?: EmitOptions): void {
    const bus = this.config.bus;
    if (!bus) {
      return;
    }
    void bus.emit(topic, data, options).catch((error: unknown) => {
      this.logger.warn(`Failed to emit ${topic}:`, error);
    });
  }
}

export function createTemporalLedger(config: LedgerConfig = {}): TemporalLedger {
  return new TemporalLedger(config);
}
