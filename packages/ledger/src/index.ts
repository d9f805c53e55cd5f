/**
 * @mirrorchain/ledger - Reversible dual-chain ledger
 *
 * @module
 * @example
 * ```typescript
 * import { createTemporalLedger } from '@mirrorchain/ledger';
 * import { Direction } from '@mirrorchain/core';
 *
 * const ledger = createTemporalLedger({ actor: 'wallet-api' });
 * const result = ledger.append('tx1', Direction.Forward);
 * if (!result.ok) {
 *   console.warn(result.error.reason);
 * }
 * ```
 */

export {
  TemporalLedger,
  createTemporalLedger,
  LEDGER_TOPICS,
  type AppendOptions,
  type AppendedEvent,
  type LedgerStats,
  type RewoundEvent,
  type TemporalState,
} from './ledger.js';
export { payloadText, type TemporalRecord } from './record.js';
export { verifyChains, type ChainSet, type LedgerVerification } from './verify.js';
export { isSymmetric, symmetryRatio, symmetryRatioFixed } from './symmetry.js';
export {
  PhiHashEngine,
  createHashEngine,
  baseHash,
  scaleDigest,
  digestToBigInt,
  bigIntToDigest,
  isDigest,
  toBytes,
  DIGEST_ALGORITHM,
  type HashEngine,
} from './hash-engine.js';
export {
  LedgerOptionsSchema,
  resolveLedgerConfig,
  type LedgerConfig,
  type LedgerOptions,
  type ResolvedLedgerConfig,
} from './config.js';
export {
  LedgerError,
  makeLedgerError,
  isRejectedSymmetry,
  type LedgerErrorCode,
  type LedgerTypedError,
  type RejectedSymmetry,
  type RejectedSymmetryDetails,
} from './errors.js';
export { createLogger, type Logger, type LoggerOptions } from './logger.js';
export {
  Bus,
  MemoryBus,
  createBus,
  createTopicMatcher,
  DEFAULT_MAX_EVENTS,
  type BusConfig,
  type BusEvent,
  type EmitOptions,
  type Subscription,
  type TopicHandler,
} from './bus.js';

export const VERSION = '0.1.0';
