/**
 * Ledger configuration.
 *
 * Serializable options are validated with zod; collaborators (hash engine,
 * bus, clock, logger) are passed alongside and default when absent.
 */

import { z } from 'zod';
import { makeLedgerError, LedgerError } from './errors.js';
import { createHashEngine, type HashEngine } from './hash-engine.js';
import type { Bus } from './bus.js';
import { createLogger, type Logger } from './logger.js';

export const LedgerOptionsSchema = z.object({
  actor: z.string().min(1).default(() => process.env.MIRRORCHAIN_ACTOR ?? 'ledger'),
  debug: z.boolean().default(false),
  emitRejections: z.boolean().default(true),
});

export type LedgerOptions = z.infer<typeof LedgerOptionsSchema>;

export interface LedgerConfig extends Partial<LedgerOptions> {
  hashEngine?: HashEngine;
  /** Event bus notified after each state change */
  bus?: Bus;
  /** Wall-clock seconds */
  clock?: () => number;
  logger?: Logger;
}

export interface ResolvedLedgerConfig extends LedgerOptions {
  hashEngine: HashEngine;
  bus?: Bus;
  clock: () => number;
  logger: Logger;
}

const defaultClock = (): number => Date.now() / 1000;

export function resolveLedgerConfig(config: LedgerConfig = {}): ResolvedLedgerConfig {
  const parsed = LedgerOptionsSchema.safeParse({
    actor: config.actor,
    debug: config.debug,
    emitRejections: config.emitRejections,
  });

  if (!parsed.success) {
    throw new LedgerError(
      makeLedgerError('E_INVALID_CONFIG', 'ledger.config', 'invalid ledger options', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      }),
    );
  }

  const options = parsed.data;
  return {
    ...options,
    hashEngine: config.hashEngine ?? createHashEngine(),
    bus: config.bus,
    clock: config.clock ?? defaultClock,
    logger: config.logger ?? createLogger({ scope: `Ledger:${options.actor}`, debug: options.debug }),
  };
}
