import { afterEach, describe, expect, it, vi } from 'vitest';
import { MemoryBus } from '../bus.js';
import { LedgerOptionsSchema, resolveLedgerConfig } from '../config.js';
import { LedgerError } from '../errors.js';
import { PhiHashEngine } from '../hash-engine.js';
import { NumericHashEngine } from './helpers.js';

describe('LedgerOptionsSchema', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('fills in defaults', () => {
    const saved = process.env.MIRRORCHAIN_ACTOR;
    delete process.env.MIRRORCHAIN_ACTOR;
    try {
      expect(LedgerOptionsSchema.parse({})).toEqual({
        actor: 'ledger',
        debug: false,
        emitRejections: true,
      });
    } finally {
      if (saved !== undefined) {
        process.env.MIRRORCHAIN_ACTOR = saved;
      }
    }
  });

  it('takes the default actor from the environment', () => {
    vi.stubEnv('MIRRORCHAIN_ACTOR', 'settlement');
    expect(LedgerOptionsSchema.parse({}).actor).toBe('settlement');
  });

  it('prefers an explicit actor', () => {
    vi.stubEnv('MIRRORCHAIN_ACTOR', 'settlement');
    expect(LedgerOptionsSchema.parse({ actor: 'audit' }).actor).toBe('audit');
  });
});

describe('resolveLedgerConfig', () => {
  it('creates default collaborators', () => {
    const config = resolveLedgerConfig({ actor: 'test' });

    expect(config.hashEngine).toBeInstanceOf(PhiHashEngine);
    expect(config.bus).toBeUndefined();
    expect(typeof config.clock()).toBe('number');
    expect(typeof config.logger.warn).toBe('function');
  });

  it('keeps supplied collaborators', () => {
    const hashEngine = new NumericHashEngine();
    const bus = new MemoryBus({ actor: 'test' });
    const clock = () => 5;

    const config = resolveLedgerConfig({ actor: 'test', hashEngine, bus, clock, emitRejections: false });

    expect(config.hashEngine).toBe(hashEngine);
    expect(config.bus).toBe(bus);
    expect(config.clock()).toBe(5);
    expect(config.emitRejections).toBe(false);
  });

  it('rejects an empty actor', () => {
    try {
      resolveLedgerConfig({ actor: '' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LedgerError);
      if (error instanceof LedgerError) {
        expect(error.code).toBe('E_INVALID_CONFIG');
        expect(error.message).toBe('ledger.config: invalid ledger options');
        expect(error.details?.issues).toHaveLength(1);
      }
    }
  });

  it('scopes the default logger by actor', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    try {
      resolveLedgerConfig({ actor: 'wallet' }).logger.warn('slow');
      expect(warn).toHaveBeenCalledWith('[Ledger:wallet] slow');
    } finally {
      warn.mockRestore();
    }
  });
});
