import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the scope', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger({ scope: 'Ledger' }).error('broken', 42);

    expect(error).toHaveBeenCalledWith('[Ledger] broken', 42);
  });

  it('drops debug and info unless enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const quiet = createLogger({ scope: 'Ledger' });
    quiet.debug('a');
    quiet.info('b');
    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();

    const verbose = createLogger({ scope: 'Ledger', debug: true });
    verbose.debug('a');
    verbose.info('b');
    expect(debug).toHaveBeenCalledWith('[Ledger] a');
    expect(log).toHaveBeenCalledWith('[Ledger] b');
  });

  it('always writes warnings', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger({ scope: 'Ledger', debug: false }).warn('careful');

    expect(warn).toHaveBeenCalledWith('[Ledger] careful');
  });
});
