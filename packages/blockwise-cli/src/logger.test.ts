import { afterEach, describe, expect, it } from 'vitest';
import { createCliLogger, resolveLogLevel } from './logger.js';

describe('logger', () => {
  const saved = process.env.BLOCKWISE_LOG;

  afterEach(() => {
    if (saved === undefined) delete process.env.BLOCKWISE_LOG;
    else process.env.BLOCKWISE_LOG = saved;
  });

  it('defaults to warn', () => {
    delete process.env.BLOCKWISE_LOG;
    expect(resolveLogLevel()).toBe('warn');
  });

  it('uses the config level when the environment is unset', () => {
    delete process.env.BLOCKWISE_LOG;
    expect(resolveLogLevel({ logLevel: 'debug' })).toBe('debug');
  });

  it('prefers BLOCKWISE_LOG and ignores unknown values', () => {
    process.env.BLOCKWISE_LOG = 'error';
    expect(resolveLogLevel({ logLevel: 'debug' })).toBe('error');
    process.env.BLOCKWISE_LOG = 'chatty';
    expect(resolveLogLevel({ logLevel: 'debug' })).toBe('debug');
  });

  it('builds a logger at the resolved level', () => {
    process.env.BLOCKWISE_LOG = 'silent';
    expect(createCliLogger().level).toBe('silent');
  });
});
