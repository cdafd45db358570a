import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../errors.js';
import { parseLogLevel } from '../logger.js';

describe('parseLogLevel', () => {
  it('defaults to info when unset or blank', () => {
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('  ')).toBe('info');
  });

  it('accepts pino levels in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('silent')).toBe('silent');
  });

  it('raises a ConfigError for an unknown level', () => {
    expect(() => parseLogLevel('verbose')).toThrow(ConfigError);
    expect(() => parseLogLevel('verbose')).toThrow(/^Invalid configuration: LOG_LEVEL: Invalid enum value/);
  });
});

describe('logger module', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('refuses to load with an unknown LOG_LEVEL', async () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    vi.resetModules();
    await expect(import('../logger.js')).rejects.toThrow(/^Invalid configuration: LOG_LEVEL: /);
  });

  it('builds the logger at the configured level', async () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    vi.resetModules();
    const { logger } = await import('../logger.js');
    expect(logger.level).toBe('warn');
  });
});
