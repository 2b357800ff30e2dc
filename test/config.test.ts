import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getConfig, resetConfig } from '../src/config.js';
import { clearSecrets, parseLogLevel, sanitize, setLogLevel } from '../src/logger.js';

describe('getConfig', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
    clearSecrets();
    setLogLevel('error');
  });

  it('reads numeric settings and clamps the chat reply chance', () => {
    vi.stubEnv('GSI_PORT', '4100');
    vi.stubEnv('VOLUME_STEP_PERCENT', 'ten');
    vi.stubEnv('CHAT_REPLY_CHANCE', '1.5');
    vi.stubEnv('LOG_LEVEL', 'warn');

    const config = getConfig();

    expect(config.gsiPort).toBe(4100);
    expect(config.volumeStepPercent).toBe(20);
    expect(config.chatReplyChance).toBe(1);
    expect(config.logLevel).toBe('warn');
  });

  it('falls back to the DEBUG switch for an unknown log level', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    vi.stubEnv('DEBUG', '1');

    expect(getConfig().logLevel).toBe('debug');
  });

  it('caches until reset', () => {
    vi.stubEnv('PERSONA_NAME', 'Нова');
    const first = getConfig();
    vi.stubEnv('PERSONA_NAME', 'Вега');

    expect(getConfig()).toBe(first);
    expect(first.personaName).toBe('Нова');

    resetConfig();
    expect(getConfig().personaName).toBe('Вега');
  });

  it('registers credentials for log redaction', () => {
    vi.stubEnv('GSI_AUTH_TOKEN', 'test-secret');

    getConfig();

    expect(sanitize('token=test-secret')).toBe('token=[REDACTED]');
  });
});

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
    expect(parseLogLevel('Error')).toBe('error');
  });

  it('returns null for missing or unknown names', () => {
    expect(parseLogLevel(undefined)).toBeNull();
    expect(parseLogLevel('verbose')).toBeNull();
  });
});
