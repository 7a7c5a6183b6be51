import { describe, it, expect } from 'vitest';
import { DEFAULT_TIMEOUTS, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults on an empty environment', () => {
    expect(loadConfig({})).toEqual({
      host: 'localhost',
      port: 6667,
      ...DEFAULT_TIMEOUTS,
      debug: false,
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      IRC_HOST: 'irc.example.test',
      IRC_PORT: '6697',
      IRC_PASSWORD: 'test-secret',
      EXPECT_TIMEOUT_MS: '250',
      REGISTRATION_TIMEOUT_MS: '500',
      SCENARIO_TIMEOUT_MS: '2000',
      QUIET_PERIOD_MS: '0',
      DEBUG: '1',
    });

    expect(config).toEqual({
      host: 'irc.example.test',
      port: 6697,
      password: 'test-secret',
      expectTimeoutMs: 250,
      registrationTimeoutMs: 500,
      scenarioTimeoutMs: 2000,
      quietPeriodMs: 0,
      debug: true,
    });
  });

  it('treats empty values as unset', () => {
    const config = loadConfig({ IRC_HOST: '', IRC_PORT: '', IRC_PASSWORD: '' });
    expect(config.host).toBe('localhost');
    expect(config.port).toBe(6667);
    expect('password' in config).toBe(false);
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig({ IRC_PORT: '6697', IRC_PASSWORD: 'from-env' }, { port: 7000, password: 'test-secret' });
    expect(config.port).toBe(7000);
    expect(config.password).toBe('test-secret');
  });

  it.each([
    ['IRC_PORT', 'abc', "IRC_PORT must be an integer between 0 and 65535, got 'abc'"],
    ['IRC_PORT', '70000', "IRC_PORT must be an integer between 0 and 65535, got '70000'"],
    ['EXPECT_TIMEOUT_MS', '-5', `EXPECT_TIMEOUT_MS must be an integer between 0 and ${Number.MAX_SAFE_INTEGER}, got '-5'`],
    ['QUIET_PERIOD_MS', '1.5', `QUIET_PERIOD_MS must be an integer between 0 and ${Number.MAX_SAFE_INTEGER}, got '1.5'`],
  ])('rejects %s=%s', (name, value, message) => {
    expect(() => loadConfig({ [name]: value })).toThrow(message);
  });
});
