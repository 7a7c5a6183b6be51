/**
 * Engine configuration from environment variables.
 *
 * Environment variables:
 *   IRC_HOST                - Server host (default: localhost)
 *   IRC_PORT                - Server port (default: 6667)
 *   IRC_PASSWORD            - Server password sent with PASS (default: none)
 *   EXPECT_TIMEOUT_MS       - Default wait for one expected message (default: 5000)
 *   REGISTRATION_TIMEOUT_MS - Wait for RPL_WELCOME (default: 10000)
 *   SCENARIO_TIMEOUT_MS     - Hard limit for one scenario (default: 30000)
 *   QUIET_PERIOD_MS         - How long "nothing arrives" is watched for (default: 1000)
 *   DEBUG=1                 - Trace every line sent and received
 */

import { isDebugEnabled } from './log.js';

export interface ConformanceConfig {
  host: string;
  port: number;
  password?: string;
  expectTimeoutMs: number;
  registrationTimeoutMs: number;
  scenarioTimeoutMs: number;
  quietPeriodMs: number;
  debug: boolean;
}

export const DEFAULT_TIMEOUTS = {
  expectTimeoutMs: 5000,
  registrationTimeoutMs: 10000,
  scenarioTimeoutMs: 30000,
  quietPeriodMs: 1000,
};

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  const value = env[name];
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > max) {
    throw new Error(`${name} must be an integer between 0 and ${max}, got '${value}'`);
  }
  return parsed;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ConformanceConfig> = {}
): ConformanceConfig {
  const config: ConformanceConfig = {
    host: env.IRC_HOST || 'localhost',
    port: readInt(env, 'IRC_PORT', 6667, 65535),
    expectTimeoutMs: readInt(env, 'EXPECT_TIMEOUT_MS', DEFAULT_TIMEOUTS.expectTimeoutMs),
    registrationTimeoutMs: readInt(env, 'REGISTRATION_TIMEOUT_MS', DEFAULT_TIMEOUTS.registrationTimeoutMs),
    scenarioTimeoutMs: readInt(env, 'SCENARIO_TIMEOUT_MS', DEFAULT_TIMEOUTS.scenarioTimeoutMs),
    quietPeriodMs: readInt(env, 'QUIET_PERIOD_MS', DEFAULT_TIMEOUTS.quietPeriodMs),
    debug: isDebugEnabled(env),
    ...overrides,
  };
  if (env.IRC_PASSWORD && overrides.password === undefined) {
    config.password = env.IRC_PASSWORD;
  }
  return config;
}
