#!/usr/bin/env node
/**
 * Conformance runner
 *
 * Runs every suite against one IRC server and prints the report.
 *
 * Usage:
 *   npm run conformance -- --host irc.example.test --port 6667
 *   IRC_PASSWORD=test-secret npm run conformance -- --parallel
 *   npm run conformance -- --only join-channel,multi-user/invite
 *
 * Environment variables: see src/config.ts
 *
 * Exit codes: 0 all scenarios passed, 1 some did not, 2 the run was aborted.
 */

import { loadConfig, type ConformanceConfig } from '../config.js';
import { SuiteAbortError, describeFailure } from '../errors.js';
import { createLogger } from '../log.js';
import { printReport } from '../reporters/readable-report.js';
import { runAllSuites } from '../suites/index.js';
import { USAGE, parseCliArgs, type CliOptions } from './cli-args.js';

function configure(argv: string[]): { cli: CliOptions; config: ConformanceConfig } {
  const cli = parseCliArgs(argv);
  const env = { ...process.env };
  if (cli.host !== undefined) env.IRC_HOST = cli.host;
  if (cli.port !== undefined) env.IRC_PORT = cli.port;
  if (cli.password !== undefined) env.IRC_PASSWORD = cli.password;
  return { cli, config: loadConfig(env) };
}

async function main(): Promise<number> {
  let cli: CliOptions;
  let config: ConformanceConfig;
  try {
    ({ cli, config } = configure(process.argv.slice(2)));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    console.error(USAGE);
    return 2;
  }
  if (cli.help) {
    console.log(USAGE);
    return 0;
  }

  const log = createLogger('conformance', config.debug);
  log.info(`Testing ${config.host}:${config.port}${cli.parallel ? ' (suites in parallel)' : ''}`);

  const started = Date.now();
  const color = process.stdout.isTTY === true;
  try {
    const results = await runAllSuites(config.host, config.port, {
      password: config.password,
      expectTimeoutMs: config.expectTimeoutMs,
      registrationTimeoutMs: config.registrationTimeoutMs,
      scenarioTimeoutMs: config.scenarioTimeoutMs,
      quietPeriodMs: config.quietPeriodMs,
      only: cli.only,
      parallel: cli.parallel,
    });
    printReport(results, { color, durationMs: Date.now() - started });
    if (results.length === 0) {
      log.warn('No scenario matched --only');
    }
    return results.every(result => result.verdict === 'pass') ? 0 : 1;
  } catch (error) {
    if (!(error instanceof SuiteAbortError)) throw error;
    if (error.results.length > 0) {
      printReport(error.results, { color, durationMs: Date.now() - started });
    }
    for (const line of describeFailure(error)) {
      console.error(`Aborted: ${line}`);
    }
    return 2;
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 2;
  }
);
