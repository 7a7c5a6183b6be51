import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Orchestrator, type OrchestratorOptions } from './orchestrator.js';
import type { Scenario, ScenarioBody } from './types.js';
import { command, pongOf } from '../client/matchers.js';
import { ScenarioError, SuiteAbortError } from '../errors.js';
import { MockIrcd, type MockIrcdOptions } from '../helpers/mock-ircd.js';

const quiet = { debug: () => {}, info: () => {}, warn: () => {} };

function scenario(name: string, run: ScenarioBody): Scenario {
  return { name, description: name, run };
}

async function closedPort(): Promise<number> {
  const probe = new MockIrcd({ logger: quiet });
  const port = await probe.listen();
  await probe.close();
  return port;
}

describe('Orchestrator', () => {
  let ircd: MockIrcd;
  let port: number;

  async function startIrcd(options: MockIrcdOptions = {}): Promise<void> {
    await ircd.close();
    ircd = new MockIrcd({ logger: quiet, ...options });
    port = await ircd.listen();
  }

  function orchestrator(options: Partial<OrchestratorOptions> = {}): Orchestrator {
    return new Orchestrator({
      host: '127.0.0.1',
      port,
      expectTimeoutMs: 1000,
      registrationTimeoutMs: 2000,
      scenarioTimeoutMs: 5000,
      quietPeriodMs: 100,
      logger: quiet,
      ...options,
    });
  }

  beforeEach(async () => {
    ircd = new MockIrcd({ logger: quiet });
    port = await ircd.listen();
  });

  afterEach(async () => {
    await ircd.close();
  });

  describe('verdicts', () => {
    it('passes with the returned detail as first diagnostic, then notes', async () => {
      const result = await orchestrator().runScenario(
        scenario('ok', async ctx => {
          await ctx.connect();
          ctx.note('noted');
          return 'done';
        }),
        'unit'
      );

      expect(result).toMatchObject({
        suite: 'unit',
        name: 'ok',
        verdict: 'pass',
        diagnostics: ['done', 'noted'],
        connectFailed: false,
      });
      expect(Object.isFrozen(result)).toBe(true);
    });

    it('fails on an engine error and keeps its description', async () => {
      const result = await orchestrator().runScenario(
        scenario('bad', async () => {
          throw new ScenarioError('bob never saw the JOIN');
        })
      );

      expect(result.suite).toBe('adhoc');
      expect(result.verdict).toBe('fail');
      expect(result.diagnostics).toEqual(['bob never saw the JOIN']);
    });

    it('reports an expectation timeout as a failure with the unmatched traffic', async () => {
      const result = await orchestrator().runScenario(
        scenario('silent', async ctx => {
          const alice = await ctx.connect({ nick: 'alice' });
          await alice.expect(command('JOIN'), 50);
        })
      );

      expect(result.verdict).toBe('fail');
      expect(result.diagnostics).toEqual([
        'Timeout after 50ms waiting for JOIN on alice',
        'unmatched: :mock.ircd 422 alice :MOTD File is missing',
      ]);
    });

    it('treats an unexpected exception as an error of the run', async () => {
      const result = await orchestrator().runScenario(
        scenario('crash', async () => {
          throw new TypeError('undefined is not a function');
        })
      );

      expect(result.verdict).toBe('error');
      expect(result.diagnostics).toEqual(['undefined is not a function']);
    });

    it('turns a pass into a failure when the server sent a malformed line', async () => {
      await startIrcd({ faults: { malformedAfterWelcome: true } });

      const result = await orchestrator().runScenario(
        scenario('ping', async ctx => {
          const alice = await ctx.connect({ nick: 'alice' });
          alice.send('PING', 'tok');
          await alice.expect(pongOf('tok'));
          return 'PONG received';
        })
      );

      expect(result.verdict).toBe('fail');
      expect(result.diagnostics).toEqual([
        'PONG received',
        'alice: malformed line from server: Missing command: ":mock.ircd"',
      ]);
    });

    it('fails a registration the server rejects, quoting the reply', async () => {
      await startIrcd({ password: 'test-secret' });

      const result = await orchestrator({ password: 'test-secret' }).runScenario(
        scenario('no-pass', async ctx => {
          await ctx.connect({ nick: 'bob' });
          await ctx.connect({ nick: 'alice', password: null });
        })
      );

      expect(result.verdict).toBe('fail');
      expect(result.diagnostics).toEqual([
        'Registration of alice rejected with 464',
        'reply: :mock.ircd 464 alice :Password incorrect',
      ]);
    });

    it('marks a scenario that could not connect', async () => {
      const unreachable = await closedPort();

      const result = await orchestrator({ port: unreachable, connectTimeoutMs: 2000 }).runScenario(
        scenario('offline', async ctx => {
          await ctx.connect();
        })
      );

      expect(result.verdict).toBe('error');
      expect(result.connectFailed).toBe(true);
      expect(result.diagnostics[0]).toMatch(new RegExp(`^Cannot connect to 127\\.0\\.0\\.1:${unreachable}: `));
    });
  });

  describe('scenario timeout', () => {
    it('ends a hung scenario as an error, names the waiting barrier and closes its sessions', async () => {
      const runner = orchestrator({ scenarioTimeoutMs: 200 });

      const result = await runner.runScenario(
        scenario('hung', async ctx => {
          const [alice] = await ctx.users(2);
          await ctx.barrier('both-joined', 2);
          await alice.expect(command('JOIN'), 5000);
        })
      );

      expect(result.verdict).toBe('error');
      expect(result.diagnostics).toEqual(['scenario timeout after 200ms', "barrier 'both-joined': 1/2 arrived"]);
      expect(result.durationMs).toBeGreaterThanOrEqual(190);
      await vi.waitFor(() => {
        expect(ircd.clientCount).toBe(0);
      });
    });
  });

  describe('bookkeeping', () => {
    it('records results in completion order', async () => {
      const runner = orchestrator();
      await runner.runScenario(scenario('first', async () => 'one'));
      await runner.runScenario(scenario('second', async () => 'two'));

      expect(runner.results.map(result => result.name)).toEqual(['first', 'second']);
    });

    it('generates short unique nicks and channels', () => {
      const runner = orchestrator({ nickPrefix: 'q' });
      const first = runner.nick();
      const second = runner.nick();

      expect(first).toMatch(/^q[0-9a-f]{3}1$/);
      expect(second).toBe(`${first.slice(0, -1)}2`);
      expect(runner.channel()).toMatch(/^#c[0-9a-f]{3}1$/);
    });

    it('selects scenarios by bare or suite-qualified name', () => {
      const runner = orchestrator({ only: ['join-channel', 'multi-user/invite'] });
      const noop: ScenarioBody = async () => undefined;

      expect(runner.selects('single-user', scenario('join-channel', noop))).toBe(true);
      expect(runner.selects('multi-user', scenario('invite', noop))).toBe(true);
      expect(runner.selects('single-user', scenario('invite', noop))).toBe(false);
      expect(orchestrator().selects('any', scenario('anything', noop))).toBe(true);
    });

    it('probe succeeds against a listening server', async () => {
      await expect(orchestrator().probe()).resolves.toBeUndefined();
    });

    it('probe aborts the run when the server is unreachable', async () => {
      const unreachable = await closedPort();
      const attempt = orchestrator({ port: unreachable }).probe();

      await expect(attempt).rejects.toBeInstanceOf(SuiteAbortError);
      await expect(attempt).rejects.toThrow(`Server 127.0.0.1:${unreachable} is unreachable`);
    });
  });
});
