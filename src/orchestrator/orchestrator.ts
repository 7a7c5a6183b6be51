import { randomUUID } from 'crypto';
import { BarrierSet } from './barrier.js';
import type { Scenario, ScenarioContext, ScenarioResult, SessionRequest, Verdict } from './types.js';
import { Connection } from '../client/connection.js';
import { ClientSession, type Endpoint, type SessionOptions } from '../client/session.js';
import {
  ConformanceError,
  ConnectError,
  ScenarioError,
  ScenarioTimeoutError,
  SuiteAbortError,
  describeFailure,
} from '../errors.js';
import { DEFAULT_TIMEOUTS } from '../config.js';
import { createLogger, type Logger } from '../log.js';

export interface OrchestratorOptions {
  host: string;
  port: number;
  /** Sent with PASS on every registration */
  password?: string;
  expectTimeoutMs?: number;
  registrationTimeoutMs?: number;
  scenarioTimeoutMs?: number;
  quietPeriodMs?: number;
  connectTimeoutMs?: number;
  /** Run only these scenarios ('name' or 'suite/name') */
  only?: string[];
  /** First letter(s) of generated nicks (default 't') */
  nickPrefix?: string;
  logger?: Logger;
}

type Outcome = { ok: true; detail: string | void } | { ok: false; error: unknown };

/**
 * Engine errors are failures of the server under test; anything else
 * (including the scenario running out of time) is an error of the run.
 */
function classify(error: unknown): Verdict {
  if (error instanceof ScenarioTimeoutError || error instanceof ConnectError) {
    return 'error';
  }
  return error instanceof ConformanceError ? 'fail' : 'error';
}

/**
 * Creates sessions for scenarios, runs them under a timeout, always tears
 * them down, and collects one result per scenario.
 */
export class Orchestrator {
  private readonly collected: ScenarioResult[] = [];
  private readonly tag = randomUUID().replace(/-/g, '').slice(0, 3);
  private nickCounter = 0;
  private channelCounter = 0;
  private readonly log: Logger;

  readonly endpoint: Endpoint;
  readonly expectTimeoutMs: number;
  readonly registrationTimeoutMs: number;
  readonly scenarioTimeoutMs: number;
  readonly quietPeriodMs: number;

  constructor(private readonly options: OrchestratorOptions) {
    this.endpoint = { host: options.host, port: options.port };
    this.expectTimeoutMs = options.expectTimeoutMs ?? DEFAULT_TIMEOUTS.expectTimeoutMs;
    this.registrationTimeoutMs = options.registrationTimeoutMs ?? DEFAULT_TIMEOUTS.registrationTimeoutMs;
    this.scenarioTimeoutMs = options.scenarioTimeoutMs ?? DEFAULT_TIMEOUTS.scenarioTimeoutMs;
    this.quietPeriodMs = options.quietPeriodMs ?? DEFAULT_TIMEOUTS.quietPeriodMs;
    this.log = options.logger ?? createLogger('orchestrator');
  }

  /**
   * Every result recorded so far, in completion order.
   */
  get results(): readonly ScenarioResult[] {
    return [...this.collected];
  }

  /**
   * Fresh nick, short enough for servers that enforce the RFC 1459 limit of 9.
   */
  nick(): string {
    return `${this.options.nickPrefix ?? 't'}${this.tag}${(++this.nickCounter).toString(36)}`;
  }

  channel(): string {
    return `#c${this.tag}${(++this.channelCounter).toString(36)}`;
  }

  selects(suite: string, scenario: Scenario): boolean {
    const { only } = this.options;
    if (!only || only.length === 0) return true;
    return only.includes(scenario.name) || only.includes(`${suite}/${scenario.name}`);
  }

  /**
   * Check that the server accepts TCP connections at all.
   *
   * @throws SuiteAbortError when it does not
   */
  async probe(): Promise<void> {
    const { host, port } = this.endpoint;
    let connection: Connection;
    try {
      connection = await Connection.connect(host, port, { timeoutMs: this.options.connectTimeoutMs });
    } catch (error) {
      throw new SuiteAbortError(`Server ${host}:${port} is unreachable`, [], { cause: error });
    }
    connection.close('probe');
  }

  private sessionOptions(): SessionOptions {
    return {
      expectTimeoutMs: this.expectTimeoutMs,
      registrationTimeoutMs: this.registrationTimeoutMs,
      connectTimeoutMs: this.options.connectTimeoutMs,
      logger: this.options.logger,
    };
  }

  private record(result: ScenarioResult): void {
    // One synchronous append: parallel suites cannot interleave inside it
    this.collected.push(result);
  }

  /**
   * Run one scenario and return (and record) its result. Never throws.
   */
  async runScenario(scenario: Scenario, suite = 'adhoc'): Promise<ScenarioResult> {
    const started = Date.now();
    const sessions: ClientSession[] = [];
    const notes: string[] = [];
    const barriers = new BarrierSet();
    let finished = false;
    let connectFailed = false;

    this.log.debug(`${suite}/${scenario.name}: start`);

    const ctx: ScenarioContext = {
      scenario: scenario.name,
      timeoutMs: this.expectTimeoutMs,
      quietMs: this.quietPeriodMs,
      password: this.options.password,

      connect: async (request: SessionRequest = {}) => {
        if (finished) {
          throw new ScenarioError(`${scenario.name} already finished`);
        }
        let session: ClientSession;
        try {
          session = await ClientSession.open(
            this.endpoint,
            { nick: request.nick ?? this.nick(), username: request.username, realname: request.realname },
            this.sessionOptions()
          );
        } catch (error) {
          if (error instanceof ConnectError) connectFailed = true;
          throw error;
        }
        sessions.push(session);
        if (finished) {
          await session.close();
          throw new ScenarioError(`${scenario.name} already finished`);
        }
        if (request.register !== false) {
          const password = request.password === undefined ? this.options.password : request.password ?? undefined;
          await session.register(password);
        }
        return session;
      },

      users: count => Promise.all(Array.from({ length: count }, () => ctx.connect())),
      barrier: (label, parties) => barriers.arrive(label, parties),
      channel: () => this.channel(),
      nick: () => this.nick(),
      note: text => {
        notes.push(text);
      },
    };

    const body: Promise<Outcome> = Promise.resolve()
      .then(() => scenario.run(ctx))
      .then(
        (detail): Outcome => ({ ok: true, detail }),
        (error: unknown): Outcome => ({ ok: false, error })
      );

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<Outcome>(resolve => {
      timer = setTimeout(
        () => resolve({ ok: false, error: new ScenarioTimeoutError(this.scenarioTimeoutMs) }),
        this.scenarioTimeoutMs
      );
    });

    const outcome = await Promise.race([body, timeout]);
    clearTimeout(timer);

    const diagnostics: string[] = [];
    let verdict: Verdict;
    if (outcome.ok) {
      verdict = 'pass';
      if (typeof outcome.detail === 'string') diagnostics.push(outcome.detail);
    } else {
      verdict = classify(outcome.error);
      diagnostics.push(...describeFailure(outcome.error));
      for (const point of barriers.pending()) {
        diagnostics.push(`barrier '${point.label}': ${point.arrived}/${point.parties} arrived`);
      }
    }

    // Teardown: the scenario may still be running after a timeout; closing
    // its sessions fails whatever it is waiting on.
    finished = true;
    barriers.abort(new ScenarioError(`${scenario.name} ended`));
    await Promise.all(sessions.map(session => session.close()));

    diagnostics.push(...notes);
    for (const session of sessions) {
      for (const violation of session.protocolViolations) {
        diagnostics.push(`${session.nick}: malformed line from server: ${violation.reason}`);
      }
      if (session.dropped > 0) {
        diagnostics.push(`${session.nick}: ${session.dropped} inbound messages dropped at the queue limit`);
      }
    }
    if (verdict === 'pass' && sessions.some(session => session.protocolViolations.length > 0)) {
      verdict = 'fail';
    }

    const result: ScenarioResult = Object.freeze({
      suite,
      name: scenario.name,
      verdict,
      diagnostics: Object.freeze(diagnostics),
      durationMs: Date.now() - started,
      connectFailed,
    });
    this.record(result);
    this.log.debug(`${suite}/${scenario.name}: ${verdict} in ${result.durationMs}ms`);
    return result;
  }
}
