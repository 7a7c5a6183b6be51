import type { ClientSession } from '../client/session.js';
import type { Orchestrator } from './orchestrator.js';

export type Verdict = 'pass' | 'fail' | 'error';

export interface ScenarioResult {
  readonly suite: string;
  readonly name: string;
  readonly verdict: Verdict;
  /** Human-readable details; failures quote the raw lines involved */
  readonly diagnostics: readonly string[];
  readonly durationMs: number;
  /** The scenario never reached the server */
  readonly connectFailed: boolean;
}

export interface SessionRequest {
  /** Defaults to a fresh unique nick */
  nick?: string;
  username?: string;
  realname?: string;
  /** Send PASS/NICK/USER and wait for RPL_WELCOME (default true) */
  register?: boolean;
  /** Overrides the configured server password; null sends no PASS */
  password?: string | null;
}

/**
 * What a scenario body gets to work with. Sessions created here belong to
 * the scenario alone and are closed when it ends, whatever the outcome.
 */
export interface ScenarioContext {
  readonly scenario: string;
  /** Default expect() timeout */
  readonly timeoutMs: number;
  /** Window used to check that something does NOT arrive */
  readonly quietMs: number;
  /** Configured server password, if any */
  readonly password: string | undefined;
  connect(request?: SessionRequest): Promise<ClientSession>;
  /** Connect and register several sessions concurrently */
  users(count: number): Promise<ClientSession[]>;
  /**
   * Rendezvous: resolves once `parties` concurrent steps have reached the
   * same label.
   */
  barrier(label: string, parties?: number): Promise<void>;
  /** Fresh channel name, unique for this orchestrator */
  channel(): string;
  /** Fresh nick, unique for this orchestrator */
  nick(): string;
  /** Add a diagnostic line to the result */
  note(text: string): void;
}

/**
 * Scenario body; a returned string becomes the first diagnostic of a pass.
 */
export type ScenarioBody = (ctx: ScenarioContext) => Promise<string | void>;

export interface Scenario {
  name: string;
  description: string;
  run: ScenarioBody;
}

/**
 * Anything that can run against an orchestrator and report results.
 */
export interface Suite {
  readonly name: string;
  readonly scenarios: readonly Scenario[];
  run(orchestrator: Orchestrator): Promise<ScenarioResult[]>;
}
