/**
 * Error taxonomy for the conformance engine.
 *
 * Every failure a scenario can hit is one of these classes, so the
 * orchestrator can turn it into a verdict without inspecting messages.
 */

import type { ScenarioResult } from './orchestrator/types.js';

export class ConformanceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed wire data, inbound or outbound.
 */
export class ParseError extends ConformanceError {
  constructor(
    message: string,
    /** The offending line, without terminator */
    readonly line: string
  ) {
    super(`${message}: ${JSON.stringify(line.length > 80 ? `${line.slice(0, 80)}...` : line)}`);
  }
}

export class ConnectError extends ConformanceError {
  constructor(
    readonly host: string,
    readonly port: number,
    options?: ErrorOptions
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : 'unknown error';
    super(`Cannot connect to ${host}:${port}: ${reason}`, options);
  }
}

export class ConnectionClosedError extends ConformanceError {
  constructor(
    readonly reason: string,
    /** Raw lines still queued and never matched when the connection went away */
    readonly unmatched: string[] = []
  ) {
    super(`Connection closed: ${reason}`);
  }
}

export class RegistrationError extends ConformanceError {
  constructor(
    message: string,
    /** Numeric or command that rejected the registration, if any */
    readonly code: string | null = null,
    /** Raw line of the rejecting reply */
    readonly reply: string | null = null,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class TimeoutError extends ConformanceError {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
    readonly unmatched: string[]
  ) {
    super(`Timeout after ${timeoutMs}ms waiting for ${label}`);
  }
}

/**
 * Assertion failure inside scenario logic.
 */
export class ScenarioError extends ConformanceError {}

export class ScenarioTimeoutError extends ConformanceError {
  constructor(readonly timeoutMs: number) {
    super(`scenario timeout after ${timeoutMs}ms`);
  }
}

/**
 * The server could not be reached at all, so no suite result is meaningful.
 */
export class SuiteAbortError extends ConformanceError {
  constructor(
    message: string,
    readonly results: ScenarioResult[] = [],
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Diagnostic lines for a failure, quoting every raw message it carries.
 */
export function describeFailure(error: unknown): string[] {
  if (!(error instanceof Error)) {
    return [String(error)];
  }

  const lines = [error.message];
  if (error instanceof RegistrationError && error.reply) {
    lines.push(`reply: ${error.reply}`);
  }
  if (error instanceof TimeoutError || error instanceof ConnectionClosedError) {
    if (error.unmatched.length === 0) {
      lines.push('unmatched: (nothing received)');
    }
    for (const line of error.unmatched) {
      lines.push(`unmatched: ${line}`);
    }
  }
  if (error.cause instanceof Error && !(error instanceof ConnectError)) {
    lines.push(`caused by: ${error.cause.message}`);
  }
  return lines;
}
