/**
 * Scenario Assertion Helpers
 *
 * Throwing checks for scenario bodies. Failures raise ScenarioError and
 * quote the message that failed, so the report shows what the server
 * actually sent.
 */

import { ScenarioError } from '../errors.js';
import {
  ircEquals,
  messageArgs,
  serializeMessage,
  sourceNick,
  type IRCMessage,
} from '../protocol/message.js';

function quote(msg: IRCMessage): string {
  return 'raw' in msg && typeof msg.raw === 'string' ? msg.raw : serializeMessage(msg);
}

/**
 * Fail the scenario unless the condition holds.
 */
export function check(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new ScenarioError(message);
  }
}

/**
 * Assert that a message is a specific numeric reply.
 */
export function assertNumeric(
  msg: IRCMessage,
  numeric: number | string,
  options?: {
    params?: (string | RegExp | null)[];
  }
): void {
  const expectedNumeric = String(numeric).padStart(3, '0');
  if (msg.command !== expectedNumeric) {
    throw new ScenarioError(`Expected numeric ${expectedNumeric}, got ${quote(msg)}`);
  }

  if (options?.params) {
    const args = messageArgs(msg);
    for (let i = 0; i < options.params.length; i++) {
      const expected = options.params[i];
      if (expected === null) continue;

      const actual = args[i] ?? '';
      const ok = typeof expected === 'string' ? ircEquals(actual, expected) : expected.test(actual);
      if (!ok) {
        throw new ScenarioError(`Param ${i}: expected ${String(expected)}, got '${actual}' in ${quote(msg)}`);
      }
    }
  }
}

/**
 * Assert that a message is a PRIVMSG with expected properties.
 */
export function assertPrivmsg(
  msg: IRCMessage,
  options: {
    sender?: string;
    target?: string;
    text?: string | RegExp;
  }
): void {
  if (msg.command !== 'PRIVMSG') {
    throw new ScenarioError(`Expected PRIVMSG, got ${quote(msg)}`);
  }

  const [target, text = ''] = messageArgs(msg);
  const sender = sourceNick(msg);

  if (options.sender && (sender === null || !ircEquals(sender, options.sender))) {
    throw new ScenarioError(`Expected sender '${options.sender}', got ${quote(msg)}`);
  }

  if (options.target && (target === undefined || !ircEquals(target, options.target))) {
    throw new ScenarioError(`Expected target '${options.target}', got ${quote(msg)}`);
  }

  if (options.text !== undefined) {
    const ok = typeof options.text === 'string' ? text === options.text : options.text.test(text);
    if (!ok) {
      throw new ScenarioError(`Expected text ${String(options.text)}, got ${quote(msg)}`);
    }
  }
}

/**
 * Assert that a message is a JOIN with expected properties.
 */
export function assertJoin(
  msg: IRCMessage,
  options: {
    nick?: string;
    channel?: string;
  }
): void {
  if (msg.command !== 'JOIN') {
    throw new ScenarioError(`Expected JOIN, got ${quote(msg)}`);
  }

  const nick = sourceNick(msg);
  if (options.nick && (nick === null || !ircEquals(nick, options.nick))) {
    throw new ScenarioError(`Expected nick '${options.nick}', got ${quote(msg)}`);
  }

  const channel = messageArgs(msg)[0];
  if (options.channel && (channel === undefined || !ircEquals(channel, options.channel))) {
    throw new ScenarioError(`Expected channel '${options.channel}', got ${quote(msg)}`);
  }
}

/**
 * Assert that a message is a MODE with expected properties.
 */
export function assertMode(
  msg: IRCMessage,
  options: {
    target?: string;
    modes?: string;
    args?: string[];
  }
): void {
  if (msg.command !== 'MODE') {
    throw new ScenarioError(`Expected MODE, got ${quote(msg)}`);
  }

  const [target, modes, ...actualArgs] = messageArgs(msg);

  if (options.target && (target === undefined || !ircEquals(target, options.target))) {
    throw new ScenarioError(`Expected target '${options.target}', got ${quote(msg)}`);
  }

  if (options.modes && modes !== options.modes) {
    throw new ScenarioError(`Expected modes '${options.modes}', got ${quote(msg)}`);
  }

  if (options.args) {
    for (let i = 0; i < options.args.length; i++) {
      const actual = actualArgs[i];
      if (actual === undefined || !ircEquals(actual, options.args[i])) {
        throw new ScenarioError(`Mode arg ${i}: expected '${options.args[i]}', got ${quote(msg)}`);
      }
    }
  }
}

/**
 * Assert that a message is a KICK with expected properties.
 */
export function assertKick(
  msg: IRCMessage,
  options: {
    channel?: string;
    kicked?: string;
    by?: string;
    reason?: string | RegExp;
  }
): void {
  if (msg.command !== 'KICK') {
    throw new ScenarioError(`Expected KICK, got ${quote(msg)}`);
  }

  const [channel, kicked, reason = ''] = messageArgs(msg);

  if (options.channel && (channel === undefined || !ircEquals(channel, options.channel))) {
    throw new ScenarioError(`Expected channel '${options.channel}', got ${quote(msg)}`);
  }

  if (options.kicked && (kicked === undefined || !ircEquals(kicked, options.kicked))) {
    throw new ScenarioError(`Expected kicked user '${options.kicked}', got ${quote(msg)}`);
  }

  const by = sourceNick(msg);
  if (options.by && (by === null || !ircEquals(by, options.by))) {
    throw new ScenarioError(`Expected kicked by '${options.by}', got ${quote(msg)}`);
  }

  if (options.reason) {
    const ok = typeof options.reason === 'string' ? reason.includes(options.reason) : options.reason.test(reason);
    if (!ok) {
      throw new ScenarioError(`Expected reason ${String(options.reason)}, got ${quote(msg)}`);
    }
  }
}
