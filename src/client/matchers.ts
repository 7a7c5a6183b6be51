/**
 * Expectation Matchers
 *
 * Labelled predicates over messages, and window operations that search a
 * session's queue forward instead of asserting on "the next line". Separate
 * connections give no ordering guarantee, so a broadcast may arrive after
 * unrelated traffic (server PING, notices, other users' JOINs); that traffic
 * is skipped, not treated as a failure.
 */

import type { ClientSession } from './session.js';
import { ScenarioError, TimeoutError } from '../errors.js';
import {
  ircEquals,
  messageArgs,
  serializeMessage,
  sourceNick,
  type IRCMessage,
  type InboundMessage,
} from '../protocol/message.js';

/**
 * A predicate with a human-readable label for timeout diagnostics.
 */
export type MessageMatcher = ((message: IRCMessage) => boolean) & { readonly label: string };

/** Positional argument expectation; undefined matches anything */
export type ArgPattern = string | RegExp | undefined;

export function matcher(label: string, predicate: (message: IRCMessage) => boolean): MessageMatcher {
  return Object.assign((message: IRCMessage) => predicate(message), { label });
}

function argMatches(actual: string | undefined, expected: ArgPattern): boolean {
  if (expected === undefined) return true;
  if (actual === undefined) return false;
  return typeof expected === 'string' ? ircEquals(actual, expected) : expected.test(actual);
}

function formatArgs(args: ArgPattern[]): string {
  return args.map(arg => (arg === undefined ? '*' : String(arg))).join(' ');
}

/**
 * Exact command, plus positional arguments (trailing included) when given.
 */
export function command(name: string, ...args: ArgPattern[]): MessageMatcher {
  const upper = name.toUpperCase();
  const label = args.length > 0 ? `${upper} ${formatArgs(args)}` : upper;
  return matcher(label, message => {
    if (message.command.toUpperCase() !== upper) return false;
    const actual = messageArgs(message);
    return args.every((expected, i) => argMatches(actual[i], expected));
  });
}

/**
 * Any of the given numeric reply codes.
 */
export function numeric(...codes: string[]): MessageMatcher {
  return matcher(`numeric ${codes.join('/')}`, message => codes.includes(message.command));
}

/**
 * Any message from the given nick whose first parameter is the target.
 */
export function fromTo(nick: string, target: string): MessageMatcher {
  return matcher(`message from ${nick} to ${target}`, message => {
    const from = sourceNick(message);
    const to = messageArgs(message)[0];
    return from !== null && to !== undefined && ircEquals(from, nick) && ircEquals(to, target);
  });
}

/**
 * Any parameter equal to the value (IRC case-insensitive).
 */
export function mentions(value: string): MessageMatcher {
  return matcher(`mentioning ${value}`, message =>
    messageArgs(message).some(arg => ircEquals(arg, value))
  );
}

export function from(nick: string): MessageMatcher {
  return matcher(`from ${nick}`, message => {
    const source = sourceNick(message);
    return source !== null && ircEquals(source, nick);
  });
}

export function allOf(...matchers: MessageMatcher[]): MessageMatcher {
  return matcher(matchers.map(m => m.label).join(' and '), message => matchers.every(m => m(message)));
}

export function anyOf(...matchers: MessageMatcher[]): MessageMatcher {
  return matcher(matchers.map(m => m.label).join(' or '), message => matchers.some(m => m(message)));
}

export function not(inner: MessageMatcher): MessageMatcher {
  return matcher(`not (${inner.label})`, message => !inner(message));
}

// ============================================================================
// Command shorthands
// ============================================================================

export function privmsg(options: { from?: string; to?: string; text?: string | RegExp }): MessageMatcher {
  const { from: sender, to, text } = options;
  const parts = ['PRIVMSG'];
  if (sender) parts.push(`from ${sender}`);
  if (to) parts.push(`to ${to}`);
  if (text !== undefined) parts.push(`text ${String(text)}`);
  return matcher(parts.join(' '), message => {
    if (message.command.toUpperCase() !== 'PRIVMSG') return false;
    if (sender && !from(sender)(message)) return false;
    const [target, body] = messageArgs(message);
    if (to && (target === undefined || !ircEquals(target, to))) return false;
    if (text !== undefined) {
      if (body === undefined) return false;
      return typeof text === 'string' ? body === text : text.test(body);
    }
    return true;
  });
}

export function joinOf(channel: string, nick?: string): MessageMatcher {
  const base = command('JOIN', channel);
  return nick ? allOf(base, from(nick)) : base;
}

export function partOf(channel: string, nick?: string): MessageMatcher {
  const base = command('PART', channel);
  return nick ? allOf(base, from(nick)) : base;
}

export function kickOf(channel: string, kicked: string): MessageMatcher {
  return command('KICK', channel, kicked);
}

export function modeOf(target: string, modes: string, ...args: string[]): MessageMatcher {
  return command('MODE', target, modes, ...args);
}

export function topicOf(channel: string, topic?: string): MessageMatcher {
  return command('TOPIC', channel, topic);
}

export function inviteOf(nick: string, channel: string): MessageMatcher {
  return command('INVITE', nick, channel);
}

/**
 * PONG carrying the token in any parameter.
 */
export function pongOf(token: string): MessageMatcher {
  return matcher(`PONG ${token}`, message =>
    message.command.toUpperCase() === 'PONG' && messageArgs(message).includes(token)
  );
}

export function nickChange(oldNick: string, newNick: string): MessageMatcher {
  return allOf(command('NICK', newNick), from(oldNick));
}

/**
 * Numeric reply that refers to the given channel or nick.
 */
export function replyAbout(code: string, subject: string): MessageMatcher {
  return allOf(numeric(code), mentions(subject));
}

// ============================================================================
// Window operations
// ============================================================================

/**
 * Raw lines for diagnostics, re-serialized when a message has no raw form.
 */
export function describeMessages(messages: IRCMessage[]): string[] {
  return messages.map(message => {
    if ('raw' in message && typeof message.raw === 'string') {
      return message.raw;
    }
    return serializeMessage(message);
  });
}

/**
 * Pair each matcher with a different candidate message.
 *
 * Augmenting-path bipartite matching, trying candidates in arrival order so
 * the earliest messages are preferred when several assignments exist.
 *
 * @returns Candidate index per matcher, or null when some matcher cannot get a message of its own
 */
export function assignDistinct(matchers: MessageMatcher[], candidates: IRCMessage[]): number[] | null {
  const edges = matchers.map(m => candidates.flatMap((message, index) => (m(message) ? [index] : [])));
  const owner = new Array<number>(candidates.length).fill(-1);

  const claim = (matcherIndex: number, visited: Set<number>): boolean => {
    for (const candidate of edges[matcherIndex]) {
      if (visited.has(candidate)) continue;
      visited.add(candidate);
      const current = owner[candidate];
      if (current === -1 || claim(current, visited)) {
        owner[candidate] = matcherIndex;
        return true;
      }
    }
    return false;
  };

  for (let i = 0; i < matchers.length; i++) {
    if (!claim(i, new Set())) return null;
  }

  const assignment = new Array<number>(matchers.length).fill(-1);
  owner.forEach((matcherIndex, candidate) => {
    if (matcherIndex !== -1) assignment[matcherIndex] = candidate;
  });
  return assignment;
}

/**
 * Wait until every matcher has been satisfied by a distinct message, in any
 * arrival order, within one shared window. Nothing is consumed unless the
 * whole set is.
 *
 * @returns Matched messages in matcher order
 */
export async function expectAll(
  session: ClientSession,
  matchers: MessageMatcher[],
  windowMs: number = session.defaultTimeoutMs
): Promise<InboundMessage[]> {
  return session.expectEach(matchers, windowMs);
}

/**
 * Wait for the first message satisfying any matcher.
 */
export async function expectAny(
  session: ClientSession,
  matchers: MessageMatcher[],
  windowMs: number = session.defaultTimeoutMs
): Promise<{ index: number; message: InboundMessage }> {
  const message = await session.expect(anyOf(...matchers), windowMs);
  return { index: matchers.findIndex(m => m(message)), message };
}

/**
 * Watch the session for the whole window and fail if a matching message
 * arrives. Matching messages already queued count too.
 *
 * @throws ScenarioError quoting the unexpected message
 */
export async function expectNone(
  session: ClientSession,
  unwanted: MessageMatcher,
  windowMs: number
): Promise<void> {
  let message: InboundMessage;
  try {
    message = await session.expect(unwanted, windowMs);
  } catch (error) {
    if (error instanceof TimeoutError) return;
    throw error;
  }
  throw new ScenarioError(`${session.nick} unexpectedly received ${unwanted.label}: ${message.raw}`);
}
