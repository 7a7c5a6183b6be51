/**
 * Scenario steps shared by both suites.
 */

import type { ClientSession } from '../client/session.js';
import { anyOf, joinOf, numeric, replyAbout, type MessageMatcher } from '../client/matchers.js';
import { ScenarioError } from '../errors.js';
import { lastArg, messageArgs, type InboundMessage } from '../protocol/message.js';
import { JOIN_REJECTIONS, NUMERICS } from '../protocol/numerics.js';
import type { Scenario, ScenarioBody, ScenarioResult, Suite } from '../orchestrator/types.js';
import type { Orchestrator } from '../orchestrator/orchestrator.js';

const MODE_REFUSALS = [
  NUMERICS.ERR_NOSUCHCHANNEL,
  NUMERICS.ERR_USERNOTINCHANNEL,
  NUMERICS.ERR_NOTONCHANNEL,
  NUMERICS.ERR_NEEDMOREPARAMS,
  NUMERICS.ERR_UNKNOWNMODE,
  NUMERICS.ERR_CHANOPRIVSNEEDED,
];

function rejectionOf(channel: string): MessageMatcher {
  return anyOf(...JOIN_REJECTIONS.map(code => replyAbout(code, channel)));
}

function sendJoin(session: ClientSession, channel: string, key?: string): void {
  if (key === undefined) {
    session.send('JOIN', channel);
  } else {
    session.send('JOIN', channel, key);
  }
}

/**
 * JOIN and wait for the own JOIN echo and the end of NAMES.
 *
 * @returns Every name listed in the channel's NAMES replies, prefixes kept
 * @throws ScenarioError if the server refuses the join
 */
export async function joinChannel(session: ClientSession, channel: string, key?: string): Promise<string[]> {
  const since = session.mark();
  sendJoin(session, channel, key);

  const first = await session.expect(anyOf(joinOf(channel, session.nick), rejectionOf(channel)), { since });
  if (first.command !== 'JOIN') {
    throw new ScenarioError(`${session.nick} could not join ${channel}: ${first.raw}`);
  }

  const names: string[] = [];
  for (;;) {
    const reply = await session.expect(
      anyOf(replyAbout(NUMERICS.RPL_NAMREPLY, channel), replyAbout(NUMERICS.RPL_ENDOFNAMES, channel)),
      { since }
    );
    if (reply.command === NUMERICS.RPL_ENDOFNAMES) break;
    names.push(...(lastArg(reply) ?? '').split(' ').filter(Boolean));
  }
  return names;
}

/**
 * JOIN and require the given rejection numeric.
 *
 * @throws ScenarioError if the join succeeds or another rejection arrives
 */
export async function expectJoinRejected(
  session: ClientSession,
  channel: string,
  code: string,
  key?: string
): Promise<InboundMessage> {
  const since = session.mark();
  sendJoin(session, channel, key);

  const reply = await session.expect(anyOf(joinOf(channel, session.nick), rejectionOf(channel)), { since });
  if (reply.command === 'JOIN') {
    throw new ScenarioError(`${session.nick} joined ${channel}, expected ${code}: ${reply.raw}`);
  }
  if (reply.command !== code) {
    throw new ScenarioError(`${session.nick} expected ${code} joining ${channel}, got ${reply.raw}`);
  }
  return reply;
}

/**
 * Send a command and wait for one of the listed numerics, ignoring older
 * replies still queued.
 */
export async function sendAndExpectNumeric(
  session: ClientSession,
  codes: string[],
  command: string,
  ...params: string[]
): Promise<InboundMessage> {
  const since = session.mark();
  session.send(command, ...params);
  return session.expect(numeric(...codes), { since });
}

/**
 * Change a channel mode, then confirm it with a MODE query (324).
 *
 * Servers stay silent on a change that is already in effect, so the query is
 * what proves the change went through. Member modes (o) are not listed in
 * 324 and are only checked for a refusal.
 *
 * @throws ScenarioError if the change is refused or not reflected in 324
 */
export async function setChannelMode(
  session: ClientSession,
  channel: string,
  change: string,
  ...args: string[]
): Promise<InboundMessage> {
  const since = session.mark();
  session.send('MODE', channel, change, ...args);
  session.send('MODE', channel);

  const reply = await session.expect(
    anyOf(replyAbout(NUMERICS.RPL_CHANNELMODEIS, channel), numeric(...MODE_REFUSALS)),
    { since }
  );
  if (reply.command !== NUMERICS.RPL_CHANNELMODEIS) {
    throw new ScenarioError(`MODE ${channel} ${change} refused: ${reply.raw}`);
  }

  const current = messageArgs(reply)[2] ?? '';
  const adding = !change.startsWith('-');
  for (const letter of change.replace(/^[+-]/, '')) {
    if (letter === 'o') continue;
    if (current.includes(letter) !== adding) {
      throw new ScenarioError(`MODE ${channel} ${change} not in effect: ${reply.raw}`);
    }
  }
  return reply;
}

export function scenario(name: string, description: string, run: ScenarioBody): Scenario {
  return { name, description, run };
}

/**
 * A suite is just a named list of scenarios run one after another.
 */
export function defineSuite(name: string, scenarios: Scenario[]): Suite {
  return {
    name,
    scenarios,
    async run(orchestrator: Orchestrator): Promise<ScenarioResult[]> {
      const results: ScenarioResult[] = [];
      for (const item of scenarios) {
        if (!orchestrator.selects(name, item)) continue;
        results.push(await orchestrator.runScenario(item, name));
      }
      return results;
    },
  };
}
