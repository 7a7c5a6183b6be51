/**
 * Single-User Suite
 *
 * Scenarios that need exactly one session: registration, nick handling,
 * keepalive, channel membership and messages to oneself.
 */

import { assertNumeric, check } from '../client/assertions.js';
import {
  anyOf,
  expectNone,
  nickChange,
  numeric,
  partOf,
  pongOf,
  privmsg,
  topicOf,
} from '../client/matchers.js';
import { RegistrationError, ScenarioError } from '../errors.js';
import { ircEquals, lastArg, messageArgs } from '../protocol/message.js';
import { NUMERICS, numericName } from '../protocol/numerics.js';
import { defineSuite, joinChannel, scenario, sendAndExpectNumeric } from './steps.js';

const SEND_REFUSALS = [
  NUMERICS.ERR_NOSUCHNICK,
  NUMERICS.ERR_NOSUCHCHANNEL,
  NUMERICS.ERR_CANNOTSENDTOCHAN,
  NUMERICS.ERR_NORECIPIENT,
  NUMERICS.ERR_NOTEXTTOSEND,
];

function stripMemberPrefix(name: string): string {
  return name.replace(/^[@+]+/, '');
}

export const singleUserSuite = defineSuite('single-user', [
  scenario('connect', 'TCP connection to the server can be established', async ctx => {
    const session = await ctx.connect({ register: false });
    check(session.connectionState === 'connected', `connection is ${session.connectionState}`);
    return 'TCP connection established';
  }),

  scenario('registration', 'PASS, NICK and USER result in RPL_WELCOME', async ctx => {
    const session = await ctx.connect({ register: false });
    const welcome = await session.register(ctx.password);
    check(session.state === 'registered', `${session.nick} is ${session.state} after 001`);
    return `${session.nick}: ${lastArg(welcome) ?? 'welcome'}`;
  }),

  scenario('registration-bad-password', 'a wrong server password is refused', async ctx => {
    if (ctx.password === undefined) {
      return 'server password not configured; check skipped';
    }

    const session = await ctx.connect({ register: false });
    try {
      await session.register(`${ctx.password}-wrong`);
    } catch (error) {
      if (!(error instanceof RegistrationError) || error.code === null) throw error;
      check(
        error.code === NUMERICS.ERR_PASSWDMISMATCH || error.code === 'ERROR',
        `expected ${NUMERICS.ERR_PASSWDMISMATCH} for a wrong password, got ${error.reply ?? error.code}`
      );
      return `wrong password rejected with ${error.code}`;
    }
    throw new ScenarioError(`${session.nick} registered with a wrong password`);
  }),

  scenario('erroneous-nickname', 'a nick starting with a digit is refused with 432', async ctx => {
    const session = await ctx.connect({ nick: `9${ctx.nick()}`, register: false });
    try {
      await session.register(ctx.password);
    } catch (error) {
      if (!(error instanceof RegistrationError) || error.code === null) throw error;
      check(
        error.code === NUMERICS.ERR_ERRONEUSNICKNAME,
        `expected ${NUMERICS.ERR_ERRONEUSNICKNAME}, got ${error.reply ?? error.code}`
      );
      return `${session.nick} rejected with 432`;
    }
    throw new ScenarioError(`server accepted erroneous nick ${session.nick}`);
  }),

  scenario('nick-change', 'NICK changes the nickname of a registered user', async ctx => {
    const session = await ctx.connect();
    const oldNick = session.nick;
    const newNick = ctx.nick();

    const since = session.mark();
    session.send('NICK', newNick);
    const reply = await session.expect(
      anyOf(
        nickChange(oldNick, newNick),
        numeric(NUMERICS.ERR_ERRONEUSNICKNAME, NUMERICS.ERR_NICKNAMEINUSE, NUMERICS.ERR_NICKCOLLISION)
      ),
      { since }
    );
    if (reply.command !== 'NICK') {
      throw new ScenarioError(`NICK ${newNick} refused: ${reply.raw}`);
    }
    check(ircEquals(session.nick, newNick), `session still known as ${session.nick}`);
    return `${oldNick} -> ${newNick}`;
  }),

  scenario('ping-pong', 'the server answers PING with a PONG carrying the token', async ctx => {
    const session = await ctx.connect();
    const token = `tok${Date.now()}`;
    const since = session.mark();
    session.send('PING', token);
    await session.expect(pongOf(token), { since });
    return 'PONG received';
  }),

  scenario('join-channel', 'JOIN is echoed and followed by NAMES', async ctx => {
    const session = await ctx.connect();
    const channel = ctx.channel();
    const names = await joinChannel(session, channel);
    check(
      names.some(name => ircEquals(stripMemberPrefix(name), session.nick)),
      `${session.nick} missing from NAMES of ${channel}: ${names.join(' ')}`
    );
    return `Joined ${channel} (JOIN + NAMES received)`;
  }),

  scenario('part-channel', 'PART is echoed to the parting user', async ctx => {
    const session = await ctx.connect();
    const channel = ctx.channel();
    await joinChannel(session, channel);

    const since = session.mark();
    session.send('PART', channel, 'test leaving');
    await session.expect(partOf(channel, session.nick), { since });
    return `Parted ${channel}`;
  }),

  scenario('part-not-on-channel', 'PART of a channel the user is not on is refused', async ctx => {
    const session = await ctx.connect();
    const reply = await sendAndExpectNumeric(
      session,
      [NUMERICS.ERR_NOSUCHCHANNEL, NUMERICS.ERR_NOTONCHANNEL],
      'PART',
      ctx.channel()
    );
    return `${numericName(reply.command) ?? reply.command} (${reply.command})`;
  }),

  scenario('need-more-params', 'commands without parameters get 461', async ctx => {
    const session = await ctx.connect();
    for (const command of ['JOIN', 'PART']) {
      const reply = await sendAndExpectNumeric(session, [NUMERICS.ERR_NEEDMOREPARAMS], command);
      assertNumeric(reply, NUMERICS.ERR_NEEDMOREPARAMS, { params: [session.nick, command] });
    }
    return '461 for JOIN and PART';
  }),

  scenario('topic-view', 'TOPIC query returns 331 or 332', async ctx => {
    const session = await ctx.connect();
    const channel = ctx.channel();
    await joinChannel(session, channel);

    const reply = await sendAndExpectNumeric(session, [NUMERICS.RPL_NOTOPIC, NUMERICS.RPL_TOPIC], 'TOPIC', channel);
    assertNumeric(reply, reply.command, { params: [session.nick, channel] });
    return `${numericName(reply.command) ?? reply.command} (${reply.command})`;
  }),

  scenario('topic-set', 'the channel operator can set the topic', async ctx => {
    const session = await ctx.connect();
    const channel = ctx.channel();
    await joinChannel(session, channel);

    const topic = `Hello from ${session.nick}`;
    const since = session.mark();
    session.send('TOPIC', channel, topic);
    const reply = await session.expect(anyOf(topicOf(channel, topic), numeric(NUMERICS.ERR_CHANOPRIVSNEEDED)), {
      since,
    });
    if (reply.command !== 'TOPIC') {
      throw new ScenarioError(`TOPIC refused: ${reply.raw}`);
    }

    const current = await sendAndExpectNumeric(session, [NUMERICS.RPL_NOTOPIC, NUMERICS.RPL_TOPIC], 'TOPIC', channel);
    assertNumeric(current, NUMERICS.RPL_TOPIC, { params: [session.nick, channel] });
    check(lastArg(current) === topic, `topic reads back as ${current.raw}`);
    return `Topic set to: ${topic}`;
  }),

  scenario('mode-view', 'MODE query returns RPL_CHANNELMODEIS', async ctx => {
    const session = await ctx.connect();
    const channel = ctx.channel();
    await joinChannel(session, channel);

    const reply = await sendAndExpectNumeric(session, [NUMERICS.RPL_CHANNELMODEIS], 'MODE', channel);
    assertNumeric(reply, NUMERICS.RPL_CHANNELMODEIS, { params: [session.nick, channel] });
    const modes = messageArgs(reply).slice(2).join(' ');
    return `Channel modes: ${modes || '(none)'}`;
  }),

  scenario('privmsg-to-self', 'a PRIVMSG to the own nick comes back', async ctx => {
    const session = await ctx.connect();
    const text = `note to self ${Date.now()}`;
    const since = session.mark();
    session.send('PRIVMSG', session.nick, text);
    await session.expect(privmsg({ from: session.nick, to: session.nick, text }), { since });
    return 'PRIVMSG to self delivered';
  }),

  scenario('privmsg-to-channel', 'PRIVMSG to a joined channel is accepted', async ctx => {
    const session = await ctx.connect();
    const channel = ctx.channel();
    await joinChannel(session, channel);

    session.send('PRIVMSG', channel, 'Hello, world!');
    await expectNone(session, numeric(...SEND_REFUSALS), ctx.quietMs);
    return 'Message accepted (no error)';
  }),
]);
