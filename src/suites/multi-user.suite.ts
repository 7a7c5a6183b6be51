/**
 * Multi-User Suite
 *
 * Scenarios that need two or more sessions: message relay, channel
 * fan-out, and enforcement of operator-only commands and channel modes.
 */

import type { ClientSession } from '../client/session.js';
import { assertKick, assertNumeric, assertPrivmsg, check } from '../client/assertions.js';
import {
  allOf,
  anyOf,
  expectAll,
  expectNone,
  from,
  inviteOf,
  joinOf,
  kickOf,
  mentions,
  modeOf,
  numeric,
  partOf,
  privmsg,
  topicOf,
  type MessageMatcher,
} from '../client/matchers.js';
import { RegistrationError, ScenarioError } from '../errors.js';
import { ircEquals } from '../protocol/message.js';
import { NUMERICS } from '../protocol/numerics.js';
import { defineSuite, expectJoinRejected, joinChannel, scenario, setChannelMode } from './steps.js';

/**
 * Join the operator first, then the others; returns once the operator has
 * seen every other JOIN.
 */
async function joinAll(channel: string, op: ClientSession, ...others: ClientSession[]): Promise<void> {
  await joinChannel(op, channel);
  for (const session of others) {
    await joinChannel(session, channel);
  }
  await expectAll(
    op,
    others.map(session => joinOf(channel, session.nick))
  );
}

/**
 * Send a command and wait for either the refusal numeric or the effect it
 * must not have.
 *
 * @throws ScenarioError when the effect shows up instead of the refusal
 */
async function expectRefused(
  session: ClientSession,
  refusal: string,
  effect: MessageMatcher,
  commandName: string,
  ...params: string[]
): Promise<void> {
  const since = session.mark();
  session.send(commandName, ...params);
  const reply = await session.expect(anyOf(numeric(refusal), effect), { since });
  if (reply.command !== refusal) {
    throw new ScenarioError(`${commandName} by ${session.nick} was not refused: ${reply.raw}`);
  }
}

export const multiUserSuite = defineSuite('multi-user', [
  scenario('private-message', 'PRIVMSG from one user reaches another', async ctx => {
    const [sender, receiver] = await ctx.users(2);
    const text = `Hello from ${sender.nick}`;
    sender.send('PRIVMSG', receiver.nick, text);

    const message = await receiver.expect(privmsg({ from: sender.nick, to: receiver.nick }));
    assertPrivmsg(message, { text });
    return `${sender.nick} -> ${receiver.nick}`;
  }),

  scenario('nick-collision', 'a nick already in use is refused with 433', async ctx => {
    const owner = await ctx.connect();

    const newcomer = await ctx.connect({ nick: owner.nick, register: false });
    let refused: RegistrationError | null = null;
    try {
      await newcomer.register(ctx.password);
    } catch (error) {
      if (!(error instanceof RegistrationError) || error.code === null) throw error;
      refused = error;
    }
    if (!refused) {
      throw new ScenarioError(`${owner.nick} registered twice`);
    }
    check(
      refused.code === NUMERICS.ERR_NICKNAMEINUSE || refused.code === NUMERICS.ERR_NICKCOLLISION,
      `expected 433 registering ${owner.nick}, got ${refused.reply ?? refused.code}`
    );

    const other = await ctx.connect();
    const since = other.mark();
    other.send('NICK', owner.nick);
    const reply = await other.expect(
      anyOf(numeric(NUMERICS.ERR_NICKNAMEINUSE), allOf(from(other.nick), mentions(owner.nick))),
      { since }
    );
    assertNumeric(reply, NUMERICS.ERR_NICKNAMEINUSE, { params: [other.nick, owner.nick] });
    return '433 on registration and on NICK change';
  }),

  scenario('channel-broadcast', 'a channel message reaches every other member and no outsider', async ctx => {
    const [sender, first, second, outsider] = await ctx.users(4);
    const channel = ctx.channel();
    const text = `broadcast ${Date.now()}`;
    const delivered = privmsg({ from: sender.nick, to: channel, text });

    await Promise.all([
      (async () => {
        await joinChannel(sender, channel);
        await ctx.barrier('joined', 3);
        sender.send('PRIVMSG', channel, text);
      })(),
      ...[first, second].map(async member => {
        await joinChannel(member, channel);
        await ctx.barrier('joined', 3);
        await member.expect(delivered);
      }),
    ]);

    await expectNone(outsider, privmsg({ text }), ctx.quietMs);
    return `${first.nick} and ${second.nick} received it, ${outsider.nick} did not`;
  }),

  scenario('no-self-echo', 'the sender does not receive its own channel message', async ctx => {
    const [sender, member] = await ctx.users(2);
    const channel = ctx.channel();
    await joinAll(channel, sender, member);

    const text = `echo ${Date.now()}`;
    sender.send('PRIVMSG', channel, text);
    await member.expect(privmsg({ from: sender.nick, to: channel, text }));
    await expectNone(sender, privmsg({ to: channel, text }), ctx.quietMs);
    return 'Sender excluded from broadcast';
  }),

  scenario('operator-status', 'the first user to join is listed as operator in NAMES', async ctx => {
    const [op, regular] = await ctx.users(2);
    const channel = ctx.channel();
    const opName = `@${op.nick}`;

    const ownNames = await joinChannel(op, channel);
    check(
      ownNames.some(name => ircEquals(name, opName)),
      `${opName} missing from NAMES of ${channel}: ${ownNames.join(' ')}`
    );

    const seenByOthers = await joinChannel(regular, channel);
    check(
      seenByOthers.some(name => ircEquals(name, opName)),
      `${opName} missing from NAMES seen by ${regular.nick}: ${seenByOthers.join(' ')}`
    );
    return `${opName} in NAMES reply`;
  }),

  scenario('kick-by-operator', 'an operator can KICK a member, who then cannot speak there', async ctx => {
    const [op, target] = await ctx.users(2);
    const channel = ctx.channel();
    await joinAll(channel, op, target);

    op.send('KICK', channel, target.nick, 'test kick');
    const kick = await target.expect(kickOf(channel, target.nick));
    assertKick(kick, { channel, kicked: target.nick, by: op.nick, reason: 'test kick' });
    await op.expect(kickOf(channel, target.nick));

    target.send('PRIVMSG', channel, 'still here?');
    await expectNone(op, privmsg({ from: target.nick, to: channel }), ctx.quietMs);

    const refusal = target
      .drainUnexpected()
      .find(numeric(NUMERICS.ERR_NOSUCHCHANNEL, NUMERICS.ERR_CANNOTSENDTOCHAN, NUMERICS.ERR_NOTONCHANNEL));
    if (refusal) {
      ctx.note(`${target.nick} refused after KICK: ${refusal.raw}`);
    }
    return `${target.nick} kicked from ${channel}`;
  }),

  scenario('kick-without-privilege', 'a regular member cannot KICK (482)', async ctx => {
    const [op, regular] = await ctx.users(2);
    const channel = ctx.channel();
    await joinAll(channel, op, regular);

    await expectRefused(
      regular,
      NUMERICS.ERR_CHANOPRIVSNEEDED,
      kickOf(channel, op.nick),
      'KICK',
      channel,
      op.nick,
      'unauthorized'
    );
    await expectNone(op, kickOf(channel, op.nick), ctx.quietMs);
    return '482 ERR_CHANOPRIVSNEEDED received';
  }),

  scenario('kick-multiple-targets', 'one KICK with a comma-separated list removes every target', async ctx => {
    const [op, ...targets] = await ctx.users(4);
    const channel = ctx.channel();
    await joinAll(channel, op, ...targets);

    op.send('KICK', channel, targets.map(target => target.nick).join(','), 'test multiple targets');
    await expectAll(
      op,
      targets.map(target => kickOf(channel, target.nick))
    );
    await Promise.all(targets.map(target => target.expect(kickOf(channel, target.nick))));
    return `${targets.length} KICKs broadcast`;
  }),

  scenario('kick-across-channels', 'an operator of several channels can KICK in each', async ctx => {
    const [op, ...targets] = await ctx.users(4);
    const channels = targets.map(() => ctx.channel());

    for (const [i, target] of targets.entries()) {
      await joinAll(channels[i], op, target);
    }
    for (const [i, target] of targets.entries()) {
      op.send('KICK', channels[i], target.nick, 'test kick across channels');
    }

    await expectAll(
      op,
      targets.map((target, i) => kickOf(channels[i], target.nick))
    );
    await Promise.all(targets.map((target, i) => target.expect(kickOf(channels[i], target.nick))));
    return `${targets.length} KICKs across ${channels.length} channels`;
  }),

  scenario('invite', 'INVITE reaches the invitee and the inviter gets 341', async ctx => {
    const [op, invitee] = await ctx.users(2);
    const channel = ctx.channel();
    await joinChannel(op, channel);

    const since = op.mark();
    op.send('INVITE', invitee.nick, channel);
    const inviting = await op.expect(numeric(NUMERICS.RPL_INVITING), { since });
    assertNumeric(inviting, NUMERICS.RPL_INVITING, { params: [op.nick, invitee.nick, channel] });
    await invitee.expect(allOf(inviteOf(invitee.nick, channel), from(op.nick)));
    return `${invitee.nick} invited to ${channel}`;
  }),

  scenario('invite-without-privilege', 'on a +i channel only operators may INVITE', async ctx => {
    const [op, regular, guest] = await ctx.users(3);
    const channel = ctx.channel();
    await joinAll(channel, op, regular);
    await setChannelMode(op, channel, '+i');

    await expectRefused(
      regular,
      NUMERICS.ERR_CHANOPRIVSNEEDED,
      numeric(NUMERICS.RPL_INVITING),
      'INVITE',
      guest.nick,
      channel
    );
    await expectNone(guest, inviteOf(guest.nick, channel), ctx.quietMs);
    return '482 for INVITE by a regular member';
  }),

  scenario('mode-without-privilege', 'a regular member cannot change channel modes', async ctx => {
    const [op, regular] = await ctx.users(2);
    const channel = ctx.channel();
    await joinAll(channel, op, regular);

    await expectRefused(regular, NUMERICS.ERR_CHANOPRIVSNEEDED, modeOf(channel, '+i'), 'MODE', channel, '+i');
    return '482 for MODE +i by a regular member';
  }),

  scenario('mode-invite-only', '+i refuses uninvited users and admits invited ones', async ctx => {
    const [op, outsider] = await ctx.users(2);
    const channel = ctx.channel();
    await joinChannel(op, channel);
    await setChannelMode(op, channel, '+i');

    await expectJoinRejected(outsider, channel, NUMERICS.ERR_INVITEONLYCHAN);

    const text = `members only ${Date.now()}`;
    op.send('PRIVMSG', channel, text);
    await expectNone(outsider, privmsg({ to: channel, text }), ctx.quietMs);

    op.send('INVITE', outsider.nick, channel);
    await outsider.expect(inviteOf(outsider.nick, channel));
    await joinChannel(outsider, channel);
    await op.expect(joinOf(channel, outsider.nick));
    return '+i enforced; invited user joined';
  }),

  scenario('invite-consumed-on-join', 'an invitation admits one join only', async ctx => {
    const [op, guest] = await ctx.users(2);
    const channel = ctx.channel();
    await joinChannel(op, channel);
    await setChannelMode(op, channel, '+i');

    op.send('INVITE', guest.nick, channel);
    await guest.expect(inviteOf(guest.nick, channel));
    await joinChannel(guest, channel);

    const since = guest.mark();
    guest.send('PART', channel);
    await guest.expect(partOf(channel, guest.nick), { since });

    await expectJoinRejected(guest, channel, NUMERICS.ERR_INVITEONLYCHAN);
    return '473 on rejoin after PART';
  }),

  scenario('mode-topic-restrict', '+t limits TOPIC changes to operators', async ctx => {
    const [op, regular] = await ctx.users(2);
    const channel = ctx.channel();
    await joinAll(channel, op, regular);
    await setChannelMode(op, channel, '+t');

    await expectRefused(
      regular,
      NUMERICS.ERR_CHANOPRIVSNEEDED,
      topicOf(channel),
      'TOPIC',
      channel,
      'I should not be able to do this'
    );

    const topic = `set by ${op.nick}`;
    op.send('TOPIC', channel, topic);
    await Promise.all([op.expect(topicOf(channel, topic)), regular.expect(topicOf(channel, topic))]);
    return '+t enforced: regular denied, operator succeeded';
  }),

  scenario('mode-channel-key', '+k refuses joins without the right key', async ctx => {
    const [op, joiner] = await ctx.users(2);
    const channel = ctx.channel();
    const key = 'test-secret';
    await joinChannel(op, channel);
    await setChannelMode(op, channel, '+k', key);

    await expectJoinRejected(joiner, channel, NUMERICS.ERR_BADCHANNELKEY);
    await expectJoinRejected(joiner, channel, NUMERICS.ERR_BADCHANNELKEY, 'wrong-key');
    await joinChannel(joiner, channel, key);
    return '+k enforced; correct key allowed entry';
  }),

  scenario('mode-give-operator', '+o grants and -o revokes operator privileges', async ctx => {
    const [op, deputy, victim] = await ctx.users(3);
    const channel = ctx.channel();
    await joinAll(channel, op, deputy, victim);

    op.send('MODE', channel, '+o', deputy.nick);
    await Promise.all([op.expect(modeOf(channel, '+o', deputy.nick)), deputy.expect(modeOf(channel, '+o', deputy.nick))]);

    deputy.send('KICK', channel, victim.nick, 'proving op status');
    const kick = await victim.expect(kickOf(channel, victim.nick));
    assertKick(kick, { channel, kicked: victim.nick, by: deputy.nick });

    op.send('MODE', channel, '-o', deputy.nick);
    await Promise.all([op.expect(modeOf(channel, '-o', deputy.nick)), deputy.expect(modeOf(channel, '-o', deputy.nick))]);

    await expectRefused(
      deputy,
      NUMERICS.ERR_CHANOPRIVSNEEDED,
      kickOf(channel, op.nick),
      'KICK',
      channel,
      op.nick,
      'no longer allowed'
    );
    return '+o verified via KICK; -o verified via 482';
  }),

  scenario('mode-user-limit', '+l refuses joins at the limit and -l lifts it', async ctx => {
    const [op, second, third] = await ctx.users(3);
    const channel = ctx.channel();
    await joinChannel(op, channel);
    await setChannelMode(op, channel, '+l', '2');

    await joinChannel(second, channel);
    await expectJoinRejected(third, channel, NUMERICS.ERR_CHANNELISFULL);

    await setChannelMode(op, channel, '-l');
    await joinChannel(third, channel);
    return '+l 2 enforced (471 for the third user); -l lifted it';
  }),
]);
