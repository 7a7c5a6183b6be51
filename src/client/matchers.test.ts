import { describe, it, expect, afterEach, vi } from 'vitest';
import type { Socket } from 'net';
import {
  allOf,
  anyOf,
  assignDistinct,
  command,
  describeMessages,
  expectAll,
  expectAny,
  expectNone,
  from,
  fromTo,
  joinOf,
  kickOf,
  mentions,
  nickChange,
  not,
  numeric,
  pongOf,
  privmsg,
  replyAbout,
} from './matchers.js';
import { ClientSession } from './session.js';
import { ScenarioError, TimeoutError } from '../errors.js';
import { parseMessage, type InboundMessage } from '../protocol/message.js';
import { startRawServer, type RawServer } from '../helpers/raw-server.js';

const quiet = { debug: () => {}, info: () => {}, warn: () => {} };
const msg = parseMessage;

describe('matchers', () => {
  it('matches a command with positional arguments, case-insensitively', () => {
    const kick = command('KICK', '#Chan', undefined, /^bye/);
    expect(kick.label).toBe('KICK #Chan * /^bye/');
    expect(kick(msg(':op!o@h KICK #chan victim :bye now'))).toBe(true);
    expect(kick(msg(':op!o@h KICK #chan victim :later'))).toBe(false);
    expect(kick(msg(':op!o@h KICK #chan victim'))).toBe(false);
    expect(command('join')(msg(':a!b@c JOIN #x'))).toBe(true);
  });

  it('matches any of several numerics', () => {
    const m = numeric('433', '436');
    expect(m.label).toBe('numeric 433/436');
    expect(m(msg(':irc.test 436 * alice :Collision'))).toBe(true);
    expect(m(msg(':irc.test 001 alice :Welcome'))).toBe(false);
  });

  it('matches source and first parameter', () => {
    const m = fromTo('Alice', 'bob');
    expect(m(msg(':alice!a@h PRIVMSG Bob :hi'))).toBe(true);
    expect(m(msg(':carol!c@h PRIVMSG bob :hi'))).toBe(false);
    expect(m(msg('PRIVMSG bob :no source'))).toBe(false);
    expect(from('irc.test')(msg(':irc.test NOTICE * :x'))).toBe(true);
  });

  it('finds a value in any parameter', () => {
    expect(mentions('#Room')(msg(':irc.test 482 alice #room :Not op'))).toBe(true);
    expect(mentions('#room')(msg(':irc.test 482 alice #other :Not op'))).toBe(false);
  });

  it('combines matchers and their labels', () => {
    const join = joinOf('#c', 'bob');
    expect(join.label).toBe('JOIN #c and from bob');
    expect(join(msg(':bob!b@h JOIN #c'))).toBe(true);
    expect(join(msg(':alice!a@h JOIN #c'))).toBe(false);

    const either = anyOf(command('PART'), command('QUIT'));
    expect(either.label).toBe('PART or QUIT');
    expect(either(msg(':a!b@c QUIT :gone'))).toBe(true);

    const notJoin = not(command('JOIN'));
    expect(notJoin.label).toBe('not (JOIN)');
    expect(notJoin(msg(':a!b@c JOIN #c'))).toBe(false);

    expect(allOf(numeric('473'), mentions('#c'))(msg(':s 473 alice #c :Cannot join'))).toBe(true);
  });

  it('describes a PRIVMSG matcher and checks each given field', () => {
    const m = privmsg({ from: 'alice', to: '#c', text: 'hi there' });
    expect(m.label).toBe('PRIVMSG from alice to #c text hi there');
    expect(m(msg(':alice!a@h PRIVMSG #C :hi there'))).toBe(true);
    expect(m(msg(':alice!a@h PRIVMSG #c :hi'))).toBe(false);
    expect(m(msg(':alice!a@h NOTICE #c :hi there'))).toBe(false);
    expect(privmsg({ text: /^\x01ACTION/ })(msg(':a!b@c PRIVMSG #c :\x01ACTION waves\x01'))).toBe(true);
  });

  it('provides shorthands for common replies', () => {
    expect(kickOf('#c', 'bob')(msg(':op!o@h KICK #c bob :out'))).toBe(true);
    expect(pongOf('tok1')(msg(':irc.test PONG irc.test :tok1'))).toBe(true);
    expect(pongOf('tok1')(msg(':irc.test PONG irc.test :tok2'))).toBe(false);
    expect(nickChange('old', 'new')(msg(':old!o@h NICK :new'))).toBe(true);
    expect(replyAbout('442', '#c')(msg(':irc.test 442 alice #c :Not on channel'))).toBe(true);
    expect(replyAbout('442', '#c')(msg(':irc.test 403 alice #c :No such channel'))).toBe(false);
  });

  it('describes messages by their raw line when they have one', () => {
    const received: InboundMessage = { command: 'PING', params: ['a'], raw: 'PING  a', seq: 1 };
    expect(describeMessages([{ command: 'PING', params: [], trailing: 'x' }, received])).toEqual([
      'PING :x',
      'PING  a',
    ]);
  });
});

describe('assignDistinct', () => {
  const b = msg(':x!x@h PRIVMSG me :b');
  const a = msg(':x!x@h PRIVMSG me :a');

  it('gives each matcher its own message when their matches overlap', () => {
    expect(assignDistinct([command('PRIVMSG'), privmsg({ text: 'b' })], [b, a])).toEqual([1, 0]);
  });

  it('prefers the earliest candidate', () => {
    expect(assignDistinct([command('PRIVMSG')], [b, a])).toEqual([0]);
  });

  it('returns null when two matchers compete for one message', () => {
    expect(assignDistinct([command('PRIVMSG'), command('PRIVMSG')], [a])).toBeNull();
    expect(assignDistinct([numeric('001')], [a, b])).toBeNull();
  });

  it('assigns nothing to an empty matcher list', () => {
    expect(assignDistinct([], [a])).toEqual([]);
  });
});

describe('window operations', () => {
  let server: RawServer;
  let session: ClientSession;
  let socket: Socket;

  async function open(): Promise<void> {
    server = await startRawServer();
    session = await ClientSession.open({ host: '127.0.0.1', port: server.port }, { nick: 'me' }, { logger: quiet });
    socket = await server.nextSocket();
  }

  afterEach(async () => {
    await session.close();
    await server.close();
  });

  it('expectAll accepts matches in any arrival order and returns them in matcher order', async () => {
    await open();
    socket.write(':irc.test NOTICE me :noise\r\n:b!b@h JOIN #c\r\n:a!a@h JOIN #c\r\n');

    const [a, b] = await expectAll(session, [joinOf('#c', 'a'), joinOf('#c', 'b')], 2000);

    expect(a.raw).toBe(':a!a@h JOIN #c');
    expect(b.raw).toBe(':b!b@h JOIN #c');
    expect(session.drainUnexpected().map(m => m.raw)).toEqual([':irc.test NOTICE me :noise']);
  });

  it('expectAll finds an assignment when a broad matcher could steal the narrow one\'s message', async () => {
    await open();
    socket.write(':x!x@h PRIVMSG me :b\r\n:x!x@h PRIVMSG me :a\r\n');

    const found = await expectAll(session, [command('PRIVMSG'), privmsg({ text: 'b' })], 2000);

    expect(found.map(m => m.trailing)).toEqual(['a', 'b']);
    expect(session.drainUnexpected()).toEqual([]);
  });

  it('expectAll fails when one matcher is never satisfied and leaves the queue untouched', async () => {
    await open();
    socket.write(':a!a@h JOIN #c\r\n');
    await vi.waitFor(() => {
      expect(session.mark()).toBe(1);
    });

    const error: unknown = await expectAll(session, [joinOf('#c', 'a'), joinOf('#c', 'b')], 100).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({
      message: 'Timeout after 100ms waiting for all of (JOIN #c and from a, JOIN #c and from b) on me',
    });
    expect(session.drainUnexpected().map(m => m.raw)).toEqual([':a!a@h JOIN #c']);
  });

  it('expectAny reports which matcher fired', async () => {
    await open();
    socket.write(':irc.test 442 me #c :Not on channel\r\n');

    const { index, message } = await expectAny(session, [numeric('403'), numeric('442')], 2000);

    expect(index).toBe(1);
    expect(message.command).toBe('442');
  });

  it('expectNone passes when nothing matching arrives in the window', async () => {
    await open();
    socket.write(':irc.test NOTICE me :unrelated\r\n');

    await expect(expectNone(session, command('PRIVMSG'), 100)).resolves.toBeUndefined();
  });

  it('expectNone fails on a matching message, including one already queued', async () => {
    await open();
    socket.write(':x!y@z PRIVMSG me :hi\r\n');
    await session.expect(command('PRIVMSG'));
    socket.write(':x!y@z PRIVMSG me :again\r\n');

    const error: unknown = await expectNone(session, command('PRIVMSG'), 1000).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ScenarioError);
    expect(error).toMatchObject({ message: 'me unexpectedly received PRIVMSG: :x!y@z PRIVMSG me :again' });
  });
});
