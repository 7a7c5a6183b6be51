import { describe, it, expect } from 'vitest';
import {
  buildMessage,
  ircEquals,
  ircLower,
  isNumeric,
  lastArg,
  messageArgs,
  parseMessage,
  parseSource,
  serializeMessage,
  sourceNick,
  type IRCMessage,
} from './message.js';
import { ParseError } from '../errors.js';
import { NUMERICS, numericName } from './numerics.js';

describe('parseMessage', () => {
  it('checks the length against the octet count it is given', () => {
    const line = `PRIVMSG me :${'\u00e9'.repeat(250)}`;
    expect(() => parseMessage(line)).toThrow(ParseError);
    expect(parseMessage(line, 262).trailing).toBe('\u00e9'.repeat(250));
  });

  it('parses prefix, command, middle and trailing parameters', () => {
    expect(parseMessage(':nick!user@host PRIVMSG #channel :Hello world')).toEqual({
      prefix: 'nick!user@host',
      command: 'PRIVMSG',
      params: ['#channel'],
      trailing: 'Hello world',
    });
  });

  it('leaves prefix out when there is none', () => {
    const msg = parseMessage('PING :token');
    expect(msg).toEqual({ command: 'PING', params: [], trailing: 'token' });
    expect('prefix' in msg).toBe(false);
  });

  it('keeps every middle parameter in order', () => {
    expect(parseMessage('MODE #c +kl key 5').params).toEqual(['#c', '+kl', 'key', '5']);
  });

  it('keeps an empty trailing parameter', () => {
    expect(parseMessage('TOPIC #c :').trailing).toBe('');
  });

  it('tolerates runs of spaces between tokens', () => {
    expect(parseMessage('PRIVMSG   #c   :hi')).toEqual({ command: 'PRIVMSG', params: ['#c'], trailing: 'hi' });
  });

  it('strips one trailing CRLF or LF', () => {
    expect(parseMessage('PING x\r\n').params).toEqual(['x']);
    expect(parseMessage('PING y\n').params).toEqual(['y']);
  });

  it('accepts three-digit numerics', () => {
    const msg = parseMessage(':irc.test 001 alice :Welcome');
    expect(msg.command).toBe('001');
    expect(isNumeric(msg)).toBe(true);
  });

  it('accepts a line of exactly 512 bytes including CRLF', () => {
    const line = `PRIVMSG #c :${'a'.repeat(498)}`;
    expect(parseMessage(line).trailing).toHaveLength(498);
  });

  it('accepts 14 middle parameters', () => {
    const params = Array.from({ length: 14 }, (_, i) => `p${i}`);
    expect(parseMessage(`CMD ${params.join(' ')}`).params).toEqual(params);
  });
});

describe('parseMessage rejection', () => {
  it.each([
    ['an empty line', ''],
    ['a prefix with no command', ':prefixonly'],
    ['an empty prefix', ': PING'],
    ['a prefix followed only by spaces', ':server   '],
    ['a two-digit numeric', '12 foo'],
    ['a four-digit numeric', '1234 foo'],
    ['a command mixing letters and digits', 'PR1VMSG #c :x'],
    ['a NUL byte', 'PRIVMSG #c :a\0b'],
    ['a line over 512 bytes', `PRIVMSG #c :${'a'.repeat(499)}`],
    ['15 middle parameters', `CMD ${Array.from({ length: 15 }, (_, i) => `p${i}`).join(' ')}`],
  ])('rejects %s', (_label, line) => {
    expect(() => parseMessage(line)).toThrow(ParseError);
  });

  it('quotes the offending line', () => {
    let caught: unknown;
    try {
      parseMessage(':prefixonly');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ParseError);
    expect(caught).toMatchObject({
      line: ':prefixonly',
      message: 'Missing command: ":prefixonly"',
    });
  });
});

describe('serializeMessage', () => {
  it.each([
    ':nick!user@host PRIVMSG #channel :Hello world',
    'PING :token',
    ':irc.test 353 alice = #c :@alice bob',
    'MODE #c +o bob',
    'TOPIC #c :',
    'USER alice 0 * :Alice Example',
  ])('reproduces %s byte for byte', line => {
    expect(serializeMessage(parseMessage(line))).toBe(line);
  });

  it.each<[string, IRCMessage]>([
    ['a prefix', { prefix: 'nick!user@host', command: 'PRIVMSG', params: ['#channel'], trailing: 'Hello world' }],
    ['an empty trailing parameter', { command: 'TOPIC', params: ['#c'], trailing: '' }],
    [
      '14 middle parameters',
      { command: 'CMD', params: Array.from({ length: 14 }, (_, i) => `p${i}`), trailing: 'last' },
    ],
    ['colons inside the trailing parameter', { prefix: 'irc.test', command: 'NOTICE', params: ['alice'], trailing: 'at 12:00 :)' }],
    ['no trailing parameter', { command: 'MODE', params: ['#c', '+o', 'bob'] }],
  ])('parses its own output back to the same message with %s', (_label, message) => {
    expect(parseMessage(serializeMessage(message))).toEqual(message);
  });

  it('writes a trailing parameter even without spaces', () => {
    expect(serializeMessage({ command: 'PONG', params: ['irc.test'], trailing: 'tok' })).toBe('PONG irc.test :tok');
  });

  it.each([
    ['a middle parameter with a space', { command: 'JOIN', params: ['#a b'] }],
    ['a middle parameter starting with a colon', { command: 'JOIN', params: [':x'] }],
    ['an empty middle parameter', { command: 'JOIN', params: [''] }],
    ['an invalid command', { command: 'BAD CMD', params: [] }],
    ['a newline in the trailing parameter', { command: 'PRIVMSG', params: ['#c'], trailing: 'a\nQUIT' }],
    ['an empty prefix', { prefix: '', command: 'PING', params: ['x'] }],
    ['15 middle parameters', { command: 'CMD', params: Array.from({ length: 15 }, (_, i) => `p${i}`) }],
    ['a line over 512 bytes', { command: 'PRIVMSG', params: ['#c'], trailing: 'a'.repeat(499) }],
  ])('rejects %s', (_label, message) => {
    expect(() => serializeMessage(message)).toThrow(ParseError);
  });
});

describe('buildMessage', () => {
  it('keeps single-word arguments as middle parameters', () => {
    expect(buildMessage('JOIN', '#c', 'key')).toEqual({ command: 'JOIN', params: ['#c', 'key'] });
  });

  it('turns a last argument with a space into the trailing parameter', () => {
    expect(buildMessage('PRIVMSG', '#c', 'hello world')).toEqual({
      command: 'PRIVMSG',
      params: ['#c'],
      trailing: 'hello world',
    });
  });

  it('turns an empty or colon-led last argument into the trailing parameter', () => {
    expect(serializeMessage(buildMessage('TOPIC', '#c', ''))).toBe('TOPIC #c :');
    expect(serializeMessage(buildMessage('PRIVMSG', 'bob', ':)'))).toBe('PRIVMSG bob ::)');
  });
});

describe('message helpers', () => {
  it('lists middle and trailing parameters together', () => {
    const msg = parseMessage(':a!b@c KICK #c bob :bye now');
    expect(messageArgs(msg)).toEqual(['#c', 'bob', 'bye now']);
    expect(lastArg(msg)).toBe('bye now');
  });

  it('splits a full source', () => {
    expect(parseSource('nick!user@host.example')).toEqual({
      nick: 'nick',
      user: 'user',
      host: 'host.example',
      raw: 'nick!user@host.example',
    });
  });

  it('treats a bare server name as the nick part', () => {
    expect(parseSource('irc.test')).toEqual({ nick: 'irc.test', user: null, host: null, raw: 'irc.test' });
  });

  it('returns null as source nick for sourceless messages', () => {
    expect(sourceNick(parseMessage('PING :x'))).toBeNull();
    expect(sourceNick(parseMessage(':alice!a@h NICK bob'))).toBe('alice');
  });

  it('compares with RFC 1459 case mapping', () => {
    expect(ircLower('Nick[A]\\~')).toBe('nick{a}|^');
    expect(ircEquals('#Chan[1]', '#chan{1}')).toBe(true);
    expect(ircEquals('alice', 'alicE2')).toBe(false);
  });
});

describe('numerics', () => {
  it('names known codes', () => {
    expect(numericName(NUMERICS.ERR_CHANOPRIVSNEEDED)).toBe('ERR_CHANOPRIVSNEEDED');
    expect(numericName('999')).toBeUndefined();
  });
});
