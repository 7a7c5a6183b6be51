import { describe, it, expect } from 'vitest';
import { assertJoin, assertKick, assertMode, assertNumeric, assertPrivmsg, check } from './assertions.js';
import { ScenarioError } from '../errors.js';
import { parseMessage } from '../protocol/message.js';

describe('assertions', () => {
  it('check narrows or throws ScenarioError', () => {
    expect(() => check(true, 'unused')).not.toThrow();
    expect(() => check(false, 'bob is not op')).toThrow(new ScenarioError('bob is not op'));
  });

  describe('assertNumeric', () => {
    const reply = parseMessage(':irc.test 341 Alice bob #chan');

    it('accepts the code as number or string and compares params case-insensitively', () => {
      expect(() => assertNumeric(reply, 341, { params: ['alice', 'BOB', '#Chan'] })).not.toThrow();
      expect(() => assertNumeric(reply, '341', { params: [null, /^b/] })).not.toThrow();
    });

    it('pads short codes', () => {
      expect(() => assertNumeric(parseMessage(':irc.test 001 alice :Welcome'), 1)).not.toThrow();
    });

    it('quotes the reply on a mismatch', () => {
      expect(() => assertNumeric(reply, 443)).toThrow('Expected numeric 443, got :irc.test 341 Alice bob #chan');
      expect(() => assertNumeric(reply, 341, { params: [null, 'carol'] })).toThrow(
        "Param 1: expected carol, got 'bob' in :irc.test 341 Alice bob #chan"
      );
    });
  });

  it('assertPrivmsg checks sender, target and text', () => {
    const message = parseMessage(':alice!a@h PRIVMSG #c :hello world');
    expect(() => assertPrivmsg(message, { sender: 'Alice', target: '#C', text: 'hello world' })).not.toThrow();
    expect(() => assertPrivmsg(message, { text: /^hello/ })).not.toThrow();
    expect(() => assertPrivmsg(message, { sender: 'bob' })).toThrow(
      "Expected sender 'bob', got :alice!a@h PRIVMSG #c :hello world"
    );
  });

  it('assertJoin checks nick and channel', () => {
    const message = parseMessage(':bob!b@h JOIN :#c');
    expect(() => assertJoin(message, { nick: 'bob', channel: '#c' })).not.toThrow();
    expect(() => assertJoin(message, { channel: '#d' })).toThrow("Expected channel '#d', got :bob!b@h JOIN :#c");
  });

  it('assertMode checks target, modes and arguments', () => {
    const message = parseMessage(':op!o@h MODE #c +ol bob 5');
    expect(() => assertMode(message, { target: '#c', modes: '+ol', args: ['Bob', '5'] })).not.toThrow();
    expect(() => assertMode(message, { args: ['bob', '6'] })).toThrow(
      "Mode arg 1: expected '6', got :op!o@h MODE #c +ol bob 5"
    );
  });

  it('assertKick checks channel, victim, kicker and reason', () => {
    const message = parseMessage(':op!o@h KICK #c bob :test kick');
    expect(() => assertKick(message, { channel: '#c', kicked: 'bob', by: 'op', reason: 'test' })).not.toThrow();
    expect(() => assertKick(message, { reason: /^other/ })).toThrow(
      'Expected reason /^other/, got :op!o@h KICK #c bob :test kick'
    );
    expect(() => assertKick(parseMessage(':op!o@h PART #c'), {})).toThrow('Expected KICK, got :op!o@h PART #c');
  });
});
