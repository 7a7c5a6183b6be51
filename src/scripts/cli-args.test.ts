import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './cli-args.js';

describe('parseCliArgs', () => {
  it('defaults to a sequential run', () => {
    expect(parseCliArgs([])).toEqual({ parallel: false, help: false });
  });

  it('reads flags with separate and inline values', () => {
    expect(
      parseCliArgs(['--host', 'irc.example.test', '--port=6697', '--password', 'test-secret', '--parallel'])
    ).toEqual({
      host: 'irc.example.test',
      port: '6697',
      password: 'test-secret',
      parallel: true,
      help: false,
    });
  });

  it('keeps everything after the first = of an inline value', () => {
    expect(parseCliArgs(['--password=a=b']).password).toBe('a=b');
  });

  it('splits --only on commas and drops empty names', () => {
    expect(parseCliArgs(['--only', 'join-channel, multi-user/invite,,']).only).toEqual([
      'join-channel',
      'multi-user/invite',
    ]);
  });

  it('recognizes help in both spellings', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  it('rejects unknown options and missing values', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow("Unknown option '--verbose'");
    expect(() => parseCliArgs(['--host'])).toThrow('Option --host needs a value');
    expect(() => parseCliArgs(['--port='])).toThrow('Option --port needs a value');
  });
});
