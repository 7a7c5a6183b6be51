/**
 * IRC Message Codec
 *
 * Parses and serializes single protocol lines (RFC 1459 / RFC 2812).
 *
 * Message format: [:prefix] <command> [params...] [:trailing]
 *
 * serializeMessage is the only place that formats a protocol line; anything
 * that writes to a socket goes through it.
 */

import { ParseError } from '../errors.js';

/** Hard cap for one line, CRLF included */
export const MAX_LINE_BYTES = 512;

/** Middle parameters allowed before the trailing one */
export const MAX_MIDDLE_PARAMS = 14;

/**
 * Parsed IRC message source (nick!user@host).
 */
export interface MessageSource {
  nick: string;
  user: string | null;
  host: string | null;
  /** Full source string as received */
  raw: string;
}

/**
 * One IRC protocol message.
 */
export interface IRCMessage {
  /** Source without the leading ':' */
  prefix?: string;
  /** Command name or three-digit numeric */
  command: string;
  /** Middle parameters (never contain spaces) */
  params: string[];
  /** Final ':'-introduced parameter, may contain spaces or be empty */
  trailing?: string;
}

/**
 * A message as delivered to a session, with its arrival order.
 */
export interface InboundMessage extends IRCMessage {
  raw: string;
  seq: number;
}

const COMMAND_PATTERN = /^(?:[A-Za-z]+|\d{3})$/;
const FORBIDDEN_CHARS = /[\r\n\0]/;

function lineBytes(line: string, wireBytes?: number): number {
  return (wireBytes ?? Buffer.byteLength(line, 'utf8')) + 2;
}

/**
 * Parse an IRC message line into structured components.
 *
 * Lines read off a socket should pass their size on the wire as `wireBytes`
 * (terminator excluded): decoding octets that are not UTF-8 changes the
 * length of the string.
 *
 * @example
 * parseMessage(':nick!user@host PRIVMSG #channel :Hello world')
 * // { prefix: 'nick!user@host', command: 'PRIVMSG', params: ['#channel'], trailing: 'Hello world' }
 */
export function parseMessage(rawLine: string, wireBytes?: number): IRCMessage {
  const line = rawLine.replace(/\r?\n$/, '');

  if (line.length === 0) {
    throw new ParseError('Empty line', line);
  }
  if (lineBytes(line, wireBytes) > MAX_LINE_BYTES) {
    throw new ParseError(`Line exceeds ${MAX_LINE_BYTES} bytes`, line);
  }
  if (FORBIDDEN_CHARS.test(line)) {
    throw new ParseError('Line contains CR, LF or NUL', line);
  }

  let pos = 0;
  let prefix: string | undefined;

  if (line[0] === ':') {
    const prefixEnd = line.indexOf(' ');
    if (prefixEnd === -1) {
      throw new ParseError('Missing command', line);
    }
    prefix = line.slice(1, prefixEnd);
    if (prefix.length === 0) {
      throw new ParseError('Empty prefix', line);
    }
    pos = prefixEnd + 1;
  }
  while (line[pos] === ' ') pos++;

  const commandEnd = line.indexOf(' ', pos);
  const command = commandEnd === -1 ? line.slice(pos) : line.slice(pos, commandEnd);
  if (command.length === 0) {
    throw new ParseError('Missing command', line);
  }
  if (!COMMAND_PATTERN.test(command)) {
    throw new ParseError(`Invalid command ${JSON.stringify(command)}`, line);
  }

  const message: IRCMessage = { command, params: [] };
  if (prefix !== undefined) {
    message.prefix = prefix;
  }
  if (commandEnd === -1) {
    return message;
  }

  pos = commandEnd + 1;
  while (line[pos] === ' ') pos++;

  while (pos < line.length) {
    if (line[pos] === ':') {
      // Trailing parameter (rest of line, verbatim)
      message.trailing = line.slice(pos + 1);
      break;
    }
    const paramEnd = line.indexOf(' ', pos);
    const param = paramEnd === -1 ? line.slice(pos) : line.slice(pos, paramEnd);
    message.params.push(param);
    if (message.params.length > MAX_MIDDLE_PARAMS) {
      throw new ParseError(`More than ${MAX_MIDDLE_PARAMS} middle parameters`, line);
    }
    if (paramEnd === -1) break;
    pos = paramEnd + 1;
    while (line[pos] === ' ') pos++;
  }

  return message;
}

/**
 * Serialize a message to one protocol line, without the CRLF terminator.
 *
 * @throws ParseError if the message cannot be represented on the wire
 */
export function serializeMessage(message: IRCMessage): string {
  const { prefix, command, params, trailing } = message;

  if (!COMMAND_PATTERN.test(command)) {
    throw new ParseError(`Invalid command ${JSON.stringify(command)}`, command);
  }
  if (params.length > MAX_MIDDLE_PARAMS) {
    throw new ParseError(`More than ${MAX_MIDDLE_PARAMS} middle parameters`, params.join(' '));
  }

  const parts: string[] = [];
  if (prefix !== undefined) {
    if (prefix.length === 0 || prefix.includes(' ') || FORBIDDEN_CHARS.test(prefix)) {
      throw new ParseError('Invalid prefix', prefix);
    }
    parts.push(`:${prefix}`);
  }
  parts.push(command);

  for (const param of params) {
    if (param.length === 0 || param.startsWith(':') || param.includes(' ') || FORBIDDEN_CHARS.test(param)) {
      throw new ParseError('Invalid middle parameter', param);
    }
    parts.push(param);
  }

  if (trailing !== undefined) {
    if (FORBIDDEN_CHARS.test(trailing)) {
      throw new ParseError('Trailing parameter contains CR, LF or NUL', trailing);
    }
    parts.push(`:${trailing}`);
  }

  const line = parts.join(' ');
  if (lineBytes(line) > MAX_LINE_BYTES) {
    throw new ParseError(`Line exceeds ${MAX_LINE_BYTES} bytes`, line);
  }
  return line;
}

/**
 * Build a message from positional arguments.
 * The last argument becomes the trailing parameter when it has to be one
 * (empty, contains a space, or starts with ':').
 */
export function buildMessage(command: string, ...args: string[]): IRCMessage {
  const params = [...args];
  const last = params[params.length - 1];
  if (last !== undefined && (last.length === 0 || last.includes(' ') || last.startsWith(':'))) {
    params.pop();
    return { command, params, trailing: last };
  }
  return { command, params };
}

/**
 * All parameters, trailing included, in wire order.
 */
export function messageArgs(message: IRCMessage): string[] {
  return message.trailing === undefined ? message.params : [...message.params, message.trailing];
}

/**
 * Last parameter (usually the human-readable text).
 */
export function lastArg(message: IRCMessage): string | undefined {
  return message.trailing ?? message.params[message.params.length - 1];
}

/**
 * Parse a source string (nick!user@host) into components.
 */
export function parseSource(source: string): MessageSource {
  const raw = source;
  const bangPos = source.indexOf('!');
  const atPos = source.indexOf('@');

  if (bangPos === -1 && atPos === -1) {
    return { nick: source, user: null, host: null, raw };
  }

  if (bangPos !== -1 && atPos !== -1 && bangPos < atPos) {
    return {
      nick: source.slice(0, bangPos),
      user: source.slice(bangPos + 1, atPos),
      host: source.slice(atPos + 1),
      raw,
    };
  }

  if (atPos !== -1) {
    return {
      nick: source.slice(0, atPos),
      user: null,
      host: source.slice(atPos + 1),
      raw,
    };
  }

  return { nick: source.slice(0, bangPos), user: source.slice(bangPos + 1), host: null, raw };
}

/**
 * Nick part of the message source, or null for sourceless messages.
 */
export function sourceNick(message: IRCMessage): string | null {
  return message.prefix === undefined ? null : parseSource(message.prefix).nick;
}

/**
 * Lower-case using RFC 1459 case mapping ([]\~ are the upper-case of {}|^).
 */
export function ircLower(value: string): string {
  return value
    .toLowerCase()
    .replace(/\[/g, '{')
    .replace(/\]/g, '}')
    .replace(/\\/g, '|')
    .replace(/~/g, '^');
}

export function ircEquals(a: string, b: string): boolean {
  return ircLower(a) === ircLower(b);
}

/**
 * Check if a message is a numeric reply.
 */
export function isNumeric(message: IRCMessage): boolean {
  return /^\d{3}$/.test(message.command);
}
