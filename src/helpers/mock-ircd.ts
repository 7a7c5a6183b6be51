/**
 * Mock IRC Server
 *
 * In-process stand-in for a real ircd, used by the engine's own tests.
 * Implements the command and numeric subset the suites exercise, through
 * the same codec the clients use. Fault switches make it misbehave in
 * specific ways so tests can check that scenarios catch it.
 */

import { createServer, type Server, type Socket } from 'net';
import { createLogger, type Logger } from '../log.js';
import { ParseError } from '../errors.js';
import {
  buildMessage,
  ircLower,
  messageArgs,
  parseMessage,
  serializeMessage,
  type IRCMessage,
} from '../protocol/message.js';
import { NUMERICS } from '../protocol/numerics.js';

export interface MockIrcdFaults {
  /** Let anyone change the topic of a +t channel */
  ignoreTopicLock?: boolean;
  /** Let anyone join a +i channel */
  ignoreInviteOnly?: boolean;
  /** Send channel messages back to their sender too */
  echoChannelMessages?: boolean;
  /** Deliver channel messages to every registered client, members or not */
  leakChannelMessages?: boolean;
  /** Commands read and then ignored without any reply */
  ignoreCommands?: string[];
  /** Send a line with no command right after the welcome */
  malformedAfterWelcome?: boolean;
}

export interface MockIrcdOptions {
  password?: string;
  serverName?: string;
  faults?: MockIrcdFaults;
  logger?: Logger;
}

interface MockClient {
  socket: Socket;
  buffer: string;
  nick: string | null;
  user: string | null;
  pass: string | null;
  registered: boolean;
  gone: boolean;
  /** Lower-cased channel names this client has been invited to */
  invites: Set<string>;
}

interface MockChannel {
  name: string;
  /** Member -> channel operator flag */
  members: Map<MockClient, boolean>;
  topic: string | null;
  inviteOnly: boolean;
  topicLock: boolean;
  key: string | null;
  limit: number | null;
}

interface ModeChange {
  sign: '+' | '-';
  letter: string;
  arg?: string;
}

const NICK_PATTERN = /^[A-Za-z[\]\\`_^{|}][A-Za-z0-9[\]\\`_^{|}-]{0,29}$/;
const CHANNEL_PATTERN = /^[#&][^\s,\x07]{1,49}$/;

export class MockIrcd {
  private server: Server | null = null;
  private readonly clients = new Set<MockClient>();
  private readonly channels = new Map<string, MockChannel>();
  private readonly serverName: string;
  private readonly faults: MockIrcdFaults;
  private readonly ignored: Set<string>;
  private readonly log: Logger;

  constructor(private readonly options: MockIrcdOptions = {}) {
    this.serverName = options.serverName ?? 'mock.ircd';
    this.faults = options.faults ?? {};
    this.ignored = new Set((this.faults.ignoreCommands ?? []).map(command => command.toUpperCase()));
    this.log = options.logger ?? createLogger('mock-ircd');
  }

  /** Connected sockets, registered or not */
  get clientCount(): number {
    return this.clients.size;
  }

  /**
   * Start listening on 127.0.0.1 and an ephemeral port.
   *
   * @returns The port
   */
  listen(): Promise<number> {
    if (this.server) throw new Error('server is already listening');

    const server = createServer(socket => this.accept(socket));
    this.server = server;
    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(0, '127.0.0.1', () => {
        server.off('error', reject);
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('mock ircd has no TCP address'));
          return;
        }
        resolve(address.port);
      });
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    for (const client of this.clients) {
      client.socket.destroy();
    }
    this.clients.clear();
    this.channels.clear();

    return new Promise(resolve => {
      server.close(() => resolve());
    });
  }

  private accept(socket: Socket): void {
    const client: MockClient = {
      socket,
      buffer: '',
      nick: null,
      user: null,
      pass: null,
      registered: false,
      gone: false,
      invites: new Set(),
    };
    this.clients.add(client);
    socket.setEncoding('utf8');

    socket.on('data', (chunk: string) => {
      client.buffer += chunk;
      const lines = client.buffer.split('\n');
      client.buffer = lines.pop() ?? '';
      for (const line of lines) {
        if (client.gone) return;
        const trimmed = line.endsWith('\r') ? line.slice(0, -1) : line;
        if (trimmed.length > 0) this.receive(client, trimmed);
      }
    });
    socket.on('error', error => {
      this.log.debug(`client socket error: ${error.message}`);
    });
    socket.on('close', () => this.drop(client, 'Connection closed'));
  }

  private receive(client: MockClient, line: string): void {
    let message: IRCMessage;
    try {
      message = parseMessage(line);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.log.debug(`unparseable line from client: ${error.message}`);
      return;
    }

    const command = message.command.toUpperCase();
    if (this.ignored.has(command)) return;
    const args = messageArgs(message);

    switch (command) {
      case 'PASS':
        return this.onPass(client, args);
      case 'NICK':
        return this.onNick(client, args);
      case 'USER':
        return this.onUser(client, args);
      case 'PING':
        return this.onPing(client, args);
      case 'PONG':
        return;
      case 'QUIT':
        return this.onQuit(client, args[0] ?? 'Client Quit');
    }

    if (!client.registered) {
      this.numeric(client, NUMERICS.ERR_NOTREGISTERED, [], 'You have not registered');
      return;
    }

    switch (command) {
      case 'JOIN':
        return this.onJoin(client, args);
      case 'PART':
        return this.onPart(client, args);
      case 'PRIVMSG':
      case 'NOTICE':
        return this.onMessage(client, command, args);
      case 'KICK':
        return this.onKick(client, args);
      case 'INVITE':
        return this.onInvite(client, args);
      case 'TOPIC':
        return this.onTopic(client, args);
      case 'MODE':
        return this.onMode(client, args);
      default:
        this.numeric(client, NUMERICS.ERR_UNKNOWNCOMMAND, [command], 'Unknown command');
    }
  }

  // ==========================================================================
  // Output
  // ==========================================================================

  private write(client: MockClient, message: IRCMessage): void {
    if (client.gone || !client.socket.writable) return;
    client.socket.write(`${serializeMessage(message)}\r\n`);
  }

  private numeric(client: MockClient, code: string, middle: string[], text?: string): void {
    this.write(client, {
      prefix: this.serverName,
      command: code,
      params: [client.nick ?? '*', ...middle],
      trailing: text,
    });
  }

  private prefixOf(client: MockClient): string {
    return `${client.nick ?? '*'}!${client.user ?? 'unknown'}@127.0.0.1`;
  }

  private fromClient(client: MockClient, command: string, ...args: string[]): IRCMessage {
    return { ...buildMessage(command, ...args), prefix: this.prefixOf(client) };
  }

  private toChannel(channel: MockChannel, message: IRCMessage, except?: MockClient): void {
    for (const member of channel.members.keys()) {
      if (member !== except) this.write(member, message);
    }
  }

  /** Every client sharing a channel with this one, itself excluded */
  private peersOf(client: MockClient): Set<MockClient> {
    const peers = new Set<MockClient>();
    for (const channel of this.channels.values()) {
      if (!channel.members.has(client)) continue;
      for (const member of channel.members.keys()) {
        if (member !== client) peers.add(member);
      }
    }
    return peers;
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  private onPass(client: MockClient, args: string[]): void {
    if (client.registered) {
      this.numeric(client, NUMERICS.ERR_ALREADYREGISTRED, [], 'You may not reregister');
      return;
    }
    if (args.length < 1) {
      this.numeric(client, NUMERICS.ERR_NEEDMOREPARAMS, ['PASS'], 'Not enough parameters');
      return;
    }
    client.pass = args[0];
  }

  private onNick(client: MockClient, args: string[]): void {
    const nick = args[0];
    if (!nick) {
      this.numeric(client, NUMERICS.ERR_NONICKNAMEGIVEN, [], 'No nickname given');
      return;
    }
    if (!NICK_PATTERN.test(nick)) {
      this.numeric(client, NUMERICS.ERR_ERRONEUSNICKNAME, [nick], 'Erroneous nickname');
      return;
    }
    const holder = this.findClient(nick);
    if (holder && holder !== client) {
      this.numeric(client, NUMERICS.ERR_NICKNAMEINUSE, [nick], 'Nickname is already in use');
      return;
    }

    if (client.registered) {
      const change = this.fromClient(client, 'NICK', nick);
      this.write(client, change);
      for (const peer of this.peersOf(client)) this.write(peer, change);
    }
    client.nick = nick;
    this.tryRegister(client);
  }

  private onUser(client: MockClient, args: string[]): void {
    if (client.registered) {
      this.numeric(client, NUMERICS.ERR_ALREADYREGISTRED, [], 'You may not reregister');
      return;
    }
    if (args.length < 4) {
      this.numeric(client, NUMERICS.ERR_NEEDMOREPARAMS, ['USER'], 'Not enough parameters');
      return;
    }
    client.user = args[0];
    this.tryRegister(client);
  }

  private tryRegister(client: MockClient): void {
    if (client.registered || client.nick === null || client.user === null) return;

    const { password } = this.options;
    if (password !== undefined && client.pass !== password) {
      this.numeric(client, NUMERICS.ERR_PASSWDMISMATCH, [], 'Password incorrect');
      this.write(client, { command: 'ERROR', params: [], trailing: 'Closing Link: bad password' });
      client.gone = true;
      client.socket.end();
      return;
    }

    client.registered = true;
    this.numeric(
      client,
      NUMERICS.RPL_WELCOME,
      [],
      `Welcome to the Internet Relay Network ${this.prefixOf(client)}`
    );
    this.numeric(client, '422', [], 'MOTD File is missing');
    if (this.faults.malformedAfterWelcome && client.socket.writable) {
      client.socket.write(`:${this.serverName}\r\n`);
    }
  }

  private onPing(client: MockClient, args: string[]): void {
    const token = args[0];
    if (token === undefined) {
      this.numeric(client, NUMERICS.ERR_NOORIGIN, [], 'No origin specified');
      return;
    }
    this.write(client, { prefix: this.serverName, command: 'PONG', params: [this.serverName], trailing: token });
  }

  private onQuit(client: MockClient, reason: string): void {
    this.write(client, { command: 'ERROR', params: [], trailing: `Closing Link: ${reason}` });
    this.drop(client, `Quit: ${reason}`);
    client.socket.end();
  }

  private drop(client: MockClient, reason: string): void {
    if (!this.clients.has(client)) return;
    this.clients.delete(client);

    if (client.registered) {
      const quit = this.fromClient(client, 'QUIT', reason);
      for (const peer of this.peersOf(client)) this.write(peer, quit);
    }
    client.gone = true;
    for (const channel of [...this.channels.values()]) {
      this.removeMember(channel, client);
    }
  }

  // ==========================================================================
  // Channels
  // ==========================================================================

  private findClient(nick: string): MockClient | undefined {
    const wanted = ircLower(nick);
    for (const client of this.clients) {
      if (client.nick !== null && ircLower(client.nick) === wanted) return client;
    }
    return undefined;
  }

  private findChannel(name: string): MockChannel | undefined {
    return this.channels.get(ircLower(name));
  }

  private removeMember(channel: MockChannel, client: MockClient): void {
    channel.members.delete(client);
    if (channel.members.size === 0) {
      this.channels.delete(ircLower(channel.name));
    }
  }

  private onJoin(client: MockClient, args: string[]): void {
    if (args.length < 1) {
      this.numeric(client, NUMERICS.ERR_NEEDMOREPARAMS, ['JOIN'], 'Not enough parameters');
      return;
    }
    const keys = (args[1] ?? '').split(',');
    args[0].split(',').forEach((name, i) => this.joinOne(client, name, keys[i] || undefined));
  }

  private joinOne(client: MockClient, name: string, key: string | undefined): void {
    if (!CHANNEL_PATTERN.test(name)) {
      this.numeric(client, NUMERICS.ERR_NOSUCHCHANNEL, [name], 'No such channel');
      return;
    }

    const lower = ircLower(name);
    let channel = this.channels.get(lower);
    if (channel?.members.has(client)) return;

    if (channel) {
      if (channel.limit !== null && channel.members.size >= channel.limit) {
        this.numeric(client, NUMERICS.ERR_CHANNELISFULL, [channel.name], 'Cannot join channel (+l)');
        return;
      }
      if (channel.inviteOnly && !client.invites.has(lower) && !this.faults.ignoreInviteOnly) {
        this.numeric(client, NUMERICS.ERR_INVITEONLYCHAN, [channel.name], 'Cannot join channel (+i)');
        return;
      }
      if (channel.key !== null && key !== channel.key) {
        this.numeric(client, NUMERICS.ERR_BADCHANNELKEY, [channel.name], 'Cannot join channel (+k)');
        return;
      }
      channel.members.set(client, false);
    } else {
      channel = {
        name,
        members: new Map([[client, true]]),
        topic: null,
        inviteOnly: false,
        topicLock: false,
        key: null,
        limit: null,
      };
      this.channels.set(lower, channel);
    }
    client.invites.delete(lower);

    this.toChannel(channel, this.fromClient(client, 'JOIN', channel.name));
    if (channel.topic !== null) {
      this.numeric(client, NUMERICS.RPL_TOPIC, [channel.name], channel.topic);
    }
    const names = [...channel.members].map(([member, op]) => `${op ? '@' : ''}${member.nick ?? '*'}`);
    this.numeric(client, NUMERICS.RPL_NAMREPLY, ['=', channel.name], names.join(' '));
    this.numeric(client, NUMERICS.RPL_ENDOFNAMES, [channel.name], 'End of /NAMES list.');
  }

  /**
   * The channel, if the client is on it; otherwise replies 403 or 442.
   */
  private memberChannel(client: MockClient, name: string): MockChannel | undefined {
    const channel = this.findChannel(name);
    if (!channel) {
      this.numeric(client, NUMERICS.ERR_NOSUCHCHANNEL, [name], 'No such channel');
      return undefined;
    }
    if (!channel.members.has(client)) {
      this.numeric(client, NUMERICS.ERR_NOTONCHANNEL, [channel.name], "You're not on that channel");
      return undefined;
    }
    return channel;
  }

  private onPart(client: MockClient, args: string[]): void {
    if (args.length < 1) {
      this.numeric(client, NUMERICS.ERR_NEEDMOREPARAMS, ['PART'], 'Not enough parameters');
      return;
    }
    const reason = args[1];
    for (const name of args[0].split(',')) {
      const channel = this.memberChannel(client, name);
      if (!channel) continue;
      const part = reason === undefined
        ? this.fromClient(client, 'PART', channel.name)
        : this.fromClient(client, 'PART', channel.name, reason);
      this.toChannel(channel, part);
      this.removeMember(channel, client);
    }
  }

  private onMessage(client: MockClient, command: string, args: string[]): void {
    const quiet = command === 'NOTICE';
    const [target, text] = args;
    if (target === undefined) {
      if (!quiet) this.numeric(client, NUMERICS.ERR_NORECIPIENT, [], `No recipient given (${command})`);
      return;
    }
    if (text === undefined || text === '') {
      if (!quiet) this.numeric(client, NUMERICS.ERR_NOTEXTTOSEND, [], 'No text to send');
      return;
    }

    if (target.startsWith('#') || target.startsWith('&')) {
      const channel = this.findChannel(target);
      if (!channel) {
        if (!quiet) this.numeric(client, NUMERICS.ERR_NOSUCHCHANNEL, [target], 'No such channel');
        return;
      }
      if (!channel.members.has(client)) {
        if (!quiet) this.numeric(client, NUMERICS.ERR_CANNOTSENDTOCHAN, [channel.name], 'Cannot send to channel');
        return;
      }
      const message = this.fromClient(client, command, channel.name, text);
      this.toChannel(channel, message, this.faults.echoChannelMessages ? undefined : client);
      if (this.faults.leakChannelMessages) {
        for (const other of this.clients) {
          if (other.registered && !channel.members.has(other)) this.write(other, message);
        }
      }
      return;
    }

    const recipient = this.findClient(target);
    if (!recipient || !recipient.registered) {
      if (!quiet) this.numeric(client, NUMERICS.ERR_NOSUCHNICK, [target], 'No such nick/channel');
      return;
    }
    this.write(recipient, this.fromClient(client, command, recipient.nick ?? target, text));
  }

  private onKick(client: MockClient, args: string[]): void {
    if (args.length < 2) {
      this.numeric(client, NUMERICS.ERR_NEEDMOREPARAMS, ['KICK'], 'Not enough parameters');
      return;
    }
    const channel = this.memberChannel(client, args[0]);
    if (!channel) return;
    if (!channel.members.get(client)) {
      this.numeric(client, NUMERICS.ERR_CHANOPRIVSNEEDED, [channel.name], "You're not channel operator");
      return;
    }

    const reason = args[2] ?? client.nick ?? '';
    for (const nick of args[1].split(',')) {
      const victim = this.findClient(nick);
      if (!victim || !channel.members.has(victim)) {
        this.numeric(client, NUMERICS.ERR_USERNOTINCHANNEL, [nick, channel.name], "They aren't on that channel");
        continue;
      }
      this.toChannel(channel, this.fromClient(client, 'KICK', channel.name, victim.nick ?? nick, reason));
      this.removeMember(channel, victim);
    }
  }

  private onInvite(client: MockClient, args: string[]): void {
    if (args.length < 2) {
      this.numeric(client, NUMERICS.ERR_NEEDMOREPARAMS, ['INVITE'], 'Not enough parameters');
      return;
    }
    const [nick, name] = args;
    const invitee = this.findClient(nick);
    if (!invitee || !invitee.registered) {
      this.numeric(client, NUMERICS.ERR_NOSUCHNICK, [nick], 'No such nick/channel');
      return;
    }

    const channel = this.findChannel(name);
    if (channel) {
      if (!channel.members.has(client)) {
        this.numeric(client, NUMERICS.ERR_NOTONCHANNEL, [channel.name], "You're not on that channel");
        return;
      }
      if (channel.members.has(invitee)) {
        this.numeric(client, NUMERICS.ERR_USERONCHANNEL, [nick, channel.name], 'is already on channel');
        return;
      }
      if (channel.inviteOnly && !channel.members.get(client)) {
        this.numeric(client, NUMERICS.ERR_CHANOPRIVSNEEDED, [channel.name], "You're not channel operator");
        return;
      }
    }

    const channelName = channel?.name ?? name;
    invitee.invites.add(ircLower(channelName));
    this.numeric(client, NUMERICS.RPL_INVITING, [invitee.nick ?? nick, channelName]);
    this.write(invitee, this.fromClient(client, 'INVITE', invitee.nick ?? nick, channelName));
  }

  private onTopic(client: MockClient, args: string[]): void {
    if (args.length < 1) {
      this.numeric(client, NUMERICS.ERR_NEEDMOREPARAMS, ['TOPIC'], 'Not enough parameters');
      return;
    }
    const channel = this.memberChannel(client, args[0]);
    if (!channel) return;

    const topic = args[1];
    if (topic === undefined) {
      if (channel.topic === null) {
        this.numeric(client, NUMERICS.RPL_NOTOPIC, [channel.name], 'No topic is set');
      } else {
        this.numeric(client, NUMERICS.RPL_TOPIC, [channel.name], channel.topic);
      }
      return;
    }

    if (channel.topicLock && !channel.members.get(client) && !this.faults.ignoreTopicLock) {
      this.numeric(client, NUMERICS.ERR_CHANOPRIVSNEEDED, [channel.name], "You're not channel operator");
      return;
    }
    channel.topic = topic === '' ? null : topic;
    this.toChannel(channel, this.fromClient(client, 'TOPIC', channel.name, topic));
  }

  // ==========================================================================
  // Modes
  // ==========================================================================

  private onMode(client: MockClient, args: string[]): void {
    if (args.length < 1) {
      this.numeric(client, NUMERICS.ERR_NEEDMOREPARAMS, ['MODE'], 'Not enough parameters');
      return;
    }
    const [target, modes, ...modeArgs] = args;

    if (!target.startsWith('#') && !target.startsWith('&')) {
      if (client.nick === null || ircLower(target) !== ircLower(client.nick)) {
        this.numeric(client, NUMERICS.ERR_USERSDONTMATCH, [], "Can't change mode for other users");
      } else if (modes === undefined) {
        this.numeric(client, NUMERICS.RPL_UMODEIS, ['+']);
      }
      return;
    }

    if (modes === undefined) {
      const channel = this.findChannel(target);
      if (!channel) {
        this.numeric(client, NUMERICS.ERR_NOSUCHCHANNEL, [target], 'No such channel');
        return;
      }
      this.numeric(client, NUMERICS.RPL_CHANNELMODEIS, [channel.name, ...this.describeModes(channel, client)]);
      return;
    }

    const channel = this.memberChannel(client, target);
    if (!channel) return;
    if (!channel.members.get(client)) {
      this.numeric(client, NUMERICS.ERR_CHANOPRIVSNEEDED, [channel.name], "You're not channel operator");
      return;
    }

    const applied = this.applyModes(client, channel, modes, modeArgs);
    if (applied.length > 0) {
      this.toChannel(channel, this.fromClient(client, 'MODE', channel.name, ...formatModes(applied)));
    }
  }

  private describeModes(channel: MockChannel, viewer: MockClient): string[] {
    let letters = '+';
    const args: string[] = [];
    if (channel.inviteOnly) letters += 'i';
    if (channel.topicLock) letters += 't';
    if (channel.key !== null) {
      letters += 'k';
      if (channel.members.has(viewer)) args.push(channel.key);
    }
    if (channel.limit !== null) {
      letters += 'l';
      args.push(String(channel.limit));
    }
    return [letters, ...args];
  }

  private applyModes(client: MockClient, channel: MockChannel, modes: string, modeArgs: string[]): ModeChange[] {
    const applied: ModeChange[] = [];
    const pending = [...modeArgs];
    let sign: '+' | '-' = '+';

    for (const letter of modes) {
      if (letter === '+' || letter === '-') {
        sign = letter;
        continue;
      }
      const adding = sign === '+';

      switch (letter) {
        case 'i':
        case 't': {
          const flag = letter === 'i' ? 'inviteOnly' : 'topicLock';
          if (channel[flag] !== adding) {
            channel[flag] = adding;
            applied.push({ sign, letter });
          }
          break;
        }
        case 'k': {
          const key = pending.shift();
          if (adding) {
            if (key === undefined) {
              this.numeric(client, NUMERICS.ERR_NEEDMOREPARAMS, ['MODE'], 'Not enough parameters');
              break;
            }
            channel.key = key;
            applied.push({ sign, letter, arg: key });
          } else if (channel.key !== null) {
            channel.key = null;
            applied.push({ sign, letter, arg: '*' });
          }
          break;
        }
        case 'l': {
          if (!adding) {
            if (channel.limit !== null) {
              channel.limit = null;
              applied.push({ sign, letter });
            }
            break;
          }
          const limit = Number(pending.shift());
          if (!Number.isInteger(limit) || limit < 1) {
            this.numeric(client, NUMERICS.ERR_NEEDMOREPARAMS, ['MODE'], 'Not enough parameters');
            break;
          }
          channel.limit = limit;
          applied.push({ sign, letter, arg: String(limit) });
          break;
        }
        case 'o': {
          const nick = pending.shift();
          if (nick === undefined) {
            this.numeric(client, NUMERICS.ERR_NEEDMOREPARAMS, ['MODE'], 'Not enough parameters');
            break;
          }
          const member = this.findClient(nick);
          if (!member || !channel.members.has(member)) {
            this.numeric(client, NUMERICS.ERR_USERNOTINCHANNEL, [nick, channel.name], "They aren't on that channel");
            break;
          }
          channel.members.set(member, adding);
          applied.push({ sign, letter, arg: member.nick ?? nick });
          break;
        }
        default:
          this.numeric(client, NUMERICS.ERR_UNKNOWNMODE, [letter], 'is unknown mode char to me');
      }
    }
    return applied;
  }
}

/**
 * Mode string and arguments for a MODE broadcast, e.g. ['+o-l', 'nick'].
 */
function formatModes(changes: ModeChange[]): string[] {
  let letters = '';
  let current: string | null = null;
  const args: string[] = [];
  for (const change of changes) {
    if (change.sign !== current) {
      letters += change.sign;
      current = change.sign;
    }
    letters += change.letter;
    if (change.arg !== undefined) args.push(change.arg);
  }
  return [letters, ...args];
}
