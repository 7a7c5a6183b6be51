import { Connection, type ReceivedLine } from './connection.js';
import { anyOf, assignDistinct, command, describeMessages, numeric, type MessageMatcher } from './matchers.js';
import {
  ConnectionClosedError,
  ParseError,
  RegistrationError,
  TimeoutError,
} from '../errors.js';
import {
  buildMessage,
  ircEquals,
  lastArg,
  parseMessage,
  serializeMessage,
  sourceNick,
  type IRCMessage,
  type InboundMessage,
} from '../protocol/message.js';
import { NUMERICS, REGISTRATION_FAILURES } from '../protocol/numerics.js';
import { createLogger, type Logger } from '../log.js';

export type RegistrationState = 'unregistered' | 'registration-sent' | 'registered' | 'failed';

export interface Endpoint {
  host: string;
  port: number;
}

export interface SessionIdentity {
  nick: string;
  username?: string;
  realname?: string;
}

export interface SessionOptions {
  /** Default wait for expect() (default 5000) */
  expectTimeoutMs?: number;
  /** Wait for RPL_WELCOME (default 10000) */
  registrationTimeoutMs?: number;
  /** TCP handshake limit (default 10000) */
  connectTimeoutMs?: number;
  /** Inbound messages kept before the oldest is dropped (default 1000) */
  queueLimit?: number;
  /** Answer server PING automatically (default true) */
  autoPong?: boolean;
  logger?: Logger;
}

export interface ExpectOptions {
  timeoutMs?: number;
  /** Only consider messages that arrived after this mark() */
  since?: number;
}

/**
 * A malformed line the server sent, kept for diagnostics.
 */
export interface ProtocolViolation {
  raw: string;
  reason: string;
}

interface PendingExpectation {
  matcher: MessageMatcher;
  since: number;
  resolve: (message: InboundMessage) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

interface PendingGroup {
  matchers: MessageMatcher[];
  since: number;
  resolve: (messages: InboundMessage[]) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * One simulated IRC client.
 *
 * A background loop reads every line from the connection into an inbound
 * queue; expect() takes the earliest queued message that matches and leaves
 * everything else queued in arrival order.
 */
export class ClientSession {
  private queue: InboundMessage[] = [];
  private pending: PendingExpectation[] = [];
  private groups: PendingGroup[] = [];
  private seq = 0;
  private _dropped = 0;
  private _state: RegistrationState = 'unregistered';
  private _nick: string;
  private closedReason: string | null = null;
  private readonly violations: ProtocolViolation[] = [];
  private readonly pump: Promise<void>;
  private readonly log: Logger;
  private readonly options: Required<Omit<SessionOptions, 'logger'>>;

  readonly username: string;
  readonly realname: string;

  constructor(
    private readonly connection: Connection,
    identity: SessionIdentity,
    options: SessionOptions = {}
  ) {
    this._nick = identity.nick;
    this.username = identity.username ?? identity.nick;
    this.realname = identity.realname ?? 'Conformance Test Client';
    this.options = {
      expectTimeoutMs: options.expectTimeoutMs ?? 5000,
      registrationTimeoutMs: options.registrationTimeoutMs ?? 10000,
      connectTimeoutMs: options.connectTimeoutMs ?? 10000,
      queueLimit: options.queueLimit ?? 1000,
      autoPong: options.autoPong ?? true,
    };
    this.log = options.logger ?? createLogger('session');
    this.pump = this.receiveLoop();
  }

  /**
   * Connect to the server and start receiving. Does not register.
   */
  static async open(endpoint: Endpoint, identity: SessionIdentity, options: SessionOptions = {}): Promise<ClientSession> {
    const connection = await Connection.connect(endpoint.host, endpoint.port, {
      timeoutMs: options.connectTimeoutMs,
    });
    return new ClientSession(connection, identity, options);
  }

  get nick(): string {
    return this._nick;
  }

  get state(): RegistrationState {
    return this._state;
  }

  get connectionState(): Connection['state'] {
    return this.connection.state;
  }

  get closed(): boolean {
    return this.closedReason !== null;
  }

  /** Messages lost because the queue hit its limit */
  get dropped(): number {
    return this._dropped;
  }

  get protocolViolations(): readonly ProtocolViolation[] {
    return this.violations;
  }

  get defaultTimeoutMs(): number {
    return this.options.expectTimeoutMs;
  }

  private async receiveLoop(): Promise<void> {
    for (;;) {
      let line: ReceivedLine;
      try {
        line = await this.connection.readLine();
      } catch (error) {
        const reason = error instanceof ConnectionClosedError ? error.reason : String(error);
        this.markClosed(reason);
        return;
      }
      this.handleLine(line);
    }
  }

  private handleLine(line: ReceivedLine): void {
    const raw = line.text;
    this.log.debug(`${this._nick} <- ${raw}`);

    let message: IRCMessage;
    try {
      if (!line.terminated) {
        throw new ParseError('Unterminated line at connection close', raw);
      }
      message = parseMessage(raw, line.byteLength);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.violations.push({ raw, reason: error.message });
      this.log.warn(`${this._nick}: malformed line from server: ${error.message}`);
      return;
    }

    if (message.command === 'PING' && this.options.autoPong && this.connection.isOpen) {
      this.sendMessage({ command: 'PONG', params: [], trailing: lastArg(message) ?? '' });
    }

    if (message.command === 'NICK') {
      const from = sourceNick(message);
      const to = lastArg(message);
      if (from !== null && to !== undefined && ircEquals(from, this._nick)) {
        this._nick = to;
      }
    }

    this.deliver({ ...message, raw, seq: ++this.seq });
  }

  private deliver(message: InboundMessage): void {
    for (const pending of [...this.pending]) {
      if (message.seq <= pending.since) continue;
      let matched: boolean;
      try {
        matched = pending.matcher(message);
      } catch (error) {
        this.settle(pending);
        pending.reject(error instanceof Error ? error : new Error(String(error)));
        continue;
      }
      if (matched) {
        this.settle(pending);
        pending.resolve(message);
        return;
      }
    }

    this.queue.push(message);
    if (this.queue.length > this.options.queueLimit) {
      this.queue.shift();
      this._dropped++;
    }

    for (const group of [...this.groups]) {
      let taken: InboundMessage[] | null;
      try {
        taken = this.takeDistinct(group.matchers, group.since);
      } catch (error) {
        this.settleGroup(group);
        group.reject(error instanceof Error ? error : new Error(String(error)));
        continue;
      }
      if (taken) {
        this.settleGroup(group);
        group.resolve(taken);
      }
    }
  }

  /**
   * Remove and return one distinct queued message per matcher, or nothing
   * when no complete assignment exists yet.
   */
  private takeDistinct(matchers: MessageMatcher[], since: number): InboundMessage[] | null {
    const candidates = this.queue.filter(message => message.seq > since);
    const assignment = assignDistinct(matchers, candidates);
    if (assignment === null) return null;

    const taken = assignment.map(index => candidates[index]);
    const takenSet = new Set(taken);
    this.queue = this.queue.filter(message => !takenSet.has(message));
    return taken;
  }

  private settle(pending: PendingExpectation): void {
    clearTimeout(pending.timer);
    const index = this.pending.indexOf(pending);
    if (index >= 0) this.pending.splice(index, 1);
  }

  private settleGroup(group: PendingGroup): void {
    clearTimeout(group.timer);
    const index = this.groups.indexOf(group);
    if (index >= 0) this.groups.splice(index, 1);
  }

  private markClosed(reason: string): void {
    if (this.closedReason !== null) return;
    this.closedReason = reason;
    this.log.debug(`${this._nick}: connection closed (${reason})`);
    for (const pending of [...this.pending]) {
      this.settle(pending);
      pending.reject(new ConnectionClosedError(reason, this.unmatchedLines()));
    }
    for (const group of [...this.groups]) {
      this.settleGroup(group);
      group.reject(new ConnectionClosedError(reason, this.unmatchedLines()));
    }
  }

  private unmatchedLines(limit = 20): string[] {
    return describeMessages(this.queue.slice(-limit));
  }

  /**
   * Send one message. Never waits for a reply.
   */
  sendMessage(message: IRCMessage): void {
    const line = serializeMessage(message);
    this.log.debug(`${this._nick} -> ${line}`);
    this.connection.send(line);
  }

  /**
   * Send a command; the last parameter goes out as trailing when it has to.
   */
  send(commandName: string, ...params: string[]): void {
    this.sendMessage(buildMessage(commandName, ...params));
  }

  /**
   * Current sequence number; pass it as `since` to ignore older messages.
   */
  mark(): number {
    return this.seq;
  }

  /**
   * Wait for the earliest message satisfying the matcher.
   *
   * Messages that do not match stay queued for later calls.
   *
   * @throws TimeoutError if nothing matches in time
   * @throws ConnectionClosedError if the connection is (or becomes) closed first
   */
  async expect(matcher: MessageMatcher, options: number | ExpectOptions = {}): Promise<InboundMessage> {
    const { timeoutMs = this.options.expectTimeoutMs, since = 0 } =
      typeof options === 'number' ? { timeoutMs: options } : options;

    const index = this.queue.findIndex(message => message.seq > since && matcher(message));
    if (index !== -1) {
      const [message] = this.queue.splice(index, 1);
      return message;
    }

    if (this.closedReason !== null) {
      throw new ConnectionClosedError(this.closedReason, this.unmatchedLines());
    }

    return new Promise((resolve, reject) => {
      const pending: PendingExpectation = {
        matcher,
        since,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.settle(pending);
          reject(new TimeoutError(`${matcher.label} on ${this._nick}`, timeoutMs, this.unmatchedLines()));
        }, timeoutMs),
      };
      this.pending.push(pending);
    });
  }

  /**
   * Wait until every matcher is satisfied by its own message, whatever order
   * they arrive in. Messages are only taken once the whole set can be
   * assigned, so a timeout leaves the queue as it was.
   *
   * @returns Messages in matcher order
   * @throws TimeoutError naming the matchers when no complete assignment appears in time
   */
  async expectEach(matchers: MessageMatcher[], options: number | ExpectOptions = {}): Promise<InboundMessage[]> {
    const { timeoutMs = this.options.expectTimeoutMs, since = 0 } =
      typeof options === 'number' ? { timeoutMs: options } : options;

    const taken = this.takeDistinct(matchers, since);
    if (taken) {
      return taken;
    }

    if (this.closedReason !== null) {
      throw new ConnectionClosedError(this.closedReason, this.unmatchedLines());
    }

    const label = `all of (${matchers.map(m => m.label).join(', ')})`;
    return new Promise((resolve, reject) => {
      const group: PendingGroup = {
        matchers,
        since,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.settleGroup(group);
          reject(new TimeoutError(`${label} on ${this._nick}`, timeoutMs, this.unmatchedLines()));
        }, timeoutMs),
      };
      this.groups.push(group);
    });
  }

  /**
   * Return and clear every message no expect() has taken.
   */
  drainUnexpected(): InboundMessage[] {
    const drained = this.queue;
    this.queue = [];
    return drained;
  }

  /**
   * Send PASS/NICK/USER and wait for RPL_WELCOME.
   *
   * @returns The welcome message
   * @throws RegistrationError on a rejecting numeric, ERROR, timeout or closure
   */
  async register(password?: string): Promise<InboundMessage> {
    if (this._state !== 'unregistered') {
      throw new RegistrationError(`${this._nick}: register() called in state ${this._state}`);
    }

    const since = this.mark();
    if (password !== undefined) {
      this.send('PASS', password);
    }
    this.send('NICK', this._nick);
    this.sendMessage({ command: 'USER', params: [this.username, '0', '*'], trailing: this.realname });
    this._state = 'registration-sent';

    let reply: InboundMessage;
    try {
      reply = await this.expect(
        anyOf(numeric(NUMERICS.RPL_WELCOME, ...REGISTRATION_FAILURES), command('ERROR')),
        { timeoutMs: this.options.registrationTimeoutMs, since }
      );
    } catch (error) {
      this._state = 'failed';
      const reason = error instanceof TimeoutError ? 'timed out' : 'connection closed';
      throw new RegistrationError(`Registration of ${this._nick} ${reason}`, null, null, { cause: error });
    }

    if (reply.command !== NUMERICS.RPL_WELCOME) {
      this._state = 'failed';
      throw new RegistrationError(
        `Registration of ${this._nick} rejected with ${reply.command}`,
        reply.command,
        reply.raw
      );
    }

    this._state = 'registered';
    const assigned = reply.params[0];
    if (assigned && assigned !== '*') {
      this._nick = assigned;
    }
    return reply;
  }

  /**
   * Send QUIT (when registered), close the connection and wait for the
   * receive loop to finish. Safe to call more than once.
   */
  async close(message = 'Leaving'): Promise<void> {
    if (this.connection.isOpen && this._state === 'registered') {
      this.sendMessage({ command: 'QUIT', params: [], trailing: message });
    }
    this.connection.close();
    await this.pump;
  }
}
