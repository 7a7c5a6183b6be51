import { Socket } from 'net';
import { ConnectError, ConnectionClosedError } from '../errors.js';

export type ConnectionState = 'disconnected' | 'connected' | 'closed';

export interface ConnectOptions {
  /** Give up on the TCP handshake after this long (default 10000) */
  timeoutMs?: number;
}

/**
 * One line as framed off the socket.
 */
export interface ReceivedLine {
  /** Decoded as UTF-8, terminator stripped */
  text: string;
  /** Octets on the wire, terminator excluded */
  byteLength: number;
  /** False only for bytes the server left unterminated before closing */
  terminated: boolean;
}

const LF = 0x0a;
const CR = 0x0d;

interface PendingRead {
  resolve: (line: ReceivedLine) => void;
  reject: (error: Error) => void;
}

/**
 * One TCP connection to the server, framed into lines.
 *
 * The socket is owned exclusively by this object. No retries happen here:
 * any socket failure moves the connection to 'closed' for good.
 */
export class Connection {
  private buffer: Buffer = Buffer.alloc(0);
  private lines: ReceivedLine[] = [];
  private readers: PendingRead[] = [];
  private closeReason = 'not connected';
  private closedLocally = false;
  private _state: ConnectionState = 'disconnected';

  private constructor(
    private readonly socket: Socket,
    readonly host: string,
    readonly port: number
  ) {}

  static async connect(host: string, port: number, options: ConnectOptions = {}): Promise<Connection> {
    const { timeoutMs = 10000 } = options;
    const socket = new Socket();
    const connection = new Connection(socket, host, port);

    await new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        socket.destroy();
        reject(new ConnectError(host, port, { cause: new Error(`timeout after ${timeoutMs}ms`) }));
      }, timeoutMs);

      const onError = (err: Error) => {
        clearTimeout(timeout);
        socket.destroy();
        reject(new ConnectError(host, port, { cause: err }));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timeout);
        socket.removeListener('error', onError);
        connection.attach();
        resolve();
      });

      socket.connect(port, host);
    });

    return connection;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isOpen(): boolean {
    return this._state === 'connected';
  }

  private attach(): void {
    this._state = 'connected';
    this.socket.setNoDelay(true);

    // Framed on raw octets so the 512-byte limit is checked on what was sent
    this.socket.on('data', (data: Buffer) => {
      if (this.closedLocally) return;
      this.buffer = this.buffer.length === 0 ? data : Buffer.concat([this.buffer, data]);
      let start = 0;
      let end: number;
      while ((end = this.buffer.indexOf(LF, start)) !== -1) {
        const stop = end > start && this.buffer[end - 1] === CR ? end - 1 : end;
        if (stop > start) {
          this.push(this.frame(this.buffer.subarray(start, stop), true));
        }
        start = end + 1;
      }
      this.buffer = this.buffer.subarray(start);
    });

    this.socket.on('error', (err: Error) => {
      this.markClosed(`socket error: ${err.message}`);
    });

    this.socket.on('close', () => {
      this.markClosed('closed by server');
    });
  }

  private frame(bytes: Buffer, terminated: boolean): ReceivedLine {
    return { text: bytes.toString('utf8'), byteLength: bytes.length, terminated };
  }

  private push(line: ReceivedLine): void {
    const reader = this.readers.shift();
    if (reader) {
      reader.resolve(line);
    } else {
      this.lines.push(line);
    }
  }

  private markClosed(reason: string): void {
    if (this._state === 'closed') return;
    if (!this.closedLocally && this.buffer.length > 0) {
      this.push(this.frame(this.buffer, false));
    }
    this.buffer = Buffer.alloc(0);
    this._state = 'closed';
    this.closeReason = reason;
    for (const reader of this.readers.splice(0)) {
      reader.reject(new ConnectionClosedError(reason));
    }
  }

  /**
   * Send one raw line. CRLF is appended here.
   */
  send(line: string): void {
    if (this._state !== 'connected') {
      throw new ConnectionClosedError(this.closeReason);
    }
    this.socket.write(`${line}\r\n`);
  }

  /**
   * Resolve with the next complete line.
   * Lines received before the connection closed are still delivered, followed
   * by any unterminated remainder; after that this rejects with
   * ConnectionClosedError.
   */
  readLine(): Promise<ReceivedLine> {
    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this._state !== 'connected') {
      return Promise.reject(new ConnectionClosedError(this.closeReason));
    }
    return new Promise((resolve, reject) => {
      this.readers.push({ resolve, reject });
    });
  }

  /**
   * Close the socket. Safe to call more than once, and after the server
   * already closed it.
   */
  close(reason = 'closed locally'): void {
    if (this._state === 'closed') {
      this.socket.destroy();
      return;
    }
    this.closedLocally = true;
    this.lines = [];
    this.markClosed(reason);
    // Flush anything already written (QUIT) before tearing down
    this.socket.end();
    setTimeout(() => this.socket.destroy(), 1000).unref();
  }
}
