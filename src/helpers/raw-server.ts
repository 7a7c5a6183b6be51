/**
 * Scriptable TCP peer for tests that need exact control over the bytes a
 * client receives (partial lines, malformed lines, abrupt closes).
 */

import { createServer, type Socket } from 'net';

export interface RawServer {
  port: number;
  /** Every chunk received from any client, in order */
  received: string[];
  /** The next accepted socket, waiting for it when none is pending */
  nextSocket(): Promise<Socket>;
  close(): Promise<void>;
}

export async function startRawServer(): Promise<RawServer> {
  const sockets = new Set<Socket>();
  const accepted: Socket[] = [];
  const waiters: Array<(socket: Socket) => void> = [];
  const received: string[] = [];

  const server = createServer(socket => {
    sockets.add(socket);
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => received.push(chunk));
    socket.on('error', () => socket.destroy());
    socket.on('close', () => sockets.delete(socket));

    const waiter = waiters.shift();
    if (waiter) {
      waiter(socket);
    } else {
      accepted.push(socket);
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      server.off('error', reject);
      resolve();
    });
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('raw server has no TCP address');
  }

  return {
    port: address.port,
    received,
    nextSocket: () => {
      const socket = accepted.shift();
      return socket ? Promise.resolve(socket) : new Promise(resolve => waiters.push(resolve));
    },
    close: () =>
      new Promise<void>(resolve => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };
}
