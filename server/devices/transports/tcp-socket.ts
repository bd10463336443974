/**
 * Raw TCP socket transport
 * SCPI over a LAN socket (TCPIP::<host>::<port>::SOCKET, usually port 5025).
 * Commands and replies are newline-terminated ASCII lines.
 */

import { Socket } from 'net';
import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ConnectionError, TransportError } from '../../../shared/errors.js';

export interface TcpSocketConfig {
  host: string;
  port: number;
  timeout?: number;  // connect and query timeout in ms (default: 10000)
}

export function createTcpSocketTransport(config: TcpSocketConfig): Transport {
  const { host, port, timeout = 10_000 } = config;
  const address = `${host}:${port}`;

  let socket: Socket | null = null;
  let opened = false;
  let disconnectError: TransportError | null = null;

  // Complete lines not yet claimed by a query, and the partial line after them
  let received = '';
  const lines: string[] = [];
  let lineWaiter: ((line: string) => void) | null = null;
  // Replies still owed to queries that timed out; dropped when they arrive
  let staleReplies = 0;

  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function onData(data: Buffer): void {
    received += data.toString('ascii');
    let newline = received.indexOf('\n');
    while (newline !== -1) {
      const line = received.slice(0, newline).trim();
      received = received.slice(newline + 1);
      if (staleReplies > 0) {
        staleReplies--;
      } else if (lineWaiter) {
        const waiter = lineWaiter;
        lineWaiter = null;
        waiter(line);
      } else {
        lines.push(line);
      }
      newline = received.indexOf('\n');
    }
  }

  function nextLine(cmd: string): Promise<string> {
    const queued = lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);

    return new Promise<string>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        lineWaiter = null;
        staleReplies++;
        reject(TransportError.timeout(cmd, timeout));
      }, timeout);

      lineWaiter = (line: string) => {
        clearTimeout(timeoutId);
        resolve(line);
      };
    });
  }

  function send(target: Socket, cmd: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      target.write(cmd + '\n', 'ascii', (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  function unavailable(): TransportError {
    return disconnectError ?? new TransportError('io', 'Socket not opened');
  }

  return {
    async open(): Promise<Result<void, ConnectionError>> {
      if (opened) return Ok();

      const newSocket = new Socket();
      newSocket.setNoDelay(true);

      try {
        await new Promise<void>((resolve, reject) => {
          const timeoutId = setTimeout(() => {
            newSocket.destroy();
            reject(new Error(`Connection timed out after ${timeout}ms`));
          }, timeout);

          newSocket.once('connect', () => {
            clearTimeout(timeoutId);
            resolve();
          });
          newSocket.once('error', (err) => {
            clearTimeout(timeoutId);
            reject(err);
          });

          newSocket.connect(port, host);
        });
      } catch (e) {
        newSocket.removeAllListeners();
        newSocket.destroy();
        return Err(new ConnectionError(address, e instanceof Error ? e.message : String(e), { cause: e }));
      }

      newSocket.on('data', onData);
      newSocket.on('error', (err) => {
        disconnectError = TransportError.io(err);
        opened = false;
      });
      newSocket.on('close', () => {
        if (!disconnectError) {
          disconnectError = new TransportError('io', `SOCKET_CLOSED: ${address}`);
        }
        opened = false;
      });

      socket = newSocket;
      opened = true;
      disconnectError = null;
      received = '';
      lines.length = 0;
      staleReplies = 0;
      console.log(`[TCP] Connected to ${address}`);
      return Ok();
    },

    async close(): Promise<Result<void, TransportError>> {
      if (!socket) return Ok();

      await withLock(async () => {
        const current = socket;
        if (current) {
          current.removeAllListeners();
          await new Promise<void>((resolve) => {
            current.end(() => resolve());
          });
          current.destroy();
        }
        socket = null;
        opened = false;
        disconnectError = null;
        lineWaiter = null;
        staleReplies = 0;
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, TransportError>> {
      return withLock(async () => {
        const target = socket;
        if (!opened || !target) {
          return Err(unavailable());
        }

        try {
          await send(target, cmd);
          return Ok(await nextLine(cmd));
        } catch (e) {
          return Err(e instanceof TransportError ? e : TransportError.io(e));
        }
      });
    },

    async write(cmd: string): Promise<Result<void, TransportError>> {
      return withLock(async () => {
        const target = socket;
        if (!opened || !target) {
          return Err(unavailable());
        }

        try {
          await send(target, cmd);
        } catch (e) {
          return Err(TransportError.io(e));
        }
        return Ok();
      });
    },

    isOpen(): boolean {
      return opened;
    },
  };
}
