/**
 * Serial Transport
 * Line-oriented SCPI over a serial port (ASRL resources, USB-serial adapters)
 */

import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ConnectionError, TransportError } from '../../../shared/errors.js';

export interface SerialConfig {
  path: string;
  baudRate: number;
  commandDelay?: number;  // ms delay after each command (default: 20)
  timeout?: number;       // query timeout in ms (default: 10000)
}

export function createSerialTransport(config: SerialConfig): Transport {
  const { path, baudRate, commandDelay = 20, timeout = 10_000 } = config;

  let port: SerialPort | null = null;
  let parser: ReadlineParser | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: TransportError | null = null;

  // Mutex to prevent concurrent command/response interleaving
  let commandLock: Promise<void> = Promise.resolve();

  const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

  // Acquire lock for exclusive command access
  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function unavailable(): TransportError {
    return disconnectError ?? new TransportError('io', 'Port not opened');
  }

  function send(target: SerialPort, cmd: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      target.write(cmd + '\n', (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  return {
    async open(): Promise<Result<void, ConnectionError>> {
      if (opened) return Ok();

      const newPort = new SerialPort({
        path,
        baudRate,
        autoOpen: false,
      });

      // Listen for port disconnection events
      newPort.on('close', () => {
        disconnected = true;
        disconnectError = new TransportError('io', 'SERIAL_PORT_DISCONNECTED: Port closed');
        opened = false;
      });

      newPort.on('error', (err) => {
        disconnected = true;
        disconnectError = TransportError.io(err);
      });

      parser = newPort.pipe(new ReadlineParser({ delimiter: '\n' }));
      port = newPort;

      try {
        await new Promise<void>((resolve, reject) => {
          newPort.open((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        newPort.removeAllListeners();
        port = null;
        parser = null;
        return Err(new ConnectionError(path, e instanceof Error ? e.message : String(e), { cause: e }));
      }

      opened = true;
      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async close(): Promise<Result<void, TransportError>> {
      if (!port) return Ok();

      // Acquire lock to wait for any in-flight operations
      await withLock(async () => {
        parser?.removeAllListeners();
        const current = port;
        current?.removeAllListeners();

        if (opened && !disconnected && current) {
          await new Promise<void>((resolve) => {
            current.close(() => resolve());
          });
        }

        port = null;
        parser = null;
        opened = false;
        disconnected = false;
        disconnectError = null;
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, TransportError>> {
      return withLock(async () => {
        const target = port;
        const lines = parser;
        if (disconnected || !target || !lines) {
          return Err(unavailable());
        }

        let result: string;
        try {
          result = await new Promise<string>((resolve, reject) => {
            let settled = false;

            const cleanup = () => {
              if (!settled) {
                settled = true;
                clearTimeout(timeoutId);
                lines.removeListener('data', onData);
              }
            };

            const onData = (data: string) => {
              cleanup();
              resolve(data.trim());
            };

            const timeoutId = setTimeout(() => {
              cleanup();
              reject(TransportError.timeout(cmd, timeout));
            }, timeout);

            lines.once('data', onData);

            send(target, cmd).catch((err: unknown) => {
              cleanup();
              reject(err);
            });
          });
        } catch (e) {
          return Err(e instanceof TransportError ? e : TransportError.io(e));
        }

        // Let the instrument settle before the next command
        await delay(commandDelay);

        return Ok(result);
      });
    },

    async write(cmd: string): Promise<Result<void, TransportError>> {
      return withLock(async () => {
        const target = port;
        if (disconnected || !target) {
          return Err(unavailable());
        }

        try {
          await send(target, cmd);
        } catch (e) {
          return Err(TransportError.io(e));
        }

        await delay(commandDelay);
        return Ok();
      });
    },

    isOpen(): boolean {
      return opened && !disconnected;
    },
  };
}

// Helper to list available serial ports
export async function listSerialPorts(): Promise<Array<{ path: string; manufacturer?: string }>> {
  const ports = await SerialPort.list();
  return ports.map(p => ({
    path: p.path,
    manufacturer: p.manufacturer,
  }));
}
