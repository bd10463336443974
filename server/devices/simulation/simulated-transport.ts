/**
 * Simulated Transport
 * Implements Transport interface for simulated instruments
 *
 * Routes SCPI commands to a simulator and returns responses.
 * Adds configurable latency to mimic real device timing.
 */

import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { TransportError, type ConnectionError } from '../../../shared/errors.js';

export interface SimulatedTransportConfig {
  /** Base latency in ms (default: 0) */
  latencyMs?: number;
  /** Random jitter range in ms (default: 0) */
  jitterMs?: number;
  /** Name for logging */
  name?: string;
}

/** Returns the reply line for a query, null for a plain command */
export type CommandHandler = (cmd: string) => string | null;

export function createSimulatedTransport(
  handler: CommandHandler,
  config: SimulatedTransportConfig = {}
): Transport {
  const { latencyMs = 0, jitterMs = 0, name = 'simulated' } = config;

  let opened = false;

  // Mutex to prevent concurrent commands (like real transports)
  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  async function delay(): Promise<void> {
    const totalDelay = latencyMs + Math.random() * jitterMs;
    if (totalDelay <= 0) return;
    await new Promise(r => setTimeout(r, totalDelay));
  }

  function notOpen(): TransportError {
    return new TransportError('io', `${name}: transport not opened`);
  }

  return {
    async open(): Promise<Result<void, ConnectionError>> {
      opened = true;
      return Ok();
    },

    async close(): Promise<Result<void, TransportError>> {
      opened = false;
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, TransportError>> {
      return withLock(async () => {
        if (!opened) return Err(notOpen());
        await delay();
        const response = handler(cmd);
        return Ok(response ?? '');
      });
    },

    async write(cmd: string): Promise<Result<void, TransportError>> {
      return withLock(async () => {
        if (!opened) return Err(notOpen());
        await delay();
        handler(cmd);
        return Ok();
      });
    },

    isOpen(): boolean {
      return opened;
    },
  };
}
