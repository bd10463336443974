/**
 * Command completion protocol
 *
 * Instruments accept commands asynchronously: a write returns as soon as the
 * bytes are on the wire, not when the setting has taken effect. Every
 * state-changing command therefore goes through commandWait():
 *
 *   write(command) → write(*WAI) → poll *OPC? until it reads 1
 *
 * Polling is bounded by a deadline on the injected clock. When the deadline
 * passes without a 1 the call fails with CommandNotConfirmedError.
 */

import type { Result, Transport } from './types.js';
import { Ok, Err } from '../../shared/types.js';
import {
  CommandNotConfirmedError,
  ResponseParseError,
  type InstrumentError,
} from '../../shared/errors.js';
import { ScpiParser } from './scpi-parser.js';
import { systemClock, type Clock } from './clock.js';

export const SYNC_MARKER = '*WAI';
export const COMPLETION_QUERY = '*OPC?';
export const DEFAULT_POLL_INTERVAL_MS = 200;

export interface CommandCompletionOptions {
  /** Overall deadline for one command, usually the session timeout */
  timeoutMs: number;
  pollIntervalMs?: number;
  clock?: Clock;
}

export interface CommandCompletion {
  commandWait(command: string): Promise<Result<void, InstrumentError>>;
}

export function createCommandCompletion(
  transport: Transport,
  options: CommandCompletionOptions,
): CommandCompletion {
  const { timeoutMs, pollIntervalMs = DEFAULT_POLL_INTERVAL_MS, clock = systemClock } = options;

  // One command in flight at a time, so the instrument sees them in issue order
  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  async function waitForCompletion(command: string): Promise<Result<void, InstrumentError>> {
    const startedAt = clock.now();
    const deadline = startedAt + timeoutMs;

    for (;;) {
      const reply = await transport.query(COMPLETION_QUERY);
      if (!reply.ok) return reply;

      const flag = ScpiParser.parseInteger(reply.value);
      if (!flag.ok) {
        return Err(new ResponseParseError(COMPLETION_QUERY, reply.value, flag.error));
      }
      if (flag.value === 1) return Ok();

      if (clock.now() >= deadline) {
        const elapsedMs = clock.now() - startedAt;
        console.warn(`[Completion] "${command}" not confirmed after ${elapsedMs}ms`);
        return Err(new CommandNotConfirmedError(command, elapsedMs));
      }
      await clock.sleep(pollIntervalMs);
    }
  }

  return {
    commandWait(command: string): Promise<Result<void, InstrumentError>> {
      return withLock(async () => {
        const writeResult = await transport.write(command);
        if (!writeResult.ok) return writeResult;

        const syncResult = await transport.write(SYNC_MARKER);
        if (!syncResult.ok) return syncResult;

        return waitForCompletion(command);
      });
    },
  };
}
