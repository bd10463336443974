import type { Transport, TransportOpener } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { TransportError, type ConnectionError } from '../../../shared/errors.js';

export interface MockTransportOptions {
  /** Fixed replies by command; a leading colon is ignored */
  responses?: Record<string, string>;
  /** Replies consumed in order; the last one repeats */
  sequences?: Record<string, string[]>;
  /** Consulted before the scripted replies when it returns a string */
  handler?: (cmd: string) => string | null;
  /** Commands that fail instead of being sent */
  failures?: Record<string, TransportError>;
  defaultResponse?: string;
}

export interface MockTransport extends Transport {
  /** Every write and query, in order */
  sentCommands: string[];
  /** Writes only, without the *WAI sync markers */
  writes: string[];
  responses: Record<string, string>;
  sequences: Record<string, string[]>;
  failures: Record<string, TransportError>;
  reset(): void;
}

// ":FREQ?" and "FREQ?" address the same setting
function normalize(cmd: string): string {
  return cmd.trim().replace(/^:/, '');
}

function normalizeKeys<T>(record: Record<string, T> = {}): Record<string, T> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [normalize(key), value]));
}

export function createMockTransport(options: MockTransportOptions = {}): MockTransport {
  const responses: Record<string, string> = { '*OPC?': '1', ...normalizeKeys(options.responses) };
  const sequences = normalizeKeys(options.sequences);
  const failures = normalizeKeys(options.failures);
  const defaultResponse = options.defaultResponse ?? '';
  let opened = false;
  const sentCommands: string[] = [];
  const writes: string[] = [];

  // Track written values to update query responses
  // "VOLT 24.5" sets "VOLT?", ":FREQ:MODE CW" sets "FREQ:MODE?", "OUTP ON" sets "OUTP?" to 1
  function handleWrite(cmd: string): void {
    const match = normalize(cmd).match(/^([A-Z][A-Z0-9:]*)\s+(.+)$/i);
    if (!match) return;

    const [, header, value] = match;
    const upper = value.toUpperCase();
    responses[`${header}?`] = upper === 'ON' ? '1' : upper === 'OFF' ? '0' : value;
  }

  function lookup(cmd: string): string {
    if (options.handler) {
      const handled = options.handler(cmd);
      if (handled !== null) return handled;
    }

    const key = normalize(cmd);
    const queued = sequences[key];
    if (queued && queued.length > 0) {
      return queued.length > 1 ? queued.shift() ?? defaultResponse : queued[0];
    }
    return responses[key] ?? defaultResponse;
  }

  function notOpen(): TransportError {
    return new TransportError('io', 'Transport not opened');
  }

  return {
    sentCommands,
    writes,
    responses,
    sequences,
    failures,

    async open(): Promise<Result<void, ConnectionError>> {
      opened = true;
      return Ok();
    },

    async close(): Promise<Result<void, TransportError>> {
      opened = false;
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, TransportError>> {
      if (!opened) return Err(notOpen());
      sentCommands.push(cmd);

      const failure = failures[normalize(cmd)];
      if (failure) return Err(failure);

      return Ok(lookup(cmd));
    },

    async write(cmd: string): Promise<Result<void, TransportError>> {
      if (!opened) return Err(notOpen());
      sentCommands.push(cmd);

      const failure = failures[normalize(cmd)];
      if (failure) return Err(failure);

      if (cmd !== '*WAI') writes.push(cmd);
      if (options.handler) options.handler(cmd);
      handleWrite(cmd);
      return Ok();
    },

    isOpen(): boolean {
      return opened;
    },

    reset(): void {
      sentCommands.length = 0;
      writes.length = 0;
    },
  };
}

/** Session opener that hands out `transport` for any address */
export function mockOpener(transport: Transport): TransportOpener {
  return async () => {
    const opened = await transport.open();
    if (!opened.ok) return opened;
    return Ok(transport);
  };
}
