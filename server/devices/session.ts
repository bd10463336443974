/**
 * Session core shared by every instrument family
 *
 * open:  resolve address → open transport → *IDN? → *CLS → *RST → family init
 * close: family de-energizes first, then release() hands the transport back
 *
 * The session owns its transport exclusively. Mutating commands go through
 * commandWait(); queries go straight to the transport.
 */

import type {
  InstrumentIdentity,
  Result,
  SessionOptions,
  Transport,
  TransportOpener,
} from './types.js';
import { Ok, Err } from '../../shared/types.js';
import { ResponseParseError, type InstrumentError } from '../../shared/errors.js';
import { Quantity, type UnitFamily, type UnitsOf } from '../../shared/quantity.js';
import { ScpiParser } from './scpi-parser.js';
import { createCommandCompletion } from './command-completion.js';
import { systemClock, type Clock } from './clock.js';
import { openResource } from './transports/resource.js';
import { loadConfigFromEnv } from '../config.js';

export interface SessionCore {
  readonly address: string;
  readonly timeoutMs: number;
  readonly identity: InstrumentIdentity;

  /** State-changing command, confirmed through *WAI / *OPC? */
  commandWait(command: string): Promise<Result<void, InstrumentError>>;
  /** Single-shot command with no completion polling */
  write(command: string): Promise<Result<void, InstrumentError>>;
  query(command: string): Promise<Result<string, InstrumentError>>;
  queryNumber(command: string): Promise<Result<number, InstrumentError>>;
  queryQuantity<F extends UnitFamily>(
    command: string,
    family: F,
    defaultUnit: UnitsOf<F>,
  ): Promise<Result<Quantity<UnitsOf<F>>, InstrumentError>>;

  /** Close the transport. Callers de-energize before calling this. */
  release(): Promise<Result<void, InstrumentError>>;
}

interface ResolvedSessionOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  clock: Clock;
  openTransport: TransportOpener;
}

function resolveOptions(options: SessionOptions): ResolvedSessionOptions {
  const config = loadConfigFromEnv();
  return {
    timeoutMs: options.timeoutMs ?? config.timeoutMs,
    pollIntervalMs: options.pollIntervalMs ?? config.pollIntervalMs,
    clock: options.clock ?? systemClock,
    openTransport: options.openTransport ?? openResource,
  };
}

function createSessionCore(
  address: string,
  transport: Transport,
  identity: InstrumentIdentity,
  options: ResolvedSessionOptions,
): SessionCore {
  const completion = createCommandCompletion(transport, {
    timeoutMs: options.timeoutMs,
    pollIntervalMs: options.pollIntervalMs,
    clock: options.clock,
  });

  async function query(command: string): Promise<Result<string, InstrumentError>> {
    return transport.query(command);
  }

  return {
    address,
    timeoutMs: options.timeoutMs,
    identity,

    commandWait: completion.commandWait,

    async write(command: string): Promise<Result<void, InstrumentError>> {
      return transport.write(command);
    },

    query,

    async queryNumber(command: string): Promise<Result<number, InstrumentError>> {
      const reply = await query(command);
      if (!reply.ok) return reply;

      const parsed = ScpiParser.parseNumber(reply.value);
      if (!parsed.ok) {
        return Err(new ResponseParseError(command, reply.value, parsed.error));
      }
      return Ok(parsed.value);
    },

    async queryQuantity<F extends UnitFamily>(
      command: string,
      family: F,
      defaultUnit: UnitsOf<F>,
    ): Promise<Result<Quantity<UnitsOf<F>>, InstrumentError>> {
      const reply = await query(command);
      if (!reply.ok) return reply;

      const parsed = Quantity.parse(reply.value, family, defaultUnit);
      if (!parsed.ok) {
        return Err(new ResponseParseError(command, reply.value, parsed.error));
      }
      return Ok(parsed.value);
    },

    async release(): Promise<Result<void, InstrumentError>> {
      const result = await transport.close();
      if (result.ok) {
        console.log(`[Session] Closed ${identity.model} at ${address}`);
      }
      return result;
    },
  };
}

/**
 * Open a transport at `address`, identify the instrument, then clear status and
 * reset it. `initCommands` run after the reset, through the completion protocol.
 *
 * On any failure after the transport opened, the transport is closed again
 * before the error is returned.
 */
export async function openSessionCore(
  address: string,
  options: SessionOptions = {},
  initCommands: readonly string[] = [],
): Promise<Result<SessionCore, InstrumentError>> {
  const resolved = resolveOptions(options);

  const opened = await resolved.openTransport(address, { timeoutMs: resolved.timeoutMs });
  if (!opened.ok) return opened;
  const transport = opened.value;

  async function abort(error: InstrumentError): Promise<Result<never, InstrumentError>> {
    const closed = await transport.close();
    if (!closed.ok) {
      console.error(`[Session] Failed to release ${address} after open error:`, closed.error.message);
    }
    return Err(error);
  }

  const idn = await transport.query('*IDN?');
  if (!idn.ok) return abort(idn.error);

  const identity = ScpiParser.parseIdentity(idn.value);
  if (!identity.ok) {
    return abort(new ResponseParseError('*IDN?', idn.value, identity.error));
  }

  const core = createSessionCore(address, transport, identity.value, resolved);

  for (const command of ['*CLS', '*RST', ...initCommands]) {
    const result = await core.commandWait(command);
    if (!result.ok) return abort(result.error);
  }

  console.log(`[Session] Opened ${identity.value.manufacturer} ${identity.value.model} at ${address}`);
  return Ok(core);
}
