/**
 * Rohde & Schwarz SMA100B / SMB100A Microwave Signal Source Driver
 *
 * Three frequency modes: CW, list (externally triggered step through a stored
 * list) and sweep (externally triggered linear step sweep).
 *
 * Mode, list, sweep and trigger-edge settings are only accepted while RF is
 * off, so every configuration call switches the output off first when needed.
 * Configuration calls return what the instrument reports afterwards, never the
 * requested values.
 *
 * Note: in step-sweep mode the first external trigger advances from the start
 * register to the first point. The start register is therefore written one
 * step below the requested start, and the reading adds that step back.
 */

import type {
  CwSettings,
  FrequencyReading,
  ListSettings,
  OperatingState,
  PowerReading,
  SessionOptions,
  SignalSourceSession,
  SourceConfiguration,
  SourceMode,
  SweepSettings,
  TriggerEdge,
} from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err, Result as R } from '../../../shared/types.js';
import {
  InvalidArgumentError,
  LengthMismatchError,
  ResponseParseError,
  type IncompatibleUnitFamilyError,
  type InstrumentError,
} from '../../../shared/errors.js';
import { Quantity, dBm, type Frequency, type Power } from '../../../shared/quantity.js';
import { ScpiParser } from '../scpi-parser.js';
import { openSessionCore, type SessionCore } from '../session.js';
import { loadConfigFromEnv } from '../../config.js';

const MODE_TOKENS: Record<string, SourceMode> = {
  CW: 'cw',
  FIX: 'cw',
  FIXED: 'cw',
  LIST: 'list',
  SWE: 'sweep',
  SWEEP: 'sweep',
};

const MODE_COMMANDS: Record<SourceMode, string> = {
  cw: ':FREQ:MODE CW',
  list: ':FREQ:MODE LIST',
  sweep: ':FREQ:MODE SWE',
};

const SLOPE_TOKENS: Record<TriggerEdge, string> = {
  rising: 'POS',
  falling: 'NEG',
};

export interface SignalSourceOptions extends SessionOptions {
  /** Instrument list buffer used by list mode (default: MW_LIST_NAME or bench_list) */
  listName?: string;
}

/**
 * List-power readback quirk.
 *
 * The list collapses to a single power when Number(every entry is non-zero)
 * equals the first entry. That is true for [1, 1, 1] and for [0, 5] but not
 * for [5, 5, 5]. It is not an all-equal test; callers rely on the shape as is.
 */
export function collapseListPower(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const allNonZero = values.every(v => v !== 0);
  return Number(allNonZero) === values[0] ? values[0] : null;
}

type SettingError = IncompatibleUnitFamilyError | InvalidArgumentError;

function checkFinite(q: Quantity, what: string): Result<void, InvalidArgumentError> {
  if (Number.isFinite(q.magnitude)) return Ok();
  return Err(new InvalidArgumentError(`${what} must be a finite number, got ${q.magnitude} ${q.unit}`));
}

function ghzText(q: Frequency): Result<string, SettingError> {
  const finite = checkFinite(q, 'Frequency');
  if (!finite.ok) return finite;
  return R.map(Quantity.convertTo(q, 'GHz'), g => Quantity.format(g));
}

function dbmText(q: Power): Result<string, SettingError> {
  const finite = checkFinite(q, 'Power');
  if (!finite.ok) return finite;
  return R.map(Quantity.convertTo(q, 'dBm'), p => Quantity.formatMagnitude(p));
}

function parseFrequencyList(command: string, reply: string): Result<Frequency[], ResponseParseError> {
  const parts = ScpiParser.parseCsv(reply);
  const parsed = R.all(parts.map(part => Quantity.parse(part, 'frequency', 'Hz')));
  if (!parsed.ok) return Err(new ResponseParseError(command, reply, parsed.error));
  return Ok(parsed.value);
}

export async function openSignalSource(
  address: string,
  options: SignalSourceOptions = {}
): Promise<Result<SignalSourceSession, InstrumentError>> {
  const core = await openSessionCore(address, options);
  if (!core.ok) return core;

  const listName = options.listName ?? loadConfigFromEnv().listName;
  return Ok(createSignalSourceSession(core.value, listName));
}

export function createSignalSourceSession(core: SessionCore, listName: string): SignalSourceSession {
  async function getStatus(): Promise<Result<OperatingState, InstrumentError>> {
    const output = await core.queryNumber('OUTP:STAT?');
    if (!output.ok) return output;

    const modeReply = await core.query(':FREQ:MODE?');
    if (!modeReply.ok) return modeReply;

    const mode = ScpiParser.parseEnum(modeReply.value, MODE_TOKENS);
    if (!mode.ok) {
      return Err(new ResponseParseError(':FREQ:MODE?', modeReply.value, mode.error));
    }

    return Ok({ mode: mode.value, running: Math.trunc(output.value) !== 0 });
  }

  async function turnOff(): Promise<Result<void, InstrumentError>> {
    const state = await getStatus();
    if (!state.ok) return state;
    if (!state.value.running) return Ok();
    return core.commandWait('OUTP:STAT OFF');
  }

  // Switch RF off when the settings about to change are locked while running
  async function stopIfRunning(state: OperatingState): Promise<Result<void, InstrumentError>> {
    return state.running ? turnOff() : Ok();
  }

  async function runAll(commands: readonly string[]): Promise<Result<void, InstrumentError>> {
    for (const command of commands) {
      const result = await core.commandWait(command);
      if (!result.ok) return result;
    }
    return Ok();
  }

  async function readFrequency(mode: SourceMode): Promise<Result<FrequencyReading, InstrumentError>> {
    switch (mode) {
      case 'cw': {
        const frequency = await core.queryQuantity(':FREQ?', 'frequency', 'Hz');
        if (!frequency.ok) return frequency;
        return Ok({ mode: 'cw', frequency: frequency.value });
      }
      case 'sweep': {
        const start = await core.queryQuantity(':FREQ:STAR?', 'frequency', 'Hz');
        if (!start.ok) return start;
        const stop = await core.queryQuantity(':FREQ:STOP?', 'frequency', 'Hz');
        if (!stop.ok) return stop;
        const step = await core.queryQuantity(':SWE:STEP?', 'frequency', 'Hz');
        if (!step.ok) return step;
        return Ok({
          mode: 'sweep',
          start: Quantity.add(start.value, step.value),
          stop: stop.value,
          step: step.value,
        });
      }
      case 'list': {
        const reply = await core.query(':LIST:FREQ?');
        if (!reply.ok) return reply;
        const frequencies = parseFrequencyList(':LIST:FREQ?', reply.value);
        if (!frequencies.ok) return frequencies;
        return Ok({ mode: 'list', frequencies: frequencies.value });
      }
    }
  }

  async function readPower(mode: SourceMode): Promise<Result<PowerReading, InstrumentError>> {
    if (mode !== 'list') {
      const power = await core.queryQuantity(':POW?', 'power', 'dBm');
      if (!power.ok) return power;
      return Ok({ kind: 'single', mode, power: power.value });
    }

    const reply = await core.query(':LIST:POW?');
    if (!reply.ok) return reply;
    const values = ScpiParser.parseNumberList(reply.value);
    if (!values.ok) {
      return Err(new ResponseParseError(':LIST:POW?', reply.value, values.error));
    }

    const collapsed = collapseListPower(values.value);
    if (collapsed !== null) {
      return Ok({ kind: 'single', mode: 'list', power: dBm(collapsed) });
    }
    return Ok({ kind: 'sequence', mode: 'list', powers: values.value.map(dBm) });
  }

  async function readConfiguration(): Promise<Result<SourceConfiguration, InstrumentError>> {
    const state = await getStatus();
    if (!state.ok) return state;

    const frequency = await readFrequency(state.value.mode);
    if (!frequency.ok) return frequency;

    const power = await readPower(state.value.mode);
    if (!power.ok) return power;

    return Ok({ mode: state.value.mode, frequency: frequency.value, power: power.value });
  }

  // Stop, write `before`, enter `target` if not already there, then write `after`
  async function configure(
    target: SourceMode,
    before: readonly string[],
    after: readonly string[]
  ): Promise<Result<SourceConfiguration, InstrumentError>> {
    const state = await getStatus();
    if (!state.ok) return state;

    const stopped = await stopIfRunning(state.value);
    if (!stopped.ok) return stopped;

    const commands = state.value.mode === target
      ? [...before, ...after]
      : [...before, MODE_COMMANDS[target], ...after];

    const applied = await runAll(commands);
    if (!applied.ok) return applied;

    return readConfiguration();
  }

  async function switchOn(target: SourceMode): Promise<Result<void, InstrumentError>> {
    const state = await getStatus();
    if (!state.ok) return state;

    if (state.value.mode === target) {
      if (state.value.running) return Ok();
    } else {
      const stopped = await stopIfRunning(state.value);
      if (!stopped.ok) return stopped;

      const entered = await runAll(
        target === 'list'
          ? [MODE_COMMANDS.list, `:LIST:SEL "${listName}"`]
          : [MODE_COMMANDS[target]]
      );
      if (!entered.ok) return entered;
    }

    return core.commandWait(':OUTP:STAT ON');
  }

  async function listPointCount(): Promise<Result<number, InstrumentError>> {
    const selected = await core.commandWait(`:LIST:SEL "${listName}"`);
    if (!selected.ok) return selected;
    const count = await core.queryNumber(':LIST:FREQ:POIN?');
    if (!count.ok) return count;
    return Ok(Math.trunc(count.value));
  }

  async function close(): Promise<Result<void, InstrumentError>> {
    const off = await turnOff();
    if (!off.ok) {
      console.error(`[SMB] Could not switch RF off before closing ${core.address}: ${off.error.message}`);
    }
    const released = await core.release();
    return off.ok ? released : off;
  }

  return {
    address: core.address,
    timeoutMs: core.timeoutMs,
    identity: core.identity,
    model: core.identity.model,

    getStatus,
    turnOff,
    close,

    async enterCW(settings: CwSettings = {}): Promise<Result<SourceConfiguration, InstrumentError>> {
      const commands: string[] = [];

      if (settings.frequency) {
        const text = ghzText(settings.frequency);
        if (!text.ok) return text;
        commands.push(`:FREQ ${text.value}`);
      }
      if (settings.power) {
        const text = dbmText(settings.power);
        if (!text.ok) return text;
        commands.push(`:POW ${text.value}`);
      }

      return configure('cw', [], commands);
    },

    cwOn: () => switchOn('cw'),

    async enterList(settings: ListSettings = {}): Promise<Result<SourceConfiguration, InstrumentError>> {
      const { frequencies, power } = settings;

      if (frequencies && frequencies.length === 0) {
        return Err(new InvalidArgumentError('Frequency list must not be empty'));
      }
      if (Array.isArray(power)) {
        if (power.length === 0) {
          return Err(new InvalidArgumentError('Power list must not be empty'));
        }
        if (frequencies && power.length !== frequencies.length) {
          return Err(new LengthMismatchError(frequencies.length, power.length));
        }
      }

      const frequencyTexts = frequencies ? R.all(frequencies.map(ghzText)) : Ok(null);
      if (!frequencyTexts.ok) return frequencyTexts;

      const powers = power === undefined ? [] : Array.isArray(power) ? power : [power];
      const powerTexts = R.all(powers.map(dbmText));
      if (!powerTexts.ok) return powerTexts;

      const commands: string[] = [`:LIST:SEL "${listName}"`];
      if (frequencyTexts.value) {
        commands.push(`:LIST:FREQ ${frequencyTexts.value.join(', ')}`);
      }

      // Without new frequencies, powers are sized against the stored list
      let points = frequencies?.length ?? 0;
      if (power !== undefined && !frequencies) {
        const state = await getStatus();
        if (!state.ok) return state;
        const stopped = await stopIfRunning(state.value);
        if (!stopped.ok) return stopped;

        const count = await listPointCount();
        if (!count.ok) return count;
        points = count.value;

        if (Array.isArray(power)) {
          if (power.length !== points) {
            return Err(new LengthMismatchError(points, power.length));
          }
        } else if (points < 1) {
          return Err(new InvalidArgumentError(`List "${listName}" has no points to apply a power to`));
        }
      }

      if (Array.isArray(power)) {
        commands.push(`:LIST:POW ${powerTexts.value.join(', ')}`);
      } else if (power) {
        // One power for every point
        commands.push(`:LIST:POW ${Array<string>(points).fill(powerTexts.value[0]).join(', ')}`);
      }

      return configure('list', commands, [':LIST:MODE STEP', ':LIST:TRIG:SOUR EXT']);
    },

    listOn: () => switchOn('list'),

    // Position resets are single-shot; the instrument confirms nothing
    resetListPosition: () => core.write(':LIST:RES'),

    async enterSweep(settings: SweepSettings = {}): Promise<Result<SourceConfiguration, InstrumentError>> {
      const { start, stop, step, power } = settings;
      const given = [start, stop, step].filter(q => q !== undefined).length;
      if (given !== 0 && given !== 3) {
        return Err(new InvalidArgumentError('Sweep start, stop and step must be given together'));
      }

      const commands: string[] = [];

      if (start && stop && step) {
        for (const [q, what] of [[start, 'Sweep start'], [stop, 'Sweep stop'], [step, 'Sweep step']] as const) {
          const finite = checkFinite(q, what);
          if (!finite.ok) return finite;
        }

        const startGHz = Quantity.magnitudeIn(start, 'GHz');
        if (!startGHz.ok) return startGHz;
        const stopGHz = Quantity.magnitudeIn(stop, 'GHz');
        if (!stopGHz.ok) return stopGHz;
        const stepGHz = Quantity.magnitudeIn(step, 'GHz');
        if (!stepGHz.ok) return stepGHz;

        if (stepGHz.value <= 0) {
          return Err(new InvalidArgumentError('Sweep step must be positive'));
        }
        if (stopGHz.value < startGHz.value) {
          return Err(new InvalidArgumentError('Sweep stop must not be below start'));
        }

        const register = Quantity.subtract(Quantity.to(start, 'GHz'), step);
        commands.push(
          ':SWE:MODE STEP',
          ':SWE:SPAC LIN',
          `:FREQ:STAR ${Quantity.format(register)}`,
          `:FREQ:STOP ${Quantity.format(Quantity.to(stop, 'GHz'))}`,
          `:SWE:STEP:LIN ${Quantity.format(Quantity.to(step, 'GHz'))}`,
        );
      }

      if (power) {
        const text = dbmText(power);
        if (!text.ok) return text;
        commands.push(`:POW ${text.value}`);
      }

      commands.push(':TRIG:FSW:SOUR EXT');
      return configure('sweep', [], commands);
    },

    sweepOn: () => switchOn('sweep'),

    resetSweepPosition: () => core.write(':ABOR:SWE'),

    async setExternalTrigger(edge: TriggerEdge): Promise<Result<void, InstrumentError>> {
      if (!Object.hasOwn(SLOPE_TOKENS, edge)) {
        return Err(new InvalidArgumentError(`Unknown trigger edge: ${String(edge)}`));
      }

      const state = await getStatus();
      if (!state.ok) return state;
      const stopped = await stopIfRunning(state.value);
      if (!stopped.ok) return stopped;

      return core.commandWait(`:TRIG1:SLOP ${SLOPE_TOKENS[edge]}`);
    },

    async getExternalTrigger(): Promise<Result<TriggerEdge, InstrumentError>> {
      const reply = await core.query(':TRIG1:SLOP?');
      if (!reply.ok) return reply;
      return Ok(reply.value.trim().toUpperCase().startsWith('POS') ? 'rising' : 'falling');
    },

    async getFrequency(): Promise<Result<FrequencyReading, InstrumentError>> {
      const state = await getStatus();
      if (!state.ok) return state;
      return readFrequency(state.value.mode);
    },

    async getPower(): Promise<Result<PowerReading, InstrumentError>> {
      const state = await getStatus();
      if (!state.ok) return state;
      return readPower(state.value.mode);
    },
  };
}
