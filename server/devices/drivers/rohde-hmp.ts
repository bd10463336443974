/**
 * Rohde & Schwarz HMP2030 / HMP4030 Power Supply Driver
 *
 * Three channels sharing one SCPI command set. Setpoint, output and
 * measurement commands act on the selected channel, so every
 * channel-targeted call selects its channel first. The last selection is
 * tracked to skip redundant INST commands; it is dropped on reset and after
 * a failed select.
 *
 * Setpoints are checked against the model's limits before anything is sent.
 */

import type {
  ChannelState,
  PowerSupplySession,
  RegulationStatus,
  SessionOptions,
  SupplyChannel,
  SupplyErrorEntry,
} from '../types.js';
import { SUPPLY_CHANNELS } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import {
  InvalidArgumentError,
  OutOfRangeError,
  ResponseParseError,
  type InstrumentError,
} from '../../../shared/errors.js';
import { Quantity, V, A, type Current, type Voltage } from '../../../shared/quantity.js';
import { ScpiParser } from '../scpi-parser.js';
import { openSessionCore, type SessionCore } from '../session.js';
import { findHmpLimits, DEFAULT_HMP_MODEL, HMP_MODEL_LIMITS, type HmpModelLimits } from './hmp-models.js';

/** Limits for the reported model; unknown models get HMP2030 limits */
export function limitsForModel(model: string): HmpModelLimits {
  const limits = findHmpLimits(model);
  if (limits) return limits;
  console.warn(`[HMP] Unknown model "${model}", using ${DEFAULT_HMP_MODEL} limits`);
  return HMP_MODEL_LIMITS[DEFAULT_HMP_MODEL];
}

export async function openPowerSupply(
  address: string,
  options: SessionOptions = {}
): Promise<Result<PowerSupplySession, InstrumentError>> {
  const core = await openSessionCore(address, options, ['SYST:REM']);
  if (!core.ok) return core;
  return Ok(createPowerSupplySession(core.value));
}

export function createPowerSupplySession(core: SessionCore): PowerSupplySession {
  const limits = limitsForModel(core.identity.model);
  let selectedChannel: SupplyChannel | null = null;

  function checkChannel(channel: number): Result<SupplyChannel, InvalidArgumentError> {
    const match = SUPPLY_CHANNELS.find(ch => ch === channel);
    if (match === undefined) {
      return Err(new InvalidArgumentError(`Channel must be 1, 2 or 3, got ${channel}`));
    }
    return Ok(match);
  }

  // Value in `unit`, finite and within [0, max]
  function checkRange(value: Quantity, unit: 'V' | 'A', max: number): Result<number, InstrumentError> {
    const magnitude = Quantity.magnitudeIn(value, unit);
    if (!magnitude.ok) return magnitude;
    if (!(Number.isFinite(magnitude.value) && magnitude.value >= 0 && magnitude.value <= max)) {
      console.warn(`[HMP] Rejected ${magnitude.value} ${unit}: limit is ${max} ${unit}`);
      return Err(new OutOfRangeError(0, max, magnitude.value, unit));
    }
    return Ok(magnitude.value);
  }

  async function selectChannel(channel: SupplyChannel): Promise<Result<void, InstrumentError>> {
    const checked = checkChannel(channel);
    if (!checked.ok) return checked;
    if (selectedChannel === checked.value) return Ok();

    const result = await core.commandWait(`INST OUT${checked.value}`);
    selectedChannel = result.ok ? checked.value : null;
    return result;
  }

  // Validate first, then select and run each command through completion
  async function onChannel(
    channel: SupplyChannel,
    commands: readonly string[]
  ): Promise<Result<void, InstrumentError>> {
    const selected = await selectChannel(channel);
    if (!selected.ok) return selected;
    for (const command of commands) {
      const result = await core.commandWait(command);
      if (!result.ok) return result;
    }
    return Ok();
  }

  async function readChannel(channel: SupplyChannel, command: string): Promise<Result<number, InstrumentError>> {
    const checked = checkChannel(channel);
    if (!checked.ok) return checked;
    const selected = await selectChannel(checked.value);
    if (!selected.ok) return selected;
    return core.queryNumber(command);
  }

  async function setOff(channel: SupplyChannel): Promise<Result<void, InstrumentError>> {
    const checked = checkChannel(channel);
    if (!checked.ok) return checked;
    return onChannel(checked.value, ['OUTP OFF']);
  }

  async function allOff(): Promise<Result<void, InstrumentError>> {
    let firstError: InstrumentError | null = null;
    for (const channel of SUPPLY_CHANNELS) {
      const result = await setOff(channel);
      if (!result.ok && !firstError) firstError = result.error;
    }
    return firstError ? Err(firstError) : Ok();
  }

  return {
    address: core.address,
    timeoutMs: core.timeoutMs,
    identity: core.identity,
    model: core.identity.model,
    channelCount: limits.channels,

    get selectedChannel(): SupplyChannel | null {
      return selectedChannel;
    },

    selectChannel,

    async querySelectedChannel(): Promise<Result<SupplyChannel, InstrumentError>> {
      const reply = await core.queryNumber('INST:NSEL?');
      if (!reply.ok) return reply;
      const channel = checkChannel(Math.trunc(reply.value));
      if (!channel.ok) {
        return Err(new ResponseParseError('INST:NSEL?', String(reply.value), channel.error.message));
      }
      selectedChannel = channel.value;
      return channel;
    },

    getLimits(channel: SupplyChannel): Result<ChannelState, InstrumentError> {
      const checked = checkChannel(channel);
      if (!checked.ok) return checked;
      return Ok({ channel: checked.value, voltage: V(limits.maxVoltage), current: A(limits.maxCurrent) });
    },

    async setVoltage(channel: SupplyChannel, value: Voltage): Promise<Result<void, InstrumentError>> {
      const checked = checkChannel(channel);
      if (!checked.ok) return checked;
      const volts = checkRange(value, 'V', limits.maxVoltage);
      if (!volts.ok) return volts;
      return onChannel(checked.value, [`VOLT ${volts.value.toFixed(3)}`]);
    },

    async setCurrent(channel: SupplyChannel, value: Current): Promise<Result<void, InstrumentError>> {
      const checked = checkChannel(channel);
      if (!checked.ok) return checked;
      const amps = checkRange(value, 'A', limits.maxCurrent);
      if (!amps.ok) return amps;
      return onChannel(checked.value, [`CURR ${amps.value.toFixed(4)}`]);
    },

    async getVoltageSetpoint(channel: SupplyChannel): Promise<Result<Voltage, InstrumentError>> {
      const reading = await readChannel(channel, 'VOLT?');
      return reading.ok ? Ok(V(reading.value)) : reading;
    },

    async getCurrentSetpoint(channel: SupplyChannel): Promise<Result<Current, InstrumentError>> {
      const reading = await readChannel(channel, 'CURR?');
      return reading.ok ? Ok(A(reading.value)) : reading;
    },

    async getVoltageMeasured(channel: SupplyChannel): Promise<Result<Voltage, InstrumentError>> {
      const reading = await readChannel(channel, 'MEAS:VOLT?');
      return reading.ok ? Ok(V(reading.value)) : reading;
    },

    async getCurrentMeasured(channel: SupplyChannel): Promise<Result<Current, InstrumentError>> {
      const reading = await readChannel(channel, 'MEAS:CURR?');
      return reading.ok ? Ok(A(reading.value)) : reading;
    },

    async getChannelRegulationStatus(channel: SupplyChannel): Promise<Result<RegulationStatus, InstrumentError>> {
      // Bit 0 of the channel's questionable-instrument summary is set in constant current
      const reading = await readChannel(channel, `STAT:QUES:INST:ISUM${channel}:COND?`);
      if (!reading.ok) return reading;
      return Ok(Math.trunc(reading.value) === 1 ? 'CC' : 'CV');
    },

    async setOn(channel: SupplyChannel): Promise<Result<void, InstrumentError>> {
      const checked = checkChannel(channel);
      if (!checked.ok) return checked;
      return onChannel(checked.value, ['OUTP ON']);
    },

    setOff,
    allOff,

    async setOverVoltageProtection(channel: SupplyChannel, max: Voltage): Promise<Result<void, InstrumentError>> {
      const checked = checkChannel(channel);
      if (!checked.ok) return checked;
      const volts = checkRange(max, 'V', limits.maxVoltage);
      if (!volts.ok) return volts;
      return onChannel(checked.value, [`VOLT:PROT ${volts.value.toFixed(3)}`]);
    },

    async setOverCurrentProtection(channel: SupplyChannel, max: Current): Promise<Result<void, InstrumentError>> {
      const checked = checkChannel(channel);
      if (!checked.ok) return checked;
      const amps = checkRange(max, 'A', limits.maxCurrent);
      if (!amps.ok) return amps;
      // The fuse trips at the current limit
      return onChannel(checked.value, ['FUSE ON', `CURR ${amps.value.toFixed(4)}`]);
    },

    async getErrors(): Promise<Result<SupplyErrorEntry, InstrumentError>> {
      const reply = await core.query('SYST:ERR?');
      if (!reply.ok) return reply;
      const entry = ScpiParser.parseErrorEntry(reply.value);
      if (!entry.ok) {
        return Err(new ResponseParseError('SYST:ERR?', reply.value, entry.error));
      }
      return Ok(entry.value);
    },

    beep: () => core.write('SYST:BEEP'),

    async reset(): Promise<Result<void, InstrumentError>> {
      selectedChannel = null;
      const reset = await core.commandWait('*RST');
      if (!reset.ok) return reset;
      return core.commandWait('SYST:REM');
    },

    async close(): Promise<Result<void, InstrumentError>> {
      const off = await allOff();
      if (!off.ok) {
        console.error(`[HMP] Could not switch outputs off before closing ${core.address}: ${off.error.message}`);
      }
      const released = await core.release();
      return off.ok ? released : off;
    },
  };
}
