/**
 * HMP Simulator
 * Simulates the R&S HMP2030 / HMP4030 three-channel power supply
 *
 * Command set (per selected channel unless noted):
 * - INST OUT<n> / INST:NSEL <n> / INST:NSEL? - Channel selection
 * - VOLT? / VOLT <value>       - Voltage setpoint
 * - CURR? / CURR <value>       - Current limit
 * - OUTP? / OUTP ON|OFF        - Channel output
 * - VOLT:PROT? / VOLT:PROT <v> - Over-voltage protection level
 * - FUSE? / FUSE ON|OFF        - Electronic fuse (over-current protection)
 * - MEAS:VOLT? / MEAS:CURR?    - Output into a resistive load
 * - STAT:QUES:INST:ISUM<n>:COND? - 1 in constant current, 2 in constant voltage (any channel)
 * - SYST:REM, SYST:BEEP, SYST:ERR?, *IDN?, *CLS, *RST, *WAI, *OPC?
 */

import { findHmpLimits, DEFAULT_HMP_MODEL, type HmpModelLimits } from '../drivers/hmp-models.js';

export interface HmpChannelState {
  voltage: number;
  currentLimit: number;
  outputOn: boolean;
  ovpLevel: number;
  fuseArmed: boolean;
  loadOhms: number;
}

export interface HmpSimulatorConfig {
  model?: string;
  serialNumber?: string;
  /** Resistive load on every channel in ohms (default: 100) */
  loadOhms?: number;
}

export interface HmpSimulator {
  handleCommand(cmd: string): string | null;
  getChannel(channel: number): Readonly<HmpChannelState> | null;
  getSelectedChannel(): number;
  isRemote(): boolean;
  getBeepCount(): number;
  setLoad(channel: number, ohms: number): void;
}

interface ChannelOutput {
  voltage: number;
  current: number;
  mode: 'CC' | 'CV';
}

const QUERY_ISUM = /^STAT:QUES:INST:ISUM(\d+):COND\?$/;
const SELECT_OUT = /^OUT(?:P)?(\d+)$/;

export function createHmpSimulator(config: HmpSimulatorConfig = {}): HmpSimulator {
  const model = (config.model ?? DEFAULT_HMP_MODEL).toUpperCase();
  const serialNumber = config.serialNumber ?? '013456789';
  const limits: HmpModelLimits = findHmpLimits(model) ?? { channels: 3, maxVoltage: 32, maxCurrent: 5 };
  const defaultLoad = config.loadOhms ?? 100;

  let channels: HmpChannelState[] = [];
  let selected = 1;
  let remote = false;
  let beeps = 0;
  let errors: string[] = [];

  function resetChannels(): void {
    const loads = channels.map(ch => ch.loadOhms);
    channels = Array.from({ length: limits.channels }, (_, i) => ({
      voltage: 0,
      currentLimit: limits.maxCurrent,
      outputOn: false,
      ovpLevel: limits.maxVoltage + 1,
      fuseArmed: false,
      loadOhms: loads[i] ?? defaultLoad,
    }));
    selected = 1;
  }
  resetChannels();

  function channelState(channel: number): HmpChannelState | null {
    if (!Number.isInteger(channel) || channel < 1 || channel > channels.length) return null;
    return channels[channel - 1];
  }

  function current(): HmpChannelState {
    return channels[selected - 1];
  }

  // Ohm's law against the current limit: crossing it switches to constant current
  function output(ch: HmpChannelState): ChannelOutput {
    if (!ch.outputOn) return { voltage: 0, current: 0, mode: 'CV' };
    const demand = ch.loadOhms > 0 ? ch.voltage / ch.loadOhms : Infinity;
    if (demand > ch.currentLimit) {
      const voltage = Math.min(ch.voltage, ch.currentLimit * ch.loadOhms);
      return { voltage, current: ch.currentLimit, mode: 'CC' };
    }
    return { voltage: ch.voltage, current: demand, mode: 'CV' };
  }

  function parseSetting(arg: string, max: number): number | null {
    const value = Number.parseFloat(arg);
    if (Number.isNaN(value)) {
      errors.push(`-224,"Illegal parameter value"`);
      return null;
    }
    if (value < 0 || value > max) {
      errors.push(`-222,"Data out of range"`);
      return null;
    }
    return value;
  }

  function select(channel: number): void {
    if (channelState(channel)) selected = channel;
    else errors.push(`-222,"Data out of range"`);
  }

  function handleCommand(cmd: string): string | null {
    const trimmed = cmd.trim().toUpperCase();
    const space = trimmed.indexOf(' ');
    const header = (space === -1 ? trimmed : trimmed.slice(0, space)).replace(/^:/, '');
    const arg = space === -1 ? '' : trimmed.slice(space + 1).trim();

    // Identification and status
    if (header === '*IDN?') return `ROHDE&SCHWARZ,${model},${serialNumber},HW50020001/SW2.51`;
    if (header === '*OPC?') return '1';
    if (header === '*CLS') { errors = []; return null; }
    if (header === '*RST') { resetChannels(); return null; }
    if (header === '*WAI') return null;
    if (header === 'SYST:ERR?') return errors.shift() ?? '0,"No error"';
    if (header === 'SYST:REM') { remote = true; return null; }
    if (header === 'SYST:LOC') { remote = false; return null; }
    if (header === 'SYST:BEEP') { beeps++; return null; }

    // Channel selection
    if (header === 'INST' || header === 'INST:SEL') {
      const match = SELECT_OUT.exec(arg);
      if (match) select(Number(match[1]));
      else errors.push(`-224,"Illegal parameter value"`);
      return null;
    }
    if (header === 'INST:NSEL') {
      select(Number(arg));
      return null;
    }
    if (header === 'INST:NSEL?') return String(selected);

    const ch = current();

    // Setpoints
    if (header === 'VOLT?') return ch.voltage.toFixed(3);
    if (header === 'VOLT') {
      const value = parseSetting(arg, limits.maxVoltage);
      if (value !== null) ch.voltage = value;
      return null;
    }
    if (header === 'CURR?') return ch.currentLimit.toFixed(4);
    if (header === 'CURR') {
      const value = parseSetting(arg, limits.maxCurrent);
      if (value !== null) ch.currentLimit = value;
      return null;
    }

    // Protection
    if (header === 'VOLT:PROT?') return ch.ovpLevel.toFixed(3);
    if (header === 'VOLT:PROT') {
      const value = parseSetting(arg, limits.maxVoltage + 1);
      if (value !== null) ch.ovpLevel = value;
      return null;
    }
    if (header === 'FUSE?') return ch.fuseArmed ? '1' : '0';
    if (header === 'FUSE') {
      ch.fuseArmed = arg === 'ON' || arg === '1';
      return null;
    }

    // Output
    if (header === 'OUTP?') return ch.outputOn ? '1' : '0';
    if (header === 'OUTP') {
      ch.outputOn = arg === 'ON' || arg === '1';
      return null;
    }

    // Measurements
    if (header === 'MEAS:VOLT?') return output(ch).voltage.toFixed(3);
    if (header === 'MEAS:CURR?') return output(ch).current.toFixed(4);

    const isum = QUERY_ISUM.exec(header);
    if (isum) {
      const target = channelState(Number(isum[1]));
      if (!target) return '0';
      if (!target.outputOn) return '0';
      return output(target).mode === 'CC' ? '1' : '2';
    }

    // Unknown command - return empty (real device queues an error)
    console.warn(`[HMP Simulator] Unknown command: ${cmd}`);
    errors.push(`-113,"Undefined header"`);
    return '';
  }

  return {
    handleCommand,
    getChannel: channelState,
    getSelectedChannel: () => selected,
    isRemote: () => remote,
    getBeepCount: () => beeps,
    setLoad(channel: number, ohms: number): void {
      const ch = channelState(channel);
      if (ch) ch.loadOhms = ohms;
    },
  };
}
