// Re-export shared types
export * from '../../shared/types.js';
export * from '../../shared/errors.js';
export * from '../../shared/quantity.js';

import type { Result } from '../../shared/types.js';
import type {
  ConnectionError,
  InstrumentError,
  TransportError,
} from '../../shared/errors.js';
import type {
  Current,
  Frequency,
  Power,
  Voltage,
} from '../../shared/quantity.js';
import type { Clock } from './clock.js';

// ============ Transport ============

export interface Transport {
  open(): Promise<Result<void, ConnectionError>>;
  close(): Promise<Result<void, TransportError>>;
  query(cmd: string): Promise<Result<string, TransportError>>;
  write(cmd: string): Promise<Result<void, TransportError>>;
  isOpen(): boolean;
}

/** Resolves an address string to a Transport that is already open */
export type TransportOpener = (
  address: string,
  options: { timeoutMs: number },
) => Promise<Result<Transport, ConnectionError>>;

// ============ Sessions ============

/** Parsed *IDN? reply: "<manufacturer>,<model>,<serial>,<firmware>" */
export interface InstrumentIdentity {
  manufacturer: string;
  model: string;
  serial: string;
  firmware: string;
}

export interface SessionOptions {
  timeoutMs?: number;          // Transport timeout and completion deadline (default from env)
  pollIntervalMs?: number;     // Delay between *OPC? polls (default: 200)
  clock?: Clock;               // Injected for tests
  openTransport?: TransportOpener;
}

export interface InstrumentSession {
  readonly address: string;
  readonly timeoutMs: number;
  readonly identity: InstrumentIdentity;
  /** Model name, the second field of the identification reply */
  readonly model: string;

  /** De-energize, then release the transport */
  close(): Promise<Result<void, InstrumentError>>;
}

// ============ Signal source ============

export type SourceMode = 'cw' | 'list' | 'sweep';

export interface OperatingState {
  mode: SourceMode;
  running: boolean;
}

export type TriggerEdge = 'rising' | 'falling';

export type FrequencyReading =
  | { mode: 'cw'; frequency: Frequency }
  | { mode: 'sweep'; start: Frequency; stop: Frequency; step: Frequency }
  | { mode: 'list'; frequencies: Frequency[] };

export type PowerReading =
  | { kind: 'single'; mode: SourceMode; power: Power }
  | { kind: 'sequence'; mode: 'list'; powers: Power[] };

/** Values read back after a configuration call, never the requested ones */
export interface SourceConfiguration {
  mode: SourceMode;
  frequency: FrequencyReading;
  power: PowerReading;
}

export interface CwSettings {
  frequency?: Frequency;
  power?: Power;
}

export interface ListSettings {
  frequencies?: Frequency[];
  /** One power for every point, or one per frequency */
  power?: Power | Power[];
}

export interface SweepSettings {
  start?: Frequency;
  stop?: Frequency;
  step?: Frequency;
  power?: Power;
}

export interface SignalSourceSession extends InstrumentSession {
  getStatus(): Promise<Result<OperatingState, InstrumentError>>;
  turnOff(): Promise<Result<void, InstrumentError>>;

  enterCW(settings?: CwSettings): Promise<Result<SourceConfiguration, InstrumentError>>;
  cwOn(): Promise<Result<void, InstrumentError>>;

  enterList(settings?: ListSettings): Promise<Result<SourceConfiguration, InstrumentError>>;
  listOn(): Promise<Result<void, InstrumentError>>;
  resetListPosition(): Promise<Result<void, InstrumentError>>;

  enterSweep(settings?: SweepSettings): Promise<Result<SourceConfiguration, InstrumentError>>;
  sweepOn(): Promise<Result<void, InstrumentError>>;
  resetSweepPosition(): Promise<Result<void, InstrumentError>>;

  setExternalTrigger(edge: TriggerEdge): Promise<Result<void, InstrumentError>>;
  getExternalTrigger(): Promise<Result<TriggerEdge, InstrumentError>>;

  getFrequency(): Promise<Result<FrequencyReading, InstrumentError>>;
  getPower(): Promise<Result<PowerReading, InstrumentError>>;
}

// ============ Power supply ============

export type SupplyChannel = 1 | 2 | 3;

export const SUPPLY_CHANNELS: readonly SupplyChannel[] = [1, 2, 3];

export type RegulationStatus = 'CC' | 'CV';

export interface ChannelLimits {
  voltage: Voltage;
  current: Current;
}

export interface ChannelState extends ChannelLimits {
  channel: SupplyChannel;
}

export interface SupplyErrorEntry {
  code: number;
  message: string;
}

export interface PowerSupplySession extends InstrumentSession {
  readonly channelCount: number;
  /** Channel the instrument's selection register was last set to, if known */
  readonly selectedChannel: SupplyChannel | null;

  selectChannel(channel: SupplyChannel): Promise<Result<void, InstrumentError>>;
  querySelectedChannel(): Promise<Result<SupplyChannel, InstrumentError>>;
  getLimits(channel: SupplyChannel): Result<ChannelState, InstrumentError>;

  setVoltage(channel: SupplyChannel, value: Voltage): Promise<Result<void, InstrumentError>>;
  setCurrent(channel: SupplyChannel, value: Current): Promise<Result<void, InstrumentError>>;
  getVoltageSetpoint(channel: SupplyChannel): Promise<Result<Voltage, InstrumentError>>;
  getCurrentSetpoint(channel: SupplyChannel): Promise<Result<Current, InstrumentError>>;
  getVoltageMeasured(channel: SupplyChannel): Promise<Result<Voltage, InstrumentError>>;
  getCurrentMeasured(channel: SupplyChannel): Promise<Result<Current, InstrumentError>>;
  getChannelRegulationStatus(channel: SupplyChannel): Promise<Result<RegulationStatus, InstrumentError>>;

  setOn(channel: SupplyChannel): Promise<Result<void, InstrumentError>>;
  setOff(channel: SupplyChannel): Promise<Result<void, InstrumentError>>;
  allOff(): Promise<Result<void, InstrumentError>>;

  setOverVoltageProtection(channel: SupplyChannel, max: Voltage): Promise<Result<void, InstrumentError>>;
  setOverCurrentProtection(channel: SupplyChannel, max: Current): Promise<Result<void, InstrumentError>>;

  getErrors(): Promise<Result<SupplyErrorEntry, InstrumentError>>;
  beep(): Promise<Result<void, InstrumentError>>;
  reset(): Promise<Result<void, InstrumentError>>;
}
