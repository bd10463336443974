/**
 * Microwave Source Simulator
 * Simulates the R&S SMA100B / SMB100A SCPI subset used by the signal-source driver
 *
 * Command set:
 * - OUTP:STAT? / OUTP:STAT ON|OFF          - RF output
 * - FREQ:MODE? / FREQ:MODE CW|LIST|SWE     - Frequency mode (only while RF is off)
 * - FREQ? / FREQ <f>                       - CW frequency, replies in Hz
 * - POW? / POW <p>                         - Level in dBm
 * - LIST:SEL "<name>"                      - Select (or create) a list
 * - LIST:FREQ? / LIST:FREQ <f>, <f>, ...   - List frequencies
 * - LIST:POW? / LIST:POW <p>, <p>, ...     - List levels
 * - LIST:FREQ:POIN? / LIST:POW:POIN?       - List lengths
 * - LIST:MODE, LIST:TRIG:SOUR, LIST:RES    - List stepping
 * - FREQ:STAR, FREQ:STOP, SWE:STEP:LIN     - Sweep range
 * - SWE:MODE, SWE:SPAC, TRIG:FSW:SOUR, ABOR:SWE
 * - TRIG1:SLOP? / TRIG1:SLOP POS|NEG       - External trigger edge (only while RF is off)
 * - SYST:ERR?                              - Error queue
 * - *IDN?, *CLS, *RST, *WAI, *OPC?
 *
 * Headers may be sent with or without the leading colon and are matched
 * case-insensitively. Values out of the instrument range are clamped.
 */

import { Quantity } from '../../../shared/quantity.js';

type ModeToken = 'CW' | 'LIST' | 'SWE';
type StepMode = 'AUTO' | 'STEP';
type TriggerSource = 'AUTO' | 'EXT';

interface SourceList {
  frequenciesHz: number[];
  powersDbm: number[];
}

export interface MwSourceState {
  outputOn: boolean;
  mode: ModeToken;
  frequencyHz: number;
  powerDbm: number;
  selectedList: string | null;
  lists: Record<string, SourceList>;
  listMode: StepMode;
  listTriggerSource: TriggerSource;
  listIndex: number;
  sweepStartHz: number;
  sweepStopHz: number;
  sweepStepHz: number;
  sweepMode: StepMode;
  sweepSpacing: 'LIN' | 'LOG';
  sweepTriggerSource: TriggerSource;
  sweepIndex: number;
  triggerSlope: 'POS' | 'NEG';
}

export interface MwSourceSimulatorConfig {
  model?: string;
  serialNumber?: string;
  minFrequencyHz?: number;
  maxFrequencyHz?: number;
  minPowerDbm?: number;
  maxPowerDbm?: number;
  /** *OPC? replies 0 this many times after each command before reporting 1 */
  opcBusyPolls?: number;
}

export interface MwSourceSimulator {
  handleCommand(cmd: string): string | null;
  getState(): Readonly<MwSourceState>;
  /** Pending SYST:ERR? entries, oldest first */
  getErrors(): readonly string[];
  setOpcBusyPolls(polls: number): void;
}

const MODE_ALIASES: Record<string, ModeToken> = {
  CW: 'CW',
  FIX: 'CW',
  FIXED: 'CW',
  LIST: 'LIST',
  SWE: 'SWE',
  SWEEP: 'SWE',
};

function defaultState(): MwSourceState {
  return {
    outputOn: false,
    mode: 'CW',
    frequencyHz: 1e9,
    powerDbm: -30,
    selectedList: null,
    lists: {},
    listMode: 'AUTO',
    listTriggerSource: 'AUTO',
    listIndex: 0,
    sweepStartHz: 100e6,
    sweepStopHz: 500e6,
    sweepStepHz: 1e6,
    sweepMode: 'AUTO',
    sweepSpacing: 'LIN',
    sweepTriggerSource: 'AUTO',
    sweepIndex: 0,
    triggerSlope: 'POS',
  };
}

// Instruments reply with plain Hz; keep millihertz resolution
function formatHz(hz: number): string {
  return String(Math.round(hz * 1000) / 1000);
}

function isOn(arg: string): boolean {
  return arg === 'ON' || arg === '1';
}

export function createMwSourceSimulator(config: MwSourceSimulatorConfig = {}): MwSourceSimulator {
  const {
    model = 'SMB100A',
    serialNumber = '100001',
    minFrequencyHz = 100e3,
    maxFrequencyHz = 6e9,
    minPowerDbm = -145,
    maxPowerDbm = 18,
  } = config;
  let opcBusyPolls = config.opcBusyPolls ?? 0;

  let state = defaultState();
  let errors: string[] = [];
  let pendingBusyPolls = 0;

  function pushError(entry: string): void {
    errors.push(entry);
  }

  function parseFrequency(text: string): number | null {
    const parsed = Quantity.parse(text, 'frequency', 'Hz');
    if (!parsed.ok) return null;
    const hz = Quantity.to(parsed.value, 'Hz').magnitude;
    return Math.min(maxFrequencyHz, Math.max(minFrequencyHz, hz));
  }

  function parsePower(text: string): number | null {
    const parsed = Quantity.parse(text, 'power', 'dBm');
    if (!parsed.ok) return null;
    return Math.min(maxPowerDbm, Math.max(minPowerDbm, parsed.value.magnitude));
  }

  // "a, b, c" → values; null when any entry fails to parse
  function parseValues(text: string, parse: (part: string) => number | null): number[] | null {
    const values: number[] = [];
    for (const part of text.split(',')) {
      const value = parse(part.trim());
      if (value === null) return null;
      values.push(value);
    }
    return values;
  }

  function currentList(): SourceList | null {
    return state.selectedList === null ? null : state.lists[state.selectedList] ?? null;
  }

  // Settings that the firmware locks while RF is on
  function lockedWhileRunning(header: string): boolean {
    if (!state.outputOn) return false;
    pushError(`-221,"Settings conflict;${header} while RF on"`);
    return true;
  }

  function handleQuery(header: string): string | null {
    switch (header) {
      case '*IDN?':
        return `Rohde&Schwarz,${model},1406.6000k03/${serialNumber},4.30.046.32`;
      case '*OPC?':
        if (pendingBusyPolls > 0) {
          pendingBusyPolls--;
          return '0';
        }
        return '1';
      case 'OUTP?':
      case 'OUTP:STAT?':
        return state.outputOn ? '1' : '0';
      case 'FREQ:MODE?':
        return state.mode;
      case 'FREQ?':
        return formatHz(state.frequencyHz);
      case 'POW?':
        return state.powerDbm.toFixed(2);
      case 'LIST:SEL?':
        return `"${state.selectedList ?? ''}"`;
      case 'LIST:FREQ?':
        return (currentList()?.frequenciesHz ?? []).map(formatHz).join(',');
      case 'LIST:POW?':
        return (currentList()?.powersDbm ?? []).map(p => p.toFixed(2)).join(',');
      case 'LIST:FREQ:POIN?':
        return String(currentList()?.frequenciesHz.length ?? 0);
      case 'LIST:POW:POIN?':
        return String(currentList()?.powersDbm.length ?? 0);
      case 'LIST:MODE?':
        return state.listMode;
      case 'LIST:TRIG:SOUR?':
        return state.listTriggerSource;
      case 'LIST:IND?':
        return String(state.listIndex);
      case 'FREQ:STAR?':
        return formatHz(state.sweepStartHz);
      case 'FREQ:STOP?':
        return formatHz(state.sweepStopHz);
      case 'SWE:STEP?':
      case 'SWE:STEP:LIN?':
        return formatHz(state.sweepStepHz);
      case 'SWE:MODE?':
        return state.sweepMode;
      case 'SWE:SPAC?':
        return state.sweepSpacing;
      case 'TRIG:FSW:SOUR?':
        return state.sweepTriggerSource;
      case 'TRIG1:SLOP?':
      case 'TRIG:SLOP?':
        return state.triggerSlope;
      case 'SYST:ERR?':
        return errors.shift() ?? '0,"No error"';
      default:
        return null;
    }
  }

  // Returns false for an unknown header
  function handleSetting(header: string, arg: string): boolean {
    const upperArg = arg.toUpperCase();

    switch (header) {
      case '*CLS':
        errors = [];
        return true;
      case '*RST':
        state = defaultState();
        return true;
      case '*WAI':
        return true;
      case 'OUTP':
      case 'OUTP:STAT':
        state.outputOn = isOn(upperArg);
        return true;
      case 'FREQ:MODE': {
        const mode = MODE_ALIASES[upperArg];
        if (!mode) {
          pushError(`-224,"Illegal parameter value;${arg}"`);
        } else if (!lockedWhileRunning(header)) {
          state.mode = mode;
        }
        return true;
      }
      case 'FREQ': {
        const hz = parseFrequency(arg);
        if (hz === null) pushError(`-224,"Illegal parameter value;${arg}"`);
        else state.frequencyHz = hz;
        return true;
      }
      case 'POW': {
        const dbm = parsePower(arg);
        if (dbm === null) pushError(`-224,"Illegal parameter value;${arg}"`);
        else state.powerDbm = dbm;
        return true;
      }
      case 'LIST:SEL': {
        const name = arg.replace(/^["']|["']$/g, '');
        state.selectedList = name;
        if (!state.lists[name]) {
          state.lists[name] = { frequenciesHz: [], powersDbm: [] };
        }
        return true;
      }
      case 'LIST:FREQ':
      case 'LIST:POW': {
        const list = currentList();
        if (!list) {
          pushError('-221,"Settings conflict;no list selected"');
          return true;
        }
        const values = header === 'LIST:FREQ' ? parseValues(arg, parseFrequency) : parseValues(arg, parsePower);
        if (values === null) {
          pushError(`-224,"Illegal parameter value;${arg}"`);
        } else if (header === 'LIST:FREQ') {
          list.frequenciesHz = values;
        } else {
          list.powersDbm = values;
        }
        return true;
      }
      case 'LIST:MODE':
        state.listMode = upperArg === 'STEP' ? 'STEP' : 'AUTO';
        return true;
      case 'LIST:TRIG:SOUR':
        state.listTriggerSource = upperArg === 'EXT' ? 'EXT' : 'AUTO';
        return true;
      case 'LIST:RES':
        state.listIndex = 0;
        return true;
      case 'FREQ:STAR':
      case 'FREQ:STOP':
      case 'SWE:STEP:LIN':
      case 'SWE:STEP': {
        const hz = parseFrequency(arg);
        if (hz === null) {
          pushError(`-224,"Illegal parameter value;${arg}"`);
        } else if (header === 'FREQ:STAR') {
          state.sweepStartHz = hz;
        } else if (header === 'FREQ:STOP') {
          state.sweepStopHz = hz;
        } else {
          state.sweepStepHz = hz;
        }
        return true;
      }
      case 'SWE:MODE':
        state.sweepMode = upperArg === 'STEP' ? 'STEP' : 'AUTO';
        return true;
      case 'SWE:SPAC':
        state.sweepSpacing = upperArg === 'LOG' ? 'LOG' : 'LIN';
        return true;
      case 'TRIG:FSW:SOUR':
        state.sweepTriggerSource = upperArg === 'EXT' ? 'EXT' : 'AUTO';
        return true;
      case 'ABOR:SWE':
      case 'ABOR':
        state.sweepIndex = 0;
        return true;
      case 'TRIG1:SLOP':
      case 'TRIG:SLOP':
        if (upperArg !== 'POS' && upperArg !== 'NEG') {
          pushError(`-224,"Illegal parameter value;${arg}"`);
        } else if (!lockedWhileRunning(header)) {
          state.triggerSlope = upperArg;
        }
        return true;
      default:
        return false;
    }
  }

  function handleCommand(cmd: string): string | null {
    const trimmed = cmd.trim();
    const space = trimmed.search(/\s/);
    const rawHeader = space === -1 ? trimmed : trimmed.slice(0, space);
    const arg = space === -1 ? '' : trimmed.slice(space + 1).trim();
    const header = rawHeader.replace(/^:/, '').replace(/^SOUR1?:/i, '').toUpperCase();

    if (header.endsWith('?')) {
      const response = handleQuery(header);
      if (response !== null) return response;
    } else if (handleSetting(header, arg)) {
      if (header !== '*WAI') pendingBusyPolls = opcBusyPolls;
      return null;
    }

    // Unknown command - queue the error a real instrument would report
    console.warn(`[SMB Simulator] Unknown command: ${cmd}`);
    pushError(`-113,"Undefined header;${rawHeader}"`);
    return '';
  }

  return {
    handleCommand,
    getState: () => state,
    getErrors: () => errors,
    setOpcBusyPolls(polls: number): void {
      opcBusyPolls = polls;
    },
  };
}
