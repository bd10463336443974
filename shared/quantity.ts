/**
 * Physical quantities
 *
 * A quantity is an immutable magnitude + unit pair. Units belong to a family
 * (frequency, power, voltage, current, time) and convert only inside it.
 * Every conversion is a linear scale against the family's base unit, except
 * power: dBm is logarithmic, so power is stored and compared as-is and is
 * never added, subtracted or scaled.
 *
 * The module is stateless: the unit table is a constant and every helper
 * returns a new frozen value.
 */

import { IncompatibleUnitFamilyError } from './errors.js';
import type { Result } from './types.js';
import { Ok, Err } from './types.js';

const UNITS = {
  Hz: { family: 'frequency', scale: 1 },
  kHz: { family: 'frequency', scale: 1e3 },
  MHz: { family: 'frequency', scale: 1e6 },
  GHz: { family: 'frequency', scale: 1e9 },
  dBm: { family: 'power', scale: 1 },
  V: { family: 'voltage', scale: 1 },
  A: { family: 'current', scale: 1 },
  s: { family: 'time', scale: 1 },
  ms: { family: 'time', scale: 1e-3 },
} as const satisfies Record<string, { family: string; scale: number }>;

export type Unit = keyof typeof UNITS;
export type UnitFamily = (typeof UNITS)[Unit]['family'];

/** All units of the given family(ies) */
export type UnitsOf<F extends UnitFamily> = {
  [U in Unit]: (typeof UNITS)[U]['family'] extends F ? U : never;
}[Unit];

export type FamilyOf<U extends Unit> = (typeof UNITS)[U]['family'];
export type SameFamily<U extends Unit> = UnitsOf<FamilyOf<U>>;

/** Units that support arithmetic (everything but the logarithmic dBm) */
export type LinearUnit = Exclude<Unit, 'dBm'>;

export interface Quantity<U extends Unit = Unit> {
  readonly magnitude: number;
  readonly unit: U;
}

export type FrequencyUnit = UnitsOf<'frequency'>;
export type TimeUnit = UnitsOf<'time'>;

export type Frequency = Quantity<FrequencyUnit>;
export type Power = Quantity<'dBm'>;
export type Voltage = Quantity<'V'>;
export type Current = Quantity<'A'>;
export type Duration = Quantity<TimeUnit>;

const DEFAULT_PRECISION: Record<UnitFamily, number> = {
  frequency: 6,
  power: 2,
  voltage: 2,
  current: 2,
  time: 3,
};

function isUnit(name: string): name is Unit {
  return name in UNITS;
}

// SCPI unit suffixes are case-insensitive; "MHZ" means megahertz there.
const SUFFIXES: Partial<Record<string, Unit>> = Object.fromEntries(
  Object.keys(UNITS).filter(isUnit).map(unit => [unit.toLowerCase(), unit]),
);

const NUMBER_WITH_SUFFIX = /^([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)\s*([A-Za-z]*)$/;

function familyOf(unit: Unit): UnitFamily {
  return UNITS[unit].family;
}

function isUnitOf<F extends UnitFamily>(unit: Unit, family: F): unit is UnitsOf<F> {
  return UNITS[unit].family === family;
}

function rescale(magnitude: number, from: Unit, to: Unit): number {
  if (from === to) return magnitude;
  return (magnitude * UNITS[from].scale) / UNITS[to].scale;
}

function of<U extends Unit>(magnitude: number, unit: U): Quantity<U> {
  return Object.freeze({ magnitude, unit });
}

function formatMagnitude(q: Quantity, precision?: number): string {
  return q.magnitude.toFixed(precision ?? DEFAULT_PRECISION[familyOf(q.unit)]);
}

export const Quantity = {
  of,
  familyOf,
  isUnit,
  isUnitOf,
  formatMagnitude,

  /** Convert between any two units; fails when the families differ. */
  convertTo(q: Quantity, unit: Unit): Result<Quantity, IncompatibleUnitFamilyError> {
    if (familyOf(q.unit) !== familyOf(unit)) {
      return Err(new IncompatibleUnitFamilyError(q.unit, unit));
    }
    return Ok(of(rescale(q.magnitude, q.unit, unit), unit));
  },

  /** Magnitude expressed in `unit`; fails when the families differ. */
  magnitudeIn(q: Quantity, unit: Unit): Result<number, IncompatibleUnitFamilyError> {
    if (familyOf(q.unit) !== familyOf(unit)) {
      return Err(new IncompatibleUnitFamilyError(q.unit, unit));
    }
    return Ok(rescale(q.magnitude, q.unit, unit));
  },

  /** Same-family conversion, checked at compile time. */
  to<U extends Unit>(q: Quantity<SameFamily<U>>, unit: U): Quantity<U> {
    return of(rescale(q.magnitude, q.unit, unit), unit);
  },

  add<U extends LinearUnit>(a: Quantity<U>, b: Quantity<SameFamily<U>>): Quantity<U> {
    return of(a.magnitude + rescale(b.magnitude, b.unit, a.unit), a.unit);
  },

  subtract<U extends LinearUnit>(a: Quantity<U>, b: Quantity<SameFamily<U>>): Quantity<U> {
    return of(a.magnitude - rescale(b.magnitude, b.unit, a.unit), a.unit);
  },

  /** -1, 0 or 1 after bringing `b` into `a`'s unit */
  compare(a: Quantity, b: Quantity): Result<-1 | 0 | 1, IncompatibleUnitFamilyError> {
    if (familyOf(a.unit) !== familyOf(b.unit)) {
      return Err(new IncompatibleUnitFamilyError(b.unit, a.unit));
    }
    const other = rescale(b.magnitude, b.unit, a.unit);
    if (a.magnitude < other) return Ok(-1);
    if (a.magnitude > other) return Ok(1);
    return Ok(0);
  },

  /** Equality within a relative tolerance; quantities of different families are never close. */
  isClose(a: Quantity, b: Quantity, relTol = 1e-9, absTol = 1e-12): boolean {
    if (familyOf(a.unit) !== familyOf(b.unit)) return false;
    const other = rescale(b.magnitude, b.unit, a.unit);
    const diff = Math.abs(a.magnitude - other);
    return diff <= absTol || diff <= relTol * Math.max(Math.abs(a.magnitude), Math.abs(other));
  },

  /** Fixed-point "<magnitude> <unit>", e.g. "2.500000 GHz" or "-10.00 dBm" */
  format(q: Quantity, precision?: number): string {
    return `${formatMagnitude(q, precision)} ${q.unit}`;
  },

  /**
   * Parse an instrument reply such as "2500000000", "2.5 GHz" or "-10.00dBm".
   * A bare number takes `defaultUnit`; a suffix must name a unit of `family`.
   */
  parse<F extends UnitFamily>(
    text: string,
    family: F,
    defaultUnit: UnitsOf<F>,
  ): Result<Quantity<UnitsOf<F>>, string> {
    const match = NUMBER_WITH_SUFFIX.exec(text.trim());
    if (!match) {
      return Err(`not a quantity: "${text.trim()}"`);
    }

    const magnitude = Number(match[1]);
    const suffix = match[2];
    if (suffix === '') {
      return Ok(of(magnitude, defaultUnit));
    }

    const unit = SUFFIXES[suffix.toLowerCase()];
    if (unit === undefined) {
      return Err(`unknown unit "${suffix}"`);
    }
    if (!isUnitOf(unit, family)) {
      return Err(`unit ${unit} is not a ${family} unit`);
    }
    return Ok(of(magnitude, unit));
  },
};

// Shorthand constructors
export const Hz = (magnitude: number): Quantity<'Hz'> => of(magnitude, 'Hz');
export const kHz = (magnitude: number): Quantity<'kHz'> => of(magnitude, 'kHz');
export const MHz = (magnitude: number): Quantity<'MHz'> => of(magnitude, 'MHz');
export const GHz = (magnitude: number): Quantity<'GHz'> => of(magnitude, 'GHz');
export const dBm = (magnitude: number): Power => of(magnitude, 'dBm');
export const V = (magnitude: number): Voltage => of(magnitude, 'V');
export const A = (magnitude: number): Current => of(magnitude, 'A');
export const s = (magnitude: number): Quantity<'s'> => of(magnitude, 's');
export const ms = (magnitude: number): Quantity<'ms'> => of(magnitude, 'ms');
