/**
 * HMP series per-channel output limits
 * The supply rejects setpoints above these; the driver checks them before sending.
 */

export interface HmpModelLimits {
  channels: number;
  maxVoltage: number;  // V
  maxCurrent: number;  // A
}

export const HMP_MODEL_LIMITS: Readonly<Record<string, HmpModelLimits>> = {
  HMP2030: { channels: 3, maxVoltage: 32, maxCurrent: 5 },
  HMP4030: { channels: 3, maxVoltage: 32, maxCurrent: 10 },
};

export const DEFAULT_HMP_MODEL = 'HMP2030';

/** Limits for a model name as reported by *IDN?, or null when it is not a known HMP */
export function findHmpLimits(model: string): HmpModelLimits | null {
  return HMP_MODEL_LIMITS[model.trim().toUpperCase()] ?? null;
}
