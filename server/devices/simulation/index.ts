/**
 * Simulation Module
 * Instrument simulators behind simulated transports, reachable as SIM::<model>
 *
 * Usage:
 *   const sim = createSimulatedInstrument('SMB100A');
 *   if (sim) { await sim.transport.open(); ... }
 *
 * Configuration via environment variables (see server/config.ts):
 *   SIM_LATENCY_MS       - Command latency (default: 0)
 *   SIM_JITTER_MS        - Latency jitter (default: 0)
 *   SIM_SUPPLY_LOAD_OHMS - Resistive load on each supply channel (default: 100)
 */

import type { Transport } from '../types.js';
import { loadConfigFromEnv } from '../../config.js';
import { createSimulatedTransport } from './simulated-transport.js';
import { createMwSourceSimulator, type MwSourceSimulator } from './mw-source-simulator.js';
import { createHmpSimulator, type HmpSimulator } from './hmp-simulator.js';

export const SIMULATED_MODELS = ['SMB100A', 'SMA100B', 'HMP2030', 'HMP4030'] as const;

export type SimulatedModel = (typeof SIMULATED_MODELS)[number];

export function isSimulatedModel(name: string): name is SimulatedModel {
  return SIMULATED_MODELS.some(model => model === name);
}

export interface SimulatedInstrumentConfig {
  latencyMs?: number;
  jitterMs?: number;
  supplyLoadOhms?: number;
  /** *OPC? busy replies after each source command (default: 0) */
  opcBusyPolls?: number;
}

export type SimulatedInstrument =
  | { kind: 'signal-source'; model: SimulatedModel; transport: Transport; simulator: MwSourceSimulator }
  | { kind: 'power-supply'; model: SimulatedModel; transport: Transport; simulator: HmpSimulator };

/**
 * Create a simulated instrument of the given model.
 * The transport is returned closed, like a real one.
 *
 * @param config Optional configuration (defaults loaded from environment variables)
 */
export function createSimulatedInstrument(
  model: SimulatedModel,
  config: SimulatedInstrumentConfig = {}
): SimulatedInstrument {
  const envConfig = loadConfigFromEnv();
  const latencyMs = config.latencyMs ?? envConfig.simLatencyMs;
  const jitterMs = config.jitterMs ?? envConfig.simJitterMs;

  if (model === 'HMP2030' || model === 'HMP4030') {
    const simulator = createHmpSimulator({
      model,
      loadOhms: config.supplyLoadOhms ?? envConfig.simSupplyLoadOhms,
    });
    const transport = createSimulatedTransport(
      cmd => simulator.handleCommand(cmd),
      { latencyMs, jitterMs, name: `${model.toLowerCase()}-sim` }
    );
    return { kind: 'power-supply', model, transport, simulator };
  }

  const simulator = createMwSourceSimulator({ model, opcBusyPolls: config.opcBusyPolls });
  const transport = createSimulatedTransport(
    cmd => simulator.handleCommand(cmd),
    { latencyMs, jitterMs, name: `${model.toLowerCase()}-sim` }
  );
  return { kind: 'signal-source', model, transport, simulator };
}

export type { MwSourceSimulator, MwSourceState } from './mw-source-simulator.js';
export type { HmpSimulator, HmpChannelState } from './hmp-simulator.js';
