/**
 * Bench instrument sessions
 * SCPI drivers for R&S SMA100B / SMB100A signal sources and HMP power supplies
 *
 *   const source = await openSignalSource('TCPIP0::192.168.0.10::5025::SOCKET');
 *   if (!source.ok) throw source.error;
 *   await source.value.enterCW({ frequency: GHz(2.5), power: dBm(-10) });
 */

// Sessions
export { openSignalSource, createSignalSourceSession, collapseListPower } from './devices/drivers/rohde-sma-smb.js';
export type { SignalSourceOptions } from './devices/drivers/rohde-sma-smb.js';
export { openPowerSupply, createPowerSupplySession, limitsForModel } from './devices/drivers/rohde-hmp.js';
export { HMP_MODEL_LIMITS, findHmpLimits } from './devices/drivers/hmp-models.js';
export type { HmpModelLimits } from './devices/drivers/hmp-models.js';
export { openSessionCore } from './devices/session.js';
export type { SessionCore } from './devices/session.js';
export { createCommandCompletion } from './devices/command-completion.js';
export { ScpiParser } from './devices/scpi-parser.js';
export { systemClock } from './devices/clock.js';
export type { Clock } from './devices/clock.js';

// Types, quantities, errors
export * from './devices/types.js';

// Transports
export { openResource, parseResourceAddress } from './devices/transports/resource.js';
export type { ResourceAddress } from './devices/transports/resource.js';
export { createSerialTransport, listSerialPorts } from './devices/transports/serial.js';
export type { SerialConfig } from './devices/transports/serial.js';
export { createTcpSocketTransport } from './devices/transports/tcp-socket.js';
export type { TcpSocketConfig } from './devices/transports/tcp-socket.js';

// Simulation
export { createSimulatedInstrument, isSimulatedModel, SIMULATED_MODELS } from './devices/simulation/index.js';
export type {
  SimulatedInstrument,
  SimulatedInstrumentConfig,
  SimulatedModel,
  MwSourceSimulator,
  MwSourceState,
  HmpSimulator,
  HmpChannelState,
} from './devices/simulation/index.js';
export { createSimulatedTransport } from './devices/simulation/simulated-transport.js';

// Configuration
export { loadConfigFromEnv, DEFAULT_CONFIG } from './config.js';
export type { DriverConfig } from './config.js';
