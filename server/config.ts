/**
 * Driver configuration
 *
 * Defaults, overridable by environment variables, overridable again by the
 * options passed to openSignalSource() / openPowerSupply().
 *
 *   INSTRUMENT_TIMEOUT_MS   - Transport timeout and completion deadline (default: 10000)
 *   OPC_POLL_INTERVAL_MS    - Delay between *OPC? polls (default: 200)
 *   SERIAL_BAUD_RATE        - Baud rate for ASRL addresses (default: 9600)
 *   SERIAL_COMMAND_DELAY_MS - Settle delay after each serial command (default: 20)
 *   MW_LIST_NAME            - List buffer used on the microwave source (default: bench_list)
 *   SIM_LATENCY_MS          - Simulated transport latency (default: 0)
 *   SIM_JITTER_MS           - Simulated transport jitter (default: 0)
 *   SIM_SUPPLY_LOAD_OHMS    - Resistive load on each simulated supply channel (default: 100)
 */

export interface DriverConfig {
  timeoutMs: number;
  pollIntervalMs: number;
  serialBaudRate: number;
  serialCommandDelayMs: number;
  listName: string;
  simLatencyMs: number;
  simJitterMs: number;
  simSupplyLoadOhms: number;
}

export const DEFAULT_CONFIG: Readonly<DriverConfig> = {
  timeoutMs: 10_000,
  pollIntervalMs: 200,
  serialBaudRate: 9600,
  serialCommandDelayMs: 20,
  listName: 'bench_list',
  simLatencyMs: 0,
  simJitterMs: 0,
  simSupplyLoadOhms: 100,
};

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined, defaultVal: number): number {
  if (!value) return defaultVal;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) || parsed < 0 ? defaultVal : parsed;
}

/**
 * Load configuration from environment variables with defaults.
 */
export function loadConfigFromEnv(env: Env = process.env): DriverConfig {
  return {
    timeoutMs: parseNumber(env.INSTRUMENT_TIMEOUT_MS, DEFAULT_CONFIG.timeoutMs),
    pollIntervalMs: parseNumber(env.OPC_POLL_INTERVAL_MS, DEFAULT_CONFIG.pollIntervalMs),
    serialBaudRate: parseNumber(env.SERIAL_BAUD_RATE, DEFAULT_CONFIG.serialBaudRate),
    serialCommandDelayMs: parseNumber(env.SERIAL_COMMAND_DELAY_MS, DEFAULT_CONFIG.serialCommandDelayMs),
    listName: env.MW_LIST_NAME || DEFAULT_CONFIG.listName,
    simLatencyMs: parseNumber(env.SIM_LATENCY_MS, DEFAULT_CONFIG.simLatencyMs),
    simJitterMs: parseNumber(env.SIM_JITTER_MS, DEFAULT_CONFIG.simJitterMs),
    simSupplyLoadOhms: parseNumber(env.SIM_SUPPLY_LOAD_OHMS, DEFAULT_CONFIG.simSupplyLoadOhms),
  };
}
