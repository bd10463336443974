import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv, DEFAULT_CONFIG } from '../config.js';

describe('loadConfigFromEnv', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual({
      timeoutMs: 10_000,
      pollIntervalMs: 200,
      serialBaudRate: 9600,
      serialCommandDelayMs: 20,
      listName: 'bench_list',
      simLatencyMs: 0,
      simJitterMs: 0,
      simSupplyLoadOhms: 100,
    });
  });

  it('reads every variable', () => {
    const config = loadConfigFromEnv({
      INSTRUMENT_TIMEOUT_MS: '2500',
      OPC_POLL_INTERVAL_MS: '50',
      SERIAL_BAUD_RATE: '115200',
      SERIAL_COMMAND_DELAY_MS: '40',
      MW_LIST_NAME: 'sweep_a',
      SIM_LATENCY_MS: '5',
      SIM_JITTER_MS: '2',
      SIM_SUPPLY_LOAD_OHMS: '12.5',
    });

    expect(config).toEqual({
      timeoutMs: 2500,
      pollIntervalMs: 50,
      serialBaudRate: 115200,
      serialCommandDelayMs: 40,
      listName: 'sweep_a',
      simLatencyMs: 5,
      simJitterMs: 2,
      simSupplyLoadOhms: 12.5,
    });
  });

  it('falls back to the default for unparsable or negative numbers', () => {
    const config = loadConfigFromEnv({
      INSTRUMENT_TIMEOUT_MS: 'soon',
      OPC_POLL_INTERVAL_MS: '-1',
    });

    expect(config.timeoutMs).toBe(DEFAULT_CONFIG.timeoutMs);
    expect(config.pollIntervalMs).toBe(DEFAULT_CONFIG.pollIntervalMs);
  });

  it('falls back to the default list name when empty', () => {
    expect(loadConfigFromEnv({ MW_LIST_NAME: '' }).listName).toBe('bench_list');
  });
});
