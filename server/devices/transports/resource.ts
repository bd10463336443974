/**
 * Resource addresses
 *
 *   ASRL<port>::INSTR                  serial port; a bare number n means COMn
 *   TCPIP[board]::<host>::<port>::SOCKET raw SCPI socket
 *   SIM::<model>                       in-process simulator (SMB100A, SMA100B, HMP2030, HMP4030)
 */

import type { Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ConnectionError } from '../../../shared/errors.js';
import { loadConfigFromEnv } from '../../config.js';
import { createSerialTransport } from './serial.js';
import { createTcpSocketTransport } from './tcp-socket.js';
import {
  createSimulatedInstrument,
  isSimulatedModel,
  SIMULATED_MODELS,
  type SimulatedModel,
} from '../simulation/index.js';

export type ResourceAddress =
  | { kind: 'serial'; path: string }
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'simulated'; model: SimulatedModel };

const SERIAL_ADDRESS = /^ASRL(.+)::INSTR$/i;
const SOCKET_ADDRESS = /^TCPIP\d*::([^:]+)::(\d+)::SOCKET$/i;
const SIMULATED_ADDRESS = /^SIM::([A-Za-z0-9]+)(?:::INSTR)?$/i;

export function parseResourceAddress(address: string): Result<ResourceAddress, ConnectionError> {
  const trimmed = address.trim();

  const serial = SERIAL_ADDRESS.exec(trimmed);
  if (serial) {
    const port = serial[1];
    return Ok({ kind: 'serial', path: /^\d+$/.test(port) ? `COM${port}` : port });
  }

  const socket = SOCKET_ADDRESS.exec(trimmed);
  if (socket) {
    const port = Number(socket[2]);
    if (port < 1 || port > 65535) {
      return Err(new ConnectionError(address, `invalid port ${socket[2]}`));
    }
    return Ok({ kind: 'tcp', host: socket[1], port });
  }

  const simulated = SIMULATED_ADDRESS.exec(trimmed);
  if (simulated) {
    const model = simulated[1].toUpperCase();
    if (!isSimulatedModel(model)) {
      return Err(new ConnectionError(
        address,
        `no simulator for ${model} (available: ${SIMULATED_MODELS.join(', ')})`
      ));
    }
    return Ok({ kind: 'simulated', model });
  }

  return Err(new ConnectionError(address, 'unrecognized resource address'));
}

function createTransport(resource: ResourceAddress, timeoutMs: number): Transport {
  const config = loadConfigFromEnv();
  switch (resource.kind) {
    case 'serial':
      return createSerialTransport({
        path: resource.path,
        baudRate: config.serialBaudRate,
        commandDelay: config.serialCommandDelayMs,
        timeout: timeoutMs,
      });
    case 'tcp':
      return createTcpSocketTransport({ host: resource.host, port: resource.port, timeout: timeoutMs });
    case 'simulated':
      return createSimulatedInstrument(resource.model).transport;
  }
}

/**
 * Resolve an address and open its transport.
 * Default opener for every session.
 */
export async function openResource(
  address: string,
  options: { timeoutMs: number }
): Promise<Result<Transport, ConnectionError>> {
  const resource = parseResourceAddress(address);
  if (!resource.ok) return resource;

  const transport = createTransport(resource.value, options.timeoutMs);
  const opened = await transport.open();
  if (!opened.ok) {
    console.error(`[Resource] Failed to open ${address}: ${opened.error.message}`);
    return opened;
  }
  return Ok(transport);
}
