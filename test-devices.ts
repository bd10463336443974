/**
 * Test harness to verify the drivers against real hardware (or SIM:: addresses)
 *
 *   npm run probe -- TCPIP0::192.168.0.10::5025::SOCKET ASRL/dev/ttyACM0::INSTR
 *
 * Opening a session clears and resets the instrument; nothing else is set.
 * Every output is switched off again on close.
 */

import { listSerialPorts } from './server/devices/transports/serial.js';
import { openSignalSource } from './server/devices/drivers/rohde-sma-smb.js';
import { openPowerSupply } from './server/devices/drivers/rohde-hmp.js';
import { openResource } from './server/devices/transports/resource.js';
import { ScpiParser } from './server/devices/scpi-parser.js';
import { Quantity, SUPPLY_CHANNELS } from './server/devices/types.js';
import { loadConfigFromEnv } from './server/config.js';

async function identify(address: string): Promise<string | null> {
  const opened = await openResource(address, { timeoutMs: loadConfigFromEnv().timeoutMs });
  if (!opened.ok) {
    console.log(`  ${opened.error.message}`);
    return null;
  }

  const transport = opened.value;
  const idn = await transport.query('*IDN?');
  await transport.close();
  if (!idn.ok) {
    console.log(`  *IDN? failed: ${idn.error.message}`);
    return null;
  }

  const identity = ScpiParser.parseIdentity(idn.value);
  if (!identity.ok) {
    console.log(`  ${identity.error}`);
    return null;
  }
  console.log(`  ${identity.value.manufacturer} ${identity.value.model} (serial ${identity.value.serial}, fw ${identity.value.firmware})`);
  return identity.value.model;
}

async function testSignalSource(address: string) {
  const opened = await openSignalSource(address);
  if (!opened.ok) {
    console.log('  Open failed:', opened.error.message);
    return;
  }
  const source = opened.value;

  const status = await source.getStatus();
  console.log('  Status:', status.ok ? status.value : status.error.message);

  const frequency = await source.getFrequency();
  if (frequency.ok && frequency.value.mode === 'cw') {
    console.log('  Frequency:', Quantity.format(Quantity.to(frequency.value.frequency, 'GHz')));
  } else {
    console.log('  Frequency:', frequency.ok ? frequency.value : frequency.error.message);
  }

  const power = await source.getPower();
  console.log('  Power:', power.ok ? power.value : power.error.message);

  const edge = await source.getExternalTrigger();
  console.log('  Trigger edge:', edge.ok ? edge.value : edge.error.message);

  const closed = await source.close();
  console.log(closed.ok ? '  Closed' : `  Close failed: ${closed.error.message}`);
}

async function testPowerSupply(address: string) {
  const opened = await openPowerSupply(address);
  if (!opened.ok) {
    console.log('  Open failed:', opened.error.message);
    return;
  }
  const supply = opened.value;

  for (const channel of SUPPLY_CHANNELS) {
    const voltage = await supply.getVoltageMeasured(channel);
    const current = await supply.getCurrentMeasured(channel);
    const regulation = await supply.getChannelRegulationStatus(channel);
    console.log(`  CH${channel}:`,
      voltage.ok ? Quantity.format(voltage.value, 3) : voltage.error.message,
      current.ok ? Quantity.format(current.value, 4) : current.error.message,
      regulation.ok ? regulation.value : regulation.error.message);
  }

  const errors = await supply.getErrors();
  console.log('  Error queue:', errors.ok ? errors.value : errors.error.message);

  const closed = await supply.close();
  console.log(closed.ok ? '  Closed' : `  Close failed: ${closed.error.message}`);
}

async function main() {
  const addresses = process.argv.slice(2);

  if (addresses.length === 0) {
    const ports = await listSerialPorts();
    console.log('Usage: npm run probe -- <address> [address...]');
    console.log('Serial ports:', ports.map(p => `ASRL${p.path}::INSTR`));
    return;
  }

  for (const address of addresses) {
    console.log(`\n=== ${address} ===`);
    const model = await identify(address);
    if (!model) continue;

    if (/^SM[AB]/i.test(model)) {
      await testSignalSource(address);
    } else if (/^HMP/i.test(model)) {
      await testPowerSupply(address);
    } else {
      console.log(`  No driver for ${model}`);
    }
  }
}

main().catch(console.error);
