/**
 * Test harness to verify the LCR meter drivers against real hardware
 * Read-only operations - no setting values
 *
 * Settings come from LCR_* environment variables (see server/devices/config.ts).
 */

import { listSerialPorts, findSerialPort } from './server/devices/transports/serial.js';
import { connectLcrMeter, getRegistration } from './server/devices/registry.js';
import { loadConfigFromEnv, USB_SERIAL_PATTERN } from './server/devices/config.js';
import { ScpiParser } from './server/devices/scpi-parser.js';

async function main() {
  console.log('LCR Meter Test Harness');
  console.log('======================');

  const config = loadConfigFromEnv();

  let portPath = config.path ?? null;
  if (!portPath) {
    const found = await findSerialPort(USB_SERIAL_PATTERN);
    if (!found) {
      const ports = await listSerialPorts();
      console.log('No USB-serial port found (set LCR_PORT)');
      console.log('Available ports:', ports.map(p => p.path));
      process.exit(1);
    }
    // On macOS, use cu. instead of tty. for outgoing connections
    portPath = found.replace('/dev/tty.', '/dev/cu.');
  }

  console.log(`\n=== Testing ${getRegistration(config.model).description} ===`);
  console.log('Serial port:', portPath);

  const connected = await connectLcrMeter(config.model, {
    path: portPath,
    baudRate: config.baudRate,
    timeout: config.timeout,
    commandDelay: config.commandDelay,
  });
  if (!connected.ok) {
    console.error('Connect failed:', connected.error.message);
    process.exit(1);
  }

  const driver = connected.value;
  console.log('Device info:', driver.info);

  const identity = await driver.getInstrument();
  if (identity.ok) {
    console.log('Identity:', identity.value);
  } else {
    console.error('*IDN? failed:', identity.error.message);
  }

  const reading = await driver.fetch();
  if (reading.ok) {
    console.log('Reading:');
    console.log('  Primary:', reading.value.primary);
    console.log('  Secondary:', reading.value.secondary);
  } else {
    console.error('FETCh? failed:', reading.error.message);
  }

  const limit = config.samples === 0 ? 'until stopped' : String(config.samples);
  console.log(`\nAuto-fetch (${limit}) - put the meter in auto-fetch mode now`);
  try {
    let count = 0;
    for await (const value of driver.autoFetch({ quantity: config.samples })) {
      count++;
      console.log(`  #${count}:`, ScpiParser.toNative(value));
    }
  } catch (err) {
    console.error('Auto-fetch stopped:', err instanceof Error ? err.message : err);
  }

  await driver.disconnect();
  console.log('Disconnected');

  console.log('\nDone!');
  process.exit(0);
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
