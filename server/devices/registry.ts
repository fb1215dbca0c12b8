/**
 * LCR Meter Registry
 * Per-model driver factories and serial settings, and the connect helper
 */

import type { Transport, LcrModel, SerialOptions, DriverOptions, Result } from './types.js';
import { Ok, Err } from '../../shared/types.js';
import { createSerialTransport } from './transports/serial.js';
import { createBk879B, type Bk879BDriver } from './drivers/bk-879b.js';
import { createBk891, type Bk891Driver } from './drivers/bk-891.js';
import { InvalidParameterError } from './errors.js';
import type { LcrError } from './errors.js';

export interface LcrDrivers {
  '878B': Bk879BDriver;
  '879B': Bk879BDriver;
  '891': Bk891Driver;
}

export interface LcrDriverRegistration<D> {
  model: LcrModel;
  description: string;
  create: (transport: Transport, options?: DriverOptions) => D;
  serialOptions: Required<SerialOptions>;
  /** Matches the model field of *IDN? */
  idnModel: RegExp;
}

/**
 * All three meters ship with the same serial setup: 9600 baud 8N1, and they
 * need ~150ms between commands or they drop the next one.
 */
export const BK_SERIAL_OPTIONS: Required<SerialOptions> = {
  baudRate: 9600,
  parity: 'none',
  stopBits: 1,
  dataBits: 8,
  commandDelay: 150,
  timeout: 10000,
  writeTimeout: 10000,
};

const REGISTRATIONS: { [M in LcrModel]: LcrDriverRegistration<LcrDrivers[M]> } = {
  '878B': {
    model: '878B',
    description: 'BK Precision 878B LCR meter',
    create: (transport, options) => createBk879B(transport, { ...options, model: '878B' }),
    serialOptions: BK_SERIAL_OPTIONS,
    idnModel: /878B/i,
  },
  '879B': {
    model: '879B',
    description: 'BK Precision 879B LCR meter',
    create: (transport, options) => createBk879B(transport, { ...options, model: '879B' }),
    serialOptions: BK_SERIAL_OPTIONS,
    idnModel: /879B/i,
  },
  '891': {
    model: '891',
    description: 'BK Precision 891 LCR meter',
    create: (transport, options) => createBk891(transport, options),
    serialOptions: BK_SERIAL_OPTIONS,
    idnModel: /891/,
  },
};

export function isLcrModel(value: string): value is LcrModel {
  return Object.prototype.hasOwnProperty.call(REGISTRATIONS, value);
}

// Explicit order: '891' is an integer-like key and would sort first in Object.keys
const MODELS: readonly LcrModel[] = ['878B', '879B', '891'];

export function listModels(): LcrModel[] {
  return [...MODELS];
}

export function getRegistration<M extends LcrModel>(model: M): LcrDriverRegistration<LcrDrivers[M]> {
  return REGISTRATIONS[model];
}

/** Find the registration whose *IDN? model pattern matches */
export function matchIdnModel(idnModel: string): LcrModel | undefined {
  return listModels().find(model => REGISTRATIONS[model].idnModel.test(idnModel));
}

export interface ConnectConfig extends Partial<SerialOptions>, DriverOptions {
  /** OS port name, passed through as-is (/dev/ttyUSB0, COM3, ...) */
  path: string;
}

/**
 * Open the serial port for a meter and hand back its driver.
 * The port stays open until the driver's disconnect().
 */
export async function connectLcrMeter<M extends LcrModel>(
  model: M,
  config: ConnectConfig
): Promise<Result<LcrDrivers[M], LcrError>> {
  if (!isLcrModel(model)) {
    return Err(new InvalidParameterError(`Unknown model: ${String(model)}. Known models: ${listModels().join(', ')}`));
  }
  if (config.path.trim() === '') {
    return Err(new InvalidParameterError('Serial port path is required'));
  }

  const registration = getRegistration(model);
  const defaults = registration.serialOptions;

  // Per-field so an explicit undefined falls back to the model default
  const transport = createSerialTransport({
    path: config.path,
    baudRate: config.baudRate ?? defaults.baudRate,
    parity: config.parity ?? defaults.parity,
    stopBits: config.stopBits ?? defaults.stopBits,
    dataBits: config.dataBits ?? defaults.dataBits,
    commandDelay: config.commandDelay ?? defaults.commandDelay,
    timeout: config.timeout ?? defaults.timeout,
    writeTimeout: config.writeTimeout ?? defaults.writeTimeout,
  });

  const driver = registration.create(transport, { decoder: config.decoder });
  const opened = await driver.connect();
  if (!opened.ok) return opened;

  console.log(`[LCR] Connected to ${registration.description} on ${config.path}`);
  return Ok(driver);
}
