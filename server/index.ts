/**
 * LCR meter SCPI driver
 * Serial command/response driver for BK Precision 878B/879B/891 LCR meters
 */

export { Ok, Err, Result } from '../shared/types.js';
export type {
  ScalarValue,
  DecodedValue,
  DecodedKind,
  NativeScalar,
  NativeValue,
  LcrModel,
  InstrumentIdentity,
  MeasurementPair,
} from '../shared/types.js';

export type {
  Transport,
  Parity,
  StopBits,
  DataBits,
  SerialOptions,
  DecoderOptions,
  AutoFetchOptions,
  DriverOptions,
} from './devices/types.js';

export {
  TransportError,
  ReadTimeoutError,
  DecodeError,
  InvalidParameterError,
} from './devices/errors.js';
export type { LcrError, LcrErrorCode } from './devices/errors.js';

export { ScpiParser, DEFAULT_NULL_SENTINELS } from './devices/scpi-parser.js';
export { createScpiConnection, isQuery } from './devices/scpi-connection.js';
export type { ScpiConnection, ScpiConnectionOptions } from './devices/scpi-connection.js';

export { createSerialTransport, listSerialPorts, findSerialPort } from './devices/transports/serial.js';
export type { SerialConfig } from './devices/transports/serial.js';

export {
  createBk879B,
  FREQUENCIES,
  PRIMARY_PARAMETERS,
  SECONDARY_PARAMETERS,
  TOLERANCES,
} from './devices/drivers/bk-879b.js';
export type {
  Bk879BDriver,
  Bk879BOptions,
  Bk879BReading,
  Frequency879B,
  PrimaryParameter,
  SecondaryParameter,
  TolerancePercent,
  EquivalentCircuit,
} from './devices/drivers/bk-879b.js';

export {
  createBk891,
  MEASUREMENT_FUNCTIONS,
  DISPLAY_PAGES,
  MIN_FREQUENCY,
  MAX_FREQUENCY,
  AC_LEVELS,
} from './devices/drivers/bk-891.js';
export type {
  Bk891Driver,
  MeasurementFunction,
  DisplayPage,
  DisplayFont,
  DisplayMode,
  NumberFormat,
  MeasurementSpeed,
  MeasurementRange,
  CalibrationKind,
  CalibrationStatus,
} from './devices/drivers/bk-891.js';
export type { DriverInfo } from './devices/drivers/common.js';

export {
  connectLcrMeter,
  getRegistration,
  listModels,
  isLcrModel,
  matchIdnModel,
  BK_SERIAL_OPTIONS,
} from './devices/registry.js';
export type { ConnectConfig, LcrDrivers, LcrDriverRegistration } from './devices/registry.js';

export { loadConfigFromEnv, USB_SERIAL_PATTERN } from './devices/config.js';
export type { LcrEnvConfig } from './devices/config.js';
