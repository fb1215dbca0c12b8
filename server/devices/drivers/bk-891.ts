/**
 * BK Precision 891 LCR Meter Driver
 *
 * The 891 takes most settings as small integer codes (DISPlay:FONT 0|1,
 * MEASurement:FUNCtion 0..18) and answers queries with the same codes.
 * Frequency is continuous from 20Hz to 300kHz.
 */

import type {
  Transport,
  DecodedValue,
  DriverOptions,
  AutoFetchOptions,
  InstrumentIdentity,
  MeasurementPair,
} from '../types.js';
import { Result, Ok, Err } from '../../../shared/types.js';
import { ScpiParser } from '../scpi-parser.js';
import { createScpiConnection } from '../scpi-connection.js';
import { DecodeError } from '../errors.js';
import type { LcrError } from '../errors.js';
import {
  MANUFACTURER,
  queryAs,
  readMeasurementPair,
  readRequiredNumber,
  readIntegers,
  invalidParameter,
  onOff,
  matchKeyword,
  isWholeNumberInRange,
  type DriverInfo,
} from './common.js';

/** Measurement functions in MEASurement:FUNCtion code order (CSQ = 0 ... DCR = 18) */
export const MEASUREMENT_FUNCTIONS = [
  'CSQ', 'CSD', 'CSR', 'CPQ', 'CPD', 'CPR', 'CPG',
  'LSQ', 'LSD', 'LSR', 'LPQ', 'LPD', 'LPR', 'LPG',
  'ZTH', 'YTH', 'RX', 'GB', 'DCR',
] as const;

export type MeasurementFunction = (typeof MEASUREMENT_FUNCTIONS)[number];

export const DISPLAY_PAGES = ['bin', 'measurement', 'sweep', 'system'] as const;
export type DisplayPage = (typeof DISPLAY_PAGES)[number];

export type DisplayFont = 'normal' | 'large';
export type DisplayMode = 'decimal' | 'scientific';
export type NumberFormat = 'ascii' | 'real';
export type MeasurementSpeed = 'slow' | 'fast';
export type MeasurementRange = 'hold' | 'auto';
export type CalibrationKind = 'open' | 'short';
export type CalibrationStatus = 'done' | 'busy' | 'failed';

export const MIN_FREQUENCY = 20;
export const MAX_FREQUENCY = 300000;
export const AC_LEVELS = [0.5, 1.0] as const;

const SPEED_CODES: Record<MeasurementSpeed, number> = { slow: 1, fast: 2 };
const SPEED_REVERSE_MAP: Record<string, MeasurementSpeed> = { '1': 'slow', '2': 'fast' };

const RANGE_CODES: Record<MeasurementRange, number> = { hold: 0, auto: 1 };
const RANGE_REVERSE_MAP: Record<string, MeasurementRange> = { '0': 'hold', '1': 'auto' };

const FONT_REVERSE_MAP: Record<string, DisplayFont> = { '0': 'normal', '1': 'large' };
const MODE_REVERSE_MAP: Record<string, DisplayMode> = { '0': 'decimal', '1': 'scientific' };

const FORMAT_REVERSE_MAP: Record<string, NumberFormat> = {
  ASC: 'ascii',
  ASCII: 'ascii',
  REAL: 'real',
  '0': 'ascii',
  '1': 'real',
};

const CALIBRATION_COMMANDS: Record<CalibrationKind, string> = {
  open: 'CALibrate:OPEN',
  short: 'CALibrate:SHORt',
};

const CALIBRATION_STATUS_MAP: Record<string, CalibrationStatus> = {
  '0': 'done',
  '1': 'busy',
  '-1': 'failed',
};

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;

export interface Bk891Driver {
  info: DriverInfo;

  connect(): Promise<Result<void, LcrError>>;
  disconnect(): Promise<Result<void, LcrError>>;
  sendCommand(cmd: string): Promise<Result<DecodedValue | undefined, LcrError>>;
  autoFetch(options?: AutoFetchOptions): AsyncGenerator<DecodedValue, void, undefined>;

  // Calibrate subsystem
  calibrate(kind?: CalibrationKind): Promise<Result<void, LcrError>>;
  getCalibrationStatus(): Promise<Result<CalibrationStatus, LcrError>>;

  // Display subsystem
  setDisplayFont(font: DisplayFont): Promise<Result<void, LcrError>>;
  getDisplayFont(): Promise<Result<DisplayFont, LcrError>>;
  setDisplayMode(mode: DisplayMode): Promise<Result<void, LcrError>>;
  getDisplayMode(): Promise<Result<DisplayMode, LcrError>>;
  setDisplayPage(page: DisplayPage | number): Promise<Result<void, LcrError>>;
  getDisplayPage(): Promise<Result<DisplayPage, LcrError>>;

  // Fetch / format subsystems
  fetch(): Promise<Result<MeasurementPair, LcrError>>;
  setFormat(format: NumberFormat): Promise<Result<void, LcrError>>;
  getFormat(): Promise<Result<NumberFormat, LcrError>>;

  // Frequency / level subsystems
  setFrequency(frequency: number): Promise<Result<void, LcrError>>;
  getFrequency(): Promise<Result<number, LcrError>>;
  setAcLevel(level: number): Promise<Result<void, LcrError>>;
  getAcLevel(): Promise<Result<number, LcrError>>;

  // Measurement subsystem
  setFunction(fn: string): Promise<Result<void, LcrError>>;
  getFunction(): Promise<Result<MeasurementFunction, LcrError>>;
  setSpeed(speed: MeasurementSpeed): Promise<Result<void, LcrError>>;
  getSpeed(): Promise<Result<MeasurementSpeed, LcrError>>;
  setRange(range: MeasurementRange): Promise<Result<void, LcrError>>;
  getRange(): Promise<Result<MeasurementRange, LcrError>>;

  // System subsystem
  setBrightness(level: number): Promise<Result<void, LcrError>>;
  getBrightness(): Promise<Result<number, LcrError>>;
  setBeeper(enabled: boolean): Promise<Result<void, LcrError>>;
  getBeeper(): Promise<Result<boolean, LcrError>>;
  setDate(date?: Date | string): Promise<Result<void, LcrError>>;
  getDate(): Promise<Result<string, LcrError>>;
  setTime(time?: Date | string): Promise<Result<void, LcrError>>;
  getTime(): Promise<Result<string, LcrError>>;
  getError(): Promise<Result<{ code: number; message: string }, LcrError>>;

  // IEEE 488.2 commands
  getInstrument(): Promise<Result<InstrumentIdentity, LcrError>>;
  clearInstrument(): Promise<Result<void, LcrError>>;
  reset(): Promise<Result<void, LcrError>>;
  saveConfiguration(slot?: number): Promise<Result<void, LcrError>>;
  recallConfiguration(slot?: number): Promise<Result<void, LcrError>>;
}

const pad2 = (n: number) => String(n).padStart(2, '0');

/** Year, month, day from a Date (local time) or a YYYY-MM-DD string */
export function toDateParts(date: Date | string): [number, number, number] | null {
  if (date instanceof Date) {
    if (Number.isNaN(date.getTime())) return null;
    return [date.getFullYear(), date.getMonth() + 1, date.getDate()];
  }

  const match = ISO_DATE_PATTERN.exec(date);
  if (!match) return null;

  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  // Round-trip through Date to reject 2021-02-30 and friends
  const check = new Date(year, month - 1, day);
  if (check.getFullYear() !== year || check.getMonth() !== month - 1 || check.getDate() !== day) {
    return null;
  }
  return [year, month, day];
}

/** Hour, minute, second from a Date (local time) or an HH:MM[:SS] string */
export function toTimeParts(time: Date | string): [number, number, number] | null {
  if (time instanceof Date) {
    if (Number.isNaN(time.getTime())) return null;
    return [time.getHours(), time.getMinutes(), time.getSeconds()];
  }

  const match = ISO_TIME_PATTERN.exec(time);
  if (!match) return null;

  const [hour, minute, second] = [Number(match[1]), Number(match[2]), Number(match[3] ?? '0')];
  if (hour > 23 || minute > 59 || second > 59) return null;
  return [hour, minute, second];
}

function readFunction(value: DecodedValue): Result<MeasurementFunction, DecodeError> {
  if (value.kind === 'integer' && isWholeNumberInRange(value.value, 0, MEASUREMENT_FUNCTIONS.length - 1)) {
    return Ok(MEASUREMENT_FUNCTIONS[value.value]);
  }
  return Err(new DecodeError('unknown measurement function', ScpiParser.formatValue(value)));
}

function readDisplayPage(value: DecodedValue): Result<DisplayPage, DecodeError> {
  if (value.kind === 'integer' && isWholeNumberInRange(value.value, 0, DISPLAY_PAGES.length - 1)) {
    return Ok(DISPLAY_PAGES[value.value]);
  }
  return Err(new DecodeError('unknown display page', ScpiParser.formatValue(value)));
}

export function createBk891(transport: Transport, options: DriverOptions = {}): Bk891Driver {
  const connection = createScpiConnection(transport, { decoder: options.decoder });

  const info: DriverInfo = {
    id: 'bk-891',
    manufacturer: MANUFACTURER,
    model: '891',
  };

  const write = (cmd: string) => connection.write(cmd);

  function writeSlot(command: string, slot: number) {
    if (!Number.isInteger(slot) || slot < 0) {
      return Promise.resolve(invalidParameter(`Invalid memory slot: ${slot}. Expected a non-negative integer`));
    }
    return write(`${command} ${slot}`);
  }

  return {
    info,

    async connect(): Promise<Result<void, LcrError>> {
      return transport.open();
    },

    async disconnect(): Promise<Result<void, LcrError>> {
      return transport.close();
    },

    sendCommand: (cmd) => connection.sendCommand(cmd),
    autoFetch: (fetchOptions) => connection.autoFetch(fetchOptions),

    async calibrate(kind: CalibrationKind = 'open') {
      const command = CALIBRATION_COMMANDS[kind];
      if (!command) {
        return invalidParameter(`Invalid calibration: ${kind}. Valid calibrations: open, short`);
      }
      return write(command);
    },

    async getCalibrationStatus() {
      return queryAs(connection, 'CALibrate:BUSY?', v => ScpiParser.parseEnum(v, CALIBRATION_STATUS_MAP));
    },

    async setDisplayFont(font: DisplayFont) {
      return write(`DISPlay:FONT ${font === 'large' ? 1 : 0}`);
    },

    async getDisplayFont() {
      return queryAs(connection, 'DISPlay:FONT?', v => ScpiParser.parseEnum(v, FONT_REVERSE_MAP));
    },

    async setDisplayMode(mode: DisplayMode) {
      return write(`DISPlay:MODE ${mode === 'scientific' ? 1 : 0}`);
    },

    async getDisplayMode() {
      return queryAs(connection, 'DISPlay:MODE?', v => ScpiParser.parseEnum(v, MODE_REVERSE_MAP));
    },

    async setDisplayPage(page: DisplayPage | number) {
      const code = typeof page === 'number' ? page : DISPLAY_PAGES.indexOf(page);
      if (!isWholeNumberInRange(code, 0, DISPLAY_PAGES.length - 1)) {
        return invalidParameter(`Invalid display page: ${page}. Valid pages: ${DISPLAY_PAGES.join(', ')} (0-3)`);
      }
      return write(`DISPlay:PAGE ${code}`);
    },

    async getDisplayPage() {
      return queryAs(connection, 'DISPlay:PAGE?', readDisplayPage);
    },

    async fetch() {
      return queryAs(connection, 'FETCh?', readMeasurementPair);
    },

    async setFormat(format: NumberFormat) {
      return write(`FORMat ${format === 'real' ? 1 : 0}`);
    },

    async getFormat() {
      return queryAs(connection, 'FORMat?', v => ScpiParser.parseEnum(v, FORMAT_REVERSE_MAP));
    },

    async setFrequency(frequency: number) {
      if (!Number.isFinite(frequency) || frequency < MIN_FREQUENCY || frequency > MAX_FREQUENCY) {
        return invalidParameter(`Invalid frequency: ${frequency}. Expected ${MIN_FREQUENCY} to ${MAX_FREQUENCY} Hz`);
      }
      return write(`FREQuency ${frequency}`);
    },

    async getFrequency() {
      return queryAs(connection, 'FREQuency?', readRequiredNumber);
    },

    async setAcLevel(level: number) {
      if (!AC_LEVELS.some(l => l === level)) {
        return invalidParameter(`Invalid AC level: ${level}. Valid levels: ${AC_LEVELS.join(', ')}`);
      }
      return write(`LEVel:AC ${level.toFixed(1)}`);
    },

    async getAcLevel() {
      return queryAs(connection, 'LEVel:AC?', readRequiredNumber);
    },

    async setFunction(fn: string) {
      const match = matchKeyword(fn, MEASUREMENT_FUNCTIONS);
      if (!match) {
        return invalidParameter(`Invalid measurement function: ${fn}. Valid functions: ${MEASUREMENT_FUNCTIONS.join(', ')}`);
      }
      return write(`MEASurement:FUNCtion ${MEASUREMENT_FUNCTIONS.indexOf(match)}`);
    },

    async getFunction() {
      return queryAs(connection, 'MEASurement:FUNCtion?', readFunction);
    },

    async setSpeed(speed: MeasurementSpeed) {
      const code = SPEED_CODES[speed];
      if (code === undefined) {
        return invalidParameter(`Invalid speed: ${speed}. Valid speeds: slow, fast`);
      }
      return write(`MEASurement:SPEED ${code}`);
    },

    async getSpeed() {
      return queryAs(connection, 'MEASurement:SPEED?', v => ScpiParser.parseEnum(v, SPEED_REVERSE_MAP));
    },

    async setRange(range: MeasurementRange) {
      const code = RANGE_CODES[range];
      if (code === undefined) {
        return invalidParameter(`Invalid range: ${range}. Valid ranges: hold, auto`);
      }
      return write(`MEASurement:RANGe ${code}`);
    },

    async getRange() {
      return queryAs(connection, 'MEASurement:RANGe?', v => ScpiParser.parseEnum(v, RANGE_REVERSE_MAP));
    },

    async setBrightness(level: number) {
      if (!isWholeNumberInRange(level, 0, 9)) {
        return invalidParameter(`Invalid brightness: ${level}. Expected an integer from 0 to 9`);
      }
      return write(`SYStem:BRIGhtness ${level}`);
    },

    async getBrightness() {
      return queryAs(connection, 'SYStem:BRIGhtness?', readRequiredNumber);
    },

    async setBeeper(enabled: boolean) {
      return write(`SYStem:BEEPer ${onOff(enabled)}`);
    },

    async getBeeper() {
      return queryAs(connection, 'SYStem:BEEPer?', ScpiParser.asBoolean);
    },

    async setDate(date: Date | string = new Date()) {
      const parts = toDateParts(date);
      if (!parts) {
        return invalidParameter(`Invalid date: ${String(date)}. Expected YYYY-MM-DD`);
      }
      return write(`SYStem:DATE ${parts.join(',')}`);
    },

    async getDate() {
      return queryAs(connection, 'SYStem:DATE?', v => Result.map(
        readIntegers(v, 3),
        ([year, month, day]) => `${year}-${pad2(month)}-${pad2(day)}`
      ));
    },

    async setTime(time: Date | string = new Date()) {
      const parts = toTimeParts(time);
      if (!parts) {
        return invalidParameter(`Invalid time: ${String(time)}. Expected HH:MM or HH:MM:SS`);
      }
      return write(`SYStem:TIME ${parts.join(',')}`);
    },

    async getTime() {
      return queryAs(connection, 'SYStem:TIME?', v => Result.map(
        readIntegers(v, 3),
        (parts) => parts.map(pad2).join(':')
      ));
    },

    async getError() {
      return queryAs(connection, 'SYStem:ERRor?', ScpiParser.parseErrorQueue);
    },

    async getInstrument() {
      return queryAs(connection, '*IDN?', ScpiParser.parseIdentity);
    },

    async clearInstrument() {
      return write('*CLS');
    },

    async reset() {
      return write('*RST');
    },

    async saveConfiguration(slot: number = 1) {
      return writeSlot('*SAV', slot);
    },

    async recallConfiguration(slot: number = 1) {
      return writeSlot('*RCL', slot);
    },
  };
}
