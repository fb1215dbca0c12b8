/**
 * BK Precision 879B / 878B LCR Meter Driver
 *
 * Note: USB-serial (CP210x) at 9600 baud, 8N1. The meter errors out when a
 * command follows the previous one too quickly, so the transport is set up
 * with a 150ms post-command delay (see registry.ts).
 *
 * FETCh? answers "primary,secondary,compare"; blank fields come back as "N"
 * or "----".
 */

import type {
  Transport,
  DecodedValue,
  DriverOptions,
  AutoFetchOptions,
  InstrumentIdentity,
  MeasurementPair,
  Result,
} from '../types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ScpiParser } from '../scpi-parser.js';
import { createScpiConnection } from '../scpi-connection.js';
import { DecodeError } from '../errors.js';
import type { LcrError } from '../errors.js';
import {
  MANUFACTURER,
  queryAs,
  readOptionalText,
  readMeasurementPair,
  invalidParameter,
  onOff,
  matchKeyword,
  type DriverInfo,
} from './common.js';

export const FREQUENCIES = [100, 120, 1000, 10000] as const;
export const PRIMARY_PARAMETERS = ['L', 'C', 'R', 'Z'] as const;
export const SECONDARY_PARAMETERS = ['D', 'Q', 'THETA', 'ESR'] as const;
export const TOLERANCES = [1, 5, 10, 20] as const;

export type Frequency879B = (typeof FREQUENCIES)[number];
/** L: inductance, C: capacitance, R: resistance, Z: impedance */
export type PrimaryParameter = (typeof PRIMARY_PARAMETERS)[number];
/** D: dissipation, Q: quality factor, THETA: phase angle, ESR: equivalent series resistance */
export type SecondaryParameter = (typeof SECONDARY_PARAMETERS)[number];
export type TolerancePercent = (typeof TOLERANCES)[number];
export type EquivalentCircuit = 'series' | 'parallel';

const EQUIVALENT_MAP: Record<EquivalentCircuit, string> = {
  series: 'SERies',
  parallel: 'PARallel',
};

const EQUIVALENT_REVERSE_MAP: Record<string, EquivalentCircuit> = {
  SER: 'series',
  PAL: 'parallel',
  PAR: 'parallel',
};

const PRIMARY_REVERSE_MAP: Record<string, PrimaryParameter> = { L: 'L', C: 'C', R: 'R', Z: 'Z' };
const SECONDARY_REVERSE_MAP: Record<string, SecondaryParameter> = {
  D: 'D',
  Q: 'Q',
  THETA: 'THETA',
  ESR: 'ESR',
};

export interface Bk879BReading extends MeasurementPair {
  /** Tolerance compare result, null when tolerance mode is off */
  compare: number | string | null;
}

export interface Bk879BOptions extends DriverOptions {
  model?: '878B' | '879B';
}

export interface Bk879BDriver {
  info: DriverInfo;

  connect(): Promise<Result<void, LcrError>>;
  disconnect(): Promise<Result<void, LcrError>>;
  sendCommand(cmd: string): Promise<Result<DecodedValue | undefined, LcrError>>;
  autoFetch(options?: AutoFetchOptions): AsyncGenerator<DecodedValue, void, undefined>;

  // Fetch subsystem
  fetch(): Promise<Result<Bk879BReading, LcrError>>;

  // Frequency subsystem
  setFrequency(frequency: number): Promise<Result<void, LcrError>>;
  getFrequency(): Promise<Result<string, LcrError>>;

  // Function subsystem
  setPrimary(param: string): Promise<Result<void, LcrError>>;
  getPrimary(): Promise<Result<PrimaryParameter, LcrError>>;
  setSecondary(param: string): Promise<Result<void, LcrError>>;
  getSecondary(): Promise<Result<SecondaryParameter, LcrError>>;
  setEquivalent(circuit: EquivalentCircuit): Promise<Result<void, LcrError>>;
  getEquivalent(): Promise<Result<EquivalentCircuit, LcrError>>;

  // Calculate subsystem
  setRelative(enabled: boolean): Promise<Result<void, LcrError>>;
  getRelativeState(): Promise<Result<boolean, LcrError>>;
  getRelativeValue(): Promise<Result<number | null, LcrError>>;
  setToleranceState(enabled: boolean): Promise<Result<void, LcrError>>;
  getToleranceState(): Promise<Result<boolean, LcrError>>;
  setToleranceRange(percent: number): Promise<Result<void, LcrError>>;
  getToleranceRange(): Promise<Result<string | null, LcrError>>;
  getToleranceNominal(): Promise<Result<number | null, LcrError>>;
  getToleranceValue(): Promise<Result<number | null, LcrError>>;
  setRecordingState(enabled: boolean): Promise<Result<void, LcrError>>;
  getRecordingState(): Promise<Result<boolean, LcrError>>;
  getRecordingMaximum(): Promise<Result<MeasurementPair, LcrError>>;
  getRecordingMinimum(): Promise<Result<MeasurementPair, LcrError>>;
  getRecordingAverage(): Promise<Result<MeasurementPair, LcrError>>;
  getRecordingPresent(): Promise<Result<MeasurementPair, LcrError>>;

  // IEEE 488 commands
  localLockout(): Promise<Result<void, LcrError>>;
  goLocal(): Promise<Result<void, LcrError>>;
  getInstrument(): Promise<Result<InstrumentIdentity, LcrError>>;
}

function readReading(value: DecodedValue): Result<Bk879BReading, DecodeError> {
  const pair = readMeasurementPair(value);
  if (!pair.ok) return pair;

  const fields = value.kind === 'tuple' ? value.items : [];
  const compareField = fields[2];
  let compare: number | string | null = null;
  if (compareField !== undefined && compareField.kind !== 'null') {
    if (compareField.kind === 'boolean') {
      return Err(new DecodeError('unexpected compare result', ScpiParser.formatValue(value)));
    }
    compare = compareField.value;
  }

  return Ok({ ...pair.value, compare });
}

export function createBk879B(transport: Transport, options: Bk879BOptions = {}): Bk879BDriver {
  const model = options.model ?? '879B';
  const connection = createScpiConnection(transport, { decoder: options.decoder });

  const info: DriverInfo = {
    id: `bk-${model.toLowerCase()}`,
    manufacturer: MANUFACTURER,
    model,
  };

  const write = (cmd: string) => connection.write(cmd);

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

    async fetch() {
      return queryAs(connection, 'FETCh?', readReading);
    },

    async setFrequency(frequency: number) {
      if (!FREQUENCIES.some(f => f === frequency)) {
        return invalidParameter(`Invalid frequency: ${frequency}. Valid frequencies: ${FREQUENCIES.join(', ')}`);
      }
      return write(`FREQuency ${frequency}`);
    },

    async getFrequency() {
      return queryAs(connection, 'FREQuency?', ScpiParser.asText);
    },

    async setPrimary(param: string) {
      const match = matchKeyword(param, PRIMARY_PARAMETERS);
      if (!match) {
        return invalidParameter(`Invalid primary parameter: ${param}. Valid parameters: ${PRIMARY_PARAMETERS.join(', ')}`);
      }
      return write(`FUNCtion:impa ${match}`);
    },

    async getPrimary() {
      return queryAs(connection, 'FUNCtion:impa?', v => ScpiParser.parseEnum(v, PRIMARY_REVERSE_MAP));
    },

    async setSecondary(param: string) {
      const match = matchKeyword(param, SECONDARY_PARAMETERS);
      if (!match) {
        return invalidParameter(`Invalid secondary parameter: ${param}. Valid parameters: ${SECONDARY_PARAMETERS.join(', ')}`);
      }
      return write(`FUNCtion:impb ${match}`);
    },

    async getSecondary() {
      return queryAs(connection, 'FUNCtion:impb?', v => ScpiParser.parseEnum(v, SECONDARY_REVERSE_MAP));
    },

    async setEquivalent(circuit: EquivalentCircuit) {
      const command = EQUIVALENT_MAP[circuit];
      if (!command) {
        return invalidParameter(`Invalid equivalent circuit: ${circuit}. Valid circuits: series, parallel`);
      }
      return write(`FUNCtion:EQUivalent ${command}`);
    },

    async getEquivalent() {
      return queryAs(connection, 'FUNCtion:EQUivalent?', v => ScpiParser.parseEnum(v, EQUIVALENT_REVERSE_MAP));
    },

    async setRelative(enabled: boolean) {
      return write(`CALCulate:RELative:STATe ${onOff(enabled)}`);
    },

    async getRelativeState() {
      return queryAs(connection, 'CALCulate:RELative:STATe?', ScpiParser.asBoolean);
    },

    async getRelativeValue() {
      return queryAs(connection, 'CALCulate:RELative:VALUe?', ScpiParser.asNumber);
    },

    async setToleranceState(enabled: boolean) {
      return write(`CALCulate:TOLerance:STATe ${onOff(enabled)}`);
    },

    async getToleranceState() {
      return queryAs(connection, 'CALCulate:TOLerance:STATe?', ScpiParser.asBoolean);
    },

    async setToleranceRange(percent: number) {
      if (!TOLERANCES.some(t => t === percent)) {
        return invalidParameter(`Invalid tolerance range: ${percent}. Valid ranges: ${TOLERANCES.join(', ')}`);
      }
      return write(`CALCulate:TOLerance:RANGe ${percent}`);
    },

    async getToleranceRange() {
      return queryAs(connection, 'CALCulate:TOLerance:RANGe?', readOptionalText);
    },

    async getToleranceNominal() {
      return queryAs(connection, 'CALCulate:TOLerance:NOMinal?', ScpiParser.asNumber);
    },

    async getToleranceValue() {
      return queryAs(connection, 'CALCulate:TOLerance:VALUe?', ScpiParser.asNumber);
    },

    async setRecordingState(enabled: boolean) {
      return write(`CALCulate:RECording:STATe ${onOff(enabled)}`);
    },

    async getRecordingState() {
      return queryAs(connection, 'CALCulate:RECording:STATe?', ScpiParser.asBoolean);
    },

    async getRecordingMaximum() {
      return queryAs(connection, 'CALCulate:RECording:MAXimum?', readMeasurementPair);
    },

    async getRecordingMinimum() {
      return queryAs(connection, 'CALCulate:RECording:MINimum?', readMeasurementPair);
    },

    async getRecordingAverage() {
      return queryAs(connection, 'CALCulate:RECording:AVERage?', readMeasurementPair);
    },

    async getRecordingPresent() {
      return queryAs(connection, 'CALCulate:RECording:PRESent?', readMeasurementPair);
    },

    async localLockout() {
      return write('*LLO');
    },

    async goLocal() {
      return write('*GLO');
    },

    async getInstrument() {
      return queryAs(connection, '*IDN?', ScpiParser.parseIdentity);
    },
  };
}
