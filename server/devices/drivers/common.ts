/**
 * Pieces shared by the LCR meter drivers
 */

import type { DecodedValue, MeasurementPair, Result } from '../types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ScpiParser } from '../scpi-parser.js';
import type { ScpiConnection } from '../scpi-connection.js';
import { DecodeError, InvalidParameterError } from '../errors.js';
import type { LcrError } from '../errors.js';

export interface DriverInfo {
  id: string;
  manufacturer: string;
  model: string;
}

export const MANUFACTURER = 'BK Precision';

/** Query and convert the decoded reply in one step */
export async function queryAs<T>(
  connection: ScpiConnection,
  cmd: string,
  read: (value: DecodedValue) => Result<T, DecodeError>
): Promise<Result<T, LcrError>> {
  const reply = await connection.query(cmd);
  if (!reply.ok) return reply;
  return read(reply.value);
}

/** Text reply, with the blank marker read as null */
export function readOptionalText(value: DecodedValue): Result<string | null, DecodeError> {
  return value.kind === 'null' ? Ok(null) : ScpiParser.asText(value);
}

/** First two fields of FETCh? and the recording queries */
export function readMeasurementPair(value: DecodedValue): Result<MeasurementPair, DecodeError> {
  const fields = ScpiParser.asTuple(value);
  if (!fields.ok) return fields;

  const [first, second] = fields.value;
  if (fields.value.length < 2) {
    return Err(new DecodeError('expected primary and secondary values', ScpiParser.formatValue(value)));
  }

  const primary = ScpiParser.asNumber(first);
  if (!primary.ok) return primary;

  const secondary = ScpiParser.asNumber(second);
  if (!secondary.ok) return secondary;

  return Ok({ primary: primary.value, secondary: secondary.value });
}

/** Numeric reply where a blank field is not acceptable */
export function readRequiredNumber(value: DecodedValue): Result<number, DecodeError> {
  const number = ScpiParser.asNumber(value);
  if (!number.ok) return number;
  if (number.value === null) {
    return Err(new DecodeError('expected a number', ScpiParser.formatValue(value)));
  }
  return Ok(number.value);
}

/** Comma-separated integers, as in the 891 date and time replies */
export function readIntegers(value: DecodedValue, count: number): Result<number[], DecodeError> {
  const fields = ScpiParser.asTuple(value, count);
  if (!fields.ok) return fields;

  const integers: number[] = [];
  for (const field of fields.value) {
    if (field.kind !== 'integer') {
      return Err(new DecodeError('expected integers', ScpiParser.formatValue(value)));
    }
    integers.push(field.value);
  }
  return Ok(integers);
}

export function invalidParameter(message: string): Result<never, InvalidParameterError> {
  return Err(new InvalidParameterError(message));
}

export const onOff = (enabled: boolean): string => (enabled ? 'ON' : 'OFF');

/** Look up a keyword, case-insensitive, in a fixed list of accepted values */
export function matchKeyword<T extends string>(value: string, accepted: readonly T[]): T | undefined {
  const upper = value.trim().toUpperCase();
  return accepted.find(candidate => candidate === upper);
}

export function isWholeNumberInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}
