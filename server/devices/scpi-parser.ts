/**
 * SCPI Response Parser
 *
 * Turns reply lines from the LCR meters into DecodedValue. The meters answer
 * with one line per query: a single token or comma-joined tokens, where each
 * token is ON/OFF, a blank marker ("N", "----"), a scientific-notation float,
 * a plain integer, or text.
 *
 * Classification order is fixed: ON/OFF, null sentinel, scientific float,
 * integer, text. A bare integer is never read as a float and the keyword
 * tokens win over anything numeric-looking.
 */

import { Result, Ok, Err } from '../../shared/types.js';
import type {
  DecodedValue,
  ScalarValue,
  NativeScalar,
  NativeValue,
  InstrumentIdentity,
} from '../../shared/types.js';
import type { DecoderOptions } from './types.js';
import { DecodeError } from './errors.js';

/** Blank-field markers the 878B/879B/891 print: "N" and fields starting with "----" */
export const DEFAULT_NULL_SENTINELS: ReadonlyArray<string | RegExp> = ['N', /^-{4}/];

const SCIENTIFIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)[eE][+-]?\d+$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.\d*|\.\d+)$/;
const NUMBER_CHARS_PATTERN = /^[-+.\deE]+$/;
// Firmware revisions in *IDN? replies ("1.0.0")
const VERSION_PATTERN = /^\d+(?:\.\d+){2,}$/;
// C0 controls, DEL, and the replacement char left behind by non-UTF-8 bytes
const BAD_CHARS_PATTERN = /[\u0000-\u001f\u007f\ufffd]/;

function isNullSentinel(token: string, sentinels: ReadonlyArray<string | RegExp>): boolean {
  return sentinels.some(s => (typeof s === 'string' ? s === token : s.test(token)));
}

function decodeToken(token: string, options: DecoderOptions): Result<ScalarValue, DecodeError> {
  if (token === '') {
    return Err(new DecodeError('empty field', token));
  }

  if (BAD_CHARS_PATTERN.test(token)) {
    return Err(new DecodeError('unexpected control or non-UTF-8 character', token));
  }

  if (token === 'ON') return Ok<ScalarValue>({ kind: 'boolean', value: true });
  if (token === 'OFF') return Ok<ScalarValue>({ kind: 'boolean', value: false });

  if (isNullSentinel(token, options.nullSentinels ?? DEFAULT_NULL_SENTINELS)) {
    return Ok<ScalarValue>({ kind: 'null' });
  }

  if (SCIENTIFIC_PATTERN.test(token)) {
    const value = Number(token);
    const threshold = options.overflowThreshold;
    if (threshold !== undefined && Math.abs(value) > threshold) {
      return Ok<ScalarValue>({ kind: 'null' });
    }
    return Ok<ScalarValue>({ kind: 'float', value });
  }

  if (INTEGER_PATTERN.test(token)) {
    const value = Number(token);
    if (!Number.isSafeInteger(value)) {
      return Err(new DecodeError('integer out of range', token));
    }
    return Ok<ScalarValue>({ kind: 'integer', value });
  }

  // Looks like a number but is none of the formats the meters emit
  if (
    NUMBER_CHARS_PATTERN.test(token) &&
    /\d/.test(token) &&
    !DECIMAL_PATTERN.test(token) &&
    !VERSION_PATTERN.test(token)
  ) {
    return Err(new DecodeError('malformed number', token));
  }

  return Ok<ScalarValue>({ kind: 'text', value: token });
}

/** Render a value back into reply-token form, for error messages */
function formatValue(value: DecodedValue): string {
  switch (value.kind) {
    case 'tuple':
      return value.items.map(formatValue).join(',');
    case 'null':
      return 'N';
    case 'boolean':
      return value.value ? 'ON' : 'OFF';
    default:
      return String(value.value);
  }
}

function scalarToNative(value: ScalarValue): NativeScalar {
  return value.kind === 'null' ? null : value.value;
}

function scalarToString(value: ScalarValue): string {
  switch (value.kind) {
    case 'null':
      return '';
    case 'boolean':
      return value.value ? 'ON' : 'OFF';
    default:
      return String(value.value).trim();
  }
}

export const ScpiParser = {
  /**
   * Decode one reply line.
   *
   * Surrounding whitespace and the line terminator are dropped. A line with
   * commas becomes a tuple of independently classified tokens; a single token
   * decodes to its scalar.
   */
  decode(line: string, options: DecoderOptions = {}): Result<DecodedValue, DecodeError> {
    const trimmed = line.trim();

    if (trimmed === '') {
      return Err(new DecodeError('empty reply', line));
    }

    if (!trimmed.includes(',')) {
      return decodeToken(trimmed, options);
    }

    const items = Result.all(trimmed.split(',').map(part => decodeToken(part.trim(), options)));
    return Result.map(items, (values): DecodedValue => ({ kind: 'tuple', items: values }));
  },

  /** Classify a single token (no comma splitting) */
  decodeToken(token: string, options: DecoderOptions = {}): Result<ScalarValue, DecodeError> {
    return decodeToken(token.trim(), options);
  },

  /**
   * Read a value as a number. Floats and integers pass through, a null marker
   * stays null, and plain decimal text ("1000.000") is converted.
   */
  asNumber(value: DecodedValue): Result<number | null, DecodeError> {
    switch (value.kind) {
      case 'float':
      case 'integer':
        return Ok(value.value);
      case 'null':
        return Ok(null);
      case 'text':
        if (DECIMAL_PATTERN.test(value.value)) {
          return Ok(Number(value.value));
        }
        break;
    }
    return Err(new DecodeError('expected a number', formatValue(value)));
  },

  /** ON/OFF, or the 0/1 some 891 queries answer with */
  asBoolean(value: DecodedValue): Result<boolean, DecodeError> {
    if (value.kind === 'boolean') {
      return Ok(value.value);
    }
    if (value.kind === 'integer' && (value.value === 0 || value.value === 1)) {
      return Ok(value.value === 1);
    }
    return Err(new DecodeError('expected ON/OFF', formatValue(value)));
  },

  asText(value: DecodedValue): Result<string, DecodeError> {
    switch (value.kind) {
      case 'text':
        return Ok(value.value);
      case 'integer':
      case 'float':
        return Ok(String(value.value));
      default:
        return Err(new DecodeError('expected text', formatValue(value)));
    }
  },

  /**
   * View a value as a list of scalars. A single scalar is a one-item list.
   * With `length`, the item count must match exactly.
   */
  asTuple(value: DecodedValue, length?: number): Result<ScalarValue[], DecodeError> {
    const items = value.kind === 'tuple' ? value.items : [value];
    if (length !== undefined && items.length !== length) {
      return Err(new DecodeError(`expected ${length} fields, got ${items.length}`, formatValue(value)));
    }
    return Ok(items);
  },

  /**
   * Map a keyword reply through a lookup table.
   * Exact key first, then case-insensitive.
   */
  parseEnum<T>(value: DecodedValue, map: Record<string, T>): Result<T, DecodeError> {
    if (value.kind !== 'text' && value.kind !== 'integer') {
      return Err(new DecodeError('expected a keyword', formatValue(value)));
    }
    const key = String(value.value);

    if (Object.prototype.hasOwnProperty.call(map, key)) {
      return Ok(map[key]);
    }

    for (const [candidate, mapped] of Object.entries(map)) {
      if (candidate.toUpperCase() === key.toUpperCase()) {
        return Ok(mapped);
      }
    }

    const validKeys = Object.keys(map).join(', ');
    return Err(new DecodeError(`unknown value, expected one of: ${validKeys}`, key));
  },

  /** Plain JS view: scalars unwrap, tuples become arrays, null markers become null */
  toNative(value: DecodedValue): NativeValue {
    return value.kind === 'tuple' ? value.items.map(scalarToNative) : scalarToNative(value);
  },

  /**
   * Parse an *IDN? reply.
   *
   * Four fields follow IEEE 488.2 (manufacturer, model, serial, firmware).
   * The 878B/879B answer with three: model, firmware, serial.
   */
  parseIdentity(value: DecodedValue): Result<InstrumentIdentity, DecodeError> {
    const fields = (value.kind === 'tuple' ? value.items : [value]).map(scalarToString);

    if (fields.length >= 4) {
      const [manufacturer, model, serial, firmware] = fields;
      return Ok({ manufacturer, model, serial, firmware, fields });
    }
    if (fields.length === 3) {
      const [model, firmware, serial] = fields;
      return Ok({ model, firmware, serial, fields });
    }
    if (fields.length === 2) {
      const [manufacturer, model] = fields;
      return Ok({ manufacturer, model, fields });
    }
    if (fields[0] === '') {
      return Err(new DecodeError('empty identity', formatValue(value)));
    }
    return Ok({ model: fields[0], fields });
  },

  /**
   * Parse a SYSTem:ERRor? reply: "+0,\"No error\"" or "-113,\"Undefined header\"".
   * Commas inside the message are kept.
   */
  parseErrorQueue(value: DecodedValue): Result<{ code: number; message: string }, DecodeError> {
    const items = value.kind === 'tuple' ? value.items : [value];
    const [first, ...rest] = items;

    if (first.kind !== 'integer') {
      return Err(new DecodeError('expected an error code', formatValue(value)));
    }

    const message = rest.map(scalarToString).join(', ').replace(/^"(.*)"$/, '$1');
    return Ok({ code: first.value, message });
  },

  formatValue,
};
