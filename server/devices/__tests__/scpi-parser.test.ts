import { describe, it, expect } from 'vitest';
import { ScpiParser } from '../scpi-parser.js';
import { DecodeError } from '../errors.js';
import type { DecodedValue } from '../types.js';

function decoded(line: string): DecodedValue {
  const result = ScpiParser.decode(line);
  if (!result.ok) throw result.error;
  return result.value;
}

function decodeErrorOf(line: string): DecodeError {
  const result = ScpiParser.decode(line);
  if (result.ok) throw new Error(`expected "${line}" to fail`);
  return result.error;
}

describe('ScpiParser', () => {
  describe('decode', () => {
    it('decodes ON/OFF as booleans', () => {
      expect(ScpiParser.decode('ON')).toEqual({ ok: true, value: { kind: 'boolean', value: true } });
      expect(ScpiParser.decode('OFF')).toEqual({ ok: true, value: { kind: 'boolean', value: false } });
    });

    it('matches ON/OFF case-sensitively', () => {
      expect(decoded('on')).toEqual({ kind: 'text', value: 'on' });
    });

    it('decodes blank markers as null', () => {
      expect(decoded('N')).toEqual({ kind: 'null' });
      expect(decoded('----')).toEqual({ kind: 'null' });
      expect(decoded('--------')).toEqual({ kind: 'null' });
    });

    it('treats any field starting with four dashes as blank', () => {
      expect(decoded('----.--')).toEqual({ kind: 'null' });
      expect(decoded('-----1')).toEqual({ kind: 'null' });
      expect(decoded('---')).toEqual({ kind: 'text', value: '---' });
    });

    it('decodes scientific notation as float', () => {
      expect(decoded('1.23E-03')).toEqual({ kind: 'float', value: 1.23e-3 });
      expect(decoded('+2.345678e+04')).toEqual({ kind: 'float', value: 23456.78 });
      expect(decoded('-1.34567e-01')).toEqual({ kind: 'float', value: -0.134567 });
      expect(decoded('5E2')).toEqual({ kind: 'float', value: 500 });
    });

    it('decodes plain integers as integer, never float', () => {
      expect(decoded('42')).toEqual({ kind: 'integer', value: 42 });
      expect(decoded('+800')).toEqual({ kind: 'integer', value: 800 });
      expect(decoded('-900234')).toEqual({ kind: 'integer', value: -900234 });
      expect(decoded('0')).toEqual({ kind: 'integer', value: 0 });
    });

    it('keeps plain decimals and keywords as text', () => {
      expect(decoded('1000.000')).toEqual({ kind: 'text', value: '1000.000' });
      expect(decoded('CAP')).toEqual({ kind: 'text', value: 'CAP' });
      expect(decoded('1.0.0')).toEqual({ kind: 'text', value: '1.0.0' });
    });

    it('drops surrounding whitespace and the line terminator', () => {
      expect(decoded('  12 \r\n')).toEqual({ kind: 'integer', value: 12 });
    });

    it('splits comma-joined replies into a tuple', () => {
      expect(decoded('1.23E-03,ON,N')).toEqual({
        kind: 'tuple',
        items: [
          { kind: 'float', value: 1.23e-3 },
          { kind: 'boolean', value: true },
          { kind: 'null' },
        ],
      });
    });

    it('classifies each tuple field independently', () => {
      expect(decoded('+800,-900234,0,27')).toEqual({
        kind: 'tuple',
        items: [
          { kind: 'integer', value: 800 },
          { kind: 'integer', value: -900234 },
          { kind: 'integer', value: 0 },
          { kind: 'integer', value: 27 },
        ],
      });
      expect(decoded('+2.345678e+04,-1.34567e-01')).toEqual({
        kind: 'tuple',
        items: [
          { kind: 'float', value: 23456.78 },
          { kind: 'float', value: -0.134567 },
        ],
      });
      expect(decoded('HOLD,TESTING')).toEqual({
        kind: 'tuple',
        items: [
          { kind: 'text', value: 'HOLD' },
          { kind: 'text', value: 'TESTING' },
        ],
      });
      expect(decoded('----,N')).toEqual({
        kind: 'tuple',
        items: [{ kind: 'null' }, { kind: 'null' }],
      });
    });

    it('trims whitespace around tuple fields', () => {
      expect(decoded('1 , OFF')).toEqual({
        kind: 'tuple',
        items: [
          { kind: 'integer', value: 1 },
          { kind: 'boolean', value: false },
        ],
      });
    });

    it('rejects an empty reply', () => {
      const error = decodeErrorOf('  \r\n');
      expect(error).toBeInstanceOf(DecodeError);
      expect(error.code).toBe('DECODE_ERROR');
      expect(error.message).toBe('empty reply: "  \r\n"');
    });

    it('rejects an empty tuple field', () => {
      expect(decodeErrorOf('1,,2').message).toBe('empty field: ""');
      expect(decodeErrorOf('1,').message).toBe('empty field: ""');
    });

    it('rejects malformed numbers instead of reading them as text', () => {
      expect(decodeErrorOf('1E').message).toBe('malformed number: "1E"');
      expect(decodeErrorOf('--5').message).toBe('malformed number: "--5"');
      expect(decodeErrorOf('1.2.3e').input).toBe('1.2.3e');
    });

    it('rejects integers a double cannot hold exactly', () => {
      expect(decodeErrorOf('9007199254740993').message).toBe('integer out of range: "9007199254740993"');
    });

    it('rejects control characters', () => {
      expect(decodeErrorOf('A\u0001B').input).toBe('A\u0001B');
      expect(decodeErrorOf('1.0,\ufffd').message).toBe(
        'unexpected control or non-UTF-8 character: "\ufffd"'
      );
    });

    it('accepts custom null sentinels', () => {
      const options = { nullSentinels: ['NA', /^\*+$/] };
      expect(ScpiParser.decode('NA', options)).toEqual({ ok: true, value: { kind: 'null' } });
      expect(ScpiParser.decode('****', options)).toEqual({ ok: true, value: { kind: 'null' } });
      // Replaces the defaults
      expect(ScpiParser.decode('N', options)).toEqual({ ok: true, value: { kind: 'text', value: 'N' } });
    });

    it('checks ON/OFF before null sentinels', () => {
      expect(ScpiParser.decode('OFF', { nullSentinels: ['OFF'] })).toEqual({
        ok: true,
        value: { kind: 'boolean', value: false },
      });
    });

    it('maps overflow floats to null only when a threshold is set', () => {
      expect(decoded('9.9E37')).toEqual({ kind: 'float', value: 9.9e37 });
      expect(ScpiParser.decode('9.9E37', { overflowThreshold: 9e36 })).toEqual({
        ok: true,
        value: { kind: 'null' },
      });
      expect(ScpiParser.decode('1.5E+03', { overflowThreshold: 9e36 })).toEqual({
        ok: true,
        value: { kind: 'float', value: 1500 },
      });
    });
  });

  describe('decodeToken', () => {
    it('classifies a single token without splitting', () => {
      expect(ScpiParser.decodeToken(' -7 ')).toEqual({ ok: true, value: { kind: 'integer', value: -7 } });
    });
  });

  describe('asNumber', () => {
    it('reads floats, integers and decimal text', () => {
      expect(ScpiParser.asNumber(decoded('1.5E+03'))).toEqual({ ok: true, value: 1500 });
      expect(ScpiParser.asNumber(decoded('27'))).toEqual({ ok: true, value: 27 });
      expect(ScpiParser.asNumber(decoded('1000.000'))).toEqual({ ok: true, value: 1000 });
    });

    it('keeps a blank marker as null', () => {
      expect(ScpiParser.asNumber(decoded('----'))).toEqual({ ok: true, value: null });
    });

    it('rejects keywords and tuples', () => {
      const keyword = ScpiParser.asNumber(decoded('CAP'));
      expect(keyword.ok).toBe(false);
      if (!keyword.ok) {
        expect(keyword.error.message).toBe('expected a number: "CAP"');
      }

      const tuple = ScpiParser.asNumber(decoded('1,N'));
      expect(tuple.ok).toBe(false);
      if (!tuple.ok) {
        expect(tuple.error.input).toBe('1,N');
      }
    });
  });

  describe('asBoolean', () => {
    it('reads ON/OFF and 0/1', () => {
      expect(ScpiParser.asBoolean(decoded('ON'))).toEqual({ ok: true, value: true });
      expect(ScpiParser.asBoolean(decoded('0'))).toEqual({ ok: true, value: false });
      expect(ScpiParser.asBoolean(decoded('1'))).toEqual({ ok: true, value: true });
    });

    it('rejects other integers', () => {
      const result = ScpiParser.asBoolean(decoded('2'));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('expected ON/OFF: "2"');
      }
    });
  });

  describe('asText', () => {
    it('reads text and numbers as strings', () => {
      expect(ScpiParser.asText(decoded('1KHZ'))).toEqual({ ok: true, value: '1KHZ' });
      expect(ScpiParser.asText(decoded('1000'))).toEqual({ ok: true, value: '1000' });
    });

    it('rejects a blank marker', () => {
      const result = ScpiParser.asText(decoded('N'));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('expected text: "N"');
      }
    });
  });

  describe('asTuple', () => {
    it('treats a scalar as a one-item list', () => {
      expect(ScpiParser.asTuple(decoded('5'))).toEqual({ ok: true, value: [{ kind: 'integer', value: 5 }] });
    });

    it('checks the field count', () => {
      const result = ScpiParser.asTuple(decoded('1,2'), 3);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('expected 3 fields, got 2: "1,2"');
      }
    });
  });

  describe('parseEnum', () => {
    const circuits = { SER: 'series', PAL: 'parallel' };

    it('maps exact and case-insensitive keys', () => {
      expect(ScpiParser.parseEnum(decoded('PAL'), circuits)).toEqual({ ok: true, value: 'parallel' });
      expect(ScpiParser.parseEnum(decoded('ser'), circuits)).toEqual({ ok: true, value: 'series' });
    });

    it('maps integer codes', () => {
      expect(ScpiParser.parseEnum(decoded('1'), { '0': 'hold', '1': 'auto' })).toEqual({
        ok: true,
        value: 'auto',
      });
    });

    it('lists the accepted keys on a miss', () => {
      const result = ScpiParser.parseEnum(decoded('XYZ'), circuits);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('unknown value, expected one of: SER, PAL: "XYZ"');
      }
    });

    it('rejects non-keyword values', () => {
      const result = ScpiParser.parseEnum(decoded('ON'), circuits);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('expected a keyword: "ON"');
      }
    });
  });

  describe('toNative', () => {
    it('unwraps scalars and tuples', () => {
      expect(ScpiParser.toNative(decoded('1.23E-03,ON,N'))).toEqual([1.23e-3, true, null]);
      expect(ScpiParser.toNative(decoded('CAP'))).toBe('CAP');
      expect(ScpiParser.toNative(decoded('N'))).toBeNull();
    });
  });

  describe('parseIdentity', () => {
    it('reads the four IEEE 488.2 fields', () => {
      expect(ScpiParser.parseIdentity(decoded('BK Precision,891,123456789,1.0.0'))).toEqual({
        ok: true,
        value: {
          manufacturer: 'BK Precision',
          model: '891',
          serial: '123456789',
          firmware: '1.0.0',
          fields: ['BK Precision', '891', '123456789', '1.0.0'],
        },
      });
    });

    it('reads the three-field 879B form as model, firmware, serial', () => {
      expect(ScpiParser.parseIdentity(decoded('879B,V1.2,12345'))).toEqual({
        ok: true,
        value: { model: '879B', firmware: 'V1.2', serial: '12345', fields: ['879B', 'V1.2', '12345'] },
      });
    });

    it('reads a bare model', () => {
      expect(ScpiParser.parseIdentity(decoded('878B'))).toEqual({
        ok: true,
        value: { model: '878B', fields: ['878B'] },
      });
    });

    it('rejects a blank identity', () => {
      expect(ScpiParser.parseIdentity(decoded('N')).ok).toBe(false);
    });
  });

  describe('parseErrorQueue', () => {
    it('reads code and message', () => {
      expect(ScpiParser.parseErrorQueue(decoded('+0,"No error"'))).toEqual({
        ok: true,
        value: { code: 0, message: 'No error' },
      });
    });

    it('keeps commas inside the message', () => {
      expect(ScpiParser.parseErrorQueue(decoded('-113,"Undefined header, extra"'))).toEqual({
        ok: true,
        value: { code: -113, message: 'Undefined header, extra' },
      });
    });

    it('requires an integer code', () => {
      const result = ScpiParser.parseErrorQueue(decoded('N'));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('expected an error code: "N"');
      }
    });
  });
});
