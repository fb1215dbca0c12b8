// Shared types for the driver layers and the hardware harness

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (transport layer wrapping external libs).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export function Ok(): Result<void, never>;
export function Ok<T>(value: T): Result<T, never>;
export function Ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Async wrapper for callback-style APIs that throw or reject
export const tryResultAsync = async <T, E>(
  fn: () => Promise<T>,
  mapError: (e: unknown) => E
): Promise<Result<T, E>> => {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(mapError(e));
  }
};

// Result utilities for ergonomic chaining
export const Result = {
  /** Transform the success value */
  map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
    return result.ok ? Ok(fn(result.value)) : result;
  },

  /** Chain operations that return Result (flatMap) */
  andThen<T, U, E>(result: Result<T, E>, fn: (value: T) => Result<U, E>): Result<U, E> {
    return result.ok ? fn(result.value) : result;
  },

  /** Combine multiple Results - returns first error or all values */
  all<T, E>(results: Result<T, E>[]): Result<T[], E> {
    const values: T[] = [];
    for (const result of results) {
      if (!result.ok) return result;
      values.push(result.value);
    }
    return Ok(values);
  },
};

// ============ Decoded Reply Values ============

/**
 * One classified token of an instrument reply.
 * `null` is the instrument's blank-field marker ("N", "----"), never a timeout.
 */
export type ScalarValue =
  | { kind: 'float'; value: number }
  | { kind: 'integer'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' }
  | { kind: 'text'; value: string };

/**
 * A decoded reply line. Comma-joined replies become a tuple of scalars;
 * tuples are never nested.
 */
export type DecodedValue = ScalarValue | { kind: 'tuple'; items: ScalarValue[] };

export type DecodedKind = DecodedValue['kind'];

/** Plain JavaScript view of a decoded value */
export type NativeScalar = number | boolean | string | null;
export type NativeValue = NativeScalar | NativeScalar[];

// ============ Instrument Types ============

export type LcrModel = '878B' | '879B' | '891';

export interface InstrumentIdentity {
  manufacturer?: string;
  model: string;
  serial?: string;
  firmware?: string;
  /** Every field of the *IDN? reply, in order */
  fields: string[];
}

/** Primary/secondary pair as returned by FETCh? and the recording queries */
export interface MeasurementPair {
  primary: number | null;
  secondary: number | null;
}
