// Re-export shared types
export * from '../../shared/types.js';

import type { Result } from '../../shared/types.js';
import type { LcrError } from './errors.js';

// Server-only types

export interface Transport {
  open(): Promise<Result<void, LcrError>>;
  close(): Promise<Result<void, LcrError>>;
  /** Write a command and wait for exactly one reply line */
  query(cmd: string): Promise<Result<string, LcrError>>;
  write(cmd: string): Promise<Result<void, LcrError>>;
  /** Wait for the next line the instrument sends on its own (auto-fetch) */
  readLine(timeoutMs?: number): Promise<Result<string, LcrError>>;
  /** Drop any received lines nobody has read yet */
  discardInput(): Promise<Result<void, LcrError>>;
  isOpen(): boolean;
}

export type Parity = 'none' | 'even' | 'odd' | 'mark' | 'space';
export type StopBits = 1 | 1.5 | 2;
export type DataBits = 5 | 6 | 7 | 8;

export interface SerialOptions {
  baudRate: number;
  parity?: Parity;             // Default: 'none'
  stopBits?: StopBits;         // Default: 1
  dataBits?: DataBits;         // Default: 8
  commandDelay?: number;       // ms delay after each command (default: 50)
  timeout?: number;            // Read timeout in ms (default: 2000)
  writeTimeout?: number;       // ms allowed for a write to drain (default: 2000)
}

/**
 * Reply decoding knobs. Null sentinels and overflow reporting differ between
 * meter firmwares, so they are configuration rather than constants.
 */
export interface DecoderOptions {
  /** Tokens that mean "no value". Strings match exactly. Default: 'N' and tokens starting with four dashes */
  nullSentinels?: Array<string | RegExp>;
  /** Floats with a larger magnitude decode to null (e.g. 9e36 for 9.9E37 overflow). Off by default */
  overflowThreshold?: number;
}

export interface AutoFetchOptions {
  /** Stop after this many readings. 0 = unlimited (default) */
  quantity?: number;
  /** Per-line read ceiling in ms. Defaults to the transport's timeout */
  timeoutMs?: number;
}

export interface DriverOptions {
  decoder?: DecoderOptions;
}
