/**
 * Driver error kinds.
 *
 * Every failure crossing a module seam is one of these, carried in the error
 * slot of a Result. Callers switch on `code`.
 */

export class TransportError extends Error {
  readonly code = 'TRANSPORT_ERROR' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** No reply line arrived within the read window. Distinct from a null reading. */
export class ReadTimeoutError extends Error {
  readonly code = 'READ_TIMEOUT' as const;
  readonly timeoutMs: number;
  readonly command?: string;

  constructor(timeoutMs: number, command?: string) {
    super(command
      ? `Timeout waiting for response to: ${command} (${timeoutMs}ms)`
      : `Timeout waiting for data (${timeoutMs}ms)`);
    this.name = 'ReadTimeoutError';
    this.timeoutMs = timeoutMs;
    this.command = command;
  }
}

export class DecodeError extends Error {
  readonly code = 'DECODE_ERROR' as const;
  /** The offending reply line or token */
  readonly input: string;

  constructor(message: string, input: string) {
    super(`${message}: "${input}"`);
    this.name = 'DecodeError';
    this.input = input;
  }
}

/** A driver argument outside the set the instrument accepts */
export class InvalidParameterError extends Error {
  readonly code = 'INVALID_PARAMETER' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

export type LcrError = TransportError | ReadTimeoutError | DecodeError | InvalidParameterError;

export type LcrErrorCode = LcrError['code'];

/** Wrap anything thrown by a transport library */
export function toTransportError(e: unknown, context?: string): TransportError {
  const message = e instanceof Error ? e.message : String(e);
  return new TransportError(context ? `${context}: ${message}` : message, { cause: e });
}
