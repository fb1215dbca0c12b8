/**
 * SCPI Connection
 * Command/response pairing and the auto-fetch stream over one Transport
 *
 * A query (command ending in '?') elicits exactly one reply line, which is
 * decoded before it is returned. In auto-fetch mode the meter pushes readings
 * at its own cadence until the operator leaves the mode; there is no command
 * to start or stop it from this side.
 */

import type { Transport, DecodedValue, DecoderOptions, AutoFetchOptions, Result } from './types.js';
import { Ok, Err } from '../../shared/types.js';
import { ScpiParser } from './scpi-parser.js';
import { InvalidParameterError } from './errors.js';
import type { LcrError } from './errors.js';

export interface ScpiConnectionOptions {
  decoder?: DecoderOptions;
}

export interface ScpiConnection {
  readonly transport: Transport;

  /**
   * Send any command. Queries resolve to the decoded reply, other commands
   * to undefined once written.
   */
  sendCommand(cmd: string): Promise<Result<DecodedValue | undefined, LcrError>>;
  query(cmd: string): Promise<Result<DecodedValue, LcrError>>;
  write(cmd: string): Promise<Result<void, LcrError>>;

  /**
   * Readings pushed by the meter, decoded, one per line.
   *
   * Runs until the caller stops iterating (or `quantity` readings). A read
   * failure or undecodable line rejects the iteration with that error, so a
   * dead port is never mistaken for the end of the stream.
   */
  autoFetch(options?: AutoFetchOptions): AsyncGenerator<DecodedValue, void, undefined>;

  close(): Promise<Result<void, LcrError>>;
}

export function isQuery(cmd: string): boolean {
  return cmd.trim().endsWith('?');
}

export function createScpiConnection(
  transport: Transport,
  options: ScpiConnectionOptions = {}
): ScpiConnection {
  const decoderOptions = options.decoder ?? {};

  async function query(cmd: string): Promise<Result<DecodedValue, LcrError>> {
    const reply = await transport.query(cmd);
    if (!reply.ok) return reply;
    return ScpiParser.decode(reply.value, decoderOptions);
  }

  return {
    transport,

    async sendCommand(cmd: string): Promise<Result<DecodedValue | undefined, LcrError>> {
      if (cmd.trim() === '') {
        return Err(new InvalidParameterError('Empty command'));
      }
      if (isQuery(cmd)) {
        return query(cmd);
      }
      const written = await transport.write(cmd);
      if (!written.ok) return written;
      return Ok(undefined);
    },

    query,

    write(cmd: string): Promise<Result<void, LcrError>> {
      return transport.write(cmd);
    },

    async *autoFetch(fetchOptions: AutoFetchOptions = {}): AsyncGenerator<DecodedValue, void, undefined> {
      const { quantity = 0, timeoutMs } = fetchOptions;

      if (!Number.isInteger(quantity) || quantity < 0) {
        throw new InvalidParameterError(`Invalid quantity: ${quantity}. Expected a non-negative integer`);
      }

      // Stale replies must not show up as readings
      const discarded = await transport.discardInput();
      if (!discarded.ok) throw discarded.error;

      let count = 0;
      while (quantity === 0 || count < quantity) {
        const line = await transport.readLine(timeoutMs);
        if (!line.ok) throw line.error;

        const reading = ScpiParser.decode(line.value, decoderOptions);
        if (!reading.ok) throw reading.error;

        count++;
        yield reading.value;
      }
    },

    close(): Promise<Result<void, LcrError>> {
      return transport.close();
    },
  };
}
