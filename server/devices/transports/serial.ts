/**
 * Serial Transport
 * Line-oriented serial port I/O for SCPI instruments
 *
 * Every received line goes into a queue. query() drops stale lines, writes
 * the command, and takes the next line as its reply; readLine() takes lines
 * the meter pushes on its own (auto-fetch mode).
 */

import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import type { Transport, Parity, StopBits, DataBits } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err, tryResultAsync } from '../../../shared/types.js';
import { TransportError, ReadTimeoutError, toTransportError } from '../errors.js';
import type { LcrError } from '../errors.js';

export interface SerialConfig {
  path: string;
  baudRate: number;
  parity?: Parity;          // default: 'none'
  stopBits?: StopBits;      // default: 1
  dataBits?: DataBits;      // default: 8
  commandDelay?: number;    // ms delay after each command (default: 50)
  timeout?: number;         // read timeout in ms (default: 2000)
  writeTimeout?: number;    // ms for a write to drain (default: 2000)
  delimiter?: string;       // line delimiter (default: '\n', a trailing '\r' is dropped)
}

type LineResult = Result<string, LcrError>;

export function createSerialTransport(config: SerialConfig): Transport {
  const {
    path,
    baudRate,
    parity = 'none',
    stopBits = 1,
    dataBits = 8,
    commandDelay = 50,
    timeout = 2000,
    writeTimeout = 2000,
    delimiter = '\n',
  } = config;

  let port: SerialPort | null = null;
  let parser: ReadlineParser | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: TransportError | null = null;

  // Lines nobody has read yet, and the reader blocked waiting for one
  const received: string[] = [];
  let waiter: ((result: LineResult) => void) | null = null;

  // Mutex to prevent concurrent command/response interleaving
  let commandLock: Promise<void> = Promise.resolve();

  const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

  // Acquire lock for exclusive command access
  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void;
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function deliver(result: LineResult): boolean {
    const pending = waiter;
    if (!pending) return false;
    waiter = null;
    pending(result);
    return true;
  }

  function onData(data: string): void {
    const line = data.replace(/\r$/, '');
    // Blank lines carry nothing; the meters emit them between pushes
    if (line.trim() === '') return;
    if (!deliver(Ok(line))) {
      received.push(line);
    }
  }

  function markDisconnected(error: TransportError): void {
    disconnected = true;
    disconnectError = error;
    deliver(Err(error));
  }

  function nextLine(ms: number, command?: string): Promise<LineResult> {
    const queued = received.shift();
    if (queued !== undefined) {
      return Promise.resolve(Ok(queued));
    }
    if (disconnected) {
      return Promise.resolve(Err(disconnectError ?? new TransportError('SERIAL_PORT_DISCONNECTED')));
    }

    return new Promise<LineResult>(resolve => {
      const timeoutId = setTimeout(() => {
        waiter = null;
        resolve(Err(new ReadTimeoutError(ms, command)));
      }, ms);

      waiter = (result) => {
        clearTimeout(timeoutId);
        resolve(result);
      };
    });
  }

  function writeLine(activePort: SerialPort, cmd: string): Promise<Result<void, LcrError>> {
    return new Promise(resolve => {
      const timeoutId = setTimeout(() => {
        resolve(Err(new TransportError(`Write timed out after ${writeTimeout}ms: ${cmd}`)));
      }, writeTimeout);

      activePort.write(cmd + '\n', (err) => {
        if (err) {
          clearTimeout(timeoutId);
          resolve(Err(toTransportError(err, `Write failed: ${cmd}`)));
          return;
        }
        activePort.drain((drainErr) => {
          clearTimeout(timeoutId);
          resolve(drainErr ? Err(toTransportError(drainErr, `Write failed: ${cmd}`)) : Ok());
        });
      });
    });
  }

  // Detach listeners and close the OS handle if it is still held
  async function releasePort(): Promise<void> {
    const activePort = port;
    parser?.removeAllListeners();
    activePort?.removeAllListeners();
    if (activePort?.isOpen) {
      await new Promise<void>((resolve) => {
        activePort.close(() => resolve());
      });
    }
    port = null;
    parser = null;
  }

  function activePortOrError(): Result<SerialPort, LcrError> {
    if (disconnected) {
      return Err(disconnectError ?? new TransportError('SERIAL_PORT_DISCONNECTED'));
    }
    if (!port) {
      return Err(new TransportError('Port not opened'));
    }
    return Ok(port);
  }

  return {
    async open(): Promise<Result<void, LcrError>> {
      if (opened && !disconnected) return Ok();

      // Reconnecting after a drop: let go of the dead port first
      if (port) await releasePort();

      const activePort = new SerialPort({
        path,
        baudRate,
        parity,
        stopBits,
        dataBits,
        autoOpen: false,
      });

      // Listen for port disconnection events
      activePort.on('close', () => {
        opened = false;
        markDisconnected(new TransportError('SERIAL_PORT_DISCONNECTED: Port closed'));
      });

      activePort.on('error', (err: Error) => {
        opened = false;
        markDisconnected(new TransportError(`SERIAL_PORT_ERROR: ${err.message}`, { cause: err }));
      });

      const lineParser = activePort.pipe(new ReadlineParser({ delimiter }));
      lineParser.on('data', onData);

      const result = await tryResultAsync(
        () => new Promise<void>((resolve, reject) => {
          activePort.open((err) => {
            if (err) reject(err);
            else resolve();
          });
        }),
        (e) => toTransportError(e, `Cannot open ${path}`)
      );

      if (!result.ok) {
        if (/busy|EBUSY/i.test(result.error.message)) {
          console.warn(`[Serial] Cannot open ${path} - device is busy.`);
        }
        lineParser.removeAllListeners();
        activePort.removeAllListeners();
        return result;
      }

      port = activePort;
      parser = lineParser;
      received.length = 0;
      opened = true;
      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async close(): Promise<Result<void, LcrError>> {
      if (!port) return Ok();

      // Acquire lock to wait for any in-flight operations
      await withLock(async () => {
        await releasePort();
        received.length = 0;
        opened = false;
        disconnected = false;
        disconnectError = null;
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, LcrError>> {
      return withLock(async () => {
        const ready = activePortOrError();
        if (!ready.ok) return ready;

        // Anything still queued is a stale reply or a push line
        received.length = 0;

        const written = await writeLine(ready.value, cmd);
        if (!written.ok) return written;

        const reply = await nextLine(timeout, cmd);
        if (!reply.ok) return reply;

        // Give the meter time to settle before the next command
        await delay(commandDelay);

        return reply;
      });
    },

    async write(cmd: string): Promise<Result<void, LcrError>> {
      return withLock(async () => {
        const ready = activePortOrError();
        if (!ready.ok) return ready;

        const written = await writeLine(ready.value, cmd);
        if (!written.ok) return written;

        // Add delay after write for device to process
        await delay(commandDelay);
        return Ok();
      });
    },

    async readLine(timeoutMs: number = timeout): Promise<Result<string, LcrError>> {
      return withLock(async () => {
        if (!port) {
          return Err(new TransportError('Port not opened'));
        }
        // Lines that arrived before a disconnect are still handed out
        return nextLine(timeoutMs);
      });
    },

    async discardInput(): Promise<Result<void, LcrError>> {
      return withLock(async () => {
        const ready = activePortOrError();
        if (!ready.ok) return ready;

        received.length = 0;
        const activePort = ready.value;
        return tryResultAsync(
          () => new Promise<void>((resolve, reject) => {
            activePort.flush((err) => {
              if (err) reject(err);
              else resolve();
            });
          }),
          (e) => toTransportError(e, 'Flush failed')
        );
      });
    },

    isOpen(): boolean {
      return opened && !disconnected;
    },
  };
}

// Helper to list available serial ports
export async function listSerialPorts(): Promise<Array<{ path: string; manufacturer?: string }>> {
  const ports = await SerialPort.list();
  return ports.map(p => ({
    path: p.path,
    manufacturer: p.manufacturer,
  }));
}

// Helper to find a serial port matching a pattern
export async function findSerialPort(pattern: RegExp): Promise<string | null> {
  const ports = await SerialPort.list();
  const match = ports.find(p => pattern.test(p.path));
  return match?.path ?? null;
}
