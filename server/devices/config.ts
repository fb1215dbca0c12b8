/**
 * Connection configuration from environment variables
 *
 *   LCR_PORT             - serial port path (default: auto-detect a USB-serial adapter)
 *   LCR_MODEL            - 878B | 879B | 891 (default: 879B)
 *   LCR_BAUD             - baud rate (default: model setting, 9600)
 *   LCR_TIMEOUT_MS       - read timeout in ms (default: model setting, 10000)
 *   LCR_COMMAND_DELAY_MS - pause after each command in ms (default: model setting, 150)
 *   LCR_SAMPLES          - auto-fetch readings to collect (default: 5, 0 = until stopped)
 */

import type { LcrModel } from './types.js';
import { isLcrModel } from './registry.js';

export interface LcrEnvConfig {
  path?: string;
  model: LcrModel;
  baudRate?: number;
  timeout?: number;
  commandDelay?: number;
  samples: number;
}

/** Port names the CP210x / CH340 / FTDI adapters show up under */
export const USB_SERIAL_PATTERN = /usbserial|SLAB_USBtoUART|ttyUSB|ttyACM|usbmodem/i;

function parseOptionalInt(envVar: string | undefined): number | undefined {
  if (!envVar) return undefined;
  const parsed = Number.parseInt(envVar, 10);
  return Number.isNaN(parsed) || parsed < 0 ? undefined : parsed;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LcrEnvConfig {
  const model = env.LCR_MODEL?.trim().toUpperCase() ?? '';
  if (model !== '' && !isLcrModel(model)) {
    console.warn(`[LCR] Ignoring unknown LCR_MODEL "${env.LCR_MODEL}", using 879B`);
  }

  return {
    path: env.LCR_PORT?.trim() || undefined,
    model: isLcrModel(model) ? model : '879B',
    baudRate: parseOptionalInt(env.LCR_BAUD),
    timeout: parseOptionalInt(env.LCR_TIMEOUT_MS),
    commandDelay: parseOptionalInt(env.LCR_COMMAND_DELAY_MS),
    samples: parseOptionalInt(env.LCR_SAMPLES) ?? 5,
  };
}
