import { resolve } from 'path';
import { DEVICE_CONFIG, ESPTOOL, FIRMWARE, LOG_LEVELS } from '@shared/constants';
import { ValidationError } from './utils/errors';
import type { LogLevel } from './utils/logger';

export interface FlasherConfig {
  /** Root directory holding one subdirectory per firmware version */
  firmwareDir: string;
  /** Executable for the flashing tool */
  esptoolCommand: string;
  /** Leading arguments for the executable (e.g. `-m esptool` when it is python) */
  esptoolArgs: string[];
  chip: string;
  baudRate: number;
  logLevel: LogLevel;
}

const VALID_LOG_LEVELS: readonly string[] = Object.values(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.includes(value);
}

/**
 * Build the runtime configuration from environment variables.
 *
 * FLASHER_FIRMWARE_DIR, FLASHER_ESPTOOL, FLASHER_CHIP, FLASHER_BAUD and
 * FLASHER_LOG_LEVEL override the defaults. Relative paths resolve against `cwd`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): FlasherConfig {
  const firmwareDir = resolve(cwd, env.FLASHER_FIRMWARE_DIR?.trim() || FIRMWARE.DEFAULT_DIR);

  const [esptoolCommand, ...esptoolArgs] = (env.FLASHER_ESPTOOL?.trim() || ESPTOOL.DEFAULT_COMMAND).split(/\s+/);

  const chip = env.FLASHER_CHIP?.trim() || ESPTOOL.DEFAULT_CHIP;

  let baudRate: number = DEVICE_CONFIG.DEFAULT_BAUD_RATE;
  const rawBaud = env.FLASHER_BAUD?.trim();
  if (rawBaud) {
    baudRate = Number(rawBaud);
    if (!Number.isInteger(baudRate) || baudRate <= 0) {
      throw new ValidationError(`FLASHER_BAUD must be a positive integer, got "${rawBaud}"`);
    }
  }

  const rawLevel = env.FLASHER_LOG_LEVEL?.trim().toLowerCase() || LOG_LEVELS.INFO;
  if (!isLogLevel(rawLevel)) {
    throw new ValidationError(
      `FLASHER_LOG_LEVEL must be one of ${VALID_LOG_LEVELS.join(', ')}, got "${rawLevel}"`
    );
  }

  return {
    firmwareDir,
    esptoolCommand,
    esptoolArgs,
    chip,
    baudRate,
    logLevel: rawLevel,
  };
}
