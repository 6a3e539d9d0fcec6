import type { FirmwareRole } from './types/firmware.types';

export const APP_VERSION = '0.1.0';

export const DEVICE_CONFIG = {
  DEFAULT_BAUD_RATE: 115200,
  /** Per-line read timeout while talking to the device */
  READ_TIMEOUT: 2000,
  /** Response lines the firmware emits for every accepted command */
  RESPONSE_LINES: 2,
  MAX_ID_LENGTH: 3,
  FIELD_SEPARATOR: ':'
} as const;

export const PORT_MONITOR = {
  POLL_INTERVAL_MS: 1000,
  UNKNOWN_DESCRIPTION: 'n/a'
} as const;

export const FIRMWARE = {
  DEFAULT_DIR: 'bin',
  BINARY_EXTENSION: '.bin'
} as const;

export const ESPTOOL = {
  DEFAULT_COMMAND: 'esptool',
  DEFAULT_CHIP: 'esp32s3',
  BEFORE_RESET: 'default-reset',
  AFTER_RESET: 'hard-reset',
  KEEP: 'keep'
} as const;

/**
 * Flash offsets, in write order. Must match the partition table baked into
 * the application image; never reorder.
 */
export const FLASH_LAYOUT: ReadonlyArray<{ role: FirmwareRole; address: string }> = [
  { role: 'bootloader', address: '0x0' },
  { role: 'partition_table', address: '0x8000' },
  { role: 'ota_selector', address: '0xe000' },
  { role: 'application', address: '0x10000' }
];

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug'
} as const;
