export type FirmwareRole = 'bootloader' | 'partition_table' | 'ota_selector' | 'application';

/** All roles, in flash order */
export const FIRMWARE_ROLES: readonly FirmwareRole[] = [
  'bootloader',
  'partition_table',
  'ota_selector',
  'application',
];

export interface FirmwareVersion {
  name: string;
  directoryPath: string;
}

/** Role → absolute file path. Only complete sets can be flashed. */
export type FirmwareFileSet = Partial<Record<FirmwareRole, string>>;
