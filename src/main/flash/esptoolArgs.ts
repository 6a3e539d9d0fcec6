import type { FirmwareFileSet } from '@shared/types/firmware.types';
import { ESPTOOL, FLASH_LAYOUT } from '@shared/constants';
import type { CompleteFirmwareFileSet, EsptoolTarget, FlashRegion } from './types';

function connectionArgs(target: EsptoolTarget): string[] {
  return ['--chip', target.chip, '--port', target.port, '--baud', String(target.baudRate)];
}

/** Narrow a scanned file set to one that has every role, or null. */
export function toCompleteFileSet(files: FirmwareFileSet): CompleteFirmwareFileSet | null {
  const { bootloader, partition_table, ota_selector, application } = files;
  if (!bootloader || !partition_table || !ota_selector || !application) {
    return null;
  }
  return { bootloader, partition_table, ota_selector, application };
}

/** Address/file pairs in ascending address order, independent of the input's key order. */
export function flashRegions(files: CompleteFirmwareFileSet): FlashRegion[] {
  return FLASH_LAYOUT.map(({ role, address }) => ({ role, address, path: files[role] }));
}

export function buildWriteFlashArgs(target: EsptoolTarget, files: CompleteFirmwareFileSet): string[] {
  return [
    ...connectionArgs(target),
    '--before', ESPTOOL.BEFORE_RESET,
    '--after', ESPTOOL.AFTER_RESET,
    'write_flash',
    '--flash-mode', ESPTOOL.KEEP,
    '--flash-freq', ESPTOOL.KEEP,
    '--flash-size', ESPTOOL.KEEP,
    '-z',
    ...flashRegions(files).flatMap(region => [region.address, region.path]),
  ];
}

/** Read-only query; the hard reset afterwards restarts the freshly configured firmware. */
export function buildChipIdArgs(target: EsptoolTarget): string[] {
  return [...connectionArgs(target), '--after', ESPTOOL.AFTER_RESET, 'chip-id'];
}
