import { promises as fs } from 'fs';
import { join } from 'path';
import type { FirmwareFileSet, FirmwareRole, FirmwareVersion } from '@shared/types/firmware.types';
import { FIRMWARE_ROLES } from '@shared/types/firmware.types';
import { FIRMWARE } from '@shared/constants';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';

/**
 * Discovers firmware versions on disk.
 *
 * Layout: `<root>/<version>/*.bin`. There is no manifest; each image's role
 * comes from its filename.
 */
export class FirmwareCatalog {
  constructor(private rootDir: string) {}

  /**
   * Map a filename to its flash role, or null for non-binaries.
   * Precedence: bootloader, partition, boot_app0, then anything else.
   */
  static classify(filename: string): FirmwareRole | null {
    const name = filename.toLowerCase();
    if (!name.endsWith(FIRMWARE.BINARY_EXTENSION)) return null;
    if (name.includes('bootloader')) return 'bootloader';
    if (name.includes('partition')) return 'partition_table';
    if (name.includes('boot_app0')) return 'ota_selector';
    return 'application';
  }

  static missingRoles(files: FirmwareFileSet): FirmwareRole[] {
    return FIRMWARE_ROLES.filter(role => !files[role]);
  }

  static isFlashable(files: FirmwareFileSet): boolean {
    return FirmwareCatalog.missingRoles(files).length === 0;
  }

  /** List version directories sorted by name. Creates the root if needed. */
  async listVersions(): Promise<FirmwareVersion[]> {
    try {
      await fs.mkdir(this.rootDir, { recursive: true });
    } catch (error) {
      logger.warn(`Failed to create firmware directory ${this.rootDir}: ${getErrorMessage(error)}`);
    }

    try {
      const entries = await fs.readdir(this.rootDir, { withFileTypes: true });
      return entries
        .filter(entry => entry.isDirectory())
        .map(entry => entry.name)
        .sort()
        .map(name => ({ name, directoryPath: join(this.rootDir, name) }));
    } catch (error) {
      logger.warn(`Failed to list firmware versions in ${this.rootDir}: ${getErrorMessage(error)}`);
      return [];
    }
  }

  /**
   * Classify the images in one version directory (non-recursive).
   * Returns whatever roles were found; `{}` when the directory is unreadable.
   */
  async resolveFiles(version: FirmwareVersion | string): Promise<FirmwareFileSet> {
    const directoryPath = typeof version === 'string' ? join(this.rootDir, version) : version.directoryPath;
    const files: FirmwareFileSet = {};

    let entries: string[];
    try {
      entries = await fs.readdir(directoryPath);
    } catch (error) {
      logger.debug(`Firmware directory not readable: ${directoryPath} (${getErrorMessage(error)})`);
      return files;
    }

    for (const entry of entries) {
      const role = FirmwareCatalog.classify(entry);
      if (!role) continue;

      const filePath = join(directoryPath, entry);
      if (!(await isRegularFile(filePath))) continue;

      const previous = files[role];
      if (previous) {
        // Known ambiguity: no disambiguation, the last file listed wins
        logger.warn(`Multiple ${role} images in ${directoryPath}: ${previous} replaced by ${filePath}`);
      }
      files[role] = filePath;
    }

    return files;
  }
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}
