import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import type { FirmwareFileSet } from '@shared/types/firmware.types';
import { FirmwareCatalog } from './FirmwareCatalog';
import { logger } from '../utils/logger';

async function writeImages(dir: string, names: string[]): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  for (const name of names) {
    await fs.writeFile(join(dir, name), Buffer.from([0xe9, 0x00]));
  }
}

const FULL_SET = ['bootloader.bin', 'partition-table.bin', 'boot_app0.bin', 'firmware.bin'];

describe('FirmwareCatalog.classify', () => {
  it.each([
    ['bootloader.bin', 'bootloader'],
    ['partition-table.bin', 'partition_table'],
    ['partitions.bin', 'partition_table'],
    ['boot_app0.bin', 'ota_selector'],
    ['firmware.bin', 'application'],
    ['SignalProcessor_v2.BIN', 'application'],
    ['BOOTLOADER_QIO.bin', 'bootloader'],
  ])('%s → %s', (filename, role) => {
    expect(FirmwareCatalog.classify(filename)).toBe(role);
  });

  it('prefers bootloader over partition when both appear', () => {
    expect(FirmwareCatalog.classify('bootloader_partition.bin')).toBe('bootloader');
  });

  it('prefers partition over boot_app0 when both appear', () => {
    expect(FirmwareCatalog.classify('partition_boot_app0.bin')).toBe('partition_table');
  });

  it('ignores files without the binary extension', () => {
    expect(FirmwareCatalog.classify('bootloader.elf')).toBeNull();
    expect(FirmwareCatalog.classify('README.md')).toBeNull();
  });
});

describe('FirmwareCatalog.missingRoles / isFlashable', () => {
  const complete: FirmwareFileSet = {
    bootloader: '/fw/bootloader.bin',
    partition_table: '/fw/partition-table.bin',
    ota_selector: '/fw/boot_app0.bin',
    application: '/fw/firmware.bin',
  };

  it('a complete set is flashable', () => {
    expect(FirmwareCatalog.missingRoles(complete)).toEqual([]);
    expect(FirmwareCatalog.isFlashable(complete)).toBe(true);
  });

  it('removing any one role flips it to not flashable', () => {
    for (const role of ['bootloader', 'partition_table', 'ota_selector', 'application'] as const) {
      const files = { ...complete };
      delete files[role];
      expect(FirmwareCatalog.isFlashable(files)).toBe(false);
      expect(FirmwareCatalog.missingRoles(files)).toEqual([role]);
    }
  });

  it('lists missing roles in flash order', () => {
    expect(FirmwareCatalog.missingRoles({ application: '/fw/firmware.bin' })).toEqual([
      'bootloader',
      'partition_table',
      'ota_selector',
    ]);
  });
});

describe('FirmwareCatalog', () => {
  let rootDir: string;
  let catalog: FirmwareCatalog;

  beforeEach(() => {
    vi.clearAllMocks();
    rootDir = join(tmpdir(), `flasher-test-catalog-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    catalog = new FirmwareCatalog(rootDir);
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  describe('listVersions', () => {
    it('creates the root directory when missing and returns no versions', async () => {
      expect(await catalog.listVersions()).toEqual([]);
      const stat = await fs.stat(rootDir);
      expect(stat.isDirectory()).toBe(true);
    });

    it('returns subdirectories sorted by name, skipping files', async () => {
      await fs.mkdir(join(rootDir, 'v2'), { recursive: true });
      await fs.mkdir(join(rootDir, 'v1'), { recursive: true });
      await fs.writeFile(join(rootDir, 'notes.txt'), 'not a version');

      expect(await catalog.listVersions()).toEqual([
        { name: 'v1', directoryPath: join(rootDir, 'v1') },
        { name: 'v2', directoryPath: join(rootDir, 'v2') },
      ]);
    });

    it('returns an empty list when the root is not a directory', async () => {
      await fs.mkdir(join(rootDir, '..'), { recursive: true });
      await fs.writeFile(rootDir, 'file in the way');

      expect(await catalog.listVersions()).toEqual([]);
      await fs.rm(rootDir, { force: true });
    });
  });

  describe('resolveFiles', () => {
    it('resolves all four roles for a complete version', async () => {
      await writeImages(join(rootDir, 'v1'), FULL_SET);
      const versions = await catalog.listVersions();

      expect(versions.map(v => v.name)).toEqual(['v1']);

      const files = await catalog.resolveFiles(versions[0]);
      expect(files).toEqual({
        bootloader: join(rootDir, 'v1', 'bootloader.bin'),
        partition_table: join(rootDir, 'v1', 'partition-table.bin'),
        ota_selector: join(rootDir, 'v1', 'boot_app0.bin'),
        application: join(rootDir, 'v1', 'firmware.bin'),
      });
      expect(FirmwareCatalog.isFlashable(files)).toBe(true);
    });

    it('accepts a version name', async () => {
      await writeImages(join(rootDir, 'v2'), ['firmware.bin']);

      const files = await catalog.resolveFiles('v2');

      expect(files).toEqual({ application: join(rootDir, 'v2', 'firmware.bin') });
      expect(FirmwareCatalog.missingRoles(files)).toEqual(['bootloader', 'partition_table', 'ota_selector']);
    });

    it('returns an empty mapping for a missing directory', async () => {
      await expect(catalog.resolveFiles('does-not-exist')).resolves.toEqual({});
    });

    it('does not recurse and skips directories named like images', async () => {
      await writeImages(join(rootDir, 'v1'), ['firmware.bin']);
      await writeImages(join(rootDir, 'v1', 'old'), ['bootloader.bin']);
      await fs.mkdir(join(rootDir, 'v1', 'extra.bin'));

      expect(await catalog.resolveFiles('v1')).toEqual({ application: join(rootDir, 'v1', 'firmware.bin') });
    });

    it('ignores non-binary files', async () => {
      await writeImages(join(rootDir, 'v1'), ['firmware.bin', 'firmware.elf', 'checksums.txt']);

      expect(await catalog.resolveFiles('v1')).toEqual({ application: join(rootDir, 'v1', 'firmware.bin') });
    });

    it('keeps one of several application candidates and warns about the overwrite', async () => {
      await writeImages(join(rootDir, 'v1'), ['app_v1.bin', 'app_v2.bin']);
      const listing = await fs.readdir(join(rootDir, 'v1'));

      const files = await catalog.resolveFiles('v1');

      // Last one in directory-listing order wins
      expect(files.application).toBe(join(rootDir, 'v1', listing[listing.length - 1]));
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('re-resolving replaces the previous result', async () => {
      await writeImages(join(rootDir, 'v1'), FULL_SET);
      const before = await catalog.resolveFiles('v1');
      await fs.rm(join(rootDir, 'v1', 'boot_app0.bin'));

      const after = await catalog.resolveFiles('v1');

      expect(before.ota_selector).toBeDefined();
      expect(after.ota_selector).toBeUndefined();
      expect(FirmwareCatalog.isFlashable(after)).toBe(false);
    });
  });
});
