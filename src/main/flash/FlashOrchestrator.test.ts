import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { FlashOrchestrator } from './FlashOrchestrator';
import { FlashJob } from './FlashJob';
import { BusyError, ValidationError } from '../utils/errors';
import { ManualRunner, ScriptedRunner } from './test/fakeRunners';
import { logger } from '../utils/logger';
import type { FirmwareFileSet } from '@shared/types/firmware.types';

const FILES: FirmwareFileSet = {
  application: '/fw/v1/firmware.bin',
  bootloader: '/fw/v1/bootloader.bin',
  ota_selector: '/fw/v1/boot_app0.bin',
  partition_table: '/fw/v1/partition-table.bin',
};

describe('FlashOrchestrator', () => {
  let runner: ManualRunner;
  let orchestrator: FlashOrchestrator;

  beforeEach(() => {
    runner = new ManualRunner();
    orchestrator = new FlashOrchestrator(runner);
  });

  describe('writeFlash', () => {
    it('starts a write job with the fixed address order', () => {
      const job = orchestrator.writeFlash('/dev/ttyUSB0', FILES);

      expect(job.mode).toBe('write');
      expect(job.getState()).toBe('running');
      expect(runner.calls[0].slice(-8)).toEqual([
        '0x0', '/fw/v1/bootloader.bin',
        '0x8000', '/fw/v1/partition-table.bin',
        '0xe000', '/fw/v1/boot_app0.bin',
        '0x10000', '/fw/v1/firmware.bin',
      ]);
    });

    it('defaults to esp32s3 at 115200 baud', () => {
      orchestrator.writeFlash('/dev/ttyUSB0', FILES);
      expect(runner.calls[0].slice(0, 6)).toEqual([
        '--chip', 'esp32s3', '--port', '/dev/ttyUSB0', '--baud', '115200',
      ]);
    });

    it('applies chip and baud options', () => {
      const custom = new FlashOrchestrator(runner, { chip: 'esp32', baudRate: 460800 });
      custom.writeFlash('COM5', FILES);
      expect(runner.calls[0].slice(0, 6)).toEqual(['--chip', 'esp32', '--port', 'COM5', '--baud', '460800']);
    });

    it('rejects an incomplete file set without starting anything', () => {
      expect(() => orchestrator.writeFlash('/dev/ttyUSB0', { application: '/fw/v2/firmware.bin' })).toThrow(
        new ValidationError('Missing firmware images: bootloader, partition_table, ota_selector')
      );
      expect(runner.calls).toHaveLength(0);
      expect(orchestrator.isBusy()).toBe(false);
    });

    it('forwards output to the listener given at start', () => {
      const lines: string[] = [];
      orchestrator.writeFlash('/dev/ttyUSB0', FILES, (line) => lines.push(line));

      runner.emitLine('Compressed 4096 bytes to 2048...');

      expect(lines).toEqual(['Compressed 4096 bytes to 2048...']);
    });
  });

  describe('queryChipId', () => {
    it('starts a configure_check job', () => {
      const job = orchestrator.queryChipId('/dev/ttyUSB0');

      expect(job.mode).toBe('configure_check');
      expect(runner.calls[0]).toEqual([
        '--chip', 'esp32s3', '--port', '/dev/ttyUSB0', '--baud', '115200', '--after', 'hard-reset', 'chip-id',
      ]);
    });
  });

  describe('single active job', () => {
    it('rejects a second start while running and leaves the first job untouched', () => {
      const first = orchestrator.writeFlash('/dev/ttyUSB0', FILES);

      expect(() => orchestrator.writeFlash('/dev/ttyUSB0', FILES)).toThrow(BusyError);
      expect(() => orchestrator.queryChipId('/dev/ttyUSB0')).toThrow(BusyError);

      expect(first.getState()).toBe('running');
      expect(orchestrator.getActiveJob()).toBe(first);
      expect(runner.calls).toHaveLength(1);
    });

    it('frees the slot once the job finishes', async () => {
      const first = orchestrator.writeFlash('/dev/ttyUSB0', FILES);
      runner.finish(0);
      await first.done;

      expect(orchestrator.isBusy()).toBe(false);
      expect(orchestrator.getActiveJob()).toBeNull();

      const second = orchestrator.queryChipId('/dev/ttyUSB0');
      expect(second).not.toBe(first);
      expect(second.getState()).toBe('running');
    });

    it('frees the slot after a failed job', async () => {
      const failing = new FlashOrchestrator(new ScriptedRunner(2));
      const job = failing.writeFlash('/dev/ttyUSB0', FILES);

      await expect(job.done).resolves.toBe(2);
      expect(failing.isBusy()).toBe(false);
    });

    it('returns a job that is already running', () => {
      const job = orchestrator.queryChipId('/dev/ttyUSB0');

      expect(job).toBeInstanceOf(FlashJob);
      expect(job.getState()).toBe('running');
      expect(orchestrator.getActiveJob()).toBe(job);
    });
  });

  describe('requestStop', () => {
    it('marks the active job but lets it finish', async () => {
      const job = orchestrator.writeFlash('/dev/ttyUSB0', FILES);

      orchestrator.requestStop();

      expect(job.isStopRequested()).toBe(true);
      expect(job.getState()).toBe('running');
      expect(orchestrator.isBusy()).toBe(true);

      runner.finish(0);
      await expect(job.done).resolves.toBe(0);
      expect(logger.info).toHaveBeenCalledWith(`Flash job ${job.id} ran to completion after a stop request`);
    });

    it('is a no-op when idle', () => {
      expect(() => orchestrator.requestStop()).not.toThrow();
    });
  });
});
