import type { FirmwareFileSet } from '@shared/types/firmware.types';
import { DEVICE_CONFIG, ESPTOOL } from '@shared/constants';
import { BusyError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { FirmwareCatalog } from '../firmware/FirmwareCatalog';
import { buildChipIdArgs, buildWriteFlashArgs, toCompleteFileSet } from './esptoolArgs';
import { FlashJob } from './FlashJob';
import type { ToolRunner } from './types';

export type OutputListener = (line: string) => void;

export interface FlashOrchestratorOptions {
  chip: string;
  baudRate: number;
}

const DEFAULT_OPTIONS: FlashOrchestratorOptions = {
  chip: ESPTOOL.DEFAULT_CHIP,
  baudRate: DEVICE_CONFIG.DEFAULT_BAUD_RATE,
};

/**
 * Starts flashing-tool jobs, one at a time.
 *
 * A start request while a job is running throws BusyError and leaves the
 * running job untouched.
 */
export class FlashOrchestrator {
  private activeJob: FlashJob | null = null;
  private options: FlashOrchestratorOptions;

  constructor(
    private runner: ToolRunner,
    options: Partial<FlashOrchestratorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  isBusy(): boolean {
    return this.activeJob !== null;
  }

  getActiveJob(): FlashJob | null {
    return this.activeJob;
  }

  /** Write all four images. Requires a complete file set. */
  writeFlash(port: string, files: FirmwareFileSet, onOutput?: OutputListener): FlashJob {
    this.assertIdle();

    const complete = toCompleteFileSet(files);
    if (!complete) {
      const missing = FirmwareCatalog.missingRoles(files);
      throw new ValidationError(`Missing firmware images: ${missing.join(', ')}`, { missing });
    }

    const args = buildWriteFlashArgs({ ...this.options, port }, complete);
    return this.launch(new FlashJob('write', port, args), onOutput);
  }

  /** Non-destructive chip-id query, followed by a hard reset. */
  queryChipId(port: string, onOutput?: OutputListener): FlashJob {
    this.assertIdle();
    const args = buildChipIdArgs({ ...this.options, port });
    return this.launch(new FlashJob('configure_check', port, args), onOutput);
  }

  /** Forwarded to the active job; an in-flight write is never interrupted. */
  requestStop(): void {
    this.activeJob?.requestStop();
  }

  private assertIdle(): void {
    if (this.activeJob) {
      logger.warn(`Rejected new flash job: job ${this.activeJob.id} is still running`);
      throw new BusyError(`A ${this.activeJob.mode} job is already running on ${this.activeJob.port}`);
    }
  }

  private launch(job: FlashJob, onOutput?: OutputListener): FlashJob {
    this.activeJob = job;
    // Registered before anyone else can subscribe, so the slot is free by the time `done` resolves
    job.once('finished', () => {
      if (this.activeJob === job) {
        this.activeJob = null;
      }
      if (job.isStopRequested()) {
        logger.info(`Flash job ${job.id} ran to completion after a stop request`);
      }
    });
    if (onOutput) {
      job.on('output', onOutput);
    }
    job.start(this.runner);
    return job;
  }
}
