import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import type { FlashJobState, FlashMode } from '@shared/types/flash.types';
import { ExternalToolError, FlasherError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { TOOL_FAILURE_EXIT_CODE } from './EsptoolRunner';
import type { ToolRunner, ToolResult } from './types';

export function toToolResult(exitCode: number): ToolResult {
  if (exitCode === 0) {
    return { success: true, exitCode: 0 };
  }
  return {
    success: false,
    exitCode,
    error: new ExternalToolError(`esptool exited with status ${exitCode}`, exitCode),
  };
}

/**
 * One run of the flashing tool: idle → running → succeeded | failed.
 *
 * Events: `output` (line), `finished` (exit status).
 * Terminal states are final; a retry is a new job.
 *
 * There is no way to abort a running job. Killing esptool mid-write can
 * leave the device with a half-written flash, so `requestStop()` only notes
 * the request and the job runs to its natural end.
 */
export class FlashJob extends EventEmitter {
  readonly id: string = uuidv4();
  private state: FlashJobState = 'idle';
  private exitCode: number | null = null;
  private stopRequested = false;
  private settle: (exitCode: number) => void = () => {};

  /** Resolves with the exit status once the tool has terminated. Never rejects. */
  readonly done: Promise<number> = new Promise((resolve) => {
    this.settle = resolve;
  });

  constructor(
    readonly mode: FlashMode,
    readonly port: string,
    readonly args: readonly string[]
  ) {
    super();
  }

  getState(): FlashJobState {
    return this.state;
  }

  getExitCode(): number | null {
    return this.exitCode;
  }

  isStopRequested(): boolean {
    return this.stopRequested;
  }

  start(runner: ToolRunner): void {
    if (this.state !== 'idle') {
      throw new FlasherError(`Flash job ${this.id} already ${this.state}`, 'JOB_ALREADY_STARTED');
    }

    this.state = 'running';
    logger.info(`Flash job ${this.id} started (${this.mode}) on ${this.port}`);

    runner
      .run([...this.args], (line) => this.forwardOutput(line))
      .catch((error: unknown) => {
        this.forwardOutput(`An error occurred while running esptool: ${getErrorMessage(error)}`);
        return TOOL_FAILURE_EXIT_CODE;
      })
      .then((exitCode) => this.finish(exitCode))
      .catch((error: unknown) => logger.error(`Flash job ${this.id} listener failed:`, error));
  }

  /**
   * Record a stop request. Has no effect on a write already in progress;
   * the job still ends on its own.
   */
  requestStop(): void {
    if (this.state !== 'running') return;
    this.stopRequested = true;
    logger.warn(`Stop requested for flash job ${this.id}; waiting for esptool to finish`);
  }

  private finish(exitCode: number): void {
    this.exitCode = exitCode;
    this.state = exitCode === 0 ? 'succeeded' : 'failed';
    logger.info(`Flash job ${this.id} finished with exit status ${exitCode}`);
    try {
      this.emit('finished', exitCode);
    } finally {
      this.settle(exitCode);
    }
  }

  // Runs inside the child process stream handlers; a listener error must not escape there
  private forwardOutput(line: string): void {
    try {
      this.emit('output', line);
    } catch (error) {
      logger.error(`Flash job ${this.id} output listener failed:`, error);
    }
  }
}
