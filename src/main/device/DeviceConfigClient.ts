import { DEVICE_CONFIG } from '@shared/constants';
import { ConfigurationFailedError, ValidationError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { FlashOrchestrator } from '../flash/FlashOrchestrator';
import { LineConnection } from './LineConnection';
import type { ConfigRequest, ConfigResult, ConfigureOptions } from './types';

export const RESET_FAILED_REASON = 'Failed to reset device after configuration.';

export function formatRequest(request: ConfigRequest): string {
  return `${request.field}${DEVICE_CONFIG.FIELD_SEPARATOR}${request.value}`;
}

/**
 * Throws ValidationError for values the line protocol cannot carry.
 * Runs before the port is touched.
 */
export function validateConfigValues(id: string, name: string): void {
  if (id.length === 0) {
    throw new ValidationError('Signal ID is required');
  }
  if (id.length > DEVICE_CONFIG.MAX_ID_LENGTH) {
    throw new ValidationError(`Signal ID must be at most ${DEVICE_CONFIG.MAX_ID_LENGTH} characters`);
  }
  if (name.length === 0) {
    throw new ValidationError('Signal name is required');
  }
  for (const [label, value] of [['Signal ID', id], ['Signal name', name]] as const) {
    if (/[\r\n]/.test(value) || value.includes(DEVICE_CONFIG.FIELD_SEPARATOR)) {
      throw new ValidationError(`${label} must not contain line breaks or "${DEVICE_CONFIG.FIELD_SEPARATOR}"`);
    }
  }
}

/**
 * Sets a device's signal ID and name over its serial console.
 *
 * Each request is one `field:value` line, answered by exactly two lines
 * that are passed through untouched. Afterwards esptool's chip-id query
 * hard-resets the board and confirms it came back.
 */
export class DeviceConfigClient {
  constructor(
    private orchestrator: FlashOrchestrator,
    private createConnection: () => LineConnection = () => new LineConnection()
  ) {}

  async configure(options: ConfigureOptions, onOutput: (line: string) => void = () => {}): Promise<ConfigResult> {
    const { port, id, name } = options;
    const baudRate = options.baudRate ?? DEVICE_CONFIG.DEFAULT_BAUD_RATE;
    const timeoutMs = options.timeoutMs ?? DEVICE_CONFIG.READ_TIMEOUT;

    validateConfigValues(id, name);

    const requests: ConfigRequest[] = [
      { field: 'signal_id', value: id },
      { field: 'signal_name', value: name },
    ];

    try {
      await this.sendRequests(port, baudRate, timeoutMs, requests, onOutput);
    } catch (error) {
      logger.error(`Configuration of ${port} failed:`, error);
      return { success: false, error: new ConfigurationFailedError('Failed to configure device', error) };
    }

    let exitCode: number;
    try {
      const job = this.orchestrator.queryChipId(port, onOutput);
      exitCode = await job.done;
    } catch (error) {
      return { success: false, error: new ConfigurationFailedError(RESET_FAILED_REASON, error) };
    }

    if (exitCode !== 0) {
      logger.warn(`Chip-id check on ${port} exited with status ${exitCode}`);
      return { success: false, error: new ConfigurationFailedError(RESET_FAILED_REASON, { exitCode }) };
    }

    logger.info(`Device on ${port} configured: id=${id}, name=${name}`);
    return { success: true };
  }

  private async sendRequests(
    port: string,
    baudRate: number,
    timeoutMs: number,
    requests: ConfigRequest[],
    onOutput: (line: string) => void
  ): Promise<void> {
    const connection = this.createConnection();
    await connection.open(port, baudRate);

    try {
      for (const request of requests) {
        const line = formatRequest(request);
        onOutput(`Sending: ${line}`);
        await connection.writeLine(line);

        for (let i = 0; i < DEVICE_CONFIG.RESPONSE_LINES; i++) {
          const response = await connection.readLine(timeoutMs);
          onOutput(`Response: ${response}`);
        }
      }
    } finally {
      // Released on every path; a close failure must not mask the original error
      try {
        await connection.close();
      } catch (error) {
        logger.warn(`Failed to close ${port}: ${getErrorMessage(error)}`);
      }
    }
  }
}
