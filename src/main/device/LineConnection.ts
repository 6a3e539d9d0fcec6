import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import { DEVICE_CONFIG } from '@shared/constants';
import { DeviceProtocolError, TimeoutError, TransportError } from '../utils/errors';
import { logger } from '../utils/logger';

interface PendingRead {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

/**
 * Newline-delimited text link to the device firmware.
 *
 * Incoming bytes are framed on `\n` by a ReadlineParser, which decodes each
 * whole line so multi-byte characters survive chunk boundaries. Each
 * `readLine()` takes the next complete line or waits for one up to its
 * timeout. Only one read may be outstanding at a time.
 */
export class LineConnection {
  private port: SerialPort | null = null;
  private parser: ReadlineParser | null = null;
  private lines: string[] = [];
  private pending: PendingRead | null = null;

  async open(portPath: string, baudRate: number = DEVICE_CONFIG.DEFAULT_BAUD_RATE): Promise<void> {
    if (this.port?.isOpen) {
      throw new TransportError('Port already open');
    }

    return new Promise((resolve, reject) => {
      this.port = new SerialPort({
        path: portPath,
        baudRate,
        dataBits: 8,
        stopBits: 1,
        parity: 'none'
      }, (error) => {
        if (error) {
          this.port = null;
          reject(new TransportError(`Failed to open port ${portPath}: ${error.message}`, error));
          return;
        }

        this.setupListeners();
        logger.info(`Opened ${portPath} at ${baudRate} baud`);
        resolve();
      });
    });
  }

  isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  async writeLine(text: string): Promise<void> {
    const port = this.port;
    if (!port?.isOpen) {
      throw new TransportError('Port not open');
    }

    return new Promise((resolve, reject) => {
      port.write(`${text}\n`, (error) => {
        if (error) {
          reject(new TransportError(`Failed to write: ${error.message}`, error));
          return;
        }
        port.drain(() => resolve());
      });
    });
  }

  /** Next complete line with surrounding whitespace trimmed. */
  async readLine(timeout: number = DEVICE_CONFIG.READ_TIMEOUT): Promise<string> {
    if (!this.port?.isOpen) {
      throw new TransportError('Port not open');
    }
    if (this.pending) {
      throw new DeviceProtocolError('A read is already in progress');
    }

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return queued;
    }

    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this.pending = null;
        reject(new TimeoutError(`No response from device within ${timeout}ms`));
      }, timeout);

      this.pending = { resolve, reject, timeout: timeoutId };
    });
  }

  async close(): Promise<void> {
    this.failPending(new TransportError('Port closed'));

    const port = this.port;
    if (!port?.isOpen) {
      this.reset();
      return;
    }

    return new Promise((resolve, reject) => {
      port.close((error) => {
        this.reset();
        if (error) {
          reject(new TransportError(`Failed to close port: ${error.message}`, error));
          return;
        }
        logger.info(`Closed ${port.path}`);
        resolve();
      });
    });
  }

  private setupListeners(): void {
    if (!this.port) return;

    this.parser = this.port.pipe(new ReadlineParser({ delimiter: '\n', encoding: 'utf8' }));
    this.parser.on('data', (line: string) => {
      this.deliver(line.trim());
    });

    this.port.on('error', (error: Error) => {
      logger.error('Serial port error:', error);
      this.failPending(new TransportError(`Serial port error: ${error.message}`, error));
    });

    this.port.on('close', () => {
      this.failPending(new TransportError('Port closed by device'));
    });
  }

  private deliver(line: string): void {
    const pending = this.pending;
    if (pending) {
      clearTimeout(pending.timeout);
      this.pending = null;
      pending.resolve(line);
    } else {
      this.lines.push(line);
    }
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    if (!pending) return;
    clearTimeout(pending.timeout);
    this.pending = null;
    pending.reject(error);
  }

  private reset(): void {
    if (this.port && this.parser) {
      this.port.unpipe(this.parser);
    }
    this.parser?.removeAllListeners();
    this.port?.removeAllListeners();
    this.port = null;
    this.parser = null;
    this.lines = [];
  }
}
