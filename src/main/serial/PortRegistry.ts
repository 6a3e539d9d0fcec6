import { EventEmitter } from 'events';
import { SerialPort } from 'serialport';
import type { SerialPortInfo } from '@shared/types/port.types';
import { PORT_MONITOR } from '@shared/constants';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';

/** Source of the current OS serial devices. Throws on enumeration failure. */
export type PortLister = () => Promise<SerialPortInfo[]>;

export async function listSerialPorts(): Promise<SerialPortInfo[]> {
  const ports = await SerialPort.list();
  return ports.map(port => ({
    path: port.path,
    description: port.manufacturer || PORT_MONITOR.UNKNOWN_DESCRIPTION,
  }));
}

export function formatPortLabel(port: SerialPortInfo): string {
  return `${port.path} - ${port.description}`;
}

function portKey(port: SerialPortInfo): string {
  return `${port.path}\u0000${port.description}`;
}

/**
 * Tracks which serial devices are plugged in.
 *
 * Polls on a fixed interval and emits `ports-changed` with the full list
 * whenever the set differs from the previous snapshot. The baseline is
 * private to the registry; consumers only ever see emitted copies.
 */
export class PortRegistry extends EventEmitter {
  private ports: SerialPortInfo[] = [];
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private lister: PortLister = listSerialPorts,
    private intervalMs: number = PORT_MONITOR.POLL_INTERVAL_MS
  ) {
    super();
  }

  static changedSince(previous: SerialPortInfo[], next: SerialPortInfo[]): boolean {
    const before = new Set(previous.map(portKey));
    const after = new Set(next.map(portKey));
    if (before.size !== after.size) return true;
    for (const key of after) {
      if (!before.has(key)) return true;
    }
    return false;
  }

  /** Query the OS once. A failed enumeration reads as "no ports". */
  async poll(): Promise<SerialPortInfo[]> {
    return (await this.enumerate()) ?? [];
  }

  /**
   * Run one poll cycle. Returns true (and emits) when the port set changed.
   * A failed enumeration keeps the previous baseline; the next cycle retries.
   */
  async checkForChanges(): Promise<boolean> {
    const next = await this.enumerate();
    if (next === null) {
      return false;
    }
    if (!PortRegistry.changedSince(this.ports, next)) {
      return false;
    }

    this.ports = next;
    logger.info(`Serial ports changed: ${next.map(p => p.path).join(', ') || '(none)'}`);
    this.emit('ports-changed', this.getPorts());
    return true;
  }

  getPorts(): SerialPortInfo[] {
    return this.ports.map(port => ({ ...port }));
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    logger.debug(`Port monitor started (${this.intervalMs}ms interval)`);
    this.schedule();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    logger.debug('Port monitor stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  private schedule(): void {
    // Next tick is armed only once the current cycle settles, so polls never overlap
    this.timer = setTimeout(() => {
      this.timer = null;
      this.checkForChanges()
        .catch(error => logger.error('Port monitor cycle failed:', error))
        .finally(() => {
          if (this.running) this.schedule();
        });
    }, this.intervalMs);
  }

  private async enumerate(): Promise<SerialPortInfo[] | null> {
    try {
      return await this.lister();
    } catch (error) {
      logger.debug(`Serial port enumeration failed: ${getErrorMessage(error)}`);
      return null;
    }
  }
}
