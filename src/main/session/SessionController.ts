import { EventEmitter } from 'events';
import type { SerialPortInfo } from '@shared/types/port.types';
import type { FirmwareVersion } from '@shared/types/firmware.types';
import { SessionEvent } from '@shared/types/session.types';
import type { OperationFinished, SessionOperation, SessionState } from '@shared/types/session.types';
import { ValidationError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { PortRegistry } from '../serial/PortRegistry';
import { FirmwareCatalog } from '../firmware/FirmwareCatalog';
import type { FlashOrchestrator } from '../flash/FlashOrchestrator';
import { toToolResult } from '../flash/FlashJob';
import { validateConfigValues } from '../device/DeviceConfigClient';
import type { DeviceConfigClient } from '../device/DeviceConfigClient';

export interface SessionDependencies {
  portRegistry: PortRegistry;
  catalog: FirmwareCatalog;
  orchestrator: FlashOrchestrator;
  configClient: DeviceConfigClient;
}

export const STATUS = {
  READY: 'Ready',
  FLASHING: 'Flashing in progress...',
  FLASH_SUCCEEDED: 'Flashing completed successfully!',
  FLASH_FAILED: 'Flashing failed!',
  CONFIGURING: 'Configuring device...',
  CONFIGURE_SUCCEEDED: 'Name and ID set successfully!',
  CONFIGURE_FAILED: 'Configuration failed!',
  STOP_PENDING: 'Stop requested: the running operation cannot be interrupted and will finish on its own.',
} as const;

/**
 * Owns the user's port/version selection and runs the configure and flash
 * actions against it.
 *
 * Everything the presentation layer needs arrives as SessionEvent emissions;
 * commands come in through the public methods. Only one action runs at a
 * time, and a rejected command leaves the selection untouched.
 */
export class SessionController extends EventEmitter {
  private state: SessionState = {
    ports: [],
    versions: [],
    selectedPort: null,
    selectedVersion: null,
    files: {},
    busy: false,
  };
  private stopRequested = false;
  private current: Promise<boolean> | null = null;
  private readonly onPortsChanged = (ports: SerialPortInfo[]) => this.applyPorts(ports);

  constructor(private deps: SessionDependencies) {
    super();
    this.deps.portRegistry.on('ports-changed', this.onPortsChanged);
  }

  getState(): SessionState {
    return {
      ...this.state,
      ports: this.state.ports.map(port => ({ ...port })),
      versions: this.state.versions.map(version => ({ ...version })),
      files: { ...this.state.files },
    };
  }

  async start(): Promise<void> {
    await this.refresh();
    this.deps.portRegistry.start();
    this.emit(SessionEvent.STATUS, STATUS.READY);
  }

  /** Stops polling and waits for any running action to end on its own. */
  async shutdown(): Promise<void> {
    this.deps.portRegistry.stop();
    this.deps.portRegistry.off('ports-changed', this.onPortsChanged);
    if (this.current) {
      this.requestStop();
      await this.current;
    }
  }

  selectPort(path: string): boolean {
    if (!this.state.ports.some(port => port.path === path)) {
      this.rejectCommand(`Serial port not found: ${path}`);
      return false;
    }
    this.state.selectedPort = path;
    return true;
  }

  async selectVersion(name: string): Promise<boolean> {
    const version = this.state.versions.find(v => v.name === name);
    if (!version) {
      this.rejectCommand(`Firmware version not found: ${name}`);
      return false;
    }
    this.state.selectedVersion = name;
    await this.resolveSelectedFiles(version);
    return true;
  }

  async refresh(): Promise<void> {
    await this.refreshVersions();
    await this.refreshPorts();
  }

  async refreshPorts(): Promise<void> {
    // A change arrives through the ports-changed listener; otherwise re-check the selection quietly
    const changed = await this.deps.portRegistry.checkForChanges();
    if (!changed) {
      this.applyPorts(this.deps.portRegistry.getPorts(), false);
    }
  }

  async refreshVersions(): Promise<void> {
    const versions = await this.deps.catalog.listVersions();
    this.state.versions = versions;

    const current = this.state.selectedVersion;
    const selected = versions.find(v => v.name === current) ?? versions[0] ?? null;
    this.state.selectedVersion = selected?.name ?? null;
    await this.resolveSelectedFiles(selected);

    this.emit(SessionEvent.VERSIONS_CHANGED, versions.map(v => ({ ...v })));
  }

  /** Set the device's signal name and ID, then verify it reboots. */
  configure(name: string, id: string): Promise<boolean> {
    const port = this.state.selectedPort;
    if (!port) {
      return Promise.resolve(this.rejectCommand('Please select a serial port.'));
    }
    try {
      validateConfigValues(id, name);
    } catch (error) {
      return Promise.resolve(this.rejectCommand(getErrorMessage(error)));
    }
    if (!this.canStart()) {
      return Promise.resolve(false);
    }

    return this.run('configure', async () => {
      this.emit(SessionEvent.STATUS, STATUS.CONFIGURING);
      const result = await this.deps.configClient.configure({ port, id, name }, line => this.output(line));

      if (!result.success) {
        this.emit(SessionEvent.STATUS, STATUS.CONFIGURE_FAILED);
        return this.finished({ operation: 'configure', success: false, error: result.error.message });
      }

      this.emit(SessionEvent.STATUS, STATUS.CONFIGURE_SUCCEEDED);
      return this.finished({ operation: 'configure', success: true });
    });
  }

  /** Write the selected version to the selected port. */
  flash(): Promise<boolean> {
    const { selectedPort: port, selectedVersion: version, files } = this.state;
    if (!port || !version) {
      return Promise.resolve(this.rejectCommand('A serial port and firmware version must be selected.'));
    }
    const missing = FirmwareCatalog.missingRoles(files);
    if (missing.length > 0) {
      return Promise.resolve(
        this.rejectCommand(`Missing required files in ${version} folder: ${missing.join(', ')}`)
      );
    }
    if (!this.canStart()) {
      return Promise.resolve(false);
    }

    return this.run('flash', async () => {
      this.emit(SessionEvent.STATUS, STATUS.FLASHING);
      const job = this.deps.orchestrator.writeFlash(port, files, line => this.output(line));
      const result = toToolResult(await job.done);

      if (!result.success) {
        this.emit(SessionEvent.STATUS, STATUS.FLASH_FAILED);
        return this.finished({
          operation: 'flash',
          success: false,
          exitCode: result.exitCode,
          error: result.error.message,
        });
      }

      this.emit(SessionEvent.STATUS, STATUS.FLASH_SUCCEEDED);
      return this.finished({ operation: 'flash', success: true, exitCode: result.exitCode });
    });
  }

  /**
   * Stop accepting new work until the current action ends. An esptool run
   * already in progress is not interrupted.
   */
  requestStop(): void {
    if (!this.state.busy) return;
    this.stopRequested = true;
    this.deps.orchestrator.requestStop();
    this.emit(SessionEvent.STATUS, STATUS.STOP_PENDING);
  }

  private canStart(): boolean {
    if (this.state.busy || this.deps.orchestrator.isBusy()) {
      this.rejectCommand('Another operation is already running.');
      return false;
    }
    return true;
  }

  private run(operation: SessionOperation, action: () => Promise<boolean>): Promise<boolean> {
    this.state.busy = true;
    this.stopRequested = false;
    logger.info(`Starting ${operation}`);

    const task = action()
      .catch((error: unknown) => {
        logger.error(`${operation} failed:`, error);
        return this.finished({ operation, success: false, error: getErrorMessage(error) });
      })
      .finally(() => {
        this.state.busy = false;
        this.current = null;
      })
      .then(async (success) => {
        // A flashed or reset board may re-enumerate, and the firmware folder may have changed
        try {
          await this.refresh();
        } catch (error) {
          logger.warn(`Refresh after ${operation} failed: ${getErrorMessage(error)}`);
        }
        return success;
      });

    this.current = task;
    return task;
  }

  private finished(result: OperationFinished): boolean {
    if (this.stopRequested) {
      logger.info(`${result.operation} ended after stop request`);
    }
    this.emit(SessionEvent.FINISHED, result);
    return result.success;
  }

  private output(line: string): void {
    this.emit(SessionEvent.OUTPUT, line);
  }

  private rejectCommand(message: string): false {
    const error = new ValidationError(message);
    logger.warn(error.message);
    this.emit(SessionEvent.VALIDATION_ERROR, error.message);
    return false;
  }

  private async resolveSelectedFiles(version: FirmwareVersion | null): Promise<void> {
    this.state.files = version ? await this.deps.catalog.resolveFiles(version) : {};
  }

  private applyPorts(ports: SerialPortInfo[], notify: boolean = true): void {
    this.state.ports = ports.map(port => ({ ...port }));

    const current = this.state.selectedPort;
    if (!current || !ports.some(port => port.path === current)) {
      this.state.selectedPort = ports[0]?.path ?? null;
    }

    if (notify) {
      this.emit(SessionEvent.PORTS_CHANGED, ports.map(port => ({ ...port })));
    }
  }
}
