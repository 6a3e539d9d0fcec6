import type { SerialPortInfo } from './port.types';
import type { FirmwareFileSet, FirmwareVersion } from './firmware.types';

export type SessionOperation = 'configure' | 'flash';

export interface SessionState {
  ports: SerialPortInfo[];
  versions: FirmwareVersion[];
  selectedPort: string | null;
  selectedVersion: string | null;
  files: FirmwareFileSet;
  busy: boolean;
}

export interface OperationFinished {
  operation: SessionOperation;
  success: boolean;
  /** Exit status of the flashing tool, when it got that far */
  exitCode?: number;
  error?: string;
}

export enum SessionEvent {
  PORTS_CHANGED = 'ports-changed',
  VERSIONS_CHANGED = 'versions-changed',
  OUTPUT = 'output',
  STATUS = 'status',
  FINISHED = 'finished',
  VALIDATION_ERROR = 'validation-error'
}
