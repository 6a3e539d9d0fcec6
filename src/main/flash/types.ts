import type { FirmwareRole } from '@shared/types/firmware.types';
import type { ExternalToolError } from '../utils/errors';

/** Runs the external flashing tool, forwarding each output line. Resolves with the exit status. */
export interface ToolRunner {
  run(args: string[], onLine: (line: string) => void): Promise<number>;
}

export interface EsptoolTarget {
  chip: string;
  port: string;
  baudRate: number;
}

export type CompleteFirmwareFileSet = Record<FirmwareRole, string>;

export interface FlashRegion {
  role: FirmwareRole;
  address: string;
  path: string;
}

export type ToolResult =
  | { success: true; exitCode: 0 }
  | { success: false; exitCode: number; error: ExternalToolError };
