import type { ConfigurationFailedError } from '../utils/errors';

export type ConfigField = 'signal_id' | 'signal_name';

export interface ConfigRequest {
  field: ConfigField;
  value: string;
}

export interface ConfigureOptions {
  port: string;
  /** Short numeric identifier, at most three characters */
  id: string;
  name: string;
  baudRate?: number;
  /** Per-line read timeout in ms */
  timeoutMs?: number;
}

export type ConfigResult =
  | { success: true }
  | { success: false; error: ConfigurationFailedError };
