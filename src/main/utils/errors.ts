export class FlasherError extends Error {
  constructor(
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'FlasherError';
  }
}

export class TransportError extends FlasherError {
  constructor(message: string, details?: unknown) {
    super(message, 'TRANSPORT_ERROR', details);
    this.name = 'TransportError';
  }
}

export class ValidationError extends FlasherError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class DeviceProtocolError extends FlasherError {
  constructor(message: string, code: string = 'DEVICE_PROTOCOL_ERROR', details?: unknown) {
    super(message, code, details);
    this.name = 'DeviceProtocolError';
  }
}

export class TimeoutError extends DeviceProtocolError {
  constructor(message: string = 'Operation timed out') {
    super(message, 'TIMEOUT_ERROR');
    this.name = 'TimeoutError';
  }
}

export class ExternalToolError extends FlasherError {
  constructor(
    message: string,
    public exitCode: number
  ) {
    super(message, 'EXTERNAL_TOOL_ERROR', { exitCode });
    this.name = 'ExternalToolError';
  }
}

export class BusyError extends FlasherError {
  constructor(message: string = 'Another operation is already running') {
    super(message, 'BUSY');
    this.name = 'BusyError';
  }
}

export class ConfigurationFailedError extends FlasherError {
  constructor(
    public reason: string,
    details?: unknown
  ) {
    // Surface the inner error so the user sees what actually went wrong
    const innerMsg = details instanceof Error ? details.message : undefined;
    const fullMessage = innerMsg && innerMsg !== reason ? `${reason}: ${innerMsg}` : reason;
    super(fullMessage, 'CONFIGURATION_FAILED', details);
    this.name = 'ConfigurationFailedError';
  }
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  return String(error);
}
