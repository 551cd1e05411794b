/**
 * Error taxonomy for the sampling and analysis pipeline.
 *
 * Per-device and per-write faults are contained where they occur (the
 * collector turns them into logged outcomes). Only ConfigurationError is
 * allowed to stop the process, and only during start-up.
 */
export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly deviceId?: string,
    public readonly originalError?: Error,
  ) {
    super(deviceId ? `[${deviceId}] ${message}` : message);
    this.name = 'MonitorError';
  }
}

/**
 * A sensor read did not complete within the configured timeout.
 */
export class ReadTimeoutError extends MonitorError {
  constructor(
    deviceId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Sensor read timed out after ${timeoutMs}ms`, deviceId);
    this.name = 'ReadTimeoutError';
  }
}

/**
 * The sensor or its transport reported a failure.
 */
export class ReadFaultError extends MonitorError {
  constructor(deviceId: string, message: string, originalError?: Error) {
    super(message, deviceId, originalError);
    this.name = 'ReadFaultError';
  }
}

export class CalibrationError extends MonitorError {
  constructor(deviceId: string, message: string, originalError?: Error) {
    super(message, deviceId, originalError);
    this.name = 'CalibrationError';
  }
}

/**
 * Persisting a reading failed, or the reading was out of order.
 */
export class StoreWriteError extends MonitorError {
  constructor(deviceId: string, message: string, originalError?: Error) {
    super(message, deviceId, originalError);
    this.name = 'StoreWriteError';
  }
}

export class AnalysisError extends MonitorError {
  constructor(message: string, deviceId?: string, originalError?: Error) {
    super(message, deviceId, originalError);
    this.name = 'AnalysisError';
  }
}

/**
 * Invalid or inconsistent configuration. Fatal at start-up.
 */
export class ConfigurationError extends MonitorError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Format error message from unknown error type
 */
export function formatErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize an unknown thrown value into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
