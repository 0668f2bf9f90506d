export type ErrorCode =
  | "INVALID_RANGE"
  | "SENSOR_UNAVAILABLE"
  | "MALFORMED_READING"
  | "DEVICE_COMMAND_FAILED"
  | "CYCLE_TIMEOUT"
  | "SETTINGS_NOT_FOUND";

export class GarageControlError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidRangeError extends GarageControlError {
  constructor(
    readonly min: number,
    readonly max: number,
    label = "range"
  ) {
    super("INVALID_RANGE", `Invalid ${label}: min ${min} is greater than max ${max}`);
  }
}

export class SensorUnavailableError extends GarageControlError {
  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("SENSOR_UNAVAILABLE", `Sensor ${source} unavailable: ${message}`, options);
  }
}

export class MalformedReadingError extends GarageControlError {
  constructor(
    readonly source: string,
    readonly raw: unknown
  ) {
    super("MALFORMED_READING", `Malformed reading from ${source}: ${JSON.stringify(raw)}`);
  }
}

export class DeviceCommandError extends GarageControlError {
  constructor(
    readonly deviceId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("DEVICE_COMMAND_FAILED", `Command to ${deviceId} failed: ${message}`, options);
  }
}

export class CycleTimeoutError extends GarageControlError {
  constructor(
    readonly deviceId: string,
    readonly timeoutMs: number
  ) {
    super("CYCLE_TIMEOUT", `Cycle for ${deviceId} timed out after ${timeoutMs}ms`);
  }
}

export class SettingsNotFoundError extends GarageControlError {
  constructor(readonly deviceId: string) {
    super("SETTINGS_NOT_FOUND", `No settings stored for device ${deviceId}`);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
