import { defaultSettings } from "../settings.js";
import { DeviceSettings, Quantity, Reading, ReadingUnit } from "../types.js";

export function settingsFor(deviceId: string, overrides: Partial<DeviceSettings> = {}): DeviceSettings {
  return { ...defaultSettings(deviceId), ...overrides };
}

export function reading(
  quantity: Quantity,
  value: number,
  unit: ReadingUnit,
  extra: Partial<Pick<Reading, "source" | "degraded" | "timestamp">> = {}
): Reading {
  return {
    source: extra.source ?? "inside",
    quantity,
    value,
    unit,
    timestamp: extra.timestamp ?? "2024-03-01T12:00:00.000Z",
    degraded: extra.degraded ?? false
  };
}
