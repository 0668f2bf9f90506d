import { z } from "zod";
import { DeviceSettings } from "./types.js";
import { validateSettingsRanges } from "./policy/decision.js";

const RangeTypeSchema = z.enum(["inside", "outside"]);

export const DeviceSettingsSchema = z.object({
  device_id: z.string().min(1),
  sku: z.string().min(1).default("H5080"),
  actuation: z.enum(["on_when_satisfied", "off_when_satisfied"]).default("on_when_satisfied"),

  temp_control_enabled: z.boolean().default(false),
  temp_source: z.string().min(1).default("inside"),
  temp_unit: z.enum(["C", "F"]).default("F"),
  target_temp_min: z.number().finite().default(65),
  target_temp_max: z.number().finite().default(75),
  temp_range_type: RangeTypeSchema.default("outside"),

  humidity_control_enabled: z.boolean().default(false),
  humidity_source: z.string().min(1).default("inside"),
  target_humidity_min: z.number().finite().min(0).max(100).default(50),
  target_humidity_max: z.number().finite().min(0).max(100).default(60),
  humidity_range_type: RangeTypeSchema.default("outside"),

  last_updated: z.string().optional()
});

export function defaultSettings(deviceId: string): DeviceSettings {
  return DeviceSettingsSchema.parse({ device_id: deviceId });
}

/**
 * Validates a settings payload. Field errors come back as a zod error message;
 * a min greater than its max raises InvalidRangeError.
 */
export function parseDeviceSettings(raw: unknown): DeviceSettings {
  const parsed = DeviceSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new Error(`Device settings validation error: ${detail}`);
  }
  validateSettingsRanges(parsed.data);
  return parsed.data;
}

/** Overlays a partial update on the stored (or default) settings. */
export function mergeDeviceSettings(current: DeviceSettings, patch: Record<string, unknown>): DeviceSettings {
  const { last_updated: _ignored, ...rest } = patch;
  return parseDeviceSettings({ ...current, ...rest, device_id: current.device_id });
}
