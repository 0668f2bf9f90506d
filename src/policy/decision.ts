import {
  DecisionResult,
  DeviceSettings,
  DimensionDecision,
  Quantity,
  RangeType,
  Reading,
  ReadingUnit
} from "../types.js";
import { toRangeUnit } from "../utils/units.js";
import { assertValidRange, evaluateRange } from "./rangeEvaluator.js";

interface DimensionConfig {
  quantity: Quantity;
  enabled: boolean;
  source: string;
  min: number;
  max: number;
  unit: ReadingUnit;
  type: RangeType;
}

export function dimensionsOf(settings: DeviceSettings): DimensionConfig[] {
  return [
    {
      quantity: "temperature",
      enabled: settings.temp_control_enabled,
      source: settings.temp_source,
      min: settings.target_temp_min,
      max: settings.target_temp_max,
      unit: settings.temp_unit,
      type: settings.temp_range_type
    },
    {
      quantity: "humidity",
      enabled: settings.humidity_control_enabled,
      source: settings.humidity_source,
      min: settings.target_humidity_min,
      max: settings.target_humidity_max,
      unit: "%RH",
      type: settings.humidity_range_type
    }
  ];
}

/** Throws InvalidRangeError for the first dimension whose min exceeds its max. */
export function validateSettingsRanges(settings: DeviceSettings): void {
  for (const dim of dimensionsOf(settings)) {
    assertValidRange(dim.min, dim.max, `${dim.quantity} range for ${settings.device_id}`);
  }
}

export function enabledDimensions(settings: DeviceSettings): { quantity: Quantity; source: string }[] {
  return dimensionsOf(settings)
    .filter((d) => d.enabled)
    .map(({ quantity, source }) => ({ quantity, source }));
}

export type ReadingsByQuantity = Partial<Record<Quantity, Reading>>;

function decideDimension(settings: DeviceSettings, dim: DimensionConfig, reading: Reading | undefined): DimensionDecision {
  if (!dim.enabled) {
    return { quantity: dim.quantity, enabled: false };
  }
  if (!reading) {
    throw new Error(`Missing ${dim.quantity} reading for enabled control on ${settings.device_id}`);
  }

  const value = toRangeUnit(reading.value, reading.unit, dim.unit);
  const satisfied = evaluateRange(value, dim.min, dim.max, dim.type);
  const vote = settings.actuation === "on_when_satisfied" ? satisfied : !satisfied;

  return {
    quantity: dim.quantity,
    enabled: true,
    source: dim.source,
    reading,
    value_in_range_unit: value,
    range: { min: dim.min, max: dim.max, unit: dim.unit, type: dim.type },
    satisfied,
    vote
  };
}

/**
 * Pure decision for one device. Enabled dimensions vote independently and the
 * votes are OR-combined; with nothing enabled the result is null.
 */
export function decide(settings: DeviceSettings, readings: ReadingsByQuantity): DecisionResult {
  const [tempDim, humidityDim] = dimensionsOf(settings);
  const temperature = decideDimension(settings, tempDim, readings.temperature);
  const humidity = decideDimension(settings, humidityDim, readings.humidity);

  const votes = [temperature, humidity].filter((d) => d.enabled).map((d) => d.vote === true);
  const degraded = [temperature, humidity].some((d) => d.reading?.degraded === true);

  return {
    device_id: settings.device_id,
    temperature,
    humidity,
    should_be_on: votes.length === 0 ? null : votes.some(Boolean),
    degraded
  };
}
