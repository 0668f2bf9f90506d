import { ReadingUnit, TemperatureUnit } from "../types.js";

export function toCelsius(f: number): number {
  return (f - 32) * (5 / 9);
}

export function toFahrenheit(c: number): number {
  return c * (9 / 5) + 32;
}

export function convertTemperature(value: number, from: TemperatureUnit, to: TemperatureUnit): number {
  if (from === to) return value;
  return to === "C" ? toCelsius(value) : toFahrenheit(value);
}

export function isTemperatureUnit(unit: ReadingUnit): unit is TemperatureUnit {
  return unit === "C" || unit === "F";
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Brings a reading value into the unit a range was authored in.
 * Humidity is always %RH, so only temperatures are converted. Converted
 * values are snapped to 1e-10 so float noise cannot move a value that sits
 * exactly on a range boundary.
 */
export function toRangeUnit(value: number, readingUnit: ReadingUnit, rangeUnit: ReadingUnit): number {
  if (readingUnit === rangeUnit) return value;
  if (isTemperatureUnit(readingUnit) && isTemperatureUnit(rangeUnit)) {
    return roundTo(convertTemperature(value, readingUnit, rangeUnit), 10);
  }
  throw new Error(`Cannot compare a ${readingUnit} reading against a ${rangeUnit} range`);
}
