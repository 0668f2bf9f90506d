import { InvalidRangeError } from "../errors.js";
import { RangeType } from "../types.js";

export function assertValidRange(min: number, max: number, label?: string): void {
  if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
    throw new InvalidRangeError(min, max, label);
  }
}

/**
 * Whether `reading` satisfies the range condition.
 * inside: min <= reading <= max (closed interval).
 * outside: reading < min || reading > max.
 */
export function evaluateRange(reading: number, min: number, max: number, mode: RangeType): boolean {
  assertValidRange(min, max);
  const inside = reading >= min && reading <= max;
  return mode === "inside" ? inside : !inside;
}
