import { MalformedReadingError } from "./errors.js";
import { Quantity, Reading, ReadingUnit } from "./types.js";
import { nowUtcIso } from "./utils/time.js";

function coerceNumber(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return null;
}

/**
 * Builds an immutable reading, rejecting anything that is not a finite number
 * (or a numeric string) with MalformedReadingError.
 */
export function createReading(params: {
  source: string;
  quantity: Quantity;
  value: unknown;
  unit: ReadingUnit;
  timestamp?: string;
  degraded?: boolean;
}): Reading {
  const value = coerceNumber(params.value);
  if (value === null) {
    throw new MalformedReadingError(params.source, params.value);
  }
  if (params.quantity === "humidity" && (value < 0 || value > 100)) {
    throw new MalformedReadingError(params.source, params.value);
  }
  return Object.freeze({
    source: params.source,
    quantity: params.quantity,
    value,
    unit: params.unit,
    timestamp: params.timestamp ?? nowUtcIso(),
    degraded: params.degraded ?? false
  });
}
