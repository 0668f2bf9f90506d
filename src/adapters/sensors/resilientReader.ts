import { errorMessage } from "../../errors.js";
import { createReading } from "../../readings.js";
import { Quantity, Reading, ReadingStore, ReadingUnit, SensorReader } from "../../types.js";
import { logger } from "../../utils/logger.js";
import { retry } from "../../utils/retry.js";

export interface Placeholder {
  value: number;
  unit: ReadingUnit;
}

export interface ResilientReaderOptions {
  attempts: number;
  baseDelayMs: number;
  placeholders: Record<Quantity, Placeholder>;
  store?: ReadingStore;
}

/**
 * Wraps a SensorReader so that reads never fail: each read is retried with
 * linear backoff, and once attempts are exhausted a reading flagged
 * `degraded` is returned in its place. The substitute carries the last good
 * value seen for that source and quantity, or the configured placeholder.
 *
 * Only an aborted signal propagates, so a timed-out cycle stops here.
 */
export function createResilientReader(inner: SensorReader, opts: ResilientReaderOptions): SensorReader {
  const lastGood = new Map<string, Reading>();

  async function remember(key: string, reading: Reading): Promise<Reading> {
    if (!reading.degraded) {
      lastGood.set(key, reading);
    }
    if (opts.store) {
      try {
        await opts.store.record(reading);
      } catch (err) {
        logger.warn({ err, source: reading.source }, "Failed to record reading; continuing");
      }
    }
    return reading;
  }

  return {
    async read(source: string, quantity: Quantity, signal?: AbortSignal): Promise<Reading> {
      const key = `${source}:${quantity}`;
      try {
        const reading = await retry(() => inner.read(source, quantity, signal), {
          attempts: opts.attempts,
          baseDelayMs: opts.baseDelayMs,
          signal,
          onRetry: (err, attempt) =>
            logger.warn({ source, quantity, attempt, attempts: opts.attempts, err }, "Sensor read failed; retrying")
        });
        return await remember(key, reading);
      } catch (err) {
        if (signal?.aborted) throw err;

        const previous = lastGood.get(key);
        const fallback: Placeholder = previous ?? opts.placeholders[quantity];
        const degraded = createReading({
          source: previous?.source ?? source,
          quantity,
          value: fallback.value,
          unit: fallback.unit,
          degraded: true
        });
        logger.warn(
          {
            source,
            quantity,
            attempts: opts.attempts,
            degraded: true,
            substitute: previous ? "last_good" : "placeholder",
            value: degraded.value,
            unit: degraded.unit,
            error: errorMessage(err)
          },
          "Sensor unavailable; substituting degraded reading"
        );
        return remember(key, degraded);
      }
    }
  };
}
