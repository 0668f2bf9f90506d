import fs from "node:fs/promises";
import { z } from "zod";
import { SensorUnavailableError, errorMessage } from "../../errors.js";
import { createReading } from "../../readings.js";
import { Quantity, Reading } from "../../types.js";
import { minutesBetween } from "../../utils/time.js";

// Written by the BLE scanner sidecar after each successful advertisement
// decode. Temperature is in °C.
const FeedSchema = z
  .object({
    device: z.string().optional(),
    name: z.string().optional(),
    temperature: z.unknown(),
    humidity: z.unknown(),
    battery: z.number().nullable().optional(),
    timestamp: z.string(),
    status: z.enum(["online", "offline"]).default("online")
  })
  .passthrough();

export type SensorFeed = z.infer<typeof FeedSchema>;

export async function loadSensorFeed(filePath: string, sourceId: string): Promise<SensorFeed> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (e: unknown) {
    throw new SensorUnavailableError(sourceId, `feed file unreadable (${filePath}): ${errorMessage(e)}`, { cause: e });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e: unknown) {
    throw new SensorUnavailableError(sourceId, `feed file is not valid JSON: ${errorMessage(e)}`, { cause: e });
  }

  const parsed = FeedSchema.safeParse(json);
  if (!parsed.success) {
    throw new SensorUnavailableError(sourceId, `feed file has unexpected shape: ${parsed.error.message}`);
  }
  return parsed.data;
}

export async function readFromSensorFeed(params: {
  sourceId: string;
  filePath: string;
  quantity: Quantity;
  maxAgeMinutes: number;
  now?: Date;
}): Promise<Reading> {
  const feed = await loadSensorFeed(params.filePath, params.sourceId);

  if (feed.status === "offline") {
    throw new SensorUnavailableError(params.sourceId, "scanner reports sensor offline");
  }

  const timestamp = new Date(feed.timestamp);
  if (Number.isNaN(timestamp.getTime())) {
    throw new SensorUnavailableError(params.sourceId, `feed timestamp unparseable: ${feed.timestamp}`);
  }
  const age = minutesBetween(timestamp.toISOString(), params.now);
  if (age > params.maxAgeMinutes) {
    throw new SensorUnavailableError(
      params.sourceId,
      `last reading is ${Math.round(age)} minutes old (limit ${params.maxAgeMinutes})`
    );
  }

  return params.quantity === "temperature"
    ? createReading({
        source: params.sourceId,
        quantity: "temperature",
        value: feed.temperature,
        unit: "C",
        timestamp: timestamp.toISOString()
      })
    : createReading({
        source: params.sourceId,
        quantity: "humidity",
        value: feed.humidity,
        unit: "%RH",
        timestamp: timestamp.toISOString()
      });
}
