import path from "node:path";
import { SensorUnavailableError } from "../../errors.js";
import { createReading } from "../../readings.js";
import { SensorsConfig, findSource } from "../../sensorsConfig.js";
import { Quantity, Reading, SensorReader } from "../../types.js";
import { GoveeClientConfig } from "../actuators/goveeClient.js";
import { WeatherService } from "../weather/weatherCom.js";
import { readFromGoveeCloud } from "./goveeCloudSensor.js";
import { readFromSensorFeed } from "./sensorFeedFile.js";

export interface SensorHubConfig {
  sensors: SensorsConfig;
  maxAgeMinutes: number;
  goveeClient?: GoveeClientConfig;
  weather?: WeatherService;
}

async function readFromWeather(weather: WeatherService, sourceId: string, quantity: Quantity, signal?: AbortSignal) {
  const now = await weather.getNow(signal);
  const value = quantity === "temperature" ? now.temp_f : now.rh_pct;
  if (now.status === "offline" || value === null || value === undefined) {
    throw new SensorUnavailableError(sourceId, `weather station ${now.station_id} has no ${quantity}`);
  }
  return createReading({
    source: sourceId,
    quantity,
    value,
    unit: quantity === "temperature" ? "F" : "%RH",
    timestamp: now.observation_time_utc
  });
}

/** Routes reads to the adapter configured for each source id (or inside/outside alias). */
export function createSensorHub(cfg: SensorHubConfig): SensorReader {
  return {
    async read(source: string, quantity: Quantity, signal?: AbortSignal): Promise<Reading> {
      const entry = findSource(cfg.sensors, source);
      if (!entry) {
        throw new SensorUnavailableError(source, "no sensor source configured with this id");
      }

      switch (entry.kind) {
        case "feed_file":
          return readFromSensorFeed({
            sourceId: entry.id,
            filePath: path.resolve(cfg.sensors.baseDir, entry.path),
            quantity,
            maxAgeMinutes: cfg.maxAgeMinutes
          });
        case "govee_cloud":
          if (!cfg.goveeClient) {
            throw new SensorUnavailableError(entry.id, "GOVEE_API_KEY is not configured");
          }
          return readFromGoveeCloud({
            client: cfg.goveeClient,
            sourceId: entry.id,
            device: entry.device,
            sku: entry.sku,
            quantity,
            signal
          });
        case "weather":
          if (!cfg.weather) {
            throw new SensorUnavailableError(entry.id, "weather station is not configured");
          }
          return readFromWeather(cfg.weather, entry.id, quantity, signal);
      }
    }
  };
}
