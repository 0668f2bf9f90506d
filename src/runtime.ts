import { AppConfig } from "./config.js";
import { GoveeClientConfig } from "./adapters/actuators/goveeClient.js";
import { createGoveePlugController } from "./adapters/actuators/goveePlug.js";
import { createResilientReader } from "./adapters/sensors/resilientReader.js";
import { createSensorHub } from "./adapters/sensors/sensorHub.js";
import { initMongo, mongoReadingStore, mongoSettingsStore } from "./adapters/store/mongoStore.js";
import { memoryReadingStore, memorySettingsStore } from "./adapters/store/memoryStore.js";
import { WeatherService, createWeatherService } from "./adapters/weather/weatherCom.js";
import { CycleDeps } from "./cycle.js";
import { SensorsConfig, loadSensorsConfig } from "./sensorsConfig.js";
import { PowerCommand, ReadingStore, SettingsStore } from "./types.js";
import { logger } from "./utils/logger.js";

export interface Runtime {
  cfg: AppConfig;
  sensorsConfig: SensorsConfig;
  settings: SettingsStore;
  readings: ReadingStore;
  goveeClient?: GoveeClientConfig;
  weather?: WeatherService;
  deps: CycleDeps;
}

async function createStores(cfg: AppConfig): Promise<{ settings: SettingsStore; readings: ReadingStore }> {
  if (cfg.STORE === "mongo" && cfg.MONGODB_URI) {
    const store = await initMongo({ uri: cfg.MONGODB_URI, dbName: cfg.MONGODB_DB_NAME });
    logger.info({ db: cfg.MONGODB_DB_NAME }, "Using MongoDB store");
    return { settings: mongoSettingsStore(store), readings: mongoReadingStore(store) };
  }
  logger.warn("Using in-memory store; settings and readings are lost on restart");
  return { settings: memorySettingsStore(), readings: memoryReadingStore() };
}

/** Source ids whose adapter is configured; the rest would only ever yield placeholders. */
export function pollableSources(
  sensors: SensorsConfig,
  available: { goveeClient?: GoveeClientConfig; weather?: WeatherService }
): string[] {
  return sensors.sources
    .filter((s) => {
      if (s.kind === "govee_cloud") return available.goveeClient !== undefined;
      if (s.kind === "weather") return available.weather !== undefined;
      return true;
    })
    .map((s) => s.id);
}

export async function createRuntime(cfg: AppConfig): Promise<Runtime> {
  const sensorsConfig = loadSensorsConfig(cfg.SENSORS_CONFIG_PATH);
  const { settings, readings } = await createStores(cfg);

  const goveeClient: GoveeClientConfig | undefined = cfg.GOVEE_API_KEY
    ? { apiKey: cfg.GOVEE_API_KEY, baseUrl: cfg.GOVEE_API_BASE_URL, timeoutMs: cfg.HTTP_TIMEOUT_MS }
    : undefined;

  const weather =
    cfg.WEATHER_STATION_ID && cfg.WEATHER_API_KEY
      ? createWeatherService(
          { stationId: cfg.WEATHER_STATION_ID, apiKey: cfg.WEATHER_API_KEY, timeoutMs: cfg.HTTP_TIMEOUT_MS },
          cfg.WEATHER_CACHE_MINUTES
        )
      : undefined;
  if (!weather) {
    logger.info("WEATHER_STATION_ID/WEATHER_API_KEY not set; outdoor readings disabled");
  }

  const hub = createSensorHub({
    sensors: sensorsConfig,
    maxAgeMinutes: cfg.SENSOR_MAX_AGE_MINUTES,
    goveeClient,
    weather
  });

  const sensors = createResilientReader(hub, {
    attempts: cfg.SENSOR_RETRY_ATTEMPTS,
    baseDelayMs: cfg.SENSOR_RETRY_BASE_MS,
    placeholders: {
      temperature: { value: cfg.DEGRADED_TEMP_C, unit: "C" },
      humidity: { value: cfg.DEGRADED_HUMIDITY_PCT, unit: "%RH" }
    },
    store: readings
  });

  const deps: CycleDeps = {
    settings,
    sensors,
    controller: createGoveePlugController({ client: goveeClient, dryRun: cfg.DRY_RUN }),
    lastCommanded: new Map<string, PowerCommand>(),
    timeoutMs: cfg.CYCLE_TIMEOUT_MS,
    commandRetry: { attempts: cfg.COMMAND_RETRY_ATTEMPTS, baseDelayMs: cfg.COMMAND_RETRY_BASE_MS },
    inFlight: new Map(),
    pollSources: pollableSources(sensorsConfig, { goveeClient, weather })
  };

  return { cfg, sensorsConfig, settings, readings, goveeClient, weather, deps };
}
