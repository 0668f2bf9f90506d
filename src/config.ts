import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const EnvSchema = z.object({
  CYCLE_MINUTES: z.coerce.number().int().positive().default(5),
  CYCLE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  GOVEE_API_KEY: z.string().optional(),
  GOVEE_API_BASE_URL: z.string().default("https://openapi.api.govee.com/router/api/v1"),
  DEVICE_CACHE_MINUTES: z.coerce.number().positive().default(5),

  SENSORS_CONFIG_PATH: z.string().default("./config/sensors.json"),
  SENSOR_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(3),
  SENSOR_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(2_000),
  SENSOR_MAX_AGE_MINUTES: z.coerce.number().positive().default(15),
  DEGRADED_TEMP_C: z.coerce.number().default(20),
  DEGRADED_HUMIDITY_PCT: z.coerce.number().min(0).max(100).default(50),

  COMMAND_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(3),
  COMMAND_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(1_000),

  WEATHER_STATION_ID: z.string().optional(),
  WEATHER_API_KEY: z.string().optional(),
  WEATHER_CACHE_MINUTES: z.coerce.number().positive().default(10),

  DRY_RUN: z
    .string()
    .default("true")
    .transform((v) => v.toLowerCase() === "true"),

  STORE: z.enum(["memory", "mongo"]).default("memory"),
  MONGODB_URI: z.string().optional(),
  MONGODB_DB_NAME: z.string().default("garage_control"),

  PORT: z.coerce.number().int().positive().default(8000)
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.format());
    throw new Error("Invalid environment configuration");
  }
  const cfg = parsed.data;
  if (!cfg.DRY_RUN && !cfg.GOVEE_API_KEY) {
    throw new Error("GOVEE_API_KEY is required when DRY_RUN=false");
  }
  if (cfg.STORE === "mongo" && !cfg.MONGODB_URI) {
    throw new Error("MONGODB_URI is required when STORE=mongo");
  }
  return cfg;
}

/**
 * Scripts that inspect stored settings run in their own process, where an
 * in-memory store is always empty.
 */
export function requirePersistentStore(cfg: AppConfig, purpose: string): void {
  if (cfg.STORE !== "mongo") {
    throw new Error(`${purpose} reads stored settings and needs STORE=mongo (current STORE=${cfg.STORE})`);
  }
}

export function loadConfig(): AppConfig {
  return parseConfig(process.env);
}
