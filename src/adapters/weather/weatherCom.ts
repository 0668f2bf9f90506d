import { z } from "zod";
import { WeatherNow } from "../../types.js";
import { FetchLike, fetchWithTimeout } from "../../utils/fetchWithTimeout.js";
import { logger } from "../../utils/logger.js";
import { nowUtcIso } from "../../utils/time.js";

export interface WeatherConfig {
  stationId: string;
  apiKey: string;
  timeoutMs: number;
  baseUrl?: string;
  fetchImpl?: FetchLike;
}

const num = z.number().nullable().optional();

const ObservationSchema = z.object({
  obsTimeUtc: z.string().optional(),
  obsTimeLocal: z.string().optional(),
  humidity: num,
  winddir: num,
  uv: num,
  imperial: z
    .object({
      temp: num,
      dewpt: num,
      windSpeed: num,
      windGust: num,
      pressure: num,
      precipRate: num,
      precipTotal: num
    })
    .default({})
});

const CurrentObservationsSchema = z.object({
  observations: z.array(ObservationSchema).default([])
});

/** Current conditions from a personal weather station (imperial units). */
export async function getWeatherNow(cfg: WeatherConfig, signal?: AbortSignal): Promise<WeatherNow> {
  const url = new URL("/v2/pws/observations/current", cfg.baseUrl ?? "https://api.weather.com");
  url.searchParams.set("stationId", cfg.stationId);
  url.searchParams.set("format", "json");
  url.searchParams.set("units", "e");
  url.searchParams.set("apiKey", cfg.apiKey);

  const resp = await fetchWithTimeout(url.toString(), { timeoutMs: cfg.timeoutMs, signal, fetchImpl: cfg.fetchImpl });
  if (!resp.ok) throw new Error(`Weather station error: ${resp.status} ${resp.statusText}`);
  const json = CurrentObservationsSchema.parse(await resp.json());

  const obs = json.observations[0];
  if (!obs) throw new Error(`Weather station ${cfg.stationId} returned no observations`);

  const temp = obs.imperial.temp ?? null;
  const rh = obs.humidity ?? null;

  return {
    station_id: cfg.stationId,
    temp_f: temp,
    rh_pct: rh,
    dew_point_f: obs.imperial.dewpt ?? null,
    wind_dir_deg: obs.winddir ?? null,
    wind_mph: obs.imperial.windSpeed ?? null,
    wind_gust_mph: obs.imperial.windGust ?? null,
    pressure_inhg: obs.imperial.pressure ?? null,
    precip_rate_in_hr: obs.imperial.precipRate ?? null,
    precip_total_in: obs.imperial.precipTotal ?? null,
    uv: obs.uv ?? null,
    observation_time_local: obs.obsTimeLocal ?? null,
    observation_time_utc: obs.obsTimeUtc ? new Date(obs.obsTimeUtc).toISOString() : nowUtcIso(),
    status: temp === null && rh === null ? "offline" : "online"
  };
}

export interface WeatherService {
  getNow(signal?: AbortSignal): Promise<WeatherNow>;
}

/**
 * Caches station observations for `cacheMinutes`. A failed refresh rethrows;
 * the previous observation is not served past its expiry.
 */
export function createWeatherService(
  cfg: WeatherConfig,
  cacheMinutes: number,
  now: () => number = Date.now
): WeatherService {
  let cached: { at: number; data: WeatherNow } | null = null;

  return {
    async getNow(signal?: AbortSignal): Promise<WeatherNow> {
      if (cached && now() - cached.at < cacheMinutes * 60_000) {
        return cached.data;
      }
      const data = await getWeatherNow(cfg, signal);
      cached = { at: now(), data };
      logger.debug({ station_id: cfg.stationId, temp_f: data.temp_f, rh_pct: data.rh_pct }, "Weather refreshed");
      return data;
    }
  };
}
