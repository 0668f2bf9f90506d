import express from "express";
import type { Server } from "node:http";
import { z } from "zod";
import { GoveeClientConfig, getPowerState, listDevices } from "./adapters/actuators/goveeClient.js";
import { sendCommandWithRetry } from "./adapters/actuators/goveePlug.js";
import { WeatherService } from "./adapters/weather/weatherCom.js";
import { CycleDeps, runCycleOnce, runDeviceCycle } from "./cycle.js";
import { GarageControlError, InvalidRangeError, errorMessage } from "./errors.js";
import { SensorsConfig, resolveSourceId } from "./sensorsConfig.js";
import { defaultSettings, mergeDeviceSettings } from "./settings.js";
import { DeviceCycleResult, DeviceSettings, GoveeDevice, ReadingStore, SettingsStore, StoredReading } from "./types.js";
import { logger } from "./utils/logger.js";
import { summarize } from "./utils/psychrometrics.js";
import { roundTo, toCelsius, toFahrenheit } from "./utils/units.js";

export interface CycleBoard {
  lastTickUtc: string | null;
  byDevice: Map<string, DeviceCycleResult>;
}

export function createCycleBoard(): CycleBoard {
  return { lastTickUtc: null, byDevice: new Map() };
}

export function recordResults(board: CycleBoard, results: DeviceCycleResult[], tickUtc?: string): void {
  for (const r of results) board.byDevice.set(r.device_id, r);
  if (tickUtc) board.lastTickUtc = tickUtc;
}

export interface ServerContext {
  settings: SettingsStore;
  readings: ReadingStore;
  sensorsConfig: SensorsConfig;
  deps: CycleDeps;
  board: CycleBoard;
  goveeClient?: GoveeClientConfig;
  weather?: WeatherService;
  deviceCacheMinutes: number;
}

type Handler = (req: express.Request, res: express.Response) => Promise<unknown>;

function route(handler: Handler): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

const SourceQuery = z.object({ source: z.string().min(1).default("inside") });
const DeviceQuery = z.object({ device_id: z.string().min(1), model: z.string().min(1).default("H5080") });
const ControlBody = z.object({
  device_id: z.string().min(1),
  model: z.string().min(1).default("H5080"),
  action: z.enum(["on", "off"])
});

function badRequest(res: express.Response, error: string) {
  return res.status(400).json({ success: false, error });
}

function temperatureC(r: StoredReading): number {
  return r.unit === "F" ? toCelsius(r.value) : r.value;
}

export function createApp(ctx: ServerContext): express.Express {
  const app = express();
  app.use(express.json({ limit: "64kb" }));

  let deviceCache: { at: number; devices: GoveeDevice[] } | null = null;

  app.get("/healthz", (_req, res) => {
    res.json({
      ok: true,
      last_cycle_utc: ctx.board.lastTickUtc,
      devices: [...ctx.board.byDevice.values()].map((r) => ({
        device_id: r.device_id,
        status: r.status,
        command: r.command ?? null,
        degraded: r.degraded,
        errors: r.errors,
        timestamp_utc: r.timestamp_utc_iso
      }))
    });
  });

  app.get(
    "/api/sensor-data",
    route(async (req, res) => {
      const query = SourceQuery.safeParse(req.query);
      if (!query.success) return badRequest(res, "source must be a non-empty string");
      const source = resolveSourceId(ctx.sensorsConfig, query.data.source);

      const [temp, humidity] = await Promise.all([
        ctx.readings.latest(source, "temperature"),
        ctx.readings.latest(source, "humidity")
      ]);
      const online = temp?.status === "online" && humidity?.status === "online";
      if (!temp || !humidity || !online) {
        return res.json({
          source,
          status: "offline",
          temperature: null,
          temperature_f: null,
          humidity: null,
          dew_point: null,
          dew_point_f: null,
          abs_humidity: null,
          steam_pressure: null,
          timestamp: temp?.timestamp ?? humidity?.timestamp ?? null
        });
      }

      const tempC = temperatureC(temp);
      const derived = summarize(tempC, humidity.value);
      return res.json({
        source,
        status: "online",
        temperature: roundTo(tempC, 2),
        temperature_f: roundTo(toFahrenheit(tempC), 2),
        humidity: humidity.value,
        dew_point: roundTo(derived.dew_point_c, 2),
        dew_point_f: roundTo(toFahrenheit(derived.dew_point_c), 2),
        abs_humidity: roundTo(derived.abs_humidity_gm3, 2),
        steam_pressure: roundTo(derived.steam_pressure_mbar, 2),
        timestamp: temp.timestamp
      });
    })
  );

  app.get(
    "/api/last-24h",
    route(async (req, res) => {
      const query = SourceQuery.safeParse(req.query);
      if (!query.success) return badRequest(res, "source must be a non-empty string");
      const source = resolveSourceId(ctx.sensorsConfig, query.data.source);
      const from = new Date(Date.now() - 24 * 60 * 60 * 1000);
      const rows = await ctx.readings.since(source, from);
      return res.json({
        source,
        readings: rows.map((r) => ({
          timestamp: r.timestamp,
          quantity: r.quantity,
          value: r.value,
          unit: r.unit,
          status: r.status,
          ...(r.quantity === "temperature"
            ? {
                temperature_c: roundTo(temperatureC(r), 2),
                temperature_f: roundTo(toFahrenheit(temperatureC(r)), 2)
              }
            : {})
        }))
      });
    })
  );

  app.get(
    "/api/outdoor",
    route(async (_req, res) => {
      if (!ctx.weather) {
        return res.status(503).json({ success: false, error: "No weather station configured", status: "error" });
      }
      try {
        const now = await ctx.weather.getNow();
        if (now.status === "offline") {
          return res.json({ success: false, error: "Outdoor sensor is offline", ...now });
        }
        return res.json({ success: true, ...now });
      } catch (e: unknown) {
        logger.error({ err: e }, "Outdoor weather fetch failed");
        return res.status(502).json({ success: false, error: errorMessage(e), status: "error" });
      }
    })
  );

  app.get(
    "/api/devices",
    route(async (_req, res) => {
      if (!ctx.goveeClient) return res.json({ devices: [] });
      const fresh = deviceCache && Date.now() - deviceCache.at < ctx.deviceCacheMinutes * 60_000;
      if (!fresh) {
        try {
          deviceCache = { at: Date.now(), devices: await listDevices(ctx.goveeClient) };
        } catch (e: unknown) {
          logger.error({ err: e }, "Govee device list failed; serving previous list");
        }
      }
      return res.json({ devices: deviceCache?.devices ?? [] });
    })
  );

  app.get(
    "/api/device-status",
    route(async (req, res) => {
      const query = DeviceQuery.safeParse(req.query);
      if (!query.success) return badRequest(res, "Device ID is required");
      const { device_id, model } = query.data;
      if (!ctx.goveeClient) {
        return res.status(503).json({ success: false, error: "GOVEE_API_KEY is not configured", device_id, model });
      }
      try {
        const power = await getPowerState(ctx.goveeClient, device_id, model);
        return res.json({
          success: true,
          device_id,
          model,
          power,
          last_commanded: ctx.deps.lastCommanded.get(device_id) ?? null
        });
      } catch (e: unknown) {
        logger.error({ err: e, device_id }, "Govee device status failed");
        return res.status(502).json({ success: false, error: errorMessage(e), device_id, model });
      }
    })
  );

  app.post(
    "/api/control",
    route(async (req, res) => {
      const body = ControlBody.safeParse(req.body);
      if (!body.success) return badRequest(res, "device_id and action (on|off) are required");
      const { device_id, model, action } = body.data;
      const command = action === "on" ? "ON" : "OFF";
      try {
        await sendCommandWithRetry(ctx.deps.controller, { deviceId: device_id, sku: model, command }, ctx.deps.commandRetry);
      } catch (e: unknown) {
        logger.warn({ err: e, device_id, command }, "Manual device command failed");
        return res.status(502).json({ success: false, error: errorMessage(e) });
      }
      ctx.deps.lastCommanded.set(device_id, command);
      logger.info({ device_id, command }, "Manual device command");
      return res.json({ success: true, device_id, command });
    })
  );

  app.get(
    "/api/settings",
    route(async (req, res) => {
      const query = z.object({ device_id: z.string().min(1) }).safeParse(req.query);
      if (!query.success) return badRequest(res, "Device ID is required");
      const stored = await ctx.settings.get(query.data.device_id);
      return res.json({
        success: true,
        stored: stored !== null,
        settings: stored ?? defaultSettings(query.data.device_id)
      });
    })
  );

  app.post(
    "/api/settings",
    route(async (req, res) => {
      const body = z.object({ device_id: z.string().min(1) }).passthrough().safeParse(req.body);
      if (!body.success) return badRequest(res, "Device ID is required");
      const deviceId = body.data.device_id;
      const current = (await ctx.settings.get(deviceId)) ?? defaultSettings(deviceId);

      let merged: DeviceSettings;
      try {
        merged = mergeDeviceSettings(current, body.data);
      } catch (e: unknown) {
        logger.warn({ device_id: deviceId, error: errorMessage(e) }, "Rejected device settings");
        return badRequest(res, errorMessage(e));
      }
      const saved = await ctx.settings.save(merged);
      logger.info({ device_id: deviceId, settings: saved }, "Saved device settings");
      return res.json({ success: true, settings: saved });
    })
  );

  app.post(
    "/api/evaluate",
    route(async (req, res) => {
      const query = z.object({ device_id: z.string().min(1).optional() }).safeParse(req.query);
      if (!query.success) return badRequest(res, "device_id must be a non-empty string");
      const results = query.data.device_id
        ? [await runDeviceCycle(ctx.deps, query.data.device_id)]
        : await runCycleOnce(ctx.deps);
      recordResults(ctx.board, results);
      return res.json({ success: true, results });
    })
  );

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ err }, "Unhandled request error");
    const status = err instanceof InvalidRangeError ? 400 : 500;
    const code = err instanceof GarageControlError ? err.code : "INTERNAL";
    res.status(status).json({ success: false, error: errorMessage(err), code });
  });

  return app;
}

export function startServer(app: express.Express, port: number): Server {
  const server = app.listen(port, () => {
    logger.info({ port }, "HTTP server listening");
  });
  return server;
}
