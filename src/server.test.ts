import assert from "node:assert/strict";
import type { Server } from "node:http";
import { after, before, test } from "node:test";
import { z } from "zod";
import { memoryReadingStore, memorySettingsStore } from "./adapters/store/memoryStore.js";
import { CycleDeps } from "./cycle.js";
import { parseSensorsConfig } from "./sensorsConfig.js";
import { createApp, createCycleBoard } from "./server.js";
import { reading } from "./testing/fixtures.js";
import { PowerCommand, Quantity, Reading } from "./types.js";

const sent: { deviceId: string; command: PowerCommand }[] = [];
const readings = memoryReadingStore();
const settings = memorySettingsStore();

const deps: CycleDeps = {
  settings,
  sensors: {
    async read(source: string, quantity: Quantity): Promise<Reading> {
      return quantity === "temperature"
        ? reading("temperature", 70, "F", { source })
        : reading("humidity", 45, "%RH", { source });
    }
  },
  controller: {
    async setPower(deviceId: string, _sku: string, command: PowerCommand) {
      sent.push({ deviceId, command });
    }
  },
  lastCommanded: new Map(),
  timeoutMs: 1_000,
  commandRetry: { attempts: 1, baseDelayMs: 0 },
  inFlight: new Map()
};

const app = createApp({
  settings,
  readings,
  sensorsConfig: parseSensorsConfig(
    {
      aliases: { inside: "garage" },
      sources: [{ id: "garage", kind: "feed_file", path: "current_sensor.json" }]
    },
    "/tmp"
  ),
  deps,
  board: createCycleBoard(),
  deviceCacheMinutes: 5
});

let server: Server;
let baseUrl = "";

before(async () => {
  server = app.listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("Expected a TCP address");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

const SettingsResponse = z.object({
  stored: z.boolean(),
  settings: z.object({
    device_id: z.string(),
    temp_control_enabled: z.boolean(),
    target_temp_min: z.number(),
    target_temp_max: z.number(),
    temp_range_type: z.string(),
    last_updated: z.string().optional()
  })
});

const EvaluateResponse = z.object({
  results: z.array(z.object({ device_id: z.string(), status: z.string(), command: z.string().optional() }))
});

const HealthResponse = z.object({
  devices: z.array(z.object({ device_id: z.string(), command: z.string().nullable() }))
});

async function getSettings(deviceId: string) {
  const res = await fetch(`${baseUrl}/api/settings?device_id=${deviceId}`);
  assert.equal(res.status, 200);
  return SettingsResponse.parse(await res.json());
}

function post(path: string, body: unknown = {}): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });
}

test("unsaved devices report default settings", async () => {
  const json = await getSettings("plug-9");
  assert.equal(json.stored, false);
  assert.equal(json.settings.device_id, "plug-9");
  assert.equal(json.settings.target_temp_min, 65);
  assert.equal(json.settings.temp_range_type, "outside");
});

test("settings with min above max are rejected", async () => {
  const res = await post("/api/settings", {
    device_id: "plug-1",
    temp_control_enabled: true,
    target_temp_min: 80,
    target_temp_max: 70
  });
  assert.equal(res.status, 400);
  assert.deepEqual(await res.json(), {
    success: false,
    error: "Invalid temperature range for plug-1: min 80 is greater than max 70"
  });
  assert.equal(await settings.get("plug-1"), null);
});

test("valid settings are merged over the defaults and stored", async () => {
  const res = await post("/api/settings", {
    device_id: "plug-1",
    temp_control_enabled: true,
    temp_range_type: "inside"
  });
  assert.equal(res.status, 200);

  const stored = await getSettings("plug-1");
  assert.equal(stored.stored, true);
  assert.equal(stored.settings.temp_control_enabled, true);
  assert.equal(stored.settings.temp_range_type, "inside");
  assert.equal(stored.settings.target_temp_max, 75);
  assert.equal(typeof stored.settings.last_updated, "string");
});

test("evaluate runs a cycle and healthz reports it", async () => {
  const res = await post("/api/evaluate?device_id=plug-1");
  assert.equal(res.status, 200);
  const json = EvaluateResponse.parse(await res.json());
  assert.equal(json.results[0].status, "commanded");
  assert.equal(json.results[0].command, "ON");
  assert.deepEqual(sent, [{ deviceId: "plug-1", command: "ON" }]);

  const health = HealthResponse.parse(await (await fetch(`${baseUrl}/healthz`)).json());
  assert.equal(health.devices[0].device_id, "plug-1");
  assert.equal(health.devices[0].command, "ON");
});

test("sensor data resolves the inside alias and derives psychrometrics", async () => {
  await readings.record(reading("temperature", 20, "C", { source: "garage" }));
  await readings.record(reading("humidity", 50, "%RH", { source: "garage" }));

  const res = await fetch(`${baseUrl}/api/sensor-data?source=inside`);
  assert.deepEqual(await res.json(), {
    source: "garage",
    status: "online",
    temperature: 20,
    temperature_f: 68,
    humidity: 50,
    dew_point: 9.26,
    dew_point_f: 48.66,
    abs_humidity: 8.62,
    steam_pressure: 11.66,
    timestamp: "2024-03-01T12:00:00.000Z"
  });
});

test("outdoor weather without a station is unavailable", async () => {
  const res = await fetch(`${baseUrl}/api/outdoor`);
  assert.equal(res.status, 503);
});

test("manual control records the commanded state", async () => {
  const res = await post("/api/control", { device_id: "plug-2", action: "off" });
  assert.equal(res.status, 200);
  assert.equal(deps.lastCommanded.get("plug-2"), "OFF");

  const bad = await post("/api/control", { device_id: "plug-2", action: "toggle" });
  assert.equal(bad.status, 400);
});
