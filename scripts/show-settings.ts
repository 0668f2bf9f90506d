import { loadConfig, requirePersistentStore } from "../src/config.js";
import { closeMongo } from "../src/adapters/store/mongoStore.js";
import { createRuntime } from "../src/runtime.js";
import { DeviceSettings, RangeType } from "../src/types.js";

function describeRangeType(type: RangeType): string {
  return type === "inside" ? "satisfied inside range" : "satisfied outside range";
}

function describe(s: DeviceSettings): string {
  const lines = [
    "=".repeat(50),
    `Device ID: ${s.device_id} (${s.sku})`,
    `Actuation: ${s.actuation === "on_when_satisfied" ? "ON when satisfied" : "OFF when satisfied"}`,
    "-".repeat(50),
    "Temperature Control:",
    `  Enabled: ${s.temp_control_enabled}`,
    `  Source: ${s.temp_source}`,
    `  Range: ${s.target_temp_min}°${s.temp_unit} - ${s.target_temp_max}°${s.temp_unit}`,
    `  Function: ${describeRangeType(s.temp_range_type)}`,
    "Humidity Control:",
    `  Enabled: ${s.humidity_control_enabled}`,
    `  Source: ${s.humidity_source}`,
    `  Range: ${s.target_humidity_min}% - ${s.target_humidity_max}%`,
    `  Function: ${describeRangeType(s.humidity_range_type)}`,
    `Last updated: ${s.last_updated ?? "never"}`
  ];
  return lines.join("\n");
}

const cfg = loadConfig();
requirePersistentStore(cfg, "show-settings");
const runtime = await createRuntime(cfg);
const all = await runtime.settings.list();

if (all.length === 0) {
  console.log("No device settings stored.");
}
for (const s of all) console.log(describe(s));

await closeMongo();
