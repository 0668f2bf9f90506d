import { loadConfig, requirePersistentStore } from "../src/config.js";
import { listDevices } from "../src/adapters/actuators/goveeClient.js";
import { closeMongo } from "../src/adapters/store/mongoStore.js";
import { createRuntime } from "../src/runtime.js";

// Compares device ids with stored settings against the devices the Govee account reports.
const cfg = loadConfig();
requirePersistentStore(cfg, "list-devices");
const runtime = await createRuntime(cfg);
if (!runtime.goveeClient) {
  throw new Error("GOVEE_API_KEY is required to list devices");
}

const stored = (await runtime.settings.list()).map((s) => s.device_id);
const devices = await listDevices(runtime.goveeClient);
const apiIds = devices.map((d) => d.device);

console.log(`Device ids with settings (${stored.length}):`);
for (const id of stored) console.log(`  - ${id}`);

console.log(`\nDevices from Govee (${devices.length}):`);
for (const d of devices) console.log(`  - ${d.device} ${d.sku} ${d.deviceName ?? ""}`.trimEnd());

console.log("\nComparison:");
for (const id of apiIds) {
  console.log(stored.includes(id) ? `  ✓ ${id} has settings` : `  ✗ ${id} has no settings`);
}
for (const id of stored) {
  if (!apiIds.includes(id)) console.log(`  ! ${id} has settings but is not on the account`);
}

await closeMongo();
