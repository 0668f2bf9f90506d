import { loadConfig } from "../src/config.js";
import { runCycleOnce } from "../src/cycle.js";
import { logger } from "../src/utils/logger.js";
import { createRuntime } from "../src/runtime.js";
import { closeMongo } from "../src/adapters/store/mongoStore.js";

const cfg = loadConfig();
const runtime = await createRuntime(cfg);

const results = await runCycleOnce(runtime.deps);
for (const r of results) {
  logger.info(
    { device_id: r.device_id, status: r.status, command: r.command ?? null, degraded: r.degraded, errors: r.errors },
    "Ran one cycle"
  );
}
await closeMongo();
