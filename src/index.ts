import { loadConfig } from "./config.js";
import { logger } from "./utils/logger.js";
import { runCycleOnce } from "./cycle.js";
import { createApp, createCycleBoard, recordResults, startServer } from "./server.js";
import { createRuntime } from "./runtime.js";
import { nowUtcIso } from "./utils/time.js";

const cfg = loadConfig();
const runtime = await createRuntime(cfg);
const board = createCycleBoard();

startServer(
  createApp({
    settings: runtime.settings,
    readings: runtime.readings,
    sensorsConfig: runtime.sensorsConfig,
    deps: runtime.deps,
    board,
    goveeClient: runtime.goveeClient,
    weather: runtime.weather,
    deviceCacheMinutes: cfg.DEVICE_CACHE_MINUTES
  }),
  cfg.PORT
);

let running = false;

async function tick() {
  if (running) {
    logger.warn("Cycle skipped: previous cycle still running");
    return;
  }
  running = true;
  const startedUtc = nowUtcIso();
  try {
    recordResults(board, await runCycleOnce(runtime.deps), startedUtc);
  } catch (e: unknown) {
    logger.error({ err: e }, "Cycle crashed");
  } finally {
    running = false;
  }
}

const intervalMs = cfg.CYCLE_MINUTES * 60_000;

logger.info(
  { cycle_minutes: cfg.CYCLE_MINUTES, dry_run: cfg.DRY_RUN, store: cfg.STORE },
  "Starting garage climate control loop"
);

// Run immediately, then on interval.
void tick();
setInterval(() => void tick(), intervalMs);
