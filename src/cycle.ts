import crypto from "node:crypto";
import { sendCommandWithRetry, CommandRetryOptions } from "./adapters/actuators/goveePlug.js";
import {
  CycleTimeoutError,
  DeviceCommandError,
  InvalidRangeError,
  SettingsNotFoundError,
  errorMessage
} from "./errors.js";
import { ReadingsByQuantity, decide, enabledDimensions, validateSettingsRanges } from "./policy/decision.js";
import {
  DecisionResult,
  DeviceController,
  DeviceCycleResult,
  DeviceSettings,
  PowerCommand,
  Quantity,
  Reading,
  SensorReader,
  SettingsStore
} from "./types.js";
import { logger } from "./utils/logger.js";
import { nowUtcIso, withTimeout } from "./utils/time.js";

export interface CycleDeps {
  settings: SettingsStore;
  /** Expected to be a resilient reader: reads substitute degraded values instead of failing. */
  sensors: SensorReader;
  controller: DeviceController;
  /** Last successfully commanded state per device id. */
  lastCommanded: Map<string, PowerCommand>;
  timeoutMs: number;
  commandRetry: CommandRetryOptions;
  /** Cycle currently running per device id; later cycles for the same device queue behind it. */
  inFlight: Map<string, Promise<DeviceCycleResult>>;
  /** Source ids read and recorded every cycle, whether or not a device controls on them. */
  pollSources?: string[];
}

function newCycleId(): string {
  return `cycle_${Date.now()}_${crypto.randomBytes(4).toString("hex")}`;
}

async function evaluate(deps: CycleDeps, settings: DeviceSettings, signal: AbortSignal): Promise<DecisionResult> {
  const readings: ReadingsByQuantity = {};
  for (const { quantity, source } of enabledDimensions(settings)) {
    readings[quantity] = await deps.sensors.read(source, quantity, signal);
  }
  if (signal.aborted) throw signal.reason;
  return decide(settings, readings);
}

function evaluateWithTimeout(deps: CycleDeps, settings: DeviceSettings): Promise<DecisionResult> {
  const controller = new AbortController();
  return withTimeout(evaluate(deps, settings, controller.signal), deps.timeoutMs, () => {
    const err = new CycleTimeoutError(settings.device_id, deps.timeoutMs);
    controller.abort(err);
    return err;
  });
}

async function evaluateDevice(deps: CycleDeps, deviceOrSettings: string | DeviceSettings): Promise<DeviceCycleResult> {
  const deviceId = typeof deviceOrSettings === "string" ? deviceOrSettings : deviceOrSettings.device_id;
  const base: Omit<DeviceCycleResult, "status"> = {
    cycle_id: newCycleId(),
    device_id: deviceId,
    timestamp_utc_iso: nowUtcIso(),
    degraded: false,
    errors: []
  };
  const log = logger.child({ device_id: deviceId, cycle_id: base.cycle_id });

  let settings: DeviceSettings;
  try {
    const loaded = typeof deviceOrSettings === "string" ? await deps.settings.get(deviceId) : deviceOrSettings;
    if (!loaded) throw new SettingsNotFoundError(deviceId);
    settings = loaded;
    validateSettingsRanges(settings);
  } catch (e: unknown) {
    if (e instanceof InvalidRangeError) {
      log.error({ err: e }, "Invalid device settings; leaving device in its last commanded state");
      return { ...base, status: "invalid_settings", errors: [e.message] };
    }
    log.error({ err: e }, "Failed to load device settings");
    return { ...base, status: "error", errors: [errorMessage(e)] };
  }

  let decision: DecisionResult;
  try {
    decision = await evaluateWithTimeout(deps, settings);
  } catch (e: unknown) {
    if (e instanceof CycleTimeoutError) {
      log.error({ timeout_ms: deps.timeoutMs }, "Cycle timed out; no command issued");
      return { ...base, status: "timed_out", errors: [e.message] };
    }
    log.error({ err: e }, "Decision failed");
    return { ...base, status: "error", errors: [errorMessage(e)] };
  }

  const result = { ...base, decision, degraded: decision.degraded };
  if (decision.degraded) {
    log.warn(
      {
        degraded: true,
        temperature_degraded: decision.temperature.reading?.degraded ?? false,
        humidity_degraded: decision.humidity.reading?.degraded ?? false
      },
      "Decision computed from degraded sensor data"
    );
  }

  if (decision.should_be_on === null) {
    log.debug("No control enabled; nothing to do");
    return { ...result, status: "idle" };
  }

  const command: PowerCommand = decision.should_be_on ? "ON" : "OFF";
  const previous = deps.lastCommanded.get(deviceId);
  if (previous === command) {
    log.debug({ command }, "Decision unchanged; not commanding");
    return { ...result, status: "unchanged", command, previous_command: previous };
  }

  try {
    await sendCommandWithRetry(deps.controller, { deviceId, sku: settings.sku, command }, deps.commandRetry);
  } catch (e: unknown) {
    const message = e instanceof DeviceCommandError ? e.message : errorMessage(e);
    log.warn({ err: e, command, previous_command: previous ?? null }, "Device command failed; will retry next cycle");
    return { ...result, status: "command_failed", command, previous_command: previous, errors: [message] };
  }

  deps.lastCommanded.set(deviceId, command);
  log.info(
    {
      command,
      previous_command: previous ?? null,
      temperature_vote: decision.temperature.vote ?? null,
      humidity_vote: decision.humidity.vote ?? null
    },
    "Device commanded"
  );
  return { ...result, status: "commanded", command, previous_command: previous };
}

/**
 * One evaluation for one device: validate settings, read each enabled
 * dimension, decide, and command the plug only when the decision differs
 * from the last commanded state. Never throws; the outcome is in `status`.
 *
 * Cycles for the same device run one after another, so a scheduled tick and
 * an on-demand evaluation never both act on the same last commanded state.
 */
export function runDeviceCycle(deps: CycleDeps, deviceOrSettings: string | DeviceSettings): Promise<DeviceCycleResult> {
  const deviceId = typeof deviceOrSettings === "string" ? deviceOrSettings : deviceOrSettings.device_id;
  const previous = deps.inFlight.get(deviceId);
  const run = previous
    ? previous.then(() => evaluateDevice(deps, deviceOrSettings))
    : evaluateDevice(deps, deviceOrSettings);
  deps.inFlight.set(deviceId, run);
  return run.finally(() => {
    if (deps.inFlight.get(deviceId) === run) deps.inFlight.delete(deviceId);
  });
}

/**
 * Reads both quantities from every polled source so that history and the
 * sensor API stay current for sources no device controls on. Failures are
 * absorbed by the resilient reader; a read that outlives the cycle timeout
 * is abandoned.
 */
export async function pollSensors(deps: CycleDeps): Promise<Reading[]> {
  const quantities: Quantity[] = ["temperature", "humidity"];
  const perSource = await Promise.all(
    (deps.pollSources ?? []).map(async (source) => {
      const readings: Reading[] = [];
      for (const quantity of quantities) {
        const controller = new AbortController();
        try {
          const reading = await withTimeout(deps.sensors.read(source, quantity, controller.signal), deps.timeoutMs, () => {
            const err = new Error(`Polling ${source} ${quantity} timed out after ${deps.timeoutMs}ms`);
            controller.abort(err);
            return err;
          });
          readings.push(reading);
        } catch (e: unknown) {
          logger.warn({ source, quantity, err: e }, "Sensor poll failed");
        }
      }
      return readings;
    })
  );
  return perSource.flat();
}

/** Polls the configured sources, then evaluates every stored device concurrently. */
export async function runCycleOnce(deps: CycleDeps): Promise<DeviceCycleResult[]> {
  const started = Date.now();
  const polled = await pollSensors(deps);
  const all = await deps.settings.list();
  logger.info({ devices: all.length, polled: polled.length }, "Cycle start");

  const results = await Promise.all(all.map((s) => runDeviceCycle(deps, s)));

  logger.info(
    {
      duration_ms: Date.now() - started,
      commanded: results.filter((r) => r.status === "commanded").length,
      failed: results.filter((r) => r.errors.length > 0).length,
      degraded: results.filter((r) => r.degraded).length
    },
    "Cycle complete"
  );
  return results;
}
