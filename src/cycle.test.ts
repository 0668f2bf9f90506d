import assert from "node:assert/strict";
import { test } from "node:test";
import { createResilientReader } from "./adapters/sensors/resilientReader.js";
import { memoryReadingStore, memorySettingsStore } from "./adapters/store/memoryStore.js";
import { CycleDeps, pollSensors, runCycleOnce, runDeviceCycle } from "./cycle.js";
import { SensorUnavailableError } from "./errors.js";
import { reading, settingsFor } from "./testing/fixtures.js";
import { DeviceController, DeviceSettings, PowerCommand, Quantity, Reading, SensorReader } from "./types.js";

type Sent = { deviceId: string; sku: string; command: PowerCommand };

function fixedReader(values: Partial<Record<Quantity, Reading>>): SensorReader & { reads: Quantity[] } {
  const reads: Quantity[] = [];
  return {
    reads,
    async read(source: string, quantity: Quantity): Promise<Reading> {
      reads.push(quantity);
      const value = values[quantity];
      if (!value) throw new SensorUnavailableError(source, `no ${quantity} scripted`);
      return value;
    }
  };
}

function recordingController(): DeviceController & { sent: Sent[]; failing: boolean } {
  const sent: Sent[] = [];
  const controller = {
    sent,
    failing: false,
    async setPower(deviceId: string, sku: string, command: PowerCommand): Promise<void> {
      if (controller.failing) throw new Error("plug unreachable");
      controller.sent.push({ deviceId, sku, command });
    }
  };
  return controller;
}

function depsFor(
  settings: DeviceSettings[],
  sensors: SensorReader,
  controller: DeviceController,
  timeoutMs = 1_000
): CycleDeps {
  return {
    settings: memorySettingsStore(settings),
    sensors,
    controller,
    lastCommanded: new Map(),
    timeoutMs,
    commandRetry: { attempts: 2, baseDelayMs: 0 },
    inFlight: new Map()
  };
}

const placeholders = {
  temperature: { value: 20, unit: "C" as const },
  humidity: { value: 50, unit: "%RH" as const }
};

const heaterPlug = settingsFor("plug-1", {
  temp_control_enabled: true,
  target_temp_min: 65,
  target_temp_max: 75,
  temp_range_type: "inside"
});

test("a repeated decision commands the plug only once", async () => {
  const controller = recordingController();
  const deps = depsFor([heaterPlug], fixedReader({ temperature: reading("temperature", 70, "F") }), controller);

  const first = await runDeviceCycle(deps, "plug-1");
  assert.equal(first.status, "commanded");
  assert.equal(first.command, "ON");
  assert.equal(first.previous_command, undefined);

  const second = await runDeviceCycle(deps, "plug-1");
  assert.equal(second.status, "unchanged");
  assert.equal(second.command, "ON");
  assert.equal(second.previous_command, "ON");

  assert.deepEqual(controller.sent, [{ deviceId: "plug-1", sku: "H5080", command: "ON" }]);
});

test("a failed command leaves the state unchanged so the next cycle retries", async () => {
  const controller = recordingController();
  controller.failing = true;
  const deps = depsFor([heaterPlug], fixedReader({ temperature: reading("temperature", 70, "F") }), controller);

  const failed = await runDeviceCycle(deps, "plug-1");
  assert.equal(failed.status, "command_failed");
  assert.deepEqual(failed.errors, ["Command to plug-1 failed: ON after 2 attempts: plug unreachable"]);
  assert.equal(deps.lastCommanded.has("plug-1"), false);

  controller.failing = false;
  const retried = await runDeviceCycle(deps, "plug-1");
  assert.equal(retried.status, "commanded");
  assert.equal(deps.lastCommanded.get("plug-1"), "ON");
});

test("inverted ranges are rejected before any read or command", async () => {
  const sensors = fixedReader({ temperature: reading("temperature", 70, "F") });
  const controller = recordingController();
  const broken = settingsFor("plug-1", { temp_control_enabled: true, target_temp_min: 80, target_temp_max: 70 });
  const deps = depsFor([broken], sensors, controller);

  const result = await runDeviceCycle(deps, "plug-1");
  assert.equal(result.status, "invalid_settings");
  assert.deepEqual(result.errors, ["Invalid temperature range for plug-1: min 80 is greater than max 70"]);
  assert.deepEqual(sensors.reads, []);
  assert.deepEqual(controller.sent, []);
});

test("a cycle that outlives its timeout issues no command", async () => {
  const hanging: SensorReader = {
    read: (_source, _quantity, signal) =>
      new Promise<Reading>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(signal?.reason), { once: true });
      })
  };
  const controller = recordingController();
  const deps = depsFor([heaterPlug], hanging, controller, 20);

  const result = await runDeviceCycle(deps, "plug-1");
  assert.equal(result.status, "timed_out");
  assert.deepEqual(result.errors, ["Cycle for plug-1 timed out after 20ms"]);
  assert.deepEqual(controller.sent, []);
  assert.equal(deps.lastCommanded.has("plug-1"), false);
});

test("an unavailable sensor falls back to the degraded placeholder and still decides", async () => {
  const inner = fixedReader({});
  const sensors = createResilientReader(inner, {
    attempts: 3,
    baseDelayMs: 0,
    placeholders: {
      temperature: { value: 20, unit: "C" },
      humidity: { value: 50, unit: "%RH" }
    }
  });
  const controller = recordingController();
  const deps = depsFor([heaterPlug], sensors, controller);

  const result = await runDeviceCycle(deps, "plug-1");
  assert.equal(inner.reads.length, 3);
  assert.equal(result.status, "commanded");
  assert.equal(result.command, "ON");
  assert.equal(result.degraded, true);
  assert.equal(result.decision?.temperature.reading?.value, 20);
  assert.equal(result.decision?.temperature.value_in_range_unit, 68);
});

test("either dimension voting on turns the plug on", async () => {
  const settings = settingsFor("dehumidifier", {
    temp_control_enabled: true,
    target_temp_min: 65,
    target_temp_max: 75,
    temp_range_type: "inside",
    humidity_control_enabled: true,
    target_humidity_min: 40,
    target_humidity_max: 55,
    humidity_range_type: "outside"
  });
  const sensors = fixedReader({
    temperature: reading("temperature", 80, "F"),
    humidity: reading("humidity", 62, "%RH")
  });
  const controller = recordingController();
  const deps = depsFor([settings], sensors, controller);

  const result = await runDeviceCycle(deps, "dehumidifier");
  assert.equal(result.decision?.temperature.vote, false);
  assert.equal(result.decision?.humidity.vote, true);
  assert.equal(result.status, "commanded");
  assert.equal(result.command, "ON");
  assert.deepEqual(sensors.reads, ["temperature", "humidity"]);
});

test("off_when_satisfied turns the plug off inside the range", async () => {
  const settings = settingsFor("fan", {
    actuation: "off_when_satisfied",
    humidity_control_enabled: true,
    target_humidity_min: 40,
    target_humidity_max: 55,
    humidity_range_type: "inside"
  });
  const controller = recordingController();
  const deps = depsFor([settings], fixedReader({ humidity: reading("humidity", 48, "%RH") }), controller);

  const result = await runDeviceCycle(deps, "fan");
  assert.equal(result.command, "OFF");
  assert.deepEqual(controller.sent, [{ deviceId: "fan", sku: "H5080", command: "OFF" }]);
});

test("a device with no control enabled stays idle", async () => {
  const sensors = fixedReader({});
  const controller = recordingController();
  const deps = depsFor([settingsFor("plug-2")], sensors, controller);

  const result = await runDeviceCycle(deps, "plug-2");
  assert.equal(result.status, "idle");
  assert.equal(result.decision?.should_be_on, null);
  assert.deepEqual(sensors.reads, []);
  assert.deepEqual(controller.sent, []);
});

test("an unknown device id reports an error", async () => {
  const deps = depsFor([], fixedReader({}), recordingController());
  const result = await runDeviceCycle(deps, "ghost");
  assert.equal(result.status, "error");
  assert.deepEqual(result.errors, ["No settings stored for device ghost"]);
});

test("runCycleOnce evaluates every stored device", async () => {
  const controller = recordingController();
  const deps = depsFor(
    [settingsFor("plug-2"), heaterPlug],
    fixedReader({ temperature: reading("temperature", 70, "F") }),
    controller
  );

  const results = await runCycleOnce(deps);
  assert.deepEqual(
    results.map((r) => [r.device_id, r.status]),
    [
      ["plug-1", "commanded"],
      ["plug-2", "idle"]
    ]
  );
});

test("concurrent cycles for one device send a single command", async () => {
  const sent: PowerCommand[] = [];
  const slowController: DeviceController = {
    async setPower(_deviceId: string, _sku: string, command: PowerCommand) {
      await new Promise((resolve) => setTimeout(resolve, 20));
      sent.push(command);
    }
  };
  const deps = depsFor([heaterPlug], fixedReader({ temperature: reading("temperature", 70, "F") }), slowController);

  const [scheduled, onDemand] = await Promise.all([runCycleOnce(deps), runDeviceCycle(deps, "plug-1")]);
  assert.deepEqual(sent, ["ON"]);
  assert.equal(onDemand.status, "commanded");
  assert.equal(scheduled[0].status, "unchanged");
  assert.equal(deps.inFlight.size, 0);
});

test("polled sources are recorded even when no device controls on them", async () => {
  const store = memoryReadingStore();
  const inner = fixedReader({
    temperature: reading("temperature", 21.5, "C", { source: "garage" }),
    humidity: reading("humidity", 48, "%RH", { source: "garage" })
  });
  const sensors = createResilientReader(inner, { attempts: 1, baseDelayMs: 0, placeholders, store });
  const tempOnly = settingsFor("plug-1", {
    temp_control_enabled: true,
    temp_source: "garage",
    temp_unit: "C",
    target_temp_min: 18,
    target_temp_max: 24,
    temp_range_type: "inside"
  });
  const deps: CycleDeps = { ...depsFor([tempOnly], sensors, recordingController()), pollSources: ["garage"] };

  const results = await runCycleOnce(deps);
  assert.equal(results[0].status, "commanded");
  assert.deepEqual(inner.reads, ["temperature", "humidity", "temperature"]);

  const humidity = await store.latest("garage", "humidity");
  assert.equal(humidity?.value, 48);
  assert.equal(humidity?.status, "online");
});

test("a failing polled source is recorded as offline", async () => {
  const store = memoryReadingStore();
  const sensors = createResilientReader(fixedReader({}), { attempts: 1, baseDelayMs: 0, placeholders, store });
  const deps: CycleDeps = { ...depsFor([], sensors, recordingController()), pollSources: ["garage"] };

  const polled = await pollSensors(deps);
  assert.deepEqual(
    polled.map((r) => [r.quantity, r.value, r.degraded]),
    [
      ["temperature", 20, true],
      ["humidity", 50, true]
    ]
  );
  const temperature = await store.latest("garage", "temperature");
  assert.equal(temperature?.status, "offline");
});
