import {
  DeviceSettings,
  Quantity,
  Reading,
  ReadingStore,
  SettingsStore,
  StoredReading
} from "../../types.js";
import { nowUtcIso } from "../../utils/time.js";

export function memorySettingsStore(initial: DeviceSettings[] = []): SettingsStore {
  const byId = new Map(initial.map((s) => [s.device_id, { ...s }]));

  return {
    async get(deviceId: string) {
      const found = byId.get(deviceId);
      return found ? { ...found } : null;
    },
    async list() {
      return [...byId.values()]
        .sort((a, b) => a.device_id.localeCompare(b.device_id))
        .map((s) => ({ ...s }));
    },
    async save(settings: DeviceSettings) {
      const saved = { ...settings, last_updated: nowUtcIso() };
      byId.set(saved.device_id, saved);
      return { ...saved };
    }
  };
}

/** Keeps at most `maxPerSource` readings per source, oldest dropped first. */
export function memoryReadingStore(maxPerSource = 5_000): ReadingStore {
  const bySource = new Map<string, StoredReading[]>();

  return {
    async record(reading: Reading) {
      const list = bySource.get(reading.source) ?? [];
      list.push({ ...reading, status: reading.degraded ? "offline" : "online" });
      list.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
      if (list.length > maxPerSource) list.splice(0, list.length - maxPerSource);
      bySource.set(reading.source, list);
    },
    async latest(source: string, quantity: Quantity) {
      const list = bySource.get(source) ?? [];
      for (let i = list.length - 1; i >= 0; i--) {
        if (list[i].quantity === quantity) return { ...list[i] };
      }
      return null;
    },
    async since(source: string, from: Date) {
      const fromIso = from.toISOString();
      return (bySource.get(source) ?? []).filter((r) => r.timestamp >= fromIso).map((r) => ({ ...r }));
    }
  };
}
