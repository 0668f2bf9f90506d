import { MongoClient, Db, Collection } from "mongodb";
import {
  DeviceSettings,
  Quantity,
  Reading,
  ReadingStore,
  SettingsStore,
  StoredReading
} from "../../types.js";
import { logger } from "../../utils/logger.js";
import { nowUtcIso } from "../../utils/time.js";

export interface MongoStoreConfig {
  uri: string;
  dbName: string;
  settingsCollection?: string;
  readingsCollection?: string;
}

export interface DeviceSettingsDocument extends DeviceSettings {
  _id: string;
}

export interface ReadingDocument extends StoredReading {
  timestamp_utc: Date;
}

export interface MongoStore {
  client: MongoClient;
  db: Db;
  settingsCollection: Collection<DeviceSettingsDocument>;
  readingsCollection: Collection<ReadingDocument>;
}

let cachedStore: MongoStore | null = null;

async function ensureIndexes(readings: Collection<ReadingDocument>) {
  const indexSpecs: Record<string, 1 | -1>[] = [
    { timestamp_utc: -1 },
    { source: 1, quantity: 1, timestamp_utc: -1 }
  ];

  for (const keys of indexSpecs) {
    try {
      await readings.createIndex(keys);
    } catch (err) {
      logger.warn({ err, keys }, "Unable to create MongoDB index; continuing");
    }
  }
}

export async function initMongo(cfg: MongoStoreConfig): Promise<MongoStore> {
  if (cachedStore) return cachedStore;

  const client = new MongoClient(cfg.uri);
  await client.connect();
  const db = client.db(cfg.dbName);
  const settingsCollection = db.collection<DeviceSettingsDocument>(cfg.settingsCollection ?? "device_settings");
  const readingsCollection = db.collection<ReadingDocument>(cfg.readingsCollection ?? "readings");
  await ensureIndexes(readingsCollection);

  cachedStore = { client, db, settingsCollection, readingsCollection };
  return cachedStore;
}

export async function closeMongo(): Promise<void> {
  if (!cachedStore) return;
  await cachedStore.client.close();
  cachedStore = null;
}

function toSettings(doc: DeviceSettingsDocument): DeviceSettings {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  const { _id, ...rest } = doc;
  return rest;
}

function toStoredReading(doc: ReadingDocument): StoredReading {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  const { timestamp_utc, ...rest } = doc;
  return rest;
}

export function mongoSettingsStore(store: MongoStore): SettingsStore {
  return {
    async get(deviceId: string): Promise<DeviceSettings | null> {
      const doc = await store.settingsCollection.findOne({ _id: deviceId });
      return doc ? toSettings(doc) : null;
    },

    async list(): Promise<DeviceSettings[]> {
      const docs = await store.settingsCollection.find({}, { sort: { _id: 1 } }).toArray();
      return docs.map(toSettings);
    },

    async save(settings: DeviceSettings): Promise<DeviceSettings> {
      const saved: DeviceSettings = { ...settings, last_updated: nowUtcIso() };
      // Upserting on an _id filter stores the device id as the document _id.
      await store.settingsCollection.replaceOne({ _id: saved.device_id }, saved, { upsert: true });
      return saved;
    }
  };
}

export function mongoReadingStore(store: MongoStore): ReadingStore {
  return {
    async record(reading: Reading): Promise<void> {
      await store.readingsCollection.insertOne({
        ...reading,
        status: reading.degraded ? "offline" : "online",
        timestamp_utc: new Date(reading.timestamp)
      });
    },

    async latest(source: string, quantity: Quantity): Promise<StoredReading | null> {
      const doc = await store.readingsCollection.findOne(
        { source, quantity },
        { sort: { timestamp_utc: -1 }, projection: { _id: 0 } }
      );
      return doc ? toStoredReading(doc) : null;
    },

    async since(source: string, from: Date): Promise<StoredReading[]> {
      const docs = await store.readingsCollection
        .find({ source, timestamp_utc: { $gte: from } }, { sort: { timestamp_utc: 1 }, projection: { _id: 0 } })
        .toArray();
      return docs.map(toStoredReading);
    }
  };
}
