export type TemperatureUnit = "C" | "F";
export type ReadingUnit = TemperatureUnit | "%RH";
export type Quantity = "temperature" | "humidity";
export type RangeType = "inside" | "outside";
export type Actuation = "on_when_satisfied" | "off_when_satisfied";
export type PowerCommand = "ON" | "OFF";

/**
 * Per-plug control configuration. Field names match the JSON the settings
 * API accepts and returns.
 */
export interface DeviceSettings {
  device_id: string;
  sku: string;
  actuation: Actuation;

  temp_control_enabled: boolean;
  temp_source: string;
  temp_unit: TemperatureUnit;
  target_temp_min: number;
  target_temp_max: number;
  temp_range_type: RangeType;

  humidity_control_enabled: boolean;
  humidity_source: string;
  target_humidity_min: number;
  target_humidity_max: number;
  humidity_range_type: RangeType;

  last_updated?: string;
}

export interface Reading {
  readonly source: string;
  readonly quantity: Quantity;
  readonly value: number;
  readonly unit: ReadingUnit;
  readonly timestamp: string;
  readonly degraded: boolean;
}

export interface DimensionDecision {
  quantity: Quantity;
  enabled: boolean;
  source?: string;
  reading?: Reading;
  value_in_range_unit?: number;
  range?: { min: number; max: number; unit: ReadingUnit; type: RangeType };
  satisfied?: boolean;
  vote?: boolean;
}

export interface DecisionResult {
  device_id: string;
  temperature: DimensionDecision;
  humidity: DimensionDecision;
  /** null when no dimension is enabled. */
  should_be_on: boolean | null;
  degraded: boolean;
}

export type CycleStatus =
  | "commanded"
  | "unchanged"
  | "idle"
  | "invalid_settings"
  | "command_failed"
  | "timed_out"
  | "error";

export interface DeviceCycleResult {
  cycle_id: string;
  device_id: string;
  timestamp_utc_iso: string;
  status: CycleStatus;
  decision?: DecisionResult;
  command?: PowerCommand;
  previous_command?: PowerCommand;
  degraded: boolean;
  errors: string[];
}

export interface WeatherNow {
  station_id: string;
  temp_f: number | null;
  rh_pct: number | null;
  dew_point_f?: number | null;
  wind_dir_deg?: number | null;
  wind_mph?: number | null;
  wind_gust_mph?: number | null;
  pressure_inhg?: number | null;
  precip_rate_in_hr?: number | null;
  precip_total_in?: number | null;
  uv?: number | null;
  observation_time_local?: string | null;
  observation_time_utc: string;
  status: "online" | "offline";
}

export interface GoveeDevice {
  device: string;
  sku: string;
  deviceName?: string;
  type?: string;
}

export interface SensorReader {
  read(source: string, quantity: Quantity, signal?: AbortSignal): Promise<Reading>;
}

export interface DeviceController {
  setPower(deviceId: string, sku: string, command: PowerCommand): Promise<void>;
}

export interface SettingsStore {
  get(deviceId: string): Promise<DeviceSettings | null>;
  list(): Promise<DeviceSettings[]>;
  save(settings: DeviceSettings): Promise<DeviceSettings>;
}

export interface StoredReading extends Reading {
  status: "online" | "offline";
}

export interface ReadingStore {
  record(reading: Reading): Promise<void>;
  latest(source: string, quantity: Quantity): Promise<StoredReading | null>;
  since(source: string, from: Date): Promise<StoredReading[]>;
}
