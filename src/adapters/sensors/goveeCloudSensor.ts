import { SensorUnavailableError, errorMessage } from "../../errors.js";
import { createReading } from "../../readings.js";
import { Quantity, Reading } from "../../types.js";
import { GoveeClientConfig, findCapabilityValue, getDeviceCapabilities } from "../actuators/goveeClient.js";

function unwrapHumidity(v: unknown): unknown {
  if (v && typeof v === "object" && "currentHumidity" in v) {
    return v.currentHumidity;
  }
  return v;
}

/**
 * Reads a Wi-Fi thermo-hygrometer through the Govee OpenAPI. The cloud
 * reports `sensorTemperature` in °F.
 */
export async function readFromGoveeCloud(params: {
  client: GoveeClientConfig;
  sourceId: string;
  device: string;
  sku: string;
  quantity: Quantity;
  signal?: AbortSignal;
}): Promise<Reading> {
  const capabilities = await getDeviceCapabilities(params.client, params.device, params.sku, params.signal).catch(
    (e: unknown) => {
      throw new SensorUnavailableError(params.sourceId, errorMessage(e), { cause: e });
    }
  );

  if (params.quantity === "temperature") {
    return createReading({
      source: params.sourceId,
      quantity: "temperature",
      value: findCapabilityValue(capabilities, "sensorTemperature"),
      unit: "F"
    });
  }
  return createReading({
    source: params.sourceId,
    quantity: "humidity",
    value: unwrapHumidity(findCapabilityValue(capabilities, "sensorHumidity")),
    unit: "%RH"
  });
}
