import crypto from "node:crypto";
import { z } from "zod";
import { GoveeDevice, PowerCommand } from "../../types.js";
import { FetchLike, fetchWithTimeout } from "../../utils/fetchWithTimeout.js";
import { logger } from "../../utils/logger.js";

export interface GoveeClientConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

const ON_OFF = { type: "devices.capabilities.on_off", instance: "powerSwitch" } as const;

const CapabilitySchema = z.object({
  type: z.string(),
  instance: z.string(),
  state: z.object({ value: z.unknown() }).partial().optional()
});

export type GoveeCapability = z.infer<typeof CapabilitySchema>;

const DevicesResponseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z
    .array(
      z
        .object({
          device: z.string(),
          sku: z.string(),
          deviceName: z.string().optional(),
          type: z.string().optional()
        })
        .passthrough()
    )
    .default([])
});

const StateResponseSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
  message: z.string().optional(),
  payload: z
    .object({
      capabilities: z.array(CapabilitySchema).default([])
    })
    .passthrough()
    .optional()
});

const ControlResponseSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
  message: z.string().optional()
});

function headers(cfg: GoveeClientConfig): Record<string, string> {
  return {
    "content-type": "application/json",
    "Govee-API-Key": cfg.apiKey
  };
}

function endpoint(cfg: GoveeClientConfig, path: string): string {
  return `${cfg.baseUrl.replace(/\/+$/, "")}${path}`;
}

async function readJson(resp: Response, what: string): Promise<unknown> {
  if (!resp.ok) {
    const text = await resp.text().catch(() => "");
    throw new Error(`Govee ${what} failed: ${resp.status} ${resp.statusText} ${text}`.trim());
  }
  return resp.json();
}

export async function listDevices(cfg: GoveeClientConfig): Promise<GoveeDevice[]> {
  const resp = await fetchWithTimeout(endpoint(cfg, "/user/devices"), {
    method: "GET",
    headers: headers(cfg),
    timeoutMs: cfg.timeoutMs,
    fetchImpl: cfg.fetchImpl
  });
  const body = DevicesResponseSchema.parse(await readJson(resp, "device list"));
  if (body.code !== 200) {
    throw new Error(`Govee device list returned code ${body.code}: ${body.message ?? "unknown error"}`);
  }
  return body.data.map(({ device, sku, deviceName, type }) => ({ device, sku, deviceName, type }));
}

export async function getDeviceCapabilities(
  cfg: GoveeClientConfig,
  device: string,
  sku: string,
  signal?: AbortSignal
): Promise<GoveeCapability[]> {
  const requestId = crypto.randomUUID();
  const resp = await fetchWithTimeout(endpoint(cfg, "/device/state"), {
    method: "POST",
    headers: headers(cfg),
    timeoutMs: cfg.timeoutMs,
    signal,
    fetchImpl: cfg.fetchImpl,
    body: JSON.stringify({ requestId, payload: { sku, device } })
  });
  const body = StateResponseSchema.parse(await readJson(resp, "device state"));
  if (body.code !== 200) {
    throw new Error(`Govee device state returned code ${body.code}: ${body.msg ?? body.message ?? "unknown error"}`);
  }
  return body.payload?.capabilities ?? [];
}

export function findCapabilityValue(capabilities: GoveeCapability[], instance: string): unknown {
  return capabilities.find((c) => c.instance === instance)?.state?.value;
}

/** Power state of a plug; null when the device does not report one. */
export async function getPowerState(cfg: GoveeClientConfig, device: string, sku: string): Promise<boolean | null> {
  const capabilities = await getDeviceCapabilities(cfg, device, sku);
  const match = capabilities.find((c) => c.type === ON_OFF.type && c.instance === ON_OFF.instance);
  const value = match?.state?.value;
  return typeof value === "number" ? value === 1 : null;
}

export async function setPower(cfg: GoveeClientConfig, device: string, sku: string, command: PowerCommand): Promise<void> {
  const requestId = crypto.randomUUID();
  const payload = {
    requestId,
    payload: {
      sku,
      device,
      capability: { ...ON_OFF, value: command === "ON" ? 1 : 0 }
    }
  };
  logger.debug({ device, sku, command, requestId }, "Sending Govee control command");

  const resp = await fetchWithTimeout(endpoint(cfg, "/device/control"), {
    method: "POST",
    headers: headers(cfg),
    timeoutMs: cfg.timeoutMs,
    fetchImpl: cfg.fetchImpl,
    body: JSON.stringify(payload)
  });
  const body = ControlResponseSchema.parse(await readJson(resp, "device control"));
  if (body.code !== 200) {
    throw new Error(`Govee device control returned code ${body.code}: ${body.msg ?? body.message ?? "unknown error"}`);
  }
}
