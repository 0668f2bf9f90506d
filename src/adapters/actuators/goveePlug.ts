import { DeviceCommandError, errorMessage } from "../../errors.js";
import { DeviceController, PowerCommand } from "../../types.js";
import { logger } from "../../utils/logger.js";
import { retry } from "../../utils/retry.js";
import { GoveeClientConfig, setPower } from "./goveeClient.js";

export interface GoveePlugConfig {
  client?: GoveeClientConfig;
  dryRun: boolean;
}

export function createGoveePlugController(cfg: GoveePlugConfig): DeviceController {
  return {
    async setPower(deviceId: string, sku: string, command: PowerCommand): Promise<void> {
      if (cfg.dryRun) {
        logger.info({ device_id: deviceId, sku, command }, "DRY_RUN: skipping Govee plug command");
        return;
      }
      if (!cfg.client) {
        throw new Error("Govee client missing API key configuration");
      }
      await setPower(cfg.client, deviceId, sku, command);
    }
  };
}

export interface CommandRetryOptions {
  attempts: number;
  baseDelayMs: number;
}

/** Sends a power command, retrying transient failures before raising DeviceCommandError. */
export async function sendCommandWithRetry(
  controller: DeviceController,
  params: { deviceId: string; sku: string; command: PowerCommand },
  opts: CommandRetryOptions
): Promise<void> {
  try {
    await retry(() => controller.setPower(params.deviceId, params.sku, params.command), {
      attempts: opts.attempts,
      baseDelayMs: opts.baseDelayMs,
      onRetry: (err, attempt) =>
        logger.warn(
          { device_id: params.deviceId, command: params.command, attempt, err },
          "Device command failed; retrying"
        )
    });
  } catch (e: unknown) {
    throw new DeviceCommandError(params.deviceId, `${params.command} after ${opts.attempts} attempts: ${errorMessage(e)}`, {
      cause: e
    });
  }
}
