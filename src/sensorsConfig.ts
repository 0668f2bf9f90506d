import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "./errors.js";

const FeedFileSourceSchema = z.object({
  id: z.string().min(1),
  kind: z.literal("feed_file"),
  label: z.string().optional(),
  path: z.string().min(1)
});

const GoveeCloudSourceSchema = z.object({
  id: z.string().min(1),
  kind: z.literal("govee_cloud"),
  label: z.string().optional(),
  device: z.string().min(1),
  sku: z.string().min(1)
});

const WeatherSourceSchema = z.object({
  id: z.string().min(1),
  kind: z.literal("weather"),
  label: z.string().optional()
});

const SensorSourceSchema = z.discriminatedUnion("kind", [
  FeedFileSourceSchema,
  GoveeCloudSourceSchema,
  WeatherSourceSchema
]);

const SensorsConfigSchema = z
  .object({
    aliases: z
      .object({
        inside: z.string().min(1),
        outside: z.string().min(1)
      })
      .partial()
      .default({}),
    sources: z.array(SensorSourceSchema).min(1)
  })
  .superRefine((cfg, ctx) => {
    const ids = new Set<string>();
    for (const source of cfg.sources) {
      if (ids.has(source.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate sensor source id: ${source.id}` });
      }
      ids.add(source.id);
    }
    for (const [alias, target] of Object.entries(cfg.aliases)) {
      if (target && !ids.has(target)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Alias ${alias} points at unknown source ${target}` });
      }
    }
  });

export type SensorSource = z.infer<typeof SensorSourceSchema>;
export type SensorsConfig = z.infer<typeof SensorsConfigSchema> & { baseDir: string };

export function parseSensorsConfig(raw: unknown, baseDir: string): SensorsConfig {
  try {
    return { ...SensorsConfigSchema.parse(raw), baseDir };
  } catch (e: unknown) {
    throw new Error(`Sensors config validation error: ${errorMessage(e)}`);
  }
}

export function loadSensorsConfig(configPath: string): SensorsConfig {
  const resolvedPath = path.resolve(configPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, "utf-8");
  } catch (e: unknown) {
    throw new Error(`Failed to read sensors config at ${resolvedPath}: ${errorMessage(e)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    throw new Error(`Sensors config JSON parse error (${resolvedPath}): ${errorMessage(e)}`);
  }

  return parseSensorsConfig(parsed, path.dirname(resolvedPath));
}

/** Maps "inside"/"outside" onto configured source ids; other ids pass through. */
export function resolveSourceId(cfg: SensorsConfig, source: string): string {
  if (source === "inside" || source === "outside") {
    return cfg.aliases[source] ?? source;
  }
  return source;
}

export function findSource(cfg: SensorsConfig, source: string): SensorSource | undefined {
  const id = resolveSourceId(cfg, source);
  return cfg.sources.find((s) => s.id === id);
}
