import pino from "pino";

const redactionPaths = [
  "*.headers.authorization",
  "*.headers['govee-api-key']",
  "*.headers['Govee-API-Key']",
  "*.apiKey",
  "*.api_key",
  "*.GOVEE_API_KEY",
  "*.WEATHER_API_KEY",
  "*.MONGODB_URI"
];

const env = process.env.NODE_ENV;

const pretty =
  env !== "production" && env !== "test"
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      }
    : undefined;

export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? (env === "test" ? "silent" : "info"),
    redact: { paths: redactionPaths, censor: "[REDACTED]" }
  },
  pretty ? pino.transport(pretty) : undefined
);

export type Logger = typeof logger;
