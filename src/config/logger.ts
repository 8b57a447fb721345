import winston from "winston";
import { z } from "zod";

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

// Unknown values fall back to the defaults.
const logEnvSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).catch("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).catch("info"),
});

const logEnv = logEnvSchema.parse({ nodeEnv: process.env.NODE_ENV, logLevel: process.env.LOG_LEVEL });

const devFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(ts)} ${level}: ${String(message)}${extra}`;
});

export const logger = winston.createLogger({
  level: logEnv.logLevel,
  defaultMeta: { service: "gpu-pilot" },
  format:
    logEnv.nodeEnv === "production"
      ? combine(timestamp(), errors({ stack: true }), json())
      : combine(colorize(), timestamp(), errors({ stack: true }), devFormat),
  transports: [new winston.transports.Console({ silent: logEnv.nodeEnv === "test" })],
});
