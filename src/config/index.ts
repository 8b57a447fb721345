import { z } from "zod";
import { ConfigurationError } from "../instances/errors.js";
import { DEFAULT_PLATFORM_BASE_URL } from "../instances/types.js";

/** Platform API connection settings. The API key is optional here; the client rejects an empty one. */
export const platformConfigSchema = z.object({
  apiKey: z.string().default(""),
  baseUrl: z.string().url().default(DEFAULT_PLATFORM_BASE_URL),
  /** Per-attempt request timeout. */
  timeoutMs: z.coerce.number().int().positive().default(10_000),
  /** Total attempts per call, first try included. */
  maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  /** Linear backoff step: attempt N waits retryDelayMs * N before the next try. */
  retryDelayMs: z.coerce.number().int().nonnegative().default(1_000),
  /** Upper bound on any single wait between attempts, retry-after included. */
  maxRetryDelayMs: z.coerce.number().int().nonnegative().default(30_000),
});

export type PlatformConfig = z.infer<typeof platformConfigSchema>;

const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  platform: platformConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse the environment into a Config. Nothing reads the environment at import
 * time; only the factory calls this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    platform: {
      apiKey: env.PLATFORM_API_KEY,
      baseUrl: env.PLATFORM_BASE_URL,
      timeoutMs: env.PLATFORM_TIMEOUT_MS,
      maxAttempts: env.PLATFORM_MAX_ATTEMPTS,
      retryDelayMs: env.PLATFORM_RETRY_DELAY_MS,
      maxRetryDelayMs: env.PLATFORM_MAX_RETRY_DELAY_MS,
    },
  });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment configuration: ${issues.join("; ")}`);
  }
  return result.data;
}
