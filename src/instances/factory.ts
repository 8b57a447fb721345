import { loadConfig } from "../config/index.js";
import type { InstanceClientOptions } from "./instance-client.js";
import { InstanceClient } from "./instance-client.js";
import { linearBackoff } from "./retry.js";
import type { FetchFn } from "./transport.js";

/**
 * Build an InstanceClient from environment configuration (PLATFORM_* vars).
 * Explicit overrides win over the environment. A malformed PLATFORM_* value,
 * or an unset PLATFORM_API_KEY with no apiKey override, fails with
 * ConfigurationError.
 */
export function createInstanceClient(overrides: Partial<InstanceClientOptions> = {}, fetchFn?: FetchFn): InstanceClient {
  const { platform } = loadConfig();
  return new InstanceClient(
    {
      apiKey: overrides.apiKey ?? platform.apiKey,
      baseUrl: overrides.baseUrl ?? platform.baseUrl,
      timeoutMs: overrides.timeoutMs ?? platform.timeoutMs,
      retry: {
        maxAttempts: platform.maxAttempts,
        backoff: linearBackoff(platform.retryDelayMs),
        maxDelayMs: platform.maxRetryDelayMs,
        ...overrides.retry,
      },
    },
    fetchFn,
  );
}
