import { describe, expect, it, vi } from "vitest";
import { ConfigurationError, RetryExhaustedError } from "./errors.js";
import { createInstanceClient } from "./factory.js";
import type { FetchFn } from "./transport.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

vi.mock("../config/index.js", () => ({
  loadConfig: () => ({
    nodeEnv: "test",
    logLevel: "info",
    platform: {
      apiKey: "env-key",
      baseUrl: "https://env.platform.test",
      timeoutMs: 5_000,
      maxAttempts: 2,
      retryDelayMs: 0,
      maxRetryDelayMs: 0,
    },
  }),
}));

const WALLET = { code: 0, msg: "success", data: { availableBalance: 1, availableVoucherCash: 0, consumeCashTotal: 0 } };

describe("createInstanceClient", () => {
  it("builds a client from environment configuration", async () => {
    const fetchFn = vi.fn<FetchFn>().mockImplementation(() => Promise.resolve(new Response(JSON.stringify(WALLET))));

    await createInstanceClient({}, fetchFn).getWalletDetail();

    expect(fetchFn.mock.calls[0]?.[0]).toBe("https://env.platform.test/api/v1/account/wallet/detail");
    expect(fetchFn.mock.calls[0]?.[1]?.headers).toEqual({
      Authorization: "Bearer env-key",
      "Content-Type": "application/json",
    });
  });

  it("lets explicit options win over the environment", async () => {
    const fetchFn = vi.fn<FetchFn>().mockImplementation(() => Promise.resolve(new Response(JSON.stringify(WALLET))));

    await createInstanceClient({ apiKey: "override-key", baseUrl: "https://other.test" }, fetchFn).getWalletDetail();

    expect(fetchFn.mock.calls[0]?.[0]).toBe("https://other.test/api/v1/account/wallet/detail");
    expect(fetchFn.mock.calls[0]?.[1]?.headers).toEqual({
      Authorization: "Bearer override-key",
      "Content-Type": "application/json",
    });
  });

  it("takes the attempt count from the environment", async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockImplementation(() => Promise.resolve(new Response("unavailable", { status: 503 })));

    await expect(createInstanceClient({}, fetchFn).getWalletDetail()).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("takes the retry wait cap from the environment", async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockImplementation(() =>
        Promise.resolve(new Response("slow down", { status: 429, headers: { "retry-after": "3600" } })),
      );

    await expect(createInstanceClient({}, fetchFn).getWalletDetail()).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("fails fast on an empty API key", () => {
    expect(() => createInstanceClient({ apiKey: "" }, vi.fn<FetchFn>())).toThrow(ConfigurationError);
  });
});
