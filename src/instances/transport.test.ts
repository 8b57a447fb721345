import { describe, expect, it, vi } from "vitest";
import { ProtocolError, RemoteError, TransientError } from "./errors.js";
import type { FetchFn } from "./transport.js";
import { Transport } from "./transport.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

const BASE_URL = "https://platform.test";

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

function makeTransport(fetchFn: FetchFn): Transport {
  return new Transport({ apiKey: "test-key", baseUrl: BASE_URL, timeoutMs: 1_000, fetchFn });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected promise to reject");
}

describe("Transport", () => {
  describe("buildUrl", () => {
    it("joins path and drops undefined query params", () => {
      const transport = new Transport({
        apiKey: "test-key",
        baseUrl: "https://platform.test/",
        timeoutMs: 1_000,
        fetchFn: vi.fn<FetchFn>(),
      });
      expect(transport.buildUrl("/api/v2/app", { page: 1, pageSize: 10, appId: undefined })).toBe(
        "https://platform.test/api/v2/app?page=1&pageSize=10",
      );
    });

    it("encodes query values", () => {
      const transport = makeTransport(vi.fn<FetchFn>());
      expect(transport.buildUrl("/api/v2/resources", { gpuType: "NVIDIA A100" })).toBe(
        "https://platform.test/api/v2/resources?gpuType=NVIDIA+A100",
      );
    });
  });

  describe("send", () => {
    it("sends bearer auth and JSON body, returns the success envelope", async () => {
      const fetchFn = vi.fn<FetchFn>().mockResolvedValueOnce(jsonResponse({ code: 0, msg: "success", data: { x: 1 } }));
      const transport = makeTransport(fetchFn);

      const envelope = await transport.send({ method: "POST", path: "/api/v2/app", body: { gpuNum: 1 } });

      expect(envelope).toEqual({ code: 0, msg: "success", data: { x: 1 } });
      expect(fetchFn).toHaveBeenCalledTimes(1);
      const [url, init] = fetchFn.mock.calls[0] ?? [];
      expect(url).toBe(`${BASE_URL}/api/v2/app`);
      expect(init?.method).toBe("POST");
      expect(init?.headers).toEqual({
        Authorization: "Bearer test-key",
        "Content-Type": "application/json",
      });
      expect(init?.body).toBe('{"gpuNum":1}');
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it("omits the body when none is given", async () => {
      const fetchFn = vi.fn<FetchFn>().mockResolvedValueOnce(jsonResponse({ code: 0, msg: "success" }));
      await makeTransport(fetchFn).send({ method: "PUT", path: "/api/v1/app/operate/boot/app-1" });
      expect(fetchFn.mock.calls[0]?.[1]?.body).toBeUndefined();
    });

    it("classifies a rejected fetch as transient", async () => {
      const fetchFn = vi.fn<FetchFn>().mockRejectedValueOnce(new TypeError("fetch failed"));
      const err = await captureError(makeTransport(fetchFn).send({ method: "GET", path: "/x" }));
      expect(err).toBeInstanceOf(TransientError);
      expect((err as TransientError).message).toBe("GET /x failed: fetch failed");
    });

    it("classifies a timeout as transient", async () => {
      const timeout = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
      const fetchFn = vi.fn<FetchFn>().mockRejectedValueOnce(timeout);
      const err = await captureError(makeTransport(fetchFn).send({ method: "GET", path: "/x" }));
      expect(err).toBeInstanceOf(TransientError);
      expect((err as TransientError).message).toBe("GET /x timed out after 1000ms");
      expect((err as TransientError).cause).toBe(timeout);
    });

    it("classifies 5xx as transient with the status", async () => {
      const fetchFn = vi.fn<FetchFn>().mockResolvedValueOnce(new Response("upstream down", { status: 503 }));
      const err = await captureError(makeTransport(fetchFn).send({ method: "GET", path: "/x" }));
      expect(err).toBeInstanceOf(TransientError);
      expect((err as TransientError).httpStatus).toBe(503);
      expect((err as TransientError).message).toBe("GET /x failed (503): upstream down");
    });

    it("classifies 429 as transient and reads retry-after seconds", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(jsonResponse({ code: 429, msg: "slow down" }, 429, { "retry-after": "2" }));
      const err = await captureError(makeTransport(fetchFn).send({ method: "GET", path: "/x" }));
      expect(err).toBeInstanceOf(TransientError);
      expect((err as TransientError).httpStatus).toBe(429);
      expect((err as TransientError).retryAfterMs).toBe(2000);
    });

    it("handles 429 without retry-after header", async () => {
      const fetchFn = vi.fn<FetchFn>().mockResolvedValueOnce(jsonResponse({ code: 429, msg: "slow down" }, 429));
      const err = await captureError(makeTransport(fetchFn).send({ method: "GET", path: "/x" }));
      expect((err as TransientError).retryAfterMs).toBeUndefined();
    });

    it("maps a 4xx envelope to RemoteError verbatim", async () => {
      const fetchFn = vi.fn<FetchFn>().mockResolvedValueOnce(jsonResponse({ code: 40001, msg: "invalid gpuType" }, 400));
      const err = await captureError(makeTransport(fetchFn).send({ method: "POST", path: "/api/v2/app", body: {} }));
      expect(err).toBeInstanceOf(RemoteError);
      expect(err).toMatchObject({ httpStatus: 400, code: 40001, remoteMessage: "invalid gpuType" });
    });

    it("falls back to statusText when a 4xx body is not an envelope", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(new Response("<html>nope</html>", { status: 403, statusText: "Forbidden" }));
      const err = await captureError(makeTransport(fetchFn).send({ method: "GET", path: "/x" }));
      expect(err).toMatchObject({ httpStatus: 403, code: null, remoteMessage: "Forbidden" });
      expect((err as RemoteError).message).toBe("Platform API error 403: Forbidden");
    });

    it("maps a non-zero envelope code on 200 to RemoteError", async () => {
      const fetchFn = vi.fn<FetchFn>().mockResolvedValueOnce(jsonResponse({ code: 1, msg: "insufficient balance" }));
      const err = await captureError(makeTransport(fetchFn).send({ method: "POST", path: "/api/v2/app", body: {} }));
      expect(err).toBeInstanceOf(RemoteError);
      expect(err).toMatchObject({ httpStatus: 200, code: 1, remoteMessage: "insufficient balance" });
      expect((err as RemoteError).message).toBe("Platform API error 200 (code 1): insufficient balance");
    });

    it("rejects a non-JSON 2xx body as a protocol error", async () => {
      const fetchFn = vi.fn<FetchFn>().mockResolvedValueOnce(new Response("ok", { status: 200 }));
      const err = await captureError(makeTransport(fetchFn).send({ method: "GET", path: "/x" }));
      expect(err).toBeInstanceOf(ProtocolError);
      expect((err as ProtocolError).message).toBe("GET /x returned a non-JSON body (200)");
    });

    it("rejects a 2xx body without an envelope code as a protocol error", async () => {
      const fetchFn = vi.fn<FetchFn>().mockResolvedValueOnce(jsonResponse({ appId: "abc" }));
      const err = await captureError(makeTransport(fetchFn).send({ method: "GET", path: "/x" }));
      expect(err).toBeInstanceOf(ProtocolError);
    });
  });
});
