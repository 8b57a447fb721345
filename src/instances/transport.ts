/**
 * Single HTTP exchange with the platform API.
 *
 * One call to `send` is one attempt: it issues exactly one fetch and turns the
 * outcome into either a success envelope or a classified error. Retrying is
 * the caller's concern (see retry.ts).
 */

import { logger } from "../config/logger.js";
import { ProtocolError, RemoteError, TransientError } from "./errors.js";
import type { Envelope } from "./types.js";
import { envelopeSchema } from "./types.js";

/**
 * A function that performs an HTTP fetch. Accepts the same signature as
 * the global `fetch`. This indirection lets tests inject a stub without
 * mocking globals.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryParams = Record<string, string | number | undefined>;

export interface PlatformRequest {
  method: HttpMethod;
  /** Path relative to the base URL, e.g. "/api/v2/app". */
  path: string;
  query?: QueryParams;
  body?: unknown;
}

export interface TransportOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  fetchFn: FetchFn;
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Parse a retry-after header given in seconds. HTTP-date values are ignored. */
function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

export class Transport {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: TransportOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn;
  }

  buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      "Content-Type": "application/json",
    };
  }

  async send(request: PlatformRequest): Promise<Envelope> {
    const { method, path } = request;
    const url = this.buildUrl(path, request.query);
    const label = `${method} ${path}`;

    logger.debug("Platform request", { method, path });

    let res: Response;
    try {
      res = await this.fetchFn(url, {
        method,
        headers: this.headers(),
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (isAbort(err)) {
        throw new TransientError(`${label} timed out after ${this.timeoutMs}ms`, undefined, undefined, {
          cause: err,
        });
      }
      throw new TransientError(`${label} failed: ${errorMessage(err)}`, undefined, undefined, { cause: err });
    }

    if (res.status === 429) {
      throw new TransientError(
        `${label} was rate limited`,
        429,
        parseRetryAfter(res.headers.get("retry-after")),
      );
    }

    if (res.status >= 500) {
      const text = await res.text().catch(() => "");
      throw new TransientError(`${label} failed (${res.status}): ${text || res.statusText}`, res.status);
    }

    if (!res.ok) {
      const body: unknown = await res.json().catch(() => null);
      const envelope = envelopeSchema.safeParse(body);
      if (envelope.success) {
        throw new RemoteError(res.status, envelope.data.code, envelope.data.msg || res.statusText);
      }
      throw new RemoteError(res.status, null, res.statusText || `HTTP ${res.status}`);
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      if (isAbort(err)) {
        throw new TransientError(`${label} timed out reading the response`, undefined, undefined, { cause: err });
      }
      throw new ProtocolError(`${label} returned a non-JSON body (${res.status})`, { cause: err });
    }

    const envelope = envelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new ProtocolError(`${label} returned an unexpected envelope: ${envelope.error.issues[0]?.message ?? "invalid"}`);
    }
    if (envelope.data.code !== 0) {
      throw new RemoteError(res.status, envelope.data.code, envelope.data.msg);
    }
    return envelope.data;
  }
}
