/**
 * Error taxonomy for the platform client.
 *
 * Callers branch on `instanceof` or on `kind`. Validation and configuration
 * errors are raised before any request is sent. TransientError never escapes
 * a public operation directly: it is retried, then wrapped in
 * RetryExhaustedError.
 */

export type PlatformErrorKind =
  | "configuration"
  | "validation"
  | "transient"
  | "retry_exhausted"
  | "protocol"
  | "remote"
  | "instance_not_found"
  | "wait_timeout";

export abstract class PlatformClientError extends Error {
  abstract readonly kind: PlatformErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The client was constructed with unusable settings (e.g. an empty API key). */
export class ConfigurationError extends PlatformClientError {
  readonly kind = "configuration" as const;
}

/** Request input rejected locally. No request was sent. */
export class ValidationError extends PlatformClientError {
  readonly kind = "validation" as const;

  constructor(
    operation: string,
    public readonly issues: string[],
  ) {
    super(`Invalid ${operation} request: ${issues.join("; ")}`);
  }
}

/** A failure expected to clear on retry: network error, timeout, 5xx, 429. */
export class TransientError extends PlatformClientError {
  readonly kind = "transient" as const;

  constructor(
    message: string,
    public readonly httpStatus?: number,
    public readonly retryAfterMs?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class RetryExhaustedError extends PlatformClientError {
  readonly kind = "retry_exhausted" as const;

  constructor(
    operation: string,
    public readonly attempts: number,
    public readonly lastError: TransientError,
  ) {
    super(`${operation} failed after ${attempts} attempt(s): ${lastError.message}`, { cause: lastError });
  }
}

/** A well-formed HTTP response that breaks the expected contract. */
export class ProtocolError extends PlatformClientError {
  readonly kind = "protocol" as const;
}

/** The platform rejected the request. Status, code and message are the server's own. */
export class RemoteError extends PlatformClientError {
  readonly kind = "remote" as const;

  constructor(
    public readonly httpStatus: number,
    public readonly code: number | null,
    public readonly remoteMessage: string,
  ) {
    super(
      code === null
        ? `Platform API error ${httpStatus}: ${remoteMessage}`
        : `Platform API error ${httpStatus} (code ${code}): ${remoteMessage}`,
    );
  }
}

export class InstanceNotFoundError extends PlatformClientError {
  readonly kind = "instance_not_found" as const;

  constructor(public readonly appId: string) {
    super(`Instance ${appId} not found`);
  }
}

export class InstanceWaitTimeoutError extends PlatformClientError {
  readonly kind = "wait_timeout" as const;

  constructor(
    public readonly appId: string,
    public readonly targetStatus: string,
    public readonly lastStatus: string,
    timeoutMs: number,
  ) {
    super(`Instance ${appId} did not reach ${targetStatus} within ${timeoutMs / 1000}s (last status: ${lastStatus})`);
  }
}
