import type { z } from "zod";
import { logger } from "../config/logger.js";
import {
  ConfigurationError,
  InstanceNotFoundError,
  InstanceWaitTimeoutError,
  ProtocolError,
  ValidationError,
} from "./errors.js";
import type { RetryPolicy } from "./retry.js";
import { DEFAULT_RETRY_POLICY, withRetry } from "./retry.js";
import type { FetchFn, PlatformRequest } from "./transport.js";
import { Transport } from "./transport.js";
import type {
  BillQuery,
  CreatedInstance,
  Envelope,
  Instance,
  InstanceConfigInput,
  InstancePage,
  InstanceQuery,
  InstanceStatus,
  OperationAck,
  OrderPage,
  PrivateImage,
  PrivateImageQuery,
  PublicImage,
  PublicImageQuery,
  ResourceItem,
  ResourceQuery,
  WalletDetail,
} from "./types.js";
import {
  DEFAULT_PLATFORM_BASE_URL,
  billQuerySchema,
  createInstanceDataSchema,
  instanceConfigQuerySchema,
  instanceListDataSchema,
  instanceQuerySchema,
  orderListDataSchema,
  privateImageListDataSchema,
  privateImageQuerySchema,
  publicImageListDataSchema,
  publicImageQuerySchema,
  resourceListDataSchema,
  resourceQuerySchema,
  walletDetailSchema,
} from "./types.js";

export interface InstanceClientOptions {
  /** Platform API key, sent as a bearer token. */
  apiKey: string;
  /** Default: https://api-lab.onethingai.com */
  baseUrl?: string;
  /** Per-attempt timeout in ms (default: 10000) */
  timeoutMs?: number;
  /** Overrides for the default retry policy (3 attempts, 1s linear backoff, 30s cap per wait). */
  retry?: Partial<RetryPolicy>;
}

export interface WaitForStatusOptions {
  /** Default: 300000 */
  timeoutMs?: number;
  /** Default: 5000 */
  intervalMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_WAIT_TIMEOUT_MS = 300_000;
const DEFAULT_WAIT_INTERVAL_MS = 5_000;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message));
}

/** Validate request input locally. Throws ValidationError; nothing is sent. */
function validate<S extends z.ZodTypeAny>(operation: string, schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(operation, formatIssues(result.error));
  }
  return result.data;
}

function requireAppId(operation: string, appId: string): void {
  if (appId.trim() === "") {
    throw new ValidationError(operation, ["appId: must not be empty"]);
  }
}

/**
 * Client for the GPU instance platform API.
 *
 * Holds only the credential and connection settings; every method is one
 * logical request (retried on transient failure) and nothing is cached, so an
 * instance can be shared freely between concurrent callers.
 */
export class InstanceClient {
  private readonly transport: Transport;
  private readonly retryPolicy: RetryPolicy;

  constructor(options: InstanceClientOptions, fetchFn: FetchFn = fetch) {
    if (!options.apiKey || options.apiKey.trim() === "") {
      throw new ConfigurationError("Platform API key is required");
    }

    const baseUrl = options.baseUrl ?? DEFAULT_PLATFORM_BASE_URL;
    if (!URL.canParse(baseUrl)) {
      throw new ConfigurationError(`Invalid platform base URL: ${baseUrl}`);
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(`timeoutMs must be positive, got ${timeoutMs}`);
    }

    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    if (!Number.isInteger(this.retryPolicy.maxAttempts) || this.retryPolicy.maxAttempts < 1) {
      throw new ConfigurationError(`retry.maxAttempts must be a positive integer, got ${this.retryPolicy.maxAttempts}`);
    }
    if (!Number.isFinite(this.retryPolicy.maxDelayMs) || this.retryPolicy.maxDelayMs < 0) {
      throw new ConfigurationError(`retry.maxDelayMs must be a non-negative number, got ${this.retryPolicy.maxDelayMs}`);
    }

    this.transport = new Transport({ apiKey: options.apiKey, baseUrl, timeoutMs, fetchFn });
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Create an instance. Returns the server-assigned appId with the submitted configuration. */
  async create(input: InstanceConfigInput): Promise<CreatedInstance> {
    const instanceConfig = validate("create", instanceConfigQuerySchema, input);
    const envelope = await this.call("create", { method: "POST", path: "/api/v2/app", body: instanceConfig });
    const data = this.parseData("create", createInstanceDataSchema, envelope);

    logger.info("Platform instance created", {
      appId: data.appId,
      gpuType: instanceConfig.gpuType,
      gpuNum: instanceConfig.gpuNum,
      regionId: instanceConfig.regionId,
    });
    return { appId: data.appId, groupId: data.groupId, config: instanceConfig };
  }

  /** One page of instances, in the order the platform returned them. */
  async getInstanceList(query: InstanceQuery): Promise<InstancePage> {
    const params = validate("getInstanceList", instanceQuerySchema, query);
    const envelope = await this.call("getInstanceList", { method: "GET", path: "/api/v2/app", query: params });
    const data = this.parseData("getInstanceList", instanceListDataSchema, envelope);
    return { instances: data.appList, pagination: data.pagination };
  }

  /** Fetch a single instance by appId. */
  async getInstance(appId: string): Promise<Instance> {
    requireAppId("getInstance", appId);
    const page = await this.getInstanceList({ page: 1, pageSize: 1, appId });
    const instance = page.instances.find((i) => i.appId === appId);
    if (!instance) {
      throw new InstanceNotFoundError(appId);
    }
    return instance;
  }

  async start(appId: string): Promise<OperationAck> {
    requireAppId("start", appId);
    const envelope = await this.call("start", {
      method: "PUT",
      path: `/api/v1/app/operate/boot/${encodeURIComponent(appId)}`,
    });
    return { appId, msg: envelope.msg };
  }

  async stop(appId: string): Promise<OperationAck> {
    requireAppId("stop", appId);
    const envelope = await this.call("stop", {
      method: "PUT",
      path: `/api/v1/app/operate/shutdown/${encodeURIComponent(appId)}`,
    });
    return { appId, msg: envelope.msg };
  }

  async delete(appId: string): Promise<OperationAck> {
    requireAppId("delete", appId);
    const envelope = await this.call("delete", {
      method: "DELETE",
      path: `/api/v1/app/${encodeURIComponent(appId)}`,
    });
    logger.info("Platform instance deleted", { appId });
    return { appId, msg: envelope.msg };
  }

  /**
   * Poll until the instance reports `target`. Each poll is a fresh getInstance
   * call; errors from a poll propagate immediately.
   */
  async waitForStatus(appId: string, target: InstanceStatus, options: WaitForStatusOptions = {}): Promise<Instance> {
    requireAppId("waitForStatus", appId);
    const timeoutMs = options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
    const intervalMs = options.intervalMs ?? DEFAULT_WAIT_INTERVAL_MS;
    const start = Date.now();
    let lastStatus: InstanceStatus = "unknown";

    for (;;) {
      const instance = await this.getInstance(appId);
      if (instance.status === target) return instance;

      if (instance.status !== lastStatus) {
        logger.debug("Waiting for instance status", { appId, status: instance.status, target });
        lastStatus = instance.status;
      }
      if (Date.now() - start + intervalMs > timeoutMs) {
        throw new InstanceWaitTimeoutError(appId, target, lastStatus, timeoutMs);
      }
      await this.retryPolicy.sleep(intervalMs);
    }
  }

  // ---------------------------------------------------------------------------
  // Auxiliary queries
  // ---------------------------------------------------------------------------

  /** GPU types and regions that can currently host the given image. */
  async getAvailableResources(query: ResourceQuery): Promise<ResourceItem[]> {
    const params = validate("getAvailableResources", resourceQuerySchema, query);
    const envelope = await this.call("getAvailableResources", {
      method: "GET",
      path: "/api/v2/resources",
      query: params,
    });
    return this.parseData("getAvailableResources", resourceListDataSchema, envelope).resourceList;
  }

  async getWalletDetail(): Promise<WalletDetail> {
    const envelope = await this.call("getWalletDetail", { method: "GET", path: "/api/v1/account/wallet/detail" });
    return this.parseData("getWalletDetail", walletDetailSchema, envelope);
  }

  /** Consumption (billing) records, one page per call. */
  async getOrderList(query: BillQuery): Promise<OrderPage> {
    const params = validate("getOrderList", billQuerySchema, query);
    const envelope = await this.call("getOrderList", {
      method: "GET",
      path: "/api/v2/account/wallet/consume/query",
      query: params,
    });
    const data = this.parseData("getOrderList", orderListDataSchema, envelope);
    return { orders: data.orderList, pagination: data.pagination };
  }

  async getPrivateImageList(query: PrivateImageQuery = {}): Promise<PrivateImage[]> {
    const params = validate("getPrivateImageList", privateImageQuerySchema, query);
    const envelope = await this.call("getPrivateImageList", {
      method: "GET",
      path: "/api/v2/app/private/image/list",
      query: params,
    });
    return this.parseData("getPrivateImageList", privateImageListDataSchema, envelope).privateImageList;
  }

  async getPublicImageList(query: PublicImageQuery = {}): Promise<PublicImage[]> {
    const params = validate("getPublicImageList", publicImageQuerySchema, query);
    const envelope = await this.call("getPublicImageList", {
      method: "GET",
      path: "/api/v2/app/publish/image/list",
      query: params,
    });
    return this.parseData("getPublicImageList", publicImageListDataSchema, envelope).publishImageList;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private call(operation: string, request: PlatformRequest): Promise<Envelope> {
    return withRetry(operation, this.retryPolicy, () => this.transport.send(request));
  }

  private parseData<S extends z.ZodTypeAny>(operation: string, schema: S, envelope: Envelope): z.output<S> {
    const result = schema.safeParse(envelope.data);
    if (!result.success) {
      throw new ProtocolError(`${operation} response does not match the expected schema: ${formatIssues(result.error).join("; ")}`);
    }
    return result.data;
  }
}
