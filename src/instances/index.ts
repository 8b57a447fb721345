export {
  ConfigurationError,
  InstanceNotFoundError,
  InstanceWaitTimeoutError,
  PlatformClientError,
  ProtocolError,
  RemoteError,
  RetryExhaustedError,
  TransientError,
  ValidationError,
} from "./errors.js";
export type { PlatformErrorKind } from "./errors.js";
export { createInstanceClient } from "./factory.js";
export { InstanceClient } from "./instance-client.js";
export type { InstanceClientOptions, WaitForStatusOptions } from "./instance-client.js";
export { DEFAULT_RETRY_POLICY, linearBackoff } from "./retry.js";
export type { RetryPolicy } from "./retry.js";
export type { FetchFn } from "./transport.js";
export { BillType, BusinessType, DEFAULT_PLATFORM_BASE_URL, mapInstanceStatus, mapPrivateImageStatus } from "./types.js";
export type {
  BillQuery,
  CreatedInstance,
  CustomPort,
  Instance,
  InstanceConfigInput,
  InstanceConfigQuery,
  InstancePage,
  InstanceQuery,
  InstanceStatus,
  OperationAck,
  OrderItem,
  OrderPage,
  Pagination,
  PortProtocol,
  PrivateImage,
  PrivateImageQuery,
  PrivateImageStatus,
  PublicImage,
  PublicImageQuery,
  ResourceItem,
  ResourceQuery,
  WalletDetail,
} from "./types.js";
