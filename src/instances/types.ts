import { z } from "zod";

export const DEFAULT_PLATFORM_BASE_URL = "https://api-lab.onethingai.com";

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const BillType = {
  MonthlySubscription: 1,
  DailySubscription: 2,
  PayAsYouGo: 3,
} as const;
export type BillType = (typeof BillType)[keyof typeof BillType];

export const BusinessType = {
  InstanceUsage: 1,
  ImageStorage: 2,
  FileStorage: 3,
  InstanceExpansion: 4,
} as const;
export type BusinessType = (typeof BusinessType)[keyof typeof BusinessType];

const billTypeSchema = z.union([
  z.literal(BillType.MonthlySubscription),
  z.literal(BillType.DailySubscription),
  z.literal(BillType.PayAsYouGo),
]);

const businessTypeSchema = z.union([
  z.literal(BusinessType.InstanceUsage),
  z.literal(BusinessType.ImageStorage),
  z.literal(BusinessType.FileStorage),
  z.literal(BusinessType.InstanceExpansion),
]);

export type InstanceStatus =
  | "deploying"
  | "starting"
  | "running"
  | "stopping"
  | "resetting"
  | "changing_image"
  | "releasing"
  | "stopped"
  | "unknown";

/** Platform status codes, by name. */
const INSTANCE_STATUS_CODES = new Map<number, InstanceStatus>([
  [100, "deploying"],
  [200, "starting"],
  [300, "running"],
  [400, "stopping"],
  [500, "resetting"],
  [600, "changing_image"],
  [700, "releasing"],
  [800, "stopped"],
]);

export function mapInstanceStatus(code: number): InstanceStatus {
  return INSTANCE_STATUS_CODES.get(code) ?? "unknown";
}

export type PrivateImageStatus = "saving" | "success" | "failed" | "unknown";

export function mapPrivateImageStatus(code: number): PrivateImageStatus {
  if (code === 1) return "saving";
  if (code === 4) return "success";
  if (code === 5) return "failed";
  return "unknown";
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export const portProtocolSchema = z.enum(["http", "tcp"]);
export type PortProtocol = z.infer<typeof portProtocolSchema>;

export const customPortSchema = z.object({
  localPort: z.number().int().min(1).max(65535),
  type: portProtocolSchema.default("http"),
});
export type CustomPort = z.infer<typeof customPortSchema>;

/** Parameters for creating an instance. */
export const instanceConfigQuerySchema = z.object({
  appImageId: z.string().min(1),
  gpuType: z.string().min(1),
  regionId: z.number().int(),
  gpuNum: z.number().int().min(1),
  billType: billTypeSchema.default(BillType.PayAsYouGo),
  /** 0 means unbounded (pay-as-you-go). */
  duration: z.number().int().nonnegative().optional(),
  groupId: z.string().optional(),
  customPort: z.array(customPortSchema).default(() => []),
});
export type InstanceConfigQuery = z.infer<typeof instanceConfigQuerySchema>;
export type InstanceConfigInput = z.input<typeof instanceConfigQuerySchema>;

export const instanceQuerySchema = z.object({
  page: z.number().int().positive(),
  pageSize: z.number().int().positive(),
  appId: z.string().optional(),
  groupId: z.string().optional(),
});
export type InstanceQuery = z.infer<typeof instanceQuerySchema>;

export const resourceQuerySchema = z.object({
  appImageId: z.string().min(1),
  gpuType: z.string().optional(),
  regionId: z.number().int().optional(),
});
export type ResourceQuery = z.infer<typeof resourceQuerySchema>;

export const billQuerySchema = z.object({
  page: z.number().int().positive(),
  pageSize: z.number().int().positive().max(100),
  appId: z.string().optional(),
  businessType: businessTypeSchema.optional(),
});
export type BillQuery = z.infer<typeof billQuerySchema>;

export const privateImageQuerySchema = z.object({
  regionId: z.number().int().optional(),
  appImageName: z.string().optional(),
});
export type PrivateImageQuery = z.infer<typeof privateImageQuerySchema>;

export const publicImageQuerySchema = z.object({
  appImageName: z.string().optional(),
  appImageAuthor: z.string().optional(),
});
export type PublicImageQuery = z.infer<typeof publicImageQuerySchema>;

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

/** Every platform response is wrapped in this envelope; code 0 is success. */
export const envelopeSchema = z.object({
  code: z.number(),
  msg: z.string().default(""),
  data: z.unknown().optional(),
});
export type Envelope = z.infer<typeof envelopeSchema>;

export const paginationSchema = z.object({
  page: z.number().int(),
  pageSize: z.number().int(),
  total: z.number().int(),
});
export type Pagination = z.infer<typeof paginationSchema>;

export const createInstanceDataSchema = z.object({
  appId: z.string().min(1),
  groupId: z.string().default(""),
});

/** Result of a create call: the server-assigned ids plus the submitted configuration. */
export interface CreatedInstance {
  appId: string;
  groupId: string;
  config: InstanceConfigQuery;
}

const customPortWithSubDomainSchema = z.object({
  localPort: z.number().int(),
  type: z.string(),
  subDomain: z.string().default(""),
});

export const instanceSchema = z
  .object({
    appId: z.string().min(1),
    appImageId: z.string(),
    appImageName: z.string().default(""),
    appImageAuthor: z.string().default(""),
    appImageVersion: z.string().default(""),
    billType: z.number().int(),
    createdAt: z.number(),
    customName: z.string().default(""),
    customPort: z.array(customPortWithSubDomainSchema).default(() => []),
    errCode: z.number().int().default(0),
    expiredAt: z.number().default(0),
    gpuType: z.string(),
    groupId: z.string().default(""),
    prePrice: z.number().default(0),
    price: z.number().default(0),
    regionId: z.number().int(),
    runtime: z.number().default(0),
    startedAt: z.number().default(0),
    status: z.number().int(),
    stoppedAt: z.number().default(0),
    systemDiskSize: z.number().default(0),
    systemDiskSizeUsed: z.number().default(0),
    webUIAddress: z.string().default(""),
  })
  .transform(({ status, ...rest }) => ({
    ...rest,
    status: mapInstanceStatus(status),
    statusCode: status,
  }));
export type Instance = z.infer<typeof instanceSchema>;

export const instanceListDataSchema = z.object({
  appList: z.array(instanceSchema),
  pagination: paginationSchema,
});

export interface InstancePage {
  instances: Instance[];
  pagination: Pagination;
}

export const resourceItemSchema = z.object({
  gpuType: z.string(),
  regionId: z.number().int(),
  maxGpuNum: z.number().int(),
});
export type ResourceItem = z.infer<typeof resourceItemSchema>;

export const resourceListDataSchema = z.object({
  resourceList: z.array(resourceItemSchema),
});

export const walletDetailSchema = z.object({
  /** Balance after instance reservations are deducted. */
  availableBalance: z.number(),
  availableVoucherCash: z.number(),
  consumeCashTotal: z.number(),
});
export type WalletDetail = z.infer<typeof walletDetailSchema>;

export const orderItemSchema = z.object({
  orderId: z.string(),
  appId: z.string().default(""),
  actualPayCash: z.number(),
  billType: z.number().int(),
  businessType: z.number().int(),
  consumeCash: z.number(),
  createdAt: z.number(),
  event: z.string().default(""),
  runtime: z.number(),
  totalDiscountPrice: z.number(),
  voucherDeductCash: z.number(),
});
export type OrderItem = z.infer<typeof orderItemSchema>;

export const orderListDataSchema = z.object({
  orderList: z.array(orderItemSchema),
  pagination: paginationSchema,
});

export interface OrderPage {
  orders: OrderItem[];
  pagination: Pagination;
}

export const privateImageSchema = z
  .object({
    appImageId: z.string(),
    appImageName: z.string(),
    appImageDescription: z.string().default(""),
    appImageStatus: z.number().int(),
    appImageTotalSize: z.number(),
    regionId: z.number().int(),
    createdAt: z.number(),
    updatedAt: z.number(),
  })
  .transform(({ appImageStatus, ...rest }) => ({
    ...rest,
    appImageStatus: mapPrivateImageStatus(appImageStatus),
  }));
export type PrivateImage = z.infer<typeof privateImageSchema>;

export const privateImageListDataSchema = z.object({
  privateImageList: z.array(privateImageSchema),
});

export const publicImageSchema = z.object({
  appImageId: z.string(),
  appImageName: z.string(),
  appImageDescription: z.string().default(""),
  appImageAuthor: z.string(),
  appImageVersion: z.string(),
  createdAt: z.number(),
  updatedAt: z.number(),
});
export type PublicImage = z.infer<typeof publicImageSchema>;

export const publicImageListDataSchema = z.object({
  publishImageList: z.array(publicImageSchema),
});

/** Acknowledgement for start, stop and delete. */
export interface OperationAck {
  appId: string;
  msg: string;
}
