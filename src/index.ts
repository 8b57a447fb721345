export * from "./instances/index.js";
export { loadConfig, platformConfigSchema } from "./config/index.js";
export type { Config, PlatformConfig } from "./config/index.js";
