export { type Config, config, configSchema, DEFAULT_HOSTNAME } from "./config/index.js";
export { logger } from "./config/logger.js";
export * from "./hosts/index.js";
