export * from "./db.js";
export * from "./encoding.js";
export * from "./errors.js";
export * from "./options.js";
export { crc32 } from "./crc32.js";
export { Logger, createLogger } from "./logger.js";
export type { LogLevel, LoggerConfig } from "./logger.js";
