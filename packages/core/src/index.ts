/**
 * Core package centralizes shared contracts, configuration and logging.
 * Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./metric";
export * from "./config";
export { loadEnvFiles } from "./env";
export { createLogger, log, sanitizeValue, silentLogger } from "./utils/logger";
export type { BaseLogPayload, LogLevel, ModuleLogger } from "./utils/logger";
export * from "./time/constants";
export * from "./http";
