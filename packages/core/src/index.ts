/**
 * Shared contracts, configuration and logging for the trendlens packages.
 * Everything else in the workspace depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./env";
export * from "./exchange";
export * from "./utils/logger";
export { stableStringify, hashJson } from "./utils/fingerprint";
