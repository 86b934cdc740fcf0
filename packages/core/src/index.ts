/**
 * Core package centralizes shared contracts, errors, logging and configuration.
 * Everything else in the workspace depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./utils/logger";
