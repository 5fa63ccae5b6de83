/**
 * Shared logging and configuration helpers for the workspace.
 */
export * from "./config";
export * from "./utils/logger";
