/**
 * ingest-watch
 *
 * Library entry point. The CLI lives in `cli/index.ts`.
 *
 * @module
 */

export * from "./core/index.js";
export { EventBus, type EventHandler } from "./utils/events.js";
export { configureLogging, createLogger, type Logger, type LogLevel } from "./utils/logger.js";
