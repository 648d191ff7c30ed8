/**
 * Pipeline Module
 *
 * @module
 */

export * from "./pipeline-events.js";
export * from "./status.js";
export * from "./dispatcher.js";
export * from "./watch-pipeline.js";
