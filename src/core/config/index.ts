/**
 * Configuration Module
 *
 * Loading, validation and atomic reload of the watcher configuration.
 */

export * from "./models/config.js";
export * from "./config-loader.js";
export * from "./config-holder.js";
export * from "./config-summary.js";
export * from "./pattern-editor.js";
