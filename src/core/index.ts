/**
 * Core module - shared between the CLI and library consumers
 */

export * from "./errors.js";
export * from "./config/index.js";
export * from "./router/index.js";
export * from "./state/index.js";
export * from "./scanner/index.js";
export * from "./dispatch/index.js";
export * from "./history/index.js";
export * from "./completion/index.js";
export * from "./pipeline/index.js";
export * from "./app.js";

export * from "../types/index.js";
