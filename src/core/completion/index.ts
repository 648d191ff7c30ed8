/**
 * Completion Module
 *
 * @module
 */

export * from "./models/completion.js";
export * from "./impl/CompletionListener.js";
export * from "./impl/CompletionServer.js";
