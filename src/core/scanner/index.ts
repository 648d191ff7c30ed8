/**
 * Scanner Module
 *
 * @module
 */

export * from "./interfaces/IFileSource.js";
export * from "./models/scan-models.js";
export * from "./stability.js";
export * from "./delayed-dispatch.js";
export * from "./impl/NodeFileSource.js";
export * from "./impl/PollingScanner.js";
