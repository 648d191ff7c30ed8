/**
 * State Module
 *
 * In-memory lifecycle tracking for every watched file.
 */

export * from "./models/watched-file.js";
export * from "./interfaces/IStateTracker.js";
export * from "./impl/StateTracker.js";
