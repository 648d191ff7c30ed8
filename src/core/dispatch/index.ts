/**
 * Dispatch Module
 *
 * @module
 */

export * from "./models/task-request.js";
export * from "./models/dispatch-record.js";
export * from "./interfaces/IDispatchClient.js";
export * from "./py-repr.js";
export * from "./envelope.js";
export * from "./dispatch-log.js";
export * from "./impl/RawEnvelopeDispatchClient.js";
export * from "./impl/RedisListTransport.js";
export * from "./impl/HttpQueueClient.js";
export * from "./impl/StructuredDispatchClient.js";
export * from "./factory.js";
