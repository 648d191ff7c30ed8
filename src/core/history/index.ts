export * from "./processing-event-log.js";
