export * from "./pattern-router.js";
