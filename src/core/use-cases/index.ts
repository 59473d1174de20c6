/**
 * @module core/use-cases
 * Application use cases (orchestration layer)
 */

export * from "./select-all.use-case.js";
export * from "./select-one.use-case.js";
