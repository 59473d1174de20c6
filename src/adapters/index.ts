/**
 * @module adapters
 * Adapters for external systems (persistence, telemetry)
 */

export * from "./persistence/index.js";
export * from "./telemetry/index.js";
