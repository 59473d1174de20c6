/**
 * @module adapters/telemetry
 * Diagnostics adapters
 */

export * from "./metrics.js";
