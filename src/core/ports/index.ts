/**
 * @module core/ports
 * Ports (interfaces) for hexagonal architecture
 */

export * from "./row-query-executor.port.js";
export * from "./interpolator.port.js";
export * from "./diagnostics.port.js";
