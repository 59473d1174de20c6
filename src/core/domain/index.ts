/**
 * @module core/domain
 * Record types, destinations, value objects, errors and services
 */

export * from "./record/index.js";
export * from "./destination/index.js";
export * from "./value-objects/index.js";
export * from "./errors/index.js";
export * from "./services/index.js";
