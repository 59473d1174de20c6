/**
 * @module adapters/persistence
 * PostgreSQL persistence adapter
 */

export * from "./buffered-row-cursor.js";
export * from "./pg-executor.js";
