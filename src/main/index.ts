/**
 * @module main
 * Composition root and entry point
 */

export * from "../core/index.js";
export * from "../adapters/index.js";

export * from "./query-session.js";
