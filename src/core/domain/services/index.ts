/**
 * Domain Services Index
 */

export * from "./binding-plan.js";
export * from "./result-assembler.js";
export * from "./query-pipeline.js";
