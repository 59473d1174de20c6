export * from "./field.js";
export * from "./record-type.js";
