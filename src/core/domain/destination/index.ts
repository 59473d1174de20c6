export * from "./destination.js";
export * from "./destination-inspector.js";
