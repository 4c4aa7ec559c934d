export * from "./costModel.js";
export * from "./errors.js";
export * from "./validator.js";
export * from "./engine.js";
export * from "./metrics.js";
export * from "./usage.js";
