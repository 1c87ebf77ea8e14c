export * from "./errors/index.js";
export * from "./schemas/index.js";
export * from "./config/index.js";
export * from "./logger/index.js";
export * from "./http/index.js";
export * from "./models/index.js";
export * from "./search/index.js";
export * from "./client/index.js";
export * from "./transfer/index.js";
export * from "./pipeline/index.js";
