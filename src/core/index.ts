export * from "./config.js";
export * from "./errors.js";
export * from "./event-bus.js";
export * from "./logger.js";
export type * from "./types.js";
export { ENTITY_TYPES, TRANSPORTS } from "./types.js";
export { expandHomePath, isRecord, pathExists, redactUrl, sleep, truncate } from "./utils.js";
