/**
 * @module types
 * @description Public type exports.
 */

export * from "./branded.js";
export * from "./cycle.js";
export * from "./stream.js";
export * from "./capture.js";
export * from "./transport.js";
export * from "./events.js";
