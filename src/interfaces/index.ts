/**
 * @module interfaces
 * @description Public interface exports for the capture runtime.
 */

export * from "./event-emitter.js";
export * from "./cycle-manager.js";
export * from "./transmission-session.js";
export * from "./transport.js";
export * from "./capture.js";
