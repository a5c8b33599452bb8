/**
 * @module cycles
 * @description Glue cycles wiring capture, transmission and housekeeping into the scheduler.
 */

export * from "./data-cycles.js";
export * from "./comm-cycles.js";
export * from "./system-cycles.js";
