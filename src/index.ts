/**
 * @module cyclestream
 * @description Cooperative cycle scheduler and chunked capture streaming.
 *
 * Exports the Cycle Manager, the Transmission Session, the Audio Streamer,
 * their interfaces, all type definitions, the event system, the wire
 * codec, in-memory link and producer implementations, the glue cycles and
 * the CaptureDevice orchestrator.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Wire Codec ─────────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── In-memory Backends ─────────────────────────────────────────────
export * from "./backends/index.js";

// ─── Transport Implementations ──────────────────────────────────────
export * from "./transports/index.js";

// ─── Configuration & Logging ────────────────────────────────────────
export * from "./config.js";
export * from "./utils/logger.js";

// ─── Glue Cycles & Control ──────────────────────────────────────────
export * from "./cycles/index.js";
export * from "./control/capture-control.js";

// ─── Orchestrator ───────────────────────────────────────────────────
export { CaptureDevice } from "./device.js";
export type { CaptureDeviceOptions } from "./device.js";
