/**
 * @module types/events
 * @description Event catalog for the runtime's reactive surface.
 *
 * The cycle manager, sessions, audio streamer and connection monitor emit
 * typed events so observers (status LEDs, diagnostics, tests) can follow
 * the device without reaching into its state.
 */

import type { CycleId } from "./branded.js";
import type { CycleMode, CyclePriority } from "./cycle.js";
import type { ChunkedStreamType, StreamType } from "./stream.js";

// ─── Scheduler Events ───────────────────────────────────────────────

/** Emitted when a cycle is accepted into the table. */
export interface CycleRegisteredEvent {
  readonly type: "CYCLE_REGISTERED";
  readonly id: CycleId;
  readonly name: string;
  readonly mode: CycleMode;
  readonly priority: CyclePriority;
  readonly timestamp: number;
}

/** Emitted after a cycle callback reports failure. */
export interface CycleFailedEvent {
  readonly type: "CYCLE_FAILED";
  readonly id: CycleId;
  readonly name: string;
  readonly reason: string;
  readonly errorCount: number;
  readonly timestamp: number;
}

/** Emitted when a one-shot cycle retires. */
export interface CycleCompletedEvent {
  readonly type: "CYCLE_COMPLETED";
  readonly id: CycleId;
  readonly name: string;
  readonly timestamp: number;
}

/** Emitted when an error policy disables a cycle. */
export interface CycleAutoDisabledEvent {
  readonly type: "CYCLE_AUTO_DISABLED";
  readonly id: CycleId;
  readonly name: string;
  readonly consecutiveErrors: number;
  readonly timestamp: number;
}

// ─── Session Events ─────────────────────────────────────────────────

/** Emitted when a session takes ownership of a buffer. */
export interface SessionStartedEvent {
  readonly type: "SESSION_STARTED";
  readonly stream: ChunkedStreamType;
  readonly totalLength: number;
  readonly timestamp: number;
}

/** Emitted after every data frame a session sends. */
export interface FrameSentEvent {
  readonly type: "FRAME_SENT";
  readonly stream: ChunkedStreamType;
  readonly sequence: number;
  readonly payloadLength: number;
  readonly bytesSent: number;
  readonly totalLength: number;
  readonly timestamp: number;
}

/** Emitted after the End Marker went out and the buffer was released. */
export interface SessionCompletedEvent {
  readonly type: "SESSION_COMPLETED";
  readonly stream: ChunkedStreamType;
  readonly totalLength: number;
  readonly frames: number;
  readonly timestamp: number;
}

/** Emitted when a session is torn down without an End Marker. */
export interface SessionAbortedEvent {
  readonly type: "SESSION_ABORTED";
  readonly stream: ChunkedStreamType;
  readonly reason: string;
  readonly bytesSent: number;
  readonly totalLength: number;
  readonly timestamp: number;
}

// ─── Capture & Link Events ──────────────────────────────────────────

/** Emitted when an audio block went out (whole or as sub-chunks). */
export interface AudioFrameSentEvent {
  readonly type: "AUDIO_FRAME_SENT";
  readonly sequence: number;
  readonly parts: number;
  readonly bytes: number;
  readonly timestamp: number;
}

/** Emitted when a capture could not be obtained after all retries. */
export interface CaptureFailedEvent {
  readonly type: "CAPTURE_FAILED";
  readonly stream: StreamType;
  readonly attempts: number;
  readonly timestamp: number;
}

/** Emitted when a video frame is skipped because the previous one is still in flight. */
export interface FrameDroppedEvent {
  readonly type: "FRAME_DROPPED";
  readonly stream: ChunkedStreamType;
  readonly droppedFrames: number;
  readonly timestamp: number;
}

/** Emitted when the connection monitor observes a readiness change. */
export interface LinkChangedEvent {
  readonly type: "LINK_CHANGED";
  readonly ready: boolean;
  readonly abortedSessions: readonly ChunkedStreamType[];
  readonly timestamp: number;
}

// ─── Event Map ──────────────────────────────────────────────────────

/**
 * Maps each event type string to its payload interface.
 */
export interface DeviceEventMap {
  CYCLE_REGISTERED: CycleRegisteredEvent;
  CYCLE_FAILED: CycleFailedEvent;
  CYCLE_COMPLETED: CycleCompletedEvent;
  CYCLE_AUTO_DISABLED: CycleAutoDisabledEvent;
  SESSION_STARTED: SessionStartedEvent;
  FRAME_SENT: FrameSentEvent;
  SESSION_COMPLETED: SessionCompletedEvent;
  SESSION_ABORTED: SessionAbortedEvent;
  AUDIO_FRAME_SENT: AudioFrameSentEvent;
  CAPTURE_FAILED: CaptureFailedEvent;
  FRAME_DROPPED: FrameDroppedEvent;
  LINK_CHANGED: LinkChangedEvent;
}

/** Union of all event type strings. */
export type DeviceEventType = keyof DeviceEventMap;

/** Union of all event payloads. */
export type DeviceEvent = DeviceEventMap[DeviceEventType];
