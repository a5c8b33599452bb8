/**
 * @module types/stream
 * @description Stream, frame and session types for the capture protocol.
 *
 * | Stream | Type byte | Transfer                                   |
 * |--------|-----------|--------------------------------------------|
 * | AUDIO  | 0x00      | one logical frame per block (or sub-chunks)|
 * | PHOTO  | 0x01      | chunked session, End Marker on completion  |
 * | VIDEO  | 0x02      | chunked session, End Marker on completion  |
 */

import type { SequenceNumber } from "./branded.js";
import type { CaptureBuffer } from "./capture.js";

// ─── Stream Types ───────────────────────────────────────────────────

/**
 * Every stream the device produces.
 */
export type StreamType = "AUDIO" | "PHOTO" | "VIDEO";

/**
 * Streams transferred through a Transmission Session.
 */
export type ChunkedStreamType = Exclude<StreamType, "AUDIO">;

// ─── Decoded Frames ─────────────────────────────────────────────────

/**
 * A decoded sequence-numbered data frame.
 */
export interface DataFrame {
  readonly kind: "DATA";
  readonly sequence: SequenceNumber;
  readonly stream: StreamType;
  readonly payload: Uint8Array;
}

/**
 * A decoded End Marker.
 */
export interface EndMarkerFrame {
  readonly kind: "END";
  readonly stream: ChunkedStreamType;
}

export type DecodedFrame = DataFrame | EndMarkerFrame;

/**
 * One fragment of an oversized logical frame.
 */
export interface SubChunk {
  readonly sequence: SequenceNumber;
  readonly index: number;
  readonly last: boolean;
  readonly payload: Uint8Array;
}

// ─── Session State ──────────────────────────────────────────────────

/**
 * State of a Transmission Session. `SENDING` owns its buffer exclusively.
 */
export type SessionState =
  | { readonly phase: "IDLE" }
  | {
      readonly phase: "SENDING";
      readonly buffer: CaptureBuffer;
      readonly totalLength: number;
      readonly bytesSent: number;
      readonly sequence: SequenceNumber;
    };

/**
 * Result of asking a session to take a new buffer.
 */
export type SessionStartResult = "STARTED" | "BUSY" | "EMPTY";

/**
 * Result of one session step.
 */
export type SessionStepResult = "IDLE" | "CHUNK_SENT" | "COMPLETED" | "ABORTED";

/**
 * Read-only view of a session, safe to hand out.
 */
export interface SessionSnapshot {
  readonly stream: ChunkedStreamType;
  readonly active: boolean;
  readonly totalLength: number;
  readonly bytesSent: number;
  readonly sequence: SequenceNumber;
  readonly completedTransfers: number;
  readonly abortedTransfers: number;
}
