/**
 * @module types/capture
 * @description Capture buffers handed out by camera and microphone producers.
 */

/**
 * A buffer yielded by a Capture Producer.
 *
 * Ownership moves to whoever receives it from `tryProduce()` and must be
 * returned through `release()` exactly once.
 */
export interface CaptureBuffer {
  /** Producer-assigned identifier, unique among live buffers. */
  readonly id: number;
  /** Captured bytes; the valid length is `data.length`. */
  readonly data: Uint8Array;
  /** Capture timestamp (ms). */
  readonly capturedAt: number;
}

/**
 * Photo control byte semantics.
 *
 * | Value    | Meaning                                     |
 * |----------|---------------------------------------------|
 * | -1       | single shot                                 |
 * | 0        | stop                                        |
 * | 5–300    | capture every N seconds (multiple of 5)     |
 */
export type PhotoCaptureMode =
  | { readonly kind: "IDLE" }
  | { readonly kind: "SINGLE" }
  | { readonly kind: "INTERVAL"; readonly intervalMs: number };

/**
 * Video streaming status, as reported to the client.
 */
export interface VideoStatus {
  readonly streaming: boolean;
  readonly fps: number;
  readonly frameCount: number;
  readonly droppedFrames: number;
}

/**
 * Outcome of applying a control byte.
 */
export type ControlOutcome =
  | { readonly accepted: true; readonly action: string }
  | { readonly accepted: false; readonly reason: string };
