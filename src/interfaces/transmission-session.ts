/**
 * @module interfaces/transmission-session
 * @description ITransmissionSession: single-flight chunked transfer of one buffer.
 *
 * A session owns at most one capture buffer. It sends the buffer as
 * sequence-numbered frames, one frame per `step()`, then an End Marker,
 * then hands the buffer back to its producer. An aborted transfer releases
 * the buffer without an End Marker and is never retried.
 */

import type { CaptureBuffer } from "../types/capture.js";
import type {
  SessionSnapshot,
  SessionStartResult,
  SessionStepResult,
} from "../types/stream.js";

/**
 * @interface ITransmissionSession
 */
export interface ITransmissionSession {
  /**
   * @command
   * @description Takes ownership of a buffer and arms the transfer.
   * @returns STARTED on success. BUSY while a transfer is in flight; the
   *   caller keeps the buffer. EMPTY for a zero-length buffer, which is
   *   released to its producer at once.
   */
  begin(buffer: CaptureBuffer): SessionStartResult;

  /**
   * @command
   * @description Sends the next frame, or the End Marker once the buffer
   * is exhausted. Aborts when the sink is not ready or rejects the frame.
   */
  step(): SessionStepResult;

  /**
   * @command
   * @description Releases the buffer and returns to IDLE. No End Marker.
   * @returns false when nothing was in flight.
   */
  abort(reason: string): boolean;

  /** @query */
  isActive(): boolean;

  /** @query */
  snapshot(): SessionSnapshot;

  /**
   * @query
   * @description Payload bytes the next data frame would carry at the
   * sink's current payload limit.
   */
  getChunkSize(): number;
}
