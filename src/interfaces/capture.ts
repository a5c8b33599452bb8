/**
 * @module interfaces/capture
 * @description ICaptureProducer: boundary to the camera and microphone drivers.
 *
 * Drivers own their frame buffers. A producer lends one out per successful
 * `tryProduce()` and expects it back through `release()` exactly once,
 * whether the transfer completed or was aborted.
 */

import type { CaptureBuffer } from "../types/capture.js";

/**
 * @interface ICaptureProducer
 * @description Yields captured data on demand.
 */
export interface ICaptureProducer {
  /**
   * @command
   * @description Attempts a capture without blocking.
   * @returns A buffer now owned by the caller, or null when nothing was captured.
   */
  tryProduce(): CaptureBuffer | null;

  /**
   * @command
   * @description Returns a previously produced buffer to the driver.
   * @param buffer - A buffer obtained from this producer's `tryProduce()`.
   */
  release(buffer: CaptureBuffer): void;
}
