/**
 * @module backends/memory-producer
 * @description In-memory ICaptureProducer backed by a queue of byte arrays.
 *
 * Stands in for the camera and microphone drivers on hosts without them.
 * Tracks which buffers are on loan so ownership mistakes show up as
 * errors rather than silent corruption.
 */

import type { ICaptureProducer } from "../interfaces/capture.js";
import type { CaptureBuffer } from "../types/capture.js";
import { systemClock, type Clock } from "../primitives/clock.js";

/**
 * Errors thrown when a buffer is returned that is not on loan.
 */
export class ProducerError extends Error {
  constructor(
    message: string,
    public readonly code: "UNKNOWN_BUFFER" | "DOUBLE_RELEASE"
  ) {
    super(message);
    this.name = "ProducerError";
  }
}

/**
 * QueueProducer: yields queued captures in FIFO order.
 *
 * `tryProduce()` returns null while the queue is empty, modelling a
 * capture that did not complete.
 */
export class QueueProducer implements ICaptureProducer {
  private readonly queue: Uint8Array[] = [];
  private readonly onLoan = new Map<number, CaptureBuffer>();
  private readonly released = new Set<number>();
  private nextId = 1;
  private produceCalls = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  enqueue(...captures: Uint8Array[]): void {
    this.queue.push(...captures);
  }

  tryProduce(): CaptureBuffer | null {
    this.produceCalls++;
    const data = this.queue.shift();
    if (!data) return null;

    const buffer: CaptureBuffer = {
      id: this.nextId++,
      data,
      capturedAt: this.clock.now(),
    };
    this.onLoan.set(buffer.id, buffer);
    return buffer;
  }

  /**
   * @throws {ProducerError} when the buffer was already returned or never lent.
   */
  release(buffer: CaptureBuffer): void {
    if (this.released.has(buffer.id)) {
      throw new ProducerError(`Buffer #${buffer.id} released twice`, "DOUBLE_RELEASE");
    }
    if (!this.onLoan.delete(buffer.id)) {
      throw new ProducerError(`Buffer #${buffer.id} is not on loan`, "UNKNOWN_BUFFER");
    }
    this.released.add(buffer.id);
  }

  /** Captures waiting to be produced. */
  pending(): number {
    return this.queue.length;
  }

  /** Buffers produced and not yet released. */
  outstanding(): number {
    return this.onLoan.size;
  }

  releasedCount(): number {
    return this.released.size;
  }

  attempts(): number {
    return this.produceCalls;
  }
}
