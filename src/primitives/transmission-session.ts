/**
 * @module primitives/transmission-session
 * @description Full implementation of the ITransmissionSession interface.
 *
 * One session exists per chunked stream. It is the only owner of the
 * buffer it carries between `begin()` and completion or abort, and it
 * returns that buffer to the producer exactly once on either path.
 *
 * Sequence numbers start at 0 for every transfer. The chunk size follows
 * the sink's negotiated payload limit, read again for every frame.
 */

import { DeviceEmitter } from "./base-emitter.js";
import { systemClock, type Clock } from "./clock.js";
import {
  CodecError,
  FRAME_HEADER_SIZE,
  encodeEndMarker,
  encodeFrame,
} from "../codec/index.js";
import type { ICaptureProducer } from "../interfaces/capture.js";
import type { ITransmissionSession } from "../interfaces/transmission-session.js";
import type { ITransportSink } from "../interfaces/transport.js";
import { nextSequence, toSequenceNumber } from "../types/branded.js";
import type { CaptureBuffer } from "../types/capture.js";
import type {
  ChunkedStreamType,
  SessionSnapshot,
  SessionStartResult,
  SessionState,
  SessionStepResult,
} from "../types/stream.js";
import { Logger } from "../utils/logger.js";

export interface TransmissionSessionOptions {
  readonly stream: ChunkedStreamType;
  readonly sink: ITransportSink;
  readonly producer: ICaptureProducer;
  /** Upper bound on payload bytes per frame. */
  readonly maxChunkSize: number;
  /** Ceiling on the transport payload, header included. */
  readonly maxPayload: number;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly events?: DeviceEmitter;
}

const IDLE: SessionState = Object.freeze({ phase: "IDLE" });

/**
 * TransmissionSession: single-flight chunked sender.
 *
 * @example
 * ```ts
 * const session = new TransmissionSession({ stream: "PHOTO", sink, producer, maxChunkSize: 400, maxPayload: 403 });
 * session.begin(buffer);
 * while (session.step() === "CHUNK_SENT") {}
 * ```
 */
export class TransmissionSession implements ITransmissionSession {
  readonly stream: ChunkedStreamType;
  readonly events: DeviceEmitter;
  private readonly sink: ITransportSink;
  private readonly producer: ICaptureProducer;
  private readonly maxChunkSize: number;
  private readonly maxPayload: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly logContext: string;

  private state: SessionState = IDLE;
  private framesSent = 0;
  private completedTransfers = 0;
  private abortedTransfers = 0;

  constructor(options: TransmissionSessionOptions) {
    this.stream = options.stream;
    this.sink = options.sink;
    this.producer = options.producer;
    this.maxChunkSize = options.maxChunkSize;
    this.maxPayload = options.maxPayload;
    if (Math.min(this.maxChunkSize, this.maxPayload - FRAME_HEADER_SIZE) <= 0) {
      throw new CodecError(
        `No room for payload: maxChunkSize=${options.maxChunkSize}, maxPayload=${options.maxPayload}`,
        "CHUNK_TOO_SMALL"
      );
    }
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new Logger();
    this.events = options.events ?? new DeviceEmitter();
    this.logContext = `Session:${this.stream.toLowerCase()}`;
  }

  // ─── Commands ───────────────────────────────────────────────────

  begin(buffer: CaptureBuffer): SessionStartResult {
    if (this.state.phase === "SENDING") {
      this.logger.debug(
        `Refused buffer #${buffer.id}: transfer in flight`,
        this.logContext
      );
      return "BUSY";
    }

    if (buffer.data.length === 0) {
      this.producer.release(buffer);
      this.logger.debug(`Buffer #${buffer.id} is empty; released`, this.logContext);
      return "EMPTY";
    }

    this.state = {
      phase: "SENDING",
      buffer,
      totalLength: buffer.data.length,
      bytesSent: 0,
      sequence: toSequenceNumber(0),
    };
    this.framesSent = 0;

    this.logger.debug(
      `Started buffer #${buffer.id} (${buffer.data.length} bytes)`,
      this.logContext
    );
    this.events.emit({
      type: "SESSION_STARTED",
      stream: this.stream,
      totalLength: buffer.data.length,
      timestamp: this.clock.now(),
    });
    return "STARTED";
  }

  step(): SessionStepResult {
    const state = this.state;
    if (state.phase === "IDLE") return "IDLE";

    if (!this.sink.isReady()) {
      this.abort("link not ready");
      return "ABORTED";
    }

    const remaining = state.totalLength - state.bytesSent;

    if (remaining === 0) {
      if (!this.trySend(encodeEndMarker(this.stream))) return "ABORTED";

      this.state = IDLE;
      this.completedTransfers++;
      this.producer.release(state.buffer);
      this.logger.debug(
        `Completed ${state.totalLength} bytes in ${this.framesSent} frames`,
        this.logContext
      );
      this.events.emit({
        type: "SESSION_COMPLETED",
        stream: this.stream,
        totalLength: state.totalLength,
        frames: this.framesSent,
        timestamp: this.clock.now(),
      });
      return "COMPLETED";
    }

    const chunkSize = this.getChunkSize();
    if (chunkSize <= 0) {
      this.abort(`payload limit ${this.sink.getMaxPayload()} leaves no room for data`);
      return "ABORTED";
    }

    const length = Math.min(remaining, chunkSize);
    const payload = state.buffer.data.subarray(
      state.bytesSent,
      state.bytesSent + length
    );
    if (!this.trySend(encodeFrame(state.sequence, this.stream, payload))) {
      return "ABORTED";
    }

    const bytesSent = state.bytesSent + length;
    this.state = {
      ...state,
      bytesSent,
      sequence: nextSequence(state.sequence),
    };
    this.framesSent++;
    this.events.emit({
      type: "FRAME_SENT",
      stream: this.stream,
      sequence: state.sequence,
      payloadLength: length,
      bytesSent,
      totalLength: state.totalLength,
      timestamp: this.clock.now(),
    });
    return "CHUNK_SENT";
  }

  abort(reason: string): boolean {
    const state = this.state;
    if (state.phase === "IDLE") return false;

    this.state = IDLE;
    this.abortedTransfers++;
    this.producer.release(state.buffer);

    this.logger.warn(
      `Aborted at ${state.bytesSent}/${state.totalLength} bytes: ${reason}`,
      this.logContext
    );
    this.events.emit({
      type: "SESSION_ABORTED",
      stream: this.stream,
      reason,
      bytesSent: state.bytesSent,
      totalLength: state.totalLength,
      timestamp: this.clock.now(),
    });
    return true;
  }

  // ─── Queries ────────────────────────────────────────────────────

  isActive(): boolean {
    return this.state.phase === "SENDING";
  }

  snapshot(): SessionSnapshot {
    const state = this.state;
    const sending = state.phase === "SENDING";
    return {
      stream: this.stream,
      active: sending,
      totalLength: sending ? state.totalLength : 0,
      bytesSent: sending ? state.bytesSent : 0,
      sequence: sending ? state.sequence : toSequenceNumber(0),
      completedTransfers: this.completedTransfers,
      abortedTransfers: this.abortedTransfers,
    };
  }

  getChunkSize(): number {
    const payload = Math.min(this.maxPayload, this.sink.getMaxPayload());
    return Math.min(this.maxChunkSize, payload - FRAME_HEADER_SIZE);
  }

  // ─── Internals ──────────────────────────────────────────────────

  /** Sends one frame; aborts the transfer if the sink rejects it. */
  private trySend(frame: Uint8Array): boolean {
    try {
      this.sink.send(frame);
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.abort(`send failed: ${message}`);
      return false;
    }
  }
}
