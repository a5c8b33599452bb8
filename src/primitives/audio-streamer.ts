/**
 * @module primitives/audio-streamer
 * @description Sends encoded audio blocks, one logical frame per block.
 *
 * Each block gets its own 16-bit frame counter. The layout depends on
 * whether the block fits one notification at the current payload limit:
 *
 * | Mode       | When                          | Layout                      |
 * |------------|-------------------------------|-----------------------------|
 * | FRAMED     | block + 3 <= payload limit    | [seq_lo][seq_hi][0x00] data |
 * | SUBCHUNKED | otherwise                     | sub-chunks, 4-byte header   |
 *
 * The payload limit is the smaller of the configured ceiling and what the
 * sink reports, read again for every block.
 */

import { DeviceEmitter } from "./base-emitter.js";
import { systemClock, type Clock } from "./clock.js";
import {
  CodecError,
  FRAME_HEADER_SIZE,
  encodeFrame,
  splitSubChunks,
} from "../codec/index.js";
import type { ITransportSink } from "../interfaces/transport.js";
import {
  nextSequence,
  toSequenceNumber,
  type SequenceNumber,
} from "../types/branded.js";
import { Logger } from "../utils/logger.js";

const LOG_CONTEXT = "AudioStreamer";

export type AudioFramingMode = "FRAMED" | "SUBCHUNKED";

export type AudioSendResult = "SENT" | "EMPTY" | "NOT_READY" | "OVERSIZE" | "FAILED";

export interface AudioStreamerOptions {
  readonly sink: ITransportSink;
  /** Upper bound on notification size, header included. */
  readonly maxPayload: number;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly events?: DeviceEmitter;
}

export class AudioStreamer {
  readonly events: DeviceEmitter;
  private readonly sink: ITransportSink;
  private readonly maxPayload: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private sequence: SequenceNumber = toSequenceNumber(0);
  private framesSent = 0;

  constructor(options: AudioStreamerOptions) {
    this.sink = options.sink;
    this.maxPayload = options.maxPayload;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new Logger();
    this.events = options.events ?? new DeviceEmitter();
  }

  /** Bytes per notification right now. */
  payloadLimit(): number {
    return Math.min(this.maxPayload, this.sink.getMaxPayload());
  }

  /** Layout a block of `length` bytes would get at the current limit. */
  framingFor(length: number): AudioFramingMode {
    return length + FRAME_HEADER_SIZE <= this.payloadLimit() ? "FRAMED" : "SUBCHUNKED";
  }

  /**
   * Sends one encoded block.
   *
   * A sub-chunked block that fails part way through still consumes the
   * frame counter, so the receiver drops the partial frame.
   */
  send(block: Uint8Array): AudioSendResult {
    if (block.length === 0) return "EMPTY";
    if (!this.sink.isReady()) return "NOT_READY";

    const sequence = this.sequence;
    const limit = this.payloadLimit();
    let parts: Uint8Array[];
    try {
      parts =
        this.framingFor(block.length) === "FRAMED"
          ? [encodeFrame(sequence, "AUDIO", block)]
          : splitSubChunks(block, sequence, limit);
    } catch (err) {
      if (!(err instanceof CodecError)) throw err;
      this.logger.warn(
        `Dropped ${block.length}-byte block at payload limit ${limit}: ${err.message}`,
        LOG_CONTEXT
      );
      return "OVERSIZE";
    }

    let sent = 0;
    try {
      for (const part of parts) {
        this.sink.send(part);
        sent++;
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(
        `Block ${sequence} failed after ${sent}/${parts.length} parts: ${message}`,
        LOG_CONTEXT
      );
      if (sent > 0) this.sequence = nextSequence(sequence);
      return "FAILED";
    }

    this.sequence = nextSequence(sequence);
    this.framesSent++;
    this.events.emit({
      type: "AUDIO_FRAME_SENT",
      sequence,
      parts: parts.length,
      bytes: block.length,
      timestamp: this.clock.now(),
    });
    return "SENT";
  }

  /** Restarts the frame counter, e.g. after the link dropped. */
  reset(): void {
    this.sequence = toSequenceNumber(0);
  }

  getSequence(): SequenceNumber {
    return this.sequence;
  }

  getFramesSent(): number {
    return this.framesSent;
  }
}
