/**
 * @module codec
 * @description Wire codec: byte layouts for the capture streams.
 *
 * All multi-byte integers are little-endian.
 *
 * Data frame (3-byte header):
 * - [0] sequence low byte
 * - [1] sequence high byte
 * - [2] stream type (0x00 audio, 0x01 photo, 0x02 video)
 * - [3..] payload, at least one byte
 *
 * End Marker (exactly 3 bytes):
 * - [0xFF][0xFF][stream type]
 *
 * Sub-chunk of an oversized logical frame (4-byte header):
 * - [0] sequence low byte
 * - [1] sequence high byte
 * - [2] chunk index
 * - [3] flags (0x80 = last chunk)
 * - [4..] payload
 */

import {
  nextSequence,
  toSequenceNumber,
  type SequenceNumber,
} from "../types/branded.js";
import type {
  ChunkedStreamType,
  DecodedFrame,
  StreamType,
  SubChunk,
} from "../types/stream.js";

// ─── Constants ──────────────────────────────────────────────────────

export const FRAME_HEADER_SIZE = 3;
export const SUBCHUNK_HEADER_SIZE = 4;
export const END_MARKER_BYTE = 0xff;
export const END_MARKER_SIZE = 3;
export const SUBCHUNK_LAST_FLAG = 0x80;
/** Chunk indices are a single byte. */
export const MAX_SUBCHUNKS = 0x100;

export const STREAM_TYPE_BYTE: Readonly<Record<StreamType, number>> = {
  AUDIO: 0x00,
  PHOTO: 0x01,
  VIDEO: 0x02,
};

/**
 * Errors thrown while encoding or decoding wire data.
 */
export class CodecError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "TRUNCATED"
      | "EMPTY_PAYLOAD"
      | "UNKNOWN_STREAM"
      | "CHUNK_TOO_SMALL"
      | "TOO_MANY_CHUNKS"
      | "OUT_OF_ORDER"
      | "SEQUENCE_GAP"
  ) {
    super(message);
    this.name = "CodecError";
  }
}

// ─── Stream Type Bytes ──────────────────────────────────────────────

/**
 * Map a type byte back to its stream.
 * @throws {CodecError} code=UNKNOWN_STREAM
 */
export function streamFromByte(byte: number): StreamType {
  switch (byte) {
    case 0x00:
      return "AUDIO";
    case 0x01:
      return "PHOTO";
    case 0x02:
      return "VIDEO";
    default:
      throw new CodecError(
        `Unknown stream type 0x${byte.toString(16).padStart(2, "0")}`,
        "UNKNOWN_STREAM"
      );
  }
}

// ─── Frames ─────────────────────────────────────────────────────────

/**
 * Serialize a data frame.
 *
 * @param sequence - 16-bit frame counter.
 * @param stream - Stream the payload belongs to.
 * @param payload - Frame body; must not be empty.
 * @returns `FRAME_HEADER_SIZE + payload.length` bytes.
 */
export function encodeFrame(
  sequence: SequenceNumber,
  stream: StreamType,
  payload: Uint8Array
): Uint8Array {
  if (payload.length === 0) {
    throw new CodecError("Data frames carry at least one byte", "EMPTY_PAYLOAD");
  }
  const frame = new Uint8Array(FRAME_HEADER_SIZE + payload.length);
  frame[0] = sequence & 0xff;
  frame[1] = (sequence >>> 8) & 0xff;
  frame[2] = STREAM_TYPE_BYTE[stream];
  frame.set(payload, FRAME_HEADER_SIZE);
  return frame;
}

/**
 * Serialize the End Marker closing a chunked transfer.
 */
export function encodeEndMarker(stream: ChunkedStreamType): Uint8Array {
  return Uint8Array.of(END_MARKER_BYTE, END_MARKER_BYTE, STREAM_TYPE_BYTE[stream]);
}

/**
 * Parse one received notification.
 *
 * A 3-byte `[FF FF t]` buffer is an End Marker. Data frames always carry
 * a payload, so they are never confused with one.
 *
 * @throws {CodecError} on short input, an empty data frame or an unknown type.
 */
export function decodeFrame(bytes: Uint8Array): DecodedFrame {
  if (bytes.length < FRAME_HEADER_SIZE) {
    throw new CodecError(
      `Frame too short: ${bytes.length} bytes`,
      "TRUNCATED"
    );
  }

  const lo = bytes[0] ?? 0;
  const hi = bytes[1] ?? 0;
  const stream = streamFromByte(bytes[2] ?? 0);

  if (bytes.length === END_MARKER_SIZE) {
    if (lo === END_MARKER_BYTE && hi === END_MARKER_BYTE && stream !== "AUDIO") {
      return { kind: "END", stream };
    }
    throw new CodecError("Data frame without payload", "EMPTY_PAYLOAD");
  }

  return {
    kind: "DATA",
    sequence: toSequenceNumber(lo | (hi << 8)),
    stream,
    payload: bytes.slice(FRAME_HEADER_SIZE),
  };
}

// ─── Sub-chunks ─────────────────────────────────────────────────────

export function encodeSubChunk(chunk: SubChunk): Uint8Array {
  if (chunk.index < 0 || chunk.index >= MAX_SUBCHUNKS) {
    throw new CodecError(
      `Sub-chunk index ${chunk.index} does not fit in one byte`,
      "TOO_MANY_CHUNKS"
    );
  }
  const out = new Uint8Array(SUBCHUNK_HEADER_SIZE + chunk.payload.length);
  out[0] = chunk.sequence & 0xff;
  out[1] = (chunk.sequence >>> 8) & 0xff;
  out[2] = chunk.index;
  out[3] = chunk.last ? SUBCHUNK_LAST_FLAG : 0x00;
  out.set(chunk.payload, SUBCHUNK_HEADER_SIZE);
  return out;
}

export function decodeSubChunk(bytes: Uint8Array): SubChunk {
  if (bytes.length < SUBCHUNK_HEADER_SIZE) {
    throw new CodecError(
      `Sub-chunk too short: ${bytes.length} bytes`,
      "TRUNCATED"
    );
  }
  const lo = bytes[0] ?? 0;
  const hi = bytes[1] ?? 0;
  return {
    sequence: toSequenceNumber(lo | (hi << 8)),
    index: bytes[2] ?? 0,
    last: ((bytes[3] ?? 0) & SUBCHUNK_LAST_FLAG) !== 0,
    payload: bytes.slice(SUBCHUNK_HEADER_SIZE),
  };
}

/**
 * Split a logical frame into sub-chunks that each fit `maxPayload`.
 *
 * Every piece carries `maxPayload - SUBCHUNK_HEADER_SIZE` bytes except the
 * last, which carries the remainder and the 0x80 flag.
 *
 * @returns Encoded sub-chunks in send order.
 */
export function splitSubChunks(
  frame: Uint8Array,
  sequence: SequenceNumber,
  maxPayload: number
): Uint8Array[] {
  const chunkSize = maxPayload - SUBCHUNK_HEADER_SIZE;
  if (chunkSize <= 0) {
    throw new CodecError(
      `Payload limit ${maxPayload} leaves no room after the sub-chunk header`,
      "CHUNK_TOO_SMALL"
    );
  }
  const count = Math.max(1, Math.ceil(frame.length / chunkSize));
  if (count > MAX_SUBCHUNKS) {
    throw new CodecError(
      `${frame.length} bytes need ${count} sub-chunks (max ${MAX_SUBCHUNKS})`,
      "TOO_MANY_CHUNKS"
    );
  }

  const parts: Uint8Array[] = [];
  for (let index = 0; index < count; index++) {
    const start = index * chunkSize;
    parts.push(
      encodeSubChunk({
        sequence,
        index,
        last: index === count - 1,
        payload: frame.subarray(start, Math.min(start + chunkSize, frame.length)),
      })
    );
  }
  return parts;
}

// ─── Receivers ──────────────────────────────────────────────────────

/**
 * Reassembles logical frames from sub-chunks.
 *
 * A chunk with index 0 always starts a new frame, discarding any partial
 * one. Any other out-of-order chunk drops the partial frame and throws.
 */
export class SubChunkAssembler {
  private sequence: SequenceNumber | null = null;
  private expectedIndex = 0;
  private parts: Uint8Array[] = [];

  /**
   * @returns The completed frame on its last chunk, otherwise null.
   * @throws {CodecError} code=OUT_OF_ORDER
   */
  push(chunk: SubChunk): Uint8Array | null {
    if (chunk.index === 0) {
      this.reset();
      this.sequence = chunk.sequence;
    } else if (
      chunk.sequence !== this.sequence ||
      chunk.index !== this.expectedIndex
    ) {
      const expected = this.expectedIndex;
      this.reset();
      throw new CodecError(
        `Sub-chunk ${chunk.sequence}/${chunk.index} out of order (expected index ${expected})`,
        "OUT_OF_ORDER"
      );
    }

    this.parts.push(chunk.payload);
    this.expectedIndex = chunk.index + 1;

    if (!chunk.last) return null;
    const frame = concatBytes(this.parts);
    this.reset();
    return frame;
  }

  reset(): void {
    this.sequence = null;
    this.expectedIndex = 0;
    this.parts = [];
  }
}

/**
 * Reassembles one chunked transfer from decoded frames.
 *
 * Data frames must be sequence-contiguous. The End Marker yields the
 * transfer and starts over.
 */
export class StreamAssembler {
  private nextExpected: SequenceNumber | null = null;
  private parts: Uint8Array[] = [];

  constructor(private readonly stream: ChunkedStreamType) {}

  /**
   * @returns The whole transfer when `frame` is the End Marker, otherwise null.
   * @throws {CodecError} code=SEQUENCE_GAP when a frame is missing.
   */
  push(frame: DecodedFrame): Uint8Array | null {
    if (frame.stream !== this.stream) return null;

    if (frame.kind === "END") {
      const transfer = concatBytes(this.parts);
      this.reset();
      return transfer;
    }

    if (this.nextExpected !== null && frame.sequence !== this.nextExpected) {
      const expected = this.nextExpected;
      this.reset();
      throw new CodecError(
        `Expected frame ${expected}, got ${frame.sequence}`,
        "SEQUENCE_GAP"
      );
    }
    this.parts.push(frame.payload);
    this.nextExpected = nextSequence(frame.sequence);
    return null;
  }

  /** Bytes received for the transfer in progress. */
  pendingBytes(): number {
    return this.parts.reduce((sum, part) => sum + part.length, 0);
  }

  reset(): void {
    this.nextExpected = null;
    this.parts = [];
  }
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
