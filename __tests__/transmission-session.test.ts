import { describe, it, expect, beforeEach, vi } from "vitest";
import { TransmissionSession } from "../src/primitives/transmission-session.js";
import { DeviceEmitter } from "../src/primitives/base-emitter.js";
import { ManualClock } from "../src/primitives/clock.js";
import { QueueProducer } from "../src/backends/memory-producer.js";
import { InMemoryLink } from "../src/transports/in-memory.js";
import { concatBytes } from "../src/codec/index.js";
import type { ICaptureProducer } from "../src/interfaces/capture.js";
import type { CaptureBuffer } from "../src/types/capture.js";
import { Logger, silentSink } from "../src/utils/logger.js";

function bytes(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => i & 0xff);
}

describe("TransmissionSession", () => {
  let clock: ManualClock;
  let link: InMemoryLink;
  let producer: QueueProducer;
  let events: DeviceEmitter;

  beforeEach(() => {
    clock = new ManualClock(0);
    link = new InMemoryLink({ maxPayload: 403 });
    link.connect();
    producer = new QueueProducer(clock);
    events = new DeviceEmitter();
  });

  function createSession(maxChunkSize = 400, maxPayload = 403): TransmissionSession {
    return new TransmissionSession({
      stream: "PHOTO",
      sink: link.channel("PHOTO"),
      producer,
      maxChunkSize,
      maxPayload,
      clock,
      logger: new Logger({ sink: silentSink }),
      events,
    });
  }

  function capture(length: number): CaptureBuffer {
    producer.enqueue(bytes(length));
    const buffer = producer.tryProduce();
    if (!buffer) throw new Error("producer yielded nothing");
    return buffer;
  }

  describe("begin() / step()", () => {
    it("should send 1000 bytes as 400/400/200 and then the end marker", () => {
      const session = createSession();
      const buffer = capture(1000);

      expect(session.begin(buffer)).toBe("STARTED");

      const progress: number[] = [];
      for (let i = 0; i < 3; i++) {
        expect(session.step()).toBe("CHUNK_SENT");
        progress.push(session.snapshot().bytesSent);
      }
      expect(progress).toEqual([400, 800, 1000]);
      expect(producer.releasedCount()).toBe(0);

      expect(session.step()).toBe("COMPLETED");

      const frames = link.sent("PHOTO");
      expect(frames.map((f) => f.length)).toEqual([403, 403, 203, 3]);
      expect(frames.map((f) => [...f.subarray(0, 3)])).toEqual([
        [0x00, 0x00, 0x01],
        [0x01, 0x00, 0x01],
        [0x02, 0x00, 0x01],
        [0xff, 0xff, 0x01],
      ]);
      expect(concatBytes(frames.slice(0, 3).map((f) => f.subarray(3)))).toEqual(buffer.data);

      expect(producer.releasedCount()).toBe(1);
      expect(producer.outstanding()).toBe(0);
      expect(session.snapshot()).toMatchObject({ active: false, completedTransfers: 1 });
      expect(session.step()).toBe("IDLE");
    });

    it("should cap the chunk size by the transport payload", () => {
      const session = createSession(400, 103);
      expect(session.getChunkSize()).toBe(100);

      session.begin(capture(250));
      while (session.step() === "CHUNK_SENT") {
        // drain
      }
      expect(link.sent("PHOTO").map((f) => f.length)).toEqual([103, 103, 53, 3]);
    });

    it("should restart sequence numbers at 0 for every transfer", () => {
      const session = createSession();
      session.begin(capture(10));
      session.step();
      session.step();
      link.clear();

      session.begin(capture(10));
      session.step();
      const first = link.sent("PHOTO")[0];
      expect(first ? [...first.subarray(0, 3)] : []).toEqual([0, 0, 1]);
    });

    it("should emit progress events", () => {
      const started = vi.fn();
      const sent = vi.fn();
      const completed = vi.fn();
      events.on("SESSION_STARTED", started);
      events.on("FRAME_SENT", sent);
      events.on("SESSION_COMPLETED", completed);

      const session = createSession();
      session.begin(capture(1000));
      for (let i = 0; i < 4; i++) session.step();

      expect(started).toHaveBeenCalledWith({
        type: "SESSION_STARTED",
        stream: "PHOTO",
        totalLength: 1000,
        timestamp: 0,
      });
      expect(sent).toHaveBeenCalledTimes(3);
      expect(sent).toHaveBeenNthCalledWith(1, {
        type: "FRAME_SENT",
        stream: "PHOTO",
        sequence: 0,
        payloadLength: 400,
        bytesSent: 400,
        totalLength: 1000,
        timestamp: 0,
      });
      expect(completed).toHaveBeenCalledWith(
        expect.objectContaining({ totalLength: 1000, frames: 3 })
      );
    });
  });

  describe("single flight", () => {
    it("should refuse a second buffer and leave it with the caller", () => {
      const session = createSession();
      const first = capture(1000);
      const second = capture(500);

      expect(session.begin(first)).toBe("STARTED");
      session.step();
      expect(session.begin(second)).toBe("BUSY");

      expect(session.snapshot()).toMatchObject({ totalLength: 1000, bytesSent: 400 });
      expect(producer.outstanding()).toBe(2);
      expect(producer.releasedCount()).toBe(0);
    });

    it("should release an empty buffer at once and stay idle", () => {
      const session = createSession();
      expect(session.begin(capture(0))).toBe("EMPTY");
      expect(session.isActive()).toBe(false);
      expect(producer.releasedCount()).toBe(1);
      expect(link.sent()).toEqual([]);
    });
  });

  describe("abort()", () => {
    it("should release once, reset the counters and send no end marker", () => {
      const aborted = vi.fn();
      events.on("SESSION_ABORTED", aborted);
      const session = createSession(200, 403);
      session.begin(capture(1000));
      session.step();
      expect(session.snapshot().bytesSent).toBe(200);

      expect(session.abort("cancelled")).toBe(true);

      expect(producer.releasedCount()).toBe(1);
      expect(session.snapshot()).toMatchObject({
        active: false,
        bytesSent: 0,
        totalLength: 0,
        sequence: 0,
        abortedTransfers: 1,
      });
      expect(link.sent("PHOTO")).toHaveLength(1);
      expect(aborted).toHaveBeenCalledWith({
        type: "SESSION_ABORTED",
        stream: "PHOTO",
        reason: "cancelled",
        bytesSent: 200,
        totalLength: 1000,
        timestamp: 0,
      });

      expect(session.abort("again")).toBe(false);
      expect(producer.releasedCount()).toBe(1);
    });

    it("should abort when the sink is not ready", () => {
      const session = createSession();
      session.begin(capture(1000));
      session.step();
      link.disconnect();

      expect(session.step()).toBe("ABORTED");
      expect(producer.releasedCount()).toBe(1);
      expect(session.isActive()).toBe(false);
    });

    it("should abort when the sink rejects a frame", () => {
      const aborted = vi.fn();
      events.on("SESSION_ABORTED", aborted);
      const session = createSession();
      session.begin(capture(1000));
      link.failNextSends(1);

      expect(session.step()).toBe("ABORTED");
      expect(aborted).toHaveBeenCalledWith(
        expect.objectContaining({ reason: "send failed: Injected send failure", bytesSent: 0 })
      );
      expect(producer.outstanding()).toBe(0);
    });

    it("should abort when the end marker cannot be sent", () => {
      const session = createSession();
      session.begin(capture(10));
      session.step();
      link.failNextSends(1);

      expect(session.step()).toBe("ABORTED");
      expect(session.snapshot()).toMatchObject({ completedTransfers: 0, abortedTransfers: 1 });
      expect(producer.releasedCount()).toBe(1);
    });
  });

  describe("payload limit changes", () => {
    it("should shrink chunks when the link renegotiates a smaller payload", () => {
      const session = createSession();
      const buffer = capture(1000);
      session.begin(buffer);
      session.step();

      link.setMaxPayload(103);
      expect(session.getChunkSize()).toBe(100);
      while (session.step() === "CHUNK_SENT") {
        // drain
      }

      const frames = link.sent("PHOTO");
      expect(frames.map((f) => f.length)).toEqual([403, 103, 103, 103, 103, 103, 103, 3]);
      expect(concatBytes(frames.slice(0, 7).map((f) => f.subarray(3)))).toEqual(buffer.data);
      expect(session.snapshot().completedTransfers).toBe(1);
    });

    it("should never exceed its configured ceiling", () => {
      const session = createSession(400, 203);
      link.setMaxPayload(512);
      expect(session.getChunkSize()).toBe(200);
    });

    it("should abort when the payload leaves no room for data", () => {
      const aborted = vi.fn();
      events.on("SESSION_ABORTED", aborted);
      const session = createSession();
      session.begin(capture(10));
      link.setMaxPayload(3);

      expect(session.step()).toBe("ABORTED");
      expect(aborted).toHaveBeenCalledWith(
        expect.objectContaining({ reason: "payload limit 3 leaves no room for data" })
      );
      expect(producer.outstanding()).toBe(0);
    });
  });

  describe("completion", () => {
    it("should be idle even when the producer fails to take the buffer back", () => {
      const faultyProducer: ICaptureProducer = {
        tryProduce: () => null,
        release: () => {
          throw new Error("driver fault");
        },
      };
      const session = new TransmissionSession({
        stream: "PHOTO",
        sink: link.channel("PHOTO"),
        producer: faultyProducer,
        maxChunkSize: 400,
        maxPayload: 403,
        clock,
        logger: new Logger({ sink: silentSink }),
        events,
      });
      session.begin({ id: 1, data: bytes(10), capturedAt: 0 });

      expect(session.step()).toBe("CHUNK_SENT");
      expect(() => session.step()).toThrow("driver fault");

      expect(session.isActive()).toBe(false);
      expect(session.step()).toBe("IDLE");
      expect(link.sent("PHOTO").map((f) => f.length)).toEqual([13, 3]);
    });
  });
});
