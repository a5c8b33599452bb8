import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CaptureDevice } from "../src/device.js";
import { ConfigError, type DeviceConfigInput } from "../src/config.js";
import { CycleRegistrationError } from "../src/interfaces/cycle-manager.js";
import { InMemoryLink } from "../src/transports/in-memory.js";
import { QueueProducer } from "../src/backends/memory-producer.js";
import { ManualClock } from "../src/primitives/clock.js";
import { StreamAssembler, decodeFrame } from "../src/codec/index.js";
import type { DeviceEventMap } from "../src/types/events.js";
import { Logger, silentSink, type LogEntry } from "../src/utils/logger.js";

function bytes(length: number, seed = 0): Uint8Array {
  const data = new Uint8Array(length);
  for (let i = 0; i < length; i++) data[i] = (i + seed) % 251;
  return data;
}

function reassemble(frames: Uint8Array[]): Uint8Array | null {
  const assembler = new StreamAssembler("PHOTO");
  let result: Uint8Array | null = null;
  for (const frame of frames) {
    result = assembler.push(decodeFrame(frame)) ?? result;
  }
  return result;
}

describe("CaptureDevice", () => {
  let clock: ManualClock;
  let link: InMemoryLink;
  let camera: QueueProducer;
  let microphone: QueueProducer;
  let device: CaptureDevice;

  function createDevice(config: DeviceConfigInput = {}, logger?: Logger): CaptureDevice {
    return new CaptureDevice({
      link,
      camera,
      microphone,
      clock,
      logger: logger ?? new Logger({ sink: silentSink }),
      config: { connectionMonitorIntervalMs: 10, ...config },
    });
  }

  function runUntil(until: number): void {
    while (clock.now() < until) {
      clock.advance(10);
      device.update();
    }
  }

  beforeEach(() => {
    clock = new ManualClock(0);
    link = new InMemoryLink({ maxPayload: 403 });
    camera = new QueueProducer(clock);
    microphone = new QueueProducer(clock);
    link.connect();
    device = createDevice();
    device.boot();
    device.markReady();
  });

  afterEach(() => {
    device.stop();
  });

  describe("boot", () => {
    it("should register every cycle once", () => {
      expect(device.isBooted()).toBe(true);
      expect(device.manager.getCycleCount()).toBe(8);

      device.boot();
      expect(device.manager.getCycleCount()).toBe(8);
    });

    it("should expose cycle ids by name", () => {
      const id = device.cycleId("PhotoCapture");
      expect(id).toBeDefined();
      if (id === undefined) return;
      expect(device.manager.stats(id)?.name).toBe("PhotoCapture");
      expect(device.cycleId("Nope")).toBeUndefined();
    });

    it("should skip audio without a microphone", () => {
      const silent = new CaptureDevice({
        link,
        camera,
        clock,
        logger: new Logger({ sink: silentSink }),
      });
      silent.boot();

      expect(silent.audio).toBeNull();
      expect(silent.cycleId("AudioCapture")).toBeUndefined();
      expect(silent.manager.getCycleCount()).toBe(7);
    });

    it("should throw when the cycle table is too small", () => {
      const small = createDevice({ cycleCapacity: 4 });
      expect(() => small.boot()).toThrow(CycleRegistrationError);
    });

    it("should reject an invalid config", () => {
      expect(() => createDevice({ maxChunkSize: 500 })).toThrow(ConfigError);
    });
  });

  describe("photo", () => {
    it("should refuse control before the device is ready", () => {
      device.markReady(false);
      expect(device.handlePhotoControl(-1)).toEqual({
        accepted: false,
        reason: "device not ready",
      });
    });

    it("should capture and transfer a single shot", () => {
      const photo = bytes(1000);
      camera.enqueue(photo);
      expect(device.handlePhotoControl(-1)).toEqual({ accepted: true, action: "single shot" });

      runUntil(40);

      const frames = link.sent("PHOTO");
      expect(frames.map((frame) => frame.length)).toEqual([403, 403, 203, 3]);
      expect(reassemble(frames)).toEqual(photo);
      expect(camera.releasedCount()).toBe(1);
      expect(device.control.getPhotoMode()).toEqual({ kind: "IDLE" });

      runUntil(200);
      expect(camera.attempts()).toBe(1);
    });

    it("should size chunks to a payload renegotiated after construction", () => {
      link.setMaxPayload(185);
      const photo = bytes(1000);
      camera.enqueue(photo);
      device.handlePhotoControl(-1);

      runUntil(70);

      const frames = link.sent("PHOTO");
      expect(frames.map((frame) => frame.length)).toEqual([185, 185, 185, 185, 185, 93, 3]);
      expect(reassemble(frames)).toEqual(photo);
      expect(device.photoSession.snapshot()).toMatchObject({
        completedTransfers: 1,
        abortedTransfers: 0,
      });
    });

    it("should retry a failed capture without blocking the loop", () => {
      device.handlePhotoControl(-1);

      runUntil(10);
      expect(camera.attempts()).toBe(1);
      expect(device.isRetryPending()).toBe(true);

      camera.enqueue(bytes(50));
      runUntil(250);
      expect(camera.attempts()).toBe(1);

      runUntil(270);
      expect(camera.attempts()).toBe(2);
      expect(device.isRetryPending()).toBe(false);
      expect(link.sent("PHOTO").map((frame) => frame.length)).toEqual([53, 3]);
      expect(device.control.getPhotoMode()).toEqual({ kind: "IDLE" });
    });

    it("should report a capture that fails every attempt", () => {
      const failed: Array<DeviceEventMap["CAPTURE_FAILED"]> = [];
      device.on("CAPTURE_FAILED", (event) => failed.push(event));
      device.handlePhotoControl(-1);

      runUntil(1000);

      expect(camera.attempts()).toBe(3);
      expect(failed).toEqual([
        { type: "CAPTURE_FAILED", stream: "PHOTO", attempts: 3, timestamp: 510 },
      ]);
      expect(device.control.getPhotoMode()).toEqual({ kind: "IDLE" });
    });

    it("should abort the transfer when the link drops and start clean after", () => {
      const changes: Array<DeviceEventMap["LINK_CHANGED"]> = [];
      device.on("LINK_CHANGED", (event) => changes.push(event));
      camera.enqueue(bytes(2000));
      device.handlePhotoControl(-1);

      runUntil(20);
      expect(link.sent("PHOTO")).toHaveLength(2);
      expect(device.isLinkReady()).toBe(true);

      link.disconnect();
      runUntil(30);

      expect(changes.at(-1)).toEqual({
        type: "LINK_CHANGED",
        ready: false,
        abortedSessions: ["PHOTO"],
        timestamp: 30,
      });
      expect(device.photoSession.isActive()).toBe(false);
      expect(camera.outstanding()).toBe(0);

      link.connect();
      link.clear();
      runUntil(40);
      expect(device.isLinkReady()).toBe(true);

      camera.enqueue(bytes(10));
      device.handlePhotoControl(-1);
      runUntil(50);

      const first = link.sent("PHOTO")[0];
      expect(first ? [...first.subarray(0, 3)] : []).toEqual([0, 0, 1]);
    });
  });

  describe("video", () => {
    it("should not start while a photo uploads", () => {
      camera.enqueue(bytes(2000));
      device.handlePhotoControl(-1);
      runUntil(10);

      expect(device.handleVideoControl(1)).toEqual({
        accepted: false,
        reason: "photo upload in progress",
      });
    });

    it("should drop a frame while the previous one is still in flight", () => {
      const drops: Array<DeviceEventMap["FRAME_DROPPED"]> = [];
      device.on("FRAME_DROPPED", (event) => drops.push(event));
      camera.enqueue(bytes(10_000), bytes(10_000));
      expect(device.handleVideoControl(1)).toEqual({ accepted: true, action: "started" });

      runUntil(410);

      expect(drops).toEqual([
        { type: "FRAME_DROPPED", stream: "VIDEO", droppedFrames: 1, timestamp: 210 },
      ]);
      expect(device.videoStatus()).toEqual({
        streaming: true,
        fps: 5,
        frameCount: 2,
        droppedFrames: 1,
      });
      expect(link.sent("VIDEO")).toHaveLength(27);
      expect(camera.releasedCount()).toBe(1);
    });

    it("should stop taking frames once stopped", () => {
      camera.enqueue(bytes(100), bytes(100));
      device.handleVideoControl(1);
      runUntil(10);
      device.handleVideoControl(0);

      runUntil(1000);

      expect(camera.attempts()).toBe(1);
      expect(device.videoStatus().streaming).toBe(false);
    });
  });

  describe("audio", () => {
    it("should stream each microphone block as one frame", () => {
      microphone.enqueue(bytes(320), bytes(320, 1));

      runUntil(20);

      const frames = link.sent("AUDIO");
      expect(frames.map((frame) => frame.length)).toEqual([323, 323]);
      expect(frames.map((frame) => [...frame.subarray(0, 3)])).toEqual([
        [0, 0, 0],
        [1, 0, 0],
      ]);
      expect(microphone.releasedCount()).toBe(2);
    });

    it("should split a block larger than one notification into sub-chunks", () => {
      microphone.enqueue(bytes(1000));

      runUntil(10);

      const parts = link.sent("AUDIO");
      expect(parts.map((part) => part.length)).toEqual([403, 403, 206]);
      expect(parts.map((part) => [...part.subarray(0, 4)])).toEqual([
        [0, 0, 0, 0x00],
        [0, 0, 1, 0x00],
        [0, 0, 2, 0x80],
      ]);
      const id = device.cycleId("AudioCapture");
      expect(id).toBeDefined();
      if (id === undefined) return;
      expect(device.manager.state(id)).toBe("ACTIVE");
      expect(microphone.releasedCount()).toBe(1);
    });

    it("should leave audio off when disabled in config", () => {
      device = createDevice({ audioCaptureEnabled: false });
      device.boot();
      microphone.enqueue(bytes(320));

      runUntil(100);

      const id = device.cycleId("AudioCapture");
      expect(id).toBeDefined();
      if (id === undefined) return;
      expect(device.manager.state(id)).toBe("INACTIVE");
      expect(link.sent("AUDIO")).toEqual([]);
    });
  });

  describe("stats", () => {
    it("should log a summary every stats interval", () => {
      const entries: LogEntry[] = [];
      device = createDevice(
        { statsIntervalMs: 1000 },
        new Logger({ sink: (entry) => entries.push(entry) })
      );
      device.boot();

      runUntil(1000);

      const stats = entries.filter((entry) => entry.context === "Stats");
      expect(stats).toHaveLength(1);
      expect(stats[0]?.message).toMatch(/^8\/32 cycles, \d+ runs, 0 errors, \d+ passes/);
    });
  });

  describe("main loop", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should run passes on a timer until stopped", () => {
      device.start();
      expect(device.isRunning()).toBe(true);

      vi.advanceTimersByTime(50);
      expect(device.manager.summary().passCount).toBe(5);

      device.stop();
      expect(device.isRunning()).toBe(false);

      vi.advanceTimersByTime(50);
      expect(device.manager.summary().passCount).toBe(5);
    });
  });
});
