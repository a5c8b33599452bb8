import { describe, it, expect, beforeEach } from "vitest";
import { CaptureControl, type ControlContext } from "../src/control/capture-control.js";

const READY: ControlContext = { deviceReady: true, photoUploading: false };
const UPLOADING: ControlContext = { deviceReady: true, photoUploading: true };
const NOT_READY: ControlContext = { deviceReady: false, photoUploading: false };

describe("CaptureControl", () => {
  let control: CaptureControl;

  beforeEach(() => {
    control = new CaptureControl(5);
  });

  describe("photo control", () => {
    it("should reject every value before the device is ready", () => {
      expect(control.handlePhotoControl(-1, NOT_READY)).toEqual({
        accepted: false,
        reason: "device not ready",
      });
      expect(control.isCapturing()).toBe(false);
    });

    it("should take a single shot and return to idle when it finishes", () => {
      expect(control.handlePhotoControl(-1, READY)).toEqual({
        accepted: true,
        action: "single shot",
      });
      expect(control.getPhotoMode()).toEqual({ kind: "SINGLE" });
      expect(control.photoDue(0)).toBe(true);

      control.notePhotoFinished();

      expect(control.getPhotoMode()).toEqual({ kind: "IDLE" });
      expect(control.photoDue(0)).toBe(false);
    });

    it("should round intervals down to a multiple of five seconds", () => {
      expect(control.handlePhotoControl(12, READY)).toEqual({
        accepted: true,
        action: "interval 10s",
      });
      expect(control.getPhotoMode()).toEqual({ kind: "INTERVAL", intervalMs: 10_000 });

      expect(control.handlePhotoControl(300, READY)).toEqual({
        accepted: true,
        action: "interval 300s",
      });
    });

    it("should take the first interval photo at once and then wait", () => {
      control.handlePhotoControl(10, READY);
      expect(control.photoDue(0)).toBe(true);

      control.notePhotoAttempt(0);
      expect(control.photoDue(9_999)).toBe(false);
      expect(control.photoDue(10_000)).toBe(true);
    });

    it("should keep interval mode running after each photo", () => {
      control.handlePhotoControl(5, READY);
      control.notePhotoAttempt(0);
      control.notePhotoFinished();
      expect(control.isCapturing()).toBe(true);
    });

    it("should reject values outside the accepted ranges", () => {
      expect(control.handlePhotoControl(4, READY)).toEqual({
        accepted: false,
        reason: "invalid photo control value 4",
      });
      expect(control.handlePhotoControl(301, READY)).toEqual({
        accepted: false,
        reason: "invalid photo control value 301",
      });
      expect(control.handlePhotoControl(-2, READY)).toEqual({
        accepted: false,
        reason: "invalid photo control value -2",
      });
    });

    it("should refuse a new photo while one is uploading but still allow stop", () => {
      control.handlePhotoControl(10, READY);

      expect(control.handlePhotoControl(-1, UPLOADING)).toEqual({
        accepted: false,
        reason: "photo upload in progress",
      });
      expect(control.handlePhotoControl(0, UPLOADING)).toEqual({
        accepted: true,
        action: "stopped",
      });
      expect(control.isCapturing()).toBe(false);
    });
  });

  describe("video control", () => {
    it("should start at the default frame rate", () => {
      expect(control.handleVideoControl(1, READY)).toEqual({
        accepted: true,
        action: "started",
      });
      expect(control.videoStatus()).toEqual({
        streaming: true,
        fps: 5,
        frameCount: 0,
        droppedFrames: 0,
      });
      expect(control.frameIntervalMs()).toBe(200);
    });

    it("should refuse to start twice", () => {
      control.handleVideoControl(1, READY);
      expect(control.handleVideoControl(1, READY)).toEqual({
        accepted: false,
        reason: "already streaming",
      });
    });

    it("should refuse to start during a photo upload", () => {
      expect(control.handleVideoControl(1, UPLOADING)).toEqual({
        accepted: false,
        reason: "photo upload in progress",
      });
      expect(control.isStreaming()).toBe(false);
    });

    it("should change the frame rate within 2..10", () => {
      control.handleVideoControl(1, READY);
      expect(control.handleVideoControl(7, READY)).toEqual({
        accepted: true,
        action: "fps 7",
      });
      expect(control.frameIntervalMs()).toBe(142);

      expect(control.handleVideoControl(11, READY)).toEqual({
        accepted: false,
        reason: "invalid video control value 11",
      });
      expect(control.videoStatus().fps).toBe(7);
    });

    it("should pace frames by the frame interval", () => {
      control.handleVideoControl(1, READY);
      expect(control.videoDue(0)).toBe(true);

      control.noteFrameSent(0);
      expect(control.videoDue(199)).toBe(false);
      expect(control.videoDue(200)).toBe(true);

      expect(control.noteFrameDropped(200)).toBe(1);
      expect(control.videoDue(399)).toBe(false);
      expect(control.videoStatus()).toMatchObject({ frameCount: 1, droppedFrames: 1 });
    });

    it("should reset rate and counters on restart", () => {
      control.handleVideoControl(1, READY);
      control.handleVideoControl(9, READY);
      control.noteFrameSent(0);
      control.noteFrameDropped(100);

      control.handleVideoControl(0, READY);
      expect(control.videoDue(1_000)).toBe(false);

      control.handleVideoControl(1, READY);
      expect(control.videoStatus()).toEqual({
        streaming: true,
        fps: 5,
        frameCount: 0,
        droppedFrames: 0,
      });
    });
  });
});
