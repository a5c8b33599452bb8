/**
 * @module control/capture-control
 * @description Photo and video capture state driven by client control bytes.
 *
 * Photo control (signed):
 *
 * | Value  | Effect                                                  |
 * |--------|---------------------------------------------------------|
 * | -1     | single shot                                             |
 * | 0      | stop                                                    |
 * | 5–300  | one photo every N seconds, N rounded down to a multiple |
 * |        | of 5; the first photo is taken at once                  |
 *
 * Video control:
 *
 * | Value  | Effect                                          |
 * |--------|-------------------------------------------------|
 * | 1      | start streaming at the default frame rate       |
 * | 0      | stop                                            |
 * | 2–10   | set the frame rate                              |
 */

import type {
  ControlOutcome,
  PhotoCaptureMode,
  VideoStatus,
} from "../types/capture.js";

export const PHOTO_SINGLE_SHOT = -1;
export const PHOTO_STOP = 0;
export const PHOTO_MIN_INTERVAL_S = 5;
export const PHOTO_MAX_INTERVAL_S = 300;

export const VIDEO_STOP = 0;
export const VIDEO_START = 1;
export const VIDEO_MAX_FPS = 10;

/** What the device looks like when a control byte arrives. */
export interface ControlContext {
  readonly deviceReady: boolean;
  readonly photoUploading: boolean;
}

const IDLE_MODE: PhotoCaptureMode = Object.freeze({ kind: "IDLE" });

function accepted(action: string): ControlOutcome {
  return { accepted: true, action };
}

function rejected(reason: string): ControlOutcome {
  return { accepted: false, reason };
}

export class CaptureControl {
  private photoMode: PhotoCaptureMode = IDLE_MODE;
  private lastPhotoAt: number | null = null;

  private streaming = false;
  private fps: number;
  private frameCount = 0;
  private droppedFrames = 0;
  private lastFrameAt: number | null = null;

  constructor(private readonly defaultFps: number) {
    this.fps = defaultFps;
  }

  // ─── Photo ──────────────────────────────────────────────────────

  handlePhotoControl(value: number, context: ControlContext): ControlOutcome {
    if (!context.deviceReady) return rejected("device not ready");

    if (value === PHOTO_STOP) {
      this.photoMode = IDLE_MODE;
      return accepted("stopped");
    }

    if (value === PHOTO_SINGLE_SHOT) {
      if (context.photoUploading) return rejected("photo upload in progress");
      this.photoMode = { kind: "SINGLE" };
      this.lastPhotoAt = null;
      return accepted("single shot");
    }

    if (
      Number.isInteger(value) &&
      value >= PHOTO_MIN_INTERVAL_S &&
      value <= PHOTO_MAX_INTERVAL_S
    ) {
      if (context.photoUploading) return rejected("photo upload in progress");
      const seconds = Math.floor(value / 5) * 5;
      this.photoMode = { kind: "INTERVAL", intervalMs: seconds * 1000 };
      this.lastPhotoAt = null;
      return accepted(`interval ${seconds}s`);
    }

    return rejected(`invalid photo control value ${value}`);
  }

  getPhotoMode(): PhotoCaptureMode {
    return this.photoMode;
  }

  isCapturing(): boolean {
    return this.photoMode.kind !== "IDLE";
  }

  /** True when a photo should be taken at `now`. */
  photoDue(now: number): boolean {
    const mode = this.photoMode;
    switch (mode.kind) {
      case "IDLE":
        return false;
      case "SINGLE":
        return true;
      case "INTERVAL":
        return this.lastPhotoAt === null || now - this.lastPhotoAt >= mode.intervalMs;
    }
  }

  /** Records the start of a capture attempt; the interval counts from here. */
  notePhotoAttempt(now: number): void {
    this.lastPhotoAt = now;
  }

  /**
   * Ends a single shot, whether the photo arrived or every retry failed.
   */
  notePhotoFinished(): void {
    if (this.photoMode.kind === "SINGLE") {
      this.photoMode = IDLE_MODE;
    }
  }

  // ─── Video ──────────────────────────────────────────────────────

  handleVideoControl(value: number, context: ControlContext): ControlOutcome {
    if (!context.deviceReady) return rejected("device not ready");

    if (value === VIDEO_STOP) {
      this.streaming = false;
      return accepted("stopped");
    }

    if (value === VIDEO_START) {
      if (context.photoUploading) return rejected("photo upload in progress");
      if (this.streaming) return rejected("already streaming");
      this.streaming = true;
      this.fps = this.defaultFps;
      this.frameCount = 0;
      this.droppedFrames = 0;
      this.lastFrameAt = null;
      return accepted("started");
    }

    if (Number.isInteger(value) && value > VIDEO_START && value <= VIDEO_MAX_FPS) {
      this.fps = value;
      return accepted(`fps ${value}`);
    }

    return rejected(`invalid video control value ${value}`);
  }

  isStreaming(): boolean {
    return this.streaming;
  }

  /** Milliseconds between frames at the current rate. */
  frameIntervalMs(): number {
    return Math.floor(1000 / this.fps);
  }

  videoDue(now: number): boolean {
    if (!this.streaming) return false;
    return this.lastFrameAt === null || now - this.lastFrameAt >= this.frameIntervalMs();
  }

  noteFrameSent(now: number): void {
    this.lastFrameAt = now;
    this.frameCount++;
  }

  /** @returns The new dropped-frame total. */
  noteFrameDropped(now: number): number {
    this.lastFrameAt = now;
    this.droppedFrames++;
    return this.droppedFrames;
  }

  videoStatus(): VideoStatus {
    return {
      streaming: this.streaming,
      fps: this.fps,
      frameCount: this.frameCount,
      droppedFrames: this.droppedFrames,
    };
  }
}
