/**
 * @module cycles/data-cycles
 * @description Capture cycles: photo, video and audio.
 *
 * Each cycle receives its collaborators as its context, so the predicate
 * and the callback read the same objects without module-level state.
 */

import type { Clock } from "../primitives/clock.js";
import type { DeviceEmitter } from "../primitives/base-emitter.js";
import type {
  AudioSendResult,
  AudioStreamer,
} from "../primitives/audio-streamer.js";
import type { CaptureRetry } from "../primitives/capture-retry.js";
import type { TransmissionSession } from "../primitives/transmission-session.js";
import type { CaptureControl } from "../control/capture-control.js";
import type { ICaptureProducer } from "../interfaces/capture.js";
import {
  expectRegistered,
  type ICycleManager,
} from "../interfaces/cycle-manager.js";
import type { ITransportLink } from "../interfaces/transport.js";
import type { CycleId } from "../types/branded.js";
import type { CaptureBuffer } from "../types/capture.js";
import {
  CYCLE_OK,
  cycleFailed,
  type CycleInvocation,
  type CycleResult,
} from "../types/cycle.js";
import type { Logger } from "../utils/logger.js";

// ─── Photo ──────────────────────────────────────────────────────────

export interface PhotoDelivery {
  readonly camera: ICaptureProducer;
  readonly control: CaptureControl;
  readonly session: TransmissionSession;
  readonly logger: Logger;
}

/**
 * Hands a captured photo to the photo session. The buffer goes back to
 * the camera if the session cannot take it.
 */
export function deliverPhoto(buffer: CaptureBuffer, deps: PhotoDelivery): void {
  const started = deps.session.begin(buffer);
  if (started === "BUSY") {
    deps.camera.release(buffer);
    deps.logger.warn(`Photo #${buffer.id} dropped: upload in progress`, "PhotoCapture");
  } else if (started === "EMPTY") {
    deps.logger.warn(`Photo #${buffer.id} was empty`, "PhotoCapture");
  } else {
    deps.logger.info(`Photo #${buffer.id} captured (${buffer.data.length} bytes)`, "PhotoCapture");
  }
  deps.control.notePhotoFinished();
}

export interface PhotoCaptureDeps extends PhotoDelivery {
  readonly link: ITransportLink;
  readonly retry: CaptureRetry;
  readonly clock: Clock;
  readonly isDeviceReady: () => boolean;
}

function photoCaptureDue(deps: PhotoCaptureDeps): boolean {
  return (
    deps.isDeviceReady() &&
    deps.link.isReady() &&
    !deps.session.isActive() &&
    !deps.retry.isPending() &&
    deps.control.photoDue(deps.clock.now())
  );
}

function capturePhoto(invocation: CycleInvocation<PhotoCaptureDeps>): CycleResult {
  const deps = invocation.context;
  deps.control.notePhotoAttempt(invocation.now);

  const buffer = deps.camera.tryProduce();
  if (buffer) {
    deliverPhoto(buffer, deps);
  } else {
    deps.logger.debug("Photo capture failed; scheduling retry", "PhotoCapture");
    deps.retry.arm();
  }
  return CYCLE_OK;
}

export function registerPhotoCapture(
  manager: ICycleManager,
  deps: PhotoCaptureDeps
): CycleId {
  return expectRegistered(
    manager.register({
      name: "PhotoCapture",
      mode: "CONDITION",
      priority: "HIGH",
      condition: photoCaptureDue,
      execute: capturePhoto,
      context: deps,
    })
  );
}

// ─── Video ──────────────────────────────────────────────────────────

export interface VideoStreamDeps {
  readonly link: ITransportLink;
  readonly camera: ICaptureProducer;
  readonly control: CaptureControl;
  readonly photoSession: TransmissionSession;
  readonly videoSession: TransmissionSession;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly events: DeviceEmitter;
}

function videoFrameDue(deps: VideoStreamDeps): boolean {
  return (
    deps.control.isStreaming() &&
    deps.link.isReady() &&
    !deps.photoSession.isActive() &&
    deps.control.videoDue(deps.clock.now())
  );
}

function dropFrame(deps: VideoStreamDeps, now: number, reason: string): void {
  const droppedFrames = deps.control.noteFrameDropped(now);
  deps.logger.debug(`Frame dropped: ${reason}`, "VideoStream");
  deps.events.emit({
    type: "FRAME_DROPPED",
    stream: "VIDEO",
    droppedFrames,
    timestamp: now,
  });
}

function streamVideoFrame(invocation: CycleInvocation<VideoStreamDeps>): CycleResult {
  const deps = invocation.context;
  const now = invocation.now;

  if (deps.videoSession.isActive()) {
    dropFrame(deps, now, "previous frame still in flight");
    return CYCLE_OK;
  }

  const buffer = deps.camera.tryProduce();
  if (!buffer) {
    dropFrame(deps, now, "camera produced no frame");
    return CYCLE_OK;
  }

  switch (deps.videoSession.begin(buffer)) {
    case "STARTED":
      deps.control.noteFrameSent(now);
      break;
    case "EMPTY":
      dropFrame(deps, now, "empty frame");
      break;
    case "BUSY":
      deps.camera.release(buffer);
      dropFrame(deps, now, "session busy");
      break;
  }
  return CYCLE_OK;
}

export function registerVideoStream(
  manager: ICycleManager,
  deps: VideoStreamDeps
): CycleId {
  return expectRegistered(
    manager.register({
      name: "VideoStream",
      mode: "CONDITION",
      priority: "HIGH",
      condition: videoFrameDue,
      execute: streamVideoFrame,
      context: deps,
    })
  );
}

// ─── Audio ──────────────────────────────────────────────────────────

export interface AudioCaptureDeps {
  readonly link: ITransportLink;
  readonly microphone: ICaptureProducer;
  readonly streamer: AudioStreamer;
}

function sendAudioBlock(invocation: CycleInvocation<AudioCaptureDeps>): CycleResult {
  const { microphone, streamer } = invocation.context;
  const block = microphone.tryProduce();
  if (!block) return CYCLE_OK;

  let result: AudioSendResult;
  try {
    result = streamer.send(block.data);
  } finally {
    microphone.release(block);
  }

  if (result === "FAILED" || result === "OVERSIZE") {
    return cycleFailed(`audio block ${block.id} ${result.toLowerCase()}`);
  }
  return CYCLE_OK;
}

export function registerAudioCapture(
  manager: ICycleManager,
  deps: AudioCaptureDeps,
  enabled = true
): CycleId {
  return expectRegistered(
    manager.register({
      name: "AudioCapture",
      mode: "CONDITION",
      priority: "HIGH",
      condition: (context) => context.link.isReady(),
      execute: sendAudioBlock,
      enabled,
      context: deps,
    })
  );
}
