/**
 * @module device
 * @description CaptureDevice: the orchestrator that wires all primitives together.
 *
 * A CaptureDevice owns:
 * - one Cycle Manager, driven by `update()` or the timer loop from `start()`
 * - a Transmission Session each for photo and video
 * - the Audio Streamer, when a microphone is attached
 * - the photo Capture Retry and the Connection Monitor
 * - photo and video control state
 *
 * Nothing is global, so several devices can run side by side (one per
 * simulated link, for example).
 *
 * @example
 * ```ts
 * const device = new CaptureDevice({ link, camera, microphone });
 * device.boot();
 * device.markReady();
 * device.start();
 * device.handlePhotoControl(10); // one photo every 10 s
 * ```
 */

import { parseDeviceConfig, type DeviceConfig, type DeviceConfigInput } from "./config.js";
import { CaptureControl, type ControlContext } from "./control/capture-control.js";
import {
  registerAudioCapture,
  registerDataTransmission,
  registerPhotoCapture,
  registerStats,
  registerVideoStream,
  deliverPhoto,
} from "./cycles/index.js";
import type { ICaptureProducer } from "./interfaces/capture.js";
import type { ITransportLink } from "./interfaces/transport.js";
import { AudioStreamer } from "./primitives/audio-streamer.js";
import { DeviceEmitter } from "./primitives/base-emitter.js";
import { CaptureRetry } from "./primitives/capture-retry.js";
import { systemClock, type Clock } from "./primitives/clock.js";
import { ConnectionMonitor } from "./primitives/connection-monitor.js";
import { CycleManager } from "./primitives/cycle-manager.js";
import { TransmissionSession } from "./primitives/transmission-session.js";
import type { CycleId } from "./types/branded.js";
import type { ControlOutcome, VideoStatus } from "./types/capture.js";
import { Logger } from "./utils/logger.js";

const LOG_CONTEXT = "Device";

// ─── Configuration ────────────────────────────────────────────────

export interface CaptureDeviceOptions {
  readonly link: ITransportLink;
  readonly camera: ICaptureProducer;
  /** Audio capture is only wired when a microphone is attached. */
  readonly microphone?: ICaptureProducer;
  readonly config?: DeviceConfigInput;
  readonly clock?: Clock;
  /** Defaults to a console logger at `config.logLevel`. */
  readonly logger?: Logger;
}

// ─── Orchestrator ──────────────────────────────────────────────────

export class CaptureDevice extends DeviceEmitter {
  readonly config: DeviceConfig;
  readonly manager: CycleManager;
  readonly photoSession: TransmissionSession;
  readonly videoSession: TransmissionSession;
  readonly audio: AudioStreamer | null;
  readonly control: CaptureControl;
  readonly logger: Logger;

  private readonly link: ITransportLink;
  private readonly camera: ICaptureProducer;
  private readonly microphone: ICaptureProducer | null;
  private readonly clock: Clock;
  private readonly cycleIds = new Map<string, CycleId>();

  private photoRetry: CaptureRetry | null = null;
  private monitor: ConnectionMonitor | null = null;
  private loopTimer: ReturnType<typeof setInterval> | null = null;
  private booted = false;
  private ready = false;

  /**
   * @throws {ConfigError} when `options.config` is invalid.
   */
  constructor(options: CaptureDeviceOptions) {
    super();
    this.config = parseDeviceConfig(options.config);
    this.link = options.link;
    this.camera = options.camera;
    this.microphone = options.microphone ?? null;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new Logger({ level: this.config.logLevel });

    // Ceiling only; sessions and the streamer also follow the link's limit.
    const maxPayload = this.config.maxTransportPayload;
    const shared = { clock: this.clock, logger: this.logger, events: this };

    this.manager = new CycleManager({
      ...shared,
      capacity: this.config.cycleCapacity,
    });
    this.photoSession = new TransmissionSession({
      ...shared,
      stream: "PHOTO",
      sink: this.link.channel("PHOTO"),
      producer: this.camera,
      maxChunkSize: this.config.maxChunkSize,
      maxPayload,
    });
    this.videoSession = new TransmissionSession({
      ...shared,
      stream: "VIDEO",
      sink: this.link.channel("VIDEO"),
      producer: this.camera,
      maxChunkSize: this.config.maxChunkSize,
      maxPayload,
    });
    this.audio = this.microphone
      ? new AudioStreamer({
          ...shared,
          sink: this.link.channel("AUDIO"),
          maxPayload,
        })
      : null;
    this.control = new CaptureControl(this.config.defaultVideoFps);
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  /**
   * Registers every cycle. Calling it again has no effect.
   * @throws {CycleRegistrationError} when the cycle table is too small.
   */
  boot(): void {
    if (this.booted) return;

    const shared = { clock: this.clock, logger: this.logger, events: this };

    this.monitor = new ConnectionMonitor({
      ...shared,
      manager: this.manager,
      link: this.link,
      sessions: [this.photoSession, this.videoSession],
      ...(this.audio ? { audio: this.audio } : {}),
      intervalMs: this.config.connectionMonitorIntervalMs,
    });
    this.cycleIds.set("ConnectionMonitor", this.monitor.id);

    const photo = {
      camera: this.camera,
      control: this.control,
      session: this.photoSession,
      logger: this.logger,
    };
    const retry = new CaptureRetry({
      ...shared,
      manager: this.manager,
      producer: this.camera,
      stream: "PHOTO",
      attempts: this.config.captureRetryAttempts,
      delayMs: this.config.captureRetryDelayMs,
      onCaptured: (buffer) => deliverPhoto(buffer, photo),
      onExhausted: () => this.control.notePhotoFinished(),
    });
    this.photoRetry = retry;
    this.cycleIds.set("CaptureRetry:photo", retry.id);

    this.cycleIds.set(
      "PhotoCapture",
      registerPhotoCapture(this.manager, {
        ...photo,
        link: this.link,
        retry,
        clock: this.clock,
        isDeviceReady: () => this.ready,
      })
    );

    this.cycleIds.set(
      "VideoStream",
      registerVideoStream(this.manager, {
        ...shared,
        link: this.link,
        camera: this.camera,
        control: this.control,
        photoSession: this.photoSession,
        videoSession: this.videoSession,
      })
    );

    if (this.microphone && this.audio) {
      this.cycleIds.set(
        "AudioCapture",
        registerAudioCapture(
          this.manager,
          { link: this.link, microphone: this.microphone, streamer: this.audio },
          this.config.audioCaptureEnabled
        )
      );
    }

    for (const session of [this.photoSession, this.videoSession]) {
      this.cycleIds.set(
        `DataTransmission:${session.stream.toLowerCase()}`,
        registerDataTransmission(this.manager, session, this.link)
      );
    }

    this.cycleIds.set(
      "Stats",
      registerStats(this.manager, this.logger, this.config.statsIntervalMs)
    );

    this.booted = true;
    this.logger.info(
      `Booted with ${this.manager.getCycleCount()} cycles`,
      LOG_CONTEXT
    );
  }

  /** Flags the device as ready (camera initialized, settings loaded). */
  markReady(ready = true): void {
    this.ready = ready;
  }

  /**
   * One scheduler pass.
   * @param now - Defaults to the device clock.
   */
  update(now?: number): void {
    this.manager.update(now);
  }

  /**
   * Boots if needed and runs `update()` every `loopIntervalMs`.
   */
  start(): void {
    this.boot();
    if (this.loopTimer) return;
    this.loopTimer = setInterval(() => this.tick(), this.config.loopIntervalMs);
    this.logger.info(
      `Main loop started (${this.config.loopIntervalMs}ms)`,
      LOG_CONTEXT
    );
  }

  stop(): void {
    if (!this.loopTimer) return;
    clearInterval(this.loopTimer);
    this.loopTimer = null;
    this.logger.info("Main loop stopped", LOG_CONTEXT);
  }

  // ─── Control ────────────────────────────────────────────────────

  handlePhotoControl(value: number): ControlOutcome {
    const outcome = this.control.handlePhotoControl(value, this.controlContext());
    this.logOutcome("Photo", value, outcome);
    return outcome;
  }

  handleVideoControl(value: number): ControlOutcome {
    const outcome = this.control.handleVideoControl(value, this.controlContext());
    this.logOutcome("Video", value, outcome);
    return outcome;
  }

  // ─── Queries ────────────────────────────────────────────────────

  isReady(): boolean {
    return this.ready;
  }

  isBooted(): boolean {
    return this.booted;
  }

  isRunning(): boolean {
    return this.loopTimer !== null;
  }

  /** Link readiness as last observed by the connection monitor. */
  isLinkReady(): boolean {
    return this.monitor?.isReady() ?? false;
  }

  isRetryPending(): boolean {
    return this.photoRetry?.isPending() ?? false;
  }

  videoStatus(): VideoStatus {
    return this.control.videoStatus();
  }

  cycleId(name: string): CycleId | undefined {
    return this.cycleIds.get(name);
  }

  // ─── Internal ───────────────────────────────────────────────────

  private tick(): void {
    try {
      this.update();
    } catch (err) {
      this.logger.error(
        "Scheduler pass threw",
        LOG_CONTEXT,
        err instanceof Error ? err : new Error(String(err))
      );
    }
  }

  private controlContext(): ControlContext {
    return {
      deviceReady: this.ready,
      photoUploading: this.photoSession.isActive(),
    };
  }

  private logOutcome(kind: string, value: number, outcome: ControlOutcome): void {
    if (outcome.accepted) {
      this.logger.info(`${kind} control ${value}: ${outcome.action}`, LOG_CONTEXT);
    } else {
      this.logger.warn(`${kind} control ${value} ignored: ${outcome.reason}`, LOG_CONTEXT);
    }
  }
}
