/**
 * @module primitives/capture-retry
 * @description Non-blocking retry of a failed capture.
 *
 * Owns one TIMEOUT cycle that stays disabled until `arm()`. Each firing
 * makes a single `tryProduce()` attempt, so the main loop keeps running
 * between attempts. The cycle disables itself on success or when the
 * attempts run out.
 */

import { DeviceEmitter } from "./base-emitter.js";
import { systemClock, type Clock } from "./clock.js";
import type { ICaptureProducer } from "../interfaces/capture.js";
import {
  expectRegistered,
  type ICycleManager,
} from "../interfaces/cycle-manager.js";
import type { CycleId } from "../types/branded.js";
import type { CaptureBuffer } from "../types/capture.js";
import { CYCLE_OK, type CyclePriority, type CycleResult } from "../types/cycle.js";
import type { StreamType } from "../types/stream.js";
import { Logger } from "../utils/logger.js";

export interface CaptureRetryOptions {
  readonly manager: ICycleManager;
  readonly producer: ICaptureProducer;
  readonly stream: StreamType;
  /** Total attempts, counting the one that failed before `arm()`. */
  readonly attempts: number;
  readonly delayMs: number;
  /** Receives the buffer, and with it ownership. */
  readonly onCaptured: (buffer: CaptureBuffer) => void;
  /** Called once the attempts run out, after CAPTURE_FAILED. */
  readonly onExhausted?: () => void;
  readonly priority?: CyclePriority;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly events?: DeviceEmitter;
}

export class CaptureRetry {
  readonly id: CycleId;
  private readonly manager: ICycleManager;
  private readonly producer: ICaptureProducer;
  private readonly stream: StreamType;
  private readonly attempts: number;
  private readonly onCaptured: (buffer: CaptureBuffer) => void;
  private readonly onExhausted: (() => void) | undefined;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly events: DeviceEmitter;
  private readonly logContext: string;

  private attemptsLeft = 0;

  /**
   * @throws {CycleRegistrationError} when the manager refuses the cycle.
   */
  constructor(options: CaptureRetryOptions) {
    this.manager = options.manager;
    this.producer = options.producer;
    this.stream = options.stream;
    this.attempts = options.attempts;
    this.onCaptured = options.onCaptured;
    this.onExhausted = options.onExhausted;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new Logger();
    this.events = options.events ?? new DeviceEmitter();
    this.logContext = `CaptureRetry:${this.stream.toLowerCase()}`;

    this.id = expectRegistered(
      this.manager.register({
        name: `CaptureRetry:${this.stream.toLowerCase()}`,
        mode: "TIMEOUT",
        priority: options.priority ?? "HIGH",
        timeoutMs: options.delayMs,
        enabled: false,
        execute: () => this.attempt(),
        context: undefined,
      })
    );
  }

  /**
   * Schedules the remaining attempts after a failed capture.
   * @returns false when already pending or when no attempts remain; in the
   *   latter case CAPTURE_FAILED has been emitted.
   */
  arm(): boolean {
    if (this.isPending()) return false;

    this.attemptsLeft = this.attempts - 1;
    if (this.attemptsLeft <= 0) {
      this.attemptsLeft = 0;
      this.giveUp();
      return false;
    }
    this.manager.setEnabled(this.id, true);
    this.logger.debug(
      `Armed: ${this.attemptsLeft} attempts left`,
      this.logContext
    );
    return true;
  }

  cancel(): void {
    this.attemptsLeft = 0;
    this.manager.setEnabled(this.id, false);
  }

  isPending(): boolean {
    return this.attemptsLeft > 0;
  }

  getAttemptsLeft(): number {
    return this.attemptsLeft;
  }

  private attempt(): CycleResult {
    if (!this.isPending()) {
      this.manager.setEnabled(this.id, false);
      return CYCLE_OK;
    }

    const buffer = this.producer.tryProduce();
    if (buffer) {
      this.attemptsLeft = 0;
      this.manager.setEnabled(this.id, false);
      this.logger.debug(`Captured buffer #${buffer.id} on retry`, this.logContext);
      this.onCaptured(buffer);
      return CYCLE_OK;
    }

    this.attemptsLeft--;
    if (this.attemptsLeft === 0) {
      this.manager.setEnabled(this.id, false);
      this.giveUp();
    }
    return CYCLE_OK;
  }

  private giveUp(): void {
    this.logger.warn(
      `Capture failed after ${this.attempts} attempts`,
      this.logContext
    );
    this.events.emit({
      type: "CAPTURE_FAILED",
      stream: this.stream,
      attempts: this.attempts,
      timestamp: this.clock.now(),
    });
    this.onExhausted?.();
  }
}
