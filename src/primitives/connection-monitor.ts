/**
 * @module primitives/connection-monitor
 * @description Watches link readiness and cleans up when it drops.
 *
 * On ready → not ready every in-flight session is aborted, which returns
 * its buffer to the producer, and the audio frame counter restarts.
 */

import { DeviceEmitter } from "./base-emitter.js";
import type { AudioStreamer } from "./audio-streamer.js";
import type { TransmissionSession } from "./transmission-session.js";
import {
  expectRegistered,
  type ICycleManager,
} from "../interfaces/cycle-manager.js";
import type { ITransportLink } from "../interfaces/transport.js";
import type { CycleId } from "../types/branded.js";
import {
  CYCLE_OK,
  type CycleInvocation,
  type CyclePriority,
  type CycleResult,
} from "../types/cycle.js";
import type { ChunkedStreamType } from "../types/stream.js";
import { Logger } from "../utils/logger.js";

const LOG_CONTEXT = "ConnectionMonitor";

export const DEFAULT_MONITOR_INTERVAL_MS = 1000;

interface MonitorContext {
  lastReady: boolean;
}

export interface ConnectionMonitorOptions {
  readonly manager: ICycleManager;
  readonly link: ITransportLink;
  readonly sessions: readonly TransmissionSession[];
  readonly audio?: AudioStreamer;
  readonly intervalMs?: number;
  readonly priority?: CyclePriority;
  readonly logger?: Logger;
  readonly events?: DeviceEmitter;
}

export class ConnectionMonitor {
  readonly id: CycleId;
  private readonly link: ITransportLink;
  private readonly sessions: readonly TransmissionSession[];
  private readonly audio: AudioStreamer | undefined;
  private readonly logger: Logger;
  private readonly events: DeviceEmitter;
  private readonly context: MonitorContext = { lastReady: false };

  /**
   * @throws {CycleRegistrationError} when the manager refuses the cycle.
   */
  constructor(options: ConnectionMonitorOptions) {
    this.link = options.link;
    this.sessions = options.sessions;
    this.audio = options.audio;
    this.logger = options.logger ?? new Logger();
    this.events = options.events ?? new DeviceEmitter();

    this.id = expectRegistered(
      options.manager.register({
        name: "ConnectionMonitor",
        mode: "INTERVAL",
        priority: options.priority ?? "NORMAL",
        intervalMs: options.intervalMs ?? DEFAULT_MONITOR_INTERVAL_MS,
        execute: (invocation) => this.check(invocation),
        context: this.context,
      })
    );
  }

  /** Readiness as of the last check. */
  isReady(): boolean {
    return this.context.lastReady;
  }

  private check(invocation: CycleInvocation<MonitorContext>): CycleResult {
    const state = invocation.context;
    const ready = this.link.isReady();
    if (ready === state.lastReady) return CYCLE_OK;
    state.lastReady = ready;

    const abortedSessions: ChunkedStreamType[] = [];
    if (ready) {
      this.logger.info("Link ready", LOG_CONTEXT);
    } else {
      for (const session of this.sessions) {
        if (session.abort("link lost")) abortedSessions.push(session.stream);
      }
      this.audio?.reset();
      this.logger.warn(
        `Link lost; aborted ${abortedSessions.length} session(s)`,
        LOG_CONTEXT
      );
    }

    this.events.emit({
      type: "LINK_CHANGED",
      ready,
      abortedSessions,
      timestamp: invocation.now,
    });
    return CYCLE_OK;
  }
}
