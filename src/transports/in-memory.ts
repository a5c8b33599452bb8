/**
 * @module transports/in-memory
 * @description In-process implementation of the ITransportLink interface.
 *
 * Stands in for the radio stack: one sink per stream, a connection flag, a
 * notification flag and a negotiated payload limit. Every frame accepted
 * by a sink is recorded and handed to receive listeners synchronously, so
 * a test or a host-side simulator sees exactly what a client would.
 */

import {
  TransportError,
  type ITransportLink,
  type ITransportSink,
} from "../interfaces/transport.js";
import type { StreamType } from "../types/stream.js";
import type {
  DeliveredFrame,
  FrameListener,
  LinkStatus,
} from "../types/transport.js";

/** Default negotiated payload limit, in bytes. */
export const DEFAULT_MAX_PAYLOAD = 403;

export interface InMemoryLinkOptions {
  readonly maxPayload?: number;
  readonly connected?: boolean;
  readonly notificationsEnabled?: boolean;
}

class InMemorySink implements ITransportSink {
  constructor(
    private readonly link: InMemoryLink,
    private readonly stream: StreamType
  ) {}

  isReady(): boolean {
    return this.link.isReady();
  }

  getMaxPayload(): number {
    return this.link.getMaxPayload();
  }

  send(data: Uint8Array): void {
    this.link.deliver(this.stream, data);
  }
}

/**
 * InMemoryLink: a loopback link with observable traffic.
 *
 * @example
 * ```ts
 * const link = new InMemoryLink({ maxPayload: 403 });
 * link.connect();
 * link.onReceive((frame) => console.log(frame.stream, frame.data.length));
 * ```
 */
export class InMemoryLink implements ITransportLink {
  private status: LinkStatus;
  private maxPayload: number;
  private readonly sinks = new Map<StreamType, InMemorySink>();
  private readonly listeners = new Set<FrameListener>();
  private delivered: DeliveredFrame[] = [];
  private pendingFailures = 0;

  constructor(options: InMemoryLinkOptions = {}) {
    this.maxPayload = options.maxPayload ?? DEFAULT_MAX_PAYLOAD;
    this.status = {
      connected: options.connected ?? false,
      notificationsEnabled: options.notificationsEnabled ?? false,
    };
  }

  // ─── Commands ───────────────────────────────────────────────────

  /** Client connects and subscribes. */
  connect(): void {
    this.status = { connected: true, notificationsEnabled: true };
  }

  disconnect(): void {
    this.status = { connected: false, notificationsEnabled: false };
  }

  setNotificationsEnabled(enabled: boolean): void {
    this.status = { ...this.status, notificationsEnabled: enabled };
  }

  /** Simulates a renegotiated MTU. */
  setMaxPayload(maxPayload: number): void {
    this.maxPayload = maxPayload;
  }

  /** Makes the next `count` sends throw SEND_FAILED. */
  failNextSends(count = 1): void {
    this.pendingFailures = count;
  }

  onReceive(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    this.delivered = [];
  }

  /**
   * Accepts a frame from one of this link's sinks.
   * @throws {TransportError} NOT_READY, PAYLOAD_TOO_LARGE or SEND_FAILED.
   */
  deliver(stream: StreamType, data: Uint8Array): void {
    if (!this.isReady()) {
      throw new TransportError("Link not ready", "NOT_READY");
    }
    if (data.length > this.maxPayload) {
      throw new TransportError(
        `Frame of ${data.length} bytes exceeds payload limit ${this.maxPayload}`,
        "PAYLOAD_TOO_LARGE"
      );
    }
    if (this.pendingFailures > 0) {
      this.pendingFailures--;
      throw new TransportError("Injected send failure", "SEND_FAILED");
    }

    const frame: DeliveredFrame = { stream, data: data.slice() };
    this.delivered.push(frame);
    for (const listener of this.listeners) {
      listener(frame);
    }
  }

  // ─── Queries ────────────────────────────────────────────────────

  isReady(): boolean {
    return this.status.connected && this.status.notificationsEnabled;
  }

  getStatus(): LinkStatus {
    return this.status;
  }

  getMaxPayload(): number {
    return this.maxPayload;
  }

  channel(stream: StreamType): ITransportSink {
    let sink = this.sinks.get(stream);
    if (!sink) {
      sink = new InMemorySink(this, stream);
      this.sinks.set(stream, sink);
    }
    return sink;
  }

  /** Frames delivered so far, optionally for one stream. */
  sent(stream?: StreamType): Uint8Array[] {
    return this.delivered
      .filter((frame) => stream === undefined || frame.stream === stream)
      .map((frame) => frame.data);
  }
}
