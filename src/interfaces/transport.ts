/**
 * @module interfaces/transport
 * @description ITransportSink / ITransportLink: the radio stack's boundary.
 *
 * Connection establishment, MTU negotiation and characteristic plumbing
 * live below this interface. The runtime only asks whether the link is
 * ready and hands it frames that already fit the negotiated payload.
 */

import type { StreamType } from "../types/stream.js";

/**
 * Errors that may be thrown by transport operations.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code: "NOT_READY" | "PAYLOAD_TOO_LARGE" | "SEND_FAILED"
  ) {
    super(message);
    this.name = "TransportError";
  }
}

/**
 * @interface ITransportSink
 * @description One notify characteristic.
 */
export interface ITransportSink {
  /**
   * @query
   * @description True when a client is connected and subscribed.
   */
  isReady(): boolean;

  /**
   * @query
   * @description Current negotiated payload limit. It can change while
   * connected, so senders read it per frame.
   */
  getMaxPayload(): number;

  /**
   * @command
   * @description Sends one frame.
   * @param data - Bytes to notify; never longer than the link's max payload.
   * @throws {TransportError} code=NOT_READY if the link is down.
   * @throws {TransportError} code=PAYLOAD_TOO_LARGE if data exceeds the max payload.
   */
  send(data: Uint8Array): void;
}

/**
 * @interface ITransportLink
 * @description A connection exposing one sink per stream.
 */
export interface ITransportLink {
  /**
   * @query
   * @description True when the link is connected and notifications are enabled.
   */
  isReady(): boolean;

  /**
   * @query
   * @description Maximum bytes per notification, as negotiated.
   */
  getMaxPayload(): number;

  /**
   * @query
   * @description Returns the sink carrying the given stream.
   */
  channel(stream: StreamType): ITransportSink;
}
