/**
 * @module types/transport
 * @description Types shared by transport links and their sinks.
 *
 * The radio exposes one notify characteristic per stream. A link groups
 * them behind a single readiness flag: the link is ready when a client is
 * connected AND has enabled notifications.
 *
 * | Characteristic | Stream | Payload limit                  |
 * |----------------|--------|--------------------------------|
 * | audio data     | AUDIO  | negotiated maximum payload     |
 * | photo data     | PHOTO  | negotiated maximum payload     |
 * | video data     | VIDEO  | negotiated maximum payload     |
 */

import type { StreamType } from "./stream.js";

/**
 * Readiness of a link, derived from connection and notification state.
 */
export interface LinkStatus {
  readonly connected: boolean;
  readonly notificationsEnabled: boolean;
}

/**
 * A frame as observed on the far side of a link.
 */
export interface DeliveredFrame {
  readonly stream: StreamType;
  readonly data: Uint8Array;
}

/**
 * Callback for frames delivered over a link.
 */
export type FrameListener = (frame: DeliveredFrame) => void;
