/**
 * @module transports
 * @description Transport implementations for the capture runtime.
 */

export {
  InMemoryLink,
  DEFAULT_MAX_PAYLOAD,
  type InMemoryLinkOptions,
} from "./in-memory.js";
