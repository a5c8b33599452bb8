/**
 * @module interfaces/event-emitter
 * @description Typed event emitter interface for the runtime's reactive surface.
 *
 * The scheduler, sessions and monitors implement IDeviceEmitter. The event
 * map ensures that listeners receive correctly-typed payloads without
 * runtime type checking.
 */

import type { DeviceEventMap, DeviceEventType } from "../types/events.js";

/**
 * Listener function signature for a specific event type.
 */
export type EventListener<T extends DeviceEventType> = (
  event: DeviceEventMap[T]
) => void;

/**
 * @interface IDeviceEmitter
 * @description Typed event emitter for runtime events.
 * Provides compile-time safety for event names and payload types.
 */
export interface IDeviceEmitter {
  /**
   * Register a listener for a specific event type.
   * @param eventType - The event type to listen for.
   * @param listener - Callback function receiving the typed event payload.
   */
  on<T extends DeviceEventType>(eventType: T, listener: EventListener<T>): void;

  /**
   * Register a one-time listener that auto-removes after first invocation.
   */
  once<T extends DeviceEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Remove a previously registered listener.
   */
  off<T extends DeviceEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Emit an event, invoking all registered listeners synchronously.
   * @param event - The typed event object to emit.
   */
  emit<T extends DeviceEventType>(event: DeviceEventMap[T]): void;
}
