/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 * The scheduler, sessions and monitors extend or share this to gain event capabilities.
 */

import type {
  IDeviceEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type { DeviceEventMap, DeviceEventType } from "../types/events.js";

/**
 * Concrete typed event emitter for runtime events.
 * Uses a Map of Sets for O(1) listener registration and removal.
 */
export class DeviceEmitter implements IDeviceEmitter {
  private readonly listeners = new Map<
    DeviceEventType,
    Set<EventListener<DeviceEventType>>
  >();

  on<T extends DeviceEventType>(eventType: T, listener: EventListener<T>): void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener as EventListener<DeviceEventType>);
  }

  once<T extends DeviceEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<T extends DeviceEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const set = this.listeners.get(eventType);
    if (set) {
      set.delete(listener as EventListener<DeviceEventType>);
      if (set.size === 0) {
        this.listeners.delete(eventType);
      }
    }
  }

  emit<T extends DeviceEventType>(event: DeviceEventMap[T]): void {
    const set = this.listeners.get(event.type);
    if (set) {
      for (const listener of [...set]) {
        listener(event);
      }
    }
  }

  /** Number of listeners registered for an event type. */
  listenerCount(eventType: DeviceEventType): number {
    return this.listeners.get(eventType)?.size ?? 0;
  }
}
