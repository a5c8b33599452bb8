/**
 * @module primitives
 * @description Scheduler, session and streaming primitives plus the base
 * event emitter and clocks.
 */

export { DeviceEmitter } from "./base-emitter.js";
export { systemClock, ManualClock, type Clock } from "./clock.js";
export { CycleManager, type CycleManagerOptions } from "./cycle-manager.js";
export {
  TransmissionSession,
  type TransmissionSessionOptions,
} from "./transmission-session.js";
export {
  AudioStreamer,
  type AudioFramingMode,
  type AudioSendResult,
  type AudioStreamerOptions,
} from "./audio-streamer.js";
export { CaptureRetry, type CaptureRetryOptions } from "./capture-retry.js";
export {
  ConnectionMonitor,
  DEFAULT_MONITOR_INTERVAL_MS,
  type ConnectionMonitorOptions,
} from "./connection-monitor.js";
