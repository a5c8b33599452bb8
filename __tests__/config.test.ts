import { describe, it, expect } from "vitest";
import {
  ConfigError,
  DEFAULT_DEVICE_CONFIG,
  parseDeviceConfig,
} from "../src/config.js";

function captureError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("parseDeviceConfig", () => {
  it("should fill every field with its default", () => {
    expect(parseDeviceConfig()).toEqual({
      cycleCapacity: 32,
      maxTransportPayload: 403,
      maxChunkSize: 400,
      loopIntervalMs: 10,
      connectionMonitorIntervalMs: 1000,
      captureRetryAttempts: 3,
      captureRetryDelayMs: 250,
      statsIntervalMs: 60_000,
      defaultVideoFps: 5,
      audioCaptureEnabled: true,
      logLevel: "info",
    });
    expect(DEFAULT_DEVICE_CONFIG).toEqual(parseDeviceConfig({}));
  });

  it("should keep supplied values", () => {
    const config = parseDeviceConfig({
      maxTransportPayload: 247,
      maxChunkSize: 244,
      logLevel: "debug",
    });
    expect(config.maxTransportPayload).toBe(247);
    expect(config.maxChunkSize).toBe(244);
    expect(config.logLevel).toBe("debug");
    expect(config.cycleCapacity).toBe(32);
  });

  it("should reject a chunk size that does not fit the payload", () => {
    const error = captureError(() => parseDeviceConfig({ maxChunkSize: 401 }));
    expect(error.code).toBe("INVALID_CONFIG");
    expect(error.issues).toEqual([
      {
        path: "maxChunkSize",
        message: "maxChunkSize plus the 3-byte frame header must fit maxTransportPayload",
      },
    ]);
    expect(error.message).toBe(
      "Invalid device config: maxChunkSize: maxChunkSize plus the 3-byte frame header must fit maxTransportPayload"
    );
  });

  it("should reject a payload too small for a sub-chunk", () => {
    const error = captureError(() =>
      parseDeviceConfig({ maxTransportPayload: 4, maxChunkSize: 1 })
    );
    expect(error.issues.map((issue) => issue.path)).toContain("maxTransportPayload");
  });

  it("should reject out-of-range numbers", () => {
    const error = captureError(() =>
      parseDeviceConfig({ cycleCapacity: 0, defaultVideoFps: 11 })
    );
    const paths = error.issues.map((issue) => issue.path);
    expect(paths).toContain("cycleCapacity");
    expect(paths).toContain("defaultVideoFps");
  });

  it("should reject unknown keys", () => {
    const input = { cycleCapacity: 8, retries: 2 };
    expect(() => parseDeviceConfig(input)).toThrow(ConfigError);
  });
});
