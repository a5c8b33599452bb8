/**
 * @module config
 * @description Validated device configuration.
 *
 * Every field has a default, so `parseDeviceConfig({})` yields a working
 * configuration. Sizes are in bytes, durations in milliseconds.
 */

import { z } from "zod";

const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

const positiveInt = z.number().int().positive();
const durationMs = z.number().int().nonnegative();

export const deviceConfigSchema = z
  .object({
    cycleCapacity: positiveInt.default(32),
    maxTransportPayload: positiveInt.default(403),
    maxChunkSize: positiveInt.default(400),
    loopIntervalMs: positiveInt.default(10),
    connectionMonitorIntervalMs: durationMs.default(1000),
    captureRetryAttempts: positiveInt.default(3),
    captureRetryDelayMs: durationMs.default(250),
    statsIntervalMs: positiveInt.default(60_000),
    defaultVideoFps: z.number().int().min(1).max(10).default(5),
    audioCaptureEnabled: z.boolean().default(true),
    logLevel: z.enum(LOG_LEVELS).default("info"),
  })
  .strict()
  .refine((config) => config.maxTransportPayload > 4, {
    message: "maxTransportPayload must leave room after the 4-byte sub-chunk header",
    path: ["maxTransportPayload"],
  })
  .refine((config) => config.maxChunkSize + 3 <= config.maxTransportPayload, {
    message: "maxChunkSize plus the 3-byte frame header must fit maxTransportPayload",
    path: ["maxChunkSize"],
  });

/** Fully-resolved configuration. */
export type DeviceConfig = z.infer<typeof deviceConfigSchema>;

/** Accepted input: any subset of the fields. */
export type DeviceConfigInput = z.input<typeof deviceConfigSchema>;

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Errors thrown when configuration input is rejected.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: "INVALID_CONFIG",
    public readonly issues: readonly ConfigIssue[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Apply defaults and validate.
 * @throws {ConfigError} listing every rejected field.
 */
export function parseDeviceConfig(input: DeviceConfigInput = {}): DeviceConfig {
  const result = deviceConfigSchema.safeParse(input);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  throw new ConfigError(
    `Invalid device config: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
    "INVALID_CONFIG",
    issues
  );
}

export const DEFAULT_DEVICE_CONFIG: DeviceConfig = parseDeviceConfig();
