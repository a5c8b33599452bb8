/**
 * @module types/cycle
 * @description Cycle definitions for the cooperative scheduler.
 *
 * A Cycle is a unit of scheduled, repeatable work. Every cycle has a
 * priority class that orders it within one scheduler pass, and a trigger
 * mode that decides whether it fires on that pass.
 *
 * | Mode        | Fires when                                           |
 * |-------------|------------------------------------------------------|
 * | INTERVAL    | `now - lastExecution >= intervalMs`                  |
 * | TIMEOUT     | `timeoutMs` elapsed since arming; one-shot retires   |
 * | CONDITION   | the predicate returns true                           |
 * | PATTERN     | every pass; steps advance on their own durations     |
 * | BUFFER_WRAP | every pass; carries a ring index that wraps          |
 */

import type { CycleId } from "./branded.js";

// ─── Enumerations ───────────────────────────────────────────────────

/**
 * Trigger semantics of a cycle.
 */
export type CycleMode =
  | "INTERVAL"
  | "TIMEOUT"
  | "CONDITION"
  | "PATTERN"
  | "BUFFER_WRAP";

/**
 * Priority class. Strictly orders execution within one pass.
 */
export type CyclePriority =
  | "CRITICAL"
  | "HIGH"
  | "NORMAL"
  | "LOW"
  | "BACKGROUND";

/**
 * Priority classes from most to least urgent.
 */
export const PRIORITY_ORDER: readonly CyclePriority[] = [
  "CRITICAL",
  "HIGH",
  "NORMAL",
  "LOW",
  "BACKGROUND",
];

/**
 * Lifecycle state of a registered cycle.
 */
export type CycleState =
  | "INACTIVE"
  | "ACTIVE"
  | "PAUSED"
  | "ERROR"
  | "COMPLETED";

// ─── Callback Results ───────────────────────────────────────────────

/**
 * Value returned by every cycle callback. The scheduler branches on it
 * instead of relying on thrown exceptions.
 */
export type CycleResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

/** Shared success value. */
export const CYCLE_OK: CycleResult = Object.freeze({ ok: true });

/**
 * Build a failure result.
 */
export function cycleFailed(reason: string): CycleResult {
  return { ok: false, reason };
}

// ─── Mode-specific Configuration ────────────────────────────────────

/**
 * One step of a PATTERN cycle (e.g. one blink of a status code).
 */
export interface PatternStep {
  /** How long this step lasts before the pattern advances. */
  readonly durationMs: number;
  /** Opaque step value (brightness, tone, …). */
  readonly value: number;
  /** Whether the step is an "on" step. */
  readonly active: boolean;
}

/**
 * Ring configuration for BUFFER_WRAP cycles.
 */
export interface RingConfig {
  /** Number of slots in the managed circular buffer. */
  readonly size: number;
  /** Called each time the ring index wraps back to slot 0. */
  readonly onWrap?: (wraps: number) => void;
}

/**
 * Optional policy applied to cycles whose callbacks keep failing.
 * Without a policy an errored cycle is retried on every eligible pass.
 */
export interface CycleErrorPolicy {
  /** Delay after the first consecutive failure; doubles on each further one. */
  readonly backoffMs?: number;
  /** Upper bound for the doubled delay. */
  readonly maxBackoffMs?: number;
  /** Disable the cycle after this many consecutive failures. */
  readonly disableAfter?: number;
}

// ─── Invocation ─────────────────────────────────────────────────────

/**
 * Pattern position reported to PATTERN callbacks.
 */
export interface PatternPosition {
  readonly index: number;
  readonly step: PatternStep;
  /** True on the pass where the pattern moved to this step. */
  readonly changed: boolean;
}

/**
 * Everything a callback receives when its cycle fires.
 */
export interface CycleInvocation<TContext> {
  readonly id: CycleId;
  readonly name: string;
  /** Timestamp of the current scheduler pass (ms). */
  readonly now: number;
  /** Per-cycle state owned by the cycle's record. */
  readonly context: TContext;
  /** Current step, for PATTERN cycles; null otherwise. */
  readonly pattern: PatternPosition | null;
  /** Current ring slot, for BUFFER_WRAP cycles; null otherwise. */
  readonly ringIndex: number | null;
}

/**
 * Cycle callback signature.
 */
export type CycleCallback<TContext> = (
  invocation: CycleInvocation<TContext>
) => CycleResult;

/**
 * Predicate for CONDITION cycles.
 */
export type CyclePredicate<TContext> = (context: TContext) => boolean;

/**
 * Error handler, invoked after a failed execution.
 */
export type CycleErrorHandler<TContext> = (
  reason: string,
  invocation: CycleInvocation<TContext>
) => void;

// ─── Registration ───────────────────────────────────────────────────

/**
 * Full registration descriptor for a cycle.
 *
 * `context` is the cycle's private state. Pass `undefined` for cycles that
 * need none; the convenience registration helpers do this for you.
 */
export interface CycleConfig<TContext = undefined> {
  readonly name: string;
  readonly mode: CycleMode;
  readonly priority: CyclePriority;
  readonly intervalMs?: number;
  readonly timeoutMs?: number;
  readonly condition?: CyclePredicate<TContext>;
  readonly execute: CycleCallback<TContext>;
  readonly onError?: CycleErrorHandler<TContext>;
  readonly pattern?: readonly PatternStep[];
  readonly ring?: RingConfig;
  readonly errorPolicy?: CycleErrorPolicy;
  /** Defaults to true. */
  readonly enabled?: boolean;
  /** Defaults to false. */
  readonly oneShot?: boolean;
  readonly context: TContext;
}

/**
 * Why a registration was refused.
 */
export type RegistrationErrorCode = "CAPACITY_EXCEEDED" | "INVALID_CONFIG";

/**
 * Outcome of `register()`. Callers must check `ok`.
 */
export type RegistrationResult =
  | { readonly ok: true; readonly id: CycleId }
  | {
      readonly ok: false;
      readonly code: RegistrationErrorCode;
      readonly message: string;
    };

// ─── Statistics ─────────────────────────────────────────────────────

/**
 * Snapshot of a cycle's runtime record.
 */
export interface CycleStats {
  readonly id: CycleId;
  readonly name: string;
  readonly mode: CycleMode;
  readonly priority: CyclePriority;
  readonly enabled: boolean;
  readonly state: CycleState;
  readonly lastExecution: number;
  /** Earliest time the cycle is next due; equals `lastExecution` for untimed modes. */
  readonly nextExecution: number;
  readonly executionCount: number;
  readonly errorCount: number;
  readonly consecutiveErrors: number;
  readonly lastError: string | null;
  readonly totalExecutionTime: number;
  readonly maxExecutionTime: number;
  readonly patternStep: number;
  readonly ringIndex: number;
  readonly ringWraps: number;
}

/**
 * Manager-wide statistics.
 */
export interface CycleManagerSummary {
  readonly cycleCount: number;
  readonly capacity: number;
  readonly totalExecutions: number;
  readonly totalErrors: number;
  /** Total time spent inside `update()` passes (ms). */
  readonly totalPassTime: number;
  readonly passCount: number;
  readonly lastUpdate: number;
}
