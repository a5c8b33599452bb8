/**
 * @module interfaces/cycle-manager
 * @description ICycleManager: the cooperative, priority-ordered scheduler.
 *
 * A single logical thread calls `update()` from its main loop. Each pass
 * walks the priority classes from CRITICAL to BACKGROUND and, within a
 * class, the cycles in registration order. No cycle runs twice in a pass
 * and a failing cycle never stops the pass.
 *
 * Cycles are never removed. Their ids are stable indices into a
 * fixed-capacity table.
 */

import type { CycleId } from "../types/branded.js";
import type {
  CycleConfig,
  CycleManagerSummary,
  CyclePredicate,
  CyclePriority,
  CycleCallback,
  CycleState,
  CycleStats,
  PatternStep,
  RegistrationErrorCode,
  RegistrationResult,
  RingConfig,
} from "../types/cycle.js";

/** Default table size. */
export const DEFAULT_CYCLE_CAPACITY = 32;

/**
 * Thrown by components that cannot work without the cycle they register.
 */
export class CycleRegistrationError extends Error {
  constructor(
    message: string,
    public readonly code: RegistrationErrorCode
  ) {
    super(message);
    this.name = "CycleRegistrationError";
  }
}

/**
 * Unwrap a registration result.
 * @throws {CycleRegistrationError} when the registration was refused.
 */
export function expectRegistered(result: RegistrationResult): CycleId {
  if (!result.ok) {
    throw new CycleRegistrationError(result.message, result.code);
  }
  return result.id;
}

/**
 * @interface ICycleManager
 * @description Registration, dispatch and introspection of cycles.
 */
export interface ICycleManager {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Clears the registry and manager statistics. Idempotent.
   */
  initialize(): void;

  /**
   * @command
   * @description Adds a cycle to the table.
   *
   * The cycle starts ACTIVE when `enabled` (default true), INACTIVE
   * otherwise. Its timers are armed at the current clock time.
   *
   * @returns `{ ok: true, id }`, or a failure with code CAPACITY_EXCEEDED
   *   when the table is full, INVALID_CONFIG when the descriptor is unusable.
   */
  register<TContext>(config: CycleConfig<TContext>): RegistrationResult;

  /**
   * @command
   * @description Runs one scheduler pass.
   * @param now - Pass timestamp (ms). Defaults to the manager's clock.
   */
  update(now?: number): void;

  /**
   * @command
   * @description Enables or disables a cycle. Statistics are kept.
   * Enabling an INACTIVE or COMPLETED cycle re-arms its timers.
   * @returns false for an unknown id.
   */
  setEnabled(id: CycleId, enabled: boolean): boolean;

  /**
   * @command
   * @description Pauses or resumes a cycle without disabling it.
   * @returns false for an unknown id.
   */
  setPaused(id: CycleId, paused: boolean): boolean;

  /**
   * @command
   * @description Zeroes a cycle's counters and timings.
   */
  resetStats(id: CycleId): boolean;

  // ─── Convenience Registration ───────────────────────────────────

  registerInterval(
    name: string,
    intervalMs: number,
    priority: CyclePriority,
    execute: CycleCallback<undefined>
  ): RegistrationResult;

  /** Registers a one-shot TIMEOUT cycle. */
  registerTimeout(
    name: string,
    timeoutMs: number,
    priority: CyclePriority,
    execute: CycleCallback<undefined>
  ): RegistrationResult;

  registerCondition(
    name: string,
    condition: CyclePredicate<undefined>,
    priority: CyclePriority,
    execute: CycleCallback<undefined>
  ): RegistrationResult;

  registerPattern(
    name: string,
    steps: readonly PatternStep[],
    priority: CyclePriority,
    execute: CycleCallback<undefined>
  ): RegistrationResult;

  registerBufferWrap(
    name: string,
    ring: RingConfig,
    priority: CyclePriority,
    execute: CycleCallback<undefined>
  ): RegistrationResult;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @returns A snapshot of the cycle's record, or undefined for an unknown id.
   */
  stats(id: CycleId): CycleStats | undefined;

  /**
   * @query
   */
  state(id: CycleId): CycleState | undefined;

  /**
   * @query
   * @description Manager-wide totals.
   */
  summary(): CycleManagerSummary;

  /**
   * @query
   * @description One human-readable line per registered cycle.
   */
  describe(): string[];

  /**
   * @query
   */
  getCycleCount(): number;
}
