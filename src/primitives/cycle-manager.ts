/**
 * @module primitives/cycle-manager
 * @description Full implementation of the ICycleManager interface.
 *
 * A fixed-capacity table of cycles dispatched by a single-threaded main
 * loop. Each `update()` is one pass:
 *
 *   CRITICAL → HIGH → NORMAL → LOW → BACKGROUND
 *
 * and registration order within a class. Eligible cycles are enabled and
 * ACTIVE or ERROR; an errored cycle stays scheduled unless its error
 * policy says otherwise.
 *
 * Callbacks report through a CycleResult value. A callback that throws is
 * caught and counted as a failure of that cycle only.
 */

import { z } from "zod";
import { DeviceEmitter } from "./base-emitter.js";
import { systemClock, type Clock } from "./clock.js";
import {
  DEFAULT_CYCLE_CAPACITY,
  type ICycleManager,
} from "../interfaces/cycle-manager.js";
import type { CycleId } from "../types/branded.js";
import {
  PRIORITY_ORDER,
  cycleFailed,
  type CycleCallback,
  type CycleConfig,
  type CycleErrorPolicy,
  type CycleInvocation,
  type CycleManagerSummary,
  type CycleMode,
  type CyclePredicate,
  type CyclePriority,
  type CycleResult,
  type CycleState,
  type CycleStats,
  type PatternPosition,
  type PatternStep,
  type RegistrationResult,
  type RingConfig,
} from "../types/cycle.js";
import { Logger } from "../utils/logger.js";

const LOG_CONTEXT = "CycleManager";

// ─── Registration Schema ────────────────────────────────────────────

const CYCLE_MODES = [
  "INTERVAL",
  "TIMEOUT",
  "CONDITION",
  "PATTERN",
  "BUFFER_WRAP",
] as const satisfies readonly CycleMode[];

const CYCLE_PRIORITIES = [
  "CRITICAL",
  "HIGH",
  "NORMAL",
  "LOW",
  "BACKGROUND",
] as const satisfies readonly CyclePriority[];

const duration = z.number().finite().nonnegative();

const PatternStepSchema = z.object({
  durationMs: z.number().finite().positive(),
  value: z.number().finite(),
  active: z.boolean(),
});

const CycleConfigSchema = z
  .object({
    name: z.string().trim().min(1, "name must not be empty"),
    mode: z.enum(CYCLE_MODES),
    priority: z.enum(CYCLE_PRIORITIES),
    intervalMs: duration.optional(),
    timeoutMs: duration.optional(),
    condition: z.function().optional(),
    execute: z.function(),
    onError: z.function().optional(),
    pattern: z.array(PatternStepSchema).optional(),
    ring: z
      .object({
        size: z.number().int().positive(),
        onWrap: z.function().optional(),
      })
      .optional(),
    errorPolicy: z
      .object({
        backoffMs: duration.optional(),
        maxBackoffMs: duration.optional(),
        disableAfter: z.number().int().positive().optional(),
      })
      .optional(),
    enabled: z.boolean().optional(),
    oneShot: z.boolean().optional(),
  })
  .superRefine((config, ctx) => {
    const need = (ok: boolean, path: string, message: string): void => {
      if (!ok) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [path], message });
      }
    };
    switch (config.mode) {
      case "INTERVAL":
        need(config.intervalMs !== undefined, "intervalMs", "INTERVAL cycles need intervalMs");
        break;
      case "TIMEOUT":
        need(config.timeoutMs !== undefined, "timeoutMs", "TIMEOUT cycles need timeoutMs");
        break;
      case "CONDITION":
        need(config.condition !== undefined, "condition", "CONDITION cycles need a predicate");
        break;
      case "PATTERN":
        need((config.pattern?.length ?? 0) > 0, "pattern", "PATTERN cycles need at least one step");
        break;
      case "BUFFER_WRAP":
        need(config.ring !== undefined, "ring", "BUFFER_WRAP cycles need a ring");
        break;
    }
  });

// ─── Internal Record ────────────────────────────────────────────────

/** Invocation fields the manager fills in; the context is bound per cycle. */
type InvocationMeta = Omit<CycleInvocation<unknown>, "context">;

interface CycleRecord {
  readonly id: CycleId;
  readonly name: string;
  readonly mode: CycleMode;
  readonly priority: CyclePriority;
  readonly intervalMs: number;
  readonly timeoutMs: number;
  readonly oneShot: boolean;
  readonly pattern: readonly PatternStep[];
  readonly ring: RingConfig | null;
  readonly errorPolicy: CycleErrorPolicy | null;
  readonly shouldRun: () => boolean;
  readonly run: (meta: InvocationMeta) => CycleResult;
  readonly handleError: (reason: string, meta: InvocationMeta) => void;

  enabled: boolean;
  state: CycleState;
  lastExecution: number;
  retryAt: number | null;
  executionCount: number;
  errorCount: number;
  consecutiveErrors: number;
  lastError: string | null;
  totalExecutionTime: number;
  maxExecutionTime: number;
  patternStep: number;
  patternStepStartedAt: number;
  patternFresh: boolean;
  ringIndex: number;
  ringWraps: number;
}

export interface CycleManagerOptions {
  readonly capacity?: number;
  readonly clock?: Clock;
  readonly logger?: Logger;
  /** Event bus to publish on. A private one is created when omitted. */
  readonly events?: DeviceEmitter;
}

/**
 * CycleManager: cooperative priority scheduler.
 *
 * @example
 * ```ts
 * const manager = new CycleManager({ capacity: 32 });
 * manager.registerInterval("Heartbeat", 1000, "NORMAL", () => CYCLE_OK);
 * setInterval(() => manager.update(), 10);
 * ```
 */
export class CycleManager implements ICycleManager {
  readonly events: DeviceEmitter;
  private readonly capacity: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private records: CycleRecord[] = [];
  private totalExecutions = 0;
  private totalErrors = 0;
  private totalPassTime = 0;
  private passCount = 0;
  private lastUpdate = 0;

  constructor(options: CycleManagerOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_CYCLE_CAPACITY;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new Logger();
    this.events = options.events ?? new DeviceEmitter();
  }

  // ─── Commands ───────────────────────────────────────────────────

  initialize(): void {
    this.records = [];
    this.totalExecutions = 0;
    this.totalErrors = 0;
    this.totalPassTime = 0;
    this.passCount = 0;
    this.lastUpdate = 0;
  }

  register<TContext>(config: CycleConfig<TContext>): RegistrationResult {
    const parsed = CycleConfigSchema.safeParse(config);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
        .join("; ");
      this.logger.warn(`Rejected cycle registration: ${message}`, LOG_CONTEXT);
      return { ok: false, code: "INVALID_CONFIG", message };
    }

    if (this.records.length >= this.capacity) {
      const message = `Cycle table full (${this.capacity}); cannot register "${config.name}"`;
      this.logger.warn(message, LOG_CONTEXT);
      return { ok: false, code: "CAPACITY_EXCEEDED", message };
    }

    const id = this.records.length as CycleId;
    const now = this.clock.now();
    const enabled = config.enabled ?? true;
    const { condition, execute, onError, context } = config;

    const record: CycleRecord = {
      id,
      name: config.name,
      mode: config.mode,
      priority: config.priority,
      intervalMs: config.intervalMs ?? 0,
      timeoutMs: config.timeoutMs ?? 0,
      oneShot: config.oneShot ?? false,
      pattern: config.pattern ?? [],
      ring: config.ring ?? null,
      errorPolicy: config.errorPolicy ?? null,
      shouldRun: condition ? () => condition(context) : () => true,
      run: (meta) => execute({ ...meta, context }),
      handleError: onError
        ? (reason, meta) => onError(reason, { ...meta, context })
        : () => {},

      enabled,
      state: enabled ? "ACTIVE" : "INACTIVE",
      lastExecution: now,
      retryAt: null,
      executionCount: 0,
      errorCount: 0,
      consecutiveErrors: 0,
      lastError: null,
      totalExecutionTime: 0,
      maxExecutionTime: 0,
      patternStep: 0,
      patternStepStartedAt: now,
      patternFresh: true,
      ringIndex: 0,
      ringWraps: 0,
    };
    this.records.push(record);

    this.logger.debug(
      `Registered #${id} "${record.name}" (${record.mode}, ${record.priority})`,
      LOG_CONTEXT
    );
    this.events.emit({
      type: "CYCLE_REGISTERED",
      id,
      name: record.name,
      mode: record.mode,
      priority: record.priority,
      timestamp: now,
    });
    return { ok: true, id };
  }

  update(now: number = this.clock.now()): void {
    const passStartedAt = this.clock.now();
    const order = this.executionOrder();

    for (const record of order) {
      this.dispatch(record, now);
    }

    this.passCount++;
    this.totalPassTime += Math.max(0, this.clock.now() - passStartedAt);
    this.lastUpdate = now;
  }

  setEnabled(id: CycleId, enabled: boolean): boolean {
    const record = this.records[id];
    if (!record) return false;

    if (enabled) {
      record.enabled = true;
      if (record.state === "INACTIVE" || record.state === "COMPLETED") {
        record.state = "ACTIVE";
        this.arm(record, this.clock.now());
      }
    } else {
      record.enabled = false;
      record.state = "INACTIVE";
    }
    return true;
  }

  setPaused(id: CycleId, paused: boolean): boolean {
    const record = this.records[id];
    if (!record) return false;

    if (paused) {
      if (record.state === "ACTIVE" || record.state === "ERROR") {
        record.state = "PAUSED";
      }
    } else if (record.state === "PAUSED") {
      record.state = record.enabled ? "ACTIVE" : "INACTIVE";
    }
    return true;
  }

  resetStats(id: CycleId): boolean {
    const record = this.records[id];
    if (!record) return false;

    record.executionCount = 0;
    record.errorCount = 0;
    record.consecutiveErrors = 0;
    record.lastError = null;
    record.totalExecutionTime = 0;
    record.maxExecutionTime = 0;
    record.ringWraps = 0;
    return true;
  }

  // ─── Convenience Registration ───────────────────────────────────

  registerInterval(
    name: string,
    intervalMs: number,
    priority: CyclePriority,
    execute: CycleCallback<undefined>
  ): RegistrationResult {
    return this.register({ name, mode: "INTERVAL", priority, intervalMs, execute, context: undefined });
  }

  registerTimeout(
    name: string,
    timeoutMs: number,
    priority: CyclePriority,
    execute: CycleCallback<undefined>
  ): RegistrationResult {
    return this.register({
      name,
      mode: "TIMEOUT",
      priority,
      timeoutMs,
      execute,
      oneShot: true,
      context: undefined,
    });
  }

  registerCondition(
    name: string,
    condition: CyclePredicate<undefined>,
    priority: CyclePriority,
    execute: CycleCallback<undefined>
  ): RegistrationResult {
    return this.register({ name, mode: "CONDITION", priority, condition, execute, context: undefined });
  }

  registerPattern(
    name: string,
    steps: readonly PatternStep[],
    priority: CyclePriority,
    execute: CycleCallback<undefined>
  ): RegistrationResult {
    return this.register({ name, mode: "PATTERN", priority, pattern: steps, execute, context: undefined });
  }

  registerBufferWrap(
    name: string,
    ring: RingConfig,
    priority: CyclePriority,
    execute: CycleCallback<undefined>
  ): RegistrationResult {
    return this.register({ name, mode: "BUFFER_WRAP", priority, ring, execute, context: undefined });
  }

  // ─── Queries ────────────────────────────────────────────────────

  stats(id: CycleId): CycleStats | undefined {
    const record = this.records[id];
    if (!record) return undefined;

    return {
      id: record.id,
      name: record.name,
      mode: record.mode,
      priority: record.priority,
      enabled: record.enabled,
      state: record.state,
      lastExecution: record.lastExecution,
      nextExecution: this.nextExecution(record),
      executionCount: record.executionCount,
      errorCount: record.errorCount,
      consecutiveErrors: record.consecutiveErrors,
      lastError: record.lastError,
      totalExecutionTime: record.totalExecutionTime,
      maxExecutionTime: record.maxExecutionTime,
      patternStep: record.patternStep,
      ringIndex: record.ringIndex,
      ringWraps: record.ringWraps,
    };
  }

  state(id: CycleId): CycleState | undefined {
    return this.records[id]?.state;
  }

  summary(): CycleManagerSummary {
    return {
      cycleCount: this.records.length,
      capacity: this.capacity,
      totalExecutions: this.totalExecutions,
      totalErrors: this.totalErrors,
      totalPassTime: this.totalPassTime,
      passCount: this.passCount,
      lastUpdate: this.lastUpdate,
    };
  }

  describe(): string[] {
    return this.records.map((record) => {
      const avg =
        record.executionCount > 0
          ? record.totalExecutionTime / record.executionCount
          : 0;
      const flag = record.enabled ? "" : " (disabled)";
      return (
        `#${record.id} ${record.name} [${record.mode}/${record.priority}] ${record.state}${flag} ` +
        `runs=${record.executionCount} errors=${record.errorCount} ` +
        `avg=${avg.toFixed(2)}ms max=${record.maxExecutionTime}ms`
      );
    });
  }

  getCycleCount(): number {
    return this.records.length;
  }

  getCapacity(): number {
    return this.capacity;
  }

  // ─── Internals ──────────────────────────────────────────────────

  /** Snapshot of the table in dispatch order. */
  private executionOrder(): CycleRecord[] {
    const order: CycleRecord[] = [];
    for (const priority of PRIORITY_ORDER) {
      for (const record of this.records) {
        if (record.priority === priority) order.push(record);
      }
    }
    return order;
  }

  private arm(record: CycleRecord, now: number): void {
    record.lastExecution = now;
    record.retryAt = null;
    record.consecutiveErrors = 0;
    record.patternStep = 0;
    record.patternStepStartedAt = now;
    record.patternFresh = true;
  }

  private nextExecution(record: CycleRecord): number {
    let next = record.lastExecution;
    if (record.mode === "INTERVAL") next += record.intervalMs;
    if (record.mode === "TIMEOUT") next += record.timeoutMs;
    return record.retryAt !== null ? Math.max(next, record.retryAt) : next;
  }

  private dispatch(record: CycleRecord, now: number): void {
    if (!record.enabled) return;
    if (record.state !== "ACTIVE" && record.state !== "ERROR") return;
    if (record.retryAt !== null && now < record.retryAt) return;

    const meta: InvocationMeta = {
      id: record.id,
      name: record.name,
      now,
      pattern: null,
      ringIndex: null,
    };

    switch (record.mode) {
      case "INTERVAL":
        if (now - record.lastExecution < record.intervalMs) return;
        break;
      case "TIMEOUT":
        if (now - record.lastExecution < record.timeoutMs) return;
        break;
      case "CONDITION": {
        let due: boolean;
        try {
          due = record.shouldRun();
        } catch (err) {
          this.recordFailure(record, meta, `condition threw: ${describeError(err)}`);
          return;
        }
        if (!due) return;
        break;
      }
      case "PATTERN": {
        const position = this.advancePattern(record, now);
        if (!position) return;
        this.execute(record, { ...meta, pattern: position });
        return;
      }
      case "BUFFER_WRAP":
        this.execute(record, { ...meta, ringIndex: record.ringIndex });
        return;
    }

    this.execute(record, meta);
  }

  private advancePattern(record: CycleRecord, now: number): PatternPosition | null {
    const current = record.pattern[record.patternStep];
    if (!current) return null;

    let changed = record.patternFresh;
    record.patternFresh = false;

    if (now - record.patternStepStartedAt >= current.durationMs) {
      record.patternStep = (record.patternStep + 1) % record.pattern.length;
      record.patternStepStartedAt = now;
      changed = true;
    }

    const step = record.pattern[record.patternStep];
    if (!step) return null;
    return { index: record.patternStep, step, changed };
  }

  private execute(record: CycleRecord, meta: InvocationMeta): void {
    const startedAt = this.clock.now();
    let result: CycleResult;
    try {
      result = record.run(meta);
    } catch (err) {
      result = cycleFailed(describeError(err));
    }
    const elapsed = Math.max(0, this.clock.now() - startedAt);
    record.totalExecutionTime += elapsed;
    record.maxExecutionTime = Math.max(record.maxExecutionTime, elapsed);

    if (result.ok) {
      this.recordSuccess(record, meta.now);
    } else {
      this.recordFailure(record, meta, result.reason);
    }
  }

  private recordSuccess(record: CycleRecord, now: number): void {
    record.executionCount++;
    this.totalExecutions++;
    record.lastExecution = now;
    record.consecutiveErrors = 0;
    record.retryAt = null;

    if (record.mode === "BUFFER_WRAP" && record.ring) {
      record.ringIndex = (record.ringIndex + 1) % record.ring.size;
      if (record.ringIndex === 0) {
        record.ringWraps++;
        record.ring.onWrap?.(record.ringWraps);
      }
    }

    if (record.state === "ERROR") {
      record.state = "ACTIVE";
    }

    if (record.state === "ACTIVE") this.retireOneShot(record, now);
  }

  /** One-shot cycles retire after firing, whatever the outcome. */
  private retireOneShot(record: CycleRecord, now: number): void {
    if (!record.oneShot) return;
    record.state = "COMPLETED";
    record.retryAt = null;
    this.logger.debug(`#${record.id} "${record.name}" completed`, LOG_CONTEXT);
    this.events.emit({
      type: "CYCLE_COMPLETED",
      id: record.id,
      name: record.name,
      timestamp: now,
    });
  }

  private recordFailure(
    record: CycleRecord,
    meta: InvocationMeta,
    reason: string
  ): void {
    record.errorCount++;
    record.consecutiveErrors++;
    record.lastError = reason;
    this.totalErrors++;

    if (record.state === "ACTIVE" || record.state === "ERROR") {
      record.state = "ERROR";
    }

    this.logger.warn(
      `#${record.id} "${record.name}" failed (${record.consecutiveErrors} in a row): ${reason}`,
      LOG_CONTEXT
    );

    try {
      record.handleError(reason, meta);
    } catch (err) {
      this.logger.error(
        `Error handler of #${record.id} "${record.name}" threw`,
        LOG_CONTEXT,
        toError(err)
      );
    }

    this.events.emit({
      type: "CYCLE_FAILED",
      id: record.id,
      name: record.name,
      reason,
      errorCount: record.errorCount,
      timestamp: meta.now,
    });

    if (record.oneShot) {
      if (record.state === "ERROR") this.retireOneShot(record, meta.now);
      return;
    }
    this.applyErrorPolicy(record, meta.now);
  }

  private applyErrorPolicy(record: CycleRecord, now: number): void {
    const policy = record.errorPolicy;
    if (!policy || !record.enabled) return;

    if (
      policy.disableAfter !== undefined &&
      record.consecutiveErrors >= policy.disableAfter
    ) {
      record.enabled = false;
      record.state = "INACTIVE";
      record.retryAt = null;
      this.logger.warn(
        `#${record.id} "${record.name}" disabled after ${record.consecutiveErrors} consecutive failures`,
        LOG_CONTEXT
      );
      this.events.emit({
        type: "CYCLE_AUTO_DISABLED",
        id: record.id,
        name: record.name,
        consecutiveErrors: record.consecutiveErrors,
        timestamp: now,
      });
      return;
    }

    if (policy.backoffMs !== undefined && policy.backoffMs > 0) {
      const doubled = policy.backoffMs * 2 ** (record.consecutiveErrors - 1);
      const delay = Math.min(doubled, policy.maxBackoffMs ?? Number.POSITIVE_INFINITY);
      record.retryAt = now + delay;
    }
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
