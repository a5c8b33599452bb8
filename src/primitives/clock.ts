/**
 * @module primitives/clock
 * @description Millisecond time sources for the scheduler.
 */

export interface Clock {
  /** Current time in milliseconds. */
  now(): number;
}

/**
 * Monotonic milliseconds since process start. Wall-clock adjustments do
 * not move it, so interval and timeout cycles never stall.
 */
export const systemClock: Clock = {
  now: () => performance.now(),
};

/**
 * Clock that only moves when told to.
 *
 * @example
 * ```ts
 * const clock = new ManualClock();
 * const manager = new CycleManager({ clock });
 * clock.advance(100);
 * manager.update();
 * ```
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
