/**
 * @module cycles/system-cycles
 * @description Housekeeping cycles.
 */

import {
  expectRegistered,
  type ICycleManager,
} from "../interfaces/cycle-manager.js";
import type { CycleId } from "../types/branded.js";
import { CYCLE_OK } from "../types/cycle.js";
import type { Logger } from "../utils/logger.js";

export const DEFAULT_STATS_INTERVAL_MS = 60_000;

/**
 * Formats the manager summary as a single log line.
 */
export function formatSummary(manager: ICycleManager): string {
  const s = manager.summary();
  const avgPass = s.passCount > 0 ? s.totalPassTime / s.passCount : 0;
  return (
    `${s.cycleCount}/${s.capacity} cycles, ${s.totalExecutions} runs, ` +
    `${s.totalErrors} errors, ${s.passCount} passes (avg ${avgPass.toFixed(2)}ms)`
  );
}

/**
 * Registers `Stats`, which logs the summary at info and each cycle at debug.
 */
export function registerStats(
  manager: ICycleManager,
  logger: Logger,
  intervalMs = DEFAULT_STATS_INTERVAL_MS
): CycleId {
  return expectRegistered(
    manager.registerInterval("Stats", intervalMs, "BACKGROUND", () => {
      logger.info(formatSummary(manager), "Stats");
      if (logger.isEnabled("debug")) {
        for (const line of manager.describe()) {
          logger.debug(line, "Stats");
        }
      }
      return CYCLE_OK;
    })
  );
}
