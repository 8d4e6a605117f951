import type { Counter } from "../types/core.js";
import type { PatternConfig } from "../types/pattern.js";
import type { TrafficLogger } from "./logger.js";
import { formatPattern } from "./pattern.js";

export interface PatternStats {
  pattern: PatternConfig;
  localCount: Counter;
}

/** Write the end-of-run traffic report. */
export function logStatistics(log: TrafficLogger, globalCount: Counter, perPattern: readonly PatternStats[]): void {
  const opts = { toConsole: true };
  log.log("\n\n== Data Push Traffic Report ==\n", opts);
  log.log(`Total Traffic Pattern Types = ${perPattern.length}`, opts);
  log.log(`Total Data Sent             = ${globalCount}`, opts);
  for (const [i, { pattern, localCount }] of perPattern.entries()) {
    log.log(`\nTraffic Pattern Type #${i + 1}`, opts);
    log.log(formatPattern(pattern), opts);
    log.log(`Total Data Sent             = ${localCount}\n`, opts);
  }
}
