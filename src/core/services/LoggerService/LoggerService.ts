/**
 * LoggerService - formatted console output for the sync command
 */

import { Console, Context, Effect, Layer } from "effect"
import type { SyncConfig } from "@domain/SyncConfig"
import { changeCount, cycleTotals, type CycleReport } from "@domain/ReconcileReport"

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly sync: {
    readonly header: (config: SyncConfig, once: boolean) => Effect.Effect<void>
    readonly cycleSummary: (cycle: number, report: CycleReport) => Effect.Effect<void>
    readonly cycleFailed: (cycle: number, message: string) => Effect.Effect<void>
    readonly stopped: Effect.Effect<void>
  }
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, {
  sync: {
    header: (config, once) =>
      Effect.gen(function* () {
        yield* Console.log("\n🔁 Replica Sync\n")
        yield* Console.log(`   Source:   ${config.source}`)
        yield* Console.log(`   Replica:  ${config.replica}`)
        yield* Console.log(`   Log file: ${config.logFile}`)
        yield* Console.log(
          once ? "   Mode:     single cycle\n" : `   Interval: ${config.intervalSeconds}s\n`
        )
      }),
    // Cycles without changes or failures only trace at debug level.
    cycleSummary: (cycle, report) => {
      const totals = cycleTotals(report)
      if (changeCount(totals) === 0 && totals.failed === 0) {
        return Effect.logDebug(`Cycle ${cycle}: no changes`)
      }
      return Console.log(
        `✓ Cycle ${cycle}: ${totals.created} created, ${totals.modified} modified, ${totals.removed} removed` +
          (totals.failed > 0 ? `, ❌ ${totals.failed} failed` : "") +
          (totals.skipped > 0 ? `, ⏭️  ${totals.skipped} skipped` : "")
      )
    },
    cycleFailed: (cycle, message) =>
      Effect.gen(function* () {
        yield* Console.error(`\n❌ Cycle ${cycle} aborted`)
        yield* Console.error(`${message}\n`)
        yield* Console.error("   The next cycle will retry.\n")
      }),
    stopped: Console.log("\n⏹️  Sync stopped\n"),
  },
})
