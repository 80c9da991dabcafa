import { Console, Duration, Effect, Ref, Schedule, pipe } from "effect"

import type { SyncOptions } from "./options"
import { parseSyncOptions } from "./optionParsing"
import { fromDomainError } from "./errors"

import {
  createAppLayer,
  LoggerServiceTag,
  SyncConfigTag,
  SyncCycleServiceTag,
  SyncLogServiceTag,
} from "@core"

/**
 * Error handling wrapper for CLI commands. Failures reaching this point are
 * fatal: the message is printed and the process exits non-zero.
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return pipe(
        Console.error(`\n${appError.format()}\n`),
        Effect.zipRight(
          Effect.sync(() => {
            process.exitCode = 1
          })
        )
      )
    }),
    Effect.asVoid
  )

/**
 * Runs one cycle. A cycle that aborts is reported on the console and in the
 * log file; it never fails the surrounding loop.
 */
export const runCycle = (cycle: number) =>
  Effect.gen(function* () {
    const syncCycle = yield* SyncCycleServiceTag
    const logger = yield* LoggerServiceTag
    const syncLog = yield* SyncLogServiceTag

    yield* Effect.logDebug(`Starting cycle ${cycle}`)

    yield* pipe(
      syncCycle.run(),
      Effect.flatMap((report) => logger.sync.cycleSummary(cycle, report)),
      Effect.catchAll((error) => {
        const appError = fromDomainError(error)
        return pipe(
          logger.sync.cycleFailed(cycle, appError.format()),
          Effect.zipRight(syncLog.failure(error.path, appError.detail))
        )
      })
    )
  })

/**
 * Repeats cycles forever, sleeping the configured interval after each one
 * completes. Cycles never overlap; a slow cycle just delays the next start.
 */
export const syncLoop = (once: boolean) =>
  Effect.gen(function* () {
    const config = yield* SyncConfigTag
    const logger = yield* LoggerServiceTag

    yield* logger.sync.header(config, once)

    if (once) {
      yield* runCycle(1)
      return
    }

    const counter = yield* Ref.make(0)

    yield* pipe(
      Ref.updateAndGet(counter, (n) => n + 1),
      Effect.flatMap(runCycle),
      Effect.repeat(Schedule.spaced(Duration.seconds(config.intervalSeconds))),
      Effect.onInterrupt(() => logger.sync.stopped)
    )
  })

/**
 * Run the sync command
 */
export const runSync = (options: SyncOptions) =>
  Effect.gen(function* () {
    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled")
    }

    const config = yield* parseSyncOptions(options)

    yield* pipe(syncLoop(options.once), Effect.provide(createAppLayer(config)))
  })
