/**
 * SyncLogService - the append-only change log.
 *
 * Each entry is one line, appended to the configured log file and echoed to
 * stdout. Reconcilers call `emit` exactly once per mutation of the replica.
 */

import { Clock, Console, Context, Effect, Layer, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { SyncConfigTag } from "@domain/SyncConfig"
import { formatFailureLine, formatLogLine, type SyncAction } from "@domain/SyncEvent"

export interface SyncLogService {
  readonly emit: (action: SyncAction, absolutePath: string) => Effect.Effect<void>
  /** Records an entry or cycle that could not be synchronized. */
  readonly failure: (absolutePath: string, reason: string) => Effect.Effect<void>
}

export class SyncLogServiceTag extends Context.Tag("SyncLogService")<
  SyncLogServiceTag,
  SyncLogService
>() {}

export const SyncLogServiceLive = Layer.effect(
  SyncLogServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const { logFile } = yield* SyncConfigTag

    const now = Effect.map(Clock.currentTimeMillis, (millis) => new Date(millis))

    const write = (line: string) =>
      pipe(
        Console.log(line),
        Effect.zipRight(fs.writeFileString(logFile, `${line}\n`, { flag: "a" })),
        Effect.catchAll((error) =>
          Effect.logWarning(`Could not append to log file ${logFile}: ${error.message}`)
        )
      )

    return {
      emit: (action, absolutePath) =>
        Effect.flatMap(now, (at) => write(formatLogLine(at, action, absolutePath))),
      failure: (absolutePath, reason) =>
        Effect.flatMap(now, (at) => write(formatFailureLine(at, absolutePath, reason))),
    }
  })
)
