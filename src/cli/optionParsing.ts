import { Data, Effect, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import path from "node:path"
import type { SyncConfig } from "@domain/SyncConfig"
import type { SyncOptions } from "./options"

export class ConfigPathNotFound extends Data.TaggedError("ConfigPathNotFound")<{
  readonly label: string
  readonly path: string
}> {}

export class ConfigNotADirectory extends Data.TaggedError("ConfigNotADirectory")<{
  readonly label: string
  readonly path: string
}> {}

export class ConfigNotAFile extends Data.TaggedError("ConfigNotAFile")<{
  readonly label: string
  readonly path: string
}> {}

export class ConfigPathUnreadable extends Data.TaggedError("ConfigPathUnreadable")<{
  readonly label: string
  readonly path: string
  readonly reason: string
}> {}

export class ConfigInvalidInterval extends Data.TaggedError("ConfigInvalidInterval")<{
  readonly value: string
}> {}

export type ConfigError =
  | ConfigPathNotFound
  | ConfigNotADirectory
  | ConfigNotAFile
  | ConfigPathUnreadable
  | ConfigInvalidInterval

/** Digits only: no sign, no fraction, no whitespace. */
export const parseInterval = (value: string): Effect.Effect<number, ConfigInvalidInterval> => {
  if (!/^\d+$/.test(value)) {
    return Effect.fail(new ConfigInvalidInterval({ value }))
  }
  const seconds = Number(value)
  return Number.isSafeInteger(seconds)
    ? Effect.succeed(seconds)
    : Effect.fail(new ConfigInvalidInterval({ value }))
}

const requirePath = (
  label: string,
  rawPath: string,
  expected: "directory" | "file"
): Effect.Effect<string, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const absolutePath = path.resolve(rawPath)

    const info = yield* pipe(
      fs.stat(absolutePath),
      Effect.mapError((e) =>
        e._tag === "SystemError" && e.reason === "NotFound"
          ? new ConfigPathNotFound({ label, path: absolutePath })
          : new ConfigPathUnreadable({ label, path: absolutePath, reason: e.message })
      )
    )

    if (expected === "directory" && info.type !== "Directory") {
      return yield* Effect.fail(new ConfigNotADirectory({ label, path: absolutePath }))
    }
    if (expected === "file" && info.type === "Directory") {
      return yield* Effect.fail(new ConfigNotAFile({ label, path: absolutePath }))
    }

    return absolutePath
  })

export const parseSyncOptions = (
  options: SyncOptions
): Effect.Effect<SyncConfig, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const source = yield* requirePath("source", options.source, "directory")
    const replica = yield* requirePath("replica", options.replica, "directory")
    const logFile = yield* requirePath("log file", options.logFile, "file")
    const intervalSeconds = yield* parseInterval(options.interval)

    return { source, replica, logFile, intervalSeconds }
  })
