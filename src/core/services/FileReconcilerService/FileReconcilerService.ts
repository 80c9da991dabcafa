/**
 * FileReconcilerService - makes the replica's files match the source's.
 *
 * Both sides are re-checked right before every mutation; the listings passed
 * in are only a worklist. A source file that disappears before or during a
 * copy is skipped. Content equality is decided by digest alone, so files that
 * differ only in timestamps or permissions are left alone.
 */

import { Context, Data, Effect, Either, Layer, Match, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { FileStatServiceTag, type FileStatError } from "../FileStatService"
import { HashServiceTag, type HashError } from "../HashService"
import { SyncLogServiceTag } from "../SyncLogService"
import { resolveUnder, type FileSet, type RelativePath } from "@domain/RelativePath"
import { tally, type EntryOutcome, type ReconcileReport } from "@domain/ReconcileReport"

// =============================================================================
// Errors
// =============================================================================

export class FileCopyFailed extends Data.TaggedError("FileCopyFailed")<{
  readonly source: string
  readonly destination: string
  readonly reason: string
}> {}

export class FileRemoveFailed extends Data.TaggedError("FileRemoveFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export class FileBlocked extends Data.TaggedError("FileBlocked")<{
  readonly path: string
  readonly occupant: string
}> {}

export type FileReconcileError = FileCopyFailed | FileRemoveFailed | FileBlocked | FileStatError | HashError

const reasonOf = Match.typeTags<FileReconcileError>()({
  FileCopyFailed: (e) => e.reason,
  FileRemoveFailed: (e) => e.reason,
  FileBlocked: (e) => `path is occupied by a ${e.occupant}`,
  FilePermissionDenied: () => "permission denied",
  FileStatUnknownError: (e) => e.cause,
  HashSourceNotFound: (e) => `${e.path} disappeared while hashing`,
  HashPermissionDenied: (e) => `cannot read ${e.path}: permission denied`,
  HashReadFailed: (e) => `cannot read ${e.path}: ${e.reason}`,
})

// =============================================================================
// Service interface
// =============================================================================

export interface FileReconcilerService {
  readonly reconcile: (
    sourceRoot: string,
    replicaRoot: string,
    sourceFiles: FileSet,
    replicaFiles: FileSet
  ) => Effect.Effect<ReconcileReport>
}

export class FileReconcilerServiceTag extends Context.Tag("FileReconcilerService")<
  FileReconcilerServiceTag,
  FileReconcilerService
>() {}

// =============================================================================
// Live implementation
// =============================================================================

type CopyResult = "copied" | "sourceVanished"

/** A replacement whose copy fails after the removal yields two outcomes. */
type SyncOutcome = EntryOutcome | readonly [EntryOutcome, EntryOutcome] | undefined

export const FileReconcilerServiceLive = Layer.effect(
  FileReconcilerServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const stat = yield* FileStatServiceTag
    const hash = yield* HashServiceTag
    const log = yield* SyncLogServiceTag

    const settle = (
      path: string,
      step: Effect.Effect<SyncOutcome, FileReconcileError>
    ): Effect.Effect<SyncOutcome> =>
      Effect.catchAll(step, (error) => Effect.as(log.failure(path, reasonOf(error)), "failed" as const))

    const copy = (sourcePath: string, replicaPath: string): Effect.Effect<CopyResult, FileReconcileError> =>
      pipe(
        fs.copy(sourcePath, replicaPath, { preserveTimestamps: true }),
        Effect.as<CopyResult>("copied"),
        Effect.catchAll((error) =>
          Effect.flatMap(stat.kind(sourcePath), (sourceKind) =>
            sourceKind === "file"
              ? Effect.fail(
                  new FileCopyFailed({ source: sourcePath, destination: replicaPath, reason: error.message })
                )
              : Effect.succeed<CopyResult>("sourceVanished")
          )
        )
      )

    const remove = (replicaPath: string) =>
      pipe(
        fs.remove(replicaPath),
        Effect.mapError((e) => new FileRemoveFailed({ path: replicaPath, reason: e.message }))
      )

    /** `undefined` when either side vanished while hashing. */
    const sameContent = (sourcePath: string, replicaPath: string) =>
      pipe(
        Effect.all([hash.digest(sourcePath), hash.digest(replicaPath)]),
        Effect.map(([sourceDigest, replicaDigest]): boolean | undefined => sourceDigest === replicaDigest),
        Effect.catchTag("HashSourceNotFound", (e) =>
          pipe(Effect.logDebug(`File vanished while hashing: ${e.path}`), Effect.as(undefined))
        )
      )

    const syncSourceFile = (sourceRoot: string, replicaRoot: string, relativePath: RelativePath) => {
      const sourcePath = resolveUnder(sourceRoot, relativePath)
      const replicaPath = resolveUnder(replicaRoot, relativePath)

      return settle(
        replicaPath,
        Effect.gen(function* () {
          const sourceKind = yield* stat.kind(sourcePath)
          if (sourceKind !== "file") {
            yield* Effect.logDebug(`Source file vanished before sync: ${sourcePath}`)
            return "skipped" as const
          }

          const replicaKind = yield* stat.kind(replicaPath)

          if (replicaKind === "missing") {
            const copied = yield* copy(sourcePath, replicaPath)
            if (copied === "sourceVanished") return "skipped" as const
            yield* log.emit("CREATED", replicaPath)
            return "created" as const
          }

          if (replicaKind !== "file") {
            return yield* Effect.fail(new FileBlocked({ path: replicaPath, occupant: replicaKind }))
          }

          const same = yield* sameContent(sourcePath, replicaPath)
          if (same === undefined) return "skipped" as const
          if (same) return "unchanged" as const

          yield* remove(replicaPath)
          const replaced = yield* Effect.either(copy(sourcePath, replicaPath))
          if (Either.isLeft(replaced)) {
            yield* log.emit("REMOVED", replicaPath)
            yield* log.failure(replicaPath, reasonOf(replaced.left))
            return ["removed", "failed"] as const
          }
          if (replaced.right === "sourceVanished") {
            yield* log.emit("REMOVED", replicaPath)
            return "removed" as const
          }
          yield* log.emit("MODIFIED", replicaPath)
          return "modified" as const
        })
      )
    }

    const removeReplicaFile = (sourceRoot: string, replicaRoot: string, relativePath: RelativePath) => {
      const sourcePath = resolveUnder(sourceRoot, relativePath)
      const replicaPath = resolveUnder(replicaRoot, relativePath)

      return settle(
        replicaPath,
        Effect.gen(function* () {
          const replicaKind = yield* stat.kind(replicaPath)
          if (replicaKind !== "file") return undefined

          const sourceKind = yield* stat.kind(sourcePath)
          if (sourceKind === "file") return undefined

          yield* remove(replicaPath)
          yield* log.emit("REMOVED", replicaPath)
          return "removed" as const
        })
      )
    }

    const reconcile: FileReconcilerService["reconcile"] = (sourceRoot, replicaRoot, sourceFiles, replicaFiles) =>
      Effect.gen(function* () {
        const synced = yield* Effect.forEach(sourceFiles, (relativePath) =>
          syncSourceFile(sourceRoot, replicaRoot, relativePath)
        )
        const removed = yield* Effect.forEach(replicaFiles, (relativePath) =>
          removeReplicaFile(sourceRoot, replicaRoot, relativePath)
        )
        return tally([...synced, ...removed].flat())
      })

    return { reconcile }
  })
)
