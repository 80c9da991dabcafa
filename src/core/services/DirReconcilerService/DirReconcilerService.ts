/**
 * DirReconcilerService - makes the replica's directory set match the source's.
 *
 * Creation is single-level, so source directories are processed parents
 * first. Removal is recursive: once a top-level directory is gone, its listed
 * descendants no longer exist and are passed over without a log entry.
 */

import { Context, Data, Effect, Layer, Match, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { FileStatServiceTag, type FileStatError } from "../FileStatService"
import { SyncLogServiceTag } from "../SyncLogService"
import {
  resolveUnder,
  sortParentsFirst,
  type DirectorySet,
  type RelativePath,
} from "@domain/RelativePath"
import { tally, type EntryOutcome, type ReconcileReport } from "@domain/ReconcileReport"

// =============================================================================
// Errors
// =============================================================================

export class DirectoryCreateFailed extends Data.TaggedError("DirectoryCreateFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export class DirectoryRemoveFailed extends Data.TaggedError("DirectoryRemoveFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export class DirectoryBlocked extends Data.TaggedError("DirectoryBlocked")<{
  readonly path: string
  readonly occupant: string
}> {}

export type DirReconcileError =
  | DirectoryCreateFailed
  | DirectoryRemoveFailed
  | DirectoryBlocked
  | FileStatError

const reasonOf = Match.typeTags<DirReconcileError>()({
  DirectoryCreateFailed: (e) => e.reason,
  DirectoryRemoveFailed: (e) => e.reason,
  DirectoryBlocked: (e) => `path is occupied by a ${e.occupant}`,
  FilePermissionDenied: () => "permission denied",
  FileStatUnknownError: (e) => e.cause,
})

// =============================================================================
// Service interface
// =============================================================================

export interface DirReconcilerService {
  readonly reconcile: (
    sourceRoot: string,
    replicaRoot: string,
    sourceDirs: DirectorySet,
    replicaDirs: DirectorySet
  ) => Effect.Effect<ReconcileReport>
}

export class DirReconcilerServiceTag extends Context.Tag("DirReconcilerService")<
  DirReconcilerServiceTag,
  DirReconcilerService
>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const DirReconcilerServiceLive = Layer.effect(
  DirReconcilerServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const stat = yield* FileStatServiceTag
    const log = yield* SyncLogServiceTag

    const settle = (
      path: string,
      step: Effect.Effect<EntryOutcome | undefined, DirReconcileError>
    ): Effect.Effect<EntryOutcome | undefined> =>
      Effect.catchAll(step, (error) => Effect.as(log.failure(path, reasonOf(error)), "failed" as const))

    const removeBlockingFile = (replicaPath: string) =>
      pipe(
        fs.remove(replicaPath),
        Effect.mapError((e) => new DirectoryRemoveFailed({ path: replicaPath, reason: e.message })),
        Effect.zipRight(log.emit("REMOVED", replicaPath))
      )

    const createDirectory = (sourceRoot: string, replicaRoot: string, relativePath: RelativePath) => {
      const sourcePath = resolveUnder(sourceRoot, relativePath)
      const replicaPath = resolveUnder(replicaRoot, relativePath)

      return settle(
        replicaPath,
        Effect.gen(function* () {
          const replicaKind = yield* stat.kind(replicaPath)
          if (replicaKind === "directory") return "unchanged" as const

          const sourceKind = yield* stat.kind(sourcePath)
          if (sourceKind !== "directory") {
            yield* Effect.logDebug(`Source directory vanished before creation: ${sourcePath}`)
            return "skipped" as const
          }

          if (replicaKind === "file") {
            yield* removeBlockingFile(replicaPath)
          } else if (replicaKind !== "missing") {
            return yield* Effect.fail(new DirectoryBlocked({ path: replicaPath, occupant: replicaKind }))
          }

          yield* pipe(
            fs.makeDirectory(replicaPath),
            Effect.mapError((e) => new DirectoryCreateFailed({ path: replicaPath, reason: e.message }))
          )
          yield* log.emit("CREATED", replicaPath)
          return "created" as const
        })
      )
    }

    const removeDirectory = (sourceRoot: string, replicaRoot: string, relativePath: RelativePath) => {
      const sourcePath = resolveUnder(sourceRoot, relativePath)
      const replicaPath = resolveUnder(replicaRoot, relativePath)

      return settle(
        replicaPath,
        Effect.gen(function* () {
          const replicaKind = yield* stat.kind(replicaPath)
          if (replicaKind !== "directory") return undefined

          const sourceKind = yield* stat.kind(sourcePath)
          if (sourceKind === "directory") return undefined

          yield* pipe(
            fs.remove(replicaPath, { recursive: true }),
            Effect.mapError((e) => new DirectoryRemoveFailed({ path: replicaPath, reason: e.message }))
          )
          yield* log.emit("REMOVED", replicaPath)
          return "removed" as const
        })
      )
    }

    const reconcile: DirReconcilerService["reconcile"] = (sourceRoot, replicaRoot, sourceDirs, replicaDirs) =>
      Effect.gen(function* () {
        const created = yield* Effect.forEach(sortParentsFirst(sourceDirs), (relativePath) =>
          createDirectory(sourceRoot, replicaRoot, relativePath)
        )
        const removed = yield* Effect.forEach(sortParentsFirst(replicaDirs), (relativePath) =>
          removeDirectory(sourceRoot, replicaRoot, relativePath)
        )
        return tally([...created, ...removed])
      })

    return { reconcile }
  })
)
