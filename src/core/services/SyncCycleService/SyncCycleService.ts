import { Context, Effect, Layer } from "effect"
import { SyncConfigTag } from "@domain/SyncConfig"
import type { CycleReport } from "@domain/ReconcileReport"
import { TreeListerServiceTag, type TreeListError } from "../TreeListerService"
import { DirReconcilerServiceTag } from "../DirReconcilerService"
import { FileReconcilerServiceTag } from "../FileReconcilerService"

export interface SyncCycleService {
  /**
   * One full pass: directories first, then files, each from a fresh listing
   * of both trees. Nothing survives the call except the replica and the log.
   */
  readonly run: () => Effect.Effect<CycleReport, TreeListError>
}

export class SyncCycleServiceTag extends Context.Tag("SyncCycleService")<
  SyncCycleServiceTag,
  SyncCycleService
>() {}

export const SyncCycleServiceLive = Layer.effect(
  SyncCycleServiceTag,
  Effect.gen(function* () {
    const { source, replica } = yield* SyncConfigTag
    const lister = yield* TreeListerServiceTag
    const dirReconciler = yield* DirReconcilerServiceTag
    const fileReconciler = yield* FileReconcilerServiceTag

    const run = () =>
      Effect.gen(function* () {
        const sourceDirs = yield* lister.listDirs(source)
        const replicaDirs = yield* lister.listDirs(replica)
        const directories = yield* dirReconciler.reconcile(source, replica, sourceDirs, replicaDirs)

        const sourceFiles = yield* lister.listFiles(source)
        const replicaFiles = yield* lister.listFiles(replica)
        const files = yield* fileReconciler.reconcile(source, replica, sourceFiles, replicaFiles)

        return { directories, files } satisfies CycleReport
      }).pipe(Effect.withLogSpan("sync-cycle"))

    return { run }
  })
)
