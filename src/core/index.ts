import { Layer, pipe } from "effect"
import { NodeContext } from "@effect/platform-node"

import { SyncConfigTag, type SyncConfig } from "./domain/SyncConfig"
import { DirectoryReaderServiceLive } from "./services/DirectoryReaderService"
import { FileStatServiceLive } from "./services/FileStatService"
import { HashServiceLive } from "./services/HashService"
import { TreeListerServiceLive } from "./services/TreeListerService"
import { SyncLogServiceLive } from "./services/SyncLogService"
import { DirReconcilerServiceLive } from "./services/DirReconcilerService"
import { FileReconcilerServiceLive } from "./services/FileReconcilerService"
import { SyncCycleServiceLive } from "./services/SyncCycleService"
import { LoggerServiceLive } from "./services/LoggerService"

export type { SyncConfig } from "./domain/SyncConfig"
export type { RelativePath, DirectorySet, FileSet } from "./domain/RelativePath"
export type { SyncAction } from "./domain/SyncEvent"
export type { CycleReport, ReconcileReport, EntryOutcome } from "./domain/ReconcileReport"
export type { ContentDigest } from "./services/HashService"

export type {
  ListRootNotFound,
  ListPermissionDenied,
  ListFailed,
  TreeListError,
} from "./services/TreeListerService"

export { SyncConfigTag } from "./domain/SyncConfig"
export { SyncCycleServiceTag } from "./services/SyncCycleService"
export { SyncLogServiceTag } from "./services/SyncLogService"
export { LoggerServiceTag } from "./services/LoggerService"

/**
 * Wires every service for one source/replica pair on the Node platform.
 */
export const createAppLayer = (config: SyncConfig) => {
  const base = Layer.mergeAll(Layer.succeed(SyncConfigTag, config), FileStatServiceLive, NodeContext.layer)
  const logging = pipe(SyncLogServiceLive, Layer.provideMerge(base))

  const reconcilers = Layer.mergeAll(
    pipe(TreeListerServiceLive, Layer.provide(DirectoryReaderServiceLive)),
    DirReconcilerServiceLive,
    pipe(FileReconcilerServiceLive, Layer.provide(HashServiceLive))
  )

  return pipe(
    Layer.mergeAll(pipe(SyncCycleServiceLive, Layer.provide(reconcilers)), LoggerServiceLive),
    Layer.provideMerge(logging)
  )
}
