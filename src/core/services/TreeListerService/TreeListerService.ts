import { Context, Data, Effect, Layer, Match, pipe } from "effect"
import path from "node:path"
import { DirectoryReaderServiceTag, type DirEntry, type DirectoryReadError } from "../DirectoryReaderService"
import { SyncLogServiceTag } from "../SyncLogService"
import { toRelativePath, type DirectorySet, type FileSet } from "@domain/RelativePath"

export class ListRootNotFound extends Data.TaggedError("ListRootNotFound")<{
  readonly path: string
}> {}

export class ListPermissionDenied extends Data.TaggedError("ListPermissionDenied")<{
  readonly path: string
}> {}

export class ListFailed extends Data.TaggedError("ListFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type TreeListError = ListRootNotFound | ListPermissionDenied | ListFailed

const fromDirectoryReadError = Match.typeTags<DirectoryReadError>()({
  DirectoryNotFound: (e) => new ListRootNotFound({ path: e.path }),
  DirectoryPermissionDenied: (e) => new ListPermissionDenied({ path: e.path }),
  DirectoryReadFailed: (e) => new ListFailed({ path: e.path, reason: e.cause }),
})

interface TreeListing {
  readonly dirs: DirectorySet
  readonly files: FileSet
}

export interface TreeListerService {
  /** Every directory under `root`, parents before children. */
  readonly listDirs: (root: string) => Effect.Effect<DirectorySet, TreeListError>
  /** Every regular file under `root`. */
  readonly listFiles: (root: string) => Effect.Effect<FileSet, TreeListError>
}

export class TreeListerServiceTag extends Context.Tag("TreeListerService")<
  TreeListerServiceTag,
  TreeListerService
>() {}

/**
 * Breadth-first walk with an explicit queue. Symbolic links and special files
 * are left out of both lists. Relative paths are always taken against `root`
 * as given, never against the directory currently being read.
 */
export const TreeListerServiceLive = Layer.effect(
  TreeListerServiceTag,
  Effect.gen(function* () {
    const reader = yield* DirectoryReaderServiceTag
    const log = yield* SyncLogServiceTag

    const readRoot = (root: string) => pipe(reader.read(root), Effect.mapError(fromDirectoryReadError))

    // Below the root, a vanished directory is passed over and an unreadable one
    // is left out of the listing; neither stops the rest of the walk. A cycle
    // lists directories before files, so only the directory walk records the
    // unreadable one as a failure.
    const readNested = (dir: string, recordFailures: boolean) => {
      const unreadable = (reason: string) =>
        pipe(
          recordFailures
            ? log.failure(dir, reason)
            : Effect.logDebug(`Skipping unreadable directory ${dir}: ${reason}`),
          Effect.as<ReadonlyArray<DirEntry>>([])
        )

      return pipe(
        reader.read(dir),
        Effect.catchTags({
          DirectoryNotFound: () =>
            pipe(
              Effect.logDebug(`Directory vanished during listing: ${dir}`),
              Effect.as<ReadonlyArray<DirEntry>>([])
            ),
          DirectoryPermissionDenied: () => unreadable("permission denied"),
          DirectoryReadFailed: (e) => unreadable(e.cause),
        })
      )
    }

    const walk = (root: string, recordFailures: boolean): Effect.Effect<TreeListing, TreeListError> =>
      Effect.gen(function* () {
        const dirs: string[] = []
        const files: string[] = []
        const queue: string[] = [root]

        for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
          const entries = next === root ? yield* readRoot(root) : yield* readNested(next, recordFailures)

          for (const entry of entries) {
            const absolutePath = path.join(next, entry.name)
            if (entry.kind === "directory") {
              dirs.push(toRelativePath(root, absolutePath))
              queue.push(absolutePath)
            } else if (entry.kind === "file") {
              files.push(toRelativePath(root, absolutePath))
            }
          }
        }

        yield* Effect.logDebug(`Listed ${root}: ${dirs.length} directories, ${files.length} files`)
        return { dirs, files }
      })

    return {
      listDirs: (root) => Effect.map(walk(root, true), (listing) => listing.dirs),
      listFiles: (root) => Effect.map(walk(root, false), (listing) => listing.files),
    }
  })
)
