/**
 * DirectoryReaderService - lists the immediate children of one directory.
 *
 * Entries are classified from the directory entry itself, so symbolic links
 * are reported as links and never followed.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import { readdir } from "node:fs/promises"
import type { Dirent } from "node:fs"
import { classifyIoError, describeError } from "../../lib/ioError"

// =============================================================================
// Errors
// =============================================================================

export class DirectoryNotFound extends Data.TaggedError("DirectoryNotFound")<{
  readonly path: string
}> {}

export class DirectoryPermissionDenied extends Data.TaggedError("DirectoryPermissionDenied")<{
  readonly path: string
}> {}

export class DirectoryReadFailed extends Data.TaggedError("DirectoryReadFailed")<{
  readonly path: string
  readonly cause: string
}> {}

export type DirectoryReadError = DirectoryNotFound | DirectoryPermissionDenied | DirectoryReadFailed

// =============================================================================
// Service interface
// =============================================================================

export type DirEntryKind = "file" | "directory" | "symlink" | "other"

export interface DirEntry {
  readonly name: string
  readonly kind: DirEntryKind
}

export interface DirectoryReaderService {
  /** Children of `path`, sorted by name. */
  readonly read: (path: string) => Effect.Effect<DirEntry[], DirectoryReadError>
}

export class DirectoryReaderServiceTag extends Context.Tag("DirectoryReaderService")<
  DirectoryReaderServiceTag,
  DirectoryReaderService
>() {}

// =============================================================================
// Live implementation (node:fs readdir with file types)
// =============================================================================

const toDirectoryReadError = (path: string, error: unknown): DirectoryReadError => {
  switch (classifyIoError(error)) {
    case "NotFound":
      return new DirectoryNotFound({ path })
    case "PermissionDenied":
      return new DirectoryPermissionDenied({ path })
    case "Other":
      return new DirectoryReadFailed({ path, cause: describeError(error) })
  }
}

const kindOf = (entry: Dirent): DirEntryKind => {
  if (entry.isSymbolicLink()) return "symlink"
  if (entry.isDirectory()) return "directory"
  if (entry.isFile()) return "file"
  return "other"
}

export const DirectoryReaderServiceLive = Layer.succeed(DirectoryReaderServiceTag, {
  read: (path) =>
    pipe(
      Effect.tryPromise({
        try: () => readdir(path, { withFileTypes: true }),
        catch: (error) => toDirectoryReadError(path, error),
      }),
      Effect.map((entries) =>
        entries
          .map((entry) => ({ name: entry.name, kind: kindOf(entry) }))
          .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      )
    ),
})
