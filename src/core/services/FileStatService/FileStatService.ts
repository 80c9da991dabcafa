/**
 * FileStatService - wraps lstat for testability.
 *
 * Reconcilers use it to re-check an entry right before mutating it. A path
 * that does not exist (or whose parent is no longer a directory) is reported
 * as "missing" rather than as a failure.
 */

import { Context, Data, Effect, Layer } from "effect"
import { lstat } from "node:fs/promises"
import { classifyIoError, describeError } from "../../lib/ioError"

// =============================================================================
// Typed errors
// =============================================================================

export class FilePermissionDenied extends Data.TaggedError("FilePermissionDenied")<{
  readonly path: string
}> {}

export class FileStatUnknownError extends Data.TaggedError("FileStatUnknownError")<{
  readonly path: string
  readonly cause: string
}> {}

export type FileStatError = FilePermissionDenied | FileStatUnknownError

// =============================================================================
// Service interface
// =============================================================================

export type EntryKind = "file" | "directory" | "symlink" | "other" | "missing"

export interface FileStatService {
  readonly kind: (path: string) => Effect.Effect<EntryKind, FileStatError>
}

export class FileStatServiceTag extends Context.Tag("FileStatService")<
  FileStatServiceTag,
  FileStatService
>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const FileStatServiceLive = Layer.succeed(FileStatServiceTag, {
  kind: (path) =>
    Effect.tryPromise({
      try: async (): Promise<EntryKind> => {
        const stats = await lstat(path)
        if (stats.isSymbolicLink()) return "symlink"
        if (stats.isDirectory()) return "directory"
        if (stats.isFile()) return "file"
        return "other"
      },
      catch: (error) => error,
    }).pipe(
      Effect.catchAll((error): Effect.Effect<EntryKind, FileStatError> => {
        switch (classifyIoError(error)) {
          case "NotFound":
            return Effect.succeed<EntryKind>("missing")
          case "PermissionDenied":
            return Effect.fail(new FilePermissionDenied({ path }))
          case "Other":
            return Effect.fail(new FileStatUnknownError({ path, cause: describeError(error) }))
        }
      })
    ),
})
