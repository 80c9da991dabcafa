/**
 * HashService - SHA-256 content digests.
 *
 * Files are streamed in fixed 64 KiB chunks, so memory use does not grow with
 * file size. Nothing is cached: every call reads the file again.
 */

import { Context, Data, Effect, Layer, Stream, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { createHash } from "node:crypto"
import { classifyIoError, describeError } from "../../lib/ioError"

const HASH_CHUNK_SIZE = FileSystem.KiB(64)

/** Lowercase hex SHA-256. */
export type ContentDigest = string

// =============================================================================
// Errors
// =============================================================================

export class HashSourceNotFound extends Data.TaggedError("HashSourceNotFound")<{
  readonly path: string
}> {}

export class HashPermissionDenied extends Data.TaggedError("HashPermissionDenied")<{
  readonly path: string
}> {}

export class HashReadFailed extends Data.TaggedError("HashReadFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type HashError = HashSourceNotFound | HashPermissionDenied | HashReadFailed

// =============================================================================
// Service interface
// =============================================================================

export interface HashService {
  readonly digest: (path: string) => Effect.Effect<ContentDigest, HashError>
}

export class HashServiceTag extends Context.Tag("HashService")<HashServiceTag, HashService>() {}

const toHashError = (path: string, error: unknown): HashError => {
  switch (classifyIoError(error)) {
    case "NotFound":
      return new HashSourceNotFound({ path })
    case "PermissionDenied":
      return new HashPermissionDenied({ path })
    case "Other":
      return new HashReadFailed({ path, reason: describeError(error) })
  }
}

// =============================================================================
// Live implementation (streams through @effect/platform FileSystem)
// =============================================================================

export const HashServiceLive = Layer.effect(
  HashServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem

    const digest: HashService["digest"] = (path) =>
      Effect.suspend(() => {
        const hash = createHash("sha256")
        return pipe(
          fs.stream(path, { chunkSize: HASH_CHUNK_SIZE }),
          Stream.runForEach((chunk) => Effect.sync(() => hash.update(chunk))),
          Effect.map(() => hash.digest("hex")),
          Effect.mapError((error) => toHashError(path, error))
        )
      })

    return { digest }
  })
)
