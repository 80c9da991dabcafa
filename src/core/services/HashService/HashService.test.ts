import { afterAll, beforeAll, describe, expect, test } from "vitest"
import { Effect, Layer, pipe } from "effect"
import { NodeContext } from "@effect/platform-node"
import { createHash } from "node:crypto"
import { chmod, mkdtemp, rm, utimes, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { HashServiceTag, HashServiceLive } from "./HashService"

const TestHashService = pipe(HashServiceLive, Layer.provide(NodeContext.layer))

const digestOf = (path: string) =>
  pipe(
    HashServiceTag,
    Effect.flatMap((svc) => svc.digest(path)),
    Effect.provide(TestHashService),
    Effect.either,
    Effect.runPromise
  )

let testDir: string

beforeAll(async () => {
  testDir = await mkdtemp(join(tmpdir(), "hash-test-"))
})

afterAll(async () => {
  await rm(testDir, { recursive: true, force: true })
})

describe("HashService", () => {
  test("digest is the SHA-256 of the content", async () => {
    const file = join(testDir, "v1.txt")
    await writeFile(file, "v1")

    const result = await digestOf(file)

    expect(result._tag).toBe("Right")
    if (result._tag === "Right") {
      expect(result.right).toBe(createHash("sha256").update("v1").digest("hex"))
    }
  })

  test("empty file hashes to the empty digest", async () => {
    const file = join(testDir, "empty.txt")
    await writeFile(file, "")

    const result = await digestOf(file)

    expect(result._tag).toBe("Right")
    if (result._tag === "Right") {
      expect(result.right).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855")
    }
  })

  test("files larger than one chunk hash the same as a one-shot digest", async () => {
    const file = join(testDir, "large.bin")
    const content = Buffer.alloc(64 * 1024 * 3 + 17, 7)
    await writeFile(file, content)

    const result = await digestOf(file)

    expect(result._tag).toBe("Right")
    if (result._tag === "Right") {
      expect(result.right).toBe(createHash("sha256").update(content).digest("hex"))
    }
  })

  test("equal content with different timestamps and modes gives equal digests", async () => {
    const a = join(testDir, "same-a.txt")
    const b = join(testDir, "same-b.txt")
    await writeFile(a, "identical bytes")
    await writeFile(b, "identical bytes")
    await utimes(b, new Date(2001, 0, 1), new Date(2001, 0, 1))
    await chmod(b, 0o600)

    const [left, right] = await Promise.all([digestOf(a), digestOf(b)])

    expect(left._tag).toBe("Right")
    expect(right._tag).toBe("Right")
    if (left._tag === "Right" && right._tag === "Right") {
      expect(left.right).toBe(right.right)
    }
  })

  test("missing file fails with HashSourceNotFound", async () => {
    const missing = join(testDir, "missing.txt")

    const result = await digestOf(missing)

    expect(result._tag).toBe("Left")
    if (result._tag === "Left") {
      expect(result.left._tag).toBe("HashSourceNotFound")
      expect(result.left.path).toBe(missing)
    }
  })
})
