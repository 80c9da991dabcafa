import { afterAll, beforeAll, describe, expect, test } from "vitest"
import { Effect, Either } from "effect"
import { NodeContext } from "@effect/platform-node"
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import path, { join } from "node:path"
import { parseInterval, parseSyncOptions, type ConfigError } from "./optionParsing"
import type { SyncOptions } from "./options"

describe("parseInterval", () => {
  test.each([
    ["0", 0],
    ["5", 5],
    ["3600", 3600],
  ])("accepts %s", (value, expected) => {
    expect(Effect.runSync(parseInterval(value))).toBe(expected)
  })

  test.each(["", "-1", "1.5", " 5", "5s", "abc", "99999999999999999999"])("rejects %j", (value) => {
    const result = Effect.runSync(Effect.either(parseInterval(value)))

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("ConfigInvalidInterval")
      expect(result.left.value).toBe(value)
    }
  })
})

describe("parseSyncOptions", () => {
  let root: string
  let source: string
  let replica: string
  let logFile: string

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), "replica-sync-options-"))
    source = join(root, "source")
    replica = join(root, "replica")
    logFile = join(root, "sync.log")
    await mkdir(source)
    await mkdir(replica)
    await writeFile(logFile, "")
  })

  afterAll(async () => {
    await rm(root, { recursive: true, force: true })
  })

  const options = (overrides: Partial<SyncOptions> = {}): SyncOptions => ({
    source,
    replica,
    logFile,
    interval: "10",
    once: false,
    ...overrides,
  })

  const parse = (input: SyncOptions) =>
    Effect.runPromise(parseSyncOptions(input).pipe(Effect.either, Effect.provide(NodeContext.layer)))

  const expectError = async (input: SyncOptions): Promise<ConfigError | undefined> => {
    const result = await parse(input)
    expect(Either.isLeft(result)).toBe(true)
    return Either.isLeft(result) ? result.left : undefined
  }

  test("returns absolute paths and the interval in seconds", async () => {
    const result = await parse(options({ source: path.relative(process.cwd(), source) }))

    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      expect(result.right).toEqual({ source, replica, logFile, intervalSeconds: 10 })
    }
  })

  test("rejects a missing source", async () => {
    const missing = join(root, "nope")
    const error = await expectError(options({ source: missing }))

    expect(error?._tag).toBe("ConfigPathNotFound")
    if (error?._tag === "ConfigPathNotFound") {
      expect(error.label).toBe("source")
      expect(error.path).toBe(missing)
    }
  })

  test("rejects a replica that is a file", async () => {
    const error = await expectError(options({ replica: logFile }))

    expect(error?._tag).toBe("ConfigNotADirectory")
    if (error?._tag === "ConfigNotADirectory") {
      expect(error.label).toBe("replica")
    }
  })

  test("rejects a log file that is a directory", async () => {
    const error = await expectError(options({ logFile: replica }))

    expect(error?._tag).toBe("ConfigNotAFile")
    if (error?._tag === "ConfigNotAFile") {
      expect(error.label).toBe("log file")
    }
  })

  test("rejects a log file that does not exist", async () => {
    const error = await expectError(options({ logFile: join(root, "missing.log") }))

    expect(error?._tag).toBe("ConfigPathNotFound")
  })

  test("checks the interval after the paths", async () => {
    const error = await expectError(options({ interval: "-3" }))

    expect(error).toEqual(expect.objectContaining({ _tag: "ConfigInvalidInterval", value: "-3" }))
  })
})
