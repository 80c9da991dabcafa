import { describe, expect, test } from "vitest"
import { Duration, Effect, Fiber, Layer, TestClock, TestContext } from "effect"
import { runCycle, syncLoop } from "./handler"
import {
  LoggerServiceTag,
  SyncConfigTag,
  SyncCycleServiceTag,
  SyncLogServiceTag,
  type CycleReport,
} from "@core"
import { emptyReport } from "@domain/ReconcileReport"
import { ListRootNotFound } from "@services/TreeListerService"

const changed: CycleReport = { directories: emptyReport, files: { ...emptyReport, created: 2 } }

/** `outcomes[n]` is the result of the (n+1)th cycle; later cycles reuse the last one. */
const setup = (outcomes: ReadonlyArray<Effect.Effect<CycleReport, ListRootNotFound>>) => {
  const calls: string[] = []
  let runs = 0

  const layer = Layer.mergeAll(
    Layer.succeed(SyncConfigTag, {
      source: "/data/source",
      replica: "/data/replica",
      logFile: "/data/sync.log",
      intervalSeconds: 10,
    }),
    Layer.succeed(SyncCycleServiceTag, {
      run: () =>
        Effect.suspend(() => {
          runs += 1
          return outcomes[Math.min(runs, outcomes.length) - 1] ?? Effect.succeed(changed)
        }),
    }),
    Layer.succeed(LoggerServiceTag, {
      sync: {
        header: (_config, once) => Effect.sync(() => void calls.push(once ? "header once" : "header")),
        cycleSummary: (cycle, report) =>
          Effect.sync(() => void calls.push(`summary ${cycle} created=${report.files.created}`)),
        cycleFailed: (cycle) => Effect.sync(() => void calls.push(`failed ${cycle}`)),
        stopped: Effect.sync(() => void calls.push("stopped")),
      },
    }),
    Layer.succeed(SyncLogServiceTag, {
      emit: () => Effect.void,
      failure: (path, reason) => Effect.sync(() => void calls.push(`log ${path}: ${reason}`)),
    })
  )

  return { calls, layer, runs: () => runs }
}

const missingRoot = Effect.fail(new ListRootNotFound({ path: "/data/source" }))

describe("runCycle", () => {
  test("prints the summary of a finished cycle", async () => {
    const { calls, layer } = setup([Effect.succeed(changed)])

    await Effect.runPromise(Effect.provide(runCycle(3), layer))

    expect(calls).toEqual(["summary 3 created=2"])
  })

  test("reports an aborted cycle on the console and in the log without failing", async () => {
    const { calls, layer } = setup([missingRoot])

    await Effect.runPromise(Effect.provide(runCycle(7), layer))

    expect(calls).toEqual([
      "failed 7",
      'log /data/source: The directory "/data/source" no longer exists.',
    ])
  })
})

describe("syncLoop", () => {
  test("runs one cycle per interval, survives an aborted cycle and stops on interrupt", async () => {
    const { calls, layer, runs } = setup([missingRoot, Effect.succeed(changed)])

    const program = Effect.gen(function* () {
      const loop = yield* Effect.fork(syncLoop(false))

      yield* TestClock.adjust(Duration.seconds(5))
      calls.push(`after 5s: ${runs()} cycles`)

      yield* TestClock.adjust(Duration.seconds(15))
      calls.push(`after 20s: ${runs()} cycles`)

      yield* Fiber.interrupt(loop)
    })

    await Effect.runPromise(program.pipe(Effect.provide(layer), Effect.provide(TestContext.TestContext)))

    expect(calls).toEqual([
      "header",
      "failed 1",
      'log /data/source: The directory "/data/source" no longer exists.',
      "after 5s: 1 cycles",
      "summary 2 created=2",
      "summary 3 created=2",
      "after 20s: 3 cycles",
      "stopped",
    ])
  })

  test("runs exactly one cycle when asked to run once", async () => {
    const { calls, layer, runs } = setup([Effect.succeed(changed)])

    await Effect.runPromise(syncLoop(true).pipe(Effect.provide(layer), Effect.provide(TestContext.TestContext)))

    expect(calls).toEqual(["header once", "summary 1 created=2"])
    expect(runs()).toBe(1)
  })
})
