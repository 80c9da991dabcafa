/**
 * Replica Sync CLI
 *
 * Keeps a replica directory identical to a source directory by rescanning
 * both trees on a fixed interval. Every change to the replica is appended to
 * a log file and echoed to the console.
 *
 * Example:
 *   $ npm start -- ./source ./replica ./sync.log 30
 *   $ npm start -- ./source ./replica ./sync.log 0 --once
 */

import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Logger, LogLevel } from "effect"

import * as Opts from "./cli/options"
import { runSync, withErrorHandling } from "./cli/handler"

const syncCommand = Command.make(
  "replica-sync",
  {
    source: Opts.source,
    replica: Opts.replica,
    logFile: Opts.logFile,
    interval: Opts.interval,
    once: Opts.once,
    debug: Opts.debug,
  },
  (opts) =>
    withErrorHandling(runSync(opts)).pipe(
      Logger.withMinimumLogLevel(opts.debug ? LogLevel.Debug : LogLevel.Info)
    )
).pipe(Command.withDescription("Mirror a source directory into a replica, one way, on a fixed interval"))

const cli = Command.run(syncCommand, {
  name: "replica-sync",
  version: "0.1.0",
})

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
