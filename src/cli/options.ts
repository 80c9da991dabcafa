import { Args, Options } from "@effect/cli"

export const source = Args.text({ name: "source" }).pipe(
  Args.withDescription("Directory to mirror from")
)

export const replica = Args.text({ name: "replica" }).pipe(
  Args.withDescription("Directory kept identical to the source")
)

export const logFile = Args.text({ name: "log-file" }).pipe(
  Args.withDescription("Existing file that change entries are appended to")
)

export const interval = Args.text({ name: "interval" }).pipe(
  Args.withDescription("Whole seconds to wait between the end of one cycle and the next")
)

export const once = Options.boolean("once").pipe(
  Options.withDescription("Run a single cycle and exit"),
  Options.withDefault(false)
)

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
)

export interface SyncOptions {
  readonly source: string
  readonly replica: string
  readonly logFile: string
  readonly interval: string
  readonly once: boolean
  readonly debug?: boolean
}
