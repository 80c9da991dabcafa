import { Context } from "effect"

export interface SyncConfig {
  /** Absolute path of the tree being mirrored. */
  readonly source: string
  /** Absolute path of the mirror, written only by this process. */
  readonly replica: string
  readonly logFile: string
  readonly intervalSeconds: number
}

export class SyncConfigTag extends Context.Tag("SyncConfig")<SyncConfigTag, SyncConfig>() {}
