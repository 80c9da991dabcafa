export type EntryOutcome = "created" | "modified" | "removed" | "unchanged" | "skipped" | "failed"

export interface ReconcileReport {
  readonly created: number
  readonly modified: number
  readonly removed: number
  readonly unchanged: number
  readonly skipped: number
  readonly failed: number
}

export interface CycleReport {
  readonly directories: ReconcileReport
  readonly files: ReconcileReport
}

export const emptyReport: ReconcileReport = {
  created: 0,
  modified: 0,
  removed: 0,
  unchanged: 0,
  skipped: 0,
  failed: 0,
}

/** `undefined` marks an entry a pass looked at but had no business with. */
export const tally = (outcomes: ReadonlyArray<EntryOutcome | undefined>): ReconcileReport =>
  outcomes.reduce<ReconcileReport>(
    (report, outcome) => (outcome === undefined ? report : { ...report, [outcome]: report[outcome] + 1 }),
    emptyReport
  )

export const mergeReports = (a: ReconcileReport, b: ReconcileReport): ReconcileReport => ({
  created: a.created + b.created,
  modified: a.modified + b.modified,
  removed: a.removed + b.removed,
  unchanged: a.unchanged + b.unchanged,
  skipped: a.skipped + b.skipped,
  failed: a.failed + b.failed,
})

export const changeCount = (report: ReconcileReport): number =>
  report.created + report.modified + report.removed

export const cycleTotals = (cycle: CycleReport): ReconcileReport =>
  mergeReports(cycle.directories, cycle.files)
