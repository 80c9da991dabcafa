export type SyncAction = "CREATED" | "MODIFIED" | "REMOVED"

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"]

const pad = (value: number): string => String(value).padStart(2, "0")

/** Local time as `DD/Mon/YYYY HH:MM:SS`. */
export const formatTimestamp = (at: Date): string =>
  `${pad(at.getDate())}/${MONTHS[at.getMonth()]}/${at.getFullYear()} ` +
  `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}`

export const formatLogLine = (at: Date, action: SyncAction, absolutePath: string): string =>
  `${formatTimestamp(at)} [ ${action} ] ${absolutePath}`

export const formatFailureLine = (at: Date, absolutePath: string, reason: string): string =>
  `${formatTimestamp(at)} [ FAILED ] ${absolutePath}: ${reason}`
