/**
 * Classifies failures coming out of node:fs and @effect/platform so that each
 * service can turn them into its own tagged errors.
 */

export type IoErrorKind = "NotFound" | "PermissionDenied" | "Other"

const codeOf = (error: unknown): string | undefined =>
  typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
    ? error.code.toUpperCase()
    : undefined

const platformReasonOf = (error: unknown): string | undefined =>
  typeof error === "object" &&
  error !== null &&
  "_tag" in error &&
  error._tag === "SystemError" &&
  "reason" in error &&
  typeof error.reason === "string"
    ? error.reason
    : undefined

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message
  }
  return String(error)
}

export const classifyIoError = (error: unknown): IoErrorKind => {
  const reason = platformReasonOf(error)
  if (reason === "NotFound") return "NotFound"
  if (reason === "PermissionDenied") return "PermissionDenied"

  const code = codeOf(error)
  if (code === "ENOENT" || code === "ENOTDIR") return "NotFound"
  if (code === "EACCES" || code === "EPERM") return "PermissionDenied"

  const message = describeError(error).toLowerCase()
  if (message.includes("enoent") || message.includes("no such file")) return "NotFound"
  if (message.includes("eacces") || message.includes("eperm") || message.includes("permission denied")) {
    return "PermissionDenied"
  }

  return "Other"
}
