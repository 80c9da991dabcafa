import { Match } from "effect"

import type { ConfigError } from "./optionParsing"
import type { TreeListError } from "@services/TreeListerService"

type DomainError = ConfigError | TreeListError

export class AppError extends Error {
  readonly _tag = "AppError"

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`)
  }

  format(): string {
    return [`ERROR: ${this.title}`, ``, `   ${this.detail}`, ``, `   Hint: ${this.suggestion}`].join("\n")
  }
}

const errors = {
  pathNotFound: (label: string, path: string) =>
    new AppError(
      "Path not found",
      `The ${label} path "${path}" does not exist.`,
      `Create it first or check for typos. All three paths must exist before syncing starts.`
    ),

  notADirectory: (label: string, path: string) =>
    new AppError(
      "Not a directory",
      `The ${label} path "${path}" exists but is not a directory.`,
      `Source and replica must both be directories.`
    ),

  notAFile: (label: string, path: string) =>
    new AppError(
      "Not a file",
      `The ${label} path "${path}" is a directory.`,
      `Point the log file argument at a file; entries are appended to it.`
    ),

  pathUnreadable: (label: string, path: string, reason: string) =>
    new AppError(
      "Cannot inspect path",
      `Could not read the ${label} path "${path}": ${reason}`,
      `Check that you have permission to access this path.`
    ),

  invalidInterval: (value: string) =>
    new AppError(
      "Invalid interval",
      `"${value}" is not a whole number of seconds.`,
      `Pass the interval as a non-negative integer, e.g. 30.`
    ),

  rootNotFound: (path: string) =>
    new AppError(
      "Tree root missing",
      `The directory "${path}" no longer exists.`,
      `Restore the directory; syncing resumes on the next cycle.`
    ),

  listPermissionDenied: (path: string) =>
    new AppError(
      "Permission denied during scan",
      `Cannot read directory "${path}": permission denied.`,
      `Check directory permissions or run with elevated privileges.`
    ),

  listFailed: (path: string, reason: string) =>
    new AppError(
      "Scan failed",
      `Could not list "${path}": ${reason}`,
      `Check that the path is readable and the disk is healthy.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have the required permissions. You may need to run with elevated privileges.`
    ),
}

const matchDomainError = Match.typeTags<DomainError>()({
  ConfigPathNotFound: (e) => errors.pathNotFound(e.label, e.path),
  ConfigNotADirectory: (e) => errors.notADirectory(e.label, e.path),
  ConfigNotAFile: (e) => errors.notAFile(e.label, e.path),
  ConfigPathUnreadable: (e) => errors.pathUnreadable(e.label, e.path, e.reason),
  ConfigInvalidInterval: (e) => errors.invalidInterval(e.value),

  ListRootNotFound: (e) => errors.rootNotFound(e.path),
  ListPermissionDenied: (e) => errors.listPermissionDenied(e.path),
  ListFailed: (e) => errors.listFailed(e.path, e.reason),
})

const DOMAIN_TAGS: ReadonlySet<string> = new Set([
  "ConfigPathNotFound",
  "ConfigNotADirectory",
  "ConfigNotAFile",
  "ConfigPathUnreadable",
  "ConfigInvalidInterval",
  "ListRootNotFound",
  "ListPermissionDenied",
  "ListFailed",
])

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" && e !== null && "_tag" in e && typeof e._tag === "string" && DOMAIN_TAGS.has(e._tag)

const isPermissionError = (message: string): boolean =>
  message.toLowerCase().includes("permission denied") ||
  message.toLowerCase().includes("eacces") ||
  message.toLowerCase().includes("operation not permitted") ||
  message.toLowerCase().includes("eperm")

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error
  }

  if (isDomainError(error)) {
    return matchDomainError(error)
  }

  if (error instanceof Error) {
    return isPermissionError(error.message)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message)
  }

  return errors.unexpected(String(error))
}

export const {
  pathNotFound,
  notADirectory,
  notAFile,
  invalidInterval,
  rootNotFound,
} = errors
