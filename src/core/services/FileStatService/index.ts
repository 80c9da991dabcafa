export {
  FileStatServiceTag,
  FileStatServiceLive,
  FilePermissionDenied,
  FileStatUnknownError,
} from "./FileStatService"
export type { FileStatService, FileStatError, EntryKind } from "./FileStatService"
