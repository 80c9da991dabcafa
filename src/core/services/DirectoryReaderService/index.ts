export {
  DirectoryReaderServiceTag,
  DirectoryReaderServiceLive,
  DirectoryNotFound,
  DirectoryPermissionDenied,
  DirectoryReadFailed,
} from "./DirectoryReaderService"
export type {
  DirectoryReaderService,
  DirectoryReadError,
  DirEntry,
} from "./DirectoryReaderService"
