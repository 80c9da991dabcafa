export {
  DirReconcilerServiceTag,
  DirReconcilerServiceLive,
  DirectoryCreateFailed,
  DirectoryRemoveFailed,
  DirectoryBlocked,
} from "./DirReconcilerService"
export type { DirReconcilerService, DirReconcileError } from "./DirReconcilerService"
