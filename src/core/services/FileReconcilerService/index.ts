export {
  FileReconcilerServiceTag,
  FileReconcilerServiceLive,
  FileCopyFailed,
  FileRemoveFailed,
  FileBlocked,
} from "./FileReconcilerService"
export type { FileReconcilerService, FileReconcileError } from "./FileReconcilerService"
