export { SyncLogServiceTag, SyncLogServiceLive } from "./SyncLogService"
export type { SyncLogService } from "./SyncLogService"
