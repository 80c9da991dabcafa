export { SyncCycleServiceTag, SyncCycleServiceLive } from "./SyncCycleService"
export type { SyncCycleService } from "./SyncCycleService"
