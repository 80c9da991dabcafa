export {
  HashServiceTag,
  HashServiceLive,
  HashSourceNotFound,
  HashPermissionDenied,
  HashReadFailed,
} from "./HashService"
export type { HashService, HashError, ContentDigest } from "./HashService"
