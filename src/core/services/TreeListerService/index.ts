export {
  TreeListerServiceTag,
  TreeListerServiceLive,
  ListRootNotFound,
  ListPermissionDenied,
  ListFailed,
} from "./TreeListerService"
export type { TreeListerService, TreeListError } from "./TreeListerService"
