export {
  DiskResourceServiceTag,
  DiskResourceServiceLive,
  DiskId,
  ResourceError
} from "./DiskResourceService";
export type { DiskResourceService, Lease } from "./DiskResourceService";
