export {
  DeviceServiceTag,
  DeviceServiceLive,
  DeviceNotFound,
  DevicePermissionDenied,
  DeviceUnknownError
} from "./DeviceService";
export type { DeviceService, DeviceError } from "./DeviceService";
