export {
  CopyServiceTag,
  RsyncCopyService,
  FileSystemCopyService,
  CopyBackendUnavailable,
  CopyFailed,
  buildRsyncArgs
} from "./CopyService";
export type { CopyService, CopyError } from "./CopyService";
