export { ChecksumServiceTag, ChecksumServiceLive, ChecksumError, listFiles } from "./ChecksumService";
export type { ChecksumService, HashRequest, HashOutcome, VerifyRequest } from "./ChecksumService";
export {
  CHECKSUM_FILE_NAME,
  checksumFileName,
  formatChecksumFile,
  parseChecksumFile
} from "./checksumFile";
export type { ChecksumEntry, ChecksumFormat } from "./checksumFile";
