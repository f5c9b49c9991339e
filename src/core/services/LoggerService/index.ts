export {
  LoggerServiceTag,
  LoggerServiceLive,
  formatReport,
  formatSourceStatus,
  sourceFields,
  targetFields
} from "./LoggerService";
export type { LoggerService } from "./LoggerService";
