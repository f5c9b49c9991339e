export {
  OperationSchedulerTag,
  OperationSchedulerLive,
  SchedulerSignal,
  StageOutcome,
  RunProgress,
  makeSchedulerControl,
  requestStop
} from "./OperationScheduler";
export type { OperationScheduler, SchedulerControl, RunOptions, RunError } from "./OperationScheduler";
