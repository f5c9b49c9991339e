export {
  StageExecutorTag,
  StageExecutorLive,
  HashFailed,
  TransferFailed,
  VerifyFailed,
  describeVerifyProblems
} from "./StageExecutor";
export type { StageExecutor, PipelineError, HashProduct } from "./StageExecutor";
