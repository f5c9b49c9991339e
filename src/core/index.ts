import { Layer, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";

import { RunConfigTag, type CopierKind, type RunConfig } from "./config";
import { ChecksumServiceLive } from "./services/Checksum";
import { CopyServiceTag, FileSystemCopyService, RsyncCopyService } from "./services/Copy";
import { DeviceServiceLive } from "./services/DeviceService";
import { DiskResourceServiceLive } from "./services/DiskResource";
import { InteractiveSessionLive } from "./services/InteractiveSession";
import { LoggerServiceLive } from "./services/LoggerService";
import { OperationSchedulerLive } from "./services/Scheduler";
import { ShellServiceLive } from "./services/ShellService";
import { StageExecutorLive } from "./services/StageExecutor";
import { JsonStateStorageService } from "./services/StateStorage";
import { StateStoreLive } from "./services/StateStore";

export { DEFAULT_STATE_FILE, RunConfigTag, makeRunConfig } from "./config";
export type { CopierKind, RunConfig } from "./config";

export type { Source, NewSource, SourcePatch, SourceStatus } from "./domain/Source";
export type { Target, NewTarget, TargetPatch, TargetStatus, VerifyResult } from "./domain/Target";
export type { BackupState } from "./domain/BackupState";
export type { Operation, OperationKind, OperationStatus } from "./domain/Operation";
export { RunScope } from "./domain/Operation";
export type { RunReport, FailedOperation, SkippedOperation, VerifySummary } from "./domain/RunReport";

export type { PersistenceError } from "./services/StateStorage";
export type { ConflictError, NotFoundError, AliasConflictError } from "./services/StateStore";
export type { ResourceError } from "./services/DiskResource";
export type { HashFailed, TransferFailed, VerifyFailed } from "./services/StageExecutor";
export type { ChecksumError } from "./services/Checksum";
export type { CopyBackendUnavailable, CopyFailed } from "./services/Copy";

const copierLayer = (kind: CopierKind): Layer.Layer<CopyServiceTag, never, NodeContext.NodeContext> =>
  kind === "rsync" ? pipe(RsyncCopyService, Layer.provide(ShellServiceLive)) : FileSystemCopyService;

/**
 * Everything a command needs, bound to one state file.
 *
 * Building the layer loads the state file, so a file that cannot be read
 * fails here with a PersistenceError.
 */
export const createAppLayer = (config: RunConfig) => {
  const infra = pipe(
    Layer.mergeAll(
      Layer.succeed(RunConfigTag, config),
      JsonStateStorageService,
      DeviceServiceLive,
      ChecksumServiceLive,
      copierLayer(config.copier),
      LoggerServiceLive
    ),
    Layer.provideMerge(NodeContext.layer)
  );

  const core = Layer.mergeAll(StateStoreLive, DiskResourceServiceLive, StageExecutorLive).pipe(
    Layer.provideMerge(infra)
  );
  const scheduler = OperationSchedulerLive.pipe(Layer.provideMerge(core));
  return InteractiveSessionLive.pipe(Layer.provideMerge(scheduler));
};

export type AppServices = Layer.Layer.Success<ReturnType<typeof createAppLayer>>;
