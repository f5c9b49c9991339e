/**
 * OperationScheduler - drives the hash, transfer and verify pipeline.
 *
 * Every tick derives the operation graph from the StateStore, picks the
 * runnable operations in priority order, takes their disk leases without
 * waiting and forks each one onto its own fiber. Completions, mutations and
 * stop requests arrive as signals on one queue; the runnable set is
 * recomputed after each of them.
 */

import { Cause, Chunk, Context, Data, Effect, Either, Exit, Layer, Option, Queue, Ref } from "effect";

import {
  compareForDispatch,
  deriveOperations,
  describeOperation,
  doneStatus,
  entityOf,
  failedStatus,
  failedUpstream,
  indexOperations,
  inScope,
  prerequisitesDone,
  RunScope,
  runningStatus,
  touchedPaths,
  type Operation,
  type ResolvedScope
} from "../../domain/Operation";
import {
  findSource,
  findTarget,
  TransitionEvidence,
  type BackupState
} from "../../domain/BackupState";
import type { Source } from "../../domain/Source";
import type { Target, VerifyResult } from "../../domain/Target";
import {
  summarizeVerifications,
  type RunReport,
  type TargetVerification
} from "../../domain/RunReport";
import { DiskResourceServiceTag, type DiskId, type Lease, type ResourceError } from "../DiskResource";
import { StateStoreTag, type LookupError, type StoreError } from "../StateStore";
import {
  HashFailed,
  StageExecutorTag,
  TransferFailed,
  VerifyFailed,
  type PipelineError
} from "../StageExecutor";

// =============================================================================
// Control handle
// =============================================================================

export type StageOutcome = Data.TaggedEnum<{
  Succeeded: { readonly verification?: VerifyResult };
  Failed: { readonly cause: string; readonly verification?: VerifyResult };
}>;

export const StageOutcome = Data.taggedEnum<StageOutcome>();

export type SchedulerSignal = Data.TaggedEnum<{
  Completed: { readonly operationId: string; readonly exit: Exit.Exit<StageOutcome, StoreError> };
  /** A state change to apply between ticks. */
  Mutation: { readonly apply: Effect.Effect<void> };
  Stop: {};
}>;

export const SchedulerSignal = Data.taggedEnum<SchedulerSignal>();

/** Mailbox and stop flag shared between a run and whoever started it. */
export interface SchedulerControl {
  readonly signals: Queue.Queue<SchedulerSignal>;
  readonly stopRequested: Ref.Ref<boolean>;
}

export const makeSchedulerControl: Effect.Effect<SchedulerControl> = Effect.gen(function* () {
  const signals = yield* Queue.unbounded<SchedulerSignal>();
  const stopRequested = yield* Ref.make(false);
  return { signals, stopRequested };
});

export const requestStop = (control: SchedulerControl): Effect.Effect<void> =>
  Effect.zipRight(Ref.set(control.stopRequested, true), Queue.offer(control.signals, SchedulerSignal.Stop()));

export type RunProgress = Data.TaggedEnum<{
  Started: { readonly operation: Operation; readonly label: string };
  Finished: { readonly operation: Operation; readonly label: string; readonly cause?: string };
}>;

export const RunProgress = Data.taggedEnum<RunProgress>();

export interface RunOptions {
  readonly control?: SchedulerControl;
  /** Put failed in-scope operations back in the queue before planning. */
  readonly retryFailed?: boolean;
  readonly onProgress?: (event: RunProgress) => Effect.Effect<void>;
}

export type RunError = ResourceError | LookupError | StoreError;

export interface OperationScheduler {
  readonly run: (scope: RunScope, options?: RunOptions) => Effect.Effect<RunReport, RunError>;
}

export class OperationSchedulerTag extends Context.Tag("OperationScheduler")<
  OperationSchedulerTag,
  OperationScheduler
>() {}

// =============================================================================
// Stage attempts
// =============================================================================

interface Settled {
  readonly evidence: TransitionEvidence;
  readonly verification?: VerifyResult;
}

const stageFailure = (operation: Operation, reason: string): PipelineError => {
  switch (operation.kind) {
    case "Hash":
      return new HashFailed({ operationId: operation.id, reason });
    case "Transfer":
      return new TransferFailed({ operationId: operation.id, reason });
    case "Verify":
      return new VerifyFailed({ operationId: operation.id, reason });
  }
};

/** Defects inside a stage count as that stage's failure. */
const guarded = <A, E extends PipelineError>(
  operation: Operation,
  attempt: Effect.Effect<A, E>
): Effect.Effect<Either.Either<A, PipelineError>> =>
  attempt.pipe(
    Effect.catchAllDefect((defect) => Effect.fail(stageFailure(operation, `unexpected error: ${String(defect)}`))),
    Effect.either
  );

// =============================================================================
// Live implementation
// =============================================================================

export const OperationSchedulerLive = Layer.effect(
  OperationSchedulerTag,
  Effect.gen(function* () {
    const store = yield* StateStoreTag;
    const disks = yield* DiskResourceServiceTag;
    const stages = yield* StageExecutorTag;

    const resolveScope = (scope: RunScope): Effect.Effect<ResolvedScope, LookupError> =>
      RunScope.$match(scope, {
        All: ({ through }) => Effect.succeed({ through }),
        Selection: ({ source, target, through }) =>
          Effect.gen(function* () {
            const found = yield* store.lookupSource(source);
            if (target === undefined) return { through, sourceId: found.id };
            const attached = yield* store.lookupTarget(found, target);
            return { through, sourceId: found.id, targetId: attached.id };
          })
      });

    const disksOf = (operation: Operation, state: BackupState) =>
      Effect.forEach(touchedPaths(operation, state), (path) => disks.resolve(path));

    const attempt = (
      operation: Operation,
      source: Source,
      target: Target | undefined
    ): Effect.Effect<Either.Either<Settled, PipelineError>> => {
      if (operation.kind === "Hash") {
        return guarded(
          operation,
          Effect.map(stages.hash(source), (product) => ({ evidence: TransitionEvidence.Hashed(product) }))
        );
      }
      if (target === undefined) {
        return Effect.succeed(Either.left(stageFailure(operation, "target no longer exists")));
      }
      if (operation.kind === "Transfer") {
        return guarded(
          operation,
          Effect.as(stages.transfer(source, target), { evidence: TransitionEvidence.Plain() })
        );
      }
      return guarded(
        operation,
        Effect.map(stages.verify(source, target), (result) => ({
          evidence: TransitionEvidence.Verified({ result }),
          verification: result
        }))
      );
    };

    /** Runs one stage and commits its Done or Failed transition. */
    const execute = (operation: Operation, state: BackupState): Effect.Effect<StageOutcome, StoreError> =>
      Effect.gen(function* () {
        const entity = entityOf(operation);
        const source = findSource(state, operation.sourceId);
        const target = operation.targetId !== undefined ? findTarget(state, operation.targetId) : undefined;

        const outcome: Either.Either<Settled, PipelineError> =
          source === undefined
            ? Either.left(stageFailure(operation, "source no longer exists"))
            : yield* attempt(operation, source, target);

        if (Either.isRight(outcome)) {
          const { evidence, verification } = outcome.right;
          yield* store.transition(entity, doneStatus(operation.kind), evidence);
          return StageOutcome.Succeeded({ verification });
        }

        const failure = outcome.left;
        const verification = failure._tag === "VerifyFailed" ? failure.result : undefined;
        yield* store.transition(
          entity,
          failedStatus(operation.kind),
          TransitionEvidence.Failed({ cause: failure.reason, result: verification })
        );
        return StageOutcome.Failed({ cause: failure.reason, verification });
      });

    const run: OperationScheduler["run"] = (scope, options = {}) =>
      Effect.gen(function* () {
        const control = options.control ?? (yield* makeSchedulerControl);
        const progress = options.onProgress ?? (() => Effect.void);

        // ---------------------------------------------------------------------
        // Planning: nothing starts unless all of this succeeds
        // ---------------------------------------------------------------------

        const recovered = yield* store.recoverInterrupted;
        if (recovered.length > 0) {
          yield* Effect.logInfo(`Recovered ${recovered.length} interrupted operation(s)`);
        }

        const resolved = yield* resolveScope(scope);

        if (options.retryFailed) {
          const failedEntities = new Set(
            deriveOperations(yield* store.snapshot)
              .filter((op) => op.status === "Failed" && inScope(op, resolved))
              .map(entityOf)
          );
          yield* store.resetFailed((reset) => failedEntities.has(reset.entityId));
        }

        const initial = yield* store.snapshot;
        const planned = deriveOperations(initial).filter((op) => inScope(op, resolved));
        for (const op of planned) {
          if (op.status === "Queued") yield* disksOf(op, initial);
        }
        const alreadyDone = planned.filter((op) => op.status === "Done");

        // ---------------------------------------------------------------------
        // Dispatch loop
        // ---------------------------------------------------------------------

        const inFlight = new Set<string>();
        const completedIds: string[] = [];
        const verifications: TargetVerification[] = [];
        const fatal = yield* Ref.make(Option.none<Cause.Cause<StoreError>>());
        const halted = Effect.map(Ref.get(fatal), Option.isSome);
        const recordFatal = (cause: Cause.Cause<StoreError>) =>
          Ref.update(fatal, (current) =>
            Option.some(Option.match(current, { onNone: () => cause, onSome: (c) => Cause.sequential(c, cause) }))
          );

        const release = (leases: readonly Lease[]) => Effect.forEach(leases, disks.release, { discard: true });

        const handle = (signal: SchedulerSignal): Effect.Effect<void> =>
          SchedulerSignal.$match(signal, {
            Completed: ({ operationId, exit }) =>
              Effect.gen(function* () {
                inFlight.delete(operationId);
                if (Exit.isFailure(exit)) {
                  yield* recordFatal(exit.cause);
                  yield* Effect.logError(`Could not record the result of ${operationId}`);
                  return;
                }

                const state = yield* store.snapshot;
                const operation = indexOperations(deriveOperations(state)).get(operationId);
                const outcome = exit.value;
                if (outcome.verification !== undefined && operation?.targetId !== undefined) {
                  verifications.push({
                    targetId: operation.targetId,
                    path: findTarget(state, operation.targetId)?.path ?? operation.targetId,
                    result: outcome.verification
                  });
                }
                if (outcome._tag === "Succeeded") completedIds.push(operationId);
                if (operation !== undefined) {
                  yield* progress(
                    RunProgress.Finished({
                      operation,
                      label: describeOperation(operation, state),
                      ...(outcome._tag === "Failed" ? { cause: outcome.cause } : {})
                    })
                  );
                }
              }),
            Mutation: ({ apply }) => apply,
            Stop: () => Effect.logDebug("Stop requested")
          });

        const dispatch = (operation: Operation, state: BackupState, leases: readonly Lease[]) =>
          Effect.gen(function* () {
            const marked = yield* Effect.either(
              store.transition(entityOf(operation), runningStatus(operation.kind))
            );
            if (Either.isLeft(marked)) {
              yield* release(leases);
              if (marked.left._tag === "PersistenceError") {
                yield* recordFatal(Cause.fail(marked.left));
              } else {
                yield* Effect.logWarning(`Skipping ${operation.id}: ${marked.left.reason}`);
              }
              return;
            }

            inFlight.add(operation.id);
            yield* progress(RunProgress.Started({ operation, label: describeOperation(operation, state) }));
            yield* Effect.logDebug(`Dispatched ${operation.id} on ${leases.map((l) => l.diskId).join(", ")}`);

            yield* Effect.fork(
              Effect.exit(execute(operation, state)).pipe(
                Effect.tap(() => release(leases)),
                Effect.flatMap((exit) =>
                  Queue.offer(control.signals, SchedulerSignal.Completed({ operationId: operation.id, exit }))
                ),
                Effect.onInterrupt(() => release(leases))
              )
            );
          });

        /** Disks that a still-possible in-scope Transfer is going to write to. */
        const pendingTransferDisks = (
          scoped: readonly Operation[],
          index: ReadonlyMap<string, Operation>,
          state: BackupState
        ) =>
          Effect.gen(function* () {
            const busy = new Set<DiskId>();
            for (const op of scoped) {
              if (op.kind !== "Transfer") continue;
              const live =
                op.status === "Running" || (op.status === "Queued" && failedUpstream(op, index) === undefined);
              const target = op.targetId !== undefined ? findTarget(state, op.targetId) : undefined;
              if (!live || target === undefined) continue;
              const disk = yield* Effect.option(disks.resolve(target.path));
              if (Option.isSome(disk)) busy.add(disk.value);
            }
            return busy;
          });

        for (;;) {
          const stopped = yield* Ref.get(control.stopRequested);
          const nextRelease = yield* disks.nextRelease;
          let leaseBlocked = false;

          if (!stopped && !(yield* halted)) {
            const state = yield* store.snapshot;
            const ops = deriveOperations(state);
            const index = indexOperations(ops);
            const scoped = ops.filter((op) => inScope(op, resolved));
            const candidates = scoped
              .filter((op) => op.status === "Queued" && !inFlight.has(op.id) && prerequisitesDone(op, index))
              .sort(compareForDispatch);
            const transferDisks = yield* pendingTransferDisks(scoped, index, state);

            for (const op of candidates) {
              if (yield* halted) break;

              const wanted = yield* Effect.either(disksOf(op, state));
              if (Either.isLeft(wanted)) {
                yield* Effect.logWarning(`Cannot schedule ${op.id}: ${wanted.left.reason}`);
                continue;
              }

              if (op.kind === "Verify" && wanted.right.some((disk) => transferDisks.has(disk))) {
                yield* Effect.logDebug(`Deferring ${op.id} until transfers to its disk finish`);
                continue;
              }

              const leases = yield* disks.tryAcquireAll(wanted.right);
              if (Option.isNone(leases)) {
                leaseBlocked = true;
                continue;
              }
              yield* dispatch(op, state, leases.value);
            }
          }

          if (inFlight.size === 0) {
            // Registrations may still be waiting in the mailbox.
            const late = yield* Queue.takeAll(control.signals);
            if (Chunk.isNonEmpty(late)) {
              for (const signal of late) yield* handle(signal);
              continue;
            }
            if (!leaseBlocked || stopped || (yield* halted)) break;
            // Blocked only by leases held outside this run.
            const woke = yield* Effect.race(
              Effect.map(Queue.take(control.signals), Option.some),
              Effect.as(nextRelease, Option.none<SchedulerSignal>())
            );
            if (Option.isSome(woke)) yield* handle(woke.value);
            continue;
          }

          yield* handle(yield* Queue.take(control.signals));
          for (const signal of yield* Queue.takeAll(control.signals)) {
            yield* handle(signal);
          }
        }

        const failure = yield* Ref.get(fatal);
        if (Option.isSome(failure)) {
          return yield* Effect.failCause(failure.value);
        }

        // ---------------------------------------------------------------------
        // Report
        // ---------------------------------------------------------------------

        const final = yield* store.snapshot;
        const finalOps = deriveOperations(final);
        const finalIndex = indexOperations(finalOps);
        const scoped = finalOps.filter((op) => inScope(op, resolved));

        const causeOf = (op: Operation): string =>
          (op.targetId !== undefined ? findTarget(final, op.targetId)?.error : findSource(final, op.sourceId)?.error) ??
          "unknown cause";

        const report: RunReport = {
          completed: completedIds.flatMap((id) => {
            const op = finalIndex.get(id);
            return op ? [op] : [];
          }),
          alreadyDone,
          failed: scoped
            .filter((op) => op.status === "Failed")
            .map((operation) => ({ operation, cause: causeOf(operation) })),
          skipped: scoped.flatMap((operation) => {
            const blockedBy = operation.status === "Queued" ? failedUpstream(operation, finalIndex) : undefined;
            return blockedBy !== undefined ? [{ operation, blockedBy }] : [];
          }),
          pending: scoped.filter((op) => op.status === "Queued" && failedUpstream(op, finalIndex) === undefined),
          stopped: yield* Ref.get(control.stopRequested),
          verifySummary: summarizeVerifications(verifications),
          verifications
        };

        yield* Effect.logDebug(
          `Run finished: ${report.completed.length} completed, ${report.failed.length} failed, ${report.skipped.length} skipped`
        );
        return report;
      });

    return { run };
  })
);
