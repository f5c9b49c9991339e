/**
 * StateStore - the durable record of every Source and Target.
 *
 * Mutations are linearized by a single-permit semaphore and written to the state
 * file before they return. Operation statuses are never stored; they are derived
 * from the entity statuses kept here.
 */

import { Context, Data, Effect, Either, Layer, Ref } from "effect";

import * as State from "../../domain/BackupState";
import type { BackupState, EntityStatus, PendingReset, TransitionEvidence } from "../../domain/BackupState";
import type { NewSource, Source, SourcePatch } from "../../domain/Source";
import type { NewTarget, Target, TargetPatch } from "../../domain/Target";
import { RunConfigTag } from "../../config";
import { StateStorageServiceTag, type PersistenceError } from "../StateStorage";

export class ConflictError extends Data.TaggedError("ConflictError")<{
  readonly entity: string;
  readonly reason: string;
}> {}

export class NotFoundError extends Data.TaggedError("NotFoundError")<{
  readonly reference: string;
}> {}

export class AliasConflictError extends Data.TaggedError("AliasConflictError")<{
  readonly reference: string;
  readonly matches: readonly string[];
}> {}

export type LookupError = NotFoundError | AliasConflictError;
export type StoreError = ConflictError | PersistenceError;

export interface StateStore {
  readonly statePath: string;
  readonly snapshot: Effect.Effect<BackupState>;

  readonly lookupSource: (reference: string) => Effect.Effect<Source, LookupError>;
  readonly lookupTarget: (source: Source, reference: string) => Effect.Effect<Target, LookupError>;

  readonly addSource: (input: NewSource) => Effect.Effect<Source, StoreError>;
  readonly addTarget: (sourceId: string, input: NewTarget) => Effect.Effect<Target, StoreError>;
  readonly updateSource: (sourceId: string, patch: SourcePatch) => Effect.Effect<Source, StoreError>;
  readonly updateTarget: (targetId: string, patch: TargetPatch) => Effect.Effect<Target, StoreError>;
  readonly removeSource: (sourceId: string) => Effect.Effect<Source, StoreError>;

  /** Fails with ConflictError on any edge outside the entity lifecycle. */
  readonly transition: (
    entityId: string,
    to: EntityStatus,
    evidence?: TransitionEvidence
  ) => Effect.Effect<void, StoreError>;

  /** Rolls Hashing, Transferring and Verifying back to their queued form. */
  readonly recoverInterrupted: Effect.Effect<readonly PendingReset[], StoreError>;
  /** Puts failed entities matching `include` back in the queue. */
  readonly resetFailed: (
    include: (reset: PendingReset) => boolean
  ) => Effect.Effect<readonly PendingReset[], StoreError>;
}

export class StateStoreTag extends Context.Tag("StateStore")<StateStoreTag, StateStore>() {}

const toLookup = <A>(
  reference: string,
  resolution: State.Resolution,
  get: (id: string) => A | undefined
): Effect.Effect<A, LookupError> =>
  State.Resolution.$match(resolution, {
    Found: ({ id }): Effect.Effect<A, LookupError> => {
      const found = get(id);
      return found === undefined
        ? Effect.fail(new NotFoundError({ reference }))
        : Effect.succeed(found);
    },
    NotFound: () => Effect.fail(new NotFoundError({ reference })),
    AmbiguousAlias: ({ ids }) => Effect.fail(new AliasConflictError({ reference, matches: ids }))
  });

export const StateStoreLive = Layer.effect(
  StateStoreTag,
  Effect.gen(function* () {
    const { statePath } = yield* RunConfigTag;
    const storage = yield* StateStorageServiceTag;

    const initial = yield* storage.load(statePath);
    const state = yield* Ref.make(initial);
    const lock = yield* Effect.makeSemaphore(1);

    /**
     * Applies a pure state change under the lock. The new state becomes visible
     * only after it has been written.
     */
    const mutate = <A>(
      entity: string,
      change: (current: BackupState) => Either.Either<readonly [A, BackupState], string>
    ): Effect.Effect<A, StoreError> =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          const current = yield* Ref.get(state);
          const result = change(current);
          if (Either.isLeft(result)) {
            return yield* Effect.fail(new ConflictError({ entity, reason: result.left }));
          }
          const [value, next] = result.right;
          yield* storage.save(statePath, next);
          yield* Ref.set(state, next);
          return value;
        })
      );

    const transitionIn = (
      current: BackupState,
      entityId: string,
      to: EntityStatus,
      evidence: TransitionEvidence
    ): Either.Either<readonly [undefined, BackupState], string> =>
      Either.map(State.applyTransition(current, entityId, to, evidence), (next) => [undefined, next] as const);

    const applyResets = (
      select: (current: BackupState) => readonly PendingReset[]
    ): Effect.Effect<readonly PendingReset[], StoreError> =>
      Effect.gen(function* () {
        const resets = select(yield* Ref.get(state));
        for (const reset of resets) {
          yield* mutate(reset.entityId, (current) =>
            transitionIn(current, reset.entityId, reset.to, State.TransitionEvidence.Plain())
          );
          yield* Effect.logDebug(`Reset ${reset.entityId}: ${reset.from} -> ${reset.to}`);
        }
        return resets;
      });

    const store: StateStore = {
      statePath,
      snapshot: Ref.get(state),

      lookupSource: (reference) =>
        Effect.flatMap(Ref.get(state), (current) =>
          toLookup(reference, State.resolveSource(current, reference), (id) =>
            State.findSource(current, id)
          )
        ),

      lookupTarget: (source, reference) =>
        Effect.flatMap(Ref.get(state), (current) =>
          toLookup(reference, State.resolveTarget(current, source.id, reference), (id) =>
            State.findTarget(current, id)
          )
        ),

      addSource: (input) => mutate(input.path, (current) => State.addSource(current, input)),
      addTarget: (sourceId, input) =>
        mutate(input.path, (current) => State.addTarget(current, sourceId, input)),
      updateSource: (sourceId, patch) =>
        mutate(sourceId, (current) => State.updateSource(current, sourceId, patch)),
      updateTarget: (targetId, patch) =>
        mutate(targetId, (current) => State.updateTarget(current, targetId, patch)),
      removeSource: (sourceId) => mutate(sourceId, (current) => State.removeSource(current, sourceId)),

      transition: (entityId, to, evidence = State.TransitionEvidence.Plain()) =>
        mutate(entityId, (current) => transitionIn(current, entityId, to, evidence)),

      recoverInterrupted: applyResets(State.interruptedWork),
      resetFailed: (include) => applyResets((current) => State.failedWork(current).filter(include))
    };

    return store;
  })
);
