/**
 * InteractiveSession - registers work and controls a run while it is going.
 *
 * With a run active, registrations travel through the run's mailbox and are
 * applied between ticks; the caller waits for the result. Without one, they
 * go straight to the StateStore.
 */

import { Context, Deferred, Effect, Exit, Fiber, Layer, Option, Queue, Ref } from "effect";

import type { BackupState } from "../../domain/BackupState";
import { deriveOperations, type Operation, type RunScope } from "../../domain/Operation";
import type { RunReport } from "../../domain/RunReport";
import type { NewSource, Source } from "../../domain/Source";
import type { NewTarget, Target } from "../../domain/Target";
import { DiskResourceServiceTag, type ResourceError } from "../DiskResource";
import { StateStoreTag, type LookupError, type StoreError } from "../StateStore";
import {
  makeSchedulerControl,
  OperationSchedulerTag,
  requestStop,
  SchedulerSignal,
  type RunError,
  type RunOptions,
  type SchedulerControl
} from "../Scheduler";

export interface SessionSnapshot {
  readonly running: boolean;
  readonly state: BackupState;
  readonly operations: readonly Operation[];
}

export type RegistrationError = ResourceError | LookupError | StoreError;

export interface InteractiveSession {
  /** Starts a run on its own fiber. Returns false when one is already active. */
  readonly start: (scope: RunScope, options?: Omit<RunOptions, "control">) => Effect.Effect<boolean>;
  readonly addSource: (input: NewSource) => Effect.Effect<Source, RegistrationError>;
  readonly addTarget: (sourceRef: string, input: NewTarget) => Effect.Effect<Target, RegistrationError>;
  readonly statusSnapshot: Effect.Effect<SessionSnapshot>;
  /** Stops further dispatch; in-flight operations finish. */
  readonly stop: Effect.Effect<boolean>;
  /** Waits for the active run, or replays how the last one ended. */
  readonly await: Effect.Effect<Option.Option<RunReport>, RunError>;
}

export class InteractiveSessionTag extends Context.Tag("InteractiveSession")<
  InteractiveSessionTag,
  InteractiveSession
>() {}

interface ActiveRun {
  readonly control: SchedulerControl;
  readonly fiber: Fiber.RuntimeFiber<RunReport, RunError>;
}

export const InteractiveSessionLive = Layer.effect(
  InteractiveSessionTag,
  Effect.gen(function* () {
    const store = yield* StateStoreTag;
    const disks = yield* DiskResourceServiceTag;
    const scheduler = yield* OperationSchedulerTag;

    const lock = yield* Effect.makeSemaphore(1);
    const active = yield* Ref.make(Option.none<ActiveRun>());
    const lastRun = yield* Ref.make(Option.none<Exit.Exit<RunReport, RunError>>());

    /** Applies mutations a finished run left in its mailbox. */
    const finish = (control: SchedulerControl, exit: Exit.Exit<RunReport, RunError>) =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          yield* Ref.set(active, Option.none());
          yield* Ref.set(lastRun, Option.some(exit));
          const leftover = yield* Queue.takeAll(control.signals);
          for (const signal of leftover) {
            if (signal._tag === "Mutation") yield* signal.apply;
          }
          yield* Queue.shutdown(control.signals);
        })
      );

    /** Routes a mutation through the active run's mailbox, or applies it now. */
    const submit = <A, E>(mutation: Effect.Effect<A, E>): Effect.Effect<A, E> =>
      Effect.flatten(
        lock.withPermits(1)(
          Effect.gen(function* () {
            const current = yield* Ref.get(active);
            if (Option.isNone(current)) return mutation;

            const result = yield* Deferred.make<A, E>();
            yield* Queue.offer(
              current.value.control.signals,
              SchedulerSignal.Mutation({
                apply: Effect.flatMap(Effect.exit(mutation), (exit) => Deferred.done(result, exit))
              })
            );
            return Deferred.await(result);
          })
        )
      );

    const start: InteractiveSession["start"] = (scope, options = {}) =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          if (Option.isSome(yield* Ref.get(active))) return false;

          const control = yield* makeSchedulerControl;
          const fiber = yield* Effect.forkDaemon(
            scheduler.run(scope, { ...options, control }).pipe(
              Effect.tapErrorCause((cause) => Effect.logError("Run ended early", cause)),
              Effect.onExit((exit) => finish(control, exit))
            )
          );
          yield* Ref.set(active, Option.some({ control, fiber }));
          return true;
        })
      );

    const addSource: InteractiveSession["addSource"] = (input) =>
      Effect.zipRight(disks.resolve(input.path), submit(store.addSource(input)));

    const addTarget: InteractiveSession["addTarget"] = (sourceRef, input) =>
      Effect.gen(function* () {
        yield* disks.resolve(input.path);
        return yield* submit(
          Effect.flatMap(store.lookupSource(sourceRef), (source) => store.addTarget(source.id, input))
        );
      });

    const statusSnapshot: InteractiveSession["statusSnapshot"] = Effect.gen(function* () {
      const running = Option.isSome(yield* Ref.get(active));
      const state = yield* store.snapshot;
      return { running, state, operations: deriveOperations(state) };
    });

    const stop: InteractiveSession["stop"] = Effect.flatMap(Ref.get(active), (current) =>
      Option.match(current, {
        onNone: () => Effect.succeed(false),
        onSome: ({ control }) => Effect.as(requestStop(control), true)
      })
    );

    const awaitRun: InteractiveSession["await"] = Effect.flatMap(Ref.get(active), (current) =>
      Option.match(current, {
        onNone: () =>
          Effect.flatMap(
            Ref.get(lastRun),
            Option.match({
              onNone: () => Effect.succeed(Option.none<RunReport>()),
              onSome: (exit) => Effect.map(exit, Option.some)
            })
          ),
        onSome: ({ fiber }) => Effect.map(Fiber.join(fiber), Option.some)
      })
    );

    return { start, addSource, addTarget, statusSnapshot, stop, await: awaitRun };
  })
);
