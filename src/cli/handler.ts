import { Console, Effect, pipe } from "effect";

import type { AddTargetOptions, ModifyOptions, SelectionOptions, StageOptions } from "./options";
import { InvalidOption, normalizeKey, parseSourcePatch, parseTargetPatch, toRunScope } from "./optionParsing";
import { fromDomainError } from "./errors";

import type { OperationKind, RunReport } from "@core";
import { InteractiveSessionTag } from "@services/InteractiveSession";
import { LoggerServiceTag, sourceFields, targetFields } from "@services/LoggerService";
import { OperationSchedulerTag } from "@services/Scheduler";
import { StateStoreTag } from "@services/StateStore";

export const markFailed = Effect.sync(() => {
  process.exitCode = 1;
});

/**
 * Error handling wrapper for CLI commands
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error);
      return pipe(Console.error(`\n${appError.format()}`), Effect.zipRight(markFailed));
    }),
    Effect.asVoid
  );

// =============================================================================
// Registration
// =============================================================================

export const runStage = (options: StageOptions) =>
  Effect.gen(function* () {
    const session = yield* InteractiveSessionTag;
    const logger = yield* LoggerServiceTag;

    const source = yield* session.addSource({
      path: options.path,
      alias: options.alias,
      hashAlgorithm: options.hashAlgorithm.toLowerCase(),
      singleHash: options.singleHash,
      allowlist: options.allow,
      blocklist: options.block
    });

    yield* logger.stage.staged(source);
  });

export const runAddTarget = (options: AddTargetOptions) =>
  Effect.gen(function* () {
    const session = yield* InteractiveSessionTag;
    const store = yield* StateStoreTag;
    const logger = yield* LoggerServiceTag;

    const target = yield* session.addTarget(options.source, {
      path: options.path,
      alias: options.alias,
      verify: options.verify
    });
    const source = yield* store.lookupSource(options.source);

    yield* logger.stage.targetAdded(source, target);
  });

const pickField = (
  fields: ReadonlyArray<readonly [string, string]>,
  key: string,
  entity: string
): Effect.Effect<readonly [string, string], InvalidOption> => {
  const name = normalizeKey(key);
  const found = fields.find(([field]) => field === name);
  return found === undefined
    ? Effect.fail(
        new InvalidOption({
          option: key,
          reason: `unknown ${entity} field, expected one of ${fields.map(([field]) => field).join(", ")}`
        })
      )
    : Effect.succeed(found);
};

/**
 * Lists every field, shows one, or sets one, depending on how many of key
 * and values were given. `--target` switches from the source to one of its
 * targets.
 */
export const runModify = (options: ModifyOptions) =>
  Effect.gen(function* () {
    const store = yield* StateStoreTag;
    const logger = yield* LoggerServiceTag;

    const source = yield* store.lookupSource(options.source);

    if (options.target !== undefined) {
      const target = yield* store.lookupTarget(source, options.target);
      if (options.key === undefined) {
        return yield* logger.modify.fields(targetFields(target));
      }
      if (options.values.length === 0) {
        const [field, value] = yield* pickField(targetFields(target), options.key, "target");
        return yield* logger.modify.field(field, value);
      }
      const patch = yield* parseTargetPatch(options.key, options.values);
      const updated = yield* store.updateTarget(target.id, patch);
      const [field, value] = yield* pickField(targetFields(updated), options.key, "target");
      return yield* logger.modify.field(field, value);
    }

    if (options.key === undefined) {
      return yield* logger.modify.fields(sourceFields(source));
    }
    if (options.values.length === 0) {
      const [field, value] = yield* pickField(sourceFields(source), options.key, "source");
      return yield* logger.modify.field(field, value);
    }
    const patch = yield* parseSourcePatch(options.key, options.values);
    const updated = yield* store.updateSource(source.id, patch);
    const [field, value] = yield* pickField(sourceFields(updated), options.key, "source");
    return yield* logger.modify.field(field, value);
  });

export const runRemove = (reference: string) =>
  Effect.gen(function* () {
    const store = yield* StateStoreTag;
    const logger = yield* LoggerServiceTag;

    const source = yield* store.lookupSource(reference);
    const removed = yield* store.removeSource(source.id);
    yield* logger.stage.removed(removed);
  });

// =============================================================================
// Runs
// =============================================================================

const RUN_TITLES: Record<OperationKind, string> = {
  Hash: "Hashing",
  Transfer: "Hashing and transferring",
  Verify: "Running the backup plan"
};

export const hasFailures = (report: RunReport): boolean => report.failed.length > 0;

/** Runs every operation in the selection up to and including `through`. */
export const runStages = (through: OperationKind, selection: SelectionOptions) =>
  Effect.gen(function* () {
    const scheduler = yield* OperationSchedulerTag;
    const store = yield* StateStoreTag;
    const logger = yield* LoggerServiceTag;

    const scope = yield* toRunScope(through, selection.source, selection.target);
    yield* Effect.logDebug(`Run scope: ${JSON.stringify(scope)}`);

    yield* logger.run.header(RUN_TITLES[through], store.statePath);

    const report = yield* scheduler.run(scope, {
      retryFailed: selection.retryFailed,
      onProgress: logger.run.progress
    });

    const state = yield* store.snapshot;
    yield* logger.run.report(report, state);

    if (hasFailures(report)) {
      yield* markFailed;
    }
  });

export const runStatus = (reference: string | undefined) =>
  Effect.gen(function* () {
    const store = yield* StateStoreTag;
    const logger = yield* LoggerServiceTag;

    const state = yield* store.snapshot;
    yield* logger.status.header(store.statePath);

    if (reference !== undefined) {
      const source = yield* store.lookupSource(reference);
      return yield* logger.status.source(state, source);
    }

    if (state.sources.length === 0) {
      return yield* logger.status.empty;
    }

    yield* Effect.forEach(state.sources, (source) => logger.status.source(state, source), { discard: true });
    yield* logger.status.totals(state);
  });
