#!/usr/bin/env tsx
import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Logger, LogLevel, Option } from "effect";

import { createAppLayer, makeRunConfig, type AppServices, type OperationKind } from "@core";
import * as Opts from "@cli/options";
import {
  runAddTarget,
  runModify,
  runRemove,
  runStage,
  runStages,
  runStatus,
  withErrorHandling
} from "@cli/handler";
import { runInteractive } from "@cli/interactive";

/**
 * Runs a handler against the state file named by the common options.
 * Loading that file happens inside the error handler, so an unreadable one
 * is reported like any other failure.
 */
const withApp = <A, E, R extends AppServices>(
  common: Opts.CommonOptions,
  effect: Effect.Effect<A, E, R>
) =>
  withErrorHandling(
    effect.pipe(Effect.provide(createAppLayer(makeRunConfig(common.stateFile, common.copier))))
  ).pipe(common.debug ? Effect.provide(Logger.minimumLogLevel(LogLevel.Debug)) : (x) => x);

const stageCommand = Command.make(
  "stage",
  {
    ...Opts.common,
    path: Opts.path,
    alias: Opts.alias,
    hashAlgorithm: Opts.hashAlgorithm,
    singleHash: Opts.singleHash,
    allow: Opts.allow,
    block: Opts.block
  },
  (opts) =>
    withApp(
      opts,
      runStage({
        path: opts.path,
        alias: Option.getOrUndefined(opts.alias),
        hashAlgorithm: opts.hashAlgorithm,
        singleHash: opts.singleHash,
        allow: opts.allow,
        block: opts.block
      })
    )
).pipe(Command.withDescription("Stage a directory for hashing and backup"));

const addTargetCommand = Command.make(
  "add-target",
  {
    ...Opts.common,
    source: Opts.sourceArg,
    path: Opts.path,
    alias: Opts.alias,
    noVerify: Opts.noVerify
  },
  (opts) =>
    withApp(
      opts,
      runAddTarget({
        source: opts.source,
        path: opts.path,
        alias: Option.getOrUndefined(opts.alias),
        verify: !opts.noVerify
      })
    )
).pipe(Command.withDescription("Add a backup destination to a staged source"));

const modifyCommand = Command.make(
  "modify",
  {
    ...Opts.common,
    source: Opts.sourceArg,
    target: Opts.target,
    key: Opts.modifyKey,
    values: Opts.modifyValues
  },
  (opts) =>
    withApp(
      opts,
      runModify({
        source: opts.source,
        target: Option.getOrUndefined(opts.target),
        key: Option.getOrUndefined(opts.key),
        values: opts.values
      })
    )
).pipe(Command.withDescription("Show or change the settings of a source or one of its targets"));

const removeCommand = Command.make("remove", { ...Opts.common, source: Opts.sourceArg }, (opts) =>
  withApp(opts, runRemove(opts.source))
).pipe(Command.withDescription("Forget a staged source and its targets; files on disk are left alone"));

const selection = {
  ...Opts.common,
  source: Opts.source,
  target: Opts.target,
  retryFailed: Opts.retryFailed
};

const runThrough =
  (through: OperationKind) =>
  (opts: Opts.CommonOptions & {
    readonly source: Option.Option<string>;
    readonly target: Option.Option<string>;
    readonly retryFailed: boolean;
  }) =>
    withApp(
      opts,
      runStages(through, {
        source: Option.getOrUndefined(opts.source),
        target: Option.getOrUndefined(opts.target),
        retryFailed: opts.retryFailed
      })
    );

const hashCommand = Command.make(
  "hash",
  { ...Opts.common, source: Opts.source, retryFailed: Opts.retryFailed },
  (opts) => runThrough("Hash")({ ...opts, target: Option.none() })
).pipe(Command.withDescription("Write checksum files for staged sources"));

const transferCommand = Command.make("transfer", selection, runThrough("Transfer")).pipe(
  Command.withDescription("Copy hashed sources to their targets, hashing first where needed")
);

const verifyCommand = Command.make("verify", selection, runThrough("Verify")).pipe(
  Command.withDescription("Check copied targets against their checksum files, running earlier stages first")
);

const runCommand = Command.make("run", { ...Opts.common, retryFailed: Opts.retryFailed }, (opts) =>
  withApp(opts, runStages("Verify", { source: undefined, target: undefined, retryFailed: opts.retryFailed }))
).pipe(Command.withDescription("Hash, transfer and verify everything staged, one operation per disk at a time"));

const statusCommand = Command.make("status", { ...Opts.common, source: Opts.source }, (opts) =>
  withApp(opts, runStatus(Option.getOrUndefined(opts.source)))
).pipe(Command.withDescription("Show sources, targets and the state of every operation"));

const interactiveCommand = Command.make("interactive", Opts.common, (opts) => withApp(opts, runInteractive)).pipe(
  Command.withDescription("Prompt for commands; work staged while a run is active joins that run")
);

const rootCommand = Command.make("coldstage", {}).pipe(
  Command.withSubcommands([
    stageCommand,
    addTargetCommand,
    modifyCommand,
    removeCommand,
    hashCommand,
    transferCommand,
    verifyCommand,
    runCommand,
    statusCommand,
    interactiveCommand
  ]),
  Command.withDescription("Hash directories, copy them to several disks and verify the copies")
);

const cli = Command.run(rootCommand, {
  name: "coldstage",
  version: "0.1.0"
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
