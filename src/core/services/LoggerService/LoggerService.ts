/**
 * LoggerService - formatted console output for every command
 */

import { Console, Context, Effect, Layer } from "effect";

import { targetsOf, type BackupState } from "../../domain/BackupState";
import { deriveOperations, describeOperation, type Operation } from "../../domain/Operation";
import type { RunReport } from "../../domain/RunReport";
import { sourceLabel, type Source } from "../../domain/Source";
import { targetLabel, type Target, type VerifyResult } from "../../domain/Target";
import type { RunProgress } from "../Scheduler";

// =============================================================================
// Formatting
// =============================================================================

const verifyCounts = (result: VerifyResult): string =>
  `${result.filesChecked} files, ${result.crcErrors} CRC errors, ${result.missing} missing, ${result.errors} read errors`;

const checksumFormat = (source: Source): string =>
  `${source.hashAlgorithm}, ${source.singleHash ? "single" : "cshd"}`;

export const formatSourceStatus = (state: BackupState, source: Source): string[] => {
  const lines = [
    `${sourceLabel(source)}`,
    `   hash: ${source.status} (${checksumFormat(source)})`
  ];
  if (source.hashFile !== undefined) lines.push(`   checksum file: ${source.hashFile}`);
  if (source.hashLogFile !== undefined) lines.push(`   hash log: ${source.hashLogFile}`);
  if (source.allowlist.length > 0) lines.push(`   allow: ${source.allowlist.join(", ")}`);
  if (source.blocklist.length > 0) lines.push(`   block: ${source.blocklist.join(", ")}`);
  if (source.error !== undefined) lines.push(`   error: ${source.error}`);

  const targets = targetsOf(state, source.id);
  if (targets.length === 0) lines.push("   no targets");
  for (const target of targets) {
    lines.push(`   → ${targetLabel(target)}: ${target.status}${target.verify ? "" : " (no verify)"}`);
    if (target.verified !== undefined) lines.push(`      verified: ${verifyCounts(target.verified)}`);
    if (target.error !== undefined) lines.push(`      error: ${target.error}`);
  }
  return lines;
};

const countByStatus = (operations: readonly Operation[]) => {
  const counts = { Queued: 0, Running: 0, Done: 0, Failed: 0 };
  for (const op of operations) counts[op.status] += 1;
  return counts;
};

export const formatReport = (report: RunReport, state: BackupState): string[] => {
  const label = (op: Operation) => describeOperation(op, state);
  const lines = [
    "📊 Run summary:",
    `   Completed: ${report.completed.length}`,
    `   Already done: ${report.alreadyDone.length}`,
    `   Failed: ${report.failed.length}`,
    `   Skipped: ${report.skipped.length}`
  ];
  if (report.stopped) lines.push(`   Left queued after stop: ${report.pending.length}`);

  for (const { operation, cause } of report.failed) {
    lines.push(`   ❌ ${label(operation)}: ${cause}`);
  }
  for (const { operation, blockedBy } of report.skipped) {
    lines.push(`   ⏭️  ${label(operation)} (blocked by ${blockedBy})`);
  }

  if (report.verifications.length > 0) {
    const summary = report.verifySummary;
    lines.push(
      "",
      "🔍 Verification:",
      `   ${summary.filesChecked} files checked, ${summary.crcErrors} CRC errors, ${summary.missing} missing, ${summary.errors} read errors`
    );
    for (const { path, result } of report.verifications) {
      lines.push(`   ${path}: ${verifyCounts(result)} (log: ${result.logFile})`);
    }
  }
  return lines;
};

const formatField = (value: string | boolean | readonly string[] | undefined): string => {
  if (value === undefined) return "none";
  if (typeof value === "boolean") return value ? "true" : "false";
  if (typeof value === "string") return value;
  return value.length > 0 ? value.join(", ") : "none";
};

export const sourceFields = (source: Source): ReadonlyArray<readonly [string, string]> => [
  ["alias", formatField(source.alias)],
  ["hash-algorithm", source.hashAlgorithm],
  ["single-hash", formatField(source.singleHash)],
  ["allowlist", formatField(source.allowlist)],
  ["blocklist", formatField(source.blocklist)]
];

export const targetFields = (target: Target): ReadonlyArray<readonly [string, string]> => [
  ["alias", formatField(target.alias)],
  ["verify", formatField(target.verify)]
];

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly stage: {
    readonly staged: (source: Source) => Effect.Effect<void>;
    readonly targetAdded: (source: Source, target: Target) => Effect.Effect<void>;
    readonly removed: (source: Source) => Effect.Effect<void>;
  };
  readonly modify: {
    readonly fields: (fields: ReadonlyArray<readonly [string, string]>) => Effect.Effect<void>;
    readonly field: (key: string, value: string) => Effect.Effect<void>;
  };
  readonly run: {
    readonly header: (title: string, statePath: string) => Effect.Effect<void>;
    readonly progress: (event: RunProgress) => Effect.Effect<void>;
    readonly report: (report: RunReport, state: BackupState) => Effect.Effect<void>;
  };
  readonly status: {
    readonly header: (statePath: string) => Effect.Effect<void>;
    readonly empty: Effect.Effect<void>;
    readonly source: (state: BackupState, source: Source) => Effect.Effect<void>;
    readonly totals: (state: BackupState) => Effect.Effect<void>;
  };
  readonly session: {
    readonly intro: (statePath: string) => Effect.Effect<void>;
    readonly help: Effect.Effect<void>;
    readonly started: Effect.Effect<void>;
    readonly alreadyRunning: Effect.Effect<void>;
    readonly stopping: (wasRunning: boolean) => Effect.Effect<void>;
    readonly runState: (running: boolean) => Effect.Effect<void>;
    readonly waiting: Effect.Effect<void>;
    readonly invalid: (reason: string) => Effect.Effect<void>;
  };
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Implementation
// =============================================================================

const printLines = (lines: readonly string[]) =>
  Effect.forEach(lines, (line) => Console.log(line), { discard: true });

const HELP = [
  "Commands:",
  "   stage <path> [--alias a] [--hash-algorithm h] [--single-hash] [--allow p] [--block p]",
  "   add-target <source> <path> [--alias a] [--no-verify]",
  "   start [hash|transfer|verify] [--source s] [--target t] [--retry-failed]",
  "   status                                   show sources, targets and operations",
  "   stop                                     finish running work, dispatch nothing new",
  "   help",
  "   exit                                     wait for running work, then quit"
];

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, {
  stage: {
    staged: (source) =>
      Effect.gen(function* () {
        yield* Console.log(`✓ Staged ${source.path}`);
        if (source.alias !== undefined) yield* Console.log(`   with alias: ${source.alias}`);
      }),
    targetAdded: (source, target) =>
      Effect.gen(function* () {
        yield* Console.log(`✓ Added target ${target.path} to ${sourceLabel(source)}`);
        if (target.alias !== undefined) yield* Console.log(`   with alias: ${target.alias}`);
        if (!target.verify) yield* Console.log("   verification disabled");
      }),
    removed: (source) => Console.log(`🗑️  Removed ${sourceLabel(source)} and its targets`)
  },
  modify: {
    fields: (fields) => printLines(fields.map(([key, value]) => `${key} = ${value}`)),
    field: (key, value) => Console.log(`${key} = ${value}`)
  },
  run: {
    header: (title, statePath) => Console.log(`\n▶️  ${title} (state: ${statePath})\n`),
    progress: (event) =>
      event._tag === "Started"
        ? Console.log(`   … ${event.label}`)
        : Console.log(event.cause === undefined ? `   ✓ ${event.label}` : `   ❌ ${event.label}: ${event.cause}`),
    report: (report, state) => printLines(["", ...formatReport(report, state), ""])
  },
  status: {
    header: (statePath) => Console.log(`\n📋 Status of ${statePath}\n`),
    empty: Console.log("Nothing staged yet. Use 'stage <path>' to add a source."),
    source: (state, source) => printLines([...formatSourceStatus(state, source), ""]),
    totals: (state) => {
      const counts = countByStatus(deriveOperations(state));
      return Console.log(
        `Operations: ${counts.Done} done, ${counts.Running} running, ${counts.Queued} queued, ${counts.Failed} failed`
      );
    }
  },
  session: {
    intro: (statePath) => Console.log(`\n📦 coldstage interactive (state: ${statePath}). Type 'help' for commands.\n`),
    help: printLines(HELP),
    started: Console.log("▶️  Run started"),
    alreadyRunning: Console.log("⚠️  A run is already active; new work joins it"),
    stopping: (wasRunning) =>
      Console.log(wasRunning ? "⏹️  Stopping after running operations finish" : "Nothing is running"),
    runState: (running) => Console.log(running ? "▶️  A run is active\n" : "⏸️  No run active\n"),
    waiting: Console.log("Waiting on running work..."),
    invalid: (reason) => Console.error(`❌ ${reason}`)
  }
});
