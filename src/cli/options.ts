import { Args, Options } from "@effect/cli";
import { Config } from "effect";

import { DEFAULT_STATE_FILE } from "../core/config";
import { DEFAULT_HASH_ALGORITHM } from "@domain/Source";

// =============================================================================
// Common options
// =============================================================================

export const stateFile = Options.text("state-file").pipe(
  Options.withDescription(
    "JSON file holding the backup state. Hash logs are written beside it (env: COLDSTAGE_STATE_FILE)"
  ),
  Options.withFallbackConfig(
    Config.string("COLDSTAGE_STATE_FILE").pipe(Config.withDefault(DEFAULT_STATE_FILE))
  )
);

export const copier = Options.choice("copier", ["rsync", "fs"]).pipe(
  Options.withDescription("How files are copied to targets: rsync, or a plain filesystem copy"),
  Options.withDefault("rsync")
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export const common = { stateFile, copier, debug };

// =============================================================================
// Registration
// =============================================================================

export const path = Args.text({ name: "path" }).pipe(
  Args.withDescription("Directory path; a target may not exist yet")
);

export const sourceArg = Args.text({ name: "source" }).pipe(
  Args.withDescription("Source path or alias")
);

export const alias = Options.text("alias").pipe(
  Options.withDescription("Short name usable instead of the full path"),
  Options.optional
);

export const hashAlgorithm = Options.text("hash-algorithm").pipe(
  Options.withDescription("Digest used for checksum files (any algorithm node:crypto supports)"),
  Options.withDefault(DEFAULT_HASH_ALGORITHM)
);

export const singleHash = Options.boolean("single-hash").pipe(
  Options.withDescription("Write a <name>.<algorithm> file instead of the default .cshd format"),
  Options.withDefault(false)
);

export const allow = Options.text("allow").pipe(
  Options.withDescription("Only hash files matching this gitignore-style pattern (repeatable)"),
  Options.repeated
);

export const block = Options.text("block").pipe(
  Options.withDescription("Skip files matching this gitignore-style pattern (repeatable)"),
  Options.repeated
);

export const noVerify = Options.boolean("no-verify").pipe(
  Options.withDescription("Do not verify this target after the transfer"),
  Options.withDefault(false)
);

export const modifyKey = Args.text({ name: "key" }).pipe(
  Args.withDescription("Field to show or change; omit to list every field"),
  Args.optional
);

export const modifyValues = Args.text({ name: "value" }).pipe(
  Args.withDescription("New value; allowlist and blocklist take several"),
  Args.repeated
);

// =============================================================================
// Selection
// =============================================================================

export const source = Options.text("source").pipe(
  Options.withDescription("Only this source (path or alias)"),
  Options.optional
);

export const target = Options.text("target").pipe(
  Options.withDescription("Only this target of --source (path or alias)"),
  Options.optional
);

export const retryFailed = Options.boolean("retry-failed").pipe(
  Options.withDescription("Queue failed operations in the selection again before running"),
  Options.withDefault(false)
);

export interface CommonOptions {
  readonly stateFile: string;
  readonly copier: "rsync" | "fs";
  readonly debug: boolean;
}

export interface StageOptions {
  readonly path: string;
  readonly alias: string | undefined;
  readonly hashAlgorithm: string;
  readonly singleHash: boolean;
  readonly allow: readonly string[];
  readonly block: readonly string[];
}

export interface AddTargetOptions {
  readonly source: string;
  readonly path: string;
  readonly alias: string | undefined;
  readonly verify: boolean;
}

export interface ModifyOptions {
  readonly source: string;
  readonly target: string | undefined;
  readonly key: string | undefined;
  readonly values: readonly string[];
}

export interface SelectionOptions {
  readonly source: string | undefined;
  readonly target: string | undefined;
  readonly retryFailed: boolean;
}
