/**
 * StateStorageService - reads and writes the backup state file.
 *
 * The file is a single JSON document, written whole through a temp file and a
 * rename so a reader never sees half a write.
 */

import { Context, Data, Effect, Layer, Schema, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import * as path from "node:path";

import { emptyState, type BackupState } from "../../domain/BackupState";

export class PersistenceError extends Data.TaggedError("PersistenceError")<{
  readonly path: string;
  readonly operation: "read" | "write";
  readonly reason: string;
}> {}

// =============================================================================
// File format (version 1)
// =============================================================================

const VerifyResultSchema = Schema.Struct({
  filesChecked: Schema.Number,
  crcErrors: Schema.Number,
  missing: Schema.Number,
  errors: Schema.Number,
  logFile: Schema.String
});

const SourceSchema = Schema.Struct({
  id: Schema.String,
  seq: Schema.Number,
  path: Schema.String,
  alias: Schema.optional(Schema.String),
  status: Schema.Literal("Unhashed", "Hashing", "Hashed", "HashFailed"),
  hashAlgorithm: Schema.String,
  singleHash: Schema.Boolean,
  allowlist: Schema.Array(Schema.String),
  blocklist: Schema.Array(Schema.String),
  hashFile: Schema.optional(Schema.String),
  hashLogFile: Schema.optional(Schema.String),
  targetIds: Schema.Array(Schema.String),
  error: Schema.optional(Schema.String)
});

const TargetSchema = Schema.Struct({
  id: Schema.String,
  seq: Schema.Number,
  sourceId: Schema.String,
  path: Schema.String,
  alias: Schema.optional(Schema.String),
  status: Schema.Literal(
    "Pending",
    "Transferring",
    "Transferred",
    "TransferFailed",
    "Verifying",
    "Verified",
    "VerifyFailed"
  ),
  verify: Schema.Boolean,
  verified: Schema.optional(VerifyResultSchema),
  error: Schema.optional(Schema.String)
});

export const StateFileSchema = Schema.Struct({
  version: Schema.Literal(1),
  nextSeq: Schema.Number,
  sources: Schema.Array(SourceSchema),
  targets: Schema.Array(TargetSchema)
});

const decodeStateFile = Schema.decodeUnknown(Schema.parseJson(StateFileSchema));

export const parseStateFile = (
  filePath: string,
  text: string
): Effect.Effect<BackupState, PersistenceError> =>
  pipe(
    decodeStateFile(text),
    Effect.mapError(
      (e) => new PersistenceError({ path: filePath, operation: "read", reason: e.message })
    )
  );

export const serializeState = (state: BackupState): string => `${JSON.stringify(state, null, 2)}\n`;

// =============================================================================
// Service
// =============================================================================

export interface StateStorageService {
  /** A missing file is an empty state. */
  readonly load: (filePath: string) => Effect.Effect<BackupState, PersistenceError>;
  readonly save: (filePath: string, state: BackupState) => Effect.Effect<void, PersistenceError>;
}

export class StateStorageServiceTag extends Context.Tag("StateStorageService")<
  StateStorageServiceTag,
  StateStorageService
>() {}

export const JsonStateStorageService = Layer.effect(
  StateStorageServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const load: StateStorageService["load"] = (filePath) =>
      Effect.gen(function* () {
        const exists = yield* fs.exists(filePath);
        if (!exists) {
          yield* Effect.logDebug(`No state file at ${filePath}, starting empty`);
          return emptyState;
        }
        const text = yield* fs.readFileString(filePath);
        return yield* parseStateFile(filePath, text);
      }).pipe(
        Effect.catchTag("SystemError", (e) =>
          Effect.fail(new PersistenceError({ path: filePath, operation: "read", reason: e.message }))
        ),
        Effect.catchTag("BadArgument", (e) =>
          Effect.fail(new PersistenceError({ path: filePath, operation: "read", reason: e.message }))
        )
      );

    const save: StateStorageService["save"] = (filePath, state) => {
      const tempPath = `${filePath}.tmp-${process.pid}`;
      return pipe(
        fs.makeDirectory(path.dirname(filePath), { recursive: true }),
        Effect.zipRight(fs.writeFileString(tempPath, serializeState(state))),
        Effect.zipRight(fs.rename(tempPath, filePath)),
        Effect.mapError(
          (e) => new PersistenceError({ path: filePath, operation: "write", reason: e.message })
        )
      );
    };

    return { load, save };
  })
);
