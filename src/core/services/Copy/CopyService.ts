/**
 * CopyService - copies a source tree into a target directory.
 *
 * Two implementations: rsync through ShellService, and a plain filesystem copy.
 */

import { Context, Data, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";

import { ShellServiceTag } from "../ShellService";

export class CopyBackendUnavailable extends Data.TaggedError("CopyBackendUnavailable")<{
  readonly reason: string;
}> {}

export class CopyFailed extends Data.TaggedError("CopyFailed")<{
  readonly source: string;
  readonly destination: string;
  readonly reason: string;
}> {}

export type CopyError = CopyBackendUnavailable | CopyFailed;

export interface CopyService {
  /** Makes `destination` hold the contents of `source`. */
  readonly copyTree: (source: string, destination: string) => Effect.Effect<void, CopyError>;
}

export class CopyServiceTag extends Context.Tag("CopyService")<CopyServiceTag, CopyService>() {}

const withTrailingSlash = (dir: string): string => (dir.endsWith("/") ? dir : `${dir}/`);

export const buildRsyncArgs = (source: string, destination: string): readonly string[] => [
  "-a",
  withTrailingSlash(source),
  withTrailingSlash(destination)
];

export const RsyncCopyService = Layer.effect(
  CopyServiceTag,
  Effect.gen(function* () {
    const shell = yield* ShellServiceTag;
    const fs = yield* FileSystem.FileSystem;

    const copyTree: CopyService["copyTree"] = (source, destination) =>
      pipe(
        fs.makeDirectory(destination, { recursive: true }),
        Effect.mapError((e) => new CopyFailed({ source, destination, reason: e.message })),
        Effect.zipRight(
          pipe(
            shell.exec("rsync", buildRsyncArgs(source, destination)),
            Effect.mapError((e) => new CopyBackendUnavailable({ reason: `cannot run rsync: ${e.message}` }))
          )
        ),
        Effect.flatMap((result) =>
          result.exitCode === 0
            ? Effect.void
            : Effect.fail(
                new CopyFailed({
                  source,
                  destination,
                  reason: `rsync exited with ${result.exitCode}: ${result.stderr.trim()}`
                })
              )
        )
      );

    return { copyTree };
  })
);

export const FileSystemCopyService = Layer.effect(
  CopyServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const copyTree: CopyService["copyTree"] = (source, destination) =>
      pipe(
        fs.makeDirectory(destination, { recursive: true }),
        Effect.zipRight(fs.copy(source, destination, { overwrite: true, preserveTimestamps: true })),
        Effect.mapError((e) => new CopyFailed({ source, destination, reason: e.message }))
      );

    return { copyTree };
  })
);
