/**
 * ChecksumService - hashes a directory tree into a checksum file and verifies a
 * copy of that tree against it.
 */

import { Clock, Context, Data, Effect, Either, Layer, Stream, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import * as walk from "@nodelib/fs.walk";
import ignore from "ignore";
import { createHash, getHashes } from "node:crypto";
import * as path from "node:path";

import { fileTimestamp, sanitizeFilename, toPosixRelative } from "../../lib/paths";
import type { VerifyResult } from "../../domain/Target";
import {
  CHECKSUM_FILE_NAME,
  checksumFileName,
  formatChecksumFile,
  parseChecksumFile,
  type ChecksumEntry
} from "./checksumFile";

export class ChecksumError extends Data.TaggedError("ChecksumError")<{
  readonly path: string;
  readonly reason: string;
}> {}

export interface HashRequest {
  readonly root: string;
  readonly algorithm: string;
  readonly singleHash: boolean;
  /** When non-empty, only files matching one of these are hashed. */
  readonly allowlist: readonly string[];
  readonly blocklist: readonly string[];
  readonly logDirectory: string;
}

export interface HashOutcome {
  readonly hashFile: string;
  readonly logFile: string;
  readonly fileCount: number;
}

export interface VerifyRequest {
  readonly root: string;
  /** Checksum file inside `root`. */
  readonly hashFile: string;
  readonly logDirectory: string;
}

export interface ChecksumService {
  readonly hashTree: (request: HashRequest) => Effect.Effect<HashOutcome, ChecksumError>;
  readonly verifyTree: (request: VerifyRequest) => Effect.Effect<VerifyResult, ChecksumError>;
}

export class ChecksumServiceTag extends Context.Tag("ChecksumService")<
  ChecksumServiceTag,
  ChecksumService
>() {}

// =============================================================================
// Tree walking
// =============================================================================

interface FileInfo {
  readonly relativePath: string;
  readonly mtime: number;
}

const matcher = (patterns: readonly string[]) => ignore().add([...patterns]);

export const listFiles = (
  root: string,
  allowlist: readonly string[],
  blocklist: readonly string[]
): Effect.Effect<readonly FileInfo[], ChecksumError> => {
  const allow = matcher(allowlist);
  const block = matcher(blocklist);

  const included = (relativePath: string): boolean =>
    !CHECKSUM_FILE_NAME.test(relativePath) &&
    (allowlist.length === 0 || allow.ignores(relativePath)) &&
    !block.ignores(relativePath);

  return pipe(
    Effect.async<readonly walk.Entry[], Error>((resume) => {
      walk.walk(
        root,
        {
          stats: true,
          followSymbolicLinks: false,
          deepFilter: (entry) => !block.ignores(`${toPosixRelative(root, entry.path)}/`),
          entryFilter: (entry) => entry.dirent.isFile()
        },
        (error, entries) => resume(error ? Effect.fail(error) : Effect.succeed(entries))
      );
    }),
    Effect.map((entries) =>
      entries
        .map(({ path: absolute, stats }) => ({
          relativePath: toPosixRelative(root, absolute),
          mtime: stats ? stats.mtimeMs / 1000 : 0
        }))
        .filter((file) => included(file.relativePath))
        .sort((a, b) => a.relativePath.localeCompare(b.relativePath))
    ),
    Effect.mapError((e) => new ChecksumError({ path: root, reason: `cannot list files: ${e.message}` }))
  );
};

const supportedAlgorithm = (algorithm: string): boolean =>
  getHashes().includes(algorithm.toLowerCase());

// =============================================================================
// Live implementation
// =============================================================================

export const ChecksumServiceLive = Layer.effect(
  ChecksumServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const digestOf = (algorithm: string, filePath: string) =>
      Effect.suspend(() => {
        const hash = createHash(algorithm);
        return pipe(
          fs.stream(filePath),
          Stream.runForEach((chunk) => Effect.sync(() => hash.update(chunk))),
          Effect.map(() => hash.digest("hex"))
        );
      });

    const timestamp = Effect.map(Clock.currentTimeMillis, (millis) => fileTimestamp(new Date(millis)));

    const writeText = (filePath: string, text: string) =>
      pipe(
        fs.writeFileString(filePath, text),
        Effect.mapError((e) => new ChecksumError({ path: filePath, reason: e.message }))
      );

    const hashTree: ChecksumService["hashTree"] = (request) =>
      Effect.gen(function* () {
        const algorithm = request.algorithm.toLowerCase();
        if (!supportedAlgorithm(algorithm)) {
          return yield* Effect.fail(
            new ChecksumError({ path: request.root, reason: `unsupported hash algorithm "${request.algorithm}"` })
          );
        }

        const files = yield* listFiles(request.root, request.allowlist, request.blocklist);
        yield* Effect.logDebug(`Hashing ${files.length} files under ${request.root} with ${algorithm}`);

        const entries: ChecksumEntry[] = [];
        for (const file of files) {
          const digest = yield* pipe(
            digestOf(algorithm, path.join(request.root, file.relativePath)),
            Effect.mapError(
              (e) => new ChecksumError({ path: path.join(request.root, file.relativePath), reason: e.message })
            )
          );
          entries.push({ relativePath: file.relativePath, algorithm, digest, mtime: file.mtime });
        }

        const stamp = yield* timestamp;
        const format = request.singleHash ? "single" : "cshd";
        const hashFile = path.join(
          request.root,
          checksumFileName(path.basename(request.root), stamp, format, algorithm)
        );
        yield* writeText(hashFile, formatChecksumFile(entries, format));

        const logFile = path.join(request.logDirectory, `${sanitizeFilename(request.root)}_inc_${stamp}.log`);
        yield* writeText(
          logFile,
          [
            `hashed ${entries.length} files under ${request.root} with ${algorithm}`,
            `checksum file: ${hashFile}`,
            ...entries.map((entry) => `hashed ${entry.relativePath}`),
            ""
          ].join("\n")
        );

        return { hashFile, logFile, fileCount: entries.length };
      });

    const verifyTree: ChecksumService["verifyTree"] = (request) =>
      Effect.gen(function* () {
        const text = yield* pipe(
          fs.readFileString(request.hashFile),
          Effect.mapError(
            (e) => new ChecksumError({ path: request.hashFile, reason: `cannot read checksum file: ${e.message}` })
          )
        );
        const parsed = parseChecksumFile(text, path.basename(request.hashFile));
        if (Either.isLeft(parsed)) {
          return yield* Effect.fail(new ChecksumError({ path: request.hashFile, reason: parsed.left }));
        }

        const lines: string[] = [`verifying ${request.root} against ${request.hashFile}`];
        let crcErrors = 0;
        let missing = 0;
        let errors = 0;

        for (const entry of parsed.right) {
          if (!supportedAlgorithm(entry.algorithm)) {
            errors += 1;
            lines.push(`ERROR ${entry.relativePath}: unsupported hash algorithm "${entry.algorithm}"`);
            continue;
          }
          const outcome = yield* Effect.either(
            digestOf(entry.algorithm, path.join(request.root, entry.relativePath))
          );
          if (Either.isRight(outcome)) {
            if (outcome.right === entry.digest) {
              lines.push(`OK ${entry.relativePath}`);
            } else {
              crcErrors += 1;
              lines.push(`CRC MISMATCH ${entry.relativePath}`);
            }
          } else if (outcome.left._tag === "SystemError" && outcome.left.reason === "NotFound") {
            missing += 1;
            lines.push(`MISSING ${entry.relativePath}`);
          } else {
            errors += 1;
            lines.push(`ERROR ${entry.relativePath}: ${outcome.left.message}`);
          }
        }

        const stamp = yield* timestamp;
        const logFile = path.join(request.logDirectory, `${sanitizeFilename(request.root)}_vfy_${stamp}.log`);
        lines.push(
          `checked ${parsed.right.length} files: ${crcErrors} CRC errors, ${missing} missing, ${errors} errors`,
          ""
        );
        yield* writeText(logFile, lines.join("\n"));

        return { filesChecked: parsed.right.length, crcErrors, missing, errors, logFile };
      });

    return { hashTree, verifyTree };
  })
);
