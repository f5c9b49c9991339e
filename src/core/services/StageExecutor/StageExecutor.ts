/**
 * StageExecutor - the three pipeline stages as thin adapters over
 * ChecksumService and CopyService.
 */

import { Context, Data, Effect, Layer, pipe } from "effect";
import * as path from "node:path";

import type { Source } from "../../domain/Source";
import { isCleanVerify, type Target, type VerifyResult } from "../../domain/Target";
import { hashOperationId, transferOperationId, verifyOperationId } from "../../domain/Operation";
import { RunConfigTag } from "../../config";
import { ChecksumServiceTag } from "../Checksum";
import { CopyServiceTag } from "../Copy";

export class HashFailed extends Data.TaggedError("HashFailed")<{
  readonly operationId: string;
  readonly reason: string;
}> {}

export class TransferFailed extends Data.TaggedError("TransferFailed")<{
  readonly operationId: string;
  readonly reason: string;
}> {}

export class VerifyFailed extends Data.TaggedError("VerifyFailed")<{
  readonly operationId: string;
  readonly reason: string;
  readonly result?: VerifyResult;
}> {}

export type PipelineError = HashFailed | TransferFailed | VerifyFailed;

export interface HashProduct {
  readonly hashFile: string;
  readonly hashLogFile: string;
}

export interface StageExecutor {
  readonly hash: (source: Source) => Effect.Effect<HashProduct, HashFailed>;
  readonly transfer: (source: Source, target: Target) => Effect.Effect<void, TransferFailed>;
  readonly verify: (source: Source, target: Target) => Effect.Effect<VerifyResult, VerifyFailed>;
}

export class StageExecutorTag extends Context.Tag("StageExecutor")<StageExecutorTag, StageExecutor>() {}

export const describeVerifyProblems = (result: VerifyResult): string =>
  `${result.crcErrors} CRC errors, ${result.missing} missing, ${result.errors} read errors`;

export const StageExecutorLive = Layer.effect(
  StageExecutorTag,
  Effect.gen(function* () {
    const config = yield* RunConfigTag;
    const checksums = yield* ChecksumServiceTag;
    const copier = yield* CopyServiceTag;

    const hash: StageExecutor["hash"] = (source) =>
      pipe(
        checksums.hashTree({
          root: source.path,
          algorithm: source.hashAlgorithm,
          singleHash: source.singleHash,
          allowlist: source.allowlist,
          blocklist: source.blocklist,
          logDirectory: config.logDirectory
        }),
        Effect.map((outcome) => ({ hashFile: outcome.hashFile, hashLogFile: outcome.logFile })),
        Effect.mapError((e) => new HashFailed({ operationId: hashOperationId(source.id), reason: e.reason }))
      );

    const transfer: StageExecutor["transfer"] = (source, target) =>
      pipe(
        copier.copyTree(source.path, target.path),
        Effect.mapError(
          (e) => new TransferFailed({ operationId: transferOperationId(target.id), reason: e.reason })
        )
      );

    const verify: StageExecutor["verify"] = (source, target) =>
      Effect.gen(function* () {
        const operationId = verifyOperationId(target.id);
        if (source.hashFile === undefined) {
          return yield* Effect.fail(new VerifyFailed({ operationId, reason: "source has no checksum file" }));
        }

        const result = yield* pipe(
          checksums.verifyTree({
            root: target.path,
            hashFile: path.join(target.path, path.relative(source.path, source.hashFile)),
            logDirectory: path.dirname(target.path)
          }),
          Effect.mapError((e) => new VerifyFailed({ operationId, reason: e.reason }))
        );

        if (!isCleanVerify(result)) {
          return yield* Effect.fail(
            new VerifyFailed({ operationId, reason: describeVerifyProblems(result), result })
          );
        }
        return result;
      });

    return { hash, transfer, verify };
  })
);
