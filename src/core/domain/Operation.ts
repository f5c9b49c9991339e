import { Data } from "effect";

import { findSource, findTarget, targetsOf, type BackupState, type EntityStatus } from "./BackupState";
import type { SourceStatus } from "./Source";
import type { TargetStatus } from "./Target";

export type OperationKind = "Hash" | "Transfer" | "Verify";

export type OperationStatus = "Queued" | "Running" | "Done" | "Failed";

/**
 * One node of the pipeline graph. Operations are derived from Source and Target
 * statuses on every tick and never stored on their own; prerequisites point at
 * other operations by id.
 */
export interface Operation {
  readonly id: string;
  readonly kind: OperationKind;
  readonly sourceId: string;
  readonly targetId?: string;
  readonly status: OperationStatus;
  readonly prerequisites: readonly string[];
  readonly seq: number;
}

export const hashOperationId = (sourceId: string): string => `hash:${sourceId}`;
export const transferOperationId = (targetId: string): string => `transfer:${targetId}`;
export const verifyOperationId = (targetId: string): string => `verify:${targetId}`;

const HASH_STATUS: Record<SourceStatus, OperationStatus> = {
  Unhashed: "Queued",
  Hashing: "Running",
  Hashed: "Done",
  HashFailed: "Failed"
};

const TRANSFER_STATUS: Record<TargetStatus, OperationStatus> = {
  Pending: "Queued",
  Transferring: "Running",
  Transferred: "Done",
  TransferFailed: "Failed",
  Verifying: "Done",
  Verified: "Done",
  VerifyFailed: "Done"
};

const VERIFY_STATUS: Record<TargetStatus, OperationStatus> = {
  Pending: "Queued",
  Transferring: "Queued",
  Transferred: "Queued",
  TransferFailed: "Queued",
  Verifying: "Running",
  Verified: "Done",
  VerifyFailed: "Failed"
};

export const deriveOperations = (state: BackupState): readonly Operation[] =>
  [...state.sources]
    .sort((a, b) => a.seq - b.seq)
    .flatMap((source) => {
      const hashId = hashOperationId(source.id);
      const hash: Operation = {
        id: hashId,
        kind: "Hash",
        sourceId: source.id,
        status: HASH_STATUS[source.status],
        prerequisites: [],
        seq: source.seq
      };

      const downstream = targetsOf(state, source.id).flatMap((target): Operation[] => {
        const transferId = transferOperationId(target.id);
        const transfer: Operation = {
          id: transferId,
          kind: "Transfer",
          sourceId: source.id,
          targetId: target.id,
          status: TRANSFER_STATUS[target.status],
          prerequisites: [hashId],
          seq: target.seq
        };
        if (!target.verify) return [transfer];

        return [
          transfer,
          {
            id: verifyOperationId(target.id),
            kind: "Verify",
            sourceId: source.id,
            targetId: target.id,
            status: VERIFY_STATUS[target.status],
            prerequisites: [transferId],
            seq: target.seq
          }
        ];
      });

      return [hash, ...downstream];
    });

export const indexOperations = (operations: readonly Operation[]): ReadonlyMap<string, Operation> =>
  new Map(operations.map((operation) => [operation.id, operation]));

// =============================================================================
// Graph queries
// =============================================================================

const KIND_RANK: Record<OperationKind, number> = { Hash: 0, Transfer: 1, Verify: 2 };

/** Hash before Transfer before Verify, then by creation order. */
export const compareForDispatch = (a: Operation, b: Operation): number =>
  KIND_RANK[a.kind] - KIND_RANK[b.kind] || a.seq - b.seq;

export const prerequisitesDone = (
  operation: Operation,
  index: ReadonlyMap<string, Operation>
): boolean => operation.prerequisites.every((id) => index.get(id)?.status === "Done");

/** Id of the failed operation that keeps this one from ever running, if any. */
export const failedUpstream = (
  operation: Operation,
  index: ReadonlyMap<string, Operation>
): string | undefined => {
  for (const id of operation.prerequisites) {
    const prerequisite = index.get(id);
    if (!prerequisite) continue;
    if (prerequisite.status === "Failed") return prerequisite.id;
    const further = failedUpstream(prerequisite, index);
    if (further !== undefined) return further;
  }
  return undefined;
};

/** Paths whose disks an operation reads or writes. */
export const touchedPaths = (operation: Operation, state: BackupState): readonly string[] => {
  const source = findSource(state, operation.sourceId);
  const target = operation.targetId !== undefined ? findTarget(state, operation.targetId) : undefined;

  switch (operation.kind) {
    case "Hash":
      return source ? [source.path] : [];
    case "Transfer":
      return [...(source ? [source.path] : []), ...(target ? [target.path] : [])];
    case "Verify":
      return target ? [target.path] : [];
  }
};

/** The Source or Target whose status records this operation. */
export const entityOf = (operation: Operation): string => operation.targetId ?? operation.sourceId;

export const runningStatus = (kind: OperationKind): EntityStatus =>
  kind === "Hash" ? "Hashing" : kind === "Transfer" ? "Transferring" : "Verifying";

export const doneStatus = (kind: OperationKind): EntityStatus =>
  kind === "Hash" ? "Hashed" : kind === "Transfer" ? "Transferred" : "Verified";

export const failedStatus = (kind: OperationKind): EntityStatus =>
  kind === "Hash" ? "HashFailed" : kind === "Transfer" ? "TransferFailed" : "VerifyFailed";

// =============================================================================
// Scope
// =============================================================================

/**
 * What a run covers. Sources and targets are named by path or alias; `through`
 * is the last stage included, and every upstream stage comes along with it.
 */
export type RunScope = Data.TaggedEnum<{
  All: { readonly through: OperationKind };
  Selection: { readonly source: string; readonly target?: string; readonly through: OperationKind };
}>;

export const RunScope = Data.taggedEnum<RunScope>();

export interface ResolvedScope {
  readonly through: OperationKind;
  readonly sourceId?: string;
  readonly targetId?: string;
}

export const inScope = (operation: Operation, scope: ResolvedScope): boolean => {
  if (KIND_RANK[operation.kind] > KIND_RANK[scope.through]) return false;
  if (scope.sourceId !== undefined && operation.sourceId !== scope.sourceId) return false;
  if (scope.targetId !== undefined && operation.kind !== "Hash" && operation.targetId !== scope.targetId) {
    return false;
  }
  return true;
};

export const describeOperation = (operation: Operation, state: BackupState): string => {
  const source = findSource(state, operation.sourceId)?.path ?? operation.sourceId;
  const target =
    operation.targetId !== undefined
      ? findTarget(state, operation.targetId)?.path ?? operation.targetId
      : undefined;

  switch (operation.kind) {
    case "Hash":
      return `hash ${source}`;
    case "Transfer":
      return `transfer ${source} -> ${target ?? "?"}`;
    case "Verify":
      return `verify ${target ?? "?"}`;
  }
};
