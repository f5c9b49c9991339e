import { Data, Either } from "effect";

import { normalizePath, isWithin } from "../lib/paths";
import {
  DEFAULT_HASH_ALGORITHM,
  type NewSource,
  type Source,
  type SourcePatch,
  type SourceStatus
} from "./Source";
import type { NewTarget, Target, TargetPatch, TargetStatus, VerifyResult } from "./Target";

export interface BackupState {
  readonly version: 1;
  readonly nextSeq: number;
  readonly sources: readonly Source[];
  readonly targets: readonly Target[];
}

export const emptyState: BackupState = {
  version: 1,
  nextSeq: 1,
  sources: [],
  targets: []
};

// =============================================================================
// Lookup
// =============================================================================

export type Resolution = Data.TaggedEnum<{
  Found: { readonly id: string };
  NotFound: {};
  AmbiguousAlias: { readonly ids: readonly string[] };
}>;

export const Resolution = Data.taggedEnum<Resolution>();

interface Addressable {
  readonly id: string;
  readonly path: string;
  readonly alias?: string;
}

/**
 * A reference matches an entity by normalized path or by alias. A reference that
 * is one entity's alias and another entity's path is ambiguous.
 */
const resolveIn = (entities: readonly Addressable[], reference: string): Resolution => {
  const asPath = normalizePath(reference);
  const ids = entities
    .filter((entity) => entity.path === asPath || entity.alias === reference)
    .map((entity) => entity.id);

  if (ids.length === 0) return Resolution.NotFound();
  const [only] = ids;
  if (ids.length === 1 && only !== undefined) return Resolution.Found({ id: only });
  return Resolution.AmbiguousAlias({ ids });
};

export const resolveSource = (state: BackupState, reference: string): Resolution =>
  resolveIn(state.sources, reference);

export const resolveTarget = (state: BackupState, sourceId: string, reference: string): Resolution =>
  resolveIn(targetsOf(state, sourceId), reference);

export const findSource = (state: BackupState, id: string): Source | undefined =>
  state.sources.find((source) => source.id === id);

export const findTarget = (state: BackupState, id: string): Target | undefined =>
  state.targets.find((target) => target.id === id);

export const targetsOf = (state: BackupState, sourceId: string): readonly Target[] =>
  state.targets.filter((target) => target.sourceId === sourceId).sort((a, b) => a.seq - b.seq);

// =============================================================================
// Registration
// =============================================================================

const replaceSource = (state: BackupState, next: Source): BackupState => ({
  ...state,
  sources: state.sources.map((source) => (source.id === next.id ? next : source))
});

const replaceTarget = (state: BackupState, next: Target): BackupState => ({
  ...state,
  targets: state.targets.map((target) => (target.id === next.id ? next : target))
});

const sourceAliasTaken = (state: BackupState, alias: string, exceptId?: string): Source | undefined =>
  state.sources.find((source) => source.alias === alias && source.id !== exceptId);

const targetAliasTaken = (
  state: BackupState,
  sourceId: string,
  alias: string,
  exceptId?: string
): Target | undefined =>
  targetsOf(state, sourceId).find((target) => target.alias === alias && target.id !== exceptId);

export const addSource = (
  state: BackupState,
  input: NewSource
): Either.Either<readonly [Source, BackupState], string> => {
  const path = normalizePath(input.path);

  const existing = state.sources.find((source) => source.path === path);
  if (existing) {
    return Either.left(`source ${path} is already staged`);
  }

  if (input.alias !== undefined) {
    const holder = sourceAliasTaken(state, input.alias);
    if (holder) {
      return Either.left(`alias "${input.alias}" is already used by ${holder.path}`);
    }
  }

  const seq = state.nextSeq;
  const source: Source = {
    id: `src-${seq}`,
    seq,
    path,
    ...(input.alias !== undefined ? { alias: input.alias } : {}),
    status: "Unhashed",
    hashAlgorithm: input.hashAlgorithm ?? DEFAULT_HASH_ALGORITHM,
    singleHash: input.singleHash ?? false,
    allowlist: input.allowlist ?? [],
    blocklist: input.blocklist ?? [],
    targetIds: []
  };

  return Either.right([
    source,
    { ...state, nextSeq: seq + 1, sources: [...state.sources, source] }
  ] as const);
};

export const addTarget = (
  state: BackupState,
  sourceId: string,
  input: NewTarget
): Either.Either<readonly [Target, BackupState], string> => {
  const source = findSource(state, sourceId);
  if (!source) {
    return Either.left(`source ${sourceId} does not exist`);
  }

  const path = normalizePath(input.path);
  if (isWithin(source.path, path)) {
    return Either.left(`target ${path} lies inside its source ${source.path}`);
  }

  const siblings = targetsOf(state, sourceId);
  if (siblings.some((target) => target.path === path)) {
    return Either.left(`target ${path} is already attached to ${source.path}`);
  }

  if (input.alias !== undefined) {
    const holder = targetAliasTaken(state, sourceId, input.alias);
    if (holder) {
      return Either.left(`alias "${input.alias}" is already used by target ${holder.path}`);
    }
  }

  const seq = state.nextSeq;
  const target: Target = {
    id: `tgt-${seq}`,
    seq,
    sourceId,
    path,
    ...(input.alias !== undefined ? { alias: input.alias } : {}),
    status: "Pending",
    verify: input.verify ?? true
  };

  return Either.right([
    target,
    {
      ...replaceSource(state, { ...source, targetIds: [...source.targetIds, target.id] }),
      nextSeq: seq + 1,
      targets: [...state.targets, target]
    }
  ] as const);
};

export const updateSource = (
  state: BackupState,
  sourceId: string,
  patch: SourcePatch
): Either.Either<readonly [Source, BackupState], string> => {
  const source = findSource(state, sourceId);
  if (!source) return Either.left(`source ${sourceId} does not exist`);
  if (source.status === "Hashing") return Either.left(`source ${source.path} is being hashed`);

  if (patch.alias !== undefined) {
    const holder = sourceAliasTaken(state, patch.alias, sourceId);
    if (holder) return Either.left(`alias "${patch.alias}" is already used by ${holder.path}`);
  }

  const next: Source = {
    ...source,
    ...(patch.alias !== undefined ? { alias: patch.alias } : {}),
    ...(patch.hashAlgorithm !== undefined ? { hashAlgorithm: patch.hashAlgorithm } : {}),
    ...(patch.singleHash !== undefined ? { singleHash: patch.singleHash } : {}),
    ...(patch.allowlist !== undefined ? { allowlist: patch.allowlist } : {}),
    ...(patch.blocklist !== undefined ? { blocklist: patch.blocklist } : {})
  };
  return Either.right([next, replaceSource(state, next)] as const);
};

export const updateTarget = (
  state: BackupState,
  targetId: string,
  patch: TargetPatch
): Either.Either<readonly [Target, BackupState], string> => {
  const target = findTarget(state, targetId);
  if (!target) return Either.left(`target ${targetId} does not exist`);

  if (patch.alias !== undefined) {
    const holder = targetAliasTaken(state, target.sourceId, patch.alias, targetId);
    if (holder) return Either.left(`alias "${patch.alias}" is already used by target ${holder.path}`);
  }
  if (patch.verify === false && target.status === "Verifying") {
    return Either.left(`target ${target.path} is being verified`);
  }

  const next: Target = {
    ...target,
    ...(patch.alias !== undefined ? { alias: patch.alias } : {}),
    ...(patch.verify !== undefined ? { verify: patch.verify } : {})
  };
  return Either.right([next, replaceTarget(state, next)] as const);
};

export const removeSource = (
  state: BackupState,
  sourceId: string
): Either.Either<readonly [Source, BackupState], string> => {
  const source = findSource(state, sourceId);
  if (!source) return Either.left(`source ${sourceId} does not exist`);

  const busy =
    source.status === "Hashing" ||
    targetsOf(state, sourceId).some(
      (target) => target.status === "Transferring" || target.status === "Verifying"
    );
  if (busy) return Either.left(`source ${source.path} has an operation in progress`);

  return Either.right([
    source,
    {
      ...state,
      sources: state.sources.filter((s) => s.id !== sourceId),
      targets: state.targets.filter((t) => t.sourceId !== sourceId)
    }
  ] as const);
};

// =============================================================================
// Transitions
// =============================================================================

export type EntityStatus = SourceStatus | TargetStatus;

export type TransitionEvidence = Data.TaggedEnum<{
  Plain: {};
  Hashed: { readonly hashFile: string; readonly hashLogFile: string };
  Verified: { readonly result: VerifyResult };
  Failed: { readonly cause: string; readonly result?: VerifyResult };
}>;

export const TransitionEvidence = Data.taggedEnum<TransitionEvidence>();

const SOURCE_EDGES: Record<SourceStatus, readonly SourceStatus[]> = {
  Unhashed: ["Hashing"],
  Hashing: ["Hashed", "HashFailed", "Unhashed"],
  Hashed: [],
  HashFailed: ["Unhashed"]
};

const TARGET_EDGES: Record<TargetStatus, readonly TargetStatus[]> = {
  Pending: ["Transferring"],
  Transferring: ["Transferred", "TransferFailed", "Pending"],
  Transferred: ["Verifying"],
  TransferFailed: ["Pending"],
  Verifying: ["Verified", "VerifyFailed", "Transferred"],
  Verified: [],
  VerifyFailed: ["Transferred"]
};

const isSourceStatus = (status: EntityStatus): status is SourceStatus =>
  Object.hasOwn(SOURCE_EDGES, status);

const isTargetStatus = (status: EntityStatus): status is TargetStatus =>
  Object.hasOwn(TARGET_EDGES, status);

const transitionSource = (
  state: BackupState,
  source: Source,
  to: SourceStatus,
  evidence: TransitionEvidence
): Either.Either<BackupState, string> => {
  if (!SOURCE_EDGES[source.status].includes(to)) {
    return Either.left(`source ${source.path} cannot move from ${source.status} to ${to}`);
  }

  const { error: _previous, ...rest } = source;
  const next: Source = TransitionEvidence.$match(evidence, {
    Plain: () => (to === "Hashing" ? { ...rest, status: to } : { ...source, status: to }),
    Hashed: ({ hashFile, hashLogFile }) => ({ ...rest, status: to, hashFile, hashLogFile }),
    Verified: () => ({ ...source, status: to }),
    Failed: ({ cause }) => ({ ...source, status: to, error: cause })
  });
  return Either.right(replaceSource(state, next));
};

const transitionTarget = (
  state: BackupState,
  target: Target,
  to: TargetStatus,
  evidence: TransitionEvidence
): Either.Either<BackupState, string> => {
  if (!TARGET_EDGES[target.status].includes(to)) {
    return Either.left(`target ${target.path} cannot move from ${target.status} to ${to}`);
  }

  const source = findSource(state, target.sourceId);
  if ((to === "Transferring" || to === "Transferred") && source?.status !== "Hashed") {
    return Either.left(`target ${target.path} cannot be transferred before its source is hashed`);
  }
  if (to === "Verifying" && !target.verify) {
    return Either.left(`target ${target.path} has verification disabled`);
  }

  const { error: _previous, ...rest } = target;
  const next: Target = TransitionEvidence.$match(evidence, {
    Plain: () =>
      to === "Transferring" || to === "Verifying" ? { ...rest, status: to } : { ...target, status: to },
    Hashed: () => ({ ...target, status: to }),
    Verified: ({ result }) => ({ ...rest, status: to, verified: result }),
    Failed: ({ cause, result }) => ({
      ...target,
      status: to,
      error: cause,
      ...(result !== undefined ? { verified: result } : {})
    })
  });
  return Either.right(replaceTarget(state, next));
};

export const applyTransition = (
  state: BackupState,
  entityId: string,
  to: EntityStatus,
  evidence: TransitionEvidence
): Either.Either<BackupState, string> => {
  const source = findSource(state, entityId);
  if (source) {
    return isSourceStatus(to)
      ? transitionSource(state, source, to, evidence)
      : Either.left(`${to} is not a source status`);
  }

  const target = findTarget(state, entityId);
  if (target) {
    return isTargetStatus(to)
      ? transitionTarget(state, target, to, evidence)
      : Either.left(`${to} is not a target status`);
  }

  return Either.left(`entity ${entityId} does not exist`);
};

// =============================================================================
// Recovery
// =============================================================================

export interface PendingReset {
  readonly entityId: string;
  readonly from: EntityStatus;
  readonly to: EntityStatus;
}

/** Statuses left behind by a process that stopped in the middle of a stage. */
export const interruptedWork = (state: BackupState): readonly PendingReset[] => [
  ...state.sources
    .filter((source) => source.status === "Hashing")
    .map((source) => ({ entityId: source.id, from: source.status, to: "Unhashed" as const })),
  ...state.targets.flatMap((target): PendingReset[] => {
    if (target.status === "Transferring") {
      return [{ entityId: target.id, from: target.status, to: "Pending" }];
    }
    if (target.status === "Verifying") {
      return [{ entityId: target.id, from: target.status, to: "Transferred" }];
    }
    return [];
  })
];

/** Resets that put failed entities back in the queue. */
export const failedWork = (state: BackupState): readonly PendingReset[] => [
  ...state.sources
    .filter((source) => source.status === "HashFailed")
    .map((source) => ({ entityId: source.id, from: source.status, to: "Unhashed" as const })),
  ...state.targets.flatMap((target): PendingReset[] => {
    if (target.status === "TransferFailed") {
      return [{ entityId: target.id, from: target.status, to: "Pending" }];
    }
    if (target.status === "VerifyFailed") {
      return [{ entityId: target.id, from: target.status, to: "Transferred" }];
    }
    return [];
  })
];
