import { Data, Either } from "effect";

import { RunScope, type OperationKind } from "@domain/Operation";
import type { SourcePatch } from "@domain/Source";
import type { TargetPatch } from "@domain/Target";

export class InvalidOption extends Data.TaggedError("InvalidOption")<{
  readonly option: string;
  readonly reason: string;
}> {}

export const splitCommaSeparated = (value: string | undefined): string[] =>
  value
    ? value
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    : [];

export const parseBool = (value: string): boolean =>
  ["y", "yes", "true", "1"].includes(value.trim().toLowerCase());

/** `hash_algorithm` and `hash-algorithm` name the same field. */
export const normalizeKey = (key: string): string => key.trim().toLowerCase().replace(/_/g, "-");

const single = (key: string, values: readonly string[]): Either.Either<string, InvalidOption> => {
  const [value, ...rest] = values;
  if (value === undefined) return Either.left(new InvalidOption({ option: key, reason: "needs a value" }));
  if (rest.length > 0) {
    return Either.left(new InvalidOption({ option: key, reason: "takes a single value" }));
  }
  return Either.right(value);
};

const patterns = (values: readonly string[]): string[] => values.flatMap((v) => splitCommaSeparated(v));

export const SOURCE_KEYS = ["alias", "hash-algorithm", "single-hash", "allowlist", "blocklist"] as const;
export const TARGET_KEYS = ["alias", "verify"] as const;

export const parseSourcePatch = (
  key: string,
  values: readonly string[]
): Either.Either<SourcePatch, InvalidOption> => {
  const name = normalizeKey(key);
  switch (name) {
    case "alias":
      return Either.map(single(name, values), (alias) => ({ alias }));
    case "hash-algorithm":
      return Either.map(single(name, values), (hashAlgorithm) => ({ hashAlgorithm: hashAlgorithm.toLowerCase() }));
    case "single-hash":
      return Either.map(single(name, values), (value) => ({ singleHash: parseBool(value) }));
    case "allowlist":
      return Either.right({ allowlist: patterns(values) });
    case "blocklist":
      return Either.right({ blocklist: patterns(values) });
    default:
      return Either.left(
        new InvalidOption({ option: key, reason: `unknown source field, expected one of ${SOURCE_KEYS.join(", ")}` })
      );
  }
};

export const parseTargetPatch = (
  key: string,
  values: readonly string[]
): Either.Either<TargetPatch, InvalidOption> => {
  const name = normalizeKey(key);
  switch (name) {
    case "alias":
      return Either.map(single(name, values), (alias) => ({ alias }));
    case "verify":
      return Either.map(single(name, values), (value) => ({ verify: parseBool(value) }));
    default:
      return Either.left(
        new InvalidOption({ option: key, reason: `unknown target field, expected one of ${TARGET_KEYS.join(", ")}` })
      );
  }
};

export const parseThrough = (value: string): Either.Either<OperationKind, InvalidOption> => {
  switch (value.trim().toLowerCase()) {
    case "hash":
      return Either.right<OperationKind>("Hash");
    case "transfer":
      return Either.right<OperationKind>("Transfer");
    case "verify":
    case "run":
      return Either.right<OperationKind>("Verify");
    default:
      return Either.left(
        new InvalidOption({ option: value, reason: "expected one of hash, transfer, verify" })
      );
  }
};

export const toRunScope = (
  through: OperationKind,
  source: string | undefined,
  target: string | undefined
): Either.Either<RunScope, InvalidOption> => {
  if (source === undefined) {
    return target === undefined
      ? Either.right(RunScope.All({ through }))
      : Either.left(new InvalidOption({ option: "--target", reason: "needs --source to say whose target it is" }));
  }
  return Either.right(
    RunScope.Selection(target === undefined ? { source, through } : { source, target, through })
  );
};
