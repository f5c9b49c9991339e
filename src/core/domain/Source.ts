export type SourceStatus = "Unhashed" | "Hashing" | "Hashed" | "HashFailed";

export const DEFAULT_HASH_ALGORITHM = "sha512";

export interface Source {
  readonly id: string;
  readonly seq: number;
  readonly path: string;
  readonly alias?: string;
  readonly status: SourceStatus;
  readonly hashAlgorithm: string;
  /** Write `<name>.<algorithm>` instead of the multi-field `.cshd` file. */
  readonly singleHash: boolean;
  readonly allowlist: readonly string[];
  readonly blocklist: readonly string[];
  readonly hashFile?: string;
  readonly hashLogFile?: string;
  readonly targetIds: readonly string[];
  readonly error?: string;
}

export interface NewSource {
  readonly path: string;
  readonly alias?: string;
  readonly hashAlgorithm?: string;
  readonly singleHash?: boolean;
  readonly allowlist?: readonly string[];
  readonly blocklist?: readonly string[];
}

export interface SourcePatch {
  readonly alias?: string;
  readonly hashAlgorithm?: string;
  readonly singleHash?: boolean;
  readonly allowlist?: readonly string[];
  readonly blocklist?: readonly string[];
}

export const sourceLabel = (source: Source): string =>
  source.alias !== undefined ? `${source.alias} (${source.path})` : source.path;
