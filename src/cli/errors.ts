import { Match } from "effect";

import type { ChecksumError } from "@services/Checksum";
import type { CopyBackendUnavailable, CopyFailed } from "@services/Copy";
import type { ResourceError } from "@services/DiskResource";
import type { ShellError } from "@services/ShellService";
import type { HashFailed, TransferFailed, VerifyFailed } from "@services/StageExecutor";
import type { PersistenceError } from "@services/StateStorage";
import type { AliasConflictError, ConflictError, NotFoundError } from "@services/StateStore";
import type { InvalidOption } from "./optionParsing";

type StoreError = ConflictError | NotFoundError | AliasConflictError | PersistenceError;

type PipelineError = HashFailed | TransferFailed | VerifyFailed;

type InfraError = ResourceError | ChecksumError | CopyBackendUnavailable | CopyFailed | ShellError;

type DomainError = StoreError | PipelineError | InfraError | InvalidOption;

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  diskUnresolvable: (path: string, reason: string) =>
    new AppError(
      "Cannot determine disk",
      `Could not tell which disk "${path}" lives on: ${reason}`,
      `Check that the disk is mounted and that you can read the path or one of its parents.`
    ),

  conflict: (entity: string, reason: string) =>
    new AppError(
      "Change rejected",
      `${entity}: ${reason}`,
      `Run 'coldstage status' to see what is staged and the state of each source and target.`
    ),

  notFound: (reference: string) =>
    new AppError(
      "Not staged",
      `Nothing staged matches "${reference}".`,
      `Use the full path or the alias shown by 'coldstage status'.`
    ),

  ambiguousAlias: (reference: string, matches: readonly string[]) =>
    new AppError(
      "Ambiguous name",
      `"${reference}" matches more than one entry: ${matches.join(", ")}.`,
      `Use the full path instead of the alias.`
    ),

  stateUnreadable: (path: string, reason: string) =>
    new AppError(
      "Cannot read state file",
      `Could not load "${path}": ${reason}`,
      `Fix or move the file aside; a missing state file starts empty.`
    ),

  stateUnwritable: (path: string, reason: string) =>
    new AppError(
      "Cannot save state file",
      `Could not write "${path}": ${reason}`,
      `Check that you have write permission to the directory, or choose another with --state-file.`
    ),

  stageFailed: (operationId: string, reason: string) =>
    new AppError(
      "Operation failed",
      `${operationId}: ${reason}`,
      `The failure is recorded in the state file. Fix the cause and run again with --retry-failed.`
    ),

  checksumFailed: (path: string, reason: string) =>
    new AppError(
      "Checksum failed",
      `Could not checksum "${path}": ${reason}`,
      `Check that the files are readable and the hash algorithm is supported.`
    ),

  copyFailed: (source: string, destination: string, reason: string) =>
    new AppError(
      "Copy failed",
      `Could not copy "${source}" to "${destination}": ${reason}`,
      `Check disk space and write permission on the target disk.`
    ),

  backendUnavailable: (reason: string) =>
    new AppError(
      "Copy backend unavailable",
      reason,
      `Install rsync, or use --copier fs for a plain filesystem copy.`
    ),

  commandFailed: (command: string, message: string) =>
    new AppError("Command failed", `${command}: ${message}`, `Check that ${command} is installed and on PATH.`),

  invalidOption: (option: string, reason: string) =>
    new AppError("Invalid option", `${option}: ${reason}`, `Run with --help to see the accepted values.`),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`),

  permissionDenied: (message: string) =>
    new AppError(
      "Permission denied",
      message,
      `Check that you have the required permissions. You may need to run with elevated privileges.`
    )
};

const matchDomainError = Match.typeTags<DomainError>()({
  ConflictError: (e) => errors.conflict(e.entity, e.reason),
  NotFoundError: (e) => errors.notFound(e.reference),
  AliasConflictError: (e) => errors.ambiguousAlias(e.reference, e.matches),
  PersistenceError: (e) =>
    e.operation === "read" ? errors.stateUnreadable(e.path, e.reason) : errors.stateUnwritable(e.path, e.reason),

  HashFailed: (e) => errors.stageFailed(e.operationId, e.reason),
  TransferFailed: (e) => errors.stageFailed(e.operationId, e.reason),
  VerifyFailed: (e) => errors.stageFailed(e.operationId, e.reason),

  ResourceError: (e) => errors.diskUnresolvable(e.path, e.reason),
  ChecksumError: (e) => errors.checksumFailed(e.path, e.reason),
  CopyBackendUnavailable: (e) => errors.backendUnavailable(e.reason),
  CopyFailed: (e) => errors.copyFailed(e.source, e.destination, e.reason),
  ShellError: (e) => errors.commandFailed(e.command, e.message),

  InvalidOption: (e) => errors.invalidOption(e.option, e.reason)
});

const DOMAIN_TAGS: ReadonlySet<string> = new Set([
  "ConflictError",
  "NotFoundError",
  "AliasConflictError",
  "PersistenceError",
  "HashFailed",
  "TransferFailed",
  "VerifyFailed",
  "ResourceError",
  "ChecksumError",
  "CopyBackendUnavailable",
  "CopyFailed",
  "ShellError",
  "InvalidOption"
]);

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" && e !== null && "_tag" in e && typeof e._tag === "string" && DOMAIN_TAGS.has(e._tag);

const isPermissionError = (message: string): boolean =>
  message.toLowerCase().includes("permission denied") ||
  message.toLowerCase().includes("eacces") ||
  message.toLowerCase().includes("operation not permitted") ||
  message.toLowerCase().includes("eperm");

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return isPermissionError(error.message)
      ? errors.permissionDenied(error.message)
      : errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const {
  diskUnresolvable,
  conflict,
  notFound,
  ambiguousAlias,
  stateUnreadable,
  stateUnwritable,
  stageFailed,
  checksumFailed,
  copyFailed,
  backendUnavailable,
  commandFailed,
  invalidOption,
  unexpected,
  permissionDenied
} = errors;
