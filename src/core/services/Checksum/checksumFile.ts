import { Either } from "effect";

export interface ChecksumEntry {
  readonly relativePath: string;
  readonly algorithm: string;
  readonly digest: string;
  /** Seconds since the epoch; only the `.cshd` format records it. */
  readonly mtime?: number;
}

export type ChecksumFormat = "cshd" | "single";

const CSHD_LINE = /^([^,]*),([^,]+),([0-9a-fA-F]+) (.+)$/;
const SINGLE_LINE = /^([0-9a-fA-F]+) [ *](.+)$/;

/** Files written by a previous hash of the same directory. */
export const CHECKSUM_FILE_NAME = /_bh_\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}\.[A-Za-z0-9-]+$/;

export const checksumFileName = (
  directoryName: string,
  timestamp: string,
  format: ChecksumFormat,
  algorithm: string
): string => `${directoryName}_bh_${timestamp}.${format === "cshd" ? "cshd" : algorithm}`;

/** Format and algorithm implied by a checksum file's extension. */
export const formatOf = (fileName: string): { readonly format: ChecksumFormat; readonly algorithm?: string } => {
  const extension = fileName.slice(fileName.lastIndexOf(".") + 1);
  return extension === "cshd" ? { format: "cshd" } : { format: "single", algorithm: extension };
};

export const formatChecksumFile = (entries: readonly ChecksumEntry[], format: ChecksumFormat): string =>
  entries
    .map((entry) =>
      format === "cshd"
        ? `${(entry.mtime ?? 0).toFixed(6)},${entry.algorithm},${entry.digest} ${entry.relativePath}`
        : `${entry.digest} *${entry.relativePath}`
    )
    .map((line) => `${line}\n`)
    .join("");

export const parseChecksumFile = (
  text: string,
  fileName: string
): Either.Either<readonly ChecksumEntry[], string> => {
  const { format, algorithm } = formatOf(fileName);
  const entries: ChecksumEntry[] = [];
  const lines = text.split("\n");

  for (const [index, line] of lines.entries()) {
    if (line.trim() === "") continue;

    if (format === "cshd") {
      const match = CSHD_LINE.exec(line);
      const [, mtime, lineAlgorithm, digest, relativePath] = match ?? [];
      if (!match || lineAlgorithm === undefined || digest === undefined || relativePath === undefined) {
        return Either.left(`line ${index + 1} is not a checksum entry`);
      }
      entries.push({
        relativePath,
        algorithm: lineAlgorithm,
        digest: digest.toLowerCase(),
        ...(mtime ? { mtime: Number(mtime) } : {})
      });
    } else {
      const match = SINGLE_LINE.exec(line);
      const [, digest, relativePath] = match ?? [];
      if (!match || digest === undefined || relativePath === undefined || algorithm === undefined) {
        return Either.left(`line ${index + 1} is not a checksum entry`);
      }
      entries.push({ relativePath, algorithm, digest: digest.toLowerCase() });
    }
  }

  return Either.right(entries);
};
