import * as path from "node:path";

/** Absolute path with `.`/`..` collapsed and no trailing separator. */
export const normalizePath = (input: string): string => {
  const resolved = path.resolve(input);
  return resolved.length > 1 && resolved.endsWith(path.sep) ? resolved.slice(0, -1) : resolved;
};

/**
 * Turns a path into something usable as a single file name:
 * `/mnt/disk1/photos 2019` becomes `mnt_disk1_photos_2019`.
 */
export const sanitizeFilename = (input: string): string => {
  const cleaned = input
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
  return cleaned.length > 0 ? cleaned : "root";
};

const pad = (value: number): string => String(value).padStart(2, "0");

/** Local time as `YYYY-MM-DDTHH-MM-SS`, safe inside file names. */
export const fileTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
  `T${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;

/** Relative path using `/` regardless of platform. */
export const toPosixRelative = (root: string, absolute: string): string =>
  path.relative(root, absolute).split(path.sep).join("/");

export const isWithin = (parent: string, child: string): boolean => {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
};
