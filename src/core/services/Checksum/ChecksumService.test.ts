/**
 * ChecksumService against a real temporary directory.
 */

import { Effect, Either, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { cp, mkdir, mkdtemp, readFile, rm, unlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";

import { ChecksumServiceLive, ChecksumServiceTag, listFiles, type ChecksumService } from "./ChecksumService";

const HELLO_SHA256 = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";

let testDir: string;
let docs: string;

beforeAll(async () => {
  testDir = await mkdtemp(join(tmpdir(), "checksum-test-"));
  docs = join(testDir, "docs");
  await mkdir(join(docs, "sub"), { recursive: true });
  await writeFile(join(docs, "a.txt"), "hello");
  await writeFile(join(docs, "sub", "b.txt"), "world");
  await writeFile(join(docs, "skip.log"), "noise");
});

afterAll(async () => {
  await rm(testDir, { recursive: true, force: true });
});

const withChecksums = <A, E>(use: (service: ChecksumService) => Effect.Effect<A, E>) =>
  pipe(
    ChecksumServiceTag,
    Effect.flatMap(use),
    Effect.provide(ChecksumServiceLive),
    Effect.provide(NodeContext.layer),
    Effect.runPromise
  );

describe("ChecksumService (real IO)", () => {
  test("hashTree writes a checksum file inside the source and a log beside the state", async () => {
    const outcome = await withChecksums((svc) =>
      svc.hashTree({
        root: docs,
        algorithm: "sha256",
        singleHash: true,
        allowlist: [],
        blocklist: ["*.log"],
        logDirectory: testDir
      })
    );

    expect(outcome.fileCount).toBe(2);
    expect(basename(outcome.hashFile)).toMatch(/^docs_bh_\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}\.sha256$/);
    expect(basename(outcome.logFile)).toMatch(/_inc_.*\.log$/);

    const lines = (await readFile(outcome.hashFile, "utf8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe(`${HELLO_SHA256} *a.txt`);
    expect(lines[1]?.endsWith(" *sub/b.txt")).toBe(true);

    await unlink(outcome.hashFile);
  });

  test("allowlist limits hashing to matching files", async () => {
    const outcome = await withChecksums((svc) =>
      svc.hashTree({
        root: docs,
        algorithm: "sha256",
        singleHash: false,
        allowlist: ["sub/"],
        blocklist: [],
        logDirectory: testDir
      })
    );

    const text = await readFile(outcome.hashFile, "utf8");
    expect(outcome.fileCount).toBe(1);
    expect(text.trim().endsWith(" sub/b.txt")).toBe(true);

    await unlink(outcome.hashFile);
  });

  test("verifyTree counts mismatches and missing files in a copy", async () => {
    const outcome = await withChecksums((svc) =>
      svc.hashTree({
        root: docs,
        algorithm: "sha512",
        singleHash: false,
        allowlist: [],
        blocklist: [],
        logDirectory: testDir
      })
    );
    const copy = join(testDir, "copy");
    await cp(docs, copy, { recursive: true });
    await writeFile(join(copy, "a.txt"), "tampered");
    await unlink(join(copy, "skip.log"));

    const result = await withChecksums((svc) =>
      svc.verifyTree({
        root: copy,
        hashFile: join(copy, basename(outcome.hashFile)),
        logDirectory: testDir
      })
    );

    expect(result).toMatchObject({ filesChecked: 3, crcErrors: 1, missing: 1, errors: 0 });
    const log = await readFile(result.logFile, "utf8");
    expect(log.split("\n")).toContain("CRC MISMATCH a.txt");
    expect(log.split("\n")).toContain("MISSING skip.log");
  });

  test("unknown algorithms are rejected before any work", async () => {
    const error = await withChecksums((svc) =>
      Effect.flip(
        svc.hashTree({
          root: docs,
          algorithm: "nope",
          singleHash: false,
          allowlist: [],
          blocklist: [],
          logDirectory: testDir
        })
      )
    );

    expect(error.reason).toBe('unsupported hash algorithm "nope"');
  });
});

describe("listFiles", () => {
  test("returns once the walk ends, skipping blocked directories", async () => {
    const tree = join(testDir, "tree");
    await mkdir(join(tree, "skip"), { recursive: true });
    await mkdir(join(tree, "keep"));
    await writeFile(join(tree, "x.txt"), "x");
    await writeFile(join(tree, "skip", "c.txt"), "c");
    await writeFile(join(tree, "keep", "d.txt"), "d");

    const files = await Effect.runPromise(Effect.timeout(listFiles(tree, [], ["skip/"]), "5 seconds"));

    expect(files.map((f) => f.relativePath)).toEqual(["keep/d.txt", "x.txt"]);
    expect(files.every((f) => f.mtime > 0)).toBe(true);
  });

  test("a missing root is a ChecksumError", async () => {
    const result = await Effect.runPromise(Effect.either(listFiles(join(testDir, "absent"), [], [])));

    expect(Either.isLeft(result) && result.left._tag).toBe("ChecksumError");
  });
});
