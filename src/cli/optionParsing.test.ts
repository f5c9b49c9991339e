import { Either } from "effect";
import { describe, expect, test } from "vitest";

import {
  normalizeKey,
  parseBool,
  parseSourcePatch,
  parseTargetPatch,
  parseThrough,
  splitCommaSeparated,
  toRunScope
} from "./optionParsing";

const right = <A, E>(result: Either.Either<A, E>): A | undefined => Either.getOrUndefined(result);
const left = <A, E>(result: Either.Either<A, E>): E | undefined =>
  Either.isLeft(result) ? result.left : undefined;

describe("splitCommaSeparated", () => {
  test("trims and drops empty entries", () => {
    expect(splitCommaSeparated(" *.tmp, ,cache/ ,")).toEqual(["*.tmp", "cache/"]);
  });

  test("undefined gives nothing", () => {
    expect(splitCommaSeparated(undefined)).toEqual([]);
  });
});

describe("parseBool / normalizeKey", () => {
  test.each([
    ["y", true],
    ["YES", true],
    ["true", true],
    ["1", true],
    ["n", false],
    ["off", false]
  ])("%s -> %s", (value, expected) => {
    expect(parseBool(value)).toBe(expected);
  });

  test("underscores and case do not matter", () => {
    expect(normalizeKey("Hash_Algorithm")).toBe("hash-algorithm");
  });
});

describe("parseSourcePatch", () => {
  test("single values", () => {
    expect(right(parseSourcePatch("alias", ["docs"]))).toEqual({ alias: "docs" });
    expect(right(parseSourcePatch("hash_algorithm", ["SHA256"]))).toEqual({ hashAlgorithm: "sha256" });
    expect(right(parseSourcePatch("single-hash", ["yes"]))).toEqual({ singleHash: true });
  });

  test("pattern lists accept several values and comma lists", () => {
    expect(right(parseSourcePatch("blocklist", ["*.tmp,cache/", "Thumbs.db"]))).toEqual({
      blocklist: ["*.tmp", "cache/", "Thumbs.db"]
    });
    expect(right(parseSourcePatch("allowlist", []))).toEqual({ allowlist: [] });
  });

  test("a single-valued field rejects zero or two values", () => {
    expect(left(parseSourcePatch("alias", []))?.reason).toBe("needs a value");
    expect(left(parseSourcePatch("alias", ["a", "b"]))?.reason).toBe("takes a single value");
  });

  test("unknown field", () => {
    expect(left(parseSourcePatch("colour", ["red"]))).toMatchObject({
      option: "colour",
      reason: "unknown source field, expected one of alias, hash-algorithm, single-hash, allowlist, blocklist"
    });
  });
});

describe("parseTargetPatch", () => {
  test("verify flag", () => {
    expect(right(parseTargetPatch("verify", ["no"]))).toEqual({ verify: false });
  });

  test("source-only fields are unknown on a target", () => {
    expect(left(parseTargetPatch("blocklist", ["x"]))?.reason).toBe("unknown target field, expected one of alias, verify");
  });
});

describe("parseThrough / toRunScope", () => {
  test("run is an alias for verify", () => {
    expect(right(parseThrough("run"))).toBe("Verify");
    expect(right(parseThrough(" Transfer "))).toBe("Transfer");
    expect(left(parseThrough("copy"))?.reason).toBe("expected one of hash, transfer, verify");
  });

  test("no selection means everything", () => {
    expect(right(toRunScope("Hash", undefined, undefined))).toMatchObject({ _tag: "All", through: "Hash" });
  });

  test("a selection keeps the source and target", () => {
    expect(right(toRunScope("Verify", "docs", "/mnt/disk2/docs"))).toMatchObject({
      _tag: "Selection",
      source: "docs",
      target: "/mnt/disk2/docs",
      through: "Verify"
    });
  });

  test("--target needs --source", () => {
    expect(left(toRunScope("Verify", undefined, "/mnt/disk2/docs"))).toMatchObject({
      option: "--target",
      reason: "needs --source to say whose target it is"
    });
  });
});
