import { describe, expect, test } from "vitest";

import type { BackupState } from "../../domain/BackupState";
import type { Operation } from "../../domain/Operation";
import type { RunReport } from "../../domain/RunReport";
import type { Source } from "../../domain/Source";
import type { Target, VerifyResult } from "../../domain/Target";
import { formatReport, formatSourceStatus, sourceFields, targetFields } from "./LoggerService";

const source: Source = {
  id: "src-1",
  seq: 1,
  path: "/data/docs",
  alias: "docs",
  status: "Hashed",
  hashAlgorithm: "sha512",
  singleHash: false,
  allowlist: [],
  blocklist: ["*.tmp"],
  hashFile: "/data/docs/docs_bh_2024-01-02T03-04-05.cshd",
  targetIds: ["tgt-2", "tgt-3"]
};

const clean: VerifyResult = { filesChecked: 3, crcErrors: 0, missing: 0, errors: 0, logFile: "/mnt/disk2/v.log" };

const verified: Target = {
  id: "tgt-2",
  seq: 2,
  sourceId: "src-1",
  path: "/mnt/disk2/docs",
  status: "Verified",
  verify: true,
  verified: clean
};

const failed: Target = {
  id: "tgt-3",
  seq: 3,
  sourceId: "src-1",
  path: "/mnt/disk3/docs",
  alias: "s2",
  status: "TransferFailed",
  verify: false,
  error: "no space left"
};

const state: BackupState = { version: 1, nextSeq: 4, sources: [source], targets: [verified, failed] };

const op = (id: string, kind: Operation["kind"], targetId?: string): Operation => ({
  id,
  kind,
  sourceId: "src-1",
  targetId,
  status: "Done",
  prerequisites: [],
  seq: 1
});

describe("formatSourceStatus", () => {
  test("lists the source settings and every target", () => {
    expect(formatSourceStatus(state, source)).toEqual([
      "docs (/data/docs)",
      "   hash: Hashed (sha512, cshd)",
      "   checksum file: /data/docs/docs_bh_2024-01-02T03-04-05.cshd",
      "   block: *.tmp",
      "   → /mnt/disk2/docs: Verified",
      "      verified: 3 files, 0 CRC errors, 0 missing, 0 read errors",
      "   → s2 (/mnt/disk3/docs): TransferFailed (no verify)",
      "      error: no space left"
    ]);
  });
});

describe("formatReport", () => {
  test("counts, failures, skips and verification totals", () => {
    const report: RunReport = {
      completed: [op("verify:tgt-2", "Verify", "tgt-2")],
      alreadyDone: [op("hash:src-1", "Hash"), op("transfer:tgt-2", "Transfer", "tgt-2")],
      failed: [{ operation: op("transfer:tgt-3", "Transfer", "tgt-3"), cause: "no space left" }],
      skipped: [{ operation: op("verify:tgt-3", "Verify", "tgt-3"), blockedBy: "transfer:tgt-3" }],
      pending: [],
      stopped: false,
      verifySummary: { filesChecked: 3, crcErrors: 0, missing: 0, errors: 0 },
      verifications: [{ targetId: "tgt-2", path: "/mnt/disk2/docs", result: clean }]
    };

    expect(formatReport(report, state)).toEqual([
      "📊 Run summary:",
      "   Completed: 1",
      "   Already done: 2",
      "   Failed: 1",
      "   Skipped: 1",
      "   ❌ transfer /data/docs -> /mnt/disk3/docs: no space left",
      "   ⏭️  verify /mnt/disk3/docs (blocked by transfer:tgt-3)",
      "",
      "🔍 Verification:",
      "   3 files checked, 0 CRC errors, 0 missing, 0 read errors",
      "   /mnt/disk2/docs: 3 files, 0 CRC errors, 0 missing, 0 read errors (log: /mnt/disk2/v.log)"
    ]);
  });
});

describe("modify fields", () => {
  test("empty and unset values read as none", () => {
    expect(sourceFields(source)).toEqual([
      ["alias", "docs"],
      ["hash-algorithm", "sha512"],
      ["single-hash", "false"],
      ["allowlist", "none"],
      ["blocklist", "*.tmp"]
    ]);
    expect(targetFields(verified)).toEqual([
      ["alias", "none"],
      ["verify", "true"]
    ]);
  });
});
