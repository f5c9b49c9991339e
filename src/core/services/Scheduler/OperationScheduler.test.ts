import { Effect, Fiber, Layer, Queue, pipe } from "effect";
import { describe, expect, test } from "vitest";

import { TransitionEvidence } from "@domain/BackupState";
import { RunScope, type Operation } from "@domain/Operation";
import { StateStoreLive, StateStoreTag } from "@services/StateStore";
import { createServiceLayer, createTestContext, intervals, type TestContext } from "../../../test/TestContext";
import {
  makeSchedulerControl,
  OperationSchedulerTag,
  requestStop,
  SchedulerSignal,
  type RunProgress
} from "./OperationScheduler";

// =============================================================================
// Helpers
// =============================================================================

type Services = Layer.Layer.Success<ReturnType<typeof createServiceLayer>>;

const setup = (): TestContext => {
  const ctx = createTestContext();
  ctx.addMount("/data", 1);
  ctx.addMount("/mnt/disk2", 2);
  ctx.addMount("/mnt/disk3", 3);
  return ctx;
};

const seed = <E>(ctx: TestContext, build: Effect.Effect<unknown, E, StateStoreTag>) =>
  Effect.runPromise(pipe(build, Effect.provide(pipe(StateStoreLive, Layer.provide(ctx.layer)))));

const run = <A, E>(ctx: TestContext, effect: Effect.Effect<A, E, Services>) =>
  Effect.runPromise(pipe(effect, Effect.provide(createServiceLayer(ctx))));

/** Stages /data/docs (alias "docs") with one target per path: tgt-2, tgt-3, ... */
const stageDocs = (...targets: string[]) =>
  Effect.gen(function* () {
    const store = yield* StateStoreTag;
    const source = yield* store.addSource({ path: "/data/docs", alias: "docs" });
    for (const path of targets) yield* store.addTarget(source.id, { path });
  });

const runAll = (through: "Hash" | "Transfer" | "Verify" = "Verify") =>
  Effect.flatMap(OperationSchedulerTag, (scheduler) => scheduler.run(RunScope.All({ through })));

const ids = (operations: readonly Operation[]) => operations.map((op) => op.id);
const sortedIds = (operations: readonly Operation[]) => ids(operations).sort();
const starts = (ctx: TestContext) =>
  ctx.timeline.filter((e) => e.event === "start").map((e) => e.operationId);
const targetStatus = (ctx: TestContext, id: string) =>
  ctx.storage.state.targets.find((t) => t.id === id)?.status;

// =============================================================================
// Ordering and exclusivity
// =============================================================================

describe("OperationScheduler ordering", () => {
  test("runs every stage after its prerequisite and finishes the pipeline", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs("/mnt/disk2/docs", "/mnt/disk3/docs"));

    const report = await run(ctx, runAll());

    expect(sortedIds(report.completed)).toEqual([
      "hash:src-1",
      "transfer:tgt-2",
      "transfer:tgt-3",
      "verify:tgt-2",
      "verify:tgt-3"
    ]);
    expect(report.failed).toEqual([]);
    expect(report.stopped).toBe(false);
    expect(report.verifySummary).toEqual({ filesChecked: 6, crcErrors: 0, missing: 0, errors: 0 });

    const spans = intervals(ctx.timeline);
    const span = (id: string) => spans.get(id) ?? { start: -1, end: -1 };
    expect(span("hash:src-1").end).toBeLessThan(span("transfer:tgt-2").start);
    expect(span("hash:src-1").end).toBeLessThan(span("transfer:tgt-3").start);
    expect(span("transfer:tgt-2").end).toBeLessThan(span("verify:tgt-2").start);
    expect(span("transfer:tgt-3").end).toBeLessThan(span("verify:tgt-3").start);

    expect(ctx.storage.state.sources[0]?.status).toBe("Hashed");
    expect(targetStatus(ctx, "tgt-2")).toBe("Verified");
    expect(targetStatus(ctx, "tgt-3")).toBe("Verified");
  });

  test("never runs two operations on the same disk at once", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs("/mnt/disk2/docs", "/mnt/disk3/docs"));

    await run(ctx, runAll());

    const disksOf: Record<string, readonly number[]> = {
      "hash:src-1": [1],
      "transfer:tgt-2": [1, 2],
      "transfer:tgt-3": [1, 3],
      "verify:tgt-2": [2],
      "verify:tgt-3": [3]
    };
    const spans = [...intervals(ctx.timeline).entries()];
    for (const [a, spanA] of spans) {
      for (const [b, spanB] of spans) {
        if (a >= b) continue;
        const overlapping = spanA.start < spanB.end && spanB.start < spanA.end;
        if (!overlapping) continue;
        const shared = (disksOf[a] ?? []).filter((disk) => (disksOf[b] ?? []).includes(disk));
        expect({ a, b, shared }).toEqual({ a, b, shared: [] });
      }
    }
  });

  test("serializes transfers from one source while letting a verify on another disk overlap", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs("/mnt/disk2/docs", "/mnt/disk3/docs"));

    await run(ctx, runAll());

    const spans = intervals(ctx.timeline);
    const span = (id: string) => spans.get(id) ?? { start: -1, end: -1 };
    expect(span("transfer:tgt-2").end).toBeLessThan(span("transfer:tgt-3").start);
    expect(span("verify:tgt-2").start).toBeLessThan(span("transfer:tgt-3").end);
  });

  test("holds a verify back while another transfer is still headed for its disk", async () => {
    const ctx = setup();
    ctx.addMount("/data2", 4);
    await seed(
      ctx,
      Effect.gen(function* () {
        const store = yield* StateStoreTag;
        const a = yield* store.addSource({ path: "/data/a" });
        yield* store.addTarget(a.id, { path: "/mnt/disk2/a" });
        const b = yield* store.addSource({ path: "/data2/b" });
        yield* store.addTarget(b.id, { path: "/mnt/disk2/b" });
      })
    );
    ctx.stages.held.add("hash:src-3");

    await run(
      ctx,
      Effect.gen(function* () {
        const fiber = yield* Effect.fork(runAll());
        yield* ctx.started("transfer:tgt-2");
        yield* Effect.sleep("50 millis");
        yield* ctx.release("hash:src-3");
        return yield* Fiber.join(fiber);
      })
    );

    const spans = intervals(ctx.timeline);
    const span = (id: string) => spans.get(id) ?? { start: -1, end: -1 };
    expect(span("transfer:tgt-4").end).toBeLessThan(span("verify:tgt-2").start);
    expect(targetStatus(ctx, "tgt-2")).toBe("Verified");
    expect(targetStatus(ctx, "tgt-4")).toBe("Verified");
  });

  test("two targets on one disk: neither verify starts before both transfers end", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs("/mnt/disk2/a", "/mnt/disk2/b"));

    await run(ctx, runAll());

    const spans = intervals(ctx.timeline);
    const span = (id: string) => spans.get(id) ?? { start: -1, end: -1 };
    const lastTransferEnd = Math.max(span("transfer:tgt-2").end, span("transfer:tgt-3").end);
    expect(span("verify:tgt-2").start).toBeGreaterThan(lastTransferEnd);
    expect(span("verify:tgt-3").start).toBeGreaterThan(lastTransferEnd);
    expect(targetStatus(ctx, "tgt-2")).toBe("Verified");
    expect(targetStatus(ctx, "tgt-3")).toBe("Verified");
  });

  test("hash, then transfer, then verify when all three want the same disk", async () => {
    const ctx = setup();
    await seed(
      ctx,
      Effect.gen(function* () {
        const store = yield* StateStoreTag;
        const photos = yield* store.addSource({ path: "/mnt/disk3/photos" });
        const copy = yield* store.addTarget(photos.id, { path: "/data/photos-copy" });
        yield* store.transition(photos.id, "Hashing");
        yield* store.transition(
          photos.id,
          "Hashed",
          TransitionEvidence.Hashed({ hashFile: "/mnt/disk3/photos/p_bh.cshd", hashLogFile: "/state/p.log" })
        );
        yield* store.transition(copy.id, "Transferring");
        yield* store.transition(copy.id, "Transferred");

        const music = yield* store.addSource({ path: "/data/music" });
        yield* store.addTarget(music.id, { path: "/mnt/disk2/music" });
        yield* store.transition(music.id, "Hashing");
        yield* store.transition(
          music.id,
          "Hashed",
          TransitionEvidence.Hashed({ hashFile: "/data/music/m_bh.cshd", hashLogFile: "/state/m.log" })
        );

        yield* store.addSource({ path: "/data/docs" });
      })
    );

    await run(ctx, runAll());

    expect(starts(ctx)).toEqual(["hash:src-5", "transfer:tgt-4", "verify:tgt-2"]);
  });

  test("stops at the requested stage and respects a selection", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs("/mnt/disk2/docs", "/mnt/disk3/docs"));

    const report = await run(
      ctx,
      Effect.flatMap(OperationSchedulerTag, (scheduler) =>
        scheduler.run(RunScope.Selection({ source: "docs", target: "/mnt/disk2/docs", through: "Transfer" }))
      )
    );

    expect(starts(ctx)).toEqual(["hash:src-1", "transfer:tgt-2"]);
    expect(ids(report.completed)).toEqual(["hash:src-1", "transfer:tgt-2"]);
    expect(report.pending).toEqual([]);
    expect(targetStatus(ctx, "tgt-2")).toBe("Transferred");
    expect(targetStatus(ctx, "tgt-3")).toBe("Pending");
  });

  test("reports progress as operations start and finish", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs());
    const events: string[] = [];
    const onProgress = (event: RunProgress) =>
      Effect.sync(() => {
        events.push(`${event._tag} ${event.label}`);
      });

    await run(
      ctx,
      Effect.flatMap(OperationSchedulerTag, (scheduler) =>
        scheduler.run(RunScope.All({ through: "Verify" }), { onProgress })
      )
    );

    expect(events).toEqual(["Started hash /data/docs", "Finished hash /data/docs"]);
  });
});

// =============================================================================
// Failures
// =============================================================================

describe("OperationScheduler failures", () => {
  test("a failed transfer skips its verify and leaves the other target alone", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs("/mnt/disk2/docs", "/mnt/disk3/docs"));
    ctx.stages.failures.set("transfer:tgt-2", "rsync exited with 23: boom");

    const report = await run(ctx, runAll());

    expect(report.failed.map((f) => [f.operation.id, f.cause])).toEqual([
      ["transfer:tgt-2", "rsync exited with 23: boom"]
    ]);
    expect(report.skipped.map((s) => [s.operation.id, s.blockedBy])).toEqual([
      ["verify:tgt-2", "transfer:tgt-2"]
    ]);
    expect(sortedIds(report.completed)).toEqual(["hash:src-1", "transfer:tgt-3", "verify:tgt-3"]);
    expect(starts(ctx)).not.toContain("verify:tgt-2");

    const failed = ctx.storage.state.targets.find((t) => t.id === "tgt-2");
    expect(failed?.status).toBe("TransferFailed");
    expect(failed?.error).toBe("rsync exited with 23: boom");
  });

  test("a failed hash blocks everything downstream of it", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs("/mnt/disk2/docs"));
    ctx.stages.failures.set("hash:src-1", "unsupported hash algorithm \"md4x\"");

    const report = await run(ctx, runAll());

    expect(report.failed.map((f) => f.operation.id)).toEqual(["hash:src-1"]);
    expect(report.skipped.map((s) => [s.operation.id, s.blockedBy])).toEqual([
      ["transfer:tgt-2", "hash:src-1"],
      ["verify:tgt-2", "hash:src-1"]
    ]);
    expect(starts(ctx)).toEqual(["hash:src-1"]);
    expect(ctx.storage.state.sources[0]?.status).toBe("HashFailed");
  });

  test("a dirty verification fails the target and keeps its counts", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs("/mnt/disk2/docs", "/mnt/disk3/docs"));
    ctx.stages.verifyResults.set("tgt-3", {
      filesChecked: 3,
      crcErrors: 1,
      missing: 0,
      errors: 0,
      logFile: "/mnt/disk3/docs_vfy.log"
    });

    const report = await run(ctx, runAll());

    expect(report.failed.map((f) => [f.operation.id, f.cause])).toEqual([
      ["verify:tgt-3", "1 CRC errors, 0 missing, 0 read errors"]
    ]);
    expect(report.verifySummary).toEqual({ filesChecked: 6, crcErrors: 1, missing: 0, errors: 0 });
    expect(report.verifications.map((v) => v.path).sort()).toEqual(["/mnt/disk2/docs", "/mnt/disk3/docs"]);

    const dirty = ctx.storage.state.targets.find((t) => t.id === "tgt-3");
    expect(dirty?.status).toBe("VerifyFailed");
    expect(dirty?.verified?.crcErrors).toBe(1);
  });

  test("refuses to start when a path has no disk", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs("/elsewhere/docs"));

    const error = await run(ctx, Effect.flip(runAll()));

    expect(error).toMatchObject({ _tag: "ResourceError", path: "/elsewhere/docs" });
    expect(ctx.timeline).toEqual([]);
    expect(ctx.storage.state.sources[0]?.status).toBe("Unhashed");
  });

  test("fails the run when the state file cannot be written", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs("/mnt/disk2/docs"));
    ctx.storage.failWrites = true;

    const error = await run(ctx, Effect.flip(runAll()));

    expect(error).toMatchObject({ _tag: "PersistenceError", operation: "write", reason: "disk full" });
    expect(ctx.timeline).toEqual([]);
  });
});

// =============================================================================
// Stop, resume and recovery
// =============================================================================

describe("OperationScheduler resumption", () => {
  test("a stop lets in-flight work finish and a later run picks up the rest", async () => {
    const ctx = setup();
    await seed(ctx, stageDocs("/mnt/disk2/docs", "/mnt/disk3/docs"));
    ctx.stages.held.add("transfer:tgt-2");

    const first = await run(
      ctx,
      Effect.gen(function* () {
        const scheduler = yield* OperationSchedulerTag;
        const control = yield* makeSchedulerControl;
        const fiber = yield* Effect.fork(scheduler.run(RunScope.All({ through: "Verify" }), { control }));
        yield* ctx.started("transfer:tgt-2");
        yield* requestStop(control);
        yield* ctx.release("transfer:tgt-2");
        return yield* Fiber.join(fiber);
      })
    );

    expect(first.stopped).toBe(true);
    expect(ids(first.completed)).toEqual(["hash:src-1", "transfer:tgt-2"]);
    expect(ids(first.pending)).toEqual(["verify:tgt-2", "transfer:tgt-3", "verify:tgt-3"]);

    const second = await run(ctx, runAll());

    expect(second.stopped).toBe(false);
    expect(ids(second.alreadyDone)).toEqual(["hash:src-1", "transfer:tgt-2"]);
    expect(sortedIds(second.completed)).toEqual(["transfer:tgt-3", "verify:tgt-2", "verify:tgt-3"]);
    expect(starts(ctx).filter((id) => id === "hash:src-1")).toHaveLength(1);
  });

  test("applies a registration still in the mailbox before finishing", async () => {
    const ctx = setup();

    const report = await run(
      ctx,
      Effect.gen(function* () {
        const scheduler = yield* OperationSchedulerTag;
        const store = yield* StateStoreTag;
        const control = yield* makeSchedulerControl;
        yield* Queue.offer(
          control.signals,
          SchedulerSignal.Mutation({ apply: Effect.orDie(Effect.asVoid(store.addSource({ path: "/data/docs" }))) })
        );
        return yield* scheduler.run(RunScope.All({ through: "Hash" }), { control });
      })
    );

    expect(ids(report.completed)).toEqual(["hash:src-1"]);
    expect(ctx.storage.state.sources.map((s) => s.status)).toEqual(["Hashed"]);
  });

  test("rolls interrupted work back and runs it again", async () => {
    const ctx = setup();
    await seed(
      ctx,
      Effect.gen(function* () {
        yield* stageDocs("/mnt/disk2/docs");
        const store = yield* StateStoreTag;
        yield* store.transition("src-1", "Hashing");
        yield* store.transition(
          "src-1",
          "Hashed",
          TransitionEvidence.Hashed({ hashFile: "/data/docs/old_bh.cshd", hashLogFile: "/state/old.log" })
        );
        yield* store.transition("tgt-2", "Transferring");
      })
    );

    const report = await run(ctx, runAll());

    expect(starts(ctx)).toEqual(["transfer:tgt-2", "verify:tgt-2"]);
    expect(ids(report.alreadyDone)).toEqual(["hash:src-1"]);
    expect(targetStatus(ctx, "tgt-2")).toBe("Verified");
  });

  test("retries failed operations only when asked", async () => {
    const ctx = setup();
    await seed(
      ctx,
      Effect.gen(function* () {
        yield* stageDocs("/mnt/disk2/docs");
        const store = yield* StateStoreTag;
        yield* store.transition("src-1", "Hashing");
        yield* store.transition(
          "src-1",
          "Hashed",
          TransitionEvidence.Hashed({ hashFile: "/data/docs/old_bh.cshd", hashLogFile: "/state/old.log" })
        );
        yield* store.transition("tgt-2", "Transferring");
        yield* store.transition("tgt-2", "TransferFailed", TransitionEvidence.Failed({ cause: "no space" }));
      })
    );

    const untouched = await run(ctx, runAll());
    expect(ctx.timeline).toEqual([]);
    expect(untouched.failed.map((f) => [f.operation.id, f.cause])).toEqual([["transfer:tgt-2", "no space"]]);

    const retried = await run(
      ctx,
      Effect.flatMap(OperationSchedulerTag, (scheduler) =>
        scheduler.run(RunScope.All({ through: "Verify" }), { retryFailed: true })
      )
    );
    expect(sortedIds(retried.completed)).toEqual(["transfer:tgt-2", "verify:tgt-2"]);
    expect(retried.failed).toEqual([]);
  });
});
