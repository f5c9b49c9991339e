/**
 * DiskResourceService - maps paths to physical disks and hands out one lease
 * per disk at a time.
 */

import { Brand, Context, Data, Deferred, Effect, Layer, Option, Ref } from "effect";
import * as path from "node:path";

import { normalizePath } from "../../lib/paths";
import { DeviceServiceTag } from "../DeviceService";

export type DiskId = string & Brand.Brand<"DiskId">;
export const DiskId = Brand.nominal<DiskId>();

export class ResourceError extends Data.TaggedError("ResourceError")<{
  readonly path: string;
  readonly reason: string;
}> {}

export interface Lease {
  readonly id: number;
  readonly diskId: DiskId;
}

export interface DiskResourceService {
  /**
   * Disk holding `path`. A path that does not exist yet resolves through its
   * nearest existing ancestor.
   */
  readonly resolve: (path: string) => Effect.Effect<DiskId, ResourceError>;
  /** Waits until the disk is free. Waiters are served in arrival order. */
  readonly acquire: (diskId: DiskId) => Effect.Effect<Lease>;
  /**
   * All leases or none, without waiting. A disk with queued waiters counts as
   * busy.
   */
  readonly tryAcquireAll: (diskIds: readonly DiskId[]) => Effect.Effect<Option.Option<readonly Lease[]>>;
  /** Releasing a lease twice is a no-op. */
  readonly release: (lease: Lease) => Effect.Effect<void>;
  /**
   * Returns an effect that completes at the first release after this call.
   * Taken before a failed `tryAcquireAll`, it cannot miss the release that
   * frees the disk.
   */
  readonly nextRelease: Effect.Effect<Effect.Effect<void>>;
}

export class DiskResourceServiceTag extends Context.Tag("DiskResourceService")<
  DiskResourceServiceTag,
  DiskResourceService
>() {}

// =============================================================================
// Lease table
// =============================================================================

interface Waiter {
  readonly leaseId: number;
  readonly granted: Deferred.Deferred<Lease>;
}

interface Slot {
  readonly holder: number;
  readonly waiters: readonly Waiter[];
}

type Slots = ReadonlyMap<DiskId, Slot>;

const withSlot = (slots: Slots, diskId: DiskId, slot: Slot | undefined): Slots => {
  const next = new Map(slots);
  if (slot === undefined) next.delete(diskId);
  else next.set(diskId, slot);
  return next;
};

const unique = <A>(values: readonly A[]): A[] => [...new Set(values)];

export const DiskResourceServiceLive = Layer.effect(
  DiskResourceServiceTag,
  Effect.gen(function* () {
    const devices = yield* DeviceServiceTag;

    const cache = yield* Ref.make<ReadonlyMap<string, DiskId>>(new Map());
    const slots = yield* Ref.make<Slots>(new Map());
    const leaseIds = yield* Ref.make(0);
    const releases = yield* Effect.flatMap(Deferred.make<void>(), Ref.make);

    const nextLeaseId = Ref.updateAndGet(leaseIds, (n) => n + 1);

    const resolve: DiskResourceService["resolve"] = (input) =>
      Effect.gen(function* () {
        const start = normalizePath(input);
        const visited: string[] = [];
        let current = start;

        for (;;) {
          const cached = (yield* Ref.get(cache)).get(current);
          if (cached !== undefined) {
            yield* remember(visited, cached);
            return cached;
          }
          visited.push(current);

          const device = yield* devices.deviceOf(current).pipe(
            Effect.map(Option.some),
            Effect.catchTag("DeviceNotFound", () => Effect.succeed(Option.none<number>())),
            Effect.mapError(
              (e) =>
                new ResourceError({
                  path: start,
                  reason:
                    e._tag === "DevicePermissionDenied"
                      ? `permission denied reading ${e.path}`
                      : `cannot stat ${e.path}: ${e.cause}`
                })
            )
          );

          if (Option.isSome(device)) {
            const diskId = DiskId(`dev:${device.value}`);
            yield* remember(visited, diskId);
            yield* Effect.logDebug(`Resolved ${start} to ${diskId}`);
            return diskId;
          }

          const parent = path.dirname(current);
          if (parent === current) {
            return yield* Effect.fail(
              new ResourceError({ path: start, reason: "no existing ancestor to read a device from" })
            );
          }
          current = parent;
        }
      });

    const remember = (paths: readonly string[], diskId: DiskId) =>
      Ref.update(cache, (entries) => {
        const next = new Map(entries);
        for (const p of paths) next.set(p, diskId);
        return next;
      });

    const acquire: DiskResourceService["acquire"] = (diskId) =>
      Effect.gen(function* () {
        const leaseId = yield* nextLeaseId;
        const granted = yield* Deferred.make<Lease>();
        const immediate = yield* Ref.modify(slots, (current): [boolean, Slots] => {
          const slot = current.get(diskId);
          if (slot === undefined) {
            return [true, withSlot(current, diskId, { holder: leaseId, waiters: [] })];
          }
          return [false, withSlot(current, diskId, { ...slot, waiters: [...slot.waiters, { leaseId, granted }] })];
        });
        if (immediate) return { id: leaseId, diskId };

        return yield* Deferred.await(granted).pipe(
          Effect.onInterrupt(() => abandon(diskId, leaseId))
        );
      });

    /** Drops an interrupted waiter, or gives back the lease it was handed meanwhile. */
    const abandon = (diskId: DiskId, leaseId: number) =>
      Effect.gen(function* () {
        const wasHolder = yield* Ref.modify(slots, (current): [boolean, Slots] => {
          const slot = current.get(diskId);
          if (slot === undefined) return [false, current];
          if (slot.holder === leaseId) return [true, current];
          return [
            false,
            withSlot(current, diskId, {
              ...slot,
              waiters: slot.waiters.filter((w) => w.leaseId !== leaseId)
            })
          ];
        });
        if (wasHolder) yield* release({ id: leaseId, diskId });
      });

    const tryAcquireAll: DiskResourceService["tryAcquireAll"] = (diskIds) =>
      Effect.gen(function* () {
        const wanted = unique(diskIds);
        const ids: number[] = [];
        for (const _ of wanted) ids.push(yield* nextLeaseId);

        return yield* Ref.modify(slots, (current): [Option.Option<readonly Lease[]>, Slots] => {
          if (wanted.some((diskId) => current.has(diskId))) return [Option.none(), current];

          const leases = wanted.flatMap((diskId, i): Lease[] => {
            const id = ids[i];
            return id === undefined ? [] : [{ id, diskId }];
          });
          const next = new Map(current);
          for (const lease of leases) next.set(lease.diskId, { holder: lease.id, waiters: [] });
          return [Option.some(leases), next];
        });
      });

    const release: DiskResourceService["release"] = (lease) =>
      Effect.gen(function* () {
        const handOff = yield* Ref.modify(slots, (current): [Option.Option<Waiter> | undefined, Slots] => {
          const slot = current.get(lease.diskId);
          if (slot === undefined || slot.holder !== lease.id) return [undefined, current];
          const [next, ...rest] = slot.waiters;
          if (next === undefined) return [Option.none(), withSlot(current, lease.diskId, undefined)];
          return [Option.some(next), withSlot(current, lease.diskId, { holder: next.leaseId, waiters: rest })];
        });
        if (handOff === undefined) return;

        if (Option.isSome(handOff)) {
          yield* Deferred.succeed(handOff.value.granted, { id: handOff.value.leaseId, diskId: lease.diskId });
        }

        const fresh = yield* Deferred.make<void>();
        const signalled = yield* Ref.getAndSet(releases, fresh);
        yield* Deferred.succeed(signalled, undefined);
      });

    const nextRelease: DiskResourceService["nextRelease"] = Effect.map(Ref.get(releases), (signal) =>
      Deferred.await(signal)
    );

    return { resolve, acquire, tryAcquireAll, release, nextRelease };
  })
);
