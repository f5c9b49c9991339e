import { Context, Data, Effect, Layer, pipe } from "effect";
import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";

export class DeviceNotFound extends Data.TaggedError("DeviceNotFound")<{
  readonly path: string;
}> {}

export class DevicePermissionDenied extends Data.TaggedError("DevicePermissionDenied")<{
  readonly path: string;
}> {}

export class DeviceUnknownError extends Data.TaggedError("DeviceUnknownError")<{
  readonly path: string;
  readonly cause: string;
}> {}

export type DeviceError = DeviceNotFound | DevicePermissionDenied | DeviceUnknownError;

/** Device number lookup, the `dev` field of `stat`. */
export interface DeviceService {
  readonly deviceOf: (path: string) => Effect.Effect<number, DeviceError>;
}

export class DeviceServiceTag extends Context.Tag("DeviceService")<
  DeviceServiceTag,
  DeviceService
>() {}

const toDeviceError = (path: string, error: PlatformError): DeviceError => {
  if (error._tag === "SystemError") {
    switch (error.reason) {
      // ENOTDIR surfaces as BadResource: a file sits where a directory was expected.
      case "NotFound":
      case "BadResource":
        return new DeviceNotFound({ path });
      case "PermissionDenied":
        return new DevicePermissionDenied({ path });
    }
  }
  return new DeviceUnknownError({ path, cause: error.message });
};

export const DeviceServiceLive = Layer.effect(
  DeviceServiceTag,
  pipe(
    FileSystem.FileSystem,
    Effect.map((fs) => ({
      deviceOf: (path: string) =>
        pipe(
          fs.stat(path),
          Effect.map((info) => info.dev),
          Effect.mapError((e) => toDeviceError(path, e))
        )
    }))
  )
);
