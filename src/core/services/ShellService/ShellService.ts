/**
 * ShellService - runs external programs for testability.
 */

import { Context, Data, Effect, Layer, Stream, pipe } from "effect";
import { Command, CommandExecutor } from "@effect/platform";

export class ShellError extends Data.TaggedError("ShellError")<{
  readonly message: string;
  readonly command: string;
  readonly exitCode?: number;
}> {}

export interface ShellResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

export interface ShellService {
  /** Runs `command` with `args` directly, without a shell in between. */
  readonly exec: (command: string, args: readonly string[]) => Effect.Effect<ShellResult, ShellError>;
}

export class ShellServiceTag extends Context.Tag("ShellService")<
  ShellServiceTag,
  ShellService
>() {}

const collect = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText(),
    Stream.runFold("", (acc, chunk) => acc + chunk)
  );

export const ShellServiceLive = Layer.effect(
  ShellServiceTag,
  Effect.gen(function* () {
    const executor = yield* CommandExecutor.CommandExecutor;

    const exec: ShellService["exec"] = (command, args) =>
      pipe(
        Effect.gen(function* () {
          const proc = yield* executor.start(Command.make(command, ...args));
          const [stdout, stderr, exitCode] = yield* Effect.all(
            [collect(proc.stdout), collect(proc.stderr), proc.exitCode],
            { concurrency: "unbounded" }
          );
          return { stdout, stderr, exitCode: Number(exitCode) };
        }),
        Effect.scoped,
        Effect.mapError(
          (e) =>
            new ShellError({
              message: `Shell command failed: ${e.message}`,
              command: [command, ...args].join(" ")
            })
        )
      );

    return { exec };
  })
);
