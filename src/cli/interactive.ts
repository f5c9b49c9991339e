import { Prompt } from "@effect/cli";
import { Console, Data, Effect, Either, Option, pipe } from "effect";

import { DEFAULT_HASH_ALGORITHM, type NewSource } from "@domain/Source";
import type { NewTarget } from "@domain/Target";
import type { RunScope } from "@domain/Operation";
import { InteractiveSessionTag } from "@services/InteractiveSession";
import { LoggerServiceTag } from "@services/LoggerService";
import { StateStoreTag } from "@services/StateStore";
import { fromDomainError } from "./errors";
import { hasFailures, markFailed, withErrorHandling } from "./handler";
import { parseThrough, toRunScope } from "./optionParsing";

// =============================================================================
// Parsing
// =============================================================================

export type ReplCommand = Data.TaggedEnum<{
  Stage: { readonly source: NewSource };
  AddTarget: { readonly source: string; readonly target: NewTarget };
  Start: { readonly scope: RunScope; readonly retryFailed: boolean };
  Status: {};
  Stop: {};
  Help: {};
  Exit: {};
  Empty: {};
  Invalid: { readonly reason: string };
}>;

export const ReplCommand = Data.taggedEnum<ReplCommand>();

/** Splits on whitespace; single or double quotes keep spaces inside a token. */
export const tokenize = (line: string): Either.Either<string[], string> => {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quote: string | undefined;

  for (const ch of line) {
    if (quote !== undefined) {
      if (ch === quote) quote = undefined;
      else current += ch;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote !== undefined) return Either.left("unterminated quote");
  if (inToken) tokens.push(current);
  return Either.right(tokens);
};

interface ParsedArgs {
  readonly positional: readonly string[];
  readonly values: ReadonlyMap<string, readonly string[]>;
  readonly flags: ReadonlySet<string>;
}

const parseArgs = (
  tokens: readonly string[],
  valueOptions: readonly string[],
  flagOptions: readonly string[]
): Either.Either<ParsedArgs, string> => {
  const positional: string[] = [];
  const values = new Map<string, string[]>();
  const flags = new Set<string>();

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? "";
    if (!token.startsWith("--")) {
      positional.push(token);
      continue;
    }
    const name = token.slice(2);
    if (flagOptions.includes(name)) {
      flags.add(name);
    } else if (valueOptions.includes(name)) {
      const value = tokens[i + 1];
      if (value === undefined) return Either.left(`${token} needs a value`);
      values.set(name, [...(values.get(name) ?? []), value]);
      i++;
    } else {
      return Either.left(`unknown option ${token}`);
    }
  }

  return Either.right({ positional, values, flags });
};

const last = (args: ParsedArgs, name: string): string | undefined => args.values.get(name)?.at(-1);

const USAGE = {
  stage: "usage: stage <path> [--alias a] [--hash-algorithm h] [--single-hash] [--allow p] [--block p]",
  addTarget: "usage: add-target <source> <path> [--alias a] [--no-verify]",
  start: "usage: start [hash|transfer|verify] [--source s] [--target t] [--retry-failed]"
};

const parseStage = (tokens: readonly string[]): ReplCommand =>
  Either.match(parseArgs(tokens, ["alias", "hash-algorithm", "allow", "block"], ["single-hash"]), {
    onLeft: (reason) => ReplCommand.Invalid({ reason }),
    onRight: (args) => {
      const [path, ...extra] = args.positional;
      if (path === undefined || extra.length > 0) return ReplCommand.Invalid({ reason: USAGE.stage });
      return ReplCommand.Stage({
        source: {
          path,
          alias: last(args, "alias"),
          hashAlgorithm: (last(args, "hash-algorithm") ?? DEFAULT_HASH_ALGORITHM).toLowerCase(),
          singleHash: args.flags.has("single-hash"),
          allowlist: args.values.get("allow") ?? [],
          blocklist: args.values.get("block") ?? []
        }
      });
    }
  });

const parseAddTarget = (tokens: readonly string[]): ReplCommand =>
  Either.match(parseArgs(tokens, ["alias"], ["no-verify"]), {
    onLeft: (reason) => ReplCommand.Invalid({ reason }),
    onRight: (args) => {
      const [source, path, ...extra] = args.positional;
      if (source === undefined || path === undefined || extra.length > 0) {
        return ReplCommand.Invalid({ reason: USAGE.addTarget });
      }
      return ReplCommand.AddTarget({
        source,
        target: { path, alias: last(args, "alias"), verify: !args.flags.has("no-verify") }
      });
    }
  });

const parseStart = (tokens: readonly string[]): ReplCommand =>
  Either.match(parseArgs(tokens, ["source", "target"], ["retry-failed"]), {
    onLeft: (reason) => ReplCommand.Invalid({ reason }),
    onRight: (args) => {
      const [stage = "verify", ...extra] = args.positional;
      if (extra.length > 0) return ReplCommand.Invalid({ reason: USAGE.start });
      const scope = pipe(
        parseThrough(stage),
        Either.flatMap((through) => toRunScope(through, last(args, "source"), last(args, "target")))
      );
      return Either.match(scope, {
        onLeft: (e) => ReplCommand.Invalid({ reason: `${e.option}: ${e.reason}` }),
        onRight: (resolved) => ReplCommand.Start({ scope: resolved, retryFailed: args.flags.has("retry-failed") })
      });
    }
  });

const noArguments = (name: string, rest: readonly string[], command: ReplCommand): ReplCommand =>
  rest.length === 0 ? command : ReplCommand.Invalid({ reason: `${name} takes no arguments` });

export const parseReplCommand = (tokens: readonly string[]): ReplCommand => {
  const [name, ...rest] = tokens;
  switch (name?.toLowerCase()) {
    case undefined:
      return ReplCommand.Empty();
    case "stage":
      return parseStage(rest);
    case "add-target":
      return parseAddTarget(rest);
    case "start":
    case "run":
      return parseStart(rest);
    case "status":
      return noArguments("status", rest, ReplCommand.Status());
    case "stop":
      return noArguments("stop", rest, ReplCommand.Stop());
    case "help":
    case "?":
      return ReplCommand.Help();
    case "exit":
    case "quit":
      return noArguments("exit", rest, ReplCommand.Exit());
    default:
      return ReplCommand.Invalid({ reason: `unknown command "${name}", type 'help' for the list` });
  }
};

export const parseReplLine = (line: string): ReplCommand =>
  Either.match(tokenize(line), {
    onLeft: (reason) => ReplCommand.Invalid({ reason }),
    onRight: parseReplCommand
  });

// =============================================================================
// Loop
// =============================================================================

const reportErrors = <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => Console.error(`\n${fromDomainError(error).format()}\n`)),
    Effect.asVoid
  );

const showStatus = Effect.gen(function* () {
  const session = yield* InteractiveSessionTag;
  const store = yield* StateStoreTag;
  const logger = yield* LoggerServiceTag;

  const snapshot = yield* session.statusSnapshot;
  yield* logger.status.header(store.statePath);
  yield* logger.session.runState(snapshot.running);

  if (snapshot.state.sources.length === 0) {
    return yield* logger.status.empty;
  }
  yield* Effect.forEach(snapshot.state.sources, (source) => logger.status.source(snapshot.state, source), {
    discard: true
  });
  yield* logger.status.totals(snapshot.state);
});

/** Waits for an active run and prints its report. */
const finish = Effect.gen(function* () {
  const session = yield* InteractiveSessionTag;
  const store = yield* StateStoreTag;
  const logger = yield* LoggerServiceTag;

  const snapshot = yield* session.statusSnapshot;
  if (snapshot.running) {
    yield* logger.session.waiting;
  }

  const report = yield* session.await;
  if (Option.isNone(report)) return;

  const state = yield* store.snapshot;
  yield* logger.run.report(report.value, state);
  if (hasFailures(report.value)) {
    yield* markFailed;
  }
});

/** Returns false once the loop should end. */
export const execute = (command: ReplCommand) =>
  Effect.gen(function* () {
    const session = yield* InteractiveSessionTag;
    const store = yield* StateStoreTag;
    const logger = yield* LoggerServiceTag;

    switch (command._tag) {
      case "Empty":
        return true;
      case "Invalid":
        yield* logger.session.invalid(command.reason);
        return true;
      case "Help":
        yield* logger.session.help;
        return true;
      case "Stage":
        yield* reportErrors(Effect.flatMap(session.addSource(command.source), logger.stage.staged));
        return true;
      case "AddTarget":
        yield* reportErrors(
          Effect.gen(function* () {
            const target = yield* session.addTarget(command.source, command.target);
            const source = yield* store.lookupSource(command.source);
            yield* logger.stage.targetAdded(source, target);
          })
        );
        return true;
      case "Start": {
        const started = yield* session.start(command.scope, {
          retryFailed: command.retryFailed,
          onProgress: logger.run.progress
        });
        if (started) yield* logger.session.started;
        else yield* logger.session.alreadyRunning;
        return true;
      }
      case "Status":
        yield* showStatus;
        return true;
      case "Stop": {
        const wasRunning = yield* session.stop;
        yield* logger.session.stopping(wasRunning);
        return true;
      }
      case "Exit":
        yield* withErrorHandling(finish);
        return false;
    }
  });

/** Ctrl-C and Ctrl-D at the prompt count as `exit`. */
const readCommand = pipe(
  Prompt.text({ message: "coldstage" }),
  Effect.map(parseReplLine),
  Effect.catchTag("QuitException", () => Effect.succeed(ReplCommand.Exit()))
);

export const runInteractive = Effect.gen(function* () {
  const store = yield* StateStoreTag;
  const logger = yield* LoggerServiceTag;

  yield* logger.session.intro(store.statePath);

  let open = true;
  while (open) {
    const command = yield* readCommand;
    open = yield* execute(command);
  }
});
