import { Context } from "effect";
import * as path from "node:path";

export type CopierKind = "rsync" | "fs";

export const DEFAULT_STATE_FILE = "backup_status.json";

export interface RunConfig {
  /** Absolute path of the JSON state file. */
  readonly statePath: string;
  readonly copier: CopierKind;
  /** Where hashing logs go: the state file's directory. */
  readonly logDirectory: string;
}

export class RunConfigTag extends Context.Tag("RunConfig")<RunConfigTag, RunConfig>() {}

export const makeRunConfig = (statePath: string, copier: CopierKind): RunConfig => {
  const absolute = path.resolve(statePath);
  return { statePath: absolute, copier, logDirectory: path.dirname(absolute) };
};
