export type TargetStatus =
  | "Pending"
  | "Transferring"
  | "Transferred"
  | "TransferFailed"
  | "Verifying"
  | "Verified"
  | "VerifyFailed";

export interface VerifyResult {
  readonly filesChecked: number;
  readonly crcErrors: number;
  readonly missing: number;
  readonly errors: number;
  readonly logFile: string;
}

export interface Target {
  readonly id: string;
  readonly seq: number;
  readonly sourceId: string;
  readonly path: string;
  readonly alias?: string;
  readonly status: TargetStatus;
  /** When false the target ends at `Transferred` and gets no Verify operation. */
  readonly verify: boolean;
  readonly verified?: VerifyResult;
  readonly error?: string;
}

export interface NewTarget {
  readonly path: string;
  readonly alias?: string;
  readonly verify?: boolean;
}

export interface TargetPatch {
  readonly alias?: string;
  readonly verify?: boolean;
}

export const isCleanVerify = (result: VerifyResult): boolean =>
  result.crcErrors === 0 && result.missing === 0 && result.errors === 0;

export const targetLabel = (target: Target): string =>
  target.alias !== undefined ? `${target.alias} (${target.path})` : target.path;
