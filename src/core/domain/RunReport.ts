import type { Operation } from "./Operation";
import type { VerifyResult } from "./Target";

export interface FailedOperation {
  readonly operation: Operation;
  readonly cause: string;
}

export interface SkippedOperation {
  readonly operation: Operation;
  /** The failed operation upstream that blocks this one. */
  readonly blockedBy: string;
}

export interface VerifySummary {
  readonly filesChecked: number;
  readonly crcErrors: number;
  readonly missing: number;
  readonly errors: number;
}

export interface TargetVerification {
  readonly targetId: string;
  readonly path: string;
  readonly result: VerifyResult;
}

export interface RunReport {
  /** Operations this run took from Queued to Done. */
  readonly completed: readonly Operation[];
  /** In-scope operations that were already Done when the run started. */
  readonly alreadyDone: readonly Operation[];
  readonly failed: readonly FailedOperation[];
  readonly skipped: readonly SkippedOperation[];
  /** Queued operations left for a later run after a stop. */
  readonly pending: readonly Operation[];
  readonly stopped: boolean;
  readonly verifySummary: VerifySummary;
  readonly verifications: readonly TargetVerification[];
}

export const emptyVerifySummary: VerifySummary = {
  filesChecked: 0,
  crcErrors: 0,
  missing: 0,
  errors: 0
};

export const summarizeVerifications = (
  verifications: readonly TargetVerification[]
): VerifySummary =>
  verifications.reduce(
    (acc, { result }) => ({
      filesChecked: acc.filesChecked + result.filesChecked,
      crcErrors: acc.crcErrors + result.crcErrors,
      missing: acc.missing + result.missing,
      errors: acc.errors + result.errors
    }),
    emptyVerifySummary
  );

export const hasFailures = (report: RunReport): boolean => report.failed.length > 0;
