/**
 * Closed taxonomy of guardrail findings. Rules report in this order;
 * `GENERATION_FAILED` is recorded by the orchestrator for attempts that never
 * produced a draft.
 */
export const VIOLATION_CODES = [
  "SCHEMA_INVALID",
  "SUMMARY_TOO_LONG",
  "OUT_OF_SCOPE",
  "UNKNOWN_ITEM",
  "STAT_MISMATCH",
  "MISSING_EVIDENCE",
  "GENERATION_FAILED",
] as const;

export type ViolationCode = (typeof VIOLATION_CODES)[number];

export interface Violation {
  readonly code: ViolationCode;
  readonly message: string;
  /** Dotted path of the offending field; empty for the whole draft. */
  readonly path: string;
}

export interface ValidationOutcome {
  /** True iff `violations` is empty. */
  readonly ok: boolean;
  readonly violations: readonly Violation[];
}

export function violation(code: ViolationCode, path: string, message: string): Violation {
  return Object.freeze({ code, message, path });
}

export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.map(String).join(".");
}
