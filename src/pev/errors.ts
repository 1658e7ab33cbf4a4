import type { PevPhase } from "./state.js";

/**
 * Base class of the errors that cross the orchestration boundary. Every
 * error carries a stable code so the tool layer can surface consistent
 * payloads.
 */
export class PevError extends Error {
  public readonly code: string;
  public readonly hint?: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, hint?: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PevError";
    this.code = code;
    this.hint = hint;
    this.details = details;
  }
}

function describeCause(cause: unknown): { code?: string; message: string } {
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? cause.code : undefined;
    return code ? { code, message: cause.message } : { message: cause.message };
  }
  return { message: String(cause) };
}

/** The facts collaborator could not produce a fact set for the patch. */
export class FactsUnavailableError extends PevError {
  constructor(patch: string, cause: unknown) {
    const described = describeCause(cause);
    super(`facts for patch ${patch} are unavailable: ${described.message}`, "E-PEV-FACTS", "facts_unavailable", {
      patch,
      cause: described,
    }, { cause });
    this.name = "FactsUnavailableError";
  }
}

/** The evidence corpus could not be read. An empty corpus is not an error. */
export class EvidenceUnavailableError extends PevError {
  constructor(patch: string, cause: unknown) {
    const described = describeCause(cause);
    super(`evidence for patch ${patch} is unavailable: ${described.message}`, "E-PEV-EVIDENCE", "evidence_unavailable", {
      patch,
      cause: described,
    }, { cause });
    this.name = "EvidenceUnavailableError";
  }
}

/** The caller aborted the run; no result is produced. */
export class PevCancelledError extends PevError {
  constructor(phase: PevPhase, reason: unknown) {
    const message = reason instanceof Error ? reason.message : reason === undefined ? null : String(reason);
    super(`run cancelled during ${phase}`, "E-PEV-CANCELLED", "run_cancelled", { phase, reason: message });
    this.name = "PevCancelledError";
  }
}

/** A phase change outside the state machine's edges. */
export class IllegalTransitionError extends PevError {
  constructor(from: PevPhase, to: PevPhase) {
    super(`illegal transition ${from} -> ${to}`, "E-PEV-TRANSITION", "illegal_transition", { from, to });
    this.name = "IllegalTransitionError";
  }
}
