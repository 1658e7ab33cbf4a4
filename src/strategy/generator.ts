import type { FactSet } from "../facts/types.js";
import type { Violation } from "../guardrail/violations.js";
import type { RequestContext } from "../pev/request.js";
import type { EvidenceSnippet } from "../retrieval/ranker.js";
import type { ThreatScore } from "../threat/estimator.js";
import { StrategyDraftSchema, type StrategyDraft } from "./draft.js";

/** Everything a generator sees for one attempt. */
export interface GenerationInput {
  readonly request: RequestContext;
  readonly facts: FactSet;
  readonly evidence: readonly EvidenceSnippet[];
  readonly threatScores: readonly ThreatScore[];
  /** Violations of the previous attempt; empty on the first one. */
  readonly feedback: readonly Violation[];
  /** 1-based attempt number. */
  readonly attempt: number;
}

/**
 * Produces a structured draft. The output is untrusted: the orchestrator
 * parses it with {@link parseStructuredDraft}. Implementations must honour
 * `signal` and may return an unchanged draft despite feedback.
 */
export interface DraftGenerator {
  generate(input: GenerationInput, signal: AbortSignal): Promise<unknown>;
}

/** Raised when a generation attempt exceeds its deadline. */
export class GenerationTimeoutError extends Error {
  public readonly code = "E-GEN-TIMEOUT";
  public readonly hint = "generation_timeout";
  public readonly details: { attempt: number; timeoutMs: number };

  constructor(attempt: number, timeoutMs: number) {
    super(`generation attempt ${attempt} exceeded ${timeoutMs}ms`);
    this.name = "GenerationTimeoutError";
    this.details = { attempt, timeoutMs };
  }
}

/** Raised when a generator returns output that does not match the draft schema. */
export class GenerationSchemaError extends Error {
  public readonly code = "E-GEN-SCHEMA";
  public readonly hint = "generation_schema";
  public readonly details: { issues: Array<{ path: string; message: string }> };

  constructor(issues: Array<{ path: string; message: string }>) {
    super(`generator output is not a valid draft (${issues.length} issue${issues.length === 1 ? "" : "s"})`);
    this.name = "GenerationSchemaError";
    this.details = { issues };
  }
}

/**
 * Accepts either an object or a JSON string (as returned by chat-style
 * models) and returns a typed draft.
 */
export function parseStructuredDraft(output: unknown): StrategyDraft {
  let candidate = output;
  if (typeof output === "string") {
    try {
      candidate = JSON.parse(output);
    } catch (error) {
      throw new GenerationSchemaError([
        { path: "", message: error instanceof Error ? error.message : String(error) },
      ]);
    }
  }
  const result = StrategyDraftSchema.safeParse(candidate);
  if (!result.success) {
    throw new GenerationSchemaError(
      result.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }
  return result.data;
}
