import type { FactSet } from "../facts/types.js";
import type { EvidenceSnippet } from "../retrieval/ranker.js";
import { StrategyDraftSchema } from "../strategy/draft.js";
import { DEFAULT_OUT_OF_SCOPE_TERMS, GUARDRAIL_RULES, type GuardrailRule, type RuleContext } from "./rules.js";
import { formatPath, violation, type ValidationOutcome, type Violation } from "./violations.js";

/**
 * Judge of a candidate draft. Implementations must not throw: malformed
 * drafts are reported as violations.
 */
export interface DraftValidator {
  validate(draft: unknown, facts: FactSet, evidence: readonly EvidenceSnippet[]): ValidationOutcome;
}

export interface GuardrailValidatorOptions {
  readonly maxSentences?: number;
  readonly maxChars?: number;
  /** Relative tolerance applied to numeric claims. */
  readonly statTolerance?: number;
  readonly outOfScopeTerms?: readonly string[];
  /** Mode items must be purchasable in. */
  readonly gameMode?: string;
  readonly rules?: readonly GuardrailRule[];
}

/**
 * Fixed rule set evaluated over a structured draft. A draft failing the
 * schema yields only `SCHEMA_INVALID` findings; otherwise every rule runs and
 * findings are reported in rule order.
 */
export class GuardrailValidator implements DraftValidator {
  private readonly settings: Omit<RuleContext, "facts" | "evidence">;
  private readonly rules: readonly GuardrailRule[];

  constructor(options: GuardrailValidatorOptions = {}) {
    this.settings = Object.freeze({
      maxSentences: options.maxSentences ?? 3,
      maxChars: options.maxChars ?? 400,
      statTolerance: options.statTolerance ?? 0.05,
      outOfScopeTerms: options.outOfScopeTerms ?? DEFAULT_OUT_OF_SCOPE_TERMS,
      gameMode: options.gameMode ?? "aram",
    });
    this.rules = options.rules ?? GUARDRAIL_RULES;
  }

  validate(draft: unknown, facts: FactSet, evidence: readonly EvidenceSnippet[]): ValidationOutcome {
    const parsed = StrategyDraftSchema.safeParse(draft);
    if (!parsed.success) {
      return finish(
        parsed.error.issues.map((issue) => violation("SCHEMA_INVALID", formatPath(issue.path), issue.message)),
      );
    }

    const context: RuleContext = { ...this.settings, facts, evidence };
    const violations: Violation[] = [];
    for (const rule of this.rules) {
      violations.push(...rule(parsed.data, context));
    }
    return finish(violations);
  }
}

function finish(violations: Violation[]): ValidationOutcome {
  return Object.freeze({ ok: violations.length === 0, violations: Object.freeze(violations) });
}
