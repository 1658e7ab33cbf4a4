import { distance } from "fastest-levenshtein";

import type { FactSet } from "../facts/types.js";
import type { EvidenceSnippet } from "../retrieval/ranker.js";
import { splitSentences, type StrategyDraft } from "../strategy/draft.js";
import { violation, type Violation } from "./violations.js";

/** Inputs shared by every rule of one validation pass. */
export interface RuleContext {
  readonly facts: FactSet;
  readonly evidence: readonly EvidenceSnippet[];
  readonly maxSentences: number;
  readonly maxChars: number;
  readonly statTolerance: number;
  readonly outOfScopeTerms: readonly string[];
  readonly gameMode: string;
}

export type GuardrailRule = (draft: StrategyDraft, context: RuleContext) => Violation[];

/** Mechanics and map features that do not exist on the single-lane map. */
export const DEFAULT_OUT_OF_SCOPE_TERMS: readonly string[] = Object.freeze([
  "dragon",
  "drake",
  "baron",
  "rift herald",
  "jungle",
  "jungler",
  "smite",
  "scuttle",
  "control ward",
  "teleport",
  "lane swap",
]);

/** Absolute slack applied to small values so rounding in prose is tolerated. */
const MIN_STAT_SLACK = 0.5;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function findTerms(text: string, terms: readonly string[]): string[] {
  return terms.filter((term) => new RegExp(`\\b${escapeRegExp(term)}\\b`, "iu").test(text));
}

/** Free-text fields scanned for out-of-scope mechanics, in draft order. */
function textFields(draft: StrategyDraft): Array<{ path: string; text: string }> {
  const fields = [{ path: "summary", text: draft.summary }];
  draft.buildPlan.forEach((step, index) => {
    fields.push({ path: `buildPlan.${index}.trigger`, text: step.trigger });
    fields.push({ path: `buildPlan.${index}.rationale`, text: step.rationale });
  });
  draft.assumptions.forEach((assumption, index) => {
    fields.push({ path: `assumptions.${index}`, text: assumption });
  });
  return fields;
}

export const summaryLength: GuardrailRule = (draft, context) => {
  const sentences = splitSentences(draft.summary).length;
  const chars = draft.summary.length;
  if (sentences <= context.maxSentences && chars <= context.maxChars) {
    return [];
  }
  return [
    violation(
      "SUMMARY_TOO_LONG",
      "summary",
      `summary has ${sentences} sentence(s) and ${chars} character(s); limit is ${context.maxSentences} sentence(s) and ${context.maxChars} character(s)`,
    ),
  ];
};

export const outOfScope: GuardrailRule = (draft, context) => {
  const found: Violation[] = [];
  for (const field of textFields(draft)) {
    const terms = findTerms(field.text, context.outOfScopeTerms);
    if (terms.length > 0) {
      found.push(violation("OUT_OF_SCOPE", field.path, `mentions ${terms.join(", ")}, which is not part of ${context.gameMode}`));
    }
  }
  const mode = context.gameMode.toLowerCase();
  draft.buildPlan.forEach((step, stepIndex) => {
    step.items.forEach((item, itemIndex) => {
      const facts = context.facts.items.get(item.id);
      if (facts?.modes && !facts.modes.some((candidate) => candidate.toLowerCase() === mode)) {
        found.push(
          violation(
            "OUT_OF_SCOPE",
            `buildPlan.${stepIndex}.items.${itemIndex}.id`,
            `item ${item.id} (${facts.name}) is not available in ${context.gameMode}`,
          ),
        );
      }
    });
  });
  return found;
};

/** Closest known item by id or name, when it is close enough to be a typo. */
function suggestItem(candidate: string, facts: FactSet): string | null {
  let best: { label: string; cost: number } | null = null;
  for (const item of facts.items.values()) {
    for (const key of [item.id, item.name]) {
      const cost = distance(candidate.toLowerCase(), key.toLowerCase());
      if (best === null || cost < best.cost) {
        best = { label: `${item.id} (${item.name})`, cost };
      }
    }
  }
  if (best === null || best.cost > Math.max(2, Math.floor(candidate.length / 3))) {
    return null;
  }
  return best.label;
}

function unknownItem(path: string, id: string, facts: FactSet): Violation {
  const suggestion = suggestItem(id, facts);
  const hint = suggestion ? `; did you mean ${suggestion}?` : "";
  return violation("UNKNOWN_ITEM", path, `item ${id} does not exist on patch ${facts.patch}${hint}`);
}

export const unknownItems: GuardrailRule = (draft, context) => {
  const found: Violation[] = [];
  draft.buildPlan.forEach((step, stepIndex) => {
    step.items.forEach((item, itemIndex) => {
      if (!context.facts.items.has(item.id)) {
        found.push(unknownItem(`buildPlan.${stepIndex}.items.${itemIndex}.id`, item.id, context.facts));
      }
    });
  });
  draft.statClaims.forEach((claim, index) => {
    if (claim.subject === "item" && !context.facts.items.has(claim.id)) {
      found.push(unknownItem(`statClaims.${index}.id`, claim.id, context.facts));
    }
  });
  return found;
};

export const statMismatch: GuardrailRule = (draft, context) => {
  const found: Violation[] = [];
  draft.statClaims.forEach((claim, index) => {
    const path = `statClaims.${index}.value`;
    if (claim.subject === "item" && !context.facts.items.has(claim.id)) {
      // Reported by the unknown item rule.
      return;
    }
    const record = claim.subject === "item" ? context.facts.items.get(claim.id) : context.facts.entities.get(claim.id);
    // Own keys only: a claimed `constructor` must not resolve to Object's.
    const stats = record?.stats;
    const actual = stats && Object.hasOwn(stats, claim.stat) ? stats[claim.stat] : undefined;
    if (typeof actual !== "number") {
      found.push(violation("STAT_MISMATCH", path, `no recorded ${claim.stat} for ${claim.subject} ${claim.id}`));
      return;
    }
    const slack = Math.max(MIN_STAT_SLACK, context.statTolerance * Math.abs(actual));
    if (Math.abs(claim.value - actual) > slack) {
      found.push(
        violation("STAT_MISMATCH", path, `${claim.subject} ${claim.id} ${claim.stat} is ${actual}, draft claims ${claim.value}`),
      );
    }
  });
  return found;
};

export const missingEvidence: GuardrailRule = (draft, context) => {
  if (context.evidence.length === 0) {
    return [];
  }
  const available = new Set(context.evidence.map((snippet) => snippet.id));
  if (draft.evidenceIds.some((id) => available.has(id))) {
    return [];
  }
  const message =
    draft.evidenceIds.length === 0
      ? `draft cites no evidence while ${context.evidence.length} snippet(s) are available`
      : `draft cites ${draft.evidenceIds.join(", ")}, none of which was retrieved`;
  return [violation("MISSING_EVIDENCE", "evidenceIds", message)];
};

/** Rules in reporting order. */
export const GUARDRAIL_RULES: readonly GuardrailRule[] = Object.freeze([
  summaryLength,
  outOfScope,
  unknownItems,
  statMismatch,
  missingEvidence,
]);
