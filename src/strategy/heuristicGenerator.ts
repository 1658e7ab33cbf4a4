import type { FactSet, ItemFacts } from "../facts/types.js";
import type { Violation } from "../guardrail/violations.js";
import type { ThreatScore } from "../threat/estimator.js";
import { splitSentences, type BuildStep, type StrategyDraft, type TeamRole } from "./draft.js";
import type { DraftGenerator, GenerationInput } from "./generator.js";

/** Focus tags mapped to a team role; the first matching tag wins. */
const ROLE_BY_TAG: ReadonlyArray<readonly [string, TeamRole]> = [
  ["poke", "poke"],
  ["engage", "engage"],
  ["healer", "peel"],
  ["shield", "peel"],
  ["support", "peel"],
  ["mage", "zone"],
  ["tank", "front_to_back"],
  ["fighter", "front_to_back"],
];

const ROLE_PHRASES: Readonly<Record<TeamRole, string>> = {
  peel: "peel for your carries",
  engage: "look for the first engage",
  poke: "poke them down before committing",
  zone: "zone the choke points with your abilities",
  front_to_back: "fight front to back",
  anti_dive: "hold your ground and punish the divers",
};

/** Opponent tags that make a diving composition. */
const DIVE_TAGS = new Set(["assassin", "dive"]);

/** Defensive item tag answering each damage profile. */
const COUNTER_TAG_BY_PROFILE: ReadonlyArray<readonly [string, string]> = [
  ["mage", "magic_resist"],
  ["assassin", "armor"],
  ["marksman", "armor"],
  ["fighter", "armor"],
];

const CITED_SNIPPETS = 3;

function hasTag(tags: readonly string[], tag: string): boolean {
  return tags.some((candidate) => candidate.toLowerCase() === tag);
}

/**
 * Deterministic generator built from the facts alone. It serves as the
 * default collaborator of the stdio server and as a stand-in for a model in
 * tests.
 */
export class HeuristicDraftGenerator implements DraftGenerator {
  constructor(private readonly gameMode = "aram") {}

  async generate(input: GenerationInput, signal: AbortSignal): Promise<StrategyDraft> {
    signal.throwIfAborted();
    const draft = this.compose(input);
    return input.feedback.length > 0 ? applyFeedback(draft, input.feedback, input) : draft;
  }

  private compose(input: GenerationInput): StrategyDraft {
    const { request, facts, evidence, threatScores } = input;
    const focusId = request.focus ?? request.team[0]?.id;
    const focus = focusId ? facts.entities.get(focusId) : undefined;
    const opponents = request.opponents.flatMap((member) => {
      const entity = facts.entities.get(member.id);
      return entity ? [entity] : [];
    });

    let role: TeamRole = "front_to_back";
    const matched = ROLE_BY_TAG.find(([tag]) => focus !== undefined && hasTag(focus.tags, tag));
    if (matched) {
      role = matched[1];
    } else if (opponents.filter((entity) => entity.tags.some((tag) => DIVE_TAGS.has(tag.toLowerCase()))).length >= 2) {
      role = "anti_dive";
    }

    const buildPlan: BuildStep[] = [];
    const healers = opponents.filter((entity) => hasTag(entity.tags, "healer"));
    const antiHeal = this.pickItem(facts, "anti_heal");
    if (healers.length > 0 && antiHeal) {
      buildPlan.push({
        trigger: `enemy sustain from ${healers.map((entity) => entity.name).join(", ")}`,
        window: "early",
        items: [{ id: antiHeal.id, name: antiHeal.name }],
        rationale: "Grievous wounds cuts their healing in extended fights.",
      });
    }

    const top = strongestThreat(threatScores);
    const topEntity = top ? facts.entities.get(top.entityId) : undefined;
    if (top && topEntity) {
      const profile = COUNTER_TAG_BY_PROFILE.find(([tag]) => hasTag(topEntity.tags, tag));
      const counter = this.pickItem(facts, profile ? profile[1] : "health");
      if (counter) {
        buildPlan.push({
          trigger: `${topEntity.name} is the main threat`,
          window: "mid",
          items: [{ id: counter.id, name: counter.name }],
          rationale: `Defensive stats against ${topEntity.name} keep you in the fight.`,
        });
      }
    }

    const opening = focus ? `As ${focus.name}, ${ROLE_PHRASES[role]}.` : `As a team, ${ROLE_PHRASES[role]}.`;
    const closing =
      top && topEntity
        ? `Respect ${topEntity.name} (threat ${top.score}/10)${healers.length > 0 ? " and buy anti-heal early" : ""}.`
        : "No opposing threat stands out, so play for even trades.";

    return {
      role,
      buildPlan,
      summary: `${opening} ${closing}`,
      evidenceIds: evidence.slice(0, CITED_SNIPPETS).map((snippet) => snippet.id),
      assumptions: [`Facts and threat scores reflect patch ${facts.patch}.`],
      statClaims: [],
    };
  }

  /** Cheapest item carrying `tag` that can be bought in the game mode; ties broken by id. */
  private pickItem(facts: FactSet, tag: string): ItemFacts | undefined {
    const mode = this.gameMode.toLowerCase();
    return [...facts.items.values()]
      .filter((item) => hasTag(item.tags, tag))
      .filter((item) => !item.modes || item.modes.some((candidate) => candidate.toLowerCase() === mode))
      .sort((left, right) => left.cost - right.cost || left.id.localeCompare(right.id))[0];
  }
}

function strongestThreat(scores: readonly ThreatScore[]): ThreatScore | undefined {
  let best: ThreatScore | undefined;
  for (const score of scores) {
    if (!best || score.score > best.score) {
      best = score;
    }
  }
  return best;
}

const ITEM_PATH = /^buildPlan\.(\d+)\.items\.(\d+)\.id$/;
const CLAIM_PATH = /^statClaims\.(\d+)\./;

/**
 * Applies the previous attempt's findings: flagged items and claims are
 * dropped, an overlong summary keeps its first sentence and missing
 * citations are filled from the evidence.
 */
export function applyFeedback(
  draft: StrategyDraft,
  feedback: readonly Violation[],
  input: Pick<GenerationInput, "evidence">,
): StrategyDraft {
  const droppedItems = new Set<string>();
  const droppedClaims = new Set<number>();
  let trimSummary = false;
  let citeEvidence = false;

  for (const entry of feedback) {
    const item = ITEM_PATH.exec(entry.path);
    if (item && (entry.code === "UNKNOWN_ITEM" || entry.code === "OUT_OF_SCOPE")) {
      droppedItems.add(`${item[1]}.${item[2]}`);
    }
    const claim = CLAIM_PATH.exec(entry.path);
    if (claim && (entry.code === "UNKNOWN_ITEM" || entry.code === "STAT_MISMATCH")) {
      droppedClaims.add(Number(claim[1]));
    }
    trimSummary ||= entry.code === "SUMMARY_TOO_LONG";
    citeEvidence ||= entry.code === "MISSING_EVIDENCE";
  }

  const buildPlan = draft.buildPlan
    .map((step, stepIndex) => ({
      ...step,
      items: step.items.filter((_, itemIndex) => !droppedItems.has(`${stepIndex}.${itemIndex}`)),
    }))
    .filter((step) => step.items.length > 0);

  const summary = trimSummary ? (splitSentences(draft.summary)[0] ?? draft.summary) : draft.summary;
  const evidenceIds = citeEvidence
    ? input.evidence.slice(0, CITED_SNIPPETS).map((snippet) => snippet.id)
    : draft.evidenceIds;

  return {
    ...draft,
    buildPlan,
    summary,
    evidenceIds,
    statClaims: draft.statClaims.filter((_, index) => !droppedClaims.has(index)),
  };
}
