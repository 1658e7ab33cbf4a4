import type { FactSet } from "../facts/types.js";
import type { Violation } from "../guardrail/violations.js";
import type { EvidenceSnippet } from "../retrieval/ranker.js";
import type { StrategyDraft } from "../strategy/draft.js";
import type { ThreatScore } from "../threat/estimator.js";
import { IllegalTransitionError } from "./errors.js";
import type { RequestContext } from "./request.js";

export const PEV_PHASES = [
  "init",
  "facts_loaded",
  "evidence_gathered",
  "scored",
  "drafted",
  "validated",
  "refining",
  "final",
] as const;

export type PevPhase = (typeof PEV_PHASES)[number];

/** Edges of the control loop. `final` is the only terminal phase. */
const TRANSITIONS: Readonly<Record<PevPhase, readonly PevPhase[]>> = {
  init: ["facts_loaded"],
  facts_loaded: ["evidence_gathered"],
  evidence_gathered: ["scored"],
  scored: ["drafted"],
  drafted: ["validated"],
  validated: ["refining", "final"],
  refining: ["drafted"],
  final: [],
};

export interface PhaseTransition {
  readonly from: PevPhase;
  readonly to: PevPhase;
  /** Generation calls made when the transition happened. */
  readonly attempt: number;
}

export type AttemptOutcome = "passed" | "rejected" | "generation_failed";

export interface AttemptRecord {
  readonly attempt: number;
  readonly outcome: AttemptOutcome;
  readonly violations: readonly Violation[];
}

/**
 * Aggregate threaded through one run. Only the orchestrator mutates it, and
 * only in phase order.
 */
export interface RunState {
  readonly request: RequestContext;
  phase: PevPhase;
  facts: FactSet | null;
  evidence: readonly EvidenceSnippet[];
  threatScores: readonly ThreatScore[];
  /** Non-null once the first generation attempt has completed. */
  draft: StrategyDraft | null;
  /** Generation calls made so far. */
  attempts: number;
  /** Back-edges taken through `refining`. */
  refinements: number;
  violationsHistory: AttemptRecord[];
  history: PhaseTransition[];
  terminal: boolean;
}

export function createRunState(request: RequestContext): RunState {
  return {
    request,
    phase: "init",
    facts: null,
    evidence: [],
    threatScores: [],
    draft: null,
    attempts: 0,
    refinements: 0,
    violationsHistory: [],
    history: [],
    terminal: false,
  };
}

export function canTransition(from: PevPhase, to: PevPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Moves the state along one edge and records it. */
export function advance(state: RunState, to: PevPhase): PhaseTransition {
  if (state.terminal || !canTransition(state.phase, to)) {
    throw new IllegalTransitionError(state.phase, to);
  }
  const transition: PhaseTransition = Object.freeze({ from: state.phase, to, attempt: state.attempts });
  state.phase = to;
  state.history.push(transition);
  state.terminal = to === "final";
  return transition;
}
