import { randomUUID } from "node:crypto";

import type { CoachConfig } from "../config/coachConfig.js";
import type { FactsLoader } from "../facts/loader.js";
import type { FactSet } from "../facts/types.js";
import { GuardrailValidator, type DraftValidator } from "../guardrail/validator.js";
import { violation, type Violation } from "../guardrail/violations.js";
import type { StructuredLogger } from "../logger.js";
import { buildEvidenceQuery, type EvidenceCorpus } from "../retrieval/corpus.js";
import { rank, tokenise, type CorpusDocument, type EvidenceSnippet } from "../retrieval/ranker.js";
import { withDeadline } from "../runtime/timers.js";
import type { StrategyDraft } from "../strategy/draft.js";
import {
  GenerationSchemaError,
  GenerationTimeoutError,
  parseStructuredDraft,
  type DraftGenerator,
} from "../strategy/generator.js";
import { ThreatEstimator, type ThreatScore, type ThreatScorer } from "../threat/estimator.js";
import { collectSignals, type ExternalSignalSource } from "../threat/signals.js";
import { deepFreeze } from "../utils/freeze.js";
import { EvidenceUnavailableError, FactsUnavailableError, PevCancelledError } from "./errors.js";
import type { RequestContext } from "./request.js";
import { advance, createRunState, type AttemptRecord, type PevPhase, type PhaseTransition } from "./state.js";

/** Settings the orchestrator reads from the coach configuration. */
export type PevSettings = Pick<
  CoachConfig,
  | "maxAttempts"
  | "evidenceCap"
  | "generationTimeoutMs"
  | "summaryMaxSentences"
  | "summaryMaxChars"
  | "statTolerance"
  | "signalWeight"
  | "signalConcurrency"
>;

export interface PevDependencies {
  readonly facts: FactsLoader;
  readonly corpus: EvidenceCorpus;
  readonly generator: DraftGenerator;
  /** Defaults to a {@link GuardrailValidator} built from the settings. */
  readonly validator?: DraftValidator;
  /** Defaults to a {@link ThreatEstimator} built from the settings. */
  readonly threat?: ThreatScorer;
  readonly signals?: ExternalSignalSource | null;
  readonly logger?: StructuredLogger;
  readonly config: PevSettings;
}

export interface PevRunOptions {
  /** Regeneration rounds allowed after the first draft. */
  readonly maxAttempts?: number;
  readonly signal?: AbortSignal;
  readonly generationTimeoutMs?: number;
  /** Identifier bound to the run's log entries; never part of the result. */
  readonly runId?: string;
  readonly onTransition?: (transition: PhaseTransition) => void;
}

/** Terminal outcome of a run. Contains no clock or random values. */
export interface PevResult {
  readonly patch: string;
  readonly finalDraft: StrategyDraft;
  readonly threatScores: readonly ThreatScore[];
  readonly evidence: readonly EvidenceSnippet[];
  readonly violationsHistory: readonly AttemptRecord[];
  /** Generation calls made, between 1 and `maxAttempts + 1`. */
  readonly attemptsUsed: number;
  /** True when the final draft did not pass every guardrail rule. */
  readonly degraded: boolean;
}

/** Draft returned when no attempt produced a usable one. */
export function fallbackDraft(evidence: readonly EvidenceSnippet[]): StrategyDraft {
  const top = evidence[0];
  return {
    role: "front_to_back",
    buildPlan: [],
    summary: "No validated plan is available. Group with your team and fight front to back.",
    evidenceIds: top ? [top.id] : [],
    assumptions: ["Generation failed, so this plan ignores the specific matchup."],
    statClaims: [],
  };
}

function describeFailure(error: unknown): Violation[] {
  if (error instanceof GenerationSchemaError) {
    return error.details.issues.map((issue) => violation("SCHEMA_INVALID", issue.path, issue.message));
  }
  const message = error instanceof Error ? error.message : String(error);
  return [violation("GENERATION_FAILED", "", message)];
}

/**
 * Plan → Evidence → Verify control loop. A run loads the facts, ranks the
 * evidence, scores the opponents, then alternates generation and validation
 * until a draft passes or the regeneration budget is spent. Only fatal
 * collaborator failures and cancellation reject; everything else is folded
 * into the result.
 */
export class PevOrchestrator {
  private readonly validator: DraftValidator;
  private readonly threat: ThreatScorer;

  constructor(private readonly deps: PevDependencies) {
    const { config } = deps;
    this.validator =
      deps.validator ??
      new GuardrailValidator({
        maxSentences: config.summaryMaxSentences,
        maxChars: config.summaryMaxChars,
        statTolerance: config.statTolerance,
      });
    this.threat = deps.threat ?? new ThreatEstimator({ signalWeight: config.signalWeight });
  }

  async run(request: RequestContext, options: PevRunOptions = {}): Promise<PevResult> {
    const { config } = this.deps;
    const maxAttempts = normaliseBound(options.maxAttempts, config.maxAttempts);
    const timeoutMs = options.generationTimeoutMs ?? config.generationTimeoutMs;
    const signal = options.signal;
    const logger = this.deps.logger?.child({ run_id: options.runId ?? randomUUID(), patch: request.patch });
    const state = createRunState(request);

    const ensureActive = (): void => {
      if (signal?.aborted) {
        throw new PevCancelledError(state.phase, signal.reason);
      }
    };
    const step = (to: PevPhase): void => {
      ensureActive();
      const transition = advance(state, to);
      logger?.debug("pev_transition", { from: transition.from, to: transition.to, attempt: transition.attempt });
      options.onTransition?.(transition);
    };
    const guard = async <T>(call: () => Promise<T>, fatal?: (error: unknown) => Error): Promise<T> => {
      ensureActive();
      try {
        return await call();
      } catch (error) {
        if (signal?.aborted) {
          throw new PevCancelledError(state.phase, signal.reason);
        }
        throw fatal ? fatal(error) : error;
      }
    };

    logger?.info("pev_started", {
      mode: request.mode,
      team: request.team.length,
      opponents: request.opponents.length,
      max_attempts: maxAttempts,
    });

    const facts = await guard(
      () => this.deps.facts.load(request.patch, signal),
      (error) => new FactsUnavailableError(request.patch, error),
    );
    state.facts = facts;
    step("facts_loaded");

    const corpus = await guard(
      () => this.deps.corpus.documents(request, signal),
      (error) => new EvidenceUnavailableError(request.patch, error),
    );
    state.evidence = this.gatherEvidence(request, corpus, logger);
    step("evidence_gathered");

    state.threatScores = await guard(() => this.scoreOpponents(request, facts, signal, logger));
    step("scored");

    let feedback: readonly Violation[] = [];
    let passed = false;
    for (;;) {
      ensureActive();
      const attempt = state.attempts + 1;
      let draft: StrategyDraft | null = null;
      let failure: unknown = null;
      try {
        const output = await withDeadline(
          (attemptSignal) =>
            this.deps.generator.generate(
              {
                request,
                facts,
                evidence: state.evidence,
                threatScores: state.threatScores,
                feedback,
                attempt,
              },
              attemptSignal,
            ),
          { timeoutMs, signal, onTimeout: () => new GenerationTimeoutError(attempt, timeoutMs) },
        );
        draft = parseStructuredDraft(output);
      } catch (error) {
        if (signal?.aborted) {
          throw new PevCancelledError(state.phase, signal.reason);
        }
        failure = error;
      }
      state.attempts = attempt;
      state.draft = draft ?? state.draft ?? fallbackDraft(state.evidence);
      step("drafted");

      let record: AttemptRecord;
      if (draft) {
        const outcome = this.validator.validate(draft, facts, state.evidence);
        record = { attempt, outcome: outcome.ok ? "passed" : "rejected", violations: outcome.violations };
      } else {
        const violations = describeFailure(failure);
        logger?.warn("generation_failed", {
          attempt,
          code: failure instanceof GenerationTimeoutError || failure instanceof GenerationSchemaError ? failure.code : null,
          message: failure instanceof Error ? failure.message : String(failure),
        });
        record = { attempt, outcome: "generation_failed", violations };
      }
      state.violationsHistory.push(record);
      passed = record.outcome === "passed";
      step("validated");
      logger?.info("guardrail_checked", {
        attempt,
        outcome: record.outcome,
        violations: record.violations.map((entry) => entry.code),
      });

      if (passed || state.refinements >= maxAttempts) {
        break;
      }
      step("refining");
      state.refinements += 1;
      feedback = record.violations;
    }

    step("final");
    const finalDraft = state.draft ?? fallbackDraft(state.evidence);
    logger?.info("pev_finished", { attempts_used: state.attempts, degraded: !passed });
    return deepFreeze({
      patch: request.patch,
      finalDraft,
      threatScores: state.threatScores,
      evidence: state.evidence,
      violationsHistory: state.violationsHistory,
      attemptsUsed: state.attempts,
      degraded: !passed,
    });
  }

  private gatherEvidence(
    request: RequestContext,
    corpus: readonly CorpusDocument[],
    logger: StructuredLogger | undefined,
  ): EvidenceSnippet[] {
    if (corpus.length === 0) {
      logger?.warn("evidence_corpus_empty", {});
    }
    const query = buildEvidenceQuery(request);
    const evidence = rank(query, corpus, this.deps.config.evidenceCap);
    logger?.info("ranker_search", {
      query_terms: tokenise(query).length,
      corpus_size: corpus.length,
      returned: evidence.length,
      top_score: evidence[0]?.score ?? null,
    });
    if (evidence.length > 0 && evidence.every((snippet) => snippet.score === 0)) {
      logger?.info("ranker_no_match", { query });
    }
    return evidence;
  }

  /** One scorer call per opponent, in composition order. */
  private async scoreOpponents(
    request: RequestContext,
    facts: FactSet,
    signal: AbortSignal | undefined,
    logger: StructuredLogger | undefined,
  ): Promise<ThreatScore[]> {
    const ids = request.opponents.map((member) => member.id);
    const signals = await collectSignals(ids, this.deps.signals ?? null, {
      patch: request.patch,
      concurrency: this.deps.config.signalConcurrency,
      signal,
      logger,
    });
    return ids.map((entityId) => this.threat.score(entityId, facts, signals.get(entityId) ?? null));
  }
}

function normaliseBound(value: number | undefined, fallback: number): number {
  const candidate = value ?? fallback;
  return Number.isFinite(candidate) ? Math.max(0, Math.floor(candidate)) : Math.max(0, Math.floor(fallback));
}
