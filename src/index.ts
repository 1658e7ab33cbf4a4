export { loadCoachConfig, DEFAULT_PATCH, type CoachConfig } from "./config/coachConfig.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";

export { createFactSet, type EntityFacts, type FactSet, type ItemFacts, type RuneFacts } from "./facts/types.js";
export {
  DataCorruptError,
  FilePatchFactsLoader,
  PatchNotFoundError,
  type FactsLoader,
} from "./facts/loader.js";
export { CachedFactsLoader, type FactsCacheStats } from "./facts/cache.js";

export { rank, tokenise, DEFAULT_BM25, type CorpusDocument, type EvidenceSnippet } from "./retrieval/ranker.js";
export { buildEvidenceQuery, PatchGuideCorpus, StaticCorpus, type EvidenceCorpus } from "./retrieval/corpus.js";

export {
  ThreatEstimator,
  DEFAULT_TAG_WEIGHTS,
  THREAT_MAX,
  THREAT_MIN,
  type ThreatScore,
  type ThreatScorer,
} from "./threat/estimator.js";
export { collectSignals, PatchWinrateSignalSource, type ExternalSignalSource } from "./threat/signals.js";

export { StrategyDraftSchema, TEAM_ROLES, BUILD_WINDOWS, type StrategyDraft } from "./strategy/draft.js";
export {
  GenerationSchemaError,
  GenerationTimeoutError,
  parseStructuredDraft,
  type DraftGenerator,
  type GenerationInput,
} from "./strategy/generator.js";
export { HeuristicDraftGenerator } from "./strategy/heuristicGenerator.js";

export { GuardrailValidator, type DraftValidator } from "./guardrail/validator.js";
export { VIOLATION_CODES, type ValidationOutcome, type Violation, type ViolationCode } from "./guardrail/violations.js";

export { createRequestContext, type RequestContext, type RequestInput } from "./pev/request.js";
export { PEV_PHASES, type AttemptRecord, type PevPhase, type PhaseTransition } from "./pev/state.js";
export { EvidenceUnavailableError, FactsUnavailableError, PevCancelledError, PevError } from "./pev/errors.js";
export { PevOrchestrator, fallbackDraft, type PevResult, type PevRunOptions } from "./pev/orchestrator.js";

export { createCoachServer } from "./server/tools.js";
