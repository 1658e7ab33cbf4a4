import { resolve } from "node:path";

import { LOG_LEVELS, type LogLevel } from "../logger.js";
import {
  readBool,
  readEnum,
  readInt,
  readNumber,
  readOptionalString,
  readString,
  type EnvSource,
} from "./env.js";

/** Patch served when a request does not name one. */
export const DEFAULT_PATCH = "14.99";

/** Runtime configuration shared by the orchestrator, the collaborators and the tools. */
export interface CoachConfig {
  readonly defaultPatch: string;
  /** Absolute directory holding one sub-directory per patch. */
  readonly dataDir: string;
  /** Regeneration rounds allowed after the first draft. */
  readonly maxAttempts: number;
  /** Number of evidence snippets kept by the ranker (K). */
  readonly evidenceCap: number;
  readonly generationTimeoutMs: number;
  readonly summaryMaxSentences: number;
  readonly summaryMaxChars: number;
  /** Relative tolerance applied to numeric claims. */
  readonly statTolerance: number;
  /** Blend weight of the external signal in threat scores. */
  readonly signalWeight: number;
  readonly signalConcurrency: number;
  readonly logFile: string | null;
  readonly logLevel: LogLevel;
  /** Replace sensitive payload values in log entries. */
  readonly logRedact: boolean;
}

/**
 * Resolves the configuration from environment variables. Invalid values fall
 * back to their defaults instead of aborting the boot sequence.
 */
export function loadCoachConfig(env: EnvSource = process.env, cwd: string = process.cwd()): CoachConfig {
  const logFile = readOptionalString("COACH_LOG_FILE", env);
  return Object.freeze({
    defaultPatch: readString("COACH_DEFAULT_PATCH", DEFAULT_PATCH, env),
    dataDir: resolve(cwd, readString("COACH_DATA_DIR", "data/patches", env)),
    maxAttempts: readInt("COACH_MAX_ATTEMPTS", 1, { min: 0, max: 5 }, env),
    evidenceCap: readInt("COACH_EVIDENCE_CAP", 5, { min: 1, max: 8 }, env),
    generationTimeoutMs: readInt("COACH_GENERATION_TIMEOUT_MS", 15_000, { min: 100, max: 300_000 }, env),
    summaryMaxSentences: readInt("COACH_SUMMARY_MAX_SENTENCES", 3, { min: 1, max: 10 }, env),
    summaryMaxChars: readInt("COACH_SUMMARY_MAX_CHARS", 400, { min: 40, max: 4_000 }, env),
    statTolerance: readNumber("COACH_STAT_TOLERANCE", 0.05, { min: 0, max: 1 }, env),
    signalWeight: readNumber("COACH_SIGNAL_WEIGHT", 0.35, { min: 0, max: 1 }, env),
    signalConcurrency: readInt("COACH_SIGNAL_CONCURRENCY", 4, { min: 1, max: 16 }, env),
    logFile: logFile ? resolve(cwd, logFile) : null,
    logLevel: readEnum("COACH_LOG_LEVEL", LOG_LEVELS, "info", env),
    logRedact: readBool("COACH_LOG_REDACT", false, env),
  });
}
