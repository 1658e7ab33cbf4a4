import type { FactSet } from "../facts/types.js";

/** Inclusive bounds of the threat scale. */
export const THREAT_MIN = 1;
export const THREAT_MAX = 10;

/** Threat assigned to one opposing entity for a run. */
export interface ThreatScore {
  readonly entityId: string;
  readonly score: number;
  readonly rationale: string;
  /** `blended` when an external signal contributed to the value. */
  readonly source: "static" | "blended";
}

/**
 * Single producer of threat scores for a run. The orchestrator calls exactly
 * one scorer per entity.
 */
export interface ThreatScorer {
  score(entityId: string, facts: FactSet, externalSignal: number | null): ThreatScore;
}

/**
 * Contribution of each tag to the static base. Tags cover damage profile,
 * mobility, crowd control and the ARAM-specific sustain/poke concerns.
 */
export const DEFAULT_TAG_WEIGHTS: Readonly<Record<string, number>> = Object.freeze({
  assassin: 2,
  mage: 1.5,
  marksman: 1.5,
  fighter: 1,
  tank: 0.5,
  support: 0.5,
  burst: 1.5,
  poke: 1.5,
  mobility: 1,
  dive: 1,
  cc: 1.5,
  engage: 1,
  healer: 2,
  shield: 1,
});

export interface ThreatEstimatorOptions {
  readonly tagWeights?: Readonly<Record<string, number>>;
  /** Weight of the external signal in [0, 1]. */
  readonly signalWeight?: number;
  /** Win rate mapped to the bottom of the scale. */
  readonly signalFloor?: number;
  /** Win rate mapped to the top of the scale. */
  readonly signalCeiling?: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Heuristic threat estimate. The static base is `1 + Σ weight(tag)` over the
 * entity's tags; an available win rate is mapped linearly onto the same scale
 * and blended in. Pure and deterministic.
 */
export class ThreatEstimator implements ThreatScorer {
  private readonly tagWeights: Readonly<Record<string, number>>;
  private readonly signalWeight: number;
  private readonly signalFloor: number;
  private readonly signalCeiling: number;

  constructor(options: ThreatEstimatorOptions = {}) {
    this.tagWeights = options.tagWeights ?? DEFAULT_TAG_WEIGHTS;
    this.signalWeight = clamp(Number.isFinite(options.signalWeight) ? Number(options.signalWeight) : 0.35, 0, 1);
    this.signalFloor = options.signalFloor ?? 0.4;
    this.signalCeiling = options.signalCeiling ?? 0.6;
    if (!(this.signalCeiling > this.signalFloor)) {
      throw new Error(`signal ceiling ${this.signalCeiling} must exceed floor ${this.signalFloor}`);
    }
  }

  score(entityId: string, facts: FactSet, externalSignal: number | null): ThreatScore {
    const entity = facts.entities.get(entityId);
    const reasons: string[] = [];
    let base = THREAT_MIN;

    if (!entity) {
      reasons.push("unknown entity");
    } else {
      const matched: string[] = [];
      for (const tag of entity.tags) {
        const weight = this.tagWeights[tag.toLowerCase()];
        if (weight !== undefined && weight > 0) {
          base += weight;
          matched.push(tag.toLowerCase());
        }
      }
      reasons.push(matched.length > 0 ? `tags: ${matched.join(", ")}` : "no threat tags");
    }
    base = clamp(base, THREAT_MIN, THREAT_MAX);

    const signal = this.usableSignal(externalSignal);
    if (signal === null || this.signalWeight === 0) {
      return { entityId, score: round2(base), rationale: reasons.join("; "), source: "static" };
    }

    const position = clamp((signal - this.signalFloor) / (this.signalCeiling - this.signalFloor), 0, 1);
    const signalScore = THREAT_MIN + (THREAT_MAX - THREAT_MIN) * position;
    const blended = clamp((1 - this.signalWeight) * base + this.signalWeight * signalScore, THREAT_MIN, THREAT_MAX);
    reasons.push(`win rate ${(signal * 100).toFixed(1)}%`);
    return { entityId, score: round2(blended), rationale: reasons.join("; "), source: "blended" };
  }

  /** Win rates outside [0, 1] or non-finite values are treated as unavailable. */
  private usableSignal(value: number | null): number | null {
    if (value === null || !Number.isFinite(value) || value < 0 || value > 1) {
      return null;
    }
    return value;
  }
}
