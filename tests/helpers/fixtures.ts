import { createFactSet, type EntityFacts, type FactSet, type ItemFacts } from "../../src/facts/types.js";
import type { FactsLoader } from "../../src/facts/loader.js";
import type { PevSettings } from "../../src/pev/orchestrator.js";
import type { CorpusDocument } from "../../src/retrieval/ranker.js";
import type { StrategyDraft } from "../../src/strategy/draft.js";
import type { DraftGenerator, GenerationInput } from "../../src/strategy/generator.js";

export const TEST_PATCH = "14.99";

export const TEST_ENTITIES: EntityFacts[] = [
  { id: "A", name: "Alpha", tags: ["tank", "engage"], stats: { hp: 650, armor: 40 } },
  { id: "B", name: "Bravo", tags: ["mage", "poke"], stats: { hp: 580 } },
  { id: "C", name: "Charlie", tags: ["marksman"], stats: { hp: 600, attack_range: 550 } },
  { id: "D", name: "Delta", tags: ["support", "shield"], stats: { hp: 560 } },
  { id: "E", name: "Echo", tags: ["fighter"], stats: { hp: 680 } },
  { id: "F", name: "Foxtrot", tags: ["assassin", "burst"], stats: { hp: 640 } },
  { id: "G", name: "Golf", tags: ["mage", "cc"], stats: { hp: 590 } },
  { id: "H", name: "Hotel", tags: ["support", "healer"], stats: { hp: 570 } },
  { id: "I", name: "India", tags: ["marksman", "mobility"], stats: { hp: 610 } },
  { id: "J", name: "Juliet", tags: ["tank"], stats: { hp: 700 } },
];

export const TEST_ITEMS: ItemFacts[] = [
  { id: "1001", name: "Grievous Tome", cost: 800, tags: ["anti_heal", "ability_power"], stats: { ability_power: 35 } },
  { id: "1002", name: "Bramble Vest", cost: 800, tags: ["anti_heal", "armor"], stats: { armor: 30 } },
  { id: "1003", name: "Null Cloak", cost: 900, tags: ["magic_resist"], stats: { magic_resist: 25 } },
  { id: "1004", name: "Warden Mail", cost: 1000, tags: ["armor"], stats: { armor: 40 } },
  { id: "1005", name: "Giant Belt", cost: 900, tags: ["health"], stats: { health: 350 } },
  { id: "1006", name: "Spirit Ward", cost: 2900, tags: ["magic_resist", "health"], stats: { magic_resist: 50, health: 400 } },
  { id: "1007", name: "Thorn Plate", cost: 2450, tags: ["armor", "anti_heal"], stats: { armor: 75 } },
  { id: "1008", name: "Deathcap", cost: 3600, tags: ["ability_power"], stats: { ability_power: 130 } },
  { id: "1009", name: "Edge", cost: 3400, tags: ["attack_damage"], stats: { attack_damage: 65 } },
  { id: "1010", name: "Jungle Pup", cost: 450, tags: ["jungle_pet"], stats: {}, modes: ["classic"] },
];

export function testFacts(patch = TEST_PATCH): FactSet {
  return createFactSet({ patch, entities: TEST_ENTITIES, items: TEST_ITEMS });
}

export const TEST_CORPUS: CorpusDocument[] = [
  { id: "s1", topic: "Foxtrot", text: "Foxtrot dives the backline with burst; group up and hold crowd control." },
  { id: "s2", topic: "itemization", text: "Buy anti heal early against Hotel healing." },
  { id: "s3", topic: "poke", text: "Bravo pokes from range before the fight starts." },
  { id: "s4", topic: "front line", text: "Alpha leads the fight while Charlie deals damage from behind." },
  { id: "s5", topic: "relics", text: "Health relics restore sustain between fights." },
];

export const TEST_SETTINGS: PevSettings = Object.freeze({
  maxAttempts: 1,
  evidenceCap: 5,
  generationTimeoutMs: 1_000,
  summaryMaxSentences: 3,
  summaryMaxChars: 400,
  statTolerance: 0.05,
  signalWeight: 0.35,
  signalConcurrency: 4,
});

/** Draft that passes every guardrail rule against {@link testFacts} and {@link TEST_CORPUS}. */
export function validDraft(overrides: Partial<StrategyDraft> = {}): StrategyDraft {
  return {
    role: "front_to_back",
    buildPlan: [
      {
        trigger: "enemy sustain from Hotel",
        window: "early",
        items: [{ id: "1001", name: "Grievous Tome" }],
        rationale: "Cuts their healing.",
      },
      {
        trigger: "Foxtrot is the main threat",
        window: "mid",
        items: [{ id: "1004", name: "Warden Mail" }],
        rationale: "Armor against burst.",
      },
    ],
    summary: "Fight front to back. Buy anti-heal early.",
    evidenceIds: ["s1", "s2"],
    assumptions: ["Both teams are at even gold."],
    statClaims: [{ subject: "item", id: "1004", stat: "armor", value: 40 }],
    ...overrides,
  };
}

/** Loader returning a fixed fact set and recording the requested patches. */
export class StubFactsLoader implements FactsLoader {
  public readonly calls: string[] = [];

  constructor(private readonly facts: FactSet = testFacts()) {}

  async load(patch: string): Promise<FactSet> {
    this.calls.push(patch);
    return this.facts;
  }
}

export type GenerationStep = (input: GenerationInput, signal: AbortSignal) => Promise<unknown>;

/**
 * Generator replaying scripted steps. The last step repeats once the script
 * is exhausted.
 */
export class ScriptedGenerator implements DraftGenerator {
  public readonly inputs: GenerationInput[] = [];

  constructor(private readonly steps: readonly GenerationStep[]) {}

  /** Script made of fixed outputs. */
  static returning(...outputs: unknown[]): ScriptedGenerator {
    return new ScriptedGenerator(outputs.map((output) => async () => output));
  }

  async generate(input: GenerationInput, signal: AbortSignal): Promise<unknown> {
    this.inputs.push(input);
    const step = this.steps[Math.min(this.inputs.length, this.steps.length) - 1];
    if (!step) {
      throw new Error("generation script is empty");
    }
    return step(input, signal);
  }
}
