import { z } from "zod";

export const TEAM_ROLES = ["peel", "engage", "poke", "zone", "front_to_back", "anti_dive"] as const;
export type TeamRole = (typeof TEAM_ROLES)[number];

export const BUILD_WINDOWS = ["early", "mid", "late"] as const;
export type BuildWindow = (typeof BUILD_WINDOWS)[number];

const IdSchema = z.union([z.string().trim().min(1), z.number().int().nonnegative()]).transform(String);

export const BuildItemSchema = z
  .object({
    id: IdSchema,
    name: z.string().trim().min(1),
  })
  .strict();

export const BuildStepSchema = z
  .object({
    trigger: z.string().trim().min(1),
    window: z.enum(BUILD_WINDOWS),
    items: z.array(BuildItemSchema).min(1),
    rationale: z.string().trim().min(1),
  })
  .strict();

export const StatClaimSchema = z
  .object({
    subject: z.enum(["item", "entity"]),
    id: IdSchema,
    stat: z.string().trim().min(1),
    value: z.number().finite(),
  })
  .strict();

/** Structured recommendation produced by a generator and checked by the guardrail. */
export const StrategyDraftSchema = z
  .object({
    role: z.enum(TEAM_ROLES),
    buildPlan: z.array(BuildStepSchema),
    summary: z.string().trim().min(1),
    evidenceIds: z.array(z.string().trim().min(1)),
    assumptions: z.array(z.string().trim().min(1)).default([]),
    statClaims: z.array(StatClaimSchema).default([]),
  })
  .strict();

export type BuildItem = z.infer<typeof BuildItemSchema>;
export type BuildStep = z.infer<typeof BuildStepSchema>;
export type StatClaim = z.infer<typeof StatClaimSchema>;
export type StrategyDraft = z.infer<typeof StrategyDraftSchema>;

/** Splits a summary into sentences on terminal punctuation. */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/u)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}
