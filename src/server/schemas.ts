import { z } from "zod";

/** A champion given either by id or as `{ id, role }`. */
const CompositionMemberSchema = z.union([
  z.string().trim().min(1).max(64),
  z
    .object({
      id: z.string().trim().min(1).max(64),
      role: z.string().trim().min(1).max(32).optional(),
    })
    .strict(),
]);

const PatchSchema = z.string().trim().min(1).max(32);
const QuestionSchema = z.string().trim().min(1).max(2_000);
const MaxAttemptsSchema = z.number().int().min(0).max(5);

export const PreGameAdviceInputShape = {
  patch: PatchSchema.optional(),
  ally_comp: z.array(CompositionMemberSchema).min(1).max(5),
  enemy_comp: z.array(CompositionMemberSchema).min(1).max(5),
  question: QuestionSchema.optional(),
  max_attempts: MaxAttemptsSchema.optional(),
} as const;

export const PreGameAdviceInputSchema = z.object(PreGameAdviceInputShape).strict();
export type PreGameAdviceInput = z.infer<typeof PreGameAdviceInputSchema>;

export const IngameQaInputShape = {
  patch: PatchSchema.optional(),
  question: QuestionSchema,
  my_champ: z.string().trim().min(1).max(64),
  ally_comp: z.array(CompositionMemberSchema).max(5).optional(),
  enemy_comp: z.array(CompositionMemberSchema).max(5).optional(),
  max_attempts: MaxAttemptsSchema.optional(),
} as const;

export const IngameQaInputSchema = z.object(IngameQaInputShape).strict();
export type IngameQaInput = z.infer<typeof IngameQaInputSchema>;
