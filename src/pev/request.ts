import { z } from "zod";

export const REQUEST_MODES = ["pre_game", "ingame_qa"] as const;
export type RequestMode = (typeof REQUEST_MODES)[number];

/** One member of a composition; the role tag is optional. */
export interface CompositionMember {
  readonly id: string;
  readonly role?: string;
}

/** Immutable inputs of a single run. */
export interface RequestContext {
  readonly mode: RequestMode;
  readonly patch: string;
  readonly team: readonly CompositionMember[];
  readonly opponents: readonly CompositionMember[];
  readonly question?: string;
  /** Entity played by the person asking, when known. */
  readonly focus?: string;
}

const MemberSchema = z.union([
  z.string().trim().min(1).transform((id) => ({ id })),
  z
    .object({
      id: z.string().trim().min(1),
      role: z.string().trim().min(1).optional(),
    })
    .strict(),
]);

const CompositionSchema = z
  .array(MemberSchema)
  .max(5)
  .superRefine((members, ctx) => {
    const seen = new Set<string>();
    members.forEach((member, index) => {
      if (seen.has(member.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, "id"], message: `duplicate entity ${member.id}` });
      }
      seen.add(member.id);
    });
  });

export const RequestInputSchema = z
  .object({
    mode: z.enum(REQUEST_MODES).default("pre_game"),
    patch: z.string().trim().min(1).optional(),
    team: CompositionSchema.default([]),
    opponents: CompositionSchema.default([]),
    question: z.string().trim().min(1).max(2_000).optional(),
    focus: z.string().trim().min(1).optional(),
  })
  .strict();

/** Loose input accepted by {@link createRequestContext}; members may be bare ids. */
export type RequestInput = z.input<typeof RequestInputSchema>;

export interface RequestDefaults {
  /** Patch applied when the input leaves it out. */
  readonly defaultPatch: string;
}

/**
 * Validates the input and freezes the resulting context. Throws a `ZodError`
 * on malformed input.
 */
export function createRequestContext(input: RequestInput, defaults: RequestDefaults): RequestContext {
  const parsed = RequestInputSchema.parse(input);
  const freezeMembers = (members: readonly { id: string; role?: string | undefined }[]): readonly CompositionMember[] =>
    Object.freeze(
      members.map((member) => Object.freeze(member.role ? { id: member.id, role: member.role } : { id: member.id })),
    );

  return Object.freeze({
    mode: parsed.mode,
    patch: parsed.patch ?? defaults.defaultPatch,
    team: freezeMembers(parsed.team),
    opponents: freezeMembers(parsed.opponents),
    ...(parsed.question ? { question: parsed.question } : {}),
    ...(parsed.focus ? { focus: parsed.focus } : {}),
  });
}
