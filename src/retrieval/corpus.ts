import { join } from "node:path";
import { z } from "zod";

import { isValidPatchId, PatchNotFoundError, readPatchFile } from "../facts/loader.js";
import type { RequestContext } from "../pev/request.js";
import type { CorpusDocument } from "./ranker.js";

/**
 * Source of candidate passages for a run. A failure here is fatal for the
 * run; an empty corpus is not.
 */
export interface EvidenceCorpus {
  documents(request: RequestContext, signal?: AbortSignal): Promise<readonly CorpusDocument[]>;
}

const GuideRecordSchema = z
  .object({
    id: z.union([z.string().trim().min(1), z.number().int()]).transform(String),
    topic: z.string().trim().min(1),
    text: z.string().trim().min(1),
  })
  .strict();

/** Guides shipped with a patch, stored as `<dataDir>/<patch>/guides.json`. */
export class PatchGuideCorpus implements EvidenceCorpus {
  constructor(private readonly dataDir: string) {}

  async documents(request: RequestContext, signal?: AbortSignal): Promise<readonly CorpusDocument[]> {
    if (!isValidPatchId(request.patch)) {
      throw new PatchNotFoundError(request.patch);
    }
    const guides = await readPatchFile(
      join(this.dataDir, request.patch),
      request.patch,
      "guides.json",
      z.array(GuideRecordSchema),
      { optional: true, signal },
    );
    return guides ?? [];
  }
}

/** Fixed corpus, handy for embedding callers and tests. */
export class StaticCorpus implements EvidenceCorpus {
  private readonly corpus: readonly CorpusDocument[];

  constructor(corpus: readonly CorpusDocument[]) {
    this.corpus = [...corpus];
  }

  async documents(): Promise<readonly CorpusDocument[]> {
    return this.corpus;
  }
}

/**
 * Builds the ranking query for a request: the question first, then the asking
 * player's entity, then both compositions.
 */
export function buildEvidenceQuery(request: RequestContext): string {
  const parts: string[] = [];
  if (request.question) {
    parts.push(request.question);
  }
  if (request.focus) {
    parts.push(request.focus);
  }
  for (const member of request.team) {
    parts.push(member.id);
  }
  for (const member of request.opponents) {
    parts.push(member.id);
  }
  return parts.join(" ");
}
