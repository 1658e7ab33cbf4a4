import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import {
  EntityRecordSchema,
  ItemRecordSchema,
  RuneRecordSchema,
  createFactSet,
  type FactSet,
} from "./types.js";

/** Boundary contract of the facts collaborator. */
export interface FactsLoader {
  load(patch: string, signal?: AbortSignal): Promise<FactSet>;
}

/** Raised when no data exists for the requested patch identifier. */
export class PatchNotFoundError extends Error {
  public readonly code = "E-FACTS-PATCH";
  public readonly hint = "patch_not_found";
  public readonly details: { patch: string };

  constructor(patch: string) {
    super(`no facts recorded for patch ${patch}`);
    this.name = "PatchNotFoundError";
    this.details = { patch };
  }
}

/** Raised when stored records fail schema validation. */
export class DataCorruptError extends Error {
  public readonly code = "E-FACTS-CORRUPT";
  public readonly hint = "data_corrupt";
  public readonly details: { patch: string; file: string; issues: string[] };

  constructor(patch: string, file: string, issues: string[]) {
    super(`patch ${patch}: ${file} failed validation (${issues[0] ?? "unreadable"})`);
    this.name = "DataCorruptError";
    this.details = { patch, file, issues };
  }
}

/** Patch identifiers are used as directory names, so only a safe alphabet is accepted. */
const PATCH_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,31}$/;

export function isValidPatchId(patch: string): boolean {
  return PATCH_PATTERN.test(patch) && !patch.includes("..");
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
}

/**
 * Reads and validates one JSON file of a patch directory. Returns `null` when
 * the file is absent and `optional` is set.
 */
export async function readPatchFile<T>(
  directory: string,
  patch: string,
  file: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: { optional?: boolean; signal?: AbortSignal } = {},
): Promise<T | null> {
  let raw: string;
  try {
    raw = await readFile(join(directory, file), { encoding: "utf8", signal: options.signal });
  } catch (error) {
    if (isMissingFile(error)) {
      if (options.optional) {
        return null;
      }
      throw new PatchNotFoundError(patch);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new DataCorruptError(patch, file, [error instanceof Error ? error.message : String(error)]);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new DataCorruptError(patch, file, formatIssues(result.error));
  }
  return result.data;
}

export interface FilePatchFactsLoaderOptions {
  /** Directory holding one sub-directory per patch. */
  readonly dataDir: string;
  readonly logger?: StructuredLogger;
}

/**
 * Loads `entities.json`, `items.json` and (optionally) `runes.json` from
 * `<dataDir>/<patch>/`.
 */
export class FilePatchFactsLoader implements FactsLoader {
  private readonly dataDir: string;
  private readonly logger: StructuredLogger | null;

  constructor(options: FilePatchFactsLoaderOptions) {
    this.dataDir = options.dataDir;
    this.logger = options.logger ?? null;
  }

  async load(patch: string, signal?: AbortSignal): Promise<FactSet> {
    if (!isValidPatchId(patch)) {
      throw new PatchNotFoundError(patch);
    }
    const directory = join(this.dataDir, patch);
    const entities = await readPatchFile(directory, patch, "entities.json", z.array(EntityRecordSchema), { signal });
    const items = await readPatchFile(directory, patch, "items.json", z.array(ItemRecordSchema), { signal });
    const runes = await readPatchFile(directory, patch, "runes.json", z.array(RuneRecordSchema), {
      optional: true,
      signal,
    });

    const facts = createFactSet({ patch, entities: entities ?? [], items: items ?? [], runes: runes ?? [] });
    this.logger?.debug("facts_loaded", {
      patch,
      entities: facts.entities.size,
      items: facts.items.size,
      runes: facts.runes.size,
    });
    return facts;
  }
}
