import { z } from "zod";

import { deepFreeze } from "../utils/freeze.js";

/**
 * Record schemas for the per-patch data files. Identifiers are opaque strings;
 * numeric identifiers found in upstream dumps are coerced so items such as
 * `3123` and `"3123"` resolve to the same key.
 */
const IdentifierSchema = z.union([z.string().trim().min(1), z.number().int().nonnegative()]).transform(String);

const StatsSchema = z.record(z.string(), z.number().finite()).default({});

export const EntityRecordSchema = z
  .object({
    id: IdentifierSchema,
    name: z.string().trim().min(1),
    tags: z.array(z.string().trim().min(1)).default([]),
    stats: StatsSchema,
  })
  .strict();

export const ItemRecordSchema = z
  .object({
    id: IdentifierSchema,
    name: z.string().trim().min(1),
    cost: z.number().int().nonnegative(),
    tags: z.array(z.string().trim().min(1)).default([]),
    stats: StatsSchema,
    /** Game modes the item is purchasable in; absent means every mode. */
    modes: z.array(z.string().trim().min(1)).optional(),
  })
  .strict();

export const RuneRecordSchema = z
  .object({
    id: IdentifierSchema,
    name: z.string().trim().min(1),
    tree: z.string().trim().min(1),
  })
  .strict();

export type EntityFacts = Readonly<z.infer<typeof EntityRecordSchema>>;
export type ItemFacts = Readonly<z.infer<typeof ItemRecordSchema>>;
export type RuneFacts = Readonly<z.infer<typeof RuneRecordSchema>>;

/** Static facts scoped to a single patch. Never mutated once built. */
export interface FactSet {
  readonly patch: string;
  readonly entities: ReadonlyMap<string, EntityFacts>;
  readonly items: ReadonlyMap<string, ItemFacts>;
  readonly runes: ReadonlyMap<string, RuneFacts>;
}

/** Read-only map view; writes through the view fail at compile time and at runtime. */
class FrozenMap<K, V> extends Map<K, V> {
  private sealed = false;

  constructor(entries: Iterable<readonly [K, V]>) {
    super(entries);
    this.sealed = true;
  }

  override set(key: K, value: V): this {
    if (this.sealed) {
      throw new TypeError("fact set is read-only");
    }
    return super.set(key, value);
  }

  override delete(): boolean {
    throw new TypeError("fact set is read-only");
  }

  override clear(): void {
    throw new TypeError("fact set is read-only");
  }
}

function indexById<T extends { readonly id: string }>(records: readonly T[]): ReadonlyMap<string, T> {
  return new FrozenMap(records.map((record) => [record.id, deepFreeze(record)] as const));
}

/**
 * Builds an immutable {@link FactSet}. When a data file lists the same
 * identifier twice the first record wins.
 */
export function createFactSet(input: {
  patch: string;
  entities: readonly EntityFacts[];
  items: readonly ItemFacts[];
  runes?: readonly RuneFacts[];
}): FactSet {
  const firstById = <T extends { readonly id: string }>(records: readonly T[]): T[] => {
    const seen = new Set<string>();
    return records.filter((record) => {
      if (seen.has(record.id)) {
        return false;
      }
      seen.add(record.id);
      return true;
    });
  };
  return Object.freeze({
    patch: input.patch,
    entities: indexById(firstById(input.entities)),
    items: indexById(firstById(input.items)),
    runes: indexById(firstById(input.runes ?? [])),
  });
}
