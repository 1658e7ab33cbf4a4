import { join } from "node:path";
import pLimit from "p-limit";
import { z } from "zod";

import { isValidPatchId, readPatchFile } from "../facts/loader.js";
import type { StructuredLogger } from "../logger.js";

export interface SignalContext {
  readonly patch: string;
  readonly signal?: AbortSignal;
}

/**
 * Optional empirical signal per entity (an ARAM win rate in [0, 1]).
 * `null` means no data; a rejection is also read as "no data".
 */
export interface ExternalSignalSource {
  fetch(entityId: string, context: SignalContext): Promise<number | null>;
}

const WinrateTableSchema = z.record(z.string(), z.number().min(0).max(1));

/**
 * Win rates stored beside the patch facts as `winrates.json`
 * (`{ "<entity id>": 0.52, ... }`). Tables are read once per patch.
 */
export class PatchWinrateSignalSource implements ExternalSignalSource {
  private readonly tables = new Map<string, Promise<Readonly<Record<string, number>>>>();

  constructor(private readonly dataDir: string) {}

  async fetch(entityId: string, context: SignalContext): Promise<number | null> {
    const table = await this.table(context.patch, context.signal);
    return Object.hasOwn(table, entityId) ? (table[entityId] ?? null) : null;
  }

  private table(patch: string, signal?: AbortSignal): Promise<Readonly<Record<string, number>>> {
    const cached = this.tables.get(patch);
    if (cached) {
      return cached;
    }
    const pending = (async () => {
      if (!isValidPatchId(patch)) {
        return {};
      }
      const table = await readPatchFile(join(this.dataDir, patch), patch, "winrates.json", WinrateTableSchema, {
        optional: true,
        signal,
      });
      return Object.freeze(table ?? {});
    })();
    this.tables.set(patch, pending);
    pending.catch(() => this.tables.delete(patch));
    return pending;
  }
}

export interface CollectSignalsOptions {
  readonly patch: string;
  readonly concurrency?: number;
  readonly signal?: AbortSignal;
  readonly logger?: StructuredLogger;
}

/**
 * Fetches the signal of every entity with bounded concurrency. Failures are
 * logged and collapse to `null`; this function never rejects unless the
 * caller aborts.
 */
export async function collectSignals(
  entityIds: readonly string[],
  source: ExternalSignalSource | null,
  options: CollectSignalsOptions,
): Promise<Map<string, number | null>> {
  const signals = new Map<string, number | null>();
  if (!source) {
    for (const entityId of entityIds) {
      signals.set(entityId, null);
    }
    return signals;
  }

  const limit = pLimit(Math.max(1, Math.floor(options.concurrency ?? 4)));
  await Promise.all(
    entityIds.map((entityId) =>
      limit(async () => {
        options.signal?.throwIfAborted();
        let value: number | null = null;
        try {
          value = await source.fetch(entityId, { patch: options.patch, signal: options.signal });
        } catch (error) {
          if (options.signal?.aborted) {
            throw error;
          }
          options.logger?.warn("threat_signal_unavailable", {
            entity_id: entityId,
            message: error instanceof Error ? error.message : String(error),
          });
        }
        if (value !== null && !Number.isFinite(value)) {
          value = null;
        }
        signals.set(entityId, value);
      }),
    ),
  );

  // Re-key in request order so iteration stays deterministic.
  return new Map(entityIds.map((entityId) => [entityId, signals.get(entityId) ?? null]));
}
