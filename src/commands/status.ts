import { ConfigurationError } from "../errors";
import { ENTRY_STATUSES, EntryStatus, ManifestEntry, PROMOTION_STATES, PromotionState } from "../types/manifestEntry";
import { comparePartitionKeys } from "../types/partitionKey";
import { CommandIo, openPipeline } from "./context";

export interface StatusOptions extends CommandIo {
  configPath: string;
  layer: string;
  status?: string;
  promotion?: string;
}

function isEntryStatus(value: string): value is EntryStatus {
  return ENTRY_STATUSES.some((status) => status === value);
}

function isPromotionState(value: string): value is PromotionState {
  return PROMOTION_STATES.some((state) => state === value);
}

/** Prints the manifest entries of one layer, optionally filtered, one JSON object per line. */
export async function runStatus(options: StatusOptions): Promise<ManifestEntry[]> {
  const ctx = await openPipeline(options.configPath, "status", options);
  try {
    ctx.machine.policy(options.layer);
    let entries = await ctx.stores.registry.listByLayer(options.layer);

    if (options.status !== undefined) {
      const wanted = options.status.toUpperCase();
      if (!isEntryStatus(wanted)) {
        throw new ConfigurationError(`Unknown status "${options.status}" (expected ${ENTRY_STATUSES.join(", ")})`);
      }
      entries = entries.filter((entry) => entry.status === wanted);
    }
    if (options.promotion !== undefined) {
      const wanted = options.promotion.toUpperCase();
      if (!isPromotionState(wanted)) {
        throw new ConfigurationError(
          `Unknown promotion state "${options.promotion}" (expected ${PROMOTION_STATES.join(", ")})`
        );
      }
      entries = entries.filter((entry) => entry.promotion === wanted);
    }

    entries.sort((a, b) => comparePartitionKeys(a.key, b.key));
    for (const entry of entries) ctx.out(JSON.stringify(entry));
    return entries;
  } finally {
    await ctx.stores.close();
  }
}
