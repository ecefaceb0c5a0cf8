import { ConflictError } from "../errors";
import { PartitionKey, partitionKeyId } from "../types/partitionKey";
import {
  EntryStatus,
  ManifestDraft,
  ManifestEntry,
  PromotionState,
  differsBeyondFreshness,
  toDraft
} from "../types/manifestEntry";

/**
 * Durable (source, entity, partition, layer) → ManifestEntry mapping and the
 * single source of truth for incremental state.
 *
 * Writes are compare-and-set: callers pass the version they read (or null when
 * they saw no entry) and a stale version fails with {@link ConflictError}
 * instead of overwriting.
 */
export interface ManifestRegistry {
  lookup(key: PartitionKey, layer: string): Promise<ManifestEntry | null>;
  upsert(draft: ManifestDraft, expectedVersion: number | null): Promise<ManifestEntry>;
  listByStatus(layer: string, status: EntryStatus): Promise<PartitionKey[]>;
  listByPromotion(layer: string, state: PromotionState): Promise<ManifestEntry[]>;
  listByLayer(layer: string): Promise<ManifestEntry[]>;
  close(): Promise<void>;
}

export function entryId(key: PartitionKey, layer: string): string {
  return `${layer}::${partitionKeyId(key)}`;
}

/**
 * Version check shared by every registry implementation. An unchanged draft
 * keeps its version and only advances `last_seen_at`.
 */
export function applyUpsert(
  current: ManifestEntry | null,
  draft: ManifestDraft,
  expectedVersion: number | null
): ManifestEntry {
  if (current === null) {
    if (expectedVersion !== null) {
      throw new ConflictError(draft.key, draft.layer, expectedVersion, null);
    }
    return { ...draft, version: 1 };
  }
  if (expectedVersion !== current.version) {
    throw new ConflictError(draft.key, draft.layer, expectedVersion, current.version);
  }
  if (!differsBeyondFreshness(toDraft(current), draft)) {
    return { ...current, last_seen_at: draft.last_seen_at };
  }
  return { ...draft, version: current.version + 1 };
}
