import { PartitionKey } from "../types/partitionKey";
import { EntryStatus, ManifestDraft, ManifestEntry, PromotionState } from "../types/manifestEntry";
import { ManifestRegistry, applyUpsert, entryId } from "./registry";

function cloneEntry(entry: ManifestEntry): ManifestEntry {
  return { ...entry, key: { ...entry.key } };
}

/**
 * In-process registry. The compare-and-set runs synchronously, so writers to
 * the same key serialize on the event loop while other keys never wait.
 * Subclasses add durability through {@link persist}.
 */
export class MemoryManifestRegistry implements ManifestRegistry {
  protected readonly entries = new Map<string, ManifestEntry>();

  async lookup(key: PartitionKey, layer: string): Promise<ManifestEntry | null> {
    const entry = this.entries.get(entryId(key, layer));
    return entry ? cloneEntry(entry) : null;
  }

  async upsert(draft: ManifestDraft, expectedVersion: number | null): Promise<ManifestEntry> {
    const id = entryId(draft.key, draft.layer);
    const current = this.entries.get(id) ?? null;
    const next = applyUpsert(current, draft, expectedVersion);
    this.entries.set(id, next);
    try {
      await this.persist();
    } catch (error) {
      if (this.entries.get(id) === next) {
        if (current) this.entries.set(id, current);
        else this.entries.delete(id);
      }
      throw error;
    }
    return cloneEntry(next);
  }

  async listByStatus(layer: string, status: EntryStatus): Promise<PartitionKey[]> {
    return this.snapshot()
      .filter((entry) => entry.layer === layer && entry.status === status)
      .map((entry) => ({ ...entry.key }));
  }

  async listByPromotion(layer: string, state: PromotionState): Promise<ManifestEntry[]> {
    return this.snapshot().filter((entry) => entry.layer === layer && entry.promotion === state);
  }

  async listByLayer(layer: string): Promise<ManifestEntry[]> {
    return this.snapshot().filter((entry) => entry.layer === layer);
  }

  async close(): Promise<void> {
    await this.persist();
  }

  protected snapshot(): ManifestEntry[] {
    return Array.from(this.entries.values(), cloneEntry);
  }

  protected async persist(): Promise<void> {
    // nothing to flush in memory
  }
}
