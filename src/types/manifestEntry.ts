import { PartitionKey } from "./partitionKey";
import { Severity } from "./dqResult";

export const ENTRY_STATUSES = ["NEW", "DIRTY", "CLEAN", "DELETED"] as const;
export type EntryStatus = (typeof ENTRY_STATUSES)[number];

export const PROMOTION_STATES = ["PENDING", "EVALUATED", "PROMOTED", "REJECTED"] as const;
export type PromotionState = (typeof PROMOTION_STATES)[number];

export type Integrity = "verified" | "unverified" | "hash_mismatch";

export interface ManifestEntry {
  key: PartitionKey;
  layer: string;
  content_hash: string;
  record_count: number | null;
  byte_size: number | null;
  snapshot_version: string;
  status: EntryStatus;
  integrity: Integrity;
  promotion: PromotionState | null;
  promoted: boolean;
  dq_level: Severity | null;
  dq_passed: boolean | null;
  last_seen_at: string;
  version: number;
}

/** What a writer hands to the registry; the registry owns `version`. */
export type ManifestDraft = Omit<ManifestEntry, "version">;

export function toDraft(entry: ManifestEntry): ManifestDraft {
  const { version: _version, ...draft } = entry;
  return draft;
}

/** True when two drafts differ in anything other than freshness. */
export function differsBeyondFreshness(a: ManifestDraft, b: ManifestDraft): boolean {
  return (
    a.content_hash !== b.content_hash ||
    a.record_count !== b.record_count ||
    a.byte_size !== b.byte_size ||
    a.snapshot_version !== b.snapshot_version ||
    a.status !== b.status ||
    a.integrity !== b.integrity ||
    a.promotion !== b.promotion ||
    a.promoted !== b.promoted ||
    a.dq_level !== b.dq_level ||
    a.dq_passed !== b.dq_passed
  );
}
