import { DirtyPartition, PartitionContribution } from "../types/dirtySet";
import { Severity } from "../types/dqResult";
import { ManifestEntry } from "../types/manifestEntry";
import { PartitionKey } from "../types/partitionKey";
import { appendJsonLines } from "../utils/fs";
import { lineagePath } from "./paths";

export type LineageEventType = "discover" | "partition_published";

/**
 * One line of `_runs/<snapshot_version>/lineage.jsonl`. `discover` events
 * name the raw partitions and rules behind a recomputed key;
 * `partition_published` events mark a key promoted on a layer.
 */
export interface LineageEvent {
  event_type: LineageEventType;
  snapshot_version: string;
  layer: string;
  key: PartitionKey;
  content_hash: string;
  inputs: PartitionContribution[];
  dq_level: Severity | null;
  recorded_at: string;
}

export function discoverEvents(dirty: readonly DirtyPartition[], layer: string, recordedAt: string): LineageEvent[] {
  return dirty.map((partition): LineageEvent => ({
    event_type: "discover",
    snapshot_version: partition.snapshot_version,
    layer,
    key: partition.key,
    content_hash: partition.content_hash,
    inputs: partition.contributions,
    dq_level: null,
    recorded_at: recordedAt
  }));
}

export function publishedEvent(entry: ManifestEntry, recordedAt: string): LineageEvent {
  return {
    event_type: "partition_published",
    snapshot_version: entry.snapshot_version,
    layer: entry.layer,
    key: entry.key,
    content_hash: entry.content_hash,
    inputs: [],
    dq_level: entry.dq_level,
    recorded_at: recordedAt
  };
}

/** Appends events to the lineage log of each snapshot version they belong to. */
export async function appendLineage(warehouseRoot: string, events: readonly LineageEvent[]): Promise<void> {
  const byVersion = new Map<string, LineageEvent[]>();
  for (const event of events) {
    byVersion.set(event.snapshot_version, [...(byVersion.get(event.snapshot_version) ?? []), event]);
  }
  for (const [version, list] of byVersion) {
    await appendJsonLines(lineagePath(warehouseRoot, version), list);
  }
}
