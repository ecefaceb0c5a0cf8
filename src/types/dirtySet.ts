import { PartitionKey } from "./partitionKey";
import { DQResult } from "./dqResult";
import { Integrity, ManifestEntry } from "./manifestEntry";

/** One raw partition feeding a canonical key, through one routing rule. */
export interface PartitionContribution {
  raw_partition: string;
  rule_id: string;
  content_hash: string;
}

export interface DirtyPartition {
  key: PartitionKey;
  status: "NEW" | "DIRTY";
  content_hash: string;
  snapshot_version: string;
  integrity: Integrity;
  bronze_results: DQResult[];
  contributions: PartitionContribution[];
}

export type DirtySet = DirtyPartition[];

export interface KeyFailure {
  key: PartitionKey;
  error: string;
}

export interface DiscoveryOutcome {
  snapshot_version: string;
  dirty: DirtySet;
  deleted: PartitionKey[];
  clean: PartitionKey[];
  failures: KeyFailure[];
  entries: ManifestEntry[];
}
