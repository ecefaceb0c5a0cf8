import { promises as fs } from "fs";
import { PipelineConfig } from "../config/pipelineConfig";
import { ConfigurationError, ConflictError, HashMismatchError, errorMessage } from "../errors";
import { CheckOutcome, toDqResults } from "../dq/checks";
import { bronzeChecks } from "../dq/bronzePolicy";
import { RecordRow, parseRecordRows } from "../io/records";
import { ManifestRegistry } from "../manifest/registry";
import { withConflictRetry } from "../manifest/retry";
import { partitionOfValue } from "../routing/coverage";
import { RoutedPartition, Router, applyFieldMapping } from "../routing/router";
import { DirtyPartition, DiscoveryOutcome, KeyFailure, PartitionContribution } from "../types/dirtySet";
import { Integrity, ManifestDraft, ManifestEntry, toDraft } from "../types/manifestEntry";
import { PartitionKey, comparePartitionKeys, partitionKeyId } from "../types/partitionKey";
import { mapWithConcurrency } from "../utils/concurrency";
import { HashPart, combineHashes, hashRecords, sha256, sliceHash } from "../utils/hash";
import { Logger, silentLogger } from "../utils/logger";
import { Clock, systemClock } from "../utils/time";
import { RawPartitionFile, listRawPartitions, readRawSummary } from "./rawPartitions";

export interface DiscoveryDeps {
  config: PipelineConfig;
  registry: ManifestRegistry;
  router: Router;
  logger?: Logger;
  clock?: Clock;
}

interface RoutedFile {
  file: RawPartitionFile;
  routes: RoutedPartition[];
}

interface SlicedRows {
  byPartition: Map<string, RecordRow[]>;
  /** Rows whose slice value maps to none of the rule's partitions. */
  unassigned: RecordRow[];
}

interface HashedFile extends RoutedFile {
  rawId: string;
  hash: string;
  integrity: Integrity;
  rows: RecordRow[] | null;
  recordCount: number | null;
  byteSize: number;
  bronze: CheckOutcome[];
  /** Routes per rule, for rules that split this file over several keys. */
  slicedRules: Map<string, RoutedPartition[]>;
  slices: Map<string, SlicedRows>;
}

interface Contribution extends HashPart {
  ruleId: string;
  records: number | null;
  bytes: number | null;
}

interface CanonicalPartition {
  key: PartitionKey;
  rawSources: Set<string>;
  contributions: Map<string, Contribution>;
  integrity: Integrity;
  bronze: Array<{ rawId: string; outcomes: CheckOutcome[] }>;
  conflict: string | null;
}

type KeyResult =
  | { kind: "dirty"; partition: DirtyPartition; entry: ManifestEntry }
  | { kind: "clean"; entry: ManifestEntry }
  | { kind: "failed"; failure: KeyFailure };

const INTEGRITY_RANK: Record<Integrity, number> = { verified: 0, unverified: 1, hash_mismatch: 2 };

function worseIntegrity(a: Integrity, b: Integrity): Integrity {
  return INTEGRITY_RANK[a] >= INTEGRITY_RANK[b] ? a : b;
}

function routesBySlicedRule(routes: readonly RoutedPartition[]): Map<string, RoutedPartition[]> {
  const byRule = new Map<string, RoutedPartition[]>();
  for (const route of routes) byRule.set(route.ruleId, [...(byRule.get(route.ruleId) ?? []), route]);
  for (const [ruleId, list] of byRule) {
    if (list.length < 2) byRule.delete(ruleId);
  }
  return byRule;
}

function splitRows(rows: readonly RecordRow[], routes: readonly RoutedPartition[], field: string): SlicedRows {
  const { fieldMapping, grain } = routes[0];
  const byPartition = new Map<string, RecordRow[]>(routes.map((route): [string, RecordRow[]] => [route.key.partition, []]));
  const unassigned: RecordRow[] = [];
  for (const row of rows) {
    const partition = partitionOfValue(applyFieldMapping(row, fieldMapping)[field], grain);
    const slice = partition === null ? undefined : byPartition.get(partition);
    if (slice) slice.push(row);
    else unassigned.push(row);
  }
  return { byPartition, unassigned };
}

/** A sidecar may declare either the row-multiset hash or sha256 of the file bytes. */
function verifyDeclaredHash(rawId: string, declared: string, rowHash: string, fileHash: string): void {
  if (declared !== rowHash && declared !== fileHash) {
    throw new HashMismatchError(rawId, declared, rowHash);
  }
}

function lineageOf(contributions: readonly Contribution[]): PartitionContribution[] {
  return contributions
    .map((c) => ({ raw_partition: c.id, rule_id: c.ruleId, content_hash: c.hash }))
    .sort((a, b) => (a.raw_partition < b.raw_partition ? -1 : a.raw_partition > b.raw_partition ? 1 : 0));
}

function sumOrNull(values: Array<number | null>): number | null {
  let total = 0;
  for (const value of values) {
    if (value === null) return null;
    total += value;
  }
  return total;
}

/**
 * Compares one snapshot version of the bronze tree against the manifest and
 * produces the set of canonical partitions that must be recomputed.
 */
export class DiscoveryService {
  private readonly config: PipelineConfig;
  private readonly registry: ManifestRegistry;
  private readonly router: Router;
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(deps: DiscoveryDeps) {
    this.config = deps.config;
    this.registry = deps.registry;
    this.router = deps.router;
    this.log = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? systemClock;
  }

  /** The layer discovery writes to: the first configured layer. */
  get layer(): string {
    return this.config.layers[0].name;
  }

  async discover(snapshotVersion: string): Promise<DiscoveryOutcome> {
    const log = this.log.child({ snapshot_version: snapshotVersion, layer: this.layer });
    const { files, missingSources } = await listRawPartitions(this.config.bronze_root, snapshotVersion);
    log.info("discovery.scan", { raw_partitions: files.length });
    if (files.length === 0) {
      throw new ConfigurationError(
        `No raw partitions found for snapshot version ${snapshotVersion} under ${this.config.bronze_root}`
      );
    }
    if (missingSources.length > 0) {
      log.warn("discovery.sources_missing_version", { sources: missingSources });
    }
    await this.assertNotOlder(snapshotVersion);

    // Routing failures are fatal and must surface before anything is written.
    const routed: RoutedFile[] = files.map((file) => ({
      file,
      routes: this.router.resolve(file.sourceId, file.rawPartitionId)
    }));

    const hashed = await mapWithConcurrency(routed, this.config.max_workers, (item) =>
      this.hashFile(item, snapshotVersion, log)
    );

    const canonical = this.buildCanonical(hashed);
    const now = this.clock();

    const results = await mapWithConcurrency(Array.from(canonical.values()), this.config.max_workers, (partition) =>
      this.recordPartition(partition, snapshotVersion, now)
    );

    const dirty: DirtyPartition[] = [];
    const clean: PartitionKey[] = [];
    const failures: KeyFailure[] = [];
    const entries: ManifestEntry[] = [];
    for (const result of results) {
      if (result.kind === "failed") {
        failures.push(result.failure);
        log.warn("discovery.key_failed", { key: partitionKeyId(result.failure.key), error: result.failure.error });
        continue;
      }
      entries.push(result.entry);
      if (result.kind === "dirty") dirty.push(result.partition);
      else clean.push(result.entry.key);
    }

    const seen = new Set(Array.from(canonical.keys()));
    const delivering = new Set(Array.from(canonical.values(), (partition) => partition.key.source));
    const deleted = await this.markDeleted(seen, delivering, now, failures, entries, log);

    dirty.sort((a, b) => comparePartitionKeys(a.key, b.key));
    clean.sort(comparePartitionKeys);
    deleted.sort(comparePartitionKeys);
    failures.sort((a, b) => comparePartitionKeys(a.key, b.key));

    log.info("discovery.done", {
      dirty: dirty.length,
      clean: clean.length,
      deleted: deleted.length,
      failures: failures.length
    });
    return { snapshot_version: snapshotVersion, dirty, deleted, clean, failures, entries };
  }

  private async hashFile(item: RoutedFile, snapshotVersion: string, log: Logger): Promise<HashedFile> {
    const { file } = item;
    const rawId = `${file.sourceId}/${file.rawPartitionId}`;
    const { summary, error: summaryError } = await readRawSummary(file.summaryPath);
    const declared = summary?.hash ? summary.hash : null;
    const slicedRules = routesBySlicedRule(item.routes);
    const needsSlices = Array.from(slicedRules.values()).some((routes) => routes[0].sliceField !== null);

    let byteSize: number;
    let rows: RecordRow[] | null = null;
    let computed: string | null = null;
    let fileHash: string | null = null;
    if (this.config.verify_hashes || declared === null || needsSlices) {
      const content = await fs.readFile(file.filePath);
      byteSize = content.length;
      fileHash = sha256(content);
      rows = parseRecordRows(content.toString("utf8"), file.filePath);
      computed = hashRecords(rows);
    } else {
      byteSize = (await fs.stat(file.filePath)).size;
    }

    let integrity: Integrity = "unverified";
    if (computed !== null && fileHash !== null && declared !== null) {
      try {
        verifyDeclaredHash(rawId, declared, computed, fileHash);
        integrity = "verified";
      } catch (error) {
        if (!(error instanceof HashMismatchError)) throw error;
        integrity = "hash_mismatch";
        log.warn("discovery.hash_mismatch", {
          raw_partition: error.rawPartitionId,
          declared: error.declared,
          computed: error.computed
        });
      }
    }

    const slices = new Map<string, SlicedRows>();
    let unassigned = 0;
    for (const [ruleId, routes] of slicedRules) {
      const field = routes[0].sliceField;
      if (field === null || rows === null) continue;
      const split = splitRows(rows, routes, field);
      slices.set(ruleId, split);
      unassigned += split.unassigned.length;
    }

    const hash = computed ?? declared ?? "";
    const recordCount = rows ? rows.length : summary?.records ?? null;
    const bronze = bronzeChecks({
      snapshotVersion,
      summary,
      summaryError,
      countedRecords: rows ? rows.length : null,
      fileBytes: byteSize,
      contentHash: hash,
      integrity
    });
    if (slices.size > 0) {
      bronze.push({
        check: "slice_unassigned",
        severity: "CRITICAL",
        passed: unassigned === 0,
        metric: unassigned,
        details: { rules: Array.from(slices.keys()) }
      });
    }
    return { ...item, rawId, hash, integrity, rows, recordCount, byteSize, bronze, slicedRules, slices };
  }

  private buildCanonical(hashed: readonly HashedFile[]): Map<string, CanonicalPartition> {
    const canonical = new Map<string, CanonicalPartition>();

    for (const raw of hashed) {
      const { rawId } = raw;
      for (const route of raw.routes) {
        const id = partitionKeyId(route.key);
        let partition = canonical.get(id);
        if (!partition) {
          partition = {
            key: route.key,
            rawSources: new Set(),
            contributions: new Map(),
            integrity: "verified",
            bronze: [],
            conflict: null
          };
          canonical.set(id, partition);
        }

        const claimedBy = Array.from(partition.rawSources).find((source) => source !== raw.file.sourceId);
        if (claimedBy !== undefined) {
          partition.conflict = `raw sources ${claimedBy} and ${raw.file.sourceId} both map to this partition`;
        }
        partition.rawSources.add(raw.file.sourceId);
        partition.integrity = worseIntegrity(partition.integrity, raw.integrity);
        if (!partition.bronze.some((entry) => entry.rawId === rawId)) {
          partition.bronze.push({ rawId, outcomes: raw.bronze });
        }

        partition.contributions.set(rawId, this.contribution(raw, route));
      }
    }
    return canonical;
  }

  private contribution(raw: HashedFile, route: RoutedPartition): Contribution {
    const base = { id: raw.rawId, ruleId: route.ruleId };
    if (!raw.slicedRules.has(route.ruleId)) {
      return { ...base, hash: raw.hash, records: raw.recordCount, bytes: raw.byteSize };
    }
    const split = raw.slices.get(route.ruleId);
    if (split) {
      const rows = split.byPartition.get(route.key.partition) ?? [];
      const sliceRows = hashRecords(rows);
      // Unassigned rows are part of every slice hash.
      const hash =
        split.unassigned.length === 0
          ? sliceRows
          : combineHashes([
              { id: "slice", hash: sliceRows },
              { id: "unassigned", hash: hashRecords(split.unassigned) }
            ]);
      return { ...base, hash, records: rows.length, bytes: null };
    }
    return { ...base, hash: sliceHash(raw.hash, route.key.partition), records: null, bytes: null };
  }

  private async recordPartition(
    partition: CanonicalPartition,
    snapshotVersion: string,
    now: string
  ): Promise<KeyResult> {
    if (partition.conflict) {
      const conflict = new ConflictError(partition.key, this.layer, null, null, partition.conflict);
      return { kind: "failed", failure: { key: partition.key, error: conflict.message } };
    }

    const contributions = Array.from(partition.contributions.values());
    const contentHash = contributions.length === 1 ? contributions[0].hash : combineHashes(contributions);
    const recordCount = sumOrNull(contributions.map((c) => c.records));
    const byteSize = sumOrNull(contributions.map((c) => c.bytes));

    try {
      return await withConflictRetry<KeyResult>(
        async () => {
          const current = await this.registry.lookup(partition.key, this.layer);
          const changed = !current || current.status === "DELETED" || current.content_hash !== contentHash;
          const base: ManifestDraft = current
            ? toDraft(current)
            : {
                key: partition.key,
                layer: this.layer,
                content_hash: contentHash,
                record_count: recordCount,
                byte_size: byteSize,
                snapshot_version: snapshotVersion,
                status: "NEW",
                integrity: partition.integrity,
                promotion: null,
                promoted: false,
                dq_level: null,
                dq_passed: null,
                last_seen_at: now
              };

          if (!changed) {
            const entry = await this.registry.upsert(
              { ...base, status: "CLEAN", integrity: partition.integrity, last_seen_at: now },
              current ? current.version : null
            );
            return { kind: "clean", entry };
          }

          // New content invalidates any earlier promotion of this key.
          const status = current ? "DIRTY" : "NEW";
          const entry = await this.registry.upsert(
            {
              ...base,
              content_hash: contentHash,
              record_count: recordCount,
              byte_size: byteSize,
              snapshot_version: snapshotVersion,
              status,
              integrity: partition.integrity,
              promotion: null,
              promoted: false,
              dq_level: null,
              dq_passed: null,
              last_seen_at: now
            },
            current ? current.version : null
          );
          const outcomes = partition.bronze.flatMap(({ rawId, outcomes: list }) =>
            list.map((outcome) =>
              partition.bronze.length > 1 ? { ...outcome, details: { ...(outcome.details ?? {}), raw_partition: rawId } } : outcome
            )
          );
          return {
            kind: "dirty",
            entry,
            partition: {
              key: partition.key,
              status,
              content_hash: contentHash,
              snapshot_version: snapshotVersion,
              integrity: partition.integrity,
              bronze_results: toDqResults(partition.key, this.layer, snapshotVersion, outcomes, now),
              contributions: lineageOf(contributions)
            }
          };
        },
        {
          maxAttempts: this.config.max_conflict_retries,
          initialDelayMs: this.config.retry_delay_ms,
          onRetry: (attempt, error) =>
            this.log.debug("discovery.retry", { key: partitionKeyId(partition.key), attempt, error: error.message })
        }
      );
    } catch (error) {
      if (error instanceof ConflictError) {
        return { kind: "failed", failure: { key: partition.key, error: errorMessage(error) } };
      }
      throw error;
    }
  }

  /** Refuses a snapshot older than the newest one already recorded. */
  private async assertNotOlder(snapshotVersion: string): Promise<void> {
    const recorded = await this.registry.listByLayer(this.layer);
    const newest = recorded.reduce<string | null>(
      (max, entry) => (max === null || entry.snapshot_version > max ? entry.snapshot_version : max),
      null
    );
    if (newest !== null && snapshotVersion < newest) {
      throw new ConfigurationError(
        `Snapshot version ${snapshotVersion} is older than ${newest}, already recorded in layer "${this.layer}"`
      );
    }
  }

  /**
   * Marks keys that vanished from the snapshot DELETED. Keys of a canonical
   * source that delivered nothing this run are left untouched.
   */
  private async markDeleted(
    seen: ReadonlySet<string>,
    delivering: ReadonlySet<string>,
    now: string,
    failures: KeyFailure[],
    entries: ManifestEntry[],
    log: Logger
  ): Promise<PartitionKey[]> {
    const existing = await this.registry.listByLayer(this.layer);
    const live = existing.filter((entry) => entry.status !== "DELETED" && !seen.has(partitionKeyId(entry.key)));
    const gone = live.filter((entry) => delivering.has(entry.key.source));
    if (gone.length < live.length) {
      const held = Array.from(new Set(live.filter((entry) => !delivering.has(entry.key.source)).map((e) => e.key.source)));
      log.warn("discovery.deletion_held", { sources: held.sort(), keys: live.length - gone.length });
    }
    const deleted: PartitionKey[] = [];

    await mapWithConcurrency(gone, this.config.max_workers, async (stale) => {
      try {
        const entry = await withConflictRetry<ManifestEntry | null>(
          async () => {
            const current = await this.registry.lookup(stale.key, this.layer);
            if (!current || current.status === "DELETED") return current;
            return this.registry.upsert({ ...toDraft(current), status: "DELETED", last_seen_at: now }, current.version);
          },
          { maxAttempts: this.config.max_conflict_retries, initialDelayMs: this.config.retry_delay_ms }
        );
        if (entry) {
          entries.push(entry);
          deleted.push(entry.key);
        }
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;
        failures.push({ key: stale.key, error: errorMessage(error) });
      }
    });
    return deleted;
  }
}
