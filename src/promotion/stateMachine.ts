import { LayerPolicy } from "../config/pipelineConfig";
import { ConfigurationError, ConflictError, errorMessage } from "../errors";
import { GateVerdict, RejectedRow } from "../dq/gate";
import { DqResultLog } from "../dq/resultLog";
import { buildDqSummary, writeDqSummary, writeQuarantine } from "../io/artifacts";
import { ManifestRegistry } from "../manifest/registry";
import { withConflictRetry } from "../manifest/retry";
import { KeyFailure } from "../types/dirtySet";
import { DQResult, Severity, aggregateResults } from "../types/dqResult";
import { ManifestEntry, PromotionState, toDraft } from "../types/manifestEntry";
import { PartitionKey, partitionKeyId } from "../types/partitionKey";
import { Logger, silentLogger } from "../utils/logger";
import { Clock, systemClock } from "../utils/time";

/** Raw-state fields an upstream entry hands to the layer being enqueued. */
export type EnqueueInput = Pick<
  ManifestEntry,
  "snapshot_version" | "content_hash" | "status" | "integrity" | "record_count" | "byte_size"
>;

export interface PromotionDeps {
  registry: ManifestRegistry;
  dqLog: DqResultLog;
  policies: readonly LayerPolicy[];
  warehouseRoot: string;
  maxConflictRetries: number;
  retryDelayMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface EvaluationOutcome {
  entry: ManifestEntry;
  results: DQResult[];
  /** False when the entry was already terminal and nothing was evaluated. */
  evaluated: boolean;
}

const TERMINAL: ReadonlySet<PromotionState> = new Set<PromotionState>(["PROMOTED", "REJECTED"]);

/**
 * Per (key, layer) lifecycle: PENDING → EVALUATED → PROMOTED | REJECTED.
 * Only PROMOTED entries are visible to the next layer's builder.
 */
export class PromotionMachine {
  private readonly registry: ManifestRegistry;
  private readonly dqLog: DqResultLog;
  private readonly policies: readonly LayerPolicy[];
  private readonly warehouseRoot: string;
  private readonly maxConflictRetries: number;
  private readonly retryDelayMs: number;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(deps: PromotionDeps) {
    if (deps.policies.length === 0) {
      throw new ConfigurationError("At least one layer is required");
    }
    this.registry = deps.registry;
    this.dqLog = deps.dqLog;
    this.policies = deps.policies;
    this.warehouseRoot = deps.warehouseRoot;
    this.maxConflictRetries = deps.maxConflictRetries;
    this.retryDelayMs = deps.retryDelayMs ?? 0;
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? silentLogger;
  }

  get discoveryLayer(): string {
    return this.policies[0].name;
  }

  policy(layer: string): LayerPolicy {
    const policy = this.policies.find((candidate) => candidate.name === layer);
    if (!policy) {
      throw new ConfigurationError(`Unknown layer "${layer}"`);
    }
    return policy;
  }

  nextLayer(layer: string): string | null {
    const index = this.policies.findIndex((candidate) => candidate.name === layer);
    if (index < 0) {
      throw new ConfigurationError(`Unknown layer "${layer}"`);
    }
    return index + 1 < this.policies.length ? this.policies[index + 1].name : null;
  }

  /**
   * Puts (key, layer) in PENDING for the given content. An entry already
   * tracking the same snapshot version and hash is returned unchanged.
   */
  async enqueue(key: PartitionKey, layer: string, input: EnqueueInput): Promise<ManifestEntry> {
    this.policy(layer);
    return withConflictRetry<ManifestEntry>(
      async () => {
        const current = await this.registry.lookup(key, layer);
        if (
          current &&
          current.promotion !== null &&
          current.snapshot_version === input.snapshot_version &&
          current.content_hash === input.content_hash
        ) {
          return current;
        }
        const entry = await this.registry.upsert(
          {
            key,
            layer,
            content_hash: input.content_hash,
            record_count: input.record_count,
            byte_size: input.byte_size,
            snapshot_version: input.snapshot_version,
            status: input.status,
            integrity: input.integrity,
            promotion: "PENDING",
            promoted: false,
            dq_level: null,
            dq_passed: null,
            last_seen_at: this.clock()
          },
          current ? current.version : null
        );
        this.log.debug("promotion.enqueued", { key: partitionKeyId(key), layer, snapshot_version: entry.snapshot_version });
        return entry;
      },
      { maxAttempts: this.maxConflictRetries, initialDelayMs: this.retryDelayMs }
    );
  }

  /**
   * Records a gate verdict and settles the entry. Non-blocking layers always
   * promote; blocking layers reject on any failed CRITICAL result.
   */
  async evaluate(
    key: PartitionKey,
    layer: string,
    verdict: Pick<GateVerdict, "results" | "rejectedRows">
  ): Promise<EvaluationOutcome> {
    const policy = this.policy(layer);
    const log = this.log.child({ key: partitionKeyId(key), layer });

    const current = await this.registry.lookup(key, layer);
    if (!current || current.promotion === null) {
      throw new Error(`${partitionKeyId(key)} [${layer}] was never enqueued`);
    }
    if (TERMINAL.has(current.promotion)) {
      return { entry: current, results: [], evaluated: false };
    }

    const evaluatedAt = this.clock();
    const results = [...verdict.results];
    if (policy.blockOnCritical && layer !== this.discoveryLayer) {
      const upstream = await this.registry.lookup(key, this.discoveryLayer);
      if (upstream?.integrity === "hash_mismatch") {
        results.push({
          key,
          layer,
          snapshot_version: current.snapshot_version,
          check: "upstream_integrity",
          severity: "CRITICAL",
          passed: false,
          metric: null,
          details: { integrity: upstream.integrity },
          evaluated_at: evaluatedAt
        });
      }
    }

    const aggregate = aggregateResults(results);
    const promote = !policy.blockOnCritical || aggregate.dq_passed;
    const settled = await withConflictRetry<{ entry: ManifestEntry; settledHere: boolean }>(
      async () => {
        const latest = await this.registry.lookup(key, layer);
        if (!latest || latest.promotion === null) {
          throw new Error(`${partitionKeyId(key)} [${layer}] disappeared during evaluation`);
        }
        if (TERMINAL.has(latest.promotion)) return { entry: latest, settledHere: false };
        const evaluated =
          latest.promotion === "EVALUATED"
            ? latest
            : await this.registry.upsert(
                {
                  ...toDraft(latest),
                  promotion: "EVALUATED",
                  dq_level: aggregate.dq_level,
                  dq_passed: aggregate.dq_passed,
                  last_seen_at: evaluatedAt
                },
                latest.version
              );
        const entry = await this.registry.upsert(
          {
            ...toDraft(evaluated),
            promotion: promote ? "PROMOTED" : "REJECTED",
            promoted: promote,
            dq_level: aggregate.dq_level,
            dq_passed: aggregate.dq_passed,
            last_seen_at: evaluatedAt
          },
          evaluated.version
        );
        return { entry, settledHere: true };
      },
      { maxAttempts: this.maxConflictRetries, initialDelayMs: this.retryDelayMs }
    );
    const { entry } = settled;
    if (!settled.settledHere) {
      log.debug("promotion.settled_elsewhere", { promotion: entry.promotion });
      return { entry, results: [], evaluated: false };
    }

    await this.dqLog.append(results);
    await this.writeArtifacts(entry, results, aggregate.dq_level, aggregate.dq_passed, verdict.rejectedRows, evaluatedAt);

    if (!aggregate.dq_passed && !policy.blockOnCritical) {
      log.warn("promotion.dq_failed_not_blocking", { dq_level: aggregate.dq_level });
    } else {
      log.info("promotion.settled", { promotion: entry.promotion, dq_level: aggregate.dq_level });
    }
    return { entry, results, evaluated: true };
  }

  /**
   * Queues the following layer for every live PROMOTED entry of `layer` whose
   * next-layer entry is missing or tracks other content. Picks up hand-offs an
   * interrupted run never made.
   */
  async queueLagging(layer: string): Promise<{ queued: PartitionKey[]; failures: KeyFailure[] }> {
    const next = this.nextLayer(layer);
    const queued: PartitionKey[] = [];
    const failures: KeyFailure[] = [];
    if (!next) return { queued, failures };

    const promoted = await this.registry.listByPromotion(layer, "PROMOTED");
    for (const entry of promoted) {
      if (entry.status === "DELETED") continue;
      const downstream = await this.registry.lookup(entry.key, next);
      if (
        downstream &&
        downstream.promotion !== null &&
        downstream.snapshot_version === entry.snapshot_version &&
        downstream.content_hash === entry.content_hash
      ) {
        continue;
      }
      try {
        await this.enqueue(entry.key, next, entry);
        queued.push(entry.key);
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;
        failures.push({ key: entry.key, error: errorMessage(error) });
      }
    }
    if (queued.length > 0) {
      this.log.info("promotion.queued_next", { layer, next, partitions: queued.length });
    }
    return { queued, failures };
  }

  /** Keys the next layer's builder may read. */
  async promotedKeys(layer: string): Promise<PartitionKey[]> {
    this.policy(layer);
    const entries = await this.registry.listByPromotion(layer, "PROMOTED");
    return entries.map((entry) => entry.key);
  }

  private async writeArtifacts(
    entry: ManifestEntry,
    results: readonly DQResult[],
    dqLevel: Severity | null,
    dqPassed: boolean,
    rejectedRows: readonly RejectedRow[],
    evaluatedAt: string
  ): Promise<void> {
    const promotion = entry.promotion === "REJECTED" ? "REJECTED" : "PROMOTED";
    const quarantined = promotion === "REJECTED" ? rejectedRows : [];
    await writeDqSummary(
      this.warehouseRoot,
      buildDqSummary(entry.key, entry.layer, entry.snapshot_version, evaluatedAt, results, {
        dq_level: dqLevel,
        dq_passed: dqPassed,
        promotion,
        rejectedRows: quarantined.length
      })
    );
    if (quarantined.length > 0) {
      await writeQuarantine(this.warehouseRoot, entry.layer, entry.key, entry.snapshot_version, quarantined);
    }
  }
}
