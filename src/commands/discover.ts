import { ConflictError, errorMessage } from "../errors";
import { DiscoveryService } from "../discovery/diffEngine";
import { appendLineage, discoverEvents, publishedEvent } from "../io/lineage";
import { dirtyListPath, runSummaryPath } from "../io/paths";
import { Router } from "../routing/router";
import { DiscoveryOutcome, KeyFailure } from "../types/dirtySet";
import { aggregateResults } from "../types/dqResult";
import { ManifestEntry } from "../types/manifestEntry";
import { partitionKeyId } from "../types/partitionKey";
import { mapWithConcurrency } from "../utils/concurrency";
import { writeJson, writeJsonLines } from "../utils/fs";
import { CommandIo, PipelineContext, openPipeline } from "./context";

export interface DiscoverOptions extends CommandIo {
  configPath: string;
  snapshotVersion: string;
}

export interface DiscoverReport {
  outcome: DiscoveryOutcome;
  promoted: number;
  enqueued: number;
  failures: KeyFailure[];
}

/**
 * Discovers the snapshot, settles the discovery layer and queues its
 * promoted partitions for the next layer. Prints the dirty set as JSON lines.
 */
export async function runDiscover(options: DiscoverOptions): Promise<DiscoverReport> {
  const ctx = await openPipeline(options.configPath, "discover", options);
  try {
    const router = new Router(ctx.config.routes);
    const service = new DiscoveryService({
      config: ctx.config,
      registry: ctx.stores.registry,
      router,
      logger: ctx.log,
      clock: ctx.clock
    });
    const outcome = await service.discover(options.snapshotVersion);

    for (const partition of outcome.dirty) {
      ctx.out(JSON.stringify(partition));
    }
    await writeJsonLines(dirtyListPath(ctx.config.warehouse_root, outcome.snapshot_version), outcome.dirty);
    await appendLineage(
      ctx.config.warehouse_root,
      discoverEvents(outcome.dirty, ctx.machine.discoveryLayer, ctx.clock())
    );

    const { promoted, enqueued, failures } = await settleDiscoveryLayer(ctx, outcome);
    const allFailures = [...outcome.failures, ...failures];

    await writeJson(runSummaryPath(ctx.config.warehouse_root, outcome.snapshot_version, "discover"), {
      snapshot_version: outcome.snapshot_version,
      finished_at: ctx.clock(),
      dirty: outcome.dirty.length,
      clean: outcome.clean.length,
      deleted: outcome.deleted.map(partitionKeyId),
      promoted,
      enqueued,
      failures: allFailures.map((failure) => ({ key: partitionKeyId(failure.key), error: failure.error }))
    });
    return { outcome, promoted, enqueued, failures: allFailures };
  } finally {
    await ctx.stores.close();
  }
}

async function settleDiscoveryLayer(
  ctx: PipelineContext,
  outcome: DiscoveryOutcome
): Promise<{ promoted: number; enqueued: number; failures: KeyFailure[] }> {
  const layer = ctx.machine.discoveryLayer;
  const resultsByKey = new Map(outcome.dirty.map((partition) => [partitionKeyId(partition.key), partition.bronze_results]));

  // Also picks up entries left unsettled by an interrupted earlier run.
  const pending = outcome.entries.filter(
    (entry) => entry.status !== "DELETED" && entry.promotion !== "PROMOTED" && entry.promotion !== "REJECTED"
  );

  const failures: KeyFailure[] = [];
  const published: ManifestEntry[] = [];
  await mapWithConcurrency(pending, ctx.config.max_workers, async (entry: ManifestEntry) => {
    try {
      const queued = await ctx.machine.enqueue(entry.key, layer, entry);
      const results = resultsByKey.get(partitionKeyId(entry.key)) ?? [];
      const evaluation = await ctx.machine.evaluate(queued.key, layer, { results, rejectedRows: [] });
      if (evaluation.entry.promoted) {
        if (evaluation.evaluated) published.push(evaluation.entry);
      } else {
        ctx.log.warn("discover.not_promoted", {
          key: partitionKeyId(entry.key),
          dq_level: aggregateResults(results).dq_level
        });
      }
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
      failures.push({ key: entry.key, error: errorMessage(error) });
    }
  });
  const publishedAt = ctx.clock();
  await appendLineage(
    ctx.config.warehouse_root,
    published.map((entry) => publishedEvent(entry, publishedAt))
  );

  const handoff = await ctx.machine.queueLagging(layer);
  return {
    promoted: published.length,
    enqueued: handoff.queued.length,
    failures: [...failures, ...handoff.failures]
  };
}
