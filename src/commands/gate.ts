import { ConfigurationError, ConflictError, errorMessage } from "../errors";
import { CheckOutcome, buildChecks } from "../dq/checks";
import { DqGate } from "../dq/gate";
import { appendLineage, publishedEvent } from "../io/lineage";
import { layerPartitionPath, runSummaryPath } from "../io/paths";
import { RecordRow, readRecordRows } from "../io/records";
import { KeyFailure } from "../types/dirtySet";
import { ManifestEntry } from "../types/manifestEntry";
import { partitionKeyId } from "../types/partitionKey";
import { mapWithConcurrency } from "../utils/concurrency";
import { writeJson } from "../utils/fs";
import { CommandIo, openPipeline } from "./context";

export interface GateOptions extends CommandIo {
  configPath: string;
  layer: string;
}

export interface GateReport {
  layer: string;
  evaluated: ManifestEntry[];
  promoted: number;
  rejected: number;
  /** Promoted partitions queued for the following layer by this run. */
  enqueued: number;
  failures: KeyFailure[];
}

/** True when the gate had work and rejected every partition of it. */
export function allRejected(report: GateReport): boolean {
  return report.evaluated.length > 0 && report.promoted === 0;
}

/**
 * Evaluates every PENDING or EVALUATED partition of a built layer against its
 * entity's checks, then queues every promoted partition the following layer
 * does not yet track.
 */
export async function runGate(options: GateOptions): Promise<GateReport> {
  const ctx = await openPipeline(options.configPath, "gate", options);
  try {
    const { machine, config } = ctx;
    const layer = options.layer;
    machine.policy(layer);
    if (layer === machine.discoveryLayer) {
      throw new ConfigurationError(`Layer "${layer}" is evaluated by discover`);
    }
    const gate = new DqGate({ clock: ctx.clock, logger: ctx.log });

    const waiting = [
      ...(await ctx.stores.registry.listByPromotion(layer, "PENDING")),
      ...(await ctx.stores.registry.listByPromotion(layer, "EVALUATED"))
    ];
    ctx.log.info("gate.begin", { layer, partitions: waiting.length });

    const failures: KeyFailure[] = [];
    const evaluated: ManifestEntry[] = [];
    const published: ManifestEntry[] = [];
    await mapWithConcurrency(waiting, config.max_workers, async (entry) => {
      const extra: CheckOutcome[] = [];
      let rows: RecordRow[] = [];
      const inputPath = layerPartitionPath(config.warehouse_root, layer, entry.key);
      try {
        rows = await readRecordRows(inputPath);
      } catch (error) {
        extra.push({
          check: "input_available",
          severity: "CRITICAL",
          passed: false,
          metric: null,
          details: { path: inputPath, error: errorMessage(error) }
        });
      }

      try {
        const verdict = await gate.evaluate({
          key: entry.key,
          layer,
          snapshotVersion: entry.snapshot_version,
          rows,
          checks: buildChecks(config.entities[entry.key.entity]?.checks ?? []),
          extra
        });
        const outcome = await machine.evaluate(entry.key, layer, verdict);
        evaluated.push(outcome.entry);
        if (outcome.evaluated && outcome.entry.promoted) published.push(outcome.entry);
        ctx.out(
          JSON.stringify({
            key: outcome.entry.key,
            layer,
            promotion: outcome.entry.promotion,
            dq_level: outcome.entry.dq_level
          })
        );
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;
        failures.push({ key: entry.key, error: errorMessage(error) });
      }
    });

    const publishedAt = ctx.clock();
    await appendLineage(
      config.warehouse_root,
      published.map((entry) => publishedEvent(entry, publishedAt))
    );
    const handoff = await machine.queueLagging(layer);
    failures.push(...handoff.failures);

    const promoted = evaluated.filter((entry) => entry.promoted).length;
    const report: GateReport = {
      layer,
      evaluated,
      promoted,
      rejected: evaluated.length - promoted,
      enqueued: handoff.queued.length,
      failures
    };
    const versions = Array.from(new Set(evaluated.map((entry) => entry.snapshot_version))).sort();
    for (const version of versions) {
      const forVersion = evaluated.filter((entry) => entry.snapshot_version === version);
      await writeJson(runSummaryPath(config.warehouse_root, version, `gate_${layer}`), {
        layer,
        snapshot_version: version,
        finished_at: ctx.clock(),
        promoted: forVersion.filter((entry) => entry.promoted).map((entry) => partitionKeyId(entry.key)),
        rejected: forVersion.filter((entry) => !entry.promoted).map((entry) => partitionKeyId(entry.key))
      });
    }
    ctx.log.info("gate.done", { layer, promoted: report.promoted, rejected: report.rejected, failures: failures.length });
    return report;
  } finally {
    await ctx.stores.close();
  }
}
