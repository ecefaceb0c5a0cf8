import path from "path";
import { existsSync } from "fs";
import { PartitionKey } from "../types/partitionKey";

/** Nearest ancestor of this module holding package.json; works from src/ and dist/. */
export function projectRoot(startDir: string = __dirname): string {
  let current = startDir;
  for (;;) {
    if (existsSync(path.join(current, "package.json"))) return current;
    const parent = path.dirname(current);
    if (parent === current) return startDir;
    current = parent;
  }
}

export function contractsSchemasDir(): string {
  return path.join(projectRoot(), "contracts", "schemas");
}

export function sqlDir(): string {
  return path.join(projectRoot(), "sql");
}

export function snapshotVersionDir(bronzeRoot: string, sourceId: string, snapshotVersion: string): string {
  return path.join(bronzeRoot, sourceId, `date=${snapshotVersion}`);
}

export function rawSummaryPath(rawFilePath: string): string {
  const parsed = path.parse(rawFilePath);
  return path.join(parsed.dir, `${parsed.name}.summary.json`);
}

export function layerPartitionPath(warehouseRoot: string, layer: string, key: PartitionKey): string {
  return path.join(warehouseRoot, layer, key.entity, key.partition, `${key.source}.jsonl`);
}

export function dqSummaryPath(warehouseRoot: string, layer: string, key: PartitionKey): string {
  return path.join(warehouseRoot, "_dq", layer, key.entity, key.partition, `${key.source}.json`);
}

export function dqResultsLogPath(warehouseRoot: string): string {
  return path.join(warehouseRoot, "_dq", "results.jsonl");
}

export function quarantinePath(warehouseRoot: string, layer: string, key: PartitionKey): string {
  return path.join(warehouseRoot, "_quarantine", layer, key.entity, key.partition, `${key.source}.jsonl`);
}

export function dirtyListPath(warehouseRoot: string, snapshotVersion: string): string {
  return path.join(warehouseRoot, "_runs", snapshotVersion, "dirty_partitions.jsonl");
}

export function runSummaryPath(warehouseRoot: string, snapshotVersion: string, stage: string): string {
  return path.join(warehouseRoot, "_runs", snapshotVersion, `${stage}_summary.json`);
}

export function lineagePath(warehouseRoot: string, snapshotVersion: string): string {
  return path.join(warehouseRoot, "_runs", snapshotVersion, "lineage.jsonl");
}
