import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { parsePipelineConfig } from "../../src/config/loadConfig";
import { PipelineConfig, RoutingRule, RoutingRuleSchema } from "../../src/config/pipelineConfig";
import { snapshotVersionDir } from "../../src/io/paths";
import { RawSummary } from "../../src/types/rawSummary";
import { hashRecords } from "../../src/utils/hash";
import { Clock } from "../../src/utils/time";

export const T0 = "2026-01-01T00:00:00Z";

export function fixedClock(value: string = T0): Clock {
  return () => value;
}

export async function makeWorkspace(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "snapdiff-"));
}

export async function removeWorkspace(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function rule(input: Omit<RoutingRule, "enabled"> & { enabled?: boolean }): RoutingRule {
  return RoutingRuleSchema.parse(input);
}

export type Row = Record<string, unknown>;

/**
 * Writes `<bronzeRoot>/<source>/date=<version>/<stem>.jsonl` and, unless
 * `summary` is null, a matching sidecar; `summary` fields override the
 * defaults derived from the rows.
 */
export async function writeRawPartition(
  bronzeRoot: string,
  source: string,
  version: string,
  stem: string,
  rows: Row[],
  summary: Partial<RawSummary> | null = {}
): Promise<string> {
  const dir = snapshotVersionDir(bronzeRoot, source, version);
  await fs.mkdir(dir, { recursive: true });
  const content = rows.map((row) => JSON.stringify(row)).join("\n") + (rows.length ? "\n" : "");
  const filePath = path.join(dir, `${stem}.jsonl`);
  await fs.writeFile(filePath, content, "utf8");
  if (summary !== null) {
    const sidecar: RawSummary = {
      records: rows.length,
      bytes: Buffer.byteLength(content),
      hash: hashRecords(rows),
      dq_passed: true,
      snapshot_version: version,
      ...summary
    };
    await fs.writeFile(path.join(dir, `${stem}.summary.json`), JSON.stringify(sidecar), "utf8");
  }
  return filePath;
}

export const CENSUS_RULE = rule({ id: "census_yearly", source: "census", entity: "population", grain: "year" });
export const SALES_RULE = rule({
  id: "sales_monthly",
  source: "sales_export",
  canonical_source: "sales",
  entity: "sales",
  grain: "month",
  slice_field: "sold_at",
  field_mapping: { txn_date: "sold_at" }
});
export const WEATHER_RULE = rule({ id: "weather_yearly", source: "weather", entity: "weather", grain: "year" });

export function testConfig(root: string, overrides: Record<string, unknown> = {}): PipelineConfig {
  return parsePipelineConfig({
    version: "1",
    bronze_root: path.join(root, "bronze"),
    warehouse_root: path.join(root, "warehouse"),
    manifest: { driver: "file", path: path.join(root, "warehouse", "_manifest", "manifest.json") },
    max_workers: 4,
    retry_delay_ms: 0,
    routes: [CENSUS_RULE, SALES_RULE, WEATHER_RULE],
    ...overrides
  });
}

export function censusRows(year: number, population: number): Row[] {
  return [
    { region: "north", year, population },
    { region: "south", year, population: population * 2 }
  ];
}

/** One sale on the 15th of every month of `year`. */
export function monthlySales(year: number, amount = 5): Row[] {
  return Array.from({ length: 12 }, (_, index) => ({
    sale_id: index + 1,
    region: "north",
    amount,
    txn_date: `${year}-${String(index + 1).padStart(2, "0")}-15`
  }));
}
