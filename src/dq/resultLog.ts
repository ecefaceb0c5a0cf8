import { promises as fs } from "fs";
import { and, asc, eq } from "drizzle-orm";
import { NodePgDatabase } from "drizzle-orm/node-postgres";
import { z } from "zod";
import * as schema from "../db/schema";
import { DQResult, SEVERITIES } from "../types/dqResult";
import { PartitionKey, samePartitionKey } from "../types/partitionKey";
import { appendJsonLines, parseJsonLines, pathExists } from "../utils/fs";

const DQResultSchema = z.object({
  key: z.object({ source: z.string(), entity: z.string(), partition: z.string() }),
  layer: z.string(),
  snapshot_version: z.string(),
  check: z.string(),
  severity: z.enum(SEVERITIES),
  passed: z.boolean(),
  metric: z.number().nullable(),
  details: z.record(z.unknown()).optional(),
  evaluated_at: z.string()
});

/** Append-only audit trail of DQ outcomes. */
export interface DqResultLog {
  append(results: readonly DQResult[]): Promise<void>;
  listFor(key: PartitionKey, layer: string): Promise<DQResult[]>;
}

export class FileDqResultLog implements DqResultLog {
  private appendChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async append(results: readonly DQResult[]): Promise<void> {
    const write = this.appendChain.then(() => appendJsonLines(this.filePath, [...results]));
    this.appendChain = write.catch(() => undefined);
    await write;
  }

  async listFor(key: PartitionKey, layer: string): Promise<DQResult[]> {
    await this.appendChain;
    if (!(await pathExists(this.filePath))) return [];
    const content = await fs.readFile(this.filePath, "utf8");
    return parseJsonLines(content, this.filePath)
      .map((record) => DQResultSchema.parse(record))
      .filter((result) => result.layer === layer && samePartitionKey(result.key, key));
  }
}

export class PgDqResultLog implements DqResultLog {
  constructor(private readonly db: NodePgDatabase) {}

  async append(results: readonly DQResult[]): Promise<void> {
    if (results.length === 0) return;
    await this.db.insert(schema.dqResults).values(
      results.map((result) => ({
        source: result.key.source,
        entity: result.key.entity,
        partition: result.key.partition,
        layer: result.layer,
        snapshotVersion: result.snapshot_version,
        checkName: result.check,
        severity: result.severity,
        passed: result.passed,
        metric: result.metric,
        details: result.details ?? null,
        evaluatedAt: new Date(result.evaluated_at)
      }))
    );
  }

  async listFor(key: PartitionKey, layer: string): Promise<DQResult[]> {
    const rows = await this.db
      .select()
      .from(schema.dqResults)
      .where(
        and(
          eq(schema.dqResults.source, key.source),
          eq(schema.dqResults.entity, key.entity),
          eq(schema.dqResults.partition, key.partition),
          eq(schema.dqResults.layer, layer)
        )
      )
      .orderBy(asc(schema.dqResults.id));

    return rows.map((row) =>
      DQResultSchema.parse({
        key: { source: row.source, entity: row.entity, partition: row.partition },
        layer: row.layer,
        snapshot_version: row.snapshotVersion,
        check: row.checkName,
        severity: row.severity,
        passed: row.passed,
        metric: row.metric,
        details: row.details ?? undefined,
        evaluated_at: row.evaluatedAt.toISOString().replace(/\.\d{3}Z$/, "Z")
      })
    );
  }
}
