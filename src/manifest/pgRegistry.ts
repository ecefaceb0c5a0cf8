import path from "path";
import { promises as fs } from "fs";
import { and, eq, sql } from "drizzle-orm";
import { NodePgDatabase } from "drizzle-orm/node-postgres";
import { z } from "zod";
import * as schema from "../db/schema";
import { ConflictError } from "../errors";
import { sqlDir } from "../io/paths";
import { SEVERITIES } from "../types/dqResult";
import { PartitionKey } from "../types/partitionKey";
import {
  ENTRY_STATUSES,
  EntryStatus,
  ManifestDraft,
  ManifestEntry,
  PROMOTION_STATES,
  PromotionState
} from "../types/manifestEntry";
import { ManifestRegistry, applyUpsert } from "./registry";

type ManifestRow = typeof schema.manifestEntries.$inferSelect;
type ManifestInsert = typeof schema.manifestEntries.$inferInsert;

const StatusSchema = z.enum(ENTRY_STATUSES);
const PromotionSchema = z.enum(PROMOTION_STATES).nullable();
const SeveritySchema = z.enum(SEVERITIES).nullable();
const IntegritySchema = z.enum(["verified", "unverified", "hash_mismatch"]);

function toIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function rowToEntry(row: ManifestRow): ManifestEntry {
  return {
    key: { source: row.source, entity: row.entity, partition: row.partition },
    layer: row.layer,
    content_hash: row.contentHash,
    record_count: row.recordCount,
    byte_size: row.byteSize,
    snapshot_version: row.snapshotVersion,
    status: StatusSchema.parse(row.status),
    integrity: IntegritySchema.parse(row.integrity),
    promotion: PromotionSchema.parse(row.promotion),
    promoted: row.promoted,
    dq_level: SeveritySchema.parse(row.dqLevel),
    dq_passed: row.dqPassed,
    last_seen_at: toIsoSeconds(row.lastSeenAt),
    version: row.version
  };
}

function entryToRow(entry: ManifestEntry): ManifestInsert {
  return {
    source: entry.key.source,
    entity: entry.key.entity,
    partition: entry.key.partition,
    layer: entry.layer,
    contentHash: entry.content_hash,
    recordCount: entry.record_count,
    byteSize: entry.byte_size,
    snapshotVersion: entry.snapshot_version,
    status: entry.status,
    integrity: entry.integrity,
    promotion: entry.promotion,
    promoted: entry.promoted,
    dqLevel: entry.dq_level,
    dqPassed: entry.dq_passed,
    lastSeenAt: new Date(entry.last_seen_at),
    version: entry.version
  };
}

function keyFilter(key: PartitionKey, layer: string) {
  return and(
    eq(schema.manifestEntries.source, key.source),
    eq(schema.manifestEntries.entity, key.entity),
    eq(schema.manifestEntries.partition, key.partition),
    eq(schema.manifestEntries.layer, layer)
  );
}

/**
 * PostgreSQL-backed registry. Same-key writers serialize on a row lock inside a
 * transaction; a first insert racing another first insert loses on the unique
 * index and surfaces as a ConflictError.
 */
export class PgManifestRegistry implements ManifestRegistry {
  constructor(
    private readonly db: NodePgDatabase,
    private readonly onClose: () => Promise<void> = async () => undefined
  ) {}

  async ensureSchema(): Promise<void> {
    const ddl = await fs.readFile(path.join(sqlDir(), "manifest.sql"), "utf8");
    await this.db.execute(sql.raw(ddl));
  }

  async lookup(key: PartitionKey, layer: string): Promise<ManifestEntry | null> {
    const rows = await this.db.select().from(schema.manifestEntries).where(keyFilter(key, layer)).limit(1);
    return rows.length > 0 ? rowToEntry(rows[0]) : null;
  }

  async upsert(draft: ManifestDraft, expectedVersion: number | null): Promise<ManifestEntry> {
    return this.db.transaction(async (tx) => {
      const rows = await tx
        .select()
        .from(schema.manifestEntries)
        .where(keyFilter(draft.key, draft.layer))
        .for("update");
      const current = rows.length > 0 ? rowToEntry(rows[0]) : null;
      const next = applyUpsert(current, draft, expectedVersion);

      if (current === null) {
        const inserted = await tx
          .insert(schema.manifestEntries)
          .values(entryToRow(next))
          .onConflictDoNothing()
          .returning({ id: schema.manifestEntries.id });
        if (inserted.length === 0) {
          throw new ConflictError(draft.key, draft.layer, null, null, "created concurrently");
        }
        return next;
      }

      await tx
        .update(schema.manifestEntries)
        .set(entryToRow(next))
        .where(and(keyFilter(draft.key, draft.layer), eq(schema.manifestEntries.version, current.version)));
      return next;
    });
  }

  async listByStatus(layer: string, status: EntryStatus): Promise<PartitionKey[]> {
    const rows = await this.db
      .select({
        source: schema.manifestEntries.source,
        entity: schema.manifestEntries.entity,
        partition: schema.manifestEntries.partition
      })
      .from(schema.manifestEntries)
      .where(and(eq(schema.manifestEntries.layer, layer), eq(schema.manifestEntries.status, status)));
    return rows;
  }

  async listByPromotion(layer: string, state: PromotionState): Promise<ManifestEntry[]> {
    const rows = await this.db
      .select()
      .from(schema.manifestEntries)
      .where(and(eq(schema.manifestEntries.layer, layer), eq(schema.manifestEntries.promotion, state)));
    return rows.map(rowToEntry);
  }

  async listByLayer(layer: string): Promise<ManifestEntry[]> {
    const rows = await this.db.select().from(schema.manifestEntries).where(eq(schema.manifestEntries.layer, layer));
    return rows.map(rowToEntry);
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}
