import {
  pgTable,
  text,
  timestamp,
  jsonb,
  integer,
  bigint,
  boolean,
  doublePrecision,
  serial,
  index,
  uniqueIndex
} from "drizzle-orm/pg-core";

export const manifestEntries = pgTable(
  "manifest_entries",
  {
    id: serial("id").primaryKey(),
    source: text("source").notNull(),
    entity: text("entity").notNull(),
    partition: text("partition").notNull(),
    layer: text("layer").notNull(),
    contentHash: text("content_hash").notNull(),
    recordCount: bigint("record_count", { mode: "number" }),
    byteSize: bigint("byte_size", { mode: "number" }),
    snapshotVersion: text("snapshot_version").notNull(),
    status: text("status").notNull(), // NEW | DIRTY | CLEAN | DELETED
    integrity: text("integrity").notNull(),
    promotion: text("promotion"), // PENDING | EVALUATED | PROMOTED | REJECTED
    promoted: boolean("promoted").notNull().default(false),
    dqLevel: text("dq_level"),
    dqPassed: boolean("dq_passed"),
    lastSeenAt: timestamp("last_seen_at", { withTimezone: true }).notNull(),
    version: integer("version").notNull()
  },
  (table) => ({
    manifestKeyUnique: uniqueIndex("manifest_entries_key_idx").on(
      table.source,
      table.entity,
      table.partition,
      table.layer
    ),
    manifestStatusIdx: index("manifest_entries_layer_status_idx").on(table.layer, table.status),
    manifestPromotionIdx: index("manifest_entries_layer_promotion_idx").on(table.layer, table.promotion)
  })
);

export const dqResults = pgTable(
  "dq_results",
  {
    id: serial("id").primaryKey(),
    source: text("source").notNull(),
    entity: text("entity").notNull(),
    partition: text("partition").notNull(),
    layer: text("layer").notNull(),
    snapshotVersion: text("snapshot_version").notNull(),
    checkName: text("check_name").notNull(),
    severity: text("severity").notNull(),
    passed: boolean("passed").notNull(),
    metric: doublePrecision("metric"),
    details: jsonb("details"),
    evaluatedAt: timestamp("evaluated_at", { withTimezone: true }).notNull()
  },
  (table) => ({
    dqResultsKeyIdx: index("dq_results_key_idx").on(table.source, table.entity, table.partition, table.layer)
  })
);
