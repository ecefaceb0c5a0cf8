import { z } from "zod";
import { SEVERITIES } from "../types/dqResult";

const SeveritySchema = z.enum(SEVERITIES);
const Identifier = z.string().min(1).regex(/^[A-Za-z0-9_.-]+$/, "must be a plain identifier");

export const GrainSchema = z.enum(["year", "month"]);
export type Grain = z.infer<typeof GrainSchema>;

export const RoutingRuleSchema = z.object({
  id: Identifier,
  source: z.string().min(1),
  entity: Identifier,
  grain: GrainSchema,
  canonical_source: Identifier.optional(),
  slice_field: z.string().min(1).optional(),
  field_mapping: z.record(z.string().min(1)).optional(),
  enabled: z.boolean().default(true)
});

const Columns = z.array(z.string().min(1)).min(1);

const CheckSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("expected_columns"), columns: Columns, severity: SeveritySchema.default("CRITICAL") }),
  z.object({ type: z.literal("not_null"), columns: Columns, severity: SeveritySchema.default("CRITICAL") }),
  z.object({ type: z.literal("unique"), columns: Columns, severity: SeveritySchema.default("CRITICAL") }),
  z.object({ type: z.literal("non_negative"), columns: Columns, severity: SeveritySchema.default("WARNING") }),
  z.object({
    type: z.literal("partition_matches_key"),
    column: z.string().min(1),
    severity: SeveritySchema.default("CRITICAL")
  }),
  z.object({
    type: z.literal("reference"),
    column: z.string().min(1),
    values: z.array(z.string()).optional(),
    values_path: z.string().min(1).optional(),
    severity: SeveritySchema.default("CRITICAL")
  }),
  z.object({
    type: z.literal("row_count_min"),
    min: z.number().int().nonnegative(),
    severity: SeveritySchema.default("WARNING")
  })
]);

export type CheckConfig = z.infer<typeof CheckSchema>;

const EntitySchema = z.object({
  checks: z.array(CheckSchema).default([])
});

const LayerSchema = z.object({
  name: Identifier,
  block_on_critical: z.boolean().optional()
});

const ManifestStoreSchema = z.discriminatedUnion("driver", [
  z.object({ driver: z.literal("file"), path: z.string().min(1) }),
  z.object({ driver: z.literal("postgres"), url_env: z.string().min(1).default("DATABASE_URL") })
]);

export const PipelineConfigSchema = z.object({
  version: z.string(),
  bronze_root: z.string().min(1),
  warehouse_root: z.string().min(1),
  manifest: ManifestStoreSchema,
  layers: z
    .array(LayerSchema)
    .min(1)
    .default([{ name: "bronze" }, { name: "silver" }, { name: "gold" }]),
  verify_hashes: z.boolean().default(true),
  max_workers: z.number().int().positive().default(8),
  max_conflict_retries: z.number().int().positive().default(3),
  retry_delay_ms: z.number().int().nonnegative().default(50),
  routes: z.array(RoutingRuleSchema).min(1),
  entities: z.record(EntitySchema).default({})
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type RoutingRule = z.infer<typeof RoutingRuleSchema>;
export type ManifestStoreConfig = z.infer<typeof ManifestStoreSchema>;

export interface LayerPolicy {
  name: string;
  blockOnCritical: boolean;
}

/** The first layer is the discovery layer and never blocks on DQ unless told to. */
export function layerPolicies(config: PipelineConfig): LayerPolicy[] {
  return config.layers.map((layer, index) => ({
    name: layer.name,
    blockOnCritical: layer.block_on_critical ?? index > 0
  }));
}
