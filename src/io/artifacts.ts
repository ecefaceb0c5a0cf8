import { RejectedRow } from "../dq/gate";
import { DQResult, Severity } from "../types/dqResult";
import { PromotionState } from "../types/manifestEntry";
import { PartitionKey } from "../types/partitionKey";
import { writeJsonAtomic, writeJsonLines } from "../utils/fs";
import { assertValidSchema, contractSchemaPath, getSchemaValidator } from "../validation/jsonSchema";
import { dqSummaryPath, quarantinePath } from "./paths";

export interface DqSummaryArtifact {
  schema_version: "1.0";
  key: PartitionKey;
  layer: string;
  snapshot_version: string;
  evaluated_at: string;
  dq_level: Severity | null;
  dq_passed: boolean;
  promotion: Extract<PromotionState, "PROMOTED" | "REJECTED">;
  rejected_rows: number;
  checks: Array<Pick<DQResult, "check" | "severity" | "passed" | "metric" | "details">>;
}

export function buildDqSummary(
  key: PartitionKey,
  layer: string,
  snapshotVersion: string,
  evaluatedAt: string,
  results: readonly DQResult[],
  outcome: { dq_level: Severity | null; dq_passed: boolean; promotion: "PROMOTED" | "REJECTED"; rejectedRows: number }
): DqSummaryArtifact {
  return {
    schema_version: "1.0",
    key: { source: key.source, entity: key.entity, partition: key.partition },
    layer,
    snapshot_version: snapshotVersion,
    evaluated_at: evaluatedAt,
    dq_level: outcome.dq_level,
    dq_passed: outcome.dq_passed,
    promotion: outcome.promotion,
    rejected_rows: outcome.rejectedRows,
    checks: results.map((result) => ({
      check: result.check,
      severity: result.severity,
      passed: result.passed,
      metric: result.metric,
      ...(result.details ? { details: result.details } : {})
    }))
  };
}

/** Validates the summary against its contract, then writes it beside the layer's other DQ output. */
export async function writeDqSummary(warehouseRoot: string, summary: DqSummaryArtifact): Promise<string> {
  const validator = await getSchemaValidator(contractSchemaPath("dq_summary"));
  assertValidSchema(validator, summary, "dq_summary");
  const target = dqSummaryPath(warehouseRoot, summary.layer, summary.key);
  await writeJsonAtomic(target, summary);
  return target;
}

export async function writeQuarantine(
  warehouseRoot: string,
  layer: string,
  key: PartitionKey,
  snapshotVersion: string,
  rows: readonly RejectedRow[]
): Promise<string> {
  const target = quarantinePath(warehouseRoot, layer, key);
  await writeJsonLines(
    target,
    rows.map((rejected) => ({
      ...rejected.row,
      _row_index: rejected.index,
      _snapshot_version: snapshotVersion,
      reject_reasons: rejected.reject_reasons
    }))
  );
  return target;
}
