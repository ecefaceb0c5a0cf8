import { promises as fs } from "fs";
import { CheckConfig } from "../config/pipelineConfig";
import { DQCheckError, errorMessage } from "../errors";
import { RecordRow } from "../io/records";
import { grainOfPartition, partitionOfValue } from "../routing/coverage";
import { DQResult, Severity } from "../types/dqResult";
import { PartitionKey } from "../types/partitionKey";
import { canonicalJson } from "../utils/hash";

export interface CheckOutcome {
  check: string;
  severity: Severity;
  passed: boolean;
  metric: number | null;
  details?: Record<string, unknown>;
  /** Indexes of rows that violate the check, for quarantine. */
  failedRows?: number[];
}

export interface CheckContext {
  key: PartitionKey;
  rows: readonly RecordRow[];
}

export type CheckRun = Omit<CheckOutcome, "check" | "severity">;

export interface DqCheck {
  name: string;
  severity: Severity;
  run(context: CheckContext): Promise<CheckRun>;
}

function isMissing(value: unknown): boolean {
  return value === null || value === undefined;
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function rowViolations(rows: readonly RecordRow[], violates: (row: RecordRow) => boolean): CheckRun {
  const failedRows: number[] = [];
  rows.forEach((row, index) => {
    if (violates(row)) failedRows.push(index);
  });
  return { passed: failedRows.length === 0, metric: failedRows.length, failedRows };
}

async function loadReferenceValues(check: Extract<CheckConfig, { type: "reference" }>): Promise<Set<string>> {
  if (check.values) return new Set(check.values);
  if (!check.values_path) {
    throw new DQCheckError(`reference:${check.column}`, "no reference mapping configured");
  }
  let content: string;
  try {
    content = await fs.readFile(check.values_path, "utf8");
  } catch (error) {
    throw new DQCheckError(`reference:${check.column}`, `reference mapping unreadable: ${errorMessage(error)}`);
  }
  const trimmed = content.trim();
  if (trimmed.startsWith("[")) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed)) {
      throw new DQCheckError(`reference:${check.column}`, "reference mapping is not a list");
    }
    return new Set(parsed.map((value) => String(value)));
  }
  return new Set(
    trimmed
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
  );
}

function buildCheck(config: CheckConfig): DqCheck {
  switch (config.type) {
    case "expected_columns":
      return {
        name: "expected_columns",
        severity: config.severity,
        async run({ rows }) {
          if (rows.length === 0) return { passed: true, metric: 0, details: { note: "no rows" } };
          const found = new Set<string>();
          for (const row of rows) Object.keys(row).forEach((column) => found.add(column));
          const missing = config.columns.filter((column) => !found.has(column));
          const extra = Array.from(found).filter((column) => !config.columns.includes(column));
          return { passed: missing.length === 0, metric: missing.length, details: { missing, extra } };
        }
      };
    case "not_null":
      return {
        name: `not_null:${config.columns.join(",")}`,
        severity: config.severity,
        async run({ rows }) {
          return rowViolations(rows, (row) => config.columns.some((column) => isMissing(row[column])));
        }
      };
    case "unique":
      return {
        name: `unique:${config.columns.join(",")}`,
        severity: config.severity,
        async run({ rows }) {
          const seen = new Set<string>();
          return rowViolations(rows, (row) => {
            const id = canonicalJson(config.columns.map((column) => row[column] ?? null));
            if (seen.has(id)) return true;
            seen.add(id);
            return false;
          });
        }
      };
    case "non_negative":
      return {
        name: `non_negative:${config.columns.join(",")}`,
        severity: config.severity,
        async run({ rows }) {
          return rowViolations(rows, (row) =>
            config.columns.some((column) => {
              const value = toNumber(row[column]);
              return value !== null && value < 0;
            })
          );
        }
      };
    case "partition_matches_key":
      return {
        name: `partition_matches_key:${config.column}`,
        severity: config.severity,
        async run({ key, rows }) {
          const grain = grainOfPartition(key.partition);
          if (!grain) {
            throw new DQCheckError(`partition_matches_key:${config.column}`, `unknown grain for ${key.partition}`);
          }
          return rowViolations(rows, (row) => partitionOfValue(row[config.column], grain) !== key.partition);
        }
      };
    case "reference":
      return {
        name: `reference:${config.column}`,
        severity: config.severity,
        async run({ rows }) {
          const allowed = await loadReferenceValues(config);
          return rowViolations(rows, (row) => {
            const value = row[config.column];
            return !isMissing(value) && !allowed.has(String(value));
          });
        }
      };
    case "row_count_min":
      return {
        name: "row_count_min",
        severity: config.severity,
        async run({ rows }) {
          return { passed: rows.length >= config.min, metric: rows.length, details: { min: config.min } };
        }
      };
  }
}

export function buildChecks(configs: readonly CheckConfig[]): DqCheck[] {
  return configs.map(buildCheck);
}

export function toDqResults(
  key: PartitionKey,
  layer: string,
  snapshotVersion: string,
  outcomes: readonly CheckOutcome[],
  evaluatedAt: string
): DQResult[] {
  return outcomes.map((outcome) => ({
    key,
    layer,
    snapshot_version: snapshotVersion,
    check: outcome.check,
    severity: outcome.severity,
    passed: outcome.passed,
    metric: outcome.metric,
    ...(outcome.details ? { details: outcome.details } : {}),
    evaluated_at: evaluatedAt
  }));
}
