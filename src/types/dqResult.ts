import { PartitionKey } from "./partitionKey";

export const SEVERITIES = ["INFO", "WARNING", "CRITICAL"] as const;
export type Severity = (typeof SEVERITIES)[number];

const SEVERITY_RANK: Record<Severity, number> = {
  INFO: 0,
  WARNING: 1,
  CRITICAL: 2
};

export function maxSeverity(a: Severity | null, b: Severity | null): Severity | null {
  if (a === null) return b;
  if (b === null) return a;
  return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;
}

export interface DQResult {
  key: PartitionKey;
  layer: string;
  snapshot_version: string;
  check: string;
  severity: Severity;
  passed: boolean;
  metric: number | null;
  details?: Record<string, unknown>;
  evaluated_at: string;
}

export interface DqAggregate {
  dq_level: Severity | null;
  dq_passed: boolean;
}

/** Highest severity among failed checks; passed unless a CRITICAL check failed. */
export function aggregateResults(results: readonly DQResult[]): DqAggregate {
  let level: Severity | null = null;
  for (const result of results) {
    if (result.passed) continue;
    level = maxSeverity(level, result.severity);
  }
  return { dq_level: level, dq_passed: level !== "CRITICAL" };
}
