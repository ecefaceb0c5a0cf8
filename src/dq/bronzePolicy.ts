import { RawSummary } from "../types/rawSummary";
import { Integrity } from "../types/manifestEntry";
import { CheckOutcome } from "./checks";

export interface BronzeFacts {
  snapshotVersion: string;
  summary: RawSummary | null;
  /** Why the sidecar could not be used, when it could not. */
  summaryError: string | null;
  countedRecords: number | null;
  fileBytes: number;
  contentHash: string;
  integrity: Integrity;
}

/**
 * Checks every raw partition gets at discovery time. Empty or unhashed
 * partitions and inverted coverage are CRITICAL; disagreement between the
 * sidecar and the file is a WARNING unless the hashes differ.
 */
export function bronzeChecks(facts: BronzeFacts): CheckOutcome[] {
  const { summary } = facts;
  const records = summary?.records ?? facts.countedRecords ?? 0;
  const bytes = summary?.bytes ?? facts.fileBytes;
  const outcomes: CheckOutcome[] = [
    { check: "records_positive", severity: "CRITICAL", passed: records > 0, metric: records },
    { check: "bytes_positive", severity: "CRITICAL", passed: bytes > 0, metric: bytes },
    {
      check: "hash_present",
      severity: "CRITICAL",
      passed: facts.contentHash.length > 0,
      metric: null
    },
    {
      check: "summary_readable",
      severity: "WARNING",
      passed: summary !== null,
      metric: null,
      ...(facts.summaryError ? { details: { error: facts.summaryError } } : {})
    }
  ];

  if (summary?.start_year !== undefined && summary.cutoff_year !== undefined) {
    outcomes.push({
      check: "cutoff_valid",
      severity: "CRITICAL",
      passed: summary.start_year <= summary.cutoff_year,
      metric: null,
      details: { start_year: summary.start_year, cutoff_year: summary.cutoff_year }
    });
  }

  if (summary) {
    outcomes.push({
      check: "snapshot_version_matches",
      severity: "WARNING",
      passed: summary.snapshot_version === facts.snapshotVersion,
      metric: null,
      details: { declared: summary.snapshot_version }
    });
    if (summary.records !== null && summary.records !== undefined && facts.countedRecords !== null) {
      outcomes.push({
        check: "record_count_matches",
        severity: "WARNING",
        passed: summary.records === facts.countedRecords,
        metric: facts.countedRecords,
        details: { declared: summary.records }
      });
    }
    outcomes.push({
      check: "writer_dq_passed",
      severity: "WARNING",
      passed: summary.dq_passed !== false,
      metric: null,
      ...(summary.dq_level ? { details: { writer_dq_level: summary.dq_level } } : {})
    });
  }

  if (facts.integrity !== "unverified") {
    outcomes.push({
      check: "content_hash_matches_summary",
      severity: "CRITICAL",
      passed: facts.integrity === "verified",
      metric: null
    });
  }

  return outcomes;
}
