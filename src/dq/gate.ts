import { DQCheckError, errorMessage } from "../errors";
import { RecordRow } from "../io/records";
import { DQResult, Severity, aggregateResults } from "../types/dqResult";
import { PartitionKey, partitionKeyId } from "../types/partitionKey";
import { Logger, silentLogger } from "../utils/logger";
import { Clock, systemClock } from "../utils/time";
import { CheckOutcome, DqCheck, toDqResults } from "./checks";

export interface RejectedRow {
  index: number;
  row: RecordRow;
  reject_reasons: string[];
}

export interface GateVerdict {
  results: DQResult[];
  dq_level: Severity | null;
  dq_passed: boolean;
  rejectedRows: RejectedRow[];
}

export interface GateInput {
  key: PartitionKey;
  layer: string;
  snapshotVersion: string;
  rows: readonly RecordRow[];
  checks: readonly DqCheck[];
  /** Outcomes produced outside the check list, e.g. an unreadable input. */
  extra?: readonly CheckOutcome[];
}

export interface DqGateOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * Runs the configured checks over one partition's rows. A check that throws
 * is recorded as a failed CRITICAL result so evaluation always completes.
 */
export class DqGate {
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: DqGateOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? silentLogger;
  }

  async evaluate(input: GateInput): Promise<GateVerdict> {
    const outcomes: CheckOutcome[] = [...(input.extra ?? [])];

    for (const check of input.checks) {
      try {
        const run = await check.run({ key: input.key, rows: input.rows });
        outcomes.push({ check: check.name, severity: check.severity, ...run });
      } catch (error) {
        const failure = error instanceof DQCheckError ? error : new DQCheckError(check.name, errorMessage(error));
        this.log.warn("dq.check_error", {
          key: partitionKeyId(input.key),
          layer: input.layer,
          check: check.name,
          error: failure.message
        });
        outcomes.push({
          check: check.name,
          severity: "CRITICAL",
          passed: false,
          metric: null,
          details: { error: failure.message }
        });
      }
    }

    const results = toDqResults(input.key, input.layer, input.snapshotVersion, outcomes, this.clock());
    const aggregate = aggregateResults(results);
    return {
      results,
      dq_level: aggregate.dq_level,
      dq_passed: aggregate.dq_passed,
      rejectedRows: collectRejectedRows(input.rows, outcomes)
    };
  }
}

function collectRejectedRows(rows: readonly RecordRow[], outcomes: readonly CheckOutcome[]): RejectedRow[] {
  const reasons = new Map<number, string[]>();
  for (const outcome of outcomes) {
    if (outcome.passed || !outcome.failedRows) continue;
    for (const index of outcome.failedRows) {
      const list = reasons.get(index) ?? [];
      list.push(outcome.check);
      reasons.set(index, list);
    }
  }
  return Array.from(reasons.entries())
    .sort(([a], [b]) => a - b)
    .map(([index, rejectReasons]) => ({ index, row: rows[index], reject_reasons: rejectReasons }));
}
