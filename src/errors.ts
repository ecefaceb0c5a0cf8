import { PartitionKey, partitionKeyId } from "./types/partitionKey";

/**
 * Unmatched routing rule, malformed rule set or pipeline config.
 * Fatal: raised before any manifest mutation.
 */
export class ConfigurationError extends Error {
  readonly exitCode = 2;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A manifest write whose expected version no longer matches the stored entry,
 * or two raw sources claiming the same canonical partition in one run.
 */
export class ConflictError extends Error {
  readonly exitCode = 3;
  readonly key: PartitionKey;
  readonly layer: string;
  readonly expectedVersion: number | null;
  readonly actualVersion: number | null;

  constructor(
    key: PartitionKey,
    layer: string,
    expectedVersion: number | null,
    actualVersion: number | null,
    detail?: string
  ) {
    const base = `Manifest conflict on ${partitionKeyId(key)} [${layer}]: expected version ${
      expectedVersion ?? "none"
    }, found ${actualVersion ?? "none"}`;
    super(detail ? `${base} (${detail})` : base);
    this.name = "ConflictError";
    this.key = key;
    this.layer = layer;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

/** A DQ check that could not execute. Counted as a CRITICAL failure, never aborts a run. */
export class DQCheckError extends Error {
  readonly check: string;

  constructor(check: string, message: string) {
    super(`DQ check ${check} could not run: ${message}`);
    this.name = "DQCheckError";
    this.check = check;
  }
}

export class HashMismatchError extends Error {
  readonly rawPartitionId: string;
  readonly declared: string;
  readonly computed: string;

  constructor(rawPartitionId: string, declared: string, computed: string) {
    super(`Content hash mismatch for ${rawPartitionId}: summary declares ${declared}, content hashes to ${computed}`);
    this.name = "HashMismatchError";
    this.rawPartitionId = rawPartitionId;
    this.declared = declared;
    this.computed = computed;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Process exit status for an error that reached the command line. */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError || error instanceof ConflictError) return error.exitCode;
  return 1;
}

export const EXIT_ALL_REJECTED = 4;
