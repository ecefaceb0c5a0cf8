import { createHash } from "crypto";

export function sha256(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** JSON text with object keys sorted at every depth. */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value) ?? "null";
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
}

export function hashRecord(record: unknown): string {
  return sha256(canonicalJson(record));
}

/**
 * Fingerprint of a row multiset. Row order and key order do not matter;
 * duplicate rows do.
 */
export function hashRecords(records: readonly unknown[]): string {
  const rowHashes = records.map((record) => hashRecord(record)).sort();
  return sha256(rowHashes.join("\n"));
}

export interface HashPart {
  id: string;
  hash: string;
}

/** Hash-of-hashes over contributing partitions, independent of contribution order. */
export function combineHashes(parts: readonly HashPart[]): string {
  const lines = parts.map((part) => `${part.id}:${part.hash}`).sort();
  return sha256(lines.join("\n"));
}

export function sliceHash(parentHash: string, slice: string): string {
  return sha256(`${parentHash}|${slice}`);
}
