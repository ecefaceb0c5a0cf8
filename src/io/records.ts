import { parseJsonLines, readJsonLines } from "../utils/fs";

export type RecordRow = Record<string, unknown>;

export function isRecordRow(value: unknown): value is RecordRow {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRecordRows(records: unknown[], label: string): RecordRow[] {
  return records.map((record, index) => {
    if (!isRecordRow(record)) {
      throw new Error(`${label}:${index + 1} is not a JSON object`);
    }
    return record;
  });
}

/** Reads a JSON Lines partition file; every line must hold a JSON object. */
export async function readRecordRows(filePath: string): Promise<RecordRow[]> {
  return toRecordRows(await readJsonLines(filePath), filePath);
}

export function parseRecordRows(content: string, label: string): RecordRow[] {
  return toRecordRows(parseJsonLines(content, label), label);
}
