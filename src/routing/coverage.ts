import { Grain } from "../config/pipelineConfig";

export interface Coverage {
  grain: Grain;
  start: string;
  end: string;
}

const YEAR_RE = /^(\d{4})$/;
const YEAR_RANGE_RE = /^(\d{4})-(\d{4})$/;
const MONTH_RE = /^(\d{4}-(?:0[1-9]|1[0-2]))$/;
const MONTH_RANGE_RE = /^(\d{4}-(?:0[1-9]|1[0-2]))-(\d{4}-(?:0[1-9]|1[0-2]))$/;

/** Coverage token of a raw partition id: the stem before any `-part-NNN` suffix. */
export function coverageToken(rawPartitionId: string): string {
  return rawPartitionId.split("-part-")[0];
}

/**
 * Parses `YYYY`, `YYYY-YYYY`, `YYYY-MM` or `YYYY-MM-YYYY-MM`.
 * Returns null for anything else or for an inverted range.
 */
export function parseCoverage(rawPartitionId: string): Coverage | null {
  const token = coverageToken(rawPartitionId);
  let match = YEAR_RANGE_RE.exec(token);
  if (match) {
    return match[1] <= match[2] ? { grain: "year", start: match[1], end: match[2] } : null;
  }
  match = YEAR_RE.exec(token);
  if (match) return { grain: "year", start: match[1], end: match[1] };
  match = MONTH_RANGE_RE.exec(token);
  if (match) {
    return match[1] <= match[2] ? { grain: "month", start: match[1], end: match[2] } : null;
  }
  match = MONTH_RE.exec(token);
  if (match) return { grain: "month", start: match[1], end: match[1] };
  return null;
}

function yearsBetween(start: number, end: number): string[] {
  const years: string[] = [];
  for (let year = start; year <= end; year += 1) years.push(String(year));
  return years;
}

function monthsBetween(start: string, end: string): string[] {
  const months: string[] = [];
  let year = Number(start.slice(0, 4));
  let month = Number(start.slice(5, 7));
  const endYear = Number(end.slice(0, 4));
  const endMonth = Number(end.slice(5, 7));
  while (year < endYear || (year === endYear && month <= endMonth)) {
    months.push(`${year}-${String(month).padStart(2, "0")}`);
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }
  return months;
}

/** Canonical partition ids covered by `coverage` at `grain`, in ascending order. */
export function expandCoverage(coverage: Coverage, grain: Grain): string[] {
  if (grain === "year") {
    return yearsBetween(Number(coverage.start.slice(0, 4)), Number(coverage.end.slice(0, 4)));
  }
  if (coverage.grain === "year") {
    return monthsBetween(`${coverage.start}-01`, `${coverage.end}-12`);
  }
  return monthsBetween(coverage.start, coverage.end);
}

/** The partition id a row value falls into at `grain`, e.g. "2021-03-14" → "2021-03". */
export function partitionOfValue(value: unknown, grain: Grain): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  if (grain === "year") {
    return /^\d{4}/.test(text) ? text.slice(0, 4) : null;
  }
  return /^\d{4}-\d{2}/.test(text) ? text.slice(0, 7) : null;
}

export function grainOfPartition(partition: string): Grain | null {
  if (/^\d{4}$/.test(partition)) return "year";
  if (/^\d{4}-\d{2}$/.test(partition)) return "month";
  return null;
}
