import { promises as fs } from "fs";
import path from "path";
import { ConfigurationError, errorMessage } from "../errors";
import { snapshotVersionDir, rawSummaryPath } from "../io/paths";
import { RawSummary, RawSummarySchema } from "../types/rawSummary";
import { pathExists, readJson } from "../utils/fs";

/** One raw partition file of one source in one snapshot version. */
export interface RawPartitionFile {
  sourceId: string;
  rawPartitionId: string;
  filePath: string;
  summaryPath: string;
}

const RAW_EXTENSION = ".jsonl";

export interface RawListing {
  files: RawPartitionFile[];
  /** Sources with no `date=<version>` directory. */
  missingSources: string[];
}

/**
 * Lists `<bronzeRoot>/<source>/date=<version>/*.jsonl`, sorted by source then
 * partition.
 */
export async function listRawPartitions(bronzeRoot: string, snapshotVersion: string): Promise<RawListing> {
  let sourceDirs: string[];
  try {
    const entries = await fs.readdir(bronzeRoot, { withFileTypes: true });
    sourceDirs = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  } catch (error) {
    throw new ConfigurationError(`Bronze root ${bronzeRoot} is not readable: ${errorMessage(error)}`);
  }

  const found: RawPartitionFile[] = [];
  const missingSources: string[] = [];
  for (const sourceId of sourceDirs.sort()) {
    const dir = snapshotVersionDir(bronzeRoot, sourceId, snapshotVersion);
    if (!(await pathExists(dir))) {
      missingSources.push(sourceId);
      continue;
    }
    const names = (await fs.readdir(dir)).filter((name) => name.endsWith(RAW_EXTENSION)).sort();
    for (const name of names) {
      const filePath = path.join(dir, name);
      found.push({
        sourceId,
        rawPartitionId: name.slice(0, -RAW_EXTENSION.length),
        filePath,
        summaryPath: rawSummaryPath(filePath)
      });
    }
  }
  return { files: found, missingSources };
}

export interface SummaryRead {
  summary: RawSummary | null;
  error: string | null;
}

/** Reads the writer's sidecar; a missing or malformed sidecar is reported, not thrown. */
export async function readRawSummary(summaryPath: string): Promise<SummaryRead> {
  if (!(await pathExists(summaryPath))) {
    return { summary: null, error: "summary missing" };
  }
  try {
    const parsed = RawSummarySchema.safeParse(await readJson(summaryPath));
    if (!parsed.success) {
      return { summary: null, error: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ") };
    }
    return { summary: parsed.data, error: null };
  } catch (error) {
    return { summary: null, error: errorMessage(error) };
  }
}
