import { z } from "zod";
import { pathExists, readJson, withLockFile, writeJsonAtomic } from "../utils/fs";
import { SEVERITIES } from "../types/dqResult";
import { ENTRY_STATUSES, ManifestDraft, ManifestEntry, PROMOTION_STATES } from "../types/manifestEntry";
import { MemoryManifestRegistry } from "./memoryRegistry";
import { entryId } from "./registry";

const ManifestEntrySchema = z.object({
  key: z.object({ source: z.string(), entity: z.string(), partition: z.string() }),
  layer: z.string(),
  content_hash: z.string(),
  record_count: z.number().nullable(),
  byte_size: z.number().nullable(),
  snapshot_version: z.string(),
  status: z.enum(ENTRY_STATUSES),
  integrity: z.enum(["verified", "unverified", "hash_mismatch"]),
  promotion: z.enum(PROMOTION_STATES).nullable(),
  promoted: z.boolean(),
  dq_level: z.enum(SEVERITIES).nullable(),
  dq_passed: z.boolean().nullable(),
  last_seen_at: z.string(),
  version: z.number().int().positive()
});

const ManifestFileSchema = z.object({
  schema_version: z.literal("1.0"),
  entries: z.array(ManifestEntrySchema)
});

interface ManifestFile {
  schema_version: "1.0";
  entries: ManifestEntry[];
}

/**
 * Registry persisted as one JSON document. Each upsert takes `<file>.lock`,
 * re-reads the document, applies the compare-and-set against what is on disk
 * and replaces the file atomically before releasing the lock, so instances in
 * other processes never overwrite each other's entries. Reads serve the state
 * seen at open or at this instance's last write.
 */
export class FileManifestRegistry extends MemoryManifestRegistry {
  private writeChain: Promise<void> = Promise.resolve();

  private constructor(private readonly filePath: string) {
    super();
  }

  static async open(filePath: string): Promise<FileManifestRegistry> {
    const registry = new FileManifestRegistry(filePath);
    await registry.reload();
    return registry;
  }

  async upsert(draft: ManifestDraft, expectedVersion: number | null): Promise<ManifestEntry> {
    const write = this.writeChain.then(() =>
      withLockFile(`${this.filePath}.lock`, async () => {
        await this.reload();
        return super.upsert(draft, expectedVersion);
      })
    );
    this.writeChain = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  protected async persist(): Promise<void> {
    const document: ManifestFile = { schema_version: "1.0", entries: this.snapshot() };
    await writeJsonAtomic(this.filePath, document);
  }

  private async reload(): Promise<void> {
    if (!(await pathExists(this.filePath))) return;
    const data = ManifestFileSchema.parse(await readJson(this.filePath));
    this.entries.clear();
    for (const entry of data.entries) {
      this.entries.set(entryId(entry.key, entry.layer), entry);
    }
  }
}
