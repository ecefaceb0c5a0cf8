import { promises as fs } from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConflictError } from "../src/errors";
import { FileManifestRegistry } from "../src/manifest/fileRegistry";
import { MemoryManifestRegistry } from "../src/manifest/memoryRegistry";
import { withConflictRetry } from "../src/manifest/retry";
import { ManifestDraft, toDraft } from "../src/types/manifestEntry";
import { partitionKey } from "../src/types/partitionKey";
import { T0, makeWorkspace, removeWorkspace } from "./helpers/fixtures";

const KEY = partitionKey("census", "population", "2020");

function draft(overrides: Partial<ManifestDraft> = {}): ManifestDraft {
  return {
    key: KEY,
    layer: "bronze",
    content_hash: "hash-1",
    record_count: 0,
    byte_size: 10,
    snapshot_version: "2026-01-01",
    status: "NEW",
    integrity: "verified",
    promotion: null,
    promoted: false,
    dq_level: null,
    dq_passed: null,
    last_seen_at: T0,
    ...overrides
  };
}

describe("MemoryManifestRegistry", () => {
  it("creates entries at version 1 and bumps on change", async () => {
    const registry = new MemoryManifestRegistry();
    const created = await registry.upsert(draft(), null);
    expect(created.version).toBe(1);

    const updated = await registry.upsert(draft({ content_hash: "hash-2", status: "DIRTY" }), 1);
    expect(updated.version).toBe(2);
    expect((await registry.lookup(KEY, "bronze"))?.content_hash).toBe("hash-2");
    expect(await registry.lookup(KEY, "silver")).toBeNull();
  });

  it("keeps the version when only freshness changes", async () => {
    const registry = new MemoryManifestRegistry();
    await registry.upsert(draft(), null);
    const refreshed = await registry.upsert(draft({ last_seen_at: "2026-02-01T00:00:00Z" }), 1);
    expect(refreshed.version).toBe(1);
    expect(refreshed.last_seen_at).toBe("2026-02-01T00:00:00Z");
  });

  it("rejects a stale writer instead of overwriting", async () => {
    const registry = new MemoryManifestRegistry();
    await registry.upsert(draft(), null);
    const [first, second] = await Promise.all([registry.lookup(KEY, "bronze"), registry.lookup(KEY, "bronze")]);
    if (!first || !second) throw new Error("entry missing");

    await registry.upsert({ ...toDraft(first), content_hash: "from-first" }, first.version);
    await expect(registry.upsert({ ...toDraft(second), content_hash: "from-second" }, second.version)).rejects.toThrow(
      ConflictError
    );
    expect((await registry.lookup(KEY, "bronze"))?.content_hash).toBe("from-first");
  });

  it("refuses to create an entry that already exists", async () => {
    const registry = new MemoryManifestRegistry();
    await registry.upsert(draft(), null);
    await expect(registry.upsert(draft({ content_hash: "other" }), null)).rejects.toThrow(ConflictError);
  });

  it("loses no update under concurrent read-modify-write with retry", async () => {
    const registry = new MemoryManifestRegistry();
    await registry.upsert(draft(), null);

    await Promise.all(
      Array.from({ length: 10 }, () =>
        withConflictRetry(
          async () => {
            const current = await registry.lookup(KEY, "bronze");
            if (!current) throw new Error("entry missing");
            return registry.upsert(
              { ...toDraft(current), record_count: (current.record_count ?? 0) + 1 },
              current.version
            );
          },
          { maxAttempts: 20 }
        )
      )
    );

    const final = await registry.lookup(KEY, "bronze");
    expect(final?.record_count).toBe(10);
    expect(final?.version).toBe(11);
  });

  it("lists entries by layer, status and promotion", async () => {
    const registry = new MemoryManifestRegistry();
    await registry.upsert(draft(), null);
    await registry.upsert(draft({ key: partitionKey("census", "population", "2021"), status: "DELETED" }), null);
    await registry.upsert(draft({ layer: "silver", promotion: "PENDING" }), null);

    expect(await registry.listByStatus("bronze", "DELETED")).toEqual([partitionKey("census", "population", "2021")]);
    expect((await registry.listByLayer("bronze")).length).toBe(2);
    expect((await registry.listByPromotion("silver", "PENDING")).map((e) => e.layer)).toEqual(["silver"]);
  });
});

describe("withConflictRetry", () => {
  it("gives up after the configured attempts with the last conflict", async () => {
    let calls = 0;
    const retries: number[] = [];
    await expect(
      withConflictRetry(
        async () => {
          calls += 1;
          throw new ConflictError(KEY, "bronze", calls, calls + 1);
        },
        { maxAttempts: 3, onRetry: (attempt) => retries.push(attempt) }
      )
    ).rejects.toThrow("expected version 3, found 4");
    expect(calls).toBe(3);
    expect(retries).toEqual([1, 2]);
  });

  it("does not retry other errors", async () => {
    let calls = 0;
    await expect(
      withConflictRetry(
        async () => {
          calls += 1;
          throw new Error("disk full");
        },
        { maxAttempts: 3 }
      )
    ).rejects.toThrow("disk full");
    expect(calls).toBe(1);
  });
});

describe("FileManifestRegistry", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeWorkspace();
  });

  afterEach(async () => {
    await removeWorkspace(dir);
  });

  it("survives a restart", async () => {
    const file = path.join(dir, "manifest", "manifest.json");
    const registry = await FileManifestRegistry.open(file);
    await registry.upsert(draft(), null);
    await registry.upsert(draft({ status: "CLEAN" }), 1);
    await registry.close();

    const reopened = await FileManifestRegistry.open(file);
    const entry = await reopened.lookup(KEY, "bronze");
    expect(entry?.status).toBe("CLEAN");
    expect(entry?.version).toBe(2);
    await expect(reopened.upsert(draft({ status: "DIRTY" }), 1)).rejects.toThrow(ConflictError);
  });

  it("rejects a stale write from a second instance on the same file", async () => {
    const file = path.join(dir, "manifest.json");
    const first = await FileManifestRegistry.open(file);
    const second = await FileManifestRegistry.open(file);

    const created = await first.upsert(draft({ content_hash: "from-first" }), null);
    expect(created.version).toBe(1);
    await expect(second.upsert(draft({ content_hash: "from-second" }), null)).rejects.toThrow(
      "expected version none, found 1"
    );

    const refreshed = await second.upsert(draft({ content_hash: "from-second" }), 1);
    expect(refreshed.version).toBe(2);
    await expect(first.upsert(draft({ content_hash: "from-first-again" }), 1)).rejects.toThrow(ConflictError);
    await Promise.all([first.close(), second.close()]);

    const reopened = await FileManifestRegistry.open(file);
    expect((await reopened.lookup(KEY, "bronze"))?.content_hash).toBe("from-second");
    expect(await fs.readdir(dir)).toEqual(["manifest.json"]);
  });

  it("keeps entries written by another instance when it writes its own", async () => {
    const file = path.join(dir, "manifest.json");
    const first = await FileManifestRegistry.open(file);
    const second = await FileManifestRegistry.open(file);
    const otherKey = partitionKey("census", "population", "2021");

    await Promise.all([first.upsert(draft(), null), second.upsert(draft({ key: otherKey }), null)]);

    const reopened = await FileManifestRegistry.open(file);
    expect((await reopened.listByLayer("bronze")).map((entry) => entry.key.partition).sort()).toEqual(["2020", "2021"]);
  });

  it("refuses a malformed manifest file", async () => {
    const file = path.join(dir, "manifest.json");
    await fs.writeFile(file, JSON.stringify({ schema_version: "1.0", entries: [{ layer: "bronze" }] }), "utf8");
    await expect(FileManifestRegistry.open(file)).rejects.toThrow();
  });
});
