import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PipelineConfig } from "../src/config/pipelineConfig";
import { DiscoveryService } from "../src/discovery/diffEngine";
import { ConfigurationError } from "../src/errors";
import { MemoryManifestRegistry } from "../src/manifest/memoryRegistry";
import { Router } from "../src/routing/router";
import { partitionKey, partitionKeyId } from "../src/types/partitionKey";
import { combineHashes, hashRecords, sha256, sliceHash } from "../src/utils/hash";
import {
  CENSUS_RULE,
  SALES_RULE,
  WEATHER_RULE,
  censusRows,
  fixedClock,
  makeWorkspace,
  monthlySales,
  removeWorkspace,
  rule,
  testConfig,
  writeRawPartition
} from "./helpers/fixtures";

const V1 = "2026-01-01";
const V2 = "2026-02-01";
const V3 = "2026-03-01";

describe("DiscoveryService", () => {
  let dir: string;
  let bronze: string;
  let registry: MemoryManifestRegistry;

  beforeEach(async () => {
    dir = await makeWorkspace();
    bronze = path.join(dir, "bronze");
    registry = new MemoryManifestRegistry();
  });

  afterEach(async () => {
    await removeWorkspace(dir);
  });

  function service(config: PipelineConfig = testConfig(dir)): DiscoveryService {
    return new DiscoveryService({ config, registry, router: new Router(config.routes), clock: fixedClock() });
  }

  it("reports every partition of a first snapshot as NEW", async () => {
    await writeRawPartition(bronze, "census", V1, "2020", censusRows(2020, 10));
    await writeRawPartition(bronze, "census", V1, "2021", censusRows(2021, 20));

    const outcome = await service().discover(V1);

    expect(outcome.dirty.map((d) => partitionKeyId(d.key))).toEqual(["census/population/2020", "census/population/2021"]);
    expect(outcome.dirty.map((d) => d.status)).toEqual(["NEW", "NEW"]);
    expect(outcome.dirty[0].content_hash).toBe(hashRecords(censusRows(2020, 10)));
    expect(outcome.dirty[0].integrity).toBe("verified");
    expect(outcome.dirty[0].bronze_results.map((r) => r.check)).toEqual([
      "records_positive",
      "bytes_positive",
      "hash_present",
      "summary_readable",
      "snapshot_version_matches",
      "record_count_matches",
      "writer_dq_passed",
      "content_hash_matches_summary"
    ]);
    expect(outcome.dirty[0].bronze_results.every((r) => r.passed)).toBe(true);

    const entry = await registry.lookup(partitionKey("census", "population", "2020"), "bronze");
    expect(entry?.status).toBe("NEW");
    expect(entry?.record_count).toBe(2);
    expect(entry?.snapshot_version).toBe(V1);
    expect(entry?.promotion).toBeNull();
  });

  it("is idempotent on an unchanged snapshot", async () => {
    await writeRawPartition(bronze, "census", V1, "2020", censusRows(2020, 10));
    await writeRawPartition(bronze, "census", V1, "2021", censusRows(2021, 20));
    const discovery = service();

    await discovery.discover(V1);
    const second = await discovery.discover(V1);
    expect(second.dirty).toEqual([]);
    expect(second.clean.map(partitionKeyId)).toEqual(["census/population/2020", "census/population/2021"]);
    const afterSecond = await registry.lookup(partitionKey("census", "population", "2020"), "bronze");

    const third = await discovery.discover(V1);
    expect(third.dirty).toEqual([]);
    const afterThird = await registry.lookup(partitionKey("census", "population", "2020"), "bronze");
    expect(afterThird).toEqual(afterSecond);
    expect(afterThird?.content_hash).toBe(hashRecords(censusRows(2020, 10)));
  });

  it("marks only changed partitions dirty in a new snapshot version", async () => {
    await writeRawPartition(bronze, "census", V1, "2020", censusRows(2020, 10));
    await writeRawPartition(bronze, "census", V1, "2021", censusRows(2021, 20));
    await writeRawPartition(bronze, "census", V2, "2020", censusRows(2020, 10));
    await writeRawPartition(bronze, "census", V2, "2021", censusRows(2021, 25));
    await writeRawPartition(bronze, "census", V2, "2022", censusRows(2022, 30));
    const discovery = service();

    await discovery.discover(V1);
    const outcome = await discovery.discover(V2);

    expect(outcome.dirty.map((d) => [partitionKeyId(d.key), d.status])).toEqual([
      ["census/population/2021", "DIRTY"],
      ["census/population/2022", "NEW"]
    ]);
    expect(outcome.dirty[0].snapshot_version).toBe(V2);
    const unchanged = await registry.lookup(partitionKey("census", "population", "2020"), "bronze");
    expect(unchanged?.status).toBe("CLEAN");
    expect(unchanged?.snapshot_version).toBe(V1);
  });

  it("marks vanished partitions DELETED and revives them as DIRTY", async () => {
    await writeRawPartition(bronze, "census", V1, "2020", censusRows(2020, 10));
    await writeRawPartition(bronze, "census", V1, "2021", censusRows(2021, 20));
    await writeRawPartition(bronze, "census", V2, "2020", censusRows(2020, 10));
    await writeRawPartition(bronze, "census", V3, "2020", censusRows(2020, 10));
    await writeRawPartition(bronze, "census", V3, "2021", censusRows(2021, 20));
    const discovery = service();

    await discovery.discover(V1);
    const second = await discovery.discover(V2);
    expect(second.deleted.map(partitionKeyId)).toEqual(["census/population/2021"]);
    expect(second.dirty).toEqual([]);
    const gone = await registry.lookup(partitionKey("census", "population", "2021"), "bronze");
    expect(gone?.status).toBe("DELETED");
    expect(gone?.content_hash).toBe(hashRecords(censusRows(2021, 20)));

    const third = await discovery.discover(V3);
    expect(third.dirty.map((d) => [partitionKeyId(d.key), d.status])).toEqual([["census/population/2021", "DIRTY"]]);
  });

  it("fans a yearly file out to twelve monthly keys and tracks each slice", async () => {
    await writeRawPartition(bronze, "sales_export", V1, "2021", monthlySales(2021));
    const changed = monthlySales(2021);
    changed[2] = { ...changed[2], amount: 7 };
    await writeRawPartition(bronze, "sales_export", V2, "2021", changed);
    const discovery = service();

    const first = await discovery.discover(V1);
    expect(first.dirty).toHaveLength(12);
    expect(first.dirty[2].key).toEqual(partitionKey("sales", "sales", "2021-03"));
    expect(first.dirty[2].content_hash).toBe(hashRecords([monthlySales(2021)[2]]));
    const march = await registry.lookup(partitionKey("sales", "sales", "2021-03"), "bronze");
    expect(march?.record_count).toBe(1);

    const second = await discovery.discover(V2);
    expect(second.dirty.map((d) => partitionKeyId(d.key))).toEqual(["sales/sales/2021-03"]);
    expect(second.clean).toHaveLength(11);
  });

  it("dirties every slice of a fan-out without a slice field when the parent changes", async () => {
    const config = testConfig(dir, { routes: [CENSUS_RULE, { ...SALES_RULE, slice_field: undefined }] });
    await writeRawPartition(bronze, "sales_export", V1, "2021", monthlySales(2021));
    await writeRawPartition(bronze, "sales_export", V2, "2021", monthlySales(2021, 6));
    const discovery = service(config);

    const first = await discovery.discover(V1);
    expect(first.dirty[0].content_hash).toBe(sliceHash(hashRecords(monthlySales(2021)), "2021-01"));

    const second = await discovery.discover(V2);
    expect(second.dirty).toHaveLength(12);
    expect(second.dirty.every((d) => d.status === "DIRTY")).toBe(true);
  });

  it("collapses monthly files into one yearly key", async () => {
    const january = [{ day: "2021-01-01", temp: 1 }];
    const february = [{ day: "2021-02-01", temp: 2 }];
    await writeRawPartition(bronze, "weather", V1, "2021-01", january);
    await writeRawPartition(bronze, "weather", V1, "2021-02", february);
    await writeRawPartition(bronze, "weather", V2, "2021-01", january);
    const discovery = service();

    const first = await discovery.discover(V1);
    expect(first.dirty).toHaveLength(1);
    expect(first.dirty[0].key).toEqual(partitionKey("weather", "weather", "2021"));
    expect(first.dirty[0].content_hash).toBe(
      combineHashes([
        { id: "weather/2021-01", hash: hashRecords(january) },
        { id: "weather/2021-02", hash: hashRecords(february) }
      ])
    );
    expect(
      first.dirty[0].bronze_results.filter((r) => r.check === "records_positive").map((r) => r.details?.raw_partition)
    ).toEqual(["weather/2021-01", "weather/2021-02"]);

    const second = await discovery.discover(V2);
    expect(second.dirty.map((d) => d.content_hash)).toEqual([hashRecords(january)]);
    expect(second.deleted).toEqual([]);
  });

  it("aborts before any manifest write when a source has no rule", async () => {
    await writeRawPartition(bronze, "census", V1, "2020", censusRows(2020, 10));
    await writeRawPartition(bronze, "mystery", V1, "2020", [{ id: 1 }]);

    await expect(service().discover(V1)).rejects.toThrow(ConfigurationError);
    expect(await registry.listByLayer("bronze")).toEqual([]);
  });

  it("records the recomputed hash when the sidecar disagrees", async () => {
    const rows = censusRows(2020, 10);
    await writeRawPartition(bronze, "census", V1, "2020", rows, { hash: "not-the-real-hash" });

    const outcome = await service().discover(V1);
    const [dirty] = outcome.dirty;
    expect(dirty.integrity).toBe("hash_mismatch");
    expect(dirty.content_hash).toBe(hashRecords(rows));
    const check = dirty.bronze_results.find((r) => r.check === "content_hash_matches_summary");
    expect(check?.passed).toBe(false);
    expect(check?.severity).toBe("CRITICAL");
    expect((await registry.lookup(dirty.key, "bronze"))?.integrity).toBe("hash_mismatch");
  });

  it("hashes the rows when the sidecar is missing", async () => {
    const rows = censusRows(2020, 10);
    await writeRawPartition(bronze, "census", V1, "2020", rows, null);

    const [dirty] = (await service().discover(V1)).dirty;
    expect(dirty.content_hash).toBe(hashRecords(rows));
    expect(dirty.integrity).toBe("unverified");
    const readable = dirty.bronze_results.find((r) => r.check === "summary_readable");
    expect(readable).toMatchObject({ passed: false, severity: "WARNING", details: { error: "summary missing" } });
  });

  it("trusts the sidecar hash when verification is off", async () => {
    await writeRawPartition(bronze, "census", V1, "2020", censusRows(2020, 10), { hash: "declared-hash" });

    const [dirty] = (await service(testConfig(dir, { verify_hashes: false })).discover(V1)).dirty;
    expect(dirty.content_hash).toBe("declared-hash");
    expect(dirty.integrity).toBe("unverified");
    expect(dirty.bronze_results.map((r) => r.check)).not.toContain("content_hash_matches_summary");
  });

  it("fails only the key two raw sources claim in the same run", async () => {
    const config = testConfig(dir, {
      routes: [
        rule({ id: "a", source: "feed_a", canonical_source: "feed", entity: "events", grain: "year" }),
        rule({ id: "b", source: "feed_b", canonical_source: "feed", entity: "events", grain: "year" })
      ]
    });
    await writeRawPartition(bronze, "feed_a", V1, "2020", [{ id: 1 }]);
    await writeRawPartition(bronze, "feed_a", V1, "2021", [{ id: 2 }]);
    await writeRawPartition(bronze, "feed_b", V1, "2020", [{ id: 3 }]);

    const outcome = await service(config).discover(V1);
    expect(outcome.failures.map((f) => partitionKeyId(f.key))).toEqual(["feed/events/2020"]);
    expect(outcome.failures[0].error).toContain("raw sources feed_a and feed_b both map to this partition");
    expect(outcome.dirty.map((d) => partitionKeyId(d.key))).toEqual(["feed/events/2021"]);
    expect(await registry.lookup(partitionKey("feed", "events", "2020"), "bronze")).toBeNull();
  });

  it("folds rows outside every slice into each slice and reports them", async () => {
    const orphan = { sale_id: 13, region: "north", amount: 1, txn_date: null };
    await writeRawPartition(bronze, "sales_export", V1, "2021", [...monthlySales(2021), orphan]);
    await writeRawPartition(bronze, "sales_export", V2, "2021", [...monthlySales(2021), { ...orphan, amount: 500 }]);
    const discovery = service();

    const first = await discovery.discover(V1);
    expect(first.dirty).toHaveLength(12);
    expect(first.dirty[0].content_hash).toBe(
      combineHashes([
        { id: "slice", hash: hashRecords([monthlySales(2021)[0]]) },
        { id: "unassigned", hash: hashRecords([orphan]) }
      ])
    );
    expect(first.dirty[0].bronze_results.find((r) => r.check === "slice_unassigned")).toMatchObject({
      severity: "CRITICAL",
      passed: false,
      metric: 1,
      details: { rules: ["sales_monthly"] }
    });
    expect((await registry.lookup(partitionKey("sales", "sales", "2021-01"), "bronze"))?.record_count).toBe(1);

    const second = await discovery.discover(V2);
    expect(second.dirty).toHaveLength(12);
    expect(second.dirty.every((d) => d.status === "DIRTY")).toBe(true);
  });

  it("refuses a snapshot older than one already recorded", async () => {
    await writeRawPartition(bronze, "census", V1, "2020", censusRows(2020, 10));
    await writeRawPartition(bronze, "census", V2, "2020", censusRows(2020, 15));
    await writeRawPartition(bronze, "census", V2, "2021", censusRows(2021, 20));
    const discovery = service();
    await discovery.discover(V2);
    const before = await registry.listByLayer("bronze");

    await expect(discovery.discover(V1)).rejects.toThrow(
      'Snapshot version 2026-01-01 is older than 2026-02-01, already recorded in layer "bronze"'
    );
    expect(await registry.listByLayer("bronze")).toEqual(before);
  });

  it("refuses a snapshot version no source delivered", async () => {
    await writeRawPartition(bronze, "census", V1, "2020", censusRows(2020, 10));
    const discovery = service();
    await discovery.discover(V1);

    await expect(discovery.discover("2026-13-01")).rejects.toThrow(ConfigurationError);
    const entry = await registry.lookup(partitionKey("census", "population", "2020"), "bronze");
    expect(entry?.status).toBe("NEW");
    expect(await registry.listByStatus("bronze", "DELETED")).toEqual([]);
  });

  it("keeps the keys of a source that has not delivered the version yet", async () => {
    await writeRawPartition(bronze, "census", V1, "2020", censusRows(2020, 10));
    await writeRawPartition(bronze, "weather", V1, "2021-01", [{ day: "2021-01-01", temp: 1 }]);
    await writeRawPartition(bronze, "census", V2, "2020", censusRows(2020, 10));
    const discovery = service(testConfig(dir, { routes: [CENSUS_RULE, WEATHER_RULE] }));

    await discovery.discover(V1);
    const second = await discovery.discover(V2);

    expect(second.deleted).toEqual([]);
    expect(second.clean.map(partitionKeyId)).toEqual(["census/population/2020"]);
    expect((await registry.lookup(partitionKey("weather", "weather", "2021"), "bronze"))?.status).toBe("NEW");
  });

  it("verifies a sidecar that declares the hash of the file bytes", async () => {
    const rows = censusRows(2020, 10);
    const content = rows.map((row) => JSON.stringify(row)).join("\n") + "\n";
    await writeRawPartition(bronze, "census", V1, "2020", rows, { hash: sha256(content) });

    const [dirty] = (await service().discover(V1)).dirty;
    expect(dirty.integrity).toBe("verified");
    expect(dirty.content_hash).toBe(hashRecords(rows));
    expect(dirty.bronze_results.find((r) => r.check === "content_hash_matches_summary")?.passed).toBe(true);
  });

  it("lists the raw partitions and rules behind each dirty key", async () => {
    const january = [{ day: "2021-01-01", temp: 1 }];
    const february = [{ day: "2021-02-01", temp: 2 }];
    await writeRawPartition(bronze, "weather", V1, "2021-02", february);
    await writeRawPartition(bronze, "weather", V1, "2021-01", january);

    const [dirty] = (await service().discover(V1)).dirty;
    expect(dirty.contributions).toEqual([
      { raw_partition: "weather/2021-01", rule_id: "weather_yearly", content_hash: hashRecords(january) },
      { raw_partition: "weather/2021-02", rule_id: "weather_yearly", content_hash: hashRecords(february) }
    ]);
  });
});
