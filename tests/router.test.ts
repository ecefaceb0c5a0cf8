import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors";
import { expandCoverage, grainOfPartition, parseCoverage, partitionOfValue } from "../src/routing/coverage";
import { Router, applyFieldMapping } from "../src/routing/router";
import { partitionKeyId } from "../src/types/partitionKey";
import { CENSUS_RULE, SALES_RULE, WEATHER_RULE, rule } from "./helpers/fixtures";

const MONTHS_2021 = [
  "2021-01",
  "2021-02",
  "2021-03",
  "2021-04",
  "2021-05",
  "2021-06",
  "2021-07",
  "2021-08",
  "2021-09",
  "2021-10",
  "2021-11",
  "2021-12"
];

describe("coverage", () => {
  it("parses the four coverage forms and part suffixes", () => {
    expect(parseCoverage("2020")).toEqual({ grain: "year", start: "2020", end: "2020" });
    expect(parseCoverage("2019-2021")).toEqual({ grain: "year", start: "2019", end: "2021" });
    expect(parseCoverage("2021-03")).toEqual({ grain: "month", start: "2021-03", end: "2021-03" });
    expect(parseCoverage("2021-11-2022-02")).toEqual({ grain: "month", start: "2021-11", end: "2022-02" });
    expect(parseCoverage("2020-part-001")).toEqual({ grain: "year", start: "2020", end: "2020" });
  });

  it("rejects unknown and inverted coverage", () => {
    expect(parseCoverage("latest")).toBeNull();
    expect(parseCoverage("2021-13")).toBeNull();
    expect(parseCoverage("2022-2020")).toBeNull();
    expect(parseCoverage("2022-03-2022-01")).toBeNull();
  });

  it("expands across grains", () => {
    expect(expandCoverage({ grain: "year", start: "2021", end: "2021" }, "month")).toEqual(MONTHS_2021);
    expect(expandCoverage({ grain: "month", start: "2021-11", end: "2022-02" }, "month")).toEqual([
      "2021-11",
      "2021-12",
      "2022-01",
      "2022-02"
    ]);
    expect(expandCoverage({ grain: "month", start: "2021-11", end: "2022-02" }, "year")).toEqual(["2021", "2022"]);
  });

  it("maps row values and partition ids to grains", () => {
    expect(partitionOfValue("2021-03-14", "month")).toBe("2021-03");
    expect(partitionOfValue("2021-03-14", "year")).toBe("2021");
    expect(partitionOfValue(2021, "year")).toBe("2021");
    expect(partitionOfValue("n/a", "month")).toBeNull();
    expect(partitionOfValue(null, "year")).toBeNull();
    expect(grainOfPartition("2021")).toBe("year");
    expect(grainOfPartition("2021-03")).toBe("month");
    expect(grainOfPartition("current")).toBeNull();
  });
});

describe("Router", () => {
  const router = new Router([CENSUS_RULE, SALES_RULE, WEATHER_RULE]);

  it("routes a matching grain exactly", () => {
    const routed = router.resolve("census", "2020");
    expect(routed).toHaveLength(1);
    expect(routed[0].mode).toBe("exact");
    expect(partitionKeyId(routed[0].key)).toBe("census/population/2020");
  });

  it("expands a year range onto yearly keys", () => {
    const routed = router.resolve("census", "2019-2021-part-000");
    expect(routed.map((r) => r.key.partition)).toEqual(["2019", "2020", "2021"]);
    expect(routed.every((r) => r.mode === "expand")).toBe(true);
  });

  it("fans a yearly partition out to twelve monthly keys under the canonical source", () => {
    const routed = router.resolve("sales_export", "2021");
    expect(routed.map((r) => r.key.partition)).toEqual(MONTHS_2021);
    expect(routed.every((r) => r.key.source === "sales" && r.key.entity === "sales")).toBe(true);
    expect(routed[0].sliceField).toBe("sold_at");
    expect(routed[0].fieldMapping).toEqual({ txn_date: "sold_at" });
  });

  it("collapses monthly partitions into their year", () => {
    const routed = router.resolve("weather", "2021-02");
    expect(routed).toHaveLength(1);
    expect(routed[0].mode).toBe("collapse");
    expect(partitionKeyId(routed[0].key)).toBe("weather/weather/2021");
    expect(router.resolveKeys("weather", "2021-11-2022-02").map(partitionKeyId)).toEqual([
      "weather/weather/2021",
      "weather/weather/2022"
    ]);
  });

  it("is deterministic", () => {
    expect(router.resolveKeys("sales_export", "2021")).toEqual(router.resolveKeys("sales_export", "2021"));
  });

  it("matches wildcard sources", () => {
    const wildcard = new Router([rule({ id: "feeds", source: "feed_*", entity: "events", grain: "year" })]);
    expect(wildcard.resolveKeys("feed_eu", "2020").map(partitionKeyId)).toEqual(["feed_eu/events/2020"]);
    expect(() => wildcard.resolve("feedx", "2020")).toThrow(ConfigurationError);
  });

  it("treats unmatched sources and unknown coverage as configuration errors", () => {
    expect(() => router.resolve("mystery", "2020")).toThrow(ConfigurationError);
    expect(() => router.resolve("census", "latest")).toThrow(ConfigurationError);
  });

  it("ignores disabled rules", () => {
    const disabled = new Router([{ ...CENSUS_RULE, enabled: false }, WEATHER_RULE]);
    expect(() => disabled.resolve("census", "2020")).toThrow(ConfigurationError);
  });

  it("rejects empty and duplicate rule sets", () => {
    expect(() => new Router([])).toThrow(ConfigurationError);
    expect(() => new Router([CENSUS_RULE, { ...WEATHER_RULE, id: CENSUS_RULE.id }])).toThrow(ConfigurationError);
  });

  it("renames mapped fields and keeps the rest", () => {
    expect(applyFieldMapping({ txn_date: "2021-01-15", amount: 5 }, { txn_date: "sold_at" })).toEqual({
      sold_at: "2021-01-15",
      amount: 5
    });
  });
});
