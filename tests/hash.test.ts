import { describe, expect, it } from "vitest";
import { canonicalJson, combineHashes, hashRecords, sha256, sliceHash } from "../src/utils/hash";

describe("content hasher", () => {
  it("produces hex sha256 digests", () => {
    expect(sha256("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("sorts object keys at every depth", () => {
    expect(canonicalJson({ b: 1, a: { d: 2, c: [{ y: 1, x: 2 }] } })).toBe('{"a":{"c":[{"x":2,"y":1}],"d":2},"b":1}');
    expect(canonicalJson({ a: undefined, b: null })).toBe('{"b":null}');
  });

  it("ignores row order and key order", () => {
    const rows = [
      { id: 1, name: "a" },
      { id: 2, name: "b" }
    ];
    const shuffled = [
      { name: "b", id: 2 },
      { name: "a", id: 1 }
    ];
    expect(hashRecords(shuffled)).toBe(hashRecords(rows));
  });

  it("changes when a value, a row or a duplicate changes", () => {
    const base = hashRecords([{ id: 1 }, { id: 2 }]);
    expect(hashRecords([{ id: 1 }, { id: 3 }])).not.toBe(base);
    expect(hashRecords([{ id: 1 }])).not.toBe(base);
    expect(hashRecords([{ id: 1 }, { id: 2 }, { id: 2 }])).not.toBe(base);
    expect(hashRecords([{ id: 1 }, { id: "2" }])).not.toBe(base);
  });

  it("combines contributions independently of their order", () => {
    const a = { id: "weather/2021-01", hash: sha256("a") };
    const b = { id: "weather/2021-02", hash: sha256("b") };
    expect(combineHashes([a, b])).toBe(combineHashes([b, a]));
    expect(combineHashes([a, b])).not.toBe(combineHashes([a, { ...b, hash: sha256("c") }]));
  });

  it("scopes a parent hash to a slice", () => {
    const parent = sha256("parent");
    expect(sliceHash(parent, "2021-01")).not.toBe(sliceHash(parent, "2021-02"));
    expect(sliceHash(parent, "2021-01")).toBe(sha256(`${parent}|2021-01`));
  });
});
