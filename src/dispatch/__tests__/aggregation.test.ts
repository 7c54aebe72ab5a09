import { describe, it, expect } from "vitest";
import { AggregationRegistry, consensus, defaultAggregator, mean, pluralityVote } from "../aggregation.js";

describe("mean", () => {
  it("averages numbers", () => {
    expect(mean([10, 20, 30])).toBe(20);
    expect(mean([1, 2])).toBe(1.5);
  });
});

describe("pluralityVote", () => {
  it("picks the most frequent value", () => {
    expect(pluralityVote(["rain", "sun", "rain"])).toBe("rain");
  });

  it("breaks ties by first appearance", () => {
    expect(pluralityVote(["sun", "rain"])).toBe("sun");
    expect(pluralityVote(["rain", "sun", "sun", "rain"])).toBe("rain");
  });

  it("compares structured values by content", () => {
    expect(pluralityVote([{ k: 1 }, { k: 2 }, { k: 2 }])).toEqual({ k: 2 });
  });

  it("does not confuse a string with the number it spells", () => {
    expect(pluralityVote([1, "1", "1"])).toBe("1");
  });

  it("returns undefined for no values", () => {
    expect(pluralityVote([])).toBeUndefined();
  });
});

describe("consensus", () => {
  it("averages numeric keys and votes on the rest", () => {
    const merged = consensus([
      { temperature: 10, condition: "rain" },
      { temperature: 20, condition: "rain" },
      { temperature: 30, condition: "sun" },
    ]);
    expect(merged).toEqual({ temperature: 20, condition: "rain" });
  });

  it("only counts the results that carry a key", () => {
    expect(consensus([{ a: 1 }, { a: 3, b: "x" }])).toEqual({ a: 2, b: "x" });
  });

  it("votes when a key mixes numbers and other values", () => {
    expect(consensus([{ v: 1 }, { v: "high" }, { v: "high" }])).toEqual({ v: "high" });
  });

  it("keeps a __proto__ key from parsed results as plain data", () => {
    const fromWire = (json: string): Record<string, unknown> => JSON.parse(json);
    const merged = consensus([fromWire('{"__proto__": 1, "a": 2}'), fromWire('{"__proto__": 3, "a": 4}')]);

    expect(Object.getPrototypeOf(merged)).toBe(Object.prototype);
    expect(Object.keys(merged)).toEqual(["__proto__", "a"]);
    expect(Object.getOwnPropertyDescriptor(merged, "__proto__")?.value).toBe(2);
    expect(merged.a).toBe(3);
  });
});

describe("defaultAggregator", () => {
  it("concatenates array results in order", () => {
    expect(defaultAggregator([[1, 2], [3], []], "split")).toEqual([1, 2, 3]);
  });

  it("merges object results by consensus", () => {
    expect(defaultAggregator([{ n: 2 }, { n: 4 }], "replica")).toEqual({ n: 3 });
  });

  it("returns the raw list for scalars and mixed shapes", () => {
    expect(defaultAggregator([1, "a"], "x")).toEqual([1, "a"]);
    expect(defaultAggregator([[1], { a: 1 }], "x")).toEqual([[1], { a: 1 }]);
    expect(defaultAggregator([], "x")).toEqual([]);
  });
});

describe("AggregationRegistry", () => {
  it("uses a registered aggregator for its task type only", () => {
    const registry = new AggregationRegistry().register("sum", (results) =>
      results.reduce((total: number, r) => total + (typeof r === "number" ? r : 0), 0),
    );

    expect(registry.has("sum")).toBe(true);
    expect(registry.has("other")).toBe(false);
    expect(registry.aggregate("sum", [1, 2, 3])).toBe(6);
    expect(registry.aggregate("other", [[1], [2]])).toEqual([1, 2]);
  });
});
