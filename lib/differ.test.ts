import { describe, it, expect } from "vitest";
import { diffMappings, sameMapping } from "./differ.js";

describe("diffMappings", () => {
  it("should split keys into add, delete, change and identical", () => {
    const diff = diffMappings(
      { "a.keep": "1", "a.drop": "2", "a.bump": "3" },
      { "a.keep": "1", "a.bump": "4", "a.new": "5" }
    );

    expect(diff).toEqual({
      add: { "a.new": "5" },
      delete: { "a.drop": "2" },
      change: { "a.bump": { current: "3", desired: "4" } },
      identical: { "a.keep": "1" },
    });
  });

  it("should order keys within each group", () => {
    const diff = diffMappings<string>({}, { b: "2", a: "1", c: "3" });
    expect(Object.keys(diff.add)).toEqual(["a", "b", "c"]);
  });

  it("should not treat prototype properties as present", () => {
    expect(diffMappings<string>({}, { toString: "x" }).add).toEqual({ toString: "x" });
  });

  it("should use the provided equality", () => {
    const diff = diffMappings({ a: "X" }, { a: "x" }, (left, right) => left.toLowerCase() === right.toLowerCase());
    expect(diff.change).toEqual({});
    expect(diff.identical).toEqual({ a: "x" });
  });
});

describe("sameMapping", () => {
  it("should compare keys and values", () => {
    expect(sameMapping({ a: "1", b: "2" }, { b: "2", a: "1" })).toBe(true);
    expect(sameMapping({ a: "1" }, { a: "2" })).toBe(false);
    expect(sameMapping({ a: "1" }, { a: "1", b: "2" })).toBe(false);
    expect(sameMapping({}, {})).toBe(true);
  });
});
