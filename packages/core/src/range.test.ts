import { describe, it, expect } from "vitest";
import { compareKeys } from "./compare.js";
import {
  equalBounds,
  inRange,
  isEmptyRange,
  lowerBound,
  rangeBounds,
  upperBound,
} from "./range.js";

const identity = (n: number) => n;
const sorted = [1, 2, 2, 2, 5, 8];

describe("lowerBound / upperBound", () => {
  it("should find the first position not below the key", () => {
    expect(lowerBound(sorted, 2, identity, compareKeys)).toBe(1);
    expect(lowerBound(sorted, 3, identity, compareKeys)).toBe(4);
    expect(lowerBound(sorted, 0, identity, compareKeys)).toBe(0);
    expect(lowerBound(sorted, 9, identity, compareKeys)).toBe(6);
  });

  it("should find the first position above the key", () => {
    expect(upperBound(sorted, 2, identity, compareKeys)).toBe(4);
    expect(upperBound(sorted, 8, identity, compareKeys)).toBe(6);
    expect(upperBound(sorted, 0, identity, compareKeys)).toBe(0);
  });

  it("should handle empty arrays", () => {
    expect(lowerBound([], 1, identity, compareKeys)).toBe(0);
    expect(upperBound([], 1, identity, compareKeys)).toBe(0);
  });

  it("should project keys from entries", () => {
    const entries = [{ key: "a" }, { key: "c" }, { key: "e" }];
    expect(lowerBound(entries, "d", (e) => e.key, compareKeys)).toBe(2);
  });
});

describe("equalBounds", () => {
  it("should cover every equal key", () => {
    expect(equalBounds(sorted, 2, identity, compareKeys)).toEqual([1, 4]);
  });

  it("should be empty for a missing key", () => {
    expect(equalBounds(sorted, 4, identity, compareKeys)).toEqual([4, 4]);
  });
});

describe("rangeBounds", () => {
  it("should exclude the end under the exclusive policy", () => {
    expect(rangeBounds(sorted, 2, 5, "exclusive", identity, compareKeys)).toEqual([1, 4]);
  });

  it("should include the end under the inclusive policy", () => {
    expect(rangeBounds(sorted, 2, 5, "inclusive", identity, compareKeys)).toEqual([1, 5]);
  });

  it("should be empty when start is greater than end", () => {
    expect(rangeBounds(sorted, 5, 2, "inclusive", identity, compareKeys)).toEqual([0, 0]);
    expect(rangeBounds(sorted, 5, 2, "exclusive", identity, compareKeys)).toEqual([0, 0]);
  });

  it("should treat start equal to end by policy", () => {
    expect(rangeBounds(sorted, 2, 2, "exclusive", identity, compareKeys)).toEqual([0, 0]);
    expect(rangeBounds(sorted, 2, 2, "inclusive", identity, compareKeys)).toEqual([1, 4]);
  });
});

describe("isEmptyRange / inRange", () => {
  it("should report empty ranges", () => {
    expect(isEmptyRange(compareKeys, 3, 1, "inclusive")).toBe(true);
    expect(isEmptyRange(compareKeys, 3, 3, "exclusive")).toBe(true);
    expect(isEmptyRange(compareKeys, 3, 3, "inclusive")).toBe(false);
    expect(isEmptyRange(compareKeys, 1, 3, "exclusive")).toBe(false);
  });

  it("should always include the start", () => {
    expect(inRange(compareKeys, 1, 1, 10, "exclusive")).toBe(true);
    expect(inRange(compareKeys, 0, 1, 10, "inclusive")).toBe(false);
  });

  it("should apply the end policy", () => {
    expect(inRange(compareKeys, 10, 1, 10, "exclusive")).toBe(false);
    expect(inRange(compareKeys, 10, 1, 10, "inclusive")).toBe(true);
  });
});
