import { describe, it, expect } from "vitest";
import { isTable, rowsOf } from "./table.js";
import type { Table } from "./types.js";

describe("rowsOf", () => {
  it("should read records from a table", () => {
    const table: Table<number> = { records: () => [3, 1, 2] };
    expect(isTable(table)).toBe(true);
    expect(Array.from(rowsOf(table))).toEqual([3, 1, 2]);
  });

  it("should pass iterables through", () => {
    const rows = new Set(["a", "b"]);
    expect(isTable(rows)).toBe(false);
    expect(Array.from(rowsOf(rows))).toEqual(["a", "b"]);
  });

  it("should accept generators", () => {
    function* numbers() {
      yield 1;
      yield 2;
    }
    expect(Array.from(rowsOf(numbers()))).toEqual([1, 2]);
  });
});
