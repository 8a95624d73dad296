import { describe, it, expect } from "vitest";
import { TextTable } from "./text-table.js";

describe("TextTable", () => {
  it("sizes each column to its widest cell", () => {
    const table = new TextTable(["a", "bb"]);
    table.addRow(["xyz", "1"]);
    expect(table.render().split("\n")).toEqual([
      "+-----+----+",
      "| a   | bb |",
      "+-----+----+",
      "| xyz | 1  |",
      "+-----+----+",
    ]);
  });

  it("renders only the header when there are no rows", () => {
    const table = new TextTable(["a", "bb"]);
    expect(table.render()).toBe("+---+----+\n| a | bb |\n+---+----+");
  });

  it("measures width in code points", () => {
    const table = new TextTable(["id"]);
    table.addRow(["↓↓↓"]);
    expect(table.render().split("\n")[3]).toBe("| ↓↓↓ |");
  });

  it("pads cells with combining marks by grapheme", () => {
    const table = new TextTable(["id"]);
    table.addRow(["e\u0301e\u0301"]);
    expect(table.render().split("\n")).toEqual([
      "+----+",
      "| id |",
      "+----+",
      "| e\u0301e\u0301 |",
      "+----+",
    ]);
  });

  it("rejects rows with the wrong number of cells", () => {
    const table = new TextTable(["a", "bb"]);
    expect(() => table.addRow(["only"])).toThrow("Expected 2 cells, got 1");
  });
});
