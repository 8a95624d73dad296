import { describe, it, expect } from "vitest";
import { graphemeLength, graphemes } from "./graphemes.js";

describe("graphemes", () => {
  it("keeps combining marks and flag pairs together", () => {
    expect(graphemes("e\u0301\u{1F1EB}\u{1F1F7}a")).toEqual(["e\u0301", "\u{1F1EB}\u{1F1F7}", "a"]);
  });

  it("counts user-perceived characters", () => {
    expect(graphemeLength("e\u0301e\u0301")).toBe(2);
    expect(graphemeLength("")).toBe(0);
  });
});
