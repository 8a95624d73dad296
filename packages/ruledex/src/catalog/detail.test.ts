import { describe, it, expect } from "vitest";
import { consoleDescription, formatRuleDetail, formatRuleDetailJson } from "./detail.js";
import type { RuleDescription } from "../engine/types.js";

function makeDescription(overrides: Partial<RuleDescription> = {}): RuleDescription {
  return {
    identifier: "demo",
    name: "Demo",
    description: "Does things.",
    kind: "lint",
    triggeringExamples: [],
    nonTriggeringExamples: [],
    deprecatedAliases: [],
    ...overrides,
  };
}

describe("consoleDescription", () => {
  it("combines name, identifier and description", () => {
    expect(consoleDescription(makeDescription())).toBe("Demo (demo): Does things.");
  });
});

describe("formatRuleDetail", () => {
  it("prints only the description when there are no examples", () => {
    expect(formatRuleDetail(makeDescription())).toBe("Demo (demo): Does things.");
  });

  it("numbers each example and indents every line", () => {
    const output = formatRuleDetail(makeDescription({ triggeringExamples: ["a\nb", "c"] }));
    expect(output.split("\n")).toEqual([
      "Demo (demo): Does things.",
      "",
      "Triggering Examples (violation is marked with '↓'):",
      "",
      "Example #1",
      "",
      "    a",
      "    b",
      "",
      "Example #2",
      "",
      "    c",
    ]);
  });

  it("keeps long example lines intact", () => {
    const line = "↓" + "y".repeat(300);
    expect(formatRuleDetail(makeDescription({ triggeringExamples: [line] })).endsWith(`    ${line}`)).toBe(true);
  });
});

describe("formatRuleDetailJson", () => {
  it("serializes the whole description", () => {
    const desc = makeDescription({ deprecatedAliases: ["old_demo"] });
    expect(JSON.parse(formatRuleDetailJson(desc))).toEqual(desc);
  });
});
