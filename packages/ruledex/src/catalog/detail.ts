import type { RuleDescription } from "../engine/types.js";

export const EXAMPLES_HEADER = "Triggering Examples (violation is marked with '↓'):";

export function consoleDescription(desc: RuleDescription): string {
  return `${desc.name} (${desc.identifier}): ${desc.description}`;
}

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => `    ${line}`)
    .join("\n");
}

export function formatRuleDetail(desc: RuleDescription): string {
  const lines = [consoleDescription(desc)];

  if (desc.triggeringExamples.length > 0) {
    lines.push("", EXAMPLES_HEADER);
    desc.triggeringExamples.forEach((example, index) => {
      lines.push("", `Example #${index + 1}`, "", indent(example));
    });
  }

  return lines.join("\n");
}

export function formatRuleDetailJson(desc: RuleDescription): string {
  return JSON.stringify(desc, null, 2);
}
