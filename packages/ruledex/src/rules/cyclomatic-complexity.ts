import { z } from "zod";
import { defineRule, describeLevels, describeParams, levelsShape } from "./configuration.js";

function branches(count: number): string {
  return Array.from({ length: count }, (_, i) => `  if (n === ${i}) return ${i};`).join("\n");
}

export const cyclomaticComplexity = defineRule({
  description: {
    identifier: "cyclomatic_complexity",
    name: "Cyclomatic Complexity",
    description: "The complexity of function bodies should be limited.",
    kind: "metrics",
    nonTriggeringExamples: [`function pick(n: number): number {\n${branches(3)}\n  return -1;\n}`],
    triggeringExamples: [`↓function pick(n: number): number {\n${branches(11)}\n  return -1;\n}`],
  },
  params: z
    .object({
      ...levelsShape({ warning: 10, error: 20 }),
      ignoresCaseStatements: z.boolean().default(false),
    })
    .strict(),
  describe: (p) => `${describeLevels(p)}, ${describeParams([["ignoresCaseStatements", p.ignoresCaseStatements]])}`,
});
