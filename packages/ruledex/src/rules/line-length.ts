import { z } from "zod";
import { defineRule, describeLevels, describeParams, levelsShape } from "./configuration.js";

const DEFAULTS = { warning: 120, error: 200 };

export const lineLength = defineRule({
  description: {
    identifier: "line_length",
    name: "Line Length",
    description: "Lines should not span too many characters.",
    kind: "metrics",
    nonTriggeringExamples: [
      `const greeting = "hello";`,
      `// ${"https://example.com/".repeat(8)}`,
    ],
    triggeringExamples: [
      `↓const label = "${"x".repeat(120)}";`,
      `↓// ${"a".repeat(130)}`,
    ],
  },
  params: z
    .object({
      ...levelsShape(DEFAULTS),
      ignoresUrls: z.boolean().default(false),
      ignoresComments: z.boolean().default(false),
    })
    .strict(),
  describe: (p) =>
    [
      describeLevels(p),
      describeParams([
        ["ignoresUrls", p.ignoresUrls],
        ["ignoresComments", p.ignoresComments],
      ]),
    ].join(", "),
});
