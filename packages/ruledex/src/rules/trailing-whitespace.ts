import { z } from "zod";
import { defineRule, describeParams, severityShape } from "./configuration.js";

export const trailingWhitespace = defineRule({
  description: {
    identifier: "trailing_whitespace",
    name: "Trailing Whitespace",
    description: "Lines should not have trailing whitespace.",
    kind: "style",
    nonTriggeringExamples: ["let a = 1;\n", "// comment\n"],
    triggeringExamples: ["let a = 1;↓ \n", "let b = 2;↓\t\n"],
  },
  capabilities: { correctable: true },
  params: z
    .object({
      ...severityShape,
      ignoresEmptyLines: z.boolean().default(false),
      ignoresComments: z.boolean().default(true),
    })
    .strict(),
  describe: (p) =>
    describeParams([
      ["severity", p.severity],
      ["ignoresEmptyLines", p.ignoresEmptyLines],
      ["ignoresComments", p.ignoresComments],
    ]),
});
