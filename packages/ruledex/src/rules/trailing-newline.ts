import { z } from "zod";
import { defineRule, severityShape } from "./configuration.js";

export const trailingNewline = defineRule({
  description: {
    identifier: "trailing_newline",
    name: "Trailing Newline",
    description: "Files should have a single trailing newline.",
    kind: "style",
    nonTriggeringExamples: ["let a = 0;\n"],
    triggeringExamples: ["let a = 0;↓", "let a = 0;\n↓\n"],
  },
  capabilities: { correctable: true },
  params: z.object(severityShape).strict(),
  describe: (p) => p.severity,
});
