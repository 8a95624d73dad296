import { z } from "zod";
import { defineRule, severityShape } from "./configuration.js";

export const preferConst = defineRule({
  description: {
    identifier: "prefer_const",
    name: "Prefer Const",
    description: "Bindings that are never reassigned should be declared with const.",
    kind: "idiomatic",
    nonTriggeringExamples: [`const total = items.length;`, `let i = 0;\ni += 1;`],
    triggeringExamples: [`↓let total = items.length;\nreport(total);`],
  },
  capabilities: { correctable: true },
  params: z.object(severityShape).strict(),
  describe: (p) => p.severity,
});
