import { z } from "zod";
import { defineRule, severityShape } from "./configuration.js";

export const noSpreadInReduce = defineRule({
  description: {
    identifier: "no_spread_in_reduce",
    name: "No Spread In Reduce",
    description: "Spreading the accumulator in reduce copies it on every iteration.",
    kind: "performance",
    nonTriggeringExamples: [`const byId = new Map(items.map((item) => [item.id, item]));`],
    triggeringExamples: [`const byId = items.reduce((acc, item) => (↓{ ...acc, [item.id]: item }), {});`],
  },
  capabilities: { optIn: true },
  params: z.object(severityShape).strict(),
  describe: (p) => p.severity,
});
