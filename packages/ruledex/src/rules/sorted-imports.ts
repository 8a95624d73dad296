import { z } from "zod";
import { defineRule, severityShape } from "./configuration.js";

export const sortedImports = defineRule({
  description: {
    identifier: "sorted_imports",
    name: "Sorted Imports",
    description: "Imports should be sorted by module specifier.",
    kind: "style",
    nonTriggeringExamples: [`import a from "alpha";\nimport b from "beta";`],
    triggeringExamples: [`import b from "beta";\n↓import a from "alpha";`],
  },
  capabilities: { optIn: true, correctable: true },
  params: z.object(severityShape).strict(),
  describe: (p) => p.severity,
});
