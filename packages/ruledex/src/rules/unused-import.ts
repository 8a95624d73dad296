import { z } from "zod";
import { defineRule, severityShape } from "./configuration.js";

export const unusedImport = defineRule({
  description: {
    identifier: "unused_import",
    name: "Unused Import",
    description: "All imported bindings should be referenced in the file. Requires type information.",
    kind: "lint",
    nonTriggeringExamples: [`import { join } from "node:path";\njoin("a", "b");`],
    triggeringExamples: [`↓import { join } from "node:path";\nconsole.log("unused");`],
    deprecatedAliases: ["unused_imports"],
  },
  capabilities: { optIn: true, correctable: true, analyzer: true },
  params: z.object(severityShape).strict(),
  describe: (p) => p.severity,
});
