import { z } from "zod";
import { defineRule, describeParams, severityShape } from "./configuration.js";

export const noConsole = defineRule({
  description: {
    identifier: "no_console",
    name: "No Console",
    description: "Calls to console methods should not be left in production code.",
    kind: "lint",
    nonTriggeringExamples: [`logger.info("started");`],
    triggeringExamples: [`↓console.log("started");`, `function fail() {\n  ↓console.debug(state);\n}`],
  },
  capabilities: { optIn: true },
  params: z
    .object({
      ...severityShape,
      allow: z.array(z.string().min(1)).default([]),
    })
    .strict(),
  describe: (p) =>
    describeParams([
      ["severity", p.severity],
      ["allow", p.allow],
    ]),
});
