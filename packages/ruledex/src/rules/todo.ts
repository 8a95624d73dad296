import { z } from "zod";
import { defineRule, severityShape } from "./configuration.js";

export const todo = defineRule({
  description: {
    identifier: "todo",
    name: "Todo",
    description: "TODOs and FIXMEs should be resolved.",
    kind: "lint",
    nonTriggeringExamples: ["// notaTODO:", "// notaFIXME:"],
    triggeringExamples: ["// ↓TODO: handle retries", "// ↓FIXME: off by one", "/* ↓TODO(owner): remove */"],
  },
  params: z.object(severityShape).strict(),
  describe: (p) => p.severity,
});
