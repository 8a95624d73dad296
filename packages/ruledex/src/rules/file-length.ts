import { z } from "zod";
import { defineRule, describeLevels, describeParams, levelsShape } from "./configuration.js";

export const fileLength = defineRule({
  description: {
    identifier: "file_length",
    name: "File Length",
    description: "Files should not span too many lines.",
    kind: "metrics",
    nonTriggeringExamples: ["export const answer = 42;\n".repeat(3)],
    triggeringExamples: ["export const answer = 42;\n".repeat(400) + "↓export const last = 0;\n"],
  },
  params: z
    .object({
      ...levelsShape({ warning: 400, error: 1000 }),
      ignoreCommentOnlyLines: z.boolean().default(false),
    })
    .strict(),
  describe: (p) => `${describeLevels(p)}, ${describeParams([["ignoreCommentOnlyLines", p.ignoreCommentOnlyLines]])}`,
});
