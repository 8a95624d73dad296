import { z } from "zod";
import { defineRule, severityShape } from "./configuration.js";

export const noNonNullAssertion = defineRule({
  description: {
    identifier: "no_non_null_assertion",
    name: "No Non-Null Assertion",
    description: "Non-null assertions should be avoided; narrow the value instead.",
    kind: "idiomatic",
    nonTriggeringExamples: [`if (user) greet(user.name);`, `const name = user?.name ?? "anonymous";`],
    triggeringExamples: [`greet(user↓!.name);`, `const el = document.getElementById("root")↓!;`],
  },
  capabilities: { optIn: true },
  params: z.object(severityShape).strict(),
  describe: (p) => p.severity,
});
