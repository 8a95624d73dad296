import { z } from "zod";
import type { CustomRuleConfiguration, RuleDefinition } from "../engine/types.js";
import { capabilitiesOf, describeRule, parseRuleParams, SeveritySchema } from "./configuration.js";

export const CUSTOM_RULES_ID = "custom_rules";

function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const CustomRuleSchema = z
  .object({
    name: z.string().min(1).optional(),
    regex: z.string().min(1).refine(isValidRegex, { message: "Invalid regular expression" }),
    message: z.string().optional(),
    severity: SeveritySchema.default("warning"),
  })
  .strict();

// Keys become table rows, so they must stay on one line.
const CustomRuleIdentifierSchema = z
  .string()
  .min(1)
  .regex(/^[^\s\p{Cc}]+$/u, { message: "Custom rule identifiers must not contain whitespace or control characters" });

const CustomRulesSchema = z.record(CustomRuleIdentifierSchema, CustomRuleSchema);

const description = describeRule({
  identifier: CUSTOM_RULES_ID,
  name: "Custom Rules",
  description: "Create custom rules by providing a regex string. Optionally specify a name, message and severity.",
  kind: "style",
  triggeringExamples: [],
});

export const customRules: RuleDefinition = {
  description,
  capabilities: capabilitiesOf(),
  create(params?: unknown) {
    const parsed = parseRuleParams(CustomRulesSchema, CUSTOM_RULES_ID, params);
    const children = Object.entries(parsed).map(
      ([identifier, rule]): CustomRuleConfiguration => ({
        identifier,
        regex: rule.regex,
        severity: rule.severity,
        configurationDescription: `${rule.severity}: ${rule.regex}`,
      }),
    );

    return {
      variant: "composite",
      identifier: CUSTOM_RULES_ID,
      configurationDescription: "user-defined",
      children,
    };
  },
};
