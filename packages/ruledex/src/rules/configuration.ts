import { z } from "zod";
import { ConfigError } from "../engine/errors.js";
import { formatIssues } from "../engine/config.js";
import type { RuleCapabilities, RuleDefinition, RuleDescription } from "../engine/types.js";

export const SeveritySchema = z.enum(["warning", "error"]);

const PositiveInt = z.number().int().positive();

export const severityShape = {
  severity: SeveritySchema.default("warning"),
};

export interface Levels {
  warning: number;
  error: number;
}

export function levelsShape(defaults: Levels) {
  return {
    warning: PositiveInt.default(defaults.warning),
    error: PositiveInt.default(defaults.error),
  };
}

type ParamValue = string | number | boolean | string[];

function formatValue(value: ParamValue): string {
  return Array.isArray(value) ? `[${value.join(", ")}]` : String(value);
}

/** Renders `key: value` pairs the way they appear in the catalog. */
export function describeParams(pairs: Array<[string, ParamValue]>): string {
  return pairs.map(([key, value]) => `${key}: ${formatValue(value)}`).join(", ");
}

export function describeLevels(levels: Levels): string {
  return describeParams([
    ["warning", levels.warning],
    ["error", levels.error],
  ]);
}

export function parseRuleParams<S extends z.ZodTypeAny>(
  schema: S,
  identifier: string,
  params: unknown,
): z.output<S> {
  const result = schema.safeParse(params ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration for rule ${identifier}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export type RuleDescriptionInput = Omit<RuleDescription, "nonTriggeringExamples" | "deprecatedAliases"> &
  Partial<Pick<RuleDescription, "nonTriggeringExamples" | "deprecatedAliases">>;

export function describeRule(input: RuleDescriptionInput): RuleDescription {
  return {
    nonTriggeringExamples: [],
    deprecatedAliases: [],
    ...input,
  };
}

export function capabilitiesOf(input: Partial<RuleCapabilities> = {}): RuleCapabilities {
  return {
    optIn: input.optIn ?? false,
    correctable: input.correctable ?? false,
    analyzer: input.analyzer ?? false,
  };
}

interface SimpleRuleSpec<S extends z.ZodTypeAny> {
  description: RuleDescriptionInput;
  capabilities?: Partial<RuleCapabilities>;
  params: S;
  describe(params: z.output<S>): string;
}

export function defineRule<S extends z.ZodTypeAny>(spec: SimpleRuleSpec<S>): RuleDefinition {
  const description = describeRule(spec.description);

  return {
    description,
    capabilities: capabilitiesOf(spec.capabilities),
    create(params?: unknown) {
      return {
        variant: "simple",
        identifier: description.identifier,
        configurationDescription: spec.describe(parseRuleParams(spec.params, description.identifier, params)),
      };
    },
  };
}
