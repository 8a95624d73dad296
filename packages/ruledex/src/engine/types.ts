export type RuleKind = "lint" | "idiomatic" | "style" | "metrics" | "performance";

export type Severity = "warning" | "error";

export interface RuleDescription {
  identifier: string;
  name: string;
  description: string;
  kind: RuleKind;
  /** Code that violates the rule. `↓` marks where the violation is reported. */
  triggeringExamples: string[];
  nonTriggeringExamples: string[];
  /** Former identifiers still accepted in lookups and configuration lists. */
  deprecatedAliases: string[];
}

export interface RuleCapabilities {
  optIn: boolean;
  correctable: boolean;
  analyzer: boolean;
}

export interface CustomRuleConfiguration {
  identifier: string;
  regex: string;
  severity: Severity;
  configurationDescription: string;
}

export interface SimpleRuleInstance {
  variant: "simple";
  identifier: string;
  configurationDescription: string;
}

export interface CompositeRuleInstance {
  variant: "composite";
  identifier: string;
  configurationDescription: string;
  children: CustomRuleConfiguration[];
}

export type RuleInstance = SimpleRuleInstance | CompositeRuleInstance;

export interface RuleDefinition {
  description: RuleDescription;
  capabilities: RuleCapabilities;
  /**
   * Builds an instance of the rule. Without parameters this is the default
   * instance; otherwise `params` is the rule's entry from the `rules` section
   * of the configuration file.
   */
  create(params?: unknown): RuleInstance;
}

export interface RuledexConfig {
  onlyRules?: string[];
  disabledRules: string[];
  optInRules: string[];
  analyzerRules: string[];
  rules: Record<string, unknown>;
}

export interface ResolvedConfiguration {
  rules: RuleInstance[];
  warnings: string[];
  find(identifier: string): RuleInstance | undefined;
}

export interface PresentableRow {
  identifier: string;
  optIn: boolean;
  correctable: boolean;
  configured: boolean;
  kind: RuleKind;
  analyzer: boolean;
  configuration: string;
}

export type FilterMode = "all" | "enabled" | "disabled";

export type OutputFormat = "table" | "json";
