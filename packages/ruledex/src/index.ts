// Public API for programmatic usage
export { queryRules, defaultRulesContext } from "./engine/run.js";
export { resolveConfiguration } from "./engine/resolve.js";
export { loadConfig, loadConfigIfExists, findConfigFile, parseConfig, DEFAULT_CONFIG } from "./engine/config.js";
export { currentTerminalWidth } from "./engine/terminal.js";
export { UsageError, ConfigError } from "./engine/errors.js";
export { RULEDEX_VERSION } from "./engine/version.js";
export { RULE_REGISTRY, RuleRegistry, CUSTOM_RULES_ID } from "./rules/index.js";
export { defineRule } from "./rules/configuration.js";
export { filterRules } from "./catalog/filter.js";
export { expandRule, buildRows } from "./catalog/rows.js";
export { truncateDescription, DEFAULT_LAYOUT } from "./catalog/truncate.js";
export { formatTable, formatJson, sortRows, TABLE_COLUMNS } from "./catalog/report.js";
export { formatRuleDetail } from "./catalog/detail.js";
export { TextTable } from "./catalog/text-table.js";

// Types
export type { RulesQuery, RulesContext, RulesOutcome } from "./engine/run.js";
export type {
  RuleDefinition,
  RuleDescription,
  RuleCapabilities,
  RuleInstance,
  RuleKind,
  CustomRuleConfiguration,
  ResolvedConfiguration,
  PresentableRow,
  RuledexConfig,
  FilterMode,
  OutputFormat,
  Severity,
} from "./engine/types.js";
export type { TruncationLayout } from "./catalog/truncate.js";
export type { TerminalStream } from "./engine/terminal.js";
