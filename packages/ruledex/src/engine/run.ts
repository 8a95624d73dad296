import { RULE_REGISTRY } from "../rules/index.js";
import type { RuleRegistry } from "../rules/registry.js";
import { filterRules } from "../catalog/filter.js";
import { buildRows } from "../catalog/rows.js";
import { formatJson, formatTable } from "../catalog/report.js";
import { formatRuleDetail, formatRuleDetailJson } from "../catalog/detail.js";
import { DEFAULT_LAYOUT, type TruncationLayout } from "../catalog/truncate.js";
import { loadConfig } from "./config.js";
import { resolveConfiguration } from "./resolve.js";
import { currentTerminalWidth } from "./terminal.js";
import { UsageError } from "./errors.js";
import type { FilterMode, OutputFormat, RuledexConfig } from "./types.js";

export interface RulesQuery {
  ruleId?: string;
  onlyEnabled?: boolean;
  onlyDisabled?: boolean;
  configPath?: string;
  format?: OutputFormat;
}

export interface RulesContext {
  rootDir: string;
  registry: RuleRegistry;
  loadConfig(rootDir: string, configPath?: string): RuledexConfig;
  terminalWidth(): number;
  layout: TruncationLayout;
}

export type RulesOutcome =
  | { ok: true; output: string; warnings: string[] }
  | { ok: false; error: UsageError };

export function defaultRulesContext(rootDir: string = process.cwd()): RulesContext {
  return {
    rootDir,
    registry: RULE_REGISTRY,
    loadConfig,
    terminalWidth: () => currentTerminalWidth(),
    layout: DEFAULT_LAYOUT,
  };
}

function filterMode(query: RulesQuery): FilterMode {
  if (query.onlyEnabled) return "enabled";
  if (query.onlyDisabled) return "disabled";
  return "all";
}

/**
 * Answers `ruledex rules`. Usage problems come back as a failed outcome;
 * configuration problems throw a ConfigError.
 */
export function queryRules(query: RulesQuery, context: RulesContext = defaultRulesContext()): RulesOutcome {
  const format = query.format ?? "table";

  if (query.ruleId) {
    const definition = context.registry.lookup(query.ruleId);
    if (!definition) {
      return { ok: false, error: new UsageError(`No rule with identifier: ${query.ruleId}`) };
    }
    const output =
      format === "json" ? formatRuleDetailJson(definition.description) : formatRuleDetail(definition.description);
    return { ok: true, output, warnings: [] };
  }

  if (query.onlyEnabled && query.onlyDisabled) {
    return { ok: false, error: new UsageError("You can't use --disabled and --enabled at the same time.") };
  }

  const config = context.loadConfig(context.rootDir, query.configPath);
  const resolved = resolveConfiguration(context.registry, config);
  const identifiers = filterRules(filterMode(query), context.registry, resolved);
  const rows = buildRows(identifiers, context.registry, resolved);

  const output = format === "json" ? formatJson(rows) : formatTable(rows, context.terminalWidth(), context.layout);
  return { ok: true, output, warnings: resolved.warnings };
}
