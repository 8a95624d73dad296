import type { RuleRegistry } from "../rules/registry.js";
import type { ResolvedConfiguration, RuleCapabilities, RuleInstance, RuledexConfig } from "./types.js";

interface RuleSelection {
  only?: Set<string>;
  disabled: Set<string>;
  optIn: Set<string>;
  analyzer: Set<string>;
}

function isActive(identifier: string, capabilities: RuleCapabilities, selection: RuleSelection): boolean {
  if (selection.only) return selection.only.has(identifier);
  if (selection.disabled.has(identifier)) return false;
  if (capabilities.analyzer) return selection.analyzer.has(identifier);
  if (capabilities.optIn) return selection.optIn.has(identifier);
  return true;
}

/**
 * Builds the set of rule instances a project runs with. `onlyRules` wins over
 * every other list; otherwise default rules run unless disabled, and opt-in
 * and analyzer rules run only when listed.
 */
export function resolveConfiguration(registry: RuleRegistry, config: RuledexConfig): ResolvedConfiguration {
  const warnings: string[] = [];

  const canonicalSet = (key: string, identifiers: string[]): Set<string> => {
    const set = new Set<string>();
    for (const id of identifiers) {
      const canonical = registry.canonicalIdentifier(id);
      if (registry.get(canonical)) {
        set.add(canonical);
      } else {
        warnings.push(`Unknown rule identifier in ${key}: ${id}`);
      }
    }
    return set;
  };

  const selection: RuleSelection = {
    only: config.onlyRules ? canonicalSet("onlyRules", config.onlyRules) : undefined,
    disabled: canonicalSet("disabledRules", config.disabledRules),
    optIn: canonicalSet("optInRules", config.optInRules),
    analyzer: canonicalSet("analyzerRules", config.analyzerRules),
  };

  const params = new Map<string, unknown>();
  for (const [id, value] of Object.entries(config.rules)) {
    const canonical = registry.canonicalIdentifier(id);
    if (registry.get(canonical)) {
      params.set(canonical, value);
    } else {
      warnings.push(`Unknown rule identifier in rules: ${id}`);
    }
  }

  const rules: RuleInstance[] = [];
  for (const [identifier, definition] of registry.entries()) {
    if (!isActive(identifier, definition.capabilities, selection)) continue;
    rules.push(definition.create(params.get(identifier)));
  }

  const byIdentifier = new Map(rules.map((rule) => [rule.identifier, rule]));

  return {
    rules,
    warnings,
    find: (identifier) => byIdentifier.get(identifier),
  };
}
