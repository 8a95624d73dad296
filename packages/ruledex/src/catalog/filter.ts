import type { RuleRegistry } from "../rules/registry.js";
import type { FilterMode, ResolvedConfiguration } from "../engine/types.js";

/** Registry identifiers selected by `mode`, in registry order. */
export function filterRules(
  mode: FilterMode,
  registry: RuleRegistry,
  resolved: ResolvedConfiguration,
): string[] {
  const identifiers = registry.identifiers();
  switch (mode) {
    case "all":
      return identifiers;
    case "enabled":
      return identifiers.filter((id) => resolved.find(id) !== undefined);
    case "disabled":
      return identifiers.filter((id) => resolved.find(id) === undefined);
  }
}
