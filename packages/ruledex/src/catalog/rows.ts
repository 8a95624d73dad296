import type { RuleRegistry } from "../rules/registry.js";
import type { PresentableRow, ResolvedConfiguration, RuleDefinition } from "../engine/types.js";

/**
 * Turns one catalog entry into table rows. Capabilities and kind describe the
 * rule type; the configuration text comes from the project's instance when the
 * rule is configured. A configured custom-rules container is replaced by one
 * row per user-defined rule.
 */
export function expandRule(
  identifier: string,
  definition: RuleDefinition,
  resolved: ResolvedConfiguration,
): PresentableRow[] {
  const defaultInstance = definition.create();
  const configured = resolved.find(identifier);
  const effective = configured ?? defaultInstance;
  const { kind } = definition.description;

  if (configured?.variant === "composite" && configured.children.length > 0) {
    return configured.children.map((child) => ({
      identifier: child.identifier,
      optIn: false,
      correctable: false,
      configured: true,
      kind,
      analyzer: false,
      configuration: child.configurationDescription,
    }));
  }

  return [
    {
      identifier,
      optIn: definition.capabilities.optIn,
      correctable: definition.capabilities.correctable,
      configured: configured !== undefined,
      kind,
      analyzer: definition.capabilities.analyzer,
      configuration: effective.configurationDescription,
    },
  ];
}

export function buildRows(
  identifiers: string[],
  registry: RuleRegistry,
  resolved: ResolvedConfiguration,
): PresentableRow[] {
  const rows: PresentableRow[] = [];
  for (const identifier of identifiers) {
    const definition = registry.get(identifier);
    if (!definition) continue;
    rows.push(...expandRule(identifier, definition, resolved));
  }
  return rows;
}
