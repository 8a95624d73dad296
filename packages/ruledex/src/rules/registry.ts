import type { RuleDefinition } from "../engine/types.js";

/**
 * Read-only catalog of rule definitions keyed by identifier, in the order they
 * were registered. Deprecated aliases resolve through {@link lookup}.
 */
export class RuleRegistry {
  private readonly rules = new Map<string, RuleDefinition>();
  private readonly aliases = new Map<string, string>();

  constructor(definitions: Iterable<RuleDefinition>) {
    for (const definition of definitions) {
      const { identifier, deprecatedAliases } = definition.description;
      if (identifier.length === 0) {
        throw new Error("Rule identifier must not be empty");
      }
      if (this.rules.has(identifier) || this.aliases.has(identifier)) {
        throw new Error(`Duplicate rule identifier: ${identifier}`);
      }
      this.rules.set(identifier, definition);

      for (const alias of deprecatedAliases) {
        if (this.rules.has(alias) || this.aliases.has(alias)) {
          throw new Error(`Deprecated alias ${alias} of ${identifier} collides with an existing rule`);
        }
        this.aliases.set(alias, identifier);
      }
    }
  }

  entries(): Array<[string, RuleDefinition]> {
    return [...this.rules.entries()];
  }

  identifiers(): string[] {
    return [...this.rules.keys()];
  }

  get(identifier: string): RuleDefinition | undefined {
    return this.rules.get(identifier);
  }

  /** Maps a deprecated alias to its current identifier; other input is returned as is. */
  canonicalIdentifier(identifierOrAlias: string): string {
    return this.aliases.get(identifierOrAlias) ?? identifierOrAlias;
  }

  lookup(identifierOrAlias: string): RuleDefinition | undefined {
    return this.rules.get(this.canonicalIdentifier(identifierOrAlias));
  }
}
