#!/usr/bin/env node
import { Command } from "commander";
import { cmdRules } from "./commands/rules.js";
import { RULEDEX_VERSION } from "../engine/version.js";

const program = new Command();

program
  .name("ruledex")
  .description("Browse the static-analysis rule catalog and your project's rule configuration")
  .version(RULEDEX_VERSION);

program
  .command("rules [ruleId]", { isDefault: true })
  .description("Display the list of rules and their identifiers, or one rule's documentation")
  .option("-c, --config <path>", "Configuration file (default: ruledex.config.json or .ruledex.json)")
  .option("-e, --enabled", "Only display enabled rules")
  .option("-d, --disabled", "Only display disabled rules")
  .option("--format <format>", "Output format: table, json", "table")
  .action((ruleId: string | undefined, opts: { config?: string; enabled?: boolean; disabled?: boolean; format: string }) =>
    cmdRules(ruleId, opts),
  );

await program.parseAsync();
