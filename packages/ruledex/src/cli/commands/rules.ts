import pc from "picocolors";
import { queryRules, defaultRulesContext, type RulesContext } from "../../engine/run.js";
import { ConfigError, UsageError } from "../../engine/errors.js";
import type { OutputFormat } from "../../engine/types.js";

interface RulesOptions {
  config?: string;
  enabled?: boolean;
  disabled?: boolean;
  format: string;
}

const VALID_FORMATS = new Set<string>(["table", "json"]);

function isOutputFormat(input: string): input is OutputFormat {
  return VALID_FORMATS.has(input);
}

export function parseFormat(input: string): OutputFormat {
  if (isOutputFormat(input)) return input;
  throw new UsageError(`Invalid format: "${input}". Valid values: table, json`);
}

export async function cmdRules(
  ruleId: string | undefined,
  opts: RulesOptions,
  context: RulesContext = defaultRulesContext(),
): Promise<void> {
  try {
    const outcome = queryRules(
      {
        ruleId: ruleId || undefined,
        onlyEnabled: opts.enabled,
        onlyDisabled: opts.disabled,
        configPath: opts.config,
        format: parseFormat(opts.format),
      },
      context,
    );

    if (!outcome.ok) {
      console.error(pc.red(`  ${outcome.error.message}`));
      console.error(pc.dim("  Run `ruledex rules --help` for usage."));
      process.exitCode = 1;
      return;
    }

    for (const warning of outcome.warnings) {
      console.error(pc.yellow(`  warning: ${warning}`));
    }
    console.log(outcome.output);
  } catch (err) {
    if (!(err instanceof ConfigError || err instanceof UsageError)) throw err;
    console.error(pc.red(`  ${err.message}`));
    process.exitCode = 1;
  }
}
