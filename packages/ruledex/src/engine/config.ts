import path from "node:path";
import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { RuledexConfig } from "./types.js";

const CONFIG_FILES = [
  "ruledex.config.json",
  ".ruledex.json",
];

const RuleListSchema = z.array(z.string().min(1));

export const RuledexConfigSchema = z
  .object({
    onlyRules: RuleListSchema.optional(),
    disabledRules: RuleListSchema.default([]),
    optInRules: RuleListSchema.default([]),
    analyzerRules: RuleListSchema.default([]),
    rules: z.record(z.unknown()).default({}),
  })
  .strict();

export const DEFAULT_CONFIG: RuledexConfig = {
  disabledRules: [],
  optInRules: [],
  analyzerRules: [],
  rules: {},
};

export function findConfigFile(rootDir: string): string | undefined {
  for (const name of CONFIG_FILES) {
    const abs = path.join(rootDir, name);
    if (existsSync(abs)) return abs;
  }
  return undefined;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseConfig(raw: unknown, source: string): RuledexConfig {
  const result = RuledexConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function readConfigFile(file: string): RuledexConfig {
  if (!existsSync(file)) {
    throw new ConfigError(`Configuration file not found: ${file}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(raw, file);
}

export function loadConfigIfExists(rootDir: string): RuledexConfig | undefined {
  const file = findConfigFile(rootDir);
  if (!file) return undefined;
  return readConfigFile(file);
}

/**
 * An explicit path must exist. Without one the working directory is searched
 * and the defaults apply when nothing is found.
 */
export function loadConfig(rootDir: string, configPath?: string): RuledexConfig {
  if (configPath) {
    return readConfigFile(path.resolve(rootDir, configPath));
  }
  return loadConfigIfExists(rootDir) ?? DEFAULT_CONFIG;
}
