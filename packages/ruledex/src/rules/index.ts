import { RuleRegistry } from "./registry.js";
import { customRules } from "./custom-rules.js";
import { cyclomaticComplexity } from "./cyclomatic-complexity.js";
import { fileLength } from "./file-length.js";
import { lineLength } from "./line-length.js";
import { noConsole } from "./no-console.js";
import { noNonNullAssertion } from "./no-non-null-assertion.js";
import { noSpreadInReduce } from "./no-spread-in-reduce.js";
import { preferConst } from "./prefer-const.js";
import { sortedImports } from "./sorted-imports.js";
import { todo } from "./todo.js";
import { trailingNewline } from "./trailing-newline.js";
import { trailingWhitespace } from "./trailing-whitespace.js";
import { unusedImport } from "./unused-import.js";

export { RuleRegistry } from "./registry.js";
export { CUSTOM_RULES_ID } from "./custom-rules.js";

export const RULE_REGISTRY = new RuleRegistry([
  lineLength,
  fileLength,
  cyclomaticComplexity,
  trailingWhitespace,
  trailingNewline,
  sortedImports,
  todo,
  noConsole,
  noNonNullAssertion,
  preferConst,
  noSpreadInReduce,
  unusedImport,
  customRules,
]);
