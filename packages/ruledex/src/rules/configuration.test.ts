import { describe, it, expect } from "vitest";
import { ConfigError } from "../engine/errors.js";
import { describeLevels, describeParams } from "./configuration.js";
import { customRules } from "./custom-rules.js";
import { lineLength } from "./line-length.js";
import { fileLength } from "./file-length.js";
import { noConsole } from "./no-console.js";
import { todo } from "./todo.js";
import { trailingWhitespace } from "./trailing-whitespace.js";
import { unusedImport } from "./unused-import.js";

describe("describeParams", () => {
  it("joins key-value pairs", () => {
    expect(describeParams([["severity", "error"], ["strict", true], ["max", 3]])).toBe(
      "severity: error, strict: true, max: 3",
    );
  });

  it("brackets list values", () => {
    expect(describeParams([["allow", ["warn", "error"]]])).toBe("allow: [warn, error]");
    expect(describeParams([["allow", []]])).toBe("allow: []");
  });

  it("describes severity levels", () => {
    expect(describeLevels({ warning: 1, error: 2 })).toBe("warning: 1, error: 2");
  });
});

describe("built-in rule configuration", () => {
  it("describes defaults", () => {
    expect(lineLength.create().configurationDescription).toBe(
      "warning: 120, error: 200, ignoresUrls: false, ignoresComments: false",
    );
    expect(fileLength.create().configurationDescription).toBe(
      "warning: 400, error: 1000, ignoreCommentOnlyLines: false",
    );
    expect(trailingWhitespace.create().configurationDescription).toBe(
      "severity: warning, ignoresEmptyLines: false, ignoresComments: true",
    );
    expect(todo.create().configurationDescription).toBe("warning");
  });

  it("applies configured parameters", () => {
    expect(lineLength.create({ warning: 100, ignoresUrls: true }).configurationDescription).toBe(
      "warning: 100, error: 200, ignoresUrls: true, ignoresComments: false",
    );
    expect(noConsole.create({ allow: ["error", "warn"] }).configurationDescription).toBe(
      "severity: warning, allow: [error, warn]",
    );
    expect(todo.create({ severity: "error" }).configurationDescription).toBe("error");
  });

  it("rejects unknown parameters", () => {
    expect(() => todo.create({ foo: 1 })).toThrow(ConfigError);
    expect(() => todo.create({ foo: 1 })).toThrow(
      "Invalid configuration for rule todo: (root): Unrecognized key(s) in object: 'foo'",
    );
  });

  it("rejects invalid values", () => {
    expect(() => lineLength.create({ warning: -5 })).toThrow("Invalid configuration for rule line_length: warning:");
    expect(() => todo.create({ severity: "fatal" })).toThrow("Invalid configuration for rule todo: severity:");
  });

  it("builds simple instances", () => {
    expect(unusedImport.create()).toEqual({
      variant: "simple",
      identifier: "unused_import",
      configurationDescription: "warning",
    });
  });

  it("declares capabilities", () => {
    expect(unusedImport.capabilities).toEqual({ optIn: true, correctable: true, analyzer: true });
    expect(todo.capabilities).toEqual({ optIn: false, correctable: false, analyzer: false });
  });
});

describe("custom rules", () => {
  it("has no children by default", () => {
    expect(customRules.create()).toEqual({
      variant: "composite",
      identifier: "custom_rules",
      configurationDescription: "user-defined",
      children: [],
    });
  });

  it("keeps user-defined rules in configuration order", () => {
    const instance = customRules.create({
      no_debugger: { regex: "\\bdebugger\\b", message: "Remove debugger statements", severity: "error" },
      no_fdescribe: { name: "No fdescribe", regex: "fdescribe\\(" },
    });
    expect(instance.variant).toBe("composite");
    if (instance.variant !== "composite") return;

    expect(instance.children).toEqual([
      {
        identifier: "no_debugger",
        regex: "\\bdebugger\\b",
        severity: "error",
        configurationDescription: "error: \\bdebugger\\b",
      },
      {
        identifier: "no_fdescribe",
        regex: "fdescribe\\(",
        severity: "warning",
        configurationDescription: "warning: fdescribe\\(",
      },
    ]);
  });

  it("rejects patterns that do not compile", () => {
    expect(() => customRules.create({ bad: { regex: "(" } })).toThrow(
      "Invalid configuration for rule custom_rules: bad.regex: Invalid regular expression",
    );
  });

  it("rejects identifiers that would break a table row", () => {
    for (const key of ["no\ndebugger", "no debugger", "no\tdebugger", "no\u0007bell"]) {
      expect(() => customRules.create({ [key]: { regex: "debugger" } })).toThrow(ConfigError);
      expect(() => customRules.create({ [key]: { regex: "debugger" } })).toThrow(
        "Custom rule identifiers must not contain whitespace or control characters",
      );
    }
  });

  it("accepts dotted and non-ASCII identifiers", () => {
    const instance = customRules.create({ "team.no_débug": { regex: "debugger" } });
    expect(instance.variant === "composite" && instance.children.map((c) => c.identifier)).toEqual(["team.no_débug"]);
  });

  it("requires a regex", () => {
    expect(() => customRules.create({ empty: {} })).toThrow(ConfigError);
  });
});
