/**
 * Tests for the rule catalog and pattern matching.
 */

import * as path from "path";
import { RuleCatalog, compileRule } from "../src/analysis/catalog";
import { generateIssueId } from "../src/analysis/issues";
import { BUILTIN_RULES, LEXICAL_RULES, RuleDefinition } from "../src/analysis/rules";
import { ConfigError } from "../src/errors";

const RULES_DIR = path.join(__dirname, "fixtures/rules");

function definition(overrides: Partial<RuleDefinition> = {}): RuleDefinition {
  return {
    id: "test-rule",
    name: "Test Rule",
    description: "Test rule",
    pattern: "forbidden",
    severity: "low",
    category: "style",
    languages: ["python"],
    message: "Do not write forbidden",
    ...overrides,
  };
}

describe("compileRule", () => {
  it("should add the global flag and keep the declared flags", () => {
    const rule = compileRule(definition({ flags: "i" }));

    expect(typeof rule).not.toBe("string");
    if (typeof rule === "string") return;
    expect(rule.regex.flags).toBe("gi");
    expect(rule.flags).toBe("i");
    expect(rule.autoFixable).toBe(false);
  });

  it("should return an error message for an invalid pattern", () => {
    expect(typeof compileRule(definition({ pattern: "(unclosed" }))).toBe("string");
  });

  it("should reject a rule with no languages", () => {
    expect(compileRule(definition({ languages: [] }))).toBe("rule has no languages");
  });

  it("should compile every built-in and lexical rule", () => {
    for (const def of [...BUILTIN_RULES, ...LEXICAL_RULES]) {
      expect(typeof compileRule(def)).not.toBe("string");
    }
  });
});

describe("RuleCatalog", () => {
  describe("matchFile", () => {
    it("should flag a hardcoded password with exact location", () => {
      const catalog = new RuleCatalog();
      const content = 'password = "super_secret_123"';

      const issues = catalog.matchFile("app.py", content, "python");

      expect(issues).toHaveLength(1);
      const issue = issues[0];
      expect(issue.title).toBe("Hardcoded Password");
      expect(issue.severity).toBe("critical");
      expect(issue.category).toBe("security");
      expect(issue.ruleId).toBe("hardcoded-password");
      expect(issue.location).toEqual({
        filePath: "app.py",
        lineStart: 1,
        lineEnd: 1,
        columnStart: 1,
        columnEnd: 29,
      });
      expect(issue.id).toBe(generateIssueId("app.py", "hardcoded-password", 1));
      expect(issue.codeSnippet).toBe('→    1 | password = "super_secret_123"');
      expect(issue.suggestedFix).toBe(
        "Store passwords in environment variables or use a secrets management service"
      );
    });

    it("should match case-insensitively when the rule says so", () => {
      const catalog = new RuleCatalog();

      const issues = catalog.matchFile("config.js", "const PASSWORD = 'hunter22';", "javascript");

      expect(issues.map((issue) => issue.ruleId)).toEqual(["hardcoded-password"]);
      expect(issues[0].location.columnStart).toBe(7);
    });

    it("should report every match on a line separately", () => {
      const catalog = new RuleCatalog();

      const issues = catalog.matchFile("debug.py", "print(1); print(2)", "python");

      expect(issues.map((issue) => issue.location.columnStart)).toEqual([1, 11]);
      expect(issues.every((issue) => issue.ruleId === "debug-print" && issue.autoFixable)).toBe(true);
    });

    it("should skip rules that do not cover the language", () => {
      const catalog = new RuleCatalog();

      expect(catalog.matchFile("main.go", 'password = "hunter22"', "go")).toEqual([]);
    });

    it("should number lines from 1", () => {
      const catalog = new RuleCatalog();
      const content = "x = 1\n\n# TODO: tidy up\n";

      const issues = catalog.matchFile("tidy.py", content, "python");

      expect(issues).toHaveLength(1);
      expect(issues[0].ruleId).toBe("todo-comment");
      expect(issues[0].location.lineStart).toBe(3);
      expect(issues[0].severity).toBe("info");
    });

    it("should apply wildcard-language rules to any language", () => {
      const catalog = new RuleCatalog([definition({ languages: ["*"] })]);

      expect(catalog.matchFile("notes.kt", "val x = forbidden", "kotlin")).toHaveLength(1);
    });

    it("should not loop on zero-width matches", () => {
      const catalog = new RuleCatalog([definition({ pattern: "^" })]);

      expect(catalog.matchFile("a.py", "abc\ndef", "python")).toHaveLength(2);
    });
  });

  describe("rule management", () => {
    it("should load all eight built-in rules by default", () => {
      expect(new RuleCatalog().size).toBe(8);
    });

    it("should skip duplicate ids", () => {
      const catalog = new RuleCatalog([definition()]);

      expect(catalog.addRule(definition({ pattern: "other" }))).toBe(false);
      expect(catalog.size).toBe(1);
      expect(catalog.getRule("test-rule")?.pattern).toBe("forbidden");
    });

    it("should skip rules with invalid patterns", () => {
      const catalog = new RuleCatalog([definition({ pattern: "(unclosed" })]);

      expect(catalog.size).toBe(0);
    });

    it("should disable rules by id", () => {
      const catalog = new RuleCatalog();

      expect(catalog.disableRules(["debug-print", "not-a-rule"])).toBe(1);
      expect(catalog.size).toBe(7);
      expect(catalog.getRule("debug-print")).toBeUndefined();
    });

    it("should refuse changes once frozen", () => {
      const catalog = new RuleCatalog();
      catalog.freeze();

      expect(catalog.isFrozen).toBe(true);
      expect(() => catalog.addRule(definition())).toThrow(ConfigError);
      expect(() => catalog.disableRules(["debug-print"])).toThrow(ConfigError);
    });

    it("should list rules for a language", () => {
      const ids = new RuleCatalog().rulesFor("python").map((rule) => rule.id);

      expect(ids).toEqual([
        "hardcoded-password",
        "hardcoded-api-key",
        "sql-string-concat",
        "debug-print",
        "todo-comment",
        "fixme-comment",
        "except-pass",
      ]);
    });
  });

  describe("loadCustomRules", () => {
    it("should load valid YAML rules and skip malformed ones", () => {
      const catalog = new RuleCatalog([]);

      const result = catalog.loadCustomRules(path.join(RULES_DIR, "custom-rules.yml"));

      expect(result).toEqual({ loaded: 2, skipped: 3 });
      expect(catalog.getRules().map((rule) => rule.id)).toEqual(["no-print-debugging", "shell-true"]);
    });

    it("should map snake_case keys and fill in defaults", () => {
      const catalog = new RuleCatalog([]);
      catalog.loadCustomRules(path.join(RULES_DIR, "custom-rules.yml"));

      const marker = catalog.getRule("no-print-debugging");
      expect(marker?.fixSuggestion).toBe("Remove the marker");
      expect(marker?.message).toBe("DEBUG marker left in source");

      const shell = catalog.getRule("shell-true");
      expect(shell?.description).toBe("Shell Execution");
      expect(shell?.message).toBe("Shell Execution");
    });

    it("should match loaded rules against content", () => {
      const catalog = new RuleCatalog([]);
      catalog.loadCustomRules(path.join(RULES_DIR, "custom-rules.yml"));

      const issues = catalog.matchFile(
        "run.py",
        'subprocess.run(cmd, shell=True)  # XXX-DEBUG',
        "python"
      );

      expect(issues.map((issue) => issue.ruleId)).toEqual(["no-print-debugging", "shell-true"]);
      expect(issues[1].severity).toBe("high");
    });

    it("should load JSON rule files", () => {
      const catalog = new RuleCatalog([]);

      expect(catalog.loadCustomRules(path.join(RULES_DIR, "custom-rules.json"))).toEqual({ loaded: 1, skipped: 0 });
      expect(catalog.matchFile("api.ts", "await legacyFetch(url);", "typescript")[0].description).toBe(
        "legacyFetch is deprecated; use fetchJson"
      );
    });

    it("should throw ConfigError for a missing file", () => {
      const catalog = new RuleCatalog([]);

      expect(() => catalog.loadCustomRules(path.join(RULES_DIR, "missing.yml"))).toThrow(ConfigError);
    });

    it("should throw ConfigError when there is no rules list", () => {
      const catalog = new RuleCatalog([]);

      expect(() => catalog.loadCustomRules(path.join(RULES_DIR, "not-a-rule-file.yml"))).toThrow(
        "Custom rules file must contain a 'rules' list"
      );
    });
  });
});
