/**
 * Rule catalog and pattern matching.
 *
 * A catalog compiles each rule once. After freeze() it is read-only and
 * can be shared by every concurrent file analysis of a run.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { logger, errorMessage } from "../logger";
import { ConfigError } from "../errors";
import { categorySchema, severitySchema } from "../config/schema";
import { Issue } from "./types";
import { createIssue, getSnippet, splitLines } from "./issues";
import { BUILTIN_RULES, Rule, RuleDefinition, ruleAppliesTo } from "./rules";

/**
 * Compile a definition. Returns an error message instead of throwing.
 */
export function compileRule(definition: RuleDefinition): Rule | string {
  const flags = definition.flags ?? "";
  let regex: RegExp;
  try {
    regex = new RegExp(definition.pattern, flags.includes("g") ? flags : `${flags}g`);
  } catch (err) {
    return errorMessage(err);
  }
  if (definition.languages.length === 0) {
    return "rule has no languages";
  }
  return {
    id: definition.id,
    name: definition.name,
    description: definition.description,
    pattern: definition.pattern,
    regex,
    severity: definition.severity,
    category: definition.category,
    languages: new Set(definition.languages),
    message: definition.message,
    fixSuggestion: definition.fixSuggestion,
    autoFixable: definition.autoFixable ?? false,
    flags,
  };
}

const customRuleSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().optional(),
    pattern: z.string().min(1),
    severity: severitySchema,
    category: categorySchema,
    languages: z.array(z.string().min(1)).min(1),
    message: z.string().optional(),
    fix_suggestion: z.string().optional(),
    auto_fixable: z.boolean().optional(),
    flags: z.string().regex(/^[imsu]*$/, "unsupported flags").optional(),
  })
  .transform(
    (entry): RuleDefinition => ({
      id: entry.id,
      name: entry.name,
      description: entry.description ?? entry.name,
      pattern: entry.pattern,
      severity: entry.severity,
      category: entry.category,
      languages: entry.languages,
      message: entry.message ?? entry.description ?? entry.name,
      fixSuggestion: entry.fix_suggestion,
      autoFixable: entry.auto_fixable,
      flags: entry.flags,
    })
  );

const customRuleFileSchema = z.object({
  rules: z.array(z.unknown()),
});

export interface CustomRuleLoadResult {
  loaded: number;
  skipped: number;
}

export class RuleCatalog {
  private readonly rules: Rule[] = [];
  private frozen = false;

  /**
   * @param definitions - rules to add immediately; defaults to the built-in set
   */
  constructor(definitions: readonly RuleDefinition[] = BUILTIN_RULES) {
    for (const definition of definitions) {
      this.addRule(definition);
    }
  }

  /**
   * Compile and add a rule. Invalid patterns and duplicate ids are skipped
   * with a warning.
   */
  addRule(definition: RuleDefinition): boolean {
    if (this.frozen) {
      throw new ConfigError("Cannot add rules to a frozen catalog", { ruleId: definition.id });
    }
    if (this.rules.some((rule) => rule.id === definition.id)) {
      logger.warn("Skipping rule with duplicate id", { ruleId: definition.id });
      return false;
    }
    const compiled = compileRule(definition);
    if (typeof compiled === "string") {
      logger.warn("Skipping rule with invalid pattern", {
        ruleId: definition.id,
        pattern: definition.pattern,
        error: compiled,
      });
      return false;
    }
    this.rules.push(compiled);
    return true;
  }

  /**
   * Remove rules by id. Unknown ids are ignored.
   */
  disableRules(ids: readonly string[]): number {
    if (this.frozen) {
      throw new ConfigError("Cannot disable rules on a frozen catalog", { ruleIds: [...ids] });
    }
    const disabled = new Set(ids);
    const before = this.rules.length;
    const kept = this.rules.filter((rule) => !disabled.has(rule.id));
    this.rules.splice(0, this.rules.length, ...kept);
    return before - kept.length;
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.rules.length;
  }

  getRules(): readonly Rule[] {
    return [...this.rules];
  }

  getRule(id: string): Rule | undefined {
    return this.rules.find((rule) => rule.id === id);
  }

  /**
   * Rules whose language list covers `language`.
   */
  rulesFor(language: string): Rule[] {
    return this.rules.filter((rule) => ruleAppliesTo(rule, language));
  }

  /**
   * Run every applicable rule over each line. Each match yields its own
   * issue, so two matches on one line give two issues.
   */
  matchFile(filePath: string, content: string, language: string): Issue[] {
    const applicable = this.rulesFor(language);
    if (applicable.length === 0) {
      return [];
    }

    const lines = splitLines(content);
    const issues: Issue[] = [];

    for (const rule of applicable) {
      lines.forEach((line, index) => {
        const lineNumber = index + 1;
        for (const match of line.matchAll(rule.regex)) {
          const column = (match.index ?? 0) + 1;
          issues.push(
            createIssue({
              checkId: rule.id,
              title: rule.name,
              description: rule.message,
              severity: rule.severity,
              category: rule.category,
              location: {
                filePath,
                lineStart: lineNumber,
                lineEnd: lineNumber,
                columnStart: column,
                columnEnd: column + Math.max(match[0].length, 1) - 1,
              },
              codeSnippet: getSnippet(lines, lineNumber),
              suggestedFix: rule.fixSuggestion,
              autoFixable: rule.autoFixable,
              ruleId: rule.id,
            })
          );
          // Zero-width matches would otherwise repeat at every offset
          if (match[0].length === 0) {
            break;
          }
        }
      });
    }

    return issues;
  }

  /**
   * Extend the catalog from a JSON or YAML file with a top-level `rules`
   * list. Bad entries are skipped; an unreadable file is a ConfigError.
   */
  loadCustomRules(filePath: string): CustomRuleLoadResult {
    let raw: unknown;
    try {
      const text = fs.readFileSync(filePath, "utf-8");
      raw = path.extname(filePath).toLowerCase() === ".json" ? JSON.parse(text) : yaml.load(text);
    } catch (err) {
      throw new ConfigError(`Failed to read custom rules: ${errorMessage(err)}`, { filePath });
    }

    const file = customRuleFileSchema.safeParse(raw);
    if (!file.success) {
      throw new ConfigError("Custom rules file must contain a 'rules' list", { filePath });
    }

    let loaded = 0;
    let skipped = 0;
    file.data.rules.forEach((entry, index) => {
      const parsed = customRuleSchema.safeParse(entry);
      if (!parsed.success) {
        logger.warn("Skipping malformed custom rule", {
          filePath,
          index,
          error: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
        });
        skipped++;
        return;
      }
      if (this.addRule(parsed.data)) {
        loaded++;
      } else {
        skipped++;
      }
    });

    logger.info("Loaded custom rules", { filePath, loaded, skipped });
    return { loaded, skipped };
  }
}
