/**
 * Declarative pattern rules.
 *
 * BUILTIN_RULES run for every file through the pattern layer.
 * LEXICAL_RULES back the line-scanning detector used for languages
 * that have no parser here.
 */

import { Category, Severity } from "./types";

/** Matches every language when present in a rule's language list. */
export const ANY_LANGUAGE = "*";

/**
 * Uncompiled rule as written in source or in a custom rule file.
 */
export interface RuleDefinition {
  id: string;
  name: string;
  description: string;
  /** Regular expression source, matched line by line */
  pattern: string;
  severity: Severity;
  category: Category;
  languages: string[];
  message: string;
  fixSuggestion?: string;
  autoFixable?: boolean;
  /** RegExp flag letters, e.g. "i" */
  flags?: string;
}

/**
 * Compiled, immutable rule.
 */
export interface Rule {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly pattern: string;
  readonly regex: RegExp;
  readonly severity: Severity;
  readonly category: Category;
  readonly languages: ReadonlySet<string>;
  readonly message: string;
  readonly fixSuggestion?: string;
  readonly autoFixable: boolean;
  readonly flags: string;
}

export function ruleAppliesTo(rule: Rule, language: string): boolean {
  return rule.languages.has(ANY_LANGUAGE) || rule.languages.has(language);
}

const COMMENT_RULE_LANGUAGES = ["python", "javascript", "typescript", "java", "go", "rust"];

export const BUILTIN_RULES: readonly RuleDefinition[] = [
  // Security
  {
    id: "hardcoded-password",
    name: "Hardcoded Password",
    description: "Potential hardcoded password detected",
    pattern: `(password|passwd|pwd)\\s*=\\s*["'][^"']+["']`,
    severity: "critical",
    category: "security",
    languages: ["python", "javascript", "typescript", "java"],
    message: "Hardcoded password detected. Use environment variables or secrets management.",
    fixSuggestion: "Store passwords in environment variables or use a secrets management service",
    flags: "i",
  },
  {
    id: "hardcoded-api-key",
    name: "Hardcoded API Key",
    description: "Potential hardcoded API key detected",
    pattern: `(api[_-]?key|apikey|access[_-]?key)\\s*=\\s*["'][A-Za-z0-9]{20,}["']`,
    severity: "critical",
    category: "security",
    languages: ["python", "javascript", "typescript", "java", "go"],
    message: "Hardcoded API key detected",
    fixSuggestion: "Use environment variables or a secrets manager",
    flags: "i",
  },
  {
    id: "sql-string-concat",
    name: "SQL String Concatenation",
    description: "SQL query built with string concatenation",
    pattern: `(SELECT|INSERT|UPDATE|DELETE).*\\+.*["']`,
    severity: "high",
    category: "security",
    languages: ["python", "javascript", "typescript", "java", "php"],
    message: "SQL injection vulnerability: Use parameterized queries",
    fixSuggestion: "Use parameterized queries or an ORM",
    flags: "i",
  },
  // Code quality
  {
    id: "debug-print",
    name: "Debug Print Statement",
    description: "Debug print statement found",
    pattern: `(print|console\\.log|System\\.out\\.println)\\(`,
    severity: "low",
    category: "code_smell",
    languages: ["python", "javascript", "typescript", "java"],
    message: "Debug print statement should be removed or replaced with proper logging",
    fixSuggestion: "Use a logging library instead of print statements",
    autoFixable: true,
  },
  {
    id: "todo-comment",
    name: "TODO Comment",
    description: "TODO comment found",
    pattern: `#\\s*TODO|//\\s*TODO|/\\*\\s*TODO`,
    severity: "info",
    category: "maintainability",
    languages: COMMENT_RULE_LANGUAGES,
    message: "TODO comment found - consider creating a task or issue",
    flags: "i",
  },
  {
    id: "fixme-comment",
    name: "FIXME Comment",
    description: "FIXME comment found",
    pattern: `#\\s*FIXME|//\\s*FIXME|/\\*\\s*FIXME`,
    severity: "medium",
    category: "bug",
    languages: COMMENT_RULE_LANGUAGES,
    message: "FIXME comment indicates a known issue that needs attention",
    flags: "i",
  },
  // Best practices
  {
    id: "except-pass",
    name: "Empty Exception Handler",
    description: "Exception caught but not handled",
    pattern: `except.*:\\s*pass`,
    severity: "medium",
    category: "best_practice",
    languages: ["python"],
    message: "Empty exception handler - at least log the error",
    fixSuggestion: "Add logging or proper error handling",
  },
  {
    id: "catch-empty",
    name: "Empty Catch Block",
    description: "Exception caught but not handled",
    pattern: `catch\\s*\\([^)]+\\)\\s*\\{\\s*\\}`,
    severity: "medium",
    category: "best_practice",
    languages: ["javascript", "typescript", "java"],
    message: "Empty catch block - at least log the error",
    fixSuggestion: "Add logging or proper error handling",
  },
];

function debugOutput(language: string, pattern: string): RuleDefinition {
  return {
    id: `debug-output-${language}`,
    name: "Debug Output",
    description: "Debug output statement found",
    pattern,
    severity: "low",
    category: "code_smell",
    languages: [language],
    message: "Debug output should be removed or replaced with proper logging",
    fixSuggestion: "Use the project's logger instead",
    autoFixable: true,
  };
}

export const LEXICAL_RULES: readonly RuleDefinition[] = [
  debugOutput("java", `System\\.(?:out|err)\\.print(?:ln|f)?\\s*\\(`),
  debugOutput("go", `\\bfmt\\.Print(?:ln|f)?\\s*\\(`),
  debugOutput("ruby", `^\\s*(?:puts|pp?)\\s`),
  debugOutput("php", `\\b(?:var_dump|print_r|var_export)\\s*\\(`),
  debugOutput("rust", `\\b(?:println|eprintln|dbg)!\\s*\\(`),
  debugOutput("c", `\\bprintf\\s*\\(`),
  debugOutput("cpp", `std::(?:cout|cerr)\\s*<<`),
  debugOutput("csharp", `\\bConsole\\.Write(?:Line)?\\s*\\(`),
  debugOutput("swift", `^\\s*(?:print|debugPrint)\\s*\\(`),
  debugOutput("kotlin", `^\\s*println\\s*\\(`),
  {
    id: "loose-equality",
    name: "Loose Equality Comparison",
    description: "Comparison with type juggling",
    pattern: `(?<![=!<>])(?:==|!=)(?!=)`,
    severity: "medium",
    category: "best_practice",
    languages: ["php"],
    message: "Use === or !== to compare without type coercion",
    fixSuggestion: "Replace == with === and != with !==",
    autoFixable: true,
  },
  {
    id: "string-reference-equality",
    name: "String Compared by Reference",
    description: "String literal compared with == or !=",
    pattern: `(?:[=!]=\\s*"|"\\s*[=!]=)`,
    severity: "medium",
    category: "bug",
    languages: ["java"],
    message: "== compares object references; use equals() for string contents",
    fixSuggestion: "Use \"literal\".equals(value)",
  },
  {
    id: "goto-statement",
    name: "Use of goto",
    description: "goto statement found",
    pattern: `\\bgoto\\b`,
    severity: "low",
    category: "best_practice",
    languages: ["c", "cpp", "csharp", "php", "go"],
    message: "goto makes control flow hard to follow",
    fixSuggestion: "Restructure with loops, early returns or helper functions",
  },
  {
    id: "eval-usage",
    name: "Use of eval",
    description: "Dynamic code evaluation",
    pattern: `\\beval\\b\\s*[(\\s"'$]`,
    severity: "high",
    category: "security",
    languages: ["php", "ruby", "shell"],
    message: "eval executes arbitrary code and enables injection",
    fixSuggestion: "Avoid eval; dispatch on known values instead",
  },
  {
    id: "unsafe-block",
    name: "Unsafe Block",
    description: "unsafe block found",
    pattern: `\\bunsafe\\s*\\{`,
    severity: "medium",
    category: "security",
    languages: ["rust"],
    message: "unsafe blocks bypass the borrow checker; document the invariants they rely on",
  },
  {
    id: "backtick-substitution",
    name: "Legacy Command Substitution",
    description: "Backtick command substitution",
    pattern: "`[^`]*`",
    severity: "low",
    category: "style",
    languages: ["shell"],
    message: "Prefer $(...) over backticks for command substitution",
    fixSuggestion: "Replace `cmd` with $(cmd)",
    autoFixable: true,
  },
];
