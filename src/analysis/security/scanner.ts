/**
 * Cross-cutting security scan.
 *
 * Runs after a file's detector as an issue layer: entropy-gated secret
 * detection, injection patterns for every language, plus a few
 * Python- and JavaScript-specific checks.
 */

import { IssueLayer } from "../detectors/types";
import { createIssue, getSnippet, splitLines } from "../issues";
import { Issue, Severity } from "../types";

export interface SecurityScanOptions {
  enableSecretsScan: boolean;
  enableOwaspScan: boolean;
  /** Minimum Shannon entropy (bits per char) for a secret candidate */
  minEntropy: number;
}

export const DEFAULT_SECURITY_OPTIONS: Readonly<SecurityScanOptions> = {
  enableSecretsScan: true,
  enableOwaspScan: true,
  minEntropy: 4.5,
};

interface SecretPattern {
  regex: RegExp;
  kind: string;
}

interface InjectionPattern {
  regex: RegExp;
  description: string;
}

interface LanguagePattern {
  regex: RegExp;
  title: string;
  severity: Severity;
}

const SECRET_PATTERNS: readonly SecretPattern[] = [
  { regex: /(aws_access_key_id)\s*=\s*["']?([A-Z0-9]{20})["']?/gi, kind: "AWS Access Key" },
  { regex: /(aws_secret_access_key)\s*=\s*["']?([A-Za-z0-9/+=]{40})["']?/gi, kind: "AWS Secret Key" },
  { regex: /(github_token)\s*=\s*["']?(ghp_[A-Za-z0-9]{36})["']?/gi, kind: "GitHub Token" },
  { regex: /(api[_-]?key)\s*=\s*["']?([A-Za-z0-9_-]{32,})["']?/gi, kind: "API Key" },
  { regex: /(password|passwd)\s*=\s*["']([^"']{8,})["']/gi, kind: "Hardcoded Password" },
  { regex: /(private[_-]?key)\s*=\s*["']([^"']+)["']/gi, kind: "Private Key" },
  { regex: /(-----BEGIN\s+(?:RSA\s+)?PRIVATE\s+KEY-----)/gi, kind: "RSA Private Key" },
];

const INJECTION_GROUPS: readonly { title: string; patterns: readonly InjectionPattern[] }[] = [
  {
    title: "SQL Injection",
    patterns: [
      { regex: /(execute|query|run)\s*\([^)]*\+[^)]*\)/i, description: "SQL Injection via string concatenation" },
      { regex: /(SELECT|INSERT|UPDATE|DELETE).*%s.*%/i, description: "SQL Injection via string formatting" },
      { regex: /f["'].*?(SELECT|INSERT|UPDATE|DELETE).*?\{/i, description: "SQL Injection via f-string" },
    ],
  },
  {
    title: "Cross-Site Scripting (XSS)",
    patterns: [
      { regex: /innerHTML\s*=/i, description: "Potential XSS via innerHTML" },
      { regex: /document\.write\s*\(/i, description: "Potential XSS via document.write" },
      { regex: /eval\s*\(/i, description: "Code Injection via eval" },
    ],
  },
  {
    title: "Command Injection",
    patterns: [
      {
        regex: /(exec|system|popen|subprocess\.(?:call|run|Popen))\s*\([^)]*\+/i,
        description: "Command Injection via concatenation",
      },
      {
        regex: /(os\.system|os\.popen|subprocess\.(?:call|run))\s*\(.*shell\s*=\s*True/i,
        description: "Shell Command Injection risk",
      },
    ],
  },
];

const PYTHON_PATTERNS: readonly LanguagePattern[] = [
  { regex: /pickle\.loads?\(/, title: "Unsafe Pickle Deserialization", severity: "high" },
  { regex: /yaml\.load\([^,)]*\)/, title: "Unsafe YAML Deserialization", severity: "high" },
  { regex: /\binput\s*\([^)]*\)/, title: "Use of input() can be dangerous", severity: "low" },
  { regex: /random\.random\(\)/, title: "Weak Random Number Generation", severity: "medium" },
];

const SCRIPT_PATTERNS: readonly LanguagePattern[] = [
  { regex: /dangerouslySetInnerHTML/i, title: "Dangerous React Property", severity: "high" },
  { regex: /\beval\s*\(/i, title: "Use of eval()", severity: "high" },
  { regex: /\bFunction\s*\(/, title: "Dynamic Function Construction", severity: "medium" },
  { regex: /localStorage\.setItem.*password/i, title: "Password in LocalStorage", severity: "critical" },
];

/**
 * Shannon entropy in bits per character.
 */
export function shannonEntropy(value: string): number {
  if (!value) return 0;
  const counts = new Map<string, number>();
  for (const char of value) {
    counts.set(char, (counts.get(char) ?? 0) + 1);
  }
  const length = [...value].length;
  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

export class SecurityScanner implements IssueLayer {
  readonly name = "security-scanner";

  constructor(private readonly options: SecurityScanOptions = DEFAULT_SECURITY_OPTIONS) {}

  run(content: string, filePath: string, language: string): Issue[] {
    const lines = splitLines(content);
    const issues: Issue[] = [];

    if (this.options.enableSecretsScan) {
      issues.push(...this.scanSecrets(lines, filePath));
    }
    if (this.options.enableOwaspScan) {
      issues.push(...this.scanInjection(lines, filePath));
    }
    if (language === "python") {
      issues.push(...this.scanLanguage(lines, filePath, PYTHON_PATTERNS));
    } else if (language === "javascript" || language === "typescript") {
      issues.push(...this.scanLanguage(lines, filePath, SCRIPT_PATTERNS));
    }

    return issues;
  }

  private scanSecrets(lines: readonly string[], filePath: string): Issue[] {
    const issues: Issue[] = [];
    lines.forEach((line, index) => {
      const lineNumber = index + 1;
      for (const { regex, kind } of SECRET_PATTERNS) {
        for (const match of line.matchAll(regex)) {
          const secret = match[2] ?? match[1] ?? "";
          const entropy = shannonEntropy(secret);
          if (entropy < this.options.minEntropy) continue;
          issues.push(
            createIssue({
              checkId: "secret",
              title: `Hardcoded Secret: ${kind}`,
              description: `Potential ${kind.toLowerCase()} detected`,
              severity: "critical",
              category: "security",
              location: { filePath, lineStart: lineNumber, lineEnd: lineNumber },
              codeSnippet: getSnippet(lines, lineNumber),
              suggestedFix: "Store secrets in environment variables or use a secrets management service",
              metadata: { entropy: Number(entropy.toFixed(2)) },
            })
          );
        }
      }
    });
    return issues;
  }

  private scanInjection(lines: readonly string[], filePath: string): Issue[] {
    const issues: Issue[] = [];
    for (const group of INJECTION_GROUPS) {
      lines.forEach((line, index) => {
        const lineNumber = index + 1;
        for (const pattern of group.patterns) {
          if (!pattern.regex.test(line)) continue;
          issues.push(
            createIssue({
              checkId: group.title,
              title: group.title,
              description: pattern.description,
              severity: "high",
              category: "security",
              location: { filePath, lineStart: lineNumber, lineEnd: lineNumber },
              codeSnippet: getSnippet(lines, lineNumber),
            })
          );
        }
      });
    }
    return issues;
  }

  private scanLanguage(lines: readonly string[], filePath: string, patterns: readonly LanguagePattern[]): Issue[] {
    const issues: Issue[] = [];
    lines.forEach((line, index) => {
      const lineNumber = index + 1;
      for (const pattern of patterns) {
        if (!pattern.regex.test(line)) continue;
        issues.push(
          createIssue({
            checkId: pattern.title,
            title: pattern.title,
            description: `Security issue detected: ${pattern.title}`,
            severity: pattern.severity,
            category: "security",
            location: { filePath, lineStart: lineNumber, lineEnd: lineNumber },
            codeSnippet: getSnippet(lines, lineNumber),
          })
        );
      }
    });
    return issues;
  }
}
