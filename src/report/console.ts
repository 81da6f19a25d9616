/**
 * Terminal output.
 */

import chalk from "chalk";
import { FileRecord, Issue, ProjectResult, SEVERITIES, Severity } from "../analysis/types";
import { TOOL_NAME } from "../version";

export interface ConsoleReportOptions {
  showSnippets: boolean;
  /** Also print AI explanations */
  verbose?: boolean;
}

const SEVERITY_COLORS: Record<Severity, typeof chalk.red> = {
  critical: chalk.red.bold,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.blue,
  info: chalk.gray,
};

function severityTag(severity: Severity): string {
  return SEVERITY_COLORS[severity](`[${severity.toUpperCase()}]`);
}

function position(issue: Issue): string {
  const { lineStart, columnStart } = issue.location;
  return columnStart !== undefined ? `${lineStart}:${columnStart}` : `${lineStart}`;
}

function indent(text: string, prefix: string): string {
  return text
    .split("\n")
    .map((line) => prefix + line)
    .join("\n");
}

function formatIssue(issue: Issue, options: ConsoleReportOptions): string[] {
  const lines = [`  ${severityTag(issue.severity)} ${chalk.gray(position(issue))} ${chalk.bold(issue.title)}`];
  lines.push(`    ${issue.description}`);
  if (options.showSnippets && issue.codeSnippet) {
    lines.push(chalk.gray(indent(issue.codeSnippet, "    ")));
  }
  if (issue.suggestedFix) {
    const label = issue.fixDescription ?? "Suggested fix";
    lines.push(`    ${chalk.green("Fix:")} ${label}`);
    lines.push(chalk.green(indent(issue.suggestedFix, "      ")));
  }
  if (options.verbose && issue.aiExplanation) {
    lines.push(`    ${chalk.cyan("Explanation:")}`);
    lines.push(indent(issue.aiExplanation, "      "));
  }
  return lines;
}

function formatFile(file: FileRecord, options: ConsoleReportOptions): string[] {
  if (!file.success) {
    return [`${chalk.underline(file.filePath)} ${chalk.red(`failed: ${file.error ?? "unknown error"}`)}`, ""];
  }
  const lines = [`${chalk.underline(file.filePath)} ${chalk.gray(`(${file.language}, ${file.issues.length} issues)`)}`];
  for (const issue of file.issues) {
    lines.push(...formatIssue(issue, options));
  }
  lines.push("");
  return lines;
}

/**
 * Files with issues or failures, grouped, then a severity table.
 */
export function renderConsole(result: ProjectResult, options: ConsoleReportOptions): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`${TOOL_NAME} report`));
  lines.push(chalk.gray(`Project: ${result.projectPath}`));
  lines.push(
    chalk.gray(`Files: ${result.totalFiles} | Issues: ${result.totalIssues} | Duration: ${result.totalDurationMs}ms`)
  );
  lines.push("");

  const shown = result.files.filter((file) => !file.success || file.issues.length > 0);
  for (const file of shown) {
    lines.push(...formatFile(file, options));
  }

  if (result.totalIssues === 0) {
    lines.push(chalk.green.bold("No issues found."));
    lines.push("");
  }

  lines.push(chalk.bold("Summary"));
  for (const severity of SEVERITIES) {
    const count = result.summary.severityCounts[severity];
    lines.push(`  ${SEVERITY_COLORS[severity](severity.padEnd(8))} ${count}`);
  }
  lines.push(`  ${"fixable".padEnd(8)} ${result.summary.autoFixableCount}`);

  const failed = result.files.filter((file) => !file.success).length;
  if (failed > 0) {
    lines.push(chalk.red(`  ${failed} file(s) could not be analyzed`));
  }

  return lines.join("\n");
}
