/**
 * Core data model for analysis results.
 *
 * Issues, file records and project results are plain readonly objects so
 * they can be serialized to JSON and re-rendered without the engine.
 */

/**
 * Issue severity. Ordering comes from SEVERITY_RANK, never from the order
 * of this union.
 */
export type Severity = "info" | "low" | "medium" | "high" | "critical";

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  info: 0,
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

/** All severities, most severe first. */
export const SEVERITIES: readonly Severity[] = ["critical", "high", "medium", "low", "info"];

export function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_RANK, value);
}

/**
 * Negative when `a` is less severe than `b`.
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

/** Inclusive "at least" check used by filters. */
export function isAtLeast(severity: Severity, min: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[min];
}

export type Category =
  | "security"
  | "bug"
  | "code_smell"
  | "type_error"
  | "style"
  | "performance"
  | "best_practice"
  | "duplication"
  | "complexity"
  | "maintainability";

export const CATEGORIES: readonly Category[] = [
  "security",
  "bug",
  "code_smell",
  "type_error",
  "style",
  "performance",
  "best_practice",
  "duplication",
  "complexity",
  "maintainability",
];

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

/**
 * Position of an issue. Lines and columns are 1-based and inclusive.
 */
export interface Location {
  /** Project-relative path with forward slashes */
  filePath: string;
  lineStart: number;
  lineEnd: number;
  columnStart?: number;
  columnEnd?: number;
}

/**
 * Two locations are the same place when file and start line match.
 */
export function isSameLocation(a: Location, b: Location): boolean {
  return a.filePath === b.filePath && a.lineStart === b.lineStart;
}

export interface Issue {
  /** Stable hash of path, check id and start line */
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly severity: Severity;
  readonly category: Category;
  readonly location: Location;
  readonly codeSnippet?: string;
  readonly suggestedFix?: string;
  readonly fixDescription?: string;
  /** Only ever set by enrichment */
  readonly aiExplanation?: string;
  /** 0.0 - 1.0 */
  readonly confidence: number;
  readonly autoFixable: boolean;
  readonly ruleId?: string;
  readonly references: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface CodeMetrics {
  linesOfCode: number;
  sourceLinesOfCode: number;
  commentLines: number;
  blankLines: number;
  /** Average per-function cyclomatic complexity, 0 when there are no functions */
  cyclomaticComplexity: number;
  maxComplexity: number;
  functionCount: number;
}

export interface FileRecord {
  readonly filePath: string;
  readonly language: string;
  /** Always empty when success is false */
  readonly issues: readonly Issue[];
  readonly metrics?: CodeMetrics;
  readonly durationMs: number;
  readonly success: boolean;
  readonly error?: string;
}

export interface ResultSummary {
  readonly severityCounts: Readonly<Record<Severity, number>>;
  readonly categoryCounts: Readonly<Record<Category, number>>;
  readonly autoFixableCount: number;
}

export interface ProjectResult {
  readonly projectPath: string;
  /** ISO-8601 start time of the run */
  readonly timestamp: string;
  readonly files: readonly FileRecord[];
  readonly totalFiles: number;
  readonly totalIssues: number;
  readonly totalDurationMs: number;
  /** Number of files per detected language */
  readonly languages: Readonly<Record<string, number>>;
  readonly summary: ResultSummary;
}

/**
 * Every issue in a result, in file order.
 */
export function allIssues(result: ProjectResult): Issue[] {
  return result.files.flatMap((file) => file.issues);
}

/**
 * Count issues of exactly the given severity. The CLI exits non-zero when
 * this is positive for "critical".
 */
export function countBySeverity(result: ProjectResult, severity: Severity): number {
  return allIssues(result).filter((issue) => issue.severity === severity).length;
}

export function emptySeverityCounts(): Record<Severity, number> {
  return { info: 0, low: 0, medium: 0, high: 0, critical: 0 };
}

export function emptyCategoryCounts(): Record<Category, number> {
  return {
    security: 0,
    bug: 0,
    code_smell: 0,
    type_error: 0,
    style: 0,
    performance: 0,
    best_practice: 0,
    duplication: 0,
    complexity: 0,
    maintainability: 0,
  };
}
