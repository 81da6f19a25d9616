/**
 * Project-wide issue aggregation: dedup, similarity grouping, ranking,
 * filtering and summaries.
 *
 * Every operation returns new arrays; input issues are never mutated.
 */

import { similarityRatio } from "./similarity";
import {
  Category,
  Issue,
  ProjectResult,
  Severity,
  allIssues,
  emptyCategoryCounts,
  emptySeverityCounts,
  isAtLeast,
} from "./types";

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = {
  critical: 100,
  high: 75,
  medium: 50,
  low: 25,
  info: 10,
};

export const CATEGORY_WEIGHTS: Readonly<Record<Category, number>> = {
  security: 20,
  bug: 15,
  type_error: 10,
  performance: 8,
  best_practice: 5,
  complexity: 4,
  code_smell: 3,
  maintainability: 3,
  duplication: 2,
  style: 1,
};

const AUTO_FIX_BONUS = 5;

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

export interface IssueFilter {
  /** Inclusive */
  minSeverity?: Severity;
  categories?: readonly Category[];
  autoFixableOnly?: boolean;
}

export interface IssueSummary {
  total: number;
  bySeverity: Record<Severity, number>;
  byCategory: Record<Category, number>;
  /** Files with at least one issue, most issues first */
  byFile: { filePath: string; count: number }[];
  autoFixable: number;
  /** Critical plus high */
  highPriority: number;
  filesWithIssues: number;
  filesWithoutIssues: number;
}

/**
 * Exact-duplicate key: same place, same title, same category.
 */
export function issueSignature(issue: Issue): string {
  return `${issue.location.filePath}:${issue.location.lineStart}:${issue.title}:${issue.category}`;
}

/**
 * (severity weight + category weight) × confidence, +5 when auto-fixable.
 */
export function priorityScore(issue: Issue): number {
  const base = (SEVERITY_WEIGHTS[issue.severity] + CATEGORY_WEIGHTS[issue.category]) * issue.confidence;
  return issue.autoFixable ? base + AUTO_FIX_BONUS : base;
}

export class IssueAggregator {
  constructor(private readonly similarityThreshold: number = DEFAULT_SIMILARITY_THRESHOLD) {}

  /**
   * Keep the first issue for each signature.
   */
  deduplicate(issues: readonly Issue[]): Issue[] {
    const seen = new Set<string>();
    const unique: Issue[] = [];
    for (const issue of issues) {
      const signature = issueSignature(issue);
      if (seen.has(signature)) continue;
      seen.add(signature);
      unique.push(issue);
    }
    return unique;
  }

  /**
   * Group issues that tell the same story. Each issue is compared only
   * with the first member of each existing group and joins the first
   * match, so chains A~B~C where A and C differ can split. Only groups
   * with more than one member are returned, in order of first member.
   */
  findSimilar(issues: readonly Issue[]): Issue[][] {
    const groups: Issue[][] = [];
    for (const issue of issues) {
      const group = groups.find((candidate) => this.isSimilar(candidate[0], issue));
      if (group) {
        group.push(issue);
      } else {
        groups.push([issue]);
      }
    }
    return groups.filter((group) => group.length > 1);
  }

  isSimilar(a: Issue, b: Issue): boolean {
    return (
      a.category === b.category &&
      a.severity === b.severity &&
      similarityRatio(a.title, b.title) >= this.similarityThreshold &&
      similarityRatio(a.description, b.description) >= this.similarityThreshold
    );
  }

  /**
   * Stable sort by descending priority score.
   */
  rank(issues: readonly Issue[]): Issue[] {
    return issues
      .map((issue, index) => ({ issue, index, score: priorityScore(issue) }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .map((entry) => entry.issue);
  }

  /**
   * AND of whichever predicates are given.
   */
  filter(issues: readonly Issue[], filter: IssueFilter = {}): Issue[] {
    const categories = filter.categories ? new Set(filter.categories) : undefined;
    return issues.filter((issue) => {
      if (filter.minSeverity && !isAtLeast(issue.severity, filter.minSeverity)) return false;
      if (categories && !categories.has(issue.category)) return false;
      if (filter.autoFixableOnly && !issue.autoFixable) return false;
      return true;
    });
  }

  summarize(result: ProjectResult): IssueSummary {
    const issues = allIssues(result);
    const bySeverity = emptySeverityCounts();
    const byCategory = emptyCategoryCounts();
    let autoFixable = 0;

    for (const issue of issues) {
      bySeverity[issue.severity]++;
      byCategory[issue.category]++;
      if (issue.autoFixable) autoFixable++;
    }

    const byFile = result.files
      .filter((file) => file.issues.length > 0)
      .map((file) => ({ filePath: file.filePath, count: file.issues.length }))
      .sort((a, b) => b.count - a.count);

    return {
      total: issues.length,
      bySeverity,
      byCategory,
      byFile,
      autoFixable,
      highPriority: bySeverity.critical + bySeverity.high,
      filesWithIssues: byFile.length,
      filesWithoutIssues: result.files.length - byFile.length,
    };
  }
}
