/**
 * Builds the immutable project result from finished file records.
 */

import {
  FileRecord,
  ProjectResult,
  ResultSummary,
  emptyCategoryCounts,
  emptySeverityCounts,
} from "./types";

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function buildSummary(files: readonly FileRecord[]): ResultSummary {
  const severityCounts = emptySeverityCounts();
  const categoryCounts = emptyCategoryCounts();
  let autoFixableCount = 0;

  for (const file of files) {
    for (const issue of file.issues) {
      severityCounts[issue.severity]++;
      categoryCounts[issue.category]++;
      if (issue.autoFixable) autoFixableCount++;
    }
  }

  return { severityCounts, categoryCounts, autoFixableCount };
}

export interface AssembleOptions {
  projectPath: string;
  startedAt: Date;
  /** Defaults to now - startedAt */
  totalDurationMs?: number;
}

/**
 * Fold file records into a frozen ProjectResult. Records are taken in the
 * order given.
 */
export function assembleResult(files: readonly FileRecord[], options: AssembleOptions): ProjectResult {
  const languages: Record<string, number> = {};
  for (const file of files) {
    languages[file.language] = (languages[file.language] ?? 0) + 1;
  }

  const result: ProjectResult = {
    projectPath: options.projectPath,
    timestamp: options.startedAt.toISOString(),
    files: [...files],
    totalFiles: files.length,
    totalIssues: files.reduce((sum, file) => sum + file.issues.length, 0),
    totalDurationMs: options.totalDurationMs ?? Date.now() - options.startedAt.getTime(),
    languages,
    summary: buildSummary(files),
  };

  return deepFreeze(result);
}
