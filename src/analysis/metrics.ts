/**
 * Line-based code metrics.
 */

import { CodeMetrics } from "./types";
import { splitLines } from "./issues";

const HASH_COMMENT_LANGUAGES = new Set(["python", "ruby", "shell"]);

function isCommentLine(trimmed: string, language: string): boolean {
  if (HASH_COMMENT_LANGUAGES.has(language)) {
    return trimmed.startsWith("#");
  }
  if (language === "php") {
    return trimmed.startsWith("//") || trimmed.startsWith("#") || trimmed.startsWith("/*") || trimmed.startsWith("*");
  }
  return trimmed.startsWith("//") || trimmed.startsWith("/*") || trimmed.startsWith("*");
}

/**
 * Count lines and fold per-function complexities into averages.
 */
export function calculateMetrics(
  content: string,
  language: string,
  complexities: readonly number[] = []
): CodeMetrics {
  const lines = splitLines(content);
  let blankLines = 0;
  let commentLines = 0;

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) {
      blankLines++;
    } else if (isCommentLine(trimmed, language)) {
      commentLines++;
    }
  }

  const total = complexities.reduce((sum, value) => sum + value, 0);
  return {
    linesOfCode: lines.length,
    sourceLinesOfCode: lines.length - blankLines - commentLines,
    commentLines,
    blankLines,
    cyclomaticComplexity: complexities.length > 0 ? total / complexities.length : 0,
    maxComplexity: complexities.length > 0 ? Math.max(...complexities) : 0,
    functionCount: complexities.length,
  };
}
