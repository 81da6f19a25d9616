/**
 * Issue construction helpers shared by every detector.
 */

import { createHash } from "crypto";
import { Category, Issue, Location, Severity } from "./types";

/**
 * Deterministic issue id: first 12 hex chars of md5("<path>:<checkId>:<line>").
 */
export function generateIssueId(filePath: string, checkId: string, line: number): string {
  return createHash("md5").update(`${filePath}:${checkId}:${line}`).digest("hex").slice(0, 12);
}

export interface IssueInput {
  /** Check or rule id used for the issue id hash */
  checkId: string;
  title: string;
  description: string;
  severity: Severity;
  category: Category;
  location: Location;
  codeSnippet?: string;
  suggestedFix?: string;
  fixDescription?: string;
  confidence?: number;
  autoFixable?: boolean;
  ruleId?: string;
  references?: string[];
  metadata?: Record<string, unknown>;
}

export function createIssue(input: IssueInput): Issue {
  const confidence = input.confidence ?? 1.0;
  return {
    id: generateIssueId(input.location.filePath, input.checkId, input.location.lineStart),
    title: input.title,
    description: input.description,
    severity: input.severity,
    category: input.category,
    location: input.location,
    codeSnippet: input.codeSnippet,
    suggestedFix: input.suggestedFix,
    fixDescription: input.fixDescription,
    confidence: Math.min(1, Math.max(0, confidence)),
    autoFixable: input.autoFixable ?? false,
    ruleId: input.ruleId,
    references: input.references ?? [],
    metadata: { checkId: input.checkId, ...input.metadata },
  };
}

export interface Enrichment {
  aiExplanation?: string;
  suggestedFix?: string;
  fixDescription?: string;
}

/**
 * Copy of an issue with enrichment fields applied. Undefined fields keep
 * their current value.
 */
export function withEnrichment(issue: Issue, enrichment: Enrichment): Issue {
  return {
    ...issue,
    aiExplanation: enrichment.aiExplanation ?? issue.aiExplanation,
    suggestedFix: enrichment.suggestedFix ?? issue.suggestedFix,
    fixDescription: enrichment.fixDescription ?? issue.fixDescription,
  };
}

/**
 * Split content into lines the same way for every detector.
 */
export function splitLines(content: string): string[] {
  const lines = content.split(/\r\n|\r|\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Numbered excerpt around lines start..end (1-based) with `context` lines on
 * each side. The first flagged line is marked with an arrow.
 */
export function getSnippet(lines: readonly string[], start: number, end: number = start, context = 2): string {
  const from = Math.max(0, start - 1 - context);
  const to = Math.min(lines.length, end + context);
  const out: string[] = [];
  for (let i = from; i < to; i++) {
    const prefix = i === start - 1 ? "→ " : "  ";
    out.push(`${prefix}${String(i + 1).padStart(4)} | ${lines[i]}`);
  }
  return out.join("\n");
}
