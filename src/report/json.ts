/**
 * JSON output and the reader used by `report` to load it back.
 */

import { z } from "zod";
import { assembleResult } from "../analysis/assembler";
import { ProjectResult } from "../analysis/types";
import { categorySchema, severitySchema } from "../config/schema";
import { ConfigError } from "../errors";

export function renderJson(result: ProjectResult): string {
  return JSON.stringify(result, null, 2);
}

const locationSchema = z.object({
  filePath: z.string(),
  lineStart: z.number().int().positive(),
  lineEnd: z.number().int().positive(),
  columnStart: z.number().int().positive().optional(),
  columnEnd: z.number().int().positive().optional(),
});

const issueSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  severity: severitySchema,
  category: categorySchema,
  location: locationSchema,
  codeSnippet: z.string().optional(),
  suggestedFix: z.string().optional(),
  fixDescription: z.string().optional(),
  aiExplanation: z.string().optional(),
  confidence: z.number().min(0).max(1),
  autoFixable: z.boolean(),
  ruleId: z.string().optional(),
  references: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
});

const metricsSchema = z.object({
  linesOfCode: z.number(),
  sourceLinesOfCode: z.number(),
  commentLines: z.number(),
  blankLines: z.number(),
  cyclomaticComplexity: z.number(),
  maxComplexity: z.number(),
  functionCount: z.number(),
});

const fileRecordSchema = z.object({
  filePath: z.string(),
  language: z.string(),
  issues: z.array(issueSchema),
  metrics: metricsSchema.optional(),
  durationMs: z.number().nonnegative(),
  success: z.boolean(),
  error: z.string().optional(),
});

const savedResultSchema = z.object({
  projectPath: z.string(),
  timestamp: z.string().datetime(),
  totalDurationMs: z.number().nonnegative(),
  files: z.array(fileRecordSchema),
});

/**
 * Parse a saved JSON result. Counts and summaries are recomputed from the
 * file records rather than trusted.
 */
export function parseResultJson(text: string, source = "<input>"): ProjectResult {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${source} is not valid JSON`, { source, error: String(err) });
  }

  const parsed = savedResultSchema.safeParse(data);
  if (!parsed.success) {
    const problems = parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`${source} is not a saved analysis result: ${problems.join("; ")}`, { source, problems });
  }

  return assembleResult(parsed.data.files, {
    projectPath: parsed.data.projectPath,
    startedAt: new Date(parsed.data.timestamp),
    totalDurationMs: parsed.data.totalDurationMs,
  });
}
