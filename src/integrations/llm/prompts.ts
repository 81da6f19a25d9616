/**
 * Prompt builders for issue enrichment.
 */

import { Issue } from "../../analysis/types";

export const EXPLAIN_SYSTEM_PROMPT = "You are an expert software engineer explaining code issues.";

export const FIX_SYSTEM_PROMPT = "You are an expert programmer fixing code issues.";

function codeBlock(issue: Issue, language: string): string {
  const code = issue.codeSnippet ?? "";
  return `\`\`\`${language}\n${code}\n\`\`\``;
}

function issueHeader(issue: Issue): string {
  const { filePath, lineStart } = issue.location;
  return `Issue: ${issue.title} (${issue.severity} ${issue.category.replace(/_/g, " ")})
Location: ${filePath}:${lineStart}
Details: ${issue.description}`;
}

/**
 * Build the prompt asking for an explanation of one issue.
 */
export function buildExplanationPrompt(issue: Issue, language: string): string {
  return `Explain this code issue in detail:

${issueHeader(issue)}

Code (${language}):
${codeBlock(issue, language)}

Provide:
1. Why this is an issue
2. Potential impact
3. How to fix it

Keep the explanation clear and concise (at most 6 sentences). Respond with plain text only.`;
}

/**
 * Build the prompt asking for a fix. The response format is what
 * parseFixResponse expects.
 */
export function buildFixPrompt(issue: Issue, language: string): string {
  return `Suggest a fix for this code issue:

${issueHeader(issue)}

Original code (${language}):
${codeBlock(issue, language)}

The snippet may include line numbers and a "→" marker on the offending line; do not repeat them.

Format your response exactly as:
EXPLANATION:
[one or two sentences]

FIXED_CODE:
\`\`\`${language}
[fixed code for the marked lines only]
\`\`\``;
}
