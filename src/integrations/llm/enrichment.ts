/**
 * Issue enrichment: adds model-written explanations and fixes to the top
 * of the ranked issue list.
 */

import { withEnrichment } from "../../analysis/issues";
import { IssueEnricher } from "../../analysis/orchestration";
import { Issue } from "../../analysis/types";
import { fileExtension } from "../../analysis/detectors/types";
import { LlmConfig } from "../../config/schema";
import { config } from "../../env";
import { logger, errorMessage } from "../../logger";
import { createChatClient, createOpenAIClient } from "./client";
import { parseFixResponse } from "./parsing";
import { EXPLAIN_SYSTEM_PROMPT, FIX_SYSTEM_PROMPT, buildExplanationPrompt, buildFixPrompt } from "./prompts";
import { withRetry } from "./retry";
import { ChatClient, EnrichmentOptions, FIX_SEVERITIES, FixSuggestion } from "./types";

export interface EnricherDependencies {
  /** Defaults to an OpenAI client from the environment */
  client?: ChatClient;
  /** Language name for code fences; defaults to the file extension */
  languageOf?: (filePath: string) => string;
}

function defaultLanguageOf(filePath: string): string {
  return fileExtension(filePath) || "text";
}

async function enrichOne(
  issue: Issue,
  client: ChatClient,
  options: EnrichmentOptions,
  language: string
): Promise<Issue> {
  const completion = { temperature: options.temperature, maxTokens: options.maxTokens };
  const ask = (system: string, prompt: string) =>
    withRetry(() => client.complete(system, prompt, completion), options.retry, issue.id);

  try {
    const aiExplanation = issue.aiExplanation ?? (await ask(EXPLAIN_SYSTEM_PROMPT, buildExplanationPrompt(issue, language))).trim();

    let fix: FixSuggestion | undefined;
    if (!issue.suggestedFix && FIX_SEVERITIES.has(issue.severity)) {
      fix = parseFixResponse(await ask(FIX_SYSTEM_PROMPT, buildFixPrompt(issue, language)));
    }

    logger.debug("Enriched issue", { issueId: issue.id, title: issue.title });
    return withEnrichment(issue, {
      aiExplanation,
      suggestedFix: fix?.fixedCode || undefined,
      fixDescription: fix?.explanation || undefined,
    });
  } catch (err) {
    logger.warn("Failed to enrich issue", {
      issueId: issue.id,
      filePath: issue.location.filePath,
      line: issue.location.lineStart,
      error: errorMessage(err),
    });
    return issue;
  }
}

/**
 * Enrich the first `maxIssues` issues, one at a time, and return the full
 * list in the same order. Inputs are never modified.
 */
export async function enrichIssues(
  issues: readonly Issue[],
  client: ChatClient,
  options: EnrichmentOptions,
  languageOf: (filePath: string) => string = defaultLanguageOf
): Promise<Issue[]> {
  const head = issues.slice(0, options.maxIssues);
  logger.info("Enriching issues", { count: head.length, total: issues.length });

  const enriched: Issue[] = [];
  for (const issue of head) {
    enriched.push(await enrichOne(issue, client, options, languageOf(issue.location.filePath)));
  }
  return [...enriched, ...issues.slice(options.maxIssues)];
}

/**
 * Build an enricher from the llm config section. Returns null when no
 * client can be made (no OPENAI_API_KEY and none injected).
 */
export function createIssueEnricher(llm: LlmConfig, deps: EnricherDependencies = {}): IssueEnricher | null {
  let client = deps.client;
  if (!client) {
    const openai = createOpenAIClient();
    if (!openai) {
      logger.warn("OPENAI_API_KEY not configured, skipping enrichment");
      return null;
    }
    client = createChatClient(openai, llm.model ?? config.OPENAI_MODEL);
  }

  const chat = client;
  const options: EnrichmentOptions = {
    maxIssues: llm.max_issues,
    temperature: llm.temperature,
    maxTokens: llm.max_tokens,
    retry: { maxRetries: llm.max_retries, baseDelayMs: llm.retry_delay_ms },
  };
  return (issues) => enrichIssues(issues, chat, options, deps.languageOf);
}
