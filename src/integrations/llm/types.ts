/**
 * Enrichment types and constants.
 */

import { RetryPolicy } from "./retry";

/** Severities that also get a suggested fix */
export const FIX_SEVERITIES = new Set(["critical", "high", "medium"]);

export interface CompletionOptions {
  temperature: number;
  maxTokens: number;
}

/**
 * Minimal chat completion surface. The OpenAI-backed implementation lives
 * in client.ts; tests pass a fake.
 */
export interface ChatClient {
  complete(system: string, prompt: string, options: CompletionOptions): Promise<string>;
}

/**
 * A parsed fix suggestion.
 */
export interface FixSuggestion {
  explanation: string;
  fixedCode: string;
}

export interface EnrichmentOptions {
  /** Only the first `maxIssues` of the ranked list are enriched */
  maxIssues: number;
  temperature: number;
  maxTokens: number;
  retry: RetryPolicy;
}
