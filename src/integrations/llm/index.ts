/**
 * AI enrichment for ranked issues.
 *
 * Advisory only: a failed call leaves the issue as it was, and a missing
 * API key disables enrichment entirely.
 */

export type { ChatClient, CompletionOptions, EnrichmentOptions, FixSuggestion } from "./types";
export { createOpenAIClient, createChatClient } from "./client";
export { withRetry, isTransientError, errorStatus, backoffDelay } from "./retry";
export type { RetryPolicy } from "./retry";
export { parseFixResponse } from "./parsing";
export { buildExplanationPrompt, buildFixPrompt } from "./prompts";
export { enrichIssues, createIssueEnricher } from "./enrichment";
export type { EnricherDependencies } from "./enrichment";
