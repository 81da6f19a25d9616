/**
 * OpenAI-compatible client setup.
 */

import OpenAI from "openai";
import { config } from "../../env";
import { EnrichmentError } from "../../errors";
import { ChatClient, CompletionOptions } from "./types";

/**
 * Create an OpenAI client from the environment.
 * Returns null if OPENAI_API_KEY is not set.
 */
export function createOpenAIClient(): OpenAI | null {
  if (!config.OPENAI_API_KEY) {
    return null;
  }

  return new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.OPENAI_BASE_URL || undefined,
  });
}

/**
 * Wrap an OpenAI client as a ChatClient bound to one model.
 */
export function createChatClient(openai: OpenAI, model: string = config.OPENAI_MODEL): ChatClient {
  return {
    async complete(system: string, prompt: string, options: CompletionOptions): Promise<string> {
      const completion = await openai.chat.completions.create({
        model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: prompt },
        ],
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      });

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new EnrichmentError("Empty response from model", { model });
      }
      return content;
    },
  };
}
