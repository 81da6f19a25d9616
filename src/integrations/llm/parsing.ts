/**
 * Parsing for fix suggestion responses.
 */

import { FixSuggestion } from "./types";

const FENCED_BLOCK = /```[\w+#-]*[^\S\n]*\n?([\s\S]*?)```/;

/**
 * Split a response of the form
 *
 *   EXPLANATION:
 *   ...
 *   FIXED_CODE:
 *   ```lang
 *   ...
 *   ```
 *
 * into its two parts. A missing FIXED_CODE marker gives empty code.
 */
export function parseFixResponse(content: string): FixSuggestion {
  const markerIndex = content.indexOf("FIXED_CODE:");
  const head = markerIndex === -1 ? content : content.slice(0, markerIndex);
  const explanation = head.replace("EXPLANATION:", "").trim();

  if (markerIndex === -1) {
    return { explanation, fixedCode: "" };
  }

  const tail = content.slice(markerIndex + "FIXED_CODE:".length);
  const fenced = tail.match(FENCED_BLOCK);
  const fixedCode = fenced ? fenced[1] : tail.replace(/```/g, "");
  return { explanation, fixedCode: fixedCode.trim() };
}
