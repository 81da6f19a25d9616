/**
 * Line-scanning detector for languages without a parser here.
 *
 * Surface patterns only, so false positives are expected.
 */

import { RuleCatalog } from "../catalog";
import { LEXICAL_LANGUAGES } from "../languages";
import { calculateMetrics } from "../metrics";
import { LEXICAL_RULES } from "../rules";
import { Detection, Detector, fileExtension } from "./types";

export class LexicalDetector implements Detector {
  readonly name: string;
  private readonly extensions: ReadonlySet<string>;

  constructor(
    readonly language: string,
    extensions: readonly string[],
    private readonly catalog: RuleCatalog
  ) {
    this.name = `lexical:${language}`;
    this.extensions = new Set(extensions);
  }

  canAnalyze(filePath: string): boolean {
    return this.extensions.has(fileExtension(filePath));
  }

  detect(content: string, filePath: string): Detection {
    return {
      issues: this.catalog.matchFile(filePath, content, this.language),
      metrics: calculateMetrics(content, this.language),
    };
  }
}

/**
 * One detector per lexical language, sharing a frozen catalog.
 */
export function createLexicalDetectors(catalog: RuleCatalog = new RuleCatalog(LEXICAL_RULES)): LexicalDetector[] {
  catalog.freeze();
  return Object.entries(LEXICAL_LANGUAGES).map(
    ([language, extensions]) => new LexicalDetector(language, extensions, catalog)
  );
}
