/**
 * File extensions per language: lowercase, without the dot. Detectors and
 * the default discovery patterns both read from here.
 */

export const PYTHON_EXTENSIONS: readonly string[] = ["py", "pyw"];
export const TYPESCRIPT_EXTENSIONS: readonly string[] = ["ts", "tsx", "mts", "cts"];
export const JAVASCRIPT_EXTENSIONS: readonly string[] = ["js", "jsx", "mjs", "cjs"];

/** Languages handled by line scanning rather than a parser */
export const LEXICAL_LANGUAGES: Readonly<Record<string, readonly string[]>> = {
  java: ["java"],
  go: ["go"],
  ruby: ["rb", "rake"],
  php: ["php"],
  rust: ["rs"],
  c: ["c", "h"],
  cpp: ["cpp", "cc", "cxx", "hpp", "hh", "hxx"],
  csharp: ["cs"],
  swift: ["swift"],
  kotlin: ["kt", "kts"],
  shell: ["sh", "bash"],
};

export const LANGUAGE_EXTENSIONS: Readonly<Record<string, readonly string[]>> = {
  python: PYTHON_EXTENSIONS,
  typescript: TYPESCRIPT_EXTENSIONS,
  javascript: JAVASCRIPT_EXTENSIONS,
  ...LEXICAL_LANGUAGES,
};

/**
 * `*.<ext>` for every extension some built-in detector accepts.
 */
export function extensionIncludePatterns(): string[] {
  return Object.values(LANGUAGE_EXTENSIONS).flatMap((extensions) => extensions.map((ext) => `*.${ext}`));
}
