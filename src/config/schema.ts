/**
 * Configuration schema for .codeauditor.yml files.
 *
 * Keys are snake_case in the file. Every key is optional; parsing fills
 * in the defaults below.
 */

import { z } from "zod";
import { extensionIncludePatterns } from "../analysis/languages";

export const severitySchema = z.enum(["info", "low", "medium", "high", "critical"]);

export const categorySchema = z.enum([
  "security",
  "bug",
  "code_smell",
  "type_error",
  "style",
  "performance",
  "best_practice",
  "duplication",
  "complexity",
  "maintainability",
]);

export const outputFormatSchema = z.enum(["console", "json", "sarif"]);

export type OutputFormat = z.infer<typeof outputFormatSchema>;

export const DEFAULT_INCLUDE_PATTERNS = extensionIncludePatterns();

export const DEFAULT_IGNORE_PATTERNS = ["*.min.js", "*.bundle.js", "*.pyc"];

const analysisSchema = z
  .object({
    /** Issues below this severity are dropped from reports */
    min_severity: severitySchema.default("info"),
    max_complexity: z.number().int().positive().default(15),
    max_function_length: z.number().int().positive().default(50),
    max_parameters: z.number().int().nonnegative().default(5),
    parallel_analysis: z.boolean().default(true),
    max_workers: z.number().int().positive().default(4),
    enable_security_scan: z.boolean().default(true),
    /** Title and description ratio needed to group issues as similar */
    similarity_threshold: z.number().min(0).max(1).default(0.8),
  })
  .default({});

const filesSchema = z
  .object({
    include: z.array(z.string()).default(DEFAULT_INCLUDE_PATTERNS),
    ignore: z.array(z.string()).default(DEFAULT_IGNORE_PATTERNS),
    respect_gitignore: z.boolean().default(true),
  })
  .default({});

const rulesSchema = z
  .object({
    /** JSON or YAML file with extra pattern rules, relative to the project root */
    custom_rules_file: z.string().optional(),
    /** Built-in rule ids to switch off */
    disabled: z.array(z.string()).default([]),
  })
  .default({});

const securitySchema = z
  .object({
    enable_secrets_scan: z.boolean().default(true),
    enable_owasp_scan: z.boolean().default(true),
    min_entropy_threshold: z.number().nonnegative().default(4.5),
  })
  .default({});

const llmSchema = z
  .object({
    enabled: z.boolean().default(false),
    /** Overrides OPENAI_MODEL */
    model: z.string().optional(),
    max_issues: z.number().int().nonnegative().default(10),
    temperature: z.number().min(0).max(2).default(0.3),
    max_tokens: z.number().int().positive().default(2000),
    /** Extra attempts for rate limits, timeouts and 5xx responses */
    max_retries: z.number().int().nonnegative().default(3),
    retry_delay_ms: z.number().int().nonnegative().default(1000),
  })
  .default({});

const outputSchema = z
  .object({
    format: outputFormatSchema.default("console"),
    show_snippets: z.boolean().default(true),
  })
  .default({});

export const configSchema = z.object({
  version: z.number().int().default(1),
  analysis: analysisSchema,
  files: filesSchema,
  rules: rulesSchema,
  security: securitySchema,
  llm: llmSchema,
  output: outputSchema,
});

/** Fully resolved configuration */
export type AuditorConfig = z.infer<typeof configSchema>;

/** What may appear in a config file */
export type AuditorConfigInput = z.input<typeof configSchema>;

export type AnalysisConfig = AuditorConfig["analysis"];
export type FilesConfig = AuditorConfig["files"];
export type RulesConfig = AuditorConfig["rules"];
export type SecurityConfig = AuditorConfig["security"];
export type LlmConfig = AuditorConfig["llm"];
export type OutputConfig = AuditorConfig["output"];
