/**
 * code-auditor public API.
 */

export * from "./analysis/types";
export { createIssue, generateIssueId, withEnrichment, getSnippet, splitLines } from "./analysis/issues";
export type { IssueInput, Enrichment } from "./analysis/issues";
export { calculateMetrics } from "./analysis/metrics";
export { BUILTIN_RULES, LEXICAL_RULES, ANY_LANGUAGE, ruleAppliesTo } from "./analysis/rules";
export type { Rule, RuleDefinition } from "./analysis/rules";
export { RuleCatalog, compileRule } from "./analysis/catalog";
export type { CustomRuleLoadResult } from "./analysis/catalog";
export { analyzeFile, analyzeWithTiming, failedRecord, fileExtension } from "./analysis/detectors/types";
export type {
  Detection,
  Detector,
  IssueLayer,
  SourceReader,
  FileTarget,
  AnalyzeFileOptions,
} from "./analysis/detectors/types";
export { DetectorRegistry } from "./analysis/detectors/registry";
export { LexicalDetector, createLexicalDetectors } from "./analysis/detectors/lexical";
export { LANGUAGE_EXTENSIONS, LEXICAL_LANGUAGES, extensionIncludePatterns } from "./analysis/languages";
export { PythonDetector } from "./analysis/ast/python";
export { TypeScriptDetector } from "./analysis/ast/typescript";
export { DEFAULT_LIMITS } from "./analysis/ast/types";
export type { StructureLimits, StructuralCheck } from "./analysis/ast/types";
export { SecurityScanner, DEFAULT_SECURITY_OPTIONS, shannonEntropy } from "./analysis/security/scanner";
export type { SecurityScanOptions } from "./analysis/security/scanner";
export { similarityRatio } from "./analysis/similarity";
export {
  IssueAggregator,
  SEVERITY_WEIGHTS,
  CATEGORY_WEIGHTS,
  DEFAULT_SIMILARITY_THRESHOLD,
  priorityScore,
  issueSignature,
} from "./analysis/aggregator";
export type { IssueFilter, IssueSummary } from "./analysis/aggregator";
export { assembleResult, buildSummary } from "./analysis/assembler";
export { runPool } from "./analysis/pool";
export {
  AnalysisEngine,
  createDefaultRegistry,
  createCatalog,
  limitsFromConfig,
  patternLayer,
  repartition,
} from "./analysis/orchestration";
export type {
  AnalyzeProjectOptions,
  EngineOptions,
  FileDiscoverer,
  FileState,
  IssueEnricher,
  ProgressEvent,
} from "./analysis/orchestration";
export { discoverFiles } from "./files/discovery";
export type { DiscoveryOptions } from "./files/discovery";
export { readSourceFile, decodeSource } from "./files/reader";
export {
  loadConfig,
  loadConfigFile,
  loadConfigFromString,
  parseConfig,
  createDefaultConfig,
  renderDefaultConfig,
} from "./config/loader";
export type { LoadedConfig } from "./config/loader";
export { configSchema } from "./config/schema";
export type { AuditorConfig, AuditorConfigInput, OutputFormat } from "./config/schema";
export * from "./errors";
export { logger, setLogLevel, getLogLevel } from "./logger";
export { enrichIssues, createIssueEnricher } from "./integrations/llm";
export type { ChatClient, EnricherDependencies } from "./integrations/llm";
export { renderConsole, renderJson, renderSarif, renderReport, parseResultJson } from "./report";
export { VERSION } from "./version";
