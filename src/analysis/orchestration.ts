/**
 * Project analysis orchestration.
 *
 * Discovers files, runs each through its detector plus the pattern and
 * security layers on a bounded pool, then dedups, ranks and re-partitions
 * the issues before assembling the final result.
 */

import * as path from "path";
import { LoadedConfig, createDefaultConfig } from "../config/loader";
import { AnalysisAbortedError } from "../errors";
import { DiscoveryOptions, discoverFiles, toPosix } from "../files/discovery";
import { readSourceFile } from "../files/reader";
import { logger, errorMessage } from "../logger";
import { IssueAggregator } from "./aggregator";
import { assembleResult } from "./assembler";
import { PythonDetector } from "./ast/python";
import { StructureLimits } from "./ast/types";
import { TypeScriptDetector } from "./ast/typescript";
import { RuleCatalog } from "./catalog";
import { createLexicalDetectors } from "./detectors/lexical";
import { DetectorRegistry } from "./detectors/registry";
import {
  Detector,
  FileTarget,
  IssueLayer,
  SourceReader,
  analyzeWithTiming,
  failedRecord,
  fileExtension,
} from "./detectors/types";
import { runPool } from "./pool";
import { SecurityScanner } from "./security/scanner";
import { FileRecord, Issue, ProjectResult } from "./types";

export type FileDiscoverer = (root: string, options: DiscoveryOptions) => Promise<string[]>;

/** Per-file lifecycle. There is no retry state. */
export type FileState = "pending" | "analyzing" | "succeeded" | "failed";

export interface ProgressEvent {
  filePath: string;
  state: FileState;
  completed: number;
  total: number;
}

/**
 * Receives the ranked issue list and returns it with enrichment applied.
 */
export type IssueEnricher = (issues: readonly Issue[]) => Promise<Issue[]>;

export interface AnalyzeProjectOptions {
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
  enricher?: IssueEnricher;
}

export interface EngineOptions {
  config?: LoadedConfig;
  registry?: DetectorRegistry;
  catalog?: RuleCatalog;
  discover?: FileDiscoverer;
  reader?: SourceReader;
  /** Overrides analysis.enable_security_scan */
  securityScan?: boolean;
  /** Extra custom rules file, applied after the configured one */
  customRulesFile?: string;
}

export function limitsFromConfig(config: LoadedConfig): StructureLimits {
  return {
    maxFunctionLength: config.analysis.max_function_length,
    maxParameters: config.analysis.max_parameters,
    maxComplexity: config.analysis.max_complexity,
  };
}

/**
 * Python, TypeScript, JavaScript, then one lexical detector per remaining
 * language. Extension sets do not overlap.
 */
export function createDefaultRegistry(limits?: StructureLimits): DetectorRegistry {
  return new DetectorRegistry([
    new PythonDetector(limits),
    new TypeScriptDetector("typescript", limits),
    new TypeScriptDetector("javascript", limits),
    ...createLexicalDetectors(),
  ]);
}

/**
 * Built-in rules minus disabled ids, plus any custom rule files.
 */
export function createCatalog(config: LoadedConfig, extraRulesFile?: string): RuleCatalog {
  const catalog = new RuleCatalog();
  if (config.rules.disabled.length > 0) {
    catalog.disableRules(config.rules.disabled);
  }
  if (config.rules.custom_rules_file) {
    catalog.loadCustomRules(config.resolvePath(config.rules.custom_rules_file));
  }
  if (extraRulesFile) {
    catalog.loadCustomRules(extraRulesFile);
  }
  return catalog;
}

export function patternLayer(catalog: RuleCatalog): IssueLayer {
  return {
    name: "pattern-rules",
    run: (content, filePath, language) => catalog.matchFile(filePath, content, language),
  };
}

/**
 * Put ranked issues back on their files, keeping ranked order within each
 * file. Returns new records.
 */
export function repartition(records: readonly FileRecord[], issues: readonly Issue[]): FileRecord[] {
  const byPath = new Map<string, Issue[]>();
  for (const issue of issues) {
    const list = byPath.get(issue.location.filePath);
    if (list) {
      list.push(issue);
    } else {
      byPath.set(issue.location.filePath, [issue]);
    }
  }
  return records.map((record) => ({ ...record, issues: record.success ? byPath.get(record.filePath) ?? [] : [] }));
}

export class AnalysisEngine {
  readonly config: LoadedConfig;
  readonly registry: DetectorRegistry;
  readonly catalog: RuleCatalog;
  readonly aggregator: IssueAggregator;
  private readonly layers: IssueLayer[];
  private readonly discover: FileDiscoverer;
  private readonly reader: SourceReader;

  constructor(options: EngineOptions = {}) {
    this.config = options.config ?? createDefaultConfig();
    this.registry = options.registry ?? createDefaultRegistry(limitsFromConfig(this.config));
    this.catalog = options.catalog ?? createCatalog(this.config, options.customRulesFile);
    this.aggregator = new IssueAggregator(this.config.analysis.similarity_threshold);
    this.discover = options.discover ?? discoverFiles;
    this.reader = options.reader ?? readSourceFile;

    this.layers = [patternLayer(this.catalog)];
    const securityScan = options.securityScan ?? this.config.analysis.enable_security_scan;
    if (securityScan) {
      this.layers.push(
        new SecurityScanner({
          enableSecretsScan: this.config.security.enable_secrets_scan,
          enableOwaspScan: this.config.security.enable_owasp_scan,
          minEntropy: this.config.security.min_entropy_threshold,
        })
      );
    }
  }

  get concurrency(): number {
    return this.config.analysis.parallel_analysis ? this.config.analysis.max_workers : 1;
  }

  /**
   * Analyze every discovered file under `rootPath`.
   *
   * Rejects only when discovery fails or the run is aborted; per-file
   * problems end up as failed records.
   */
  async analyzeProject(rootPath: string, options: AnalyzeProjectOptions = {}): Promise<ProjectResult> {
    const startedAt = new Date();
    const absoluteRoot = path.resolve(rootPath);

    const files = await this.discover(absoluteRoot, {
      include: this.config.files.include,
      ignore: this.config.files.ignore,
      respectGitignore: this.config.files.respect_gitignore,
    });
    const baseDir = files.length === 1 && files[0] === absoluteRoot ? path.dirname(absoluteRoot) : absoluteRoot;
    const targets: FileTarget[] = files.map((file) => ({
      absolutePath: file,
      relativePath: toPosix(path.relative(baseDir, file)),
    }));

    this.registry.freeze();
    this.catalog.freeze();

    const total = targets.length;
    let completed = 0;
    const emit = (filePath: string, state: FileState) => {
      if (!options.onProgress) return;
      try {
        options.onProgress({ filePath, state, completed, total });
      } catch (err) {
        logger.warn("Progress callback failed", { filePath, error: errorMessage(err) });
      }
    };

    logger.info("Starting analysis", { root: absoluteRoot, files: total, workers: Math.min(this.concurrency, total) });
    targets.forEach((target) => emit(target.relativePath, "pending"));

    const outcome = await runPool(
      targets,
      async (target) => {
        emit(target.relativePath, "analyzing");
        const record = await this.analyzeTarget(target);
        completed++;
        emit(target.relativePath, record.success ? "succeeded" : "failed");
        return record;
      },
      { concurrency: this.concurrency, signal: options.signal }
    );

    if (outcome.aborted) {
      logger.warn("Analysis aborted", { completed: outcome.completed, total });
      throw new AnalysisAbortedError(outcome.completed);
    }

    const records = outcome.results
      .filter((record): record is FileRecord => record !== undefined)
      .sort((a, b) => (a.filePath < b.filePath ? -1 : a.filePath > b.filePath ? 1 : 0));

    const ranked = this.aggregator.rank(this.aggregator.deduplicate(records.flatMap((record) => record.issues)));
    const enriched = options.enricher ? await this.runEnricher(options.enricher, ranked) : ranked;
    const kept = this.aggregator.filter(enriched, { minSeverity: this.config.analysis.min_severity });

    const result = assembleResult(repartition(records, kept), {
      projectPath: absoluteRoot,
      startedAt,
    });

    logger.info("Analysis complete", {
      files: result.totalFiles,
      issues: result.totalIssues,
      durationMs: result.totalDurationMs,
    });
    return result;
  }

  /**
   * Analyze a single file outside a project run. The path is reported
   * relative to the working directory.
   */
  async analyzeFile(filePath: string): Promise<FileRecord> {
    this.registry.freeze();
    this.catalog.freeze();
    const absolutePath = path.resolve(filePath);
    return this.analyzeTarget({
      absolutePath,
      relativePath: toPosix(path.relative(process.cwd(), absolutePath)),
    });
  }

  private async analyzeTarget(target: FileTarget): Promise<FileRecord> {
    let detector: Detector | undefined;
    try {
      detector = this.registry.getDetector(target.relativePath);
      if (!detector) {
        const ext = fileExtension(target.relativePath);
        logger.debug("No detector for file", { filePath: target.relativePath });
        return failedRecord(target.relativePath, "unknown", `Unsupported file type: ${ext ? `.${ext}` : "(none)"}`);
      }
      return await analyzeWithTiming(detector, target, { reader: this.reader, layers: this.layers });
    } catch (err) {
      logger.error("Unexpected failure analyzing file", { filePath: target.relativePath, error: errorMessage(err) });
      return failedRecord(target.relativePath, detector?.language ?? "unknown", errorMessage(err));
    }
  }

  private async runEnricher(enricher: IssueEnricher, ranked: Issue[]): Promise<Issue[]> {
    try {
      return await enricher(ranked);
    } catch (err) {
      logger.warn("Enrichment failed, keeping issues as ranked", { error: errorMessage(err) });
      return ranked;
    }
  }
}
