/**
 * Command implementations. Each returns the text for stdout and an exit
 * code instead of touching the process, so they can be driven from tests.
 */

import * as fs from "fs";
import * as path from "path";
import { AnalysisEngine, IssueEnricher } from "../analysis/orchestration";
import { ProjectResult, countBySeverity } from "../analysis/types";
import { CONFIG_FILE_NAMES, LoadedConfig, loadConfig, loadConfigFile, renderDefaultConfig } from "../config/loader";
import { OutputFormat, outputFormatSchema, severitySchema } from "../config/schema";
import { ConfigError, FileAccessError } from "../errors";
import { EnricherDependencies, createIssueEnricher } from "../integrations/llm";
import { logger, setLogLevel } from "../logger";
import { parseResultJson, renderReport } from "../report";

export interface CommandOutcome {
  /** Text for stdout; empty when the report went to a file */
  output: string;
  exitCode: number;
}

export interface AnalyzeCommandOptions {
  format?: string;
  output?: string;
  severity?: string;
  security?: boolean;
  ai?: boolean;
  config?: string;
  rules?: string;
  workers?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface AnalyzeDependencies {
  signal?: AbortSignal;
  enricher?: EnricherDependencies;
}

/** Exit code when the run found critical issues */
export const EXIT_CRITICAL = 1;
/** Exit code for bad arguments, config or paths */
export const EXIT_USAGE = 2;

export function exitCodeFor(result: ProjectResult): number {
  return countBySeverity(result, "critical") > 0 ? EXIT_CRITICAL : 0;
}

export function applyVerbosity(options: { verbose?: boolean; quiet?: boolean }): void {
  if (options.quiet) {
    setLogLevel("error");
  } else if (options.verbose) {
    setLogLevel("debug");
  }
}

function parseFormat(value: string | undefined, fallback: OutputFormat): OutputFormat {
  if (value === undefined) return fallback;
  const parsed = outputFormatSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid output format: ${value}. Use: console, json, sarif`);
  }
  return parsed.data;
}

function parseWorkers(value: string): number {
  const workers = Number(value);
  if (!Number.isInteger(workers) || workers < 1) {
    throw new ConfigError(`Invalid worker count: ${value}`);
  }
  return workers;
}

/**
 * Fold command-line flags over the loaded config.
 */
export function applyOverrides(config: LoadedConfig, options: AnalyzeCommandOptions): LoadedConfig {
  const analysis = { ...config.analysis };
  if (options.severity !== undefined) {
    const parsed = severitySchema.safeParse(options.severity.toLowerCase());
    if (!parsed.success) {
      throw new ConfigError(`Invalid severity: ${options.severity}. Use: critical, high, medium, low, info`);
    }
    analysis.min_severity = parsed.data;
  }
  if (options.workers !== undefined) {
    analysis.max_workers = parseWorkers(options.workers);
  }
  if (options.security !== undefined) {
    analysis.enable_security_scan = options.security;
  }

  const llm = options.ai !== undefined ? { ...config.llm, enabled: options.ai } : config.llm;
  const output = { ...config.output, format: parseFormat(options.format, config.output.format) };

  return { ...config, analysis, llm, output };
}

function writeReport(outputPath: string, text: string): void {
  const resolved = path.resolve(outputPath);
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, text.endsWith("\n") ? text : `${text}\n`, "utf-8");
  } catch (err) {
    throw new FileAccessError(`Cannot write report: ${String(err)}`, resolved);
  }
  logger.info("Report written", { path: resolved });
}

export async function analyzeCommand(
  target: string,
  options: AnalyzeCommandOptions,
  deps: AnalyzeDependencies = {}
): Promise<CommandOutcome> {
  applyVerbosity(options);

  const loaded = options.config ? loadConfigFile(options.config) : loadConfig(path.resolve(target));
  const config = applyOverrides(loaded, options);

  const engine = new AnalysisEngine({
    config,
    customRulesFile: options.rules ? path.resolve(options.rules) : undefined,
  });

  let enricher: IssueEnricher | undefined;
  if (config.llm.enabled) {
    enricher =
      createIssueEnricher(config.llm, {
        languageOf: (filePath) => engine.registry.getDetector(filePath)?.language ?? "text",
        ...deps.enricher,
      }) ?? undefined;
  }

  const result = await engine.analyzeProject(target, {
    signal: deps.signal,
    enricher,
    onProgress: (event) => {
      if (event.state === "succeeded" || event.state === "failed") {
        logger.debug("File analyzed", { ...event });
      }
    },
  });

  const rendered = renderReport(result, config.output.format, {
    showSnippets: config.output.show_snippets,
    verbose: options.verbose,
  });

  if (options.output) {
    writeReport(options.output, rendered);
    return { output: "", exitCode: exitCodeFor(result) };
  }
  return { output: rendered, exitCode: exitCodeFor(result) };
}

/**
 * Write a default .codeauditor.yml into `directory`. Refuses to replace an
 * existing config unless `force` is set.
 */
export function initCommand(directory: string, options: { force?: boolean } = {}): CommandOutcome {
  const root = path.resolve(directory);
  const existing = CONFIG_FILE_NAMES.map((name) => path.join(root, name)).find((file) => fs.existsSync(file));
  if (existing && !options.force) {
    throw new ConfigError(`Config already exists: ${existing} (use --force to overwrite)`, { path: existing });
  }

  const target = path.join(root, CONFIG_FILE_NAMES[0]);
  try {
    fs.mkdirSync(root, { recursive: true });
    fs.writeFileSync(target, renderDefaultConfig(), "utf-8");
  } catch (err) {
    throw new FileAccessError(`Cannot write config: ${String(err)}`, target);
  }
  return { output: `Created ${target}`, exitCode: 0 };
}

export interface ReportCommandOptions {
  format?: string;
  output?: string;
  snippets?: boolean;
  verbose?: boolean;
}

/**
 * Re-render a JSON result saved by `analyze --format json`.
 */
export function reportCommand(resultPath: string, options: ReportCommandOptions): CommandOutcome {
  const resolved = path.resolve(resultPath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, "utf-8");
  } catch (err) {
    throw new FileAccessError(`Cannot read result file: ${String(err)}`, resolved);
  }

  const result = parseResultJson(text, resolved);
  const rendered = renderReport(result, parseFormat(options.format, "console"), {
    showSnippets: options.snippets ?? true,
    verbose: options.verbose,
  });

  if (options.output) {
    writeReport(options.output, rendered);
    return { output: "", exitCode: exitCodeFor(result) };
  }
  return { output: rendered, exitCode: exitCodeFor(result) };
}
