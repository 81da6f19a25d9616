/**
 * Configuration loader.
 *
 * Loads .codeauditor.yml (or .yaml / .json) from a project root,
 * validates it and applies defaults.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { ConfigError } from "../errors";
import { logger, errorMessage } from "../logger";
import {
  AnalysisConfig,
  AuditorConfig,
  FilesConfig,
  LlmConfig,
  OutputConfig,
  RulesConfig,
  SecurityConfig,
  configSchema,
} from "./schema";

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /** Fully resolved values */
  raw: AuditorConfig;
  analysis: AnalysisConfig;
  files: FilesConfig;
  rules: RulesConfig;
  security: SecurityConfig;
  llm: LlmConfig;
  output: OutputConfig;

  /** File the values came from, if any */
  source?: string;

  /**
   * Resolve a path from the config (e.g. the custom rules file) against
   * the directory the config was loaded from.
   */
  resolvePath(relative: string): string;
}

/**
 * Config file names, in lookup order.
 */
export const CONFIG_FILE_NAMES = [".codeauditor.yml", ".codeauditor.yaml", ".codeauditor.json"];

function parseText(text: string, fileName: string): unknown {
  return path.extname(fileName).toLowerCase() === ".json" ? JSON.parse(text) : yaml.load(text);
}

/**
 * Validate already-parsed data. Throws ConfigError with every problem
 * listed.
 */
export function parseConfig(data: unknown, baseDir: string = process.cwd(), source?: string): LoadedConfig {
  const parsed = configSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`, { source, problems });
  }
  return buildLoadedConfig(parsed.data, baseDir, source);
}

/**
 * Load configuration from a project root. A missing file gives defaults;
 * an invalid one logs a warning and gives defaults.
 */
export function loadConfig(projectRoot: string): LoadedConfig {
  const baseDir = fs.existsSync(projectRoot) && fs.statSync(projectRoot).isFile() ? path.dirname(projectRoot) : projectRoot;

  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(baseDir, name);
    if (!fs.existsSync(configPath)) continue;
    try {
      return loadConfigFile(configPath);
    } catch (err) {
      logger.warn("Failed to load config, using defaults", { configPath, error: errorMessage(err) });
      return createDefaultConfig(baseDir);
    }
  }

  return createDefaultConfig(baseDir);
}

/**
 * Load an explicitly named config file. Any problem is a ConfigError.
 */
export function loadConfigFile(configPath: string): LoadedConfig {
  let data: unknown;
  try {
    data = parseText(fs.readFileSync(configPath, "utf-8"), configPath);
  } catch (err) {
    throw new ConfigError(`Failed to read ${configPath}: ${errorMessage(err)}`, { source: configPath });
  }
  return parseConfig(data, path.dirname(path.resolve(configPath)), configPath);
}

/**
 * Load configuration from a YAML string without touching the filesystem.
 * Invalid input logs a warning and gives defaults.
 */
export function loadConfigFromString(yamlContent: string, baseDir: string = process.cwd()): LoadedConfig {
  try {
    return parseConfig(yaml.load(yamlContent), baseDir);
  } catch (err) {
    logger.warn("Failed to parse YAML config string, using defaults", { error: errorMessage(err) });
    return createDefaultConfig(baseDir);
  }
}

export function createDefaultConfig(baseDir: string = process.cwd()): LoadedConfig {
  return buildLoadedConfig(configSchema.parse({}), baseDir);
}

/**
 * YAML text written by `init`.
 */
export function renderDefaultConfig(): string {
  const header = "# code-auditor configuration\n# Every key is optional; removed keys fall back to these defaults.\n";
  return header + yaml.dump(configSchema.parse({}), { lineWidth: 100, skipInvalid: true });
}

function buildLoadedConfig(config: AuditorConfig, baseDir: string, source?: string): LoadedConfig {
  function resolvePath(relative: string): string {
    return path.resolve(baseDir, relative);
  }

  return {
    raw: config,
    analysis: config.analysis,
    files: config.files,
    rules: config.rules,
    security: config.security,
    llm: config.llm,
    output: config.output,
    source,
    resolvePath,
  };
}
