/**
 * Detector contract and the file-level wrappers around it.
 */

import { AnalysisError } from "../../errors";
import { logger, errorMessage } from "../../logger";
import { CodeMetrics, FileRecord, Issue } from "../types";

/**
 * What a detector returns for one file.
 */
export interface Detection {
  issues: Issue[];
  metrics?: CodeMetrics;
}

/**
 * A unit that inspects one file's content.
 *
 * `detect` must be a pure function of its arguments: no writes to the
 * file, no state shared with other detections.
 */
export interface Detector {
  /** Language id reported on file records */
  readonly language: string;
  /** Short name for logs */
  readonly name: string;
  /** Pure function of the file extension */
  canAnalyze(filePath: string): boolean;
  /**
   * @param content - full file text
   * @param filePath - project-relative path used in issue locations
   */
  detect(content: string, filePath: string): Detection;
}

/**
 * Extra issue source run over a file after its detector succeeded
 * (pattern rules, security scan).
 */
export interface IssueLayer {
  readonly name: string;
  run(content: string, filePath: string, language: string): Issue[];
}

export type SourceReader = (absolutePath: string) => Promise<string>;

export interface FileTarget {
  /** Where to read from */
  absolutePath: string;
  /** What to report */
  relativePath: string;
}

export interface AnalyzeFileOptions {
  reader: SourceReader;
  layers?: readonly IssueLayer[];
}

export function failedRecord(
  filePath: string,
  language: string,
  error: string,
  durationMs = 0
): FileRecord {
  return { filePath, language, issues: [], durationMs, success: false, error };
}

/**
 * Lowercased extension without the dot, or "" for none.
 */
export function fileExtension(filePath: string): string {
  const base = filePath.split(/[\\/]/).pop() ?? "";
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(dot + 1).toLowerCase() : "";
}

/**
 * Read a file and run one detector plus any layers over it.
 *
 * Never rejects: read failures and detector faults become a failed
 * record with no issues. A failing layer is logged and contributes
 * nothing.
 */
export async function analyzeFile(
  detector: Detector,
  target: FileTarget,
  options: AnalyzeFileOptions
): Promise<FileRecord> {
  const { relativePath } = target;

  let content: string;
  try {
    content = await options.reader(target.absolutePath);
  } catch (err) {
    logger.warn("Could not read file", { filePath: relativePath, error: errorMessage(err) });
    return failedRecord(relativePath, detector.language, errorMessage(err));
  }

  let detection: Detection;
  try {
    detection = detector.detect(content, relativePath);
  } catch (err) {
    const fault = new AnalysisError(`${detector.name} failed: ${errorMessage(err)}`, relativePath, undefined, {
      detector: detector.name,
    });
    logger.error("Detector failed", fault.toJSON());
    return failedRecord(relativePath, detector.language, fault.message);
  }

  const issues = [...detection.issues];
  for (const layer of options.layers ?? []) {
    try {
      issues.push(...layer.run(content, relativePath, detector.language));
    } catch (err) {
      logger.error("Issue layer failed", {
        filePath: relativePath,
        layer: layer.name,
        error: errorMessage(err),
      });
    }
  }

  return {
    filePath: relativePath,
    language: detector.language,
    issues,
    metrics: detection.metrics,
    durationMs: 0,
    success: true,
  };
}

/**
 * analyzeFile with wall-clock duration recorded on every outcome.
 */
export async function analyzeWithTiming(
  detector: Detector,
  target: FileTarget,
  options: AnalyzeFileOptions
): Promise<FileRecord> {
  const startTime = Date.now();
  let record: FileRecord;
  try {
    record = await analyzeFile(detector, target, options);
  } catch (err) {
    record = failedRecord(target.relativePath, detector.language, errorMessage(err));
  }
  return { ...record, durationMs: Date.now() - startTime };
}
