/**
 * Base error class for all code-auditor errors
 */
export class CodeAuditorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CodeAuditorError";
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Configuration or rule-file problems
 */
export class ConfigError extends CodeAuditorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * A file or directory could not be read or enumerated
 */
export class FileAccessError extends CodeAuditorError {
  constructor(
    message: string,
    public readonly filePath: string,
    context?: Record<string, unknown>
  ) {
    super(message, "FILE_ACCESS_ERROR", { ...context, filePath });
    this.name = "FileAccessError";
  }
}

/**
 * Unexpected fault inside a detector
 */
export class AnalysisError extends CodeAuditorError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line?: number,
    context?: Record<string, unknown>
  ) {
    super(message, "ANALYSIS_ERROR", { ...context, filePath, line });
    this.name = "AnalysisError";
  }
}

/**
 * The caller aborted a project run
 */
export class AnalysisAbortedError extends CodeAuditorError {
  constructor(public readonly completedFiles: number) {
    super("Analysis aborted", "ANALYSIS_ABORTED", { completedFiles });
    this.name = "AnalysisAbortedError";
  }
}

/**
 * Failure talking to the explanation model
 */
export class EnrichmentError extends CodeAuditorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "ENRICHMENT_ERROR", context);
    this.name = "EnrichmentError";
  }
}
