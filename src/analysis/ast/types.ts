/**
 * Shared pieces of the AST-based detectors.
 */

import { Issue } from "../types";

/**
 * Thresholds for the structural checks.
 */
export interface StructureLimits {
  /** Line span (end - start) above which a function is "long" */
  maxFunctionLength: number;
  /** Positional parameter count above which a signature is flagged */
  maxParameters: number;
  /** Per-function cyclomatic complexity above which a function is flagged */
  maxComplexity: number;
}

export const DEFAULT_LIMITS: Readonly<StructureLimits> = {
  maxFunctionLength: 50,
  maxParameters: 5,
  maxComplexity: 15,
};

/**
 * One structural check. Checks never see each other's output, so the
 * battery can run in any order.
 */
export type StructuralCheck<TContext> = (context: TContext) => Issue[];

/**
 * Run every check against the same context and concatenate the results.
 */
export function runChecks<TContext>(
  checks: readonly StructuralCheck<TContext>[],
  context: TContext
): Issue[] {
  return checks.flatMap((check) => check(context));
}
