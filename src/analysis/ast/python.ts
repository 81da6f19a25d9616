/**
 * Python AST detector using tree-sitter.
 *
 * Tree-sitter keeps parsing past errors, so syntax problems are found by
 * looking for ERROR and missing-token nodes in the tree.
 *
 * Handles: .py, .pyw
 */

import Parser from "tree-sitter";
import Python from "tree-sitter-python";

import { Detection, Detector, fileExtension } from "../detectors/types";
import { createIssue, getSnippet, splitLines } from "../issues";
import { PYTHON_EXTENSIONS } from "../languages";
import { calculateMetrics } from "../metrics";
import { Issue } from "../types";
import { DEFAULT_LIMITS, StructuralCheck, StructureLimits, runChecks } from "./types";

type SyntaxNode = Parser.SyntaxNode;

interface PythonContext {
  filePath: string;
  content: string;
  lines: string[];
  root: SyntaxNode;
  functions: SyntaxNode[];
  limits: StructureLimits;
}

// ============================================================================
// Tree helpers
// ============================================================================

function nodeText(node: SyntaxNode, content: string): string {
  return content.slice(node.startIndex, node.endIndex);
}

function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

function endLineOf(node: SyntaxNode): number {
  return node.endPosition.row + 1;
}

function findAllNodes(root: SyntaxNode, types: ReadonlySet<string>): SyntaxNode[] {
  const results: SyntaxNode[] = [];
  const traverse = (node: SyntaxNode) => {
    if (types.has(node.type)) {
      results.push(node);
    }
    for (const child of node.children) {
      traverse(child);
    }
  };
  traverse(root);
  return results;
}

/**
 * First ERROR node or zero-width node the parser inserted, in document order.
 * A zero-width `block` is a missing indented body.
 */
function findSyntaxError(root: SyntaxNode): SyntaxNode | null {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === "ERROR") {
      return node;
    }
    if (node !== root && node.childCount === 0 && node.startIndex === node.endIndex) {
      return node;
    }
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
  return null;
}

const LEGACY_STATEMENTS: Record<string, string> = {
  print_statement: "print statement",
  exec_statement: "exec statement",
};

/**
 * Python 2 forms the grammar still accepts: print/exec statements and
 * `except Type, name:`.
 */
function findLegacySyntax(root: SyntaxNode): { node: SyntaxNode; construct: string } | null {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    const construct = LEGACY_STATEMENTS[node.type];
    if (construct) {
      return { node, construct };
    }
    const children = node.children;
    if (node.type === "except_clause" && children.some((child) => child.type === ",")) {
      return { node, construct: "'except Type, name' clause" };
    }
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
  return null;
}

function describeSyntaxError(root: SyntaxNode, content: string): { node: SyntaxNode; description: string } | null {
  const error = findSyntaxError(root);
  if (error) {
    let description: string;
    if (error.type === "ERROR") {
      description = `invalid syntax near '${nodeText(error, content).split("\n")[0].slice(0, 40)}'`;
    } else if (error.type === "block") {
      description = "expected an indented block";
    } else {
      description = `missing '${error.type}'`;
    }
    return { node: error, description };
  }
  const legacy = findLegacySyntax(root);
  if (legacy) {
    return { node: legacy.node, description: `Python 2 ${legacy.construct} is not valid Python 3` };
  }
  return null;
}

function functionName(func: SyntaxNode, content: string): string {
  const name = func.childForFieldName("name");
  return name ? nodeText(name, content) : "<anonymous>";
}

const POSITIONAL_PARAMETER_TYPES = new Set([
  "identifier",
  "typed_parameter",
  "default_parameter",
  "typed_default_parameter",
]);

const SPLAT_TYPES = new Set(["list_splat_pattern", "dictionary_splat_pattern", "keyword_separator"]);

function isSplat(param: SyntaxNode): boolean {
  if (SPLAT_TYPES.has(param.type)) {
    return true;
  }
  // `*args: T` parses as a typed_parameter wrapping the splat
  const first = param.children[0];
  return param.type === "typed_parameter" && first !== undefined && SPLAT_TYPES.has(first.type);
}

/**
 * Parameters that can be passed positionally: everything before the first
 * `*`, `*args` or `**kwargs`.
 */
function positionalParameters(func: SyntaxNode): SyntaxNode[] {
  const params = func.childForFieldName("parameters");
  if (!params) return [];
  const result: SyntaxNode[] = [];
  for (const child of params.children) {
    if (isSplat(child)) break;
    if (POSITIONAL_PARAMETER_TYPES.has(child.type)) {
      result.push(child);
    }
  }
  return result;
}

// ============================================================================
// Complexity
// ============================================================================

const DECISION_NODES = new Set([
  "if_statement",
  "elif_clause",
  "for_statement",
  "while_statement",
  "except_clause",
  "with_statement",
  "assert_statement",
  "conditional_expression",
  "for_in_clause",
  "if_clause",
  "boolean_operator",
  "case_clause",
]);

const SCOPE_NODES = new Set(["function_definition", "class_definition", "lambda"]);

/**
 * Cyclomatic complexity of one function, not counting nested functions,
 * classes or lambdas.
 */
export function pythonComplexity(func: SyntaxNode): number {
  let complexity = 1;
  const visit = (node: SyntaxNode) => {
    for (const child of node.children) {
      if (SCOPE_NODES.has(child.type)) continue;
      if (DECISION_NODES.has(child.type)) complexity++;
      visit(child);
    }
  };
  const body = func.childForFieldName("body");
  if (body) visit(body);
  return complexity;
}

// ============================================================================
// Structural checks
// ============================================================================

const checkLongFunctions: StructuralCheck<PythonContext> = (ctx) => {
  const issues: Issue[] = [];
  for (const func of ctx.functions) {
    const length = func.endPosition.row - func.startPosition.row;
    if (length <= ctx.limits.maxFunctionLength) continue;
    const name = functionName(func, ctx.content);
    issues.push(
      createIssue({
        checkId: "long_func",
        title: `Long Function: ${name}`,
        description: `Function has ${length} lines, exceeding the recommended ${ctx.limits.maxFunctionLength} lines`,
        severity: "low",
        category: "code_smell",
        location: { filePath: ctx.filePath, lineStart: lineOf(func), lineEnd: endLineOf(func) },
        codeSnippet: getSnippet(ctx.lines, lineOf(func)),
        suggestedFix: "Consider breaking this function into smaller, more focused functions.",
        metadata: { length },
      })
    );
  }
  return issues;
};

const checkParameterCount: StructuralCheck<PythonContext> = (ctx) => {
  const issues: Issue[] = [];
  for (const func of ctx.functions) {
    const count = positionalParameters(func).length;
    if (count <= ctx.limits.maxParameters) continue;
    const name = functionName(func, ctx.content);
    issues.push(
      createIssue({
        checkId: "many_params",
        title: `Too Many Parameters: ${name}`,
        description: `Function '${name}' has too many parameters (${count}, maximum ${ctx.limits.maxParameters}). Consider using a configuration object.`,
        severity: "low",
        category: "code_smell",
        location: { filePath: ctx.filePath, lineStart: lineOf(func), lineEnd: lineOf(func) },
        metadata: { parameterCount: count },
      })
    );
  }
  return issues;
};

function exceptTarget(clause: SyntaxNode): SyntaxNode | undefined {
  return clause.children.find(
    (child) => child.type !== "except" && child.type !== ":" && child.type !== "block" && child.type !== "comment"
  );
}

const checkExceptionHandlers: StructuralCheck<PythonContext> = (ctx) => {
  const issues: Issue[] = [];
  for (const clause of findAllNodes(ctx.root, new Set(["except_clause"]))) {
    const target = exceptTarget(clause);
    const location = { filePath: ctx.filePath, lineStart: lineOf(clause), lineEnd: endLineOf(clause) };

    if (!target) {
      issues.push(
        createIssue({
          checkId: "bare_except",
          title: "Bare Except Clause",
          description: "Using bare 'except:' is discouraged. Catch specific exceptions instead.",
          severity: "medium",
          category: "best_practice",
          location,
          codeSnippet: getSnippet(ctx.lines, location.lineStart),
          suggestedFix: "Replace with 'except Exception:' or catch specific exceptions",
          autoFixable: true,
        })
      );
      continue;
    }

    const caught = target.type === "as_pattern" ? target.children[0] : target;
    if (caught && nodeText(caught, ctx.content) === "BaseException") {
      issues.push(
        createIssue({
          checkId: "broad_except",
          title: "Overly Broad Exception Handler",
          description: "Catching BaseException also traps KeyboardInterrupt and SystemExit.",
          severity: "low",
          category: "best_practice",
          location,
          codeSnippet: getSnippet(ctx.lines, location.lineStart),
          suggestedFix: "Catch Exception or a more specific exception type",
        })
      );
    }
  }
  return issues;
};

const checkWildcardImports: StructuralCheck<PythonContext> = (ctx) => {
  const issues: Issue[] = [];
  for (const stmt of findAllNodes(ctx.root, new Set(["import_from_statement"]))) {
    if (!stmt.children.some((child) => child.type === "wildcard_import")) continue;
    const moduleNode = stmt.childForFieldName("module_name");
    const moduleName = moduleNode ? nodeText(moduleNode, ctx.content) : "module";
    issues.push(
      createIssue({
        checkId: "wildcard_import",
        title: "Wildcard Import",
        description: `Avoid wildcard imports from ${moduleName}. Import specific names instead.`,
        severity: "low",
        category: "best_practice",
        location: { filePath: ctx.filePath, lineStart: lineOf(stmt), lineEnd: endLineOf(stmt) },
      })
    );
  }
  return issues;
};

const MUTABLE_LITERALS = new Set(["list", "dictionary", "set"]);

const checkMutableDefaults: StructuralCheck<PythonContext> = (ctx) => {
  const issues: Issue[] = [];
  for (const func of ctx.functions) {
    const params = func.childForFieldName("parameters");
    if (!params) continue;
    const hasMutableDefault = params.children.some((param) => {
      if (param.type !== "default_parameter" && param.type !== "typed_default_parameter") return false;
      const value = param.childForFieldName("value");
      return value !== null && MUTABLE_LITERALS.has(value.type);
    });
    if (!hasMutableDefault) continue;
    const name = functionName(func, ctx.content);
    issues.push(
      createIssue({
        checkId: "mutable_default",
        title: `Mutable Default Argument: ${name}`,
        description: "Using mutable objects as default arguments can lead to unexpected behavior",
        severity: "high",
        category: "bug",
        location: { filePath: ctx.filePath, lineStart: lineOf(func), lineEnd: lineOf(func) },
        codeSnippet: getSnippet(ctx.lines, lineOf(func)),
        suggestedFix: "Use None as default and create the mutable object inside the function",
        autoFixable: true,
      })
    );
  }
  return issues;
};

const LITERAL_TYPES = new Set(["integer", "float", "string", "concatenated_string"]);

const checkIdentityLiterals: StructuralCheck<PythonContext> = (ctx) => {
  const issues: Issue[] = [];
  for (const comparison of findAllNodes(ctx.root, new Set(["comparison_operator"]))) {
    const children = comparison.children;
    const flagged = children.some((child, index) => {
      if (child.type !== "is" && child.type !== "is not") return false;
      const comparator = children[index + 1];
      return comparator !== undefined && LITERAL_TYPES.has(comparator.type);
    });
    if (!flagged) continue;
    issues.push(
      createIssue({
        checkId: "is_literal",
        title: "Identity Check with Literal",
        description: "Use '==' for value comparison, not 'is'",
        severity: "medium",
        category: "bug",
        location: { filePath: ctx.filePath, lineStart: lineOf(comparison), lineEnd: endLineOf(comparison) },
        codeSnippet: getSnippet(ctx.lines, lineOf(comparison)),
        suggestedFix: "Replace 'is' with '=='",
        autoFixable: true,
      })
    );
  }
  return issues;
};

const checkComplexity: StructuralCheck<PythonContext> = (ctx) => {
  const issues: Issue[] = [];
  for (const func of ctx.functions) {
    const complexity = pythonComplexity(func);
    if (complexity <= ctx.limits.maxComplexity) continue;
    const name = functionName(func, ctx.content);
    issues.push(
      createIssue({
        checkId: "complexity",
        title: `High Complexity: ${name}`,
        description: `Cyclomatic complexity of ${complexity} exceeds threshold of ${ctx.limits.maxComplexity}`,
        severity: "medium",
        category: "complexity",
        location: { filePath: ctx.filePath, lineStart: lineOf(func), lineEnd: endLineOf(func) },
        suggestedFix: "Split branches into helper functions or use lookup tables",
        metadata: { complexity },
      })
    );
  }
  return issues;
};

export const PYTHON_CHECKS: readonly StructuralCheck<PythonContext>[] = [
  checkLongFunctions,
  checkParameterCount,
  checkExceptionHandlers,
  checkWildcardImports,
  checkMutableDefaults,
  checkIdentityLiterals,
  checkComplexity,
];

// ============================================================================
// Detector
// ============================================================================

export class PythonDetector implements Detector {
  readonly language = "python";
  readonly name = "python-ast";
  private readonly parser: Parser;

  constructor(private readonly limits: StructureLimits = DEFAULT_LIMITS) {
    this.parser = new Parser();
    this.parser.setLanguage(Python);
  }

  canAnalyze(filePath: string): boolean {
    return PYTHON_EXTENSIONS.includes(fileExtension(filePath));
  }

  detect(content: string, filePath: string): Detection {
    // Chunked input sidesteps the binding's limit on large string inputs
    const tree = this.parser.parse((index: number) => content.slice(index, index + 4096));
    const root = tree.rootNode;
    const lines = splitLines(content);

    const syntaxError = describeSyntaxError(root, content);
    if (syntaxError) {
      const { node, description } = syntaxError;
      const line = lineOf(node);
      return {
        issues: [
          createIssue({
            checkId: "syntax",
            title: "Python Syntax Error",
            description,
            severity: "critical",
            category: "bug",
            location: {
              filePath,
              lineStart: line,
              lineEnd: line,
              columnStart: node.startPosition.column + 1,
            },
            codeSnippet: getSnippet(lines, line),
          }),
        ],
      };
    }

    const functions = findAllNodes(root, new Set(["function_definition"]));
    const context: PythonContext = { filePath, content, lines, root, functions, limits: this.limits };

    return {
      issues: runChecks(PYTHON_CHECKS, context),
      metrics: calculateMetrics(
        content,
        this.language,
        functions.map((func) => pythonComplexity(func))
      ),
    };
  }
}
