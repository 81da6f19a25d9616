/**
 * TypeScript/JavaScript AST detector using ts-morph.
 *
 * One instance per language id; both share the same checks.
 * Syntax errors come from the compiler's syntactic diagnostics.
 */

import {
  ArrowFunction,
  ConstructorDeclaration,
  FunctionDeclaration,
  FunctionExpression,
  GetAccessorDeclaration,
  MethodDeclaration,
  Node,
  Project,
  SetAccessorDeclaration,
  SourceFile,
  SyntaxKind,
  VariableDeclarationKind,
  ts,
} from "ts-morph";

import { Detection, Detector, fileExtension } from "../detectors/types";
import { createIssue, getSnippet, splitLines } from "../issues";
import { JAVASCRIPT_EXTENSIONS, TYPESCRIPT_EXTENSIONS } from "../languages";
import { calculateMetrics } from "../metrics";
import { Issue, Location } from "../types";
import { DEFAULT_LIMITS, StructuralCheck, StructureLimits, runChecks } from "./types";

type FunctionNode =
  | FunctionDeclaration
  | FunctionExpression
  | ArrowFunction
  | MethodDeclaration
  | ConstructorDeclaration
  | GetAccessorDeclaration
  | SetAccessorDeclaration;

interface ScriptContext {
  filePath: string;
  lines: string[];
  sourceFile: SourceFile;
  functions: FunctionNode[];
  limits: StructureLimits;
}

const LANGUAGE_LABELS: Record<string, string> = {
  typescript: "TypeScript",
  javascript: "JavaScript",
};

// ============================================================================
// Helpers
// ============================================================================

function isFunctionNode(node: Node): node is FunctionNode {
  return (
    Node.isFunctionDeclaration(node) ||
    Node.isFunctionExpression(node) ||
    Node.isArrowFunction(node) ||
    Node.isMethodDeclaration(node) ||
    Node.isConstructorDeclaration(node) ||
    Node.isGetAccessorDeclaration(node) ||
    Node.isSetAccessorDeclaration(node)
  );
}

function functionName(node: FunctionNode): string {
  if (Node.isConstructorDeclaration(node)) {
    return "constructor";
  }
  if (!Node.isArrowFunction(node)) {
    const name = node.getName();
    if (name) return name;
  }
  const parent = node.getParent();
  if (parent && (Node.isVariableDeclaration(parent) || Node.isPropertyAssignment(parent))) {
    return parent.getName();
  }
  return "<anonymous>";
}

function nodeLocation(filePath: string, node: Node): Location {
  return {
    filePath,
    lineStart: node.getStartLineNumber(),
    lineEnd: node.getEndLineNumber(),
  };
}

const DECISION_KINDS = new Set<SyntaxKind>([
  SyntaxKind.IfStatement,
  SyntaxKind.ForStatement,
  SyntaxKind.ForInStatement,
  SyntaxKind.ForOfStatement,
  SyntaxKind.WhileStatement,
  SyntaxKind.DoStatement,
  SyntaxKind.CaseClause,
  SyntaxKind.CatchClause,
  SyntaxKind.ConditionalExpression,
]);

const LOGICAL_OPERATORS = new Set<SyntaxKind>([
  SyntaxKind.AmpersandAmpersandToken,
  SyntaxKind.BarBarToken,
  SyntaxKind.QuestionQuestionToken,
]);

/**
 * Cyclomatic complexity of one function body, nested functions excluded.
 */
export function scriptComplexity(func: FunctionNode): number {
  let complexity = 1;
  const visit = (node: Node) => {
    node.forEachChild((child) => {
      if (isFunctionNode(child) || Node.isClassDeclaration(child) || Node.isClassExpression(child)) {
        return undefined;
      }
      if (DECISION_KINDS.has(child.getKind())) {
        complexity++;
      } else if (Node.isBinaryExpression(child) && LOGICAL_OPERATORS.has(child.getOperatorToken().getKind())) {
        complexity++;
      }
      visit(child);
      return undefined;
    });
  };
  const body = func.getBody();
  if (body) visit(body);
  return complexity;
}

function countedParameters(func: FunctionNode): number {
  return func
    .getParameters()
    .filter((param) => !param.isRestParameter() && param.getName() !== "this").length;
}

// ============================================================================
// Structural checks
// ============================================================================

const checkLongFunctions: StructuralCheck<ScriptContext> = (ctx) => {
  const issues: Issue[] = [];
  for (const func of ctx.functions) {
    const length = func.getEndLineNumber() - func.getStartLineNumber();
    if (length <= ctx.limits.maxFunctionLength) continue;
    const name = functionName(func);
    issues.push(
      createIssue({
        checkId: "long_func",
        title: `Long Function: ${name}`,
        description: `Function has ${length} lines, exceeding the recommended ${ctx.limits.maxFunctionLength} lines`,
        severity: "low",
        category: "code_smell",
        location: nodeLocation(ctx.filePath, func),
        codeSnippet: getSnippet(ctx.lines, func.getStartLineNumber()),
        suggestedFix: "Consider breaking this function into smaller, more focused functions.",
        metadata: { length },
      })
    );
  }
  return issues;
};

const checkParameterCount: StructuralCheck<ScriptContext> = (ctx) => {
  const issues: Issue[] = [];
  for (const func of ctx.functions) {
    const count = countedParameters(func);
    if (count <= ctx.limits.maxParameters) continue;
    const name = functionName(func);
    const line = func.getStartLineNumber();
    issues.push(
      createIssue({
        checkId: "many_params",
        title: `Too Many Parameters: ${name}`,
        description: `Function '${name}' has too many parameters (${count}, maximum ${ctx.limits.maxParameters}). Consider using an options object.`,
        severity: "low",
        category: "code_smell",
        location: { filePath: ctx.filePath, lineStart: line, lineEnd: line },
        metadata: { parameterCount: count },
      })
    );
  }
  return issues;
};

const checkEmptyCatch: StructuralCheck<ScriptContext> = (ctx) =>
  ctx.sourceFile
    .getDescendantsOfKind(SyntaxKind.CatchClause)
    .filter((clause) => clause.getBlock().getStatements().length === 0)
    .map((clause) =>
      createIssue({
        checkId: "empty_catch",
        title: "Empty Catch Block",
        description: "Exception caught but not handled",
        severity: "medium",
        category: "best_practice",
        location: nodeLocation(ctx.filePath, clause),
        codeSnippet: getSnippet(ctx.lines, clause.getStartLineNumber()),
        suggestedFix: "Add logging or proper error handling",
      })
    );

const checkWildcardExports: StructuralCheck<ScriptContext> = (ctx) =>
  ctx.sourceFile
    .getExportDeclarations()
    .filter((decl) => decl.isNamespaceExport() && !decl.getNamespaceExport())
    .map((decl) =>
      createIssue({
        checkId: "wildcard_export",
        title: "Wildcard Re-export",
        description: `Avoid 'export *' from ${decl.getModuleSpecifierValue() ?? "module"}. Re-export specific names instead.`,
        severity: "low",
        category: "best_practice",
        location: nodeLocation(ctx.filePath, decl),
      })
    );

const checkLooseEquality: StructuralCheck<ScriptContext> = (ctx) =>
  ctx.sourceFile
    .getDescendantsOfKind(SyntaxKind.BinaryExpression)
    .filter((expr) => {
      const op = expr.getOperatorToken().getKind();
      if (op !== SyntaxKind.EqualsEqualsToken && op !== SyntaxKind.ExclamationEqualsToken) return false;
      // `x == null` is the accepted null-or-undefined idiom
      return (
        expr.getLeft().getKind() !== SyntaxKind.NullKeyword && expr.getRight().getKind() !== SyntaxKind.NullKeyword
      );
    })
    .map((expr) =>
      createIssue({
        checkId: "loose_equality",
        title: "Loose Equality Comparison",
        description: "Use === instead of == for comparison",
        severity: "medium",
        category: "best_practice",
        location: nodeLocation(ctx.filePath, expr),
        codeSnippet: getSnippet(ctx.lines, expr.getStartLineNumber()),
        suggestedFix: "Replace == with === and != with !==",
        autoFixable: true,
      })
    );

const checkVarDeclarations: StructuralCheck<ScriptContext> = (ctx) =>
  ctx.sourceFile
    .getDescendantsOfKind(SyntaxKind.VariableDeclarationList)
    .filter((list) => list.getDeclarationKind() === VariableDeclarationKind.Var)
    .map((list) =>
      createIssue({
        checkId: "var_usage",
        title: "Use of 'var' Keyword",
        description: "Use 'let' or 'const' instead of 'var'",
        severity: "low",
        category: "best_practice",
        location: nodeLocation(ctx.filePath, list),
        suggestedFix: "Replace 'var' with 'let' or 'const'",
        autoFixable: true,
      })
    );

const checkEval: StructuralCheck<ScriptContext> = (ctx) =>
  ctx.sourceFile
    .getDescendantsOfKind(SyntaxKind.CallExpression)
    .filter((call) => {
      const callee = call.getExpression();
      return Node.isIdentifier(callee) && callee.getText() === "eval";
    })
    .map((call) =>
      createIssue({
        checkId: "eval_usage",
        title: "Use of eval()",
        description: "eval() is dangerous and should be avoided",
        severity: "high",
        category: "security",
        location: nodeLocation(ctx.filePath, call),
        codeSnippet: getSnippet(ctx.lines, call.getStartLineNumber()),
        suggestedFix: "Refactor to avoid eval()",
      })
    );

const checkComplexity: StructuralCheck<ScriptContext> = (ctx) => {
  const issues: Issue[] = [];
  for (const func of ctx.functions) {
    const complexity = scriptComplexity(func);
    if (complexity <= ctx.limits.maxComplexity) continue;
    const name = functionName(func);
    issues.push(
      createIssue({
        checkId: "complexity",
        title: `High Complexity: ${name}`,
        description: `Cyclomatic complexity of ${complexity} exceeds threshold of ${ctx.limits.maxComplexity}`,
        severity: "medium",
        category: "complexity",
        location: nodeLocation(ctx.filePath, func),
        suggestedFix: "Split branches into helper functions or use lookup tables",
        metadata: { complexity },
      })
    );
  }
  return issues;
};

export const SCRIPT_CHECKS: readonly StructuralCheck<ScriptContext>[] = [
  checkLongFunctions,
  checkParameterCount,
  checkEmptyCatch,
  checkWildcardExports,
  checkLooseEquality,
  checkVarDeclarations,
  checkEval,
  checkComplexity,
];

// ============================================================================
// Detector
// ============================================================================

interface SyntaxProblem {
  line: number;
  column: number;
  message: string;
}

function firstSyntaxError(content: string, filePath: string): SyntaxProblem | null {
  const output = ts.transpileModule(content, {
    fileName: filePath,
    reportDiagnostics: true,
    compilerOptions: { allowJs: true, jsx: ts.JsxEmit.Preserve },
  });
  const diagnostic = (output.diagnostics ?? []).find(
    (d) => d.category === ts.DiagnosticCategory.Error && d.file !== undefined
  );
  if (!diagnostic || !diagnostic.file) {
    return null;
  }
  const position = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start ?? 0);
  return {
    line: position.line + 1,
    column: position.character + 1,
    message: ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n"),
  };
}

export class TypeScriptDetector implements Detector {
  readonly name: string;
  private readonly extensions: ReadonlySet<string>;
  private readonly project: Project;

  constructor(
    readonly language: "typescript" | "javascript" = "typescript",
    private readonly limits: StructureLimits = DEFAULT_LIMITS
  ) {
    this.name = `${language}-ast`;
    this.extensions = new Set(language === "typescript" ? TYPESCRIPT_EXTENSIONS : JAVASCRIPT_EXTENSIONS);
    this.project = new Project({
      useInMemoryFileSystem: true,
      compilerOptions: {
        allowJs: true,
        checkJs: false,
        noEmit: true,
        skipLibCheck: true,
        target: ts.ScriptTarget.ESNext,
        jsx: ts.JsxEmit.Preserve,
      },
    });
  }

  canAnalyze(filePath: string): boolean {
    return this.extensions.has(fileExtension(filePath));
  }

  detect(content: string, filePath: string): Detection {
    const lines = splitLines(content);

    const syntaxError = firstSyntaxError(content, filePath);
    if (syntaxError) {
      return {
        issues: [
          createIssue({
            checkId: "syntax",
            title: `${LANGUAGE_LABELS[this.language]} Syntax Error`,
            description: syntaxError.message,
            severity: "critical",
            category: "bug",
            location: {
              filePath,
              lineStart: syntaxError.line,
              lineEnd: syntaxError.line,
              columnStart: syntaxError.column,
            },
            codeSnippet: getSnippet(lines, syntaxError.line),
          }),
        ],
      };
    }

    // The source file only lives for this call
    const sourceFile = this.project.createSourceFile(filePath, content, { overwrite: true });
    try {
      const functions = sourceFile.getDescendants().filter(isFunctionNode);
      const context: ScriptContext = { filePath, lines, sourceFile, functions, limits: this.limits };
      return {
        issues: runChecks(SCRIPT_CHECKS, context),
        metrics: calculateMetrics(
          content,
          this.language,
          functions.map((func) => scriptComplexity(func))
        ),
      };
    } finally {
      this.project.removeSourceFile(sourceFile);
    }
  }
}
