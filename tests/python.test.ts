/**
 * Tests for the Python AST detector.
 */

import { PythonDetector } from "../src/analysis/ast/python";
import { generateIssueId } from "../src/analysis/issues";

describe("PythonDetector", () => {
  const detector = new PythonDetector();

  describe("canAnalyze", () => {
    it("should accept .py and .pyw files", () => {
      expect(detector.canAnalyze("src/app.py")).toBe(true);
      expect(detector.canAnalyze("tools/run.PYW")).toBe(true);
      expect(detector.canAnalyze("src/app.js")).toBe(false);
      expect(detector.canAnalyze("Makefile")).toBe(false);
    });
  });

  describe("syntax errors", () => {
    it("should report a single critical issue and skip the structural checks", () => {
      const code = `def broken(:
    except:
        pass
`;
      const { issues, metrics } = detector.detect(code, "broken.py");

      expect(issues).toHaveLength(1);
      expect(issues[0].title).toBe("Python Syntax Error");
      expect(issues[0].severity).toBe("critical");
      expect(issues[0].category).toBe("bug");
      expect(issues[0].location.lineStart).toBe(1);
      expect(issues[0].location.columnStart).toBeGreaterThanOrEqual(1);
      expect(issues[0].id).toBe(generateIssueId("broken.py", "syntax", 1));
      expect(metrics).toBeUndefined();
    });

    it("should report a function whose body is not indented", () => {
      const { issues, metrics } = detector.detect("def f():\nreturn 1\n", "indent.py");

      expect(issues).toHaveLength(1);
      expect(issues[0].title).toBe("Python Syntax Error");
      expect(issues[0].description).toBe("expected an indented block");
      expect(issues[0].severity).toBe("critical");
      expect(metrics).toBeUndefined();
    });

    it("should reject a Python 2 print statement", () => {
      const { issues } = detector.detect('print "hi"\n', "legacy.py");

      expect(issues).toHaveLength(1);
      expect(issues[0].description).toBe("Python 2 print statement is not valid Python 3");
      expect(issues[0].location.lineStart).toBe(1);
      expect(issues[0].location.columnStart).toBe(1);
    });

    it("should reject a Python 2 except clause with a comma", () => {
      const code = `try:
    pass
except Exception, e:
    pass
`;
      const { issues } = detector.detect(code, "legacy.py");

      expect(issues).toHaveLength(1);
      expect(issues[0].description).toBe("Python 2 'except Type, name' clause is not valid Python 3");
      expect(issues[0].location.lineStart).toBe(3);
    });

    it("should accept print as a function call", () => {
      const { issues, metrics } = detector.detect('print("hi")\n', "modern.py");

      expect(issues).toEqual([]);
      expect(metrics?.linesOfCode).toBe(1);
    });
  });

  describe("large files", () => {
    it("should analyze thousands of functions without stalling", () => {
      const code = Array.from({ length: 3000 }, (_, i) => `def handler_${i}(value):\n    return value + ${i}\n`).join(
        "\n"
      );
      const { issues, metrics } = detector.detect(code, "big.py");

      expect(issues).toEqual([]);
      expect(metrics?.functionCount).toBe(3000);
    }, 20000);
  });

  describe("parameter count", () => {
    it("should flag a function with seven parameters", () => {
      const code = `def process(a, b, c, d, e, f, g):
    return a
`;
      const { issues } = detector.detect(code, "params.py");

      expect(issues).toHaveLength(1);
      expect(issues[0].title).toBe("Too Many Parameters: process");
      expect(issues[0].description).toBe(
        "Function 'process' has too many parameters (7, maximum 5). Consider using a configuration object."
      );
      expect(issues[0].severity).toBe("low");
      expect(issues[0].category).toBe("code_smell");
      expect(issues[0].metadata).toEqual({ checkId: "many_params", parameterCount: 7 });
    });

    it("should not count *args, **kwargs or keyword-only parameters", () => {
      const code = `def handler(a, b, c, *args, key=None, other=1, **kwargs):
    return a
`;
      expect(detector.detect(code, "splat.py").issues).toEqual([]);
    });

    it("should count typed and defaulted positional parameters", () => {
      const code = `def build(self, a: int, b: str = "x", c=1, d=2, e=3):
    return a
`;
      const { issues } = detector.detect(code, "typed.py");

      expect(issues.map((issue) => issue.metadata.parameterCount)).toEqual([6]);
    });
  });

  describe("exception handlers", () => {
    it("should flag a bare except clause at its line", () => {
      const code = `try:
    run()
except:
    pass
`;
      const { issues } = detector.detect(code, "bare.py");

      expect(issues).toHaveLength(1);
      expect(issues[0].title).toBe("Bare Except Clause");
      expect(issues[0].severity).toBe("medium");
      expect(issues[0].category).toBe("best_practice");
      expect(issues[0].autoFixable).toBe(true);
      expect(issues[0].location.lineStart).toBe(3);
    });

    it("should flag BaseException handlers, with or without a name", () => {
      const code = `try:
    run()
except BaseException:
    log()
try:
    run()
except BaseException as exc:
    log(exc)
`;
      const { issues } = detector.detect(code, "broad.py");

      expect(issues.map((issue) => [issue.title, issue.location.lineStart])).toEqual([
        ["Overly Broad Exception Handler", 3],
        ["Overly Broad Exception Handler", 7],
      ]);
    });

    it("should accept specific exception types", () => {
      const code = `try:
    run()
except (ValueError, KeyError) as exc:
    log(exc)
`;
      expect(detector.detect(code, "specific.py").issues).toEqual([]);
    });
  });

  describe("imports", () => {
    it("should flag wildcard imports", () => {
      const { issues } = detector.detect("from os.path import *\n", "star.py");

      expect(issues).toHaveLength(1);
      expect(issues[0].title).toBe("Wildcard Import");
      expect(issues[0].description).toBe("Avoid wildcard imports from os.path. Import specific names instead.");
    });
  });

  describe("mutable defaults", () => {
    it("should flag list, dict and set defaults once per function", () => {
      const code = `def collect(items=[], seen={}):
    return items


def tags(values: set = {1}):
    return values


def safe(items=None):
    return items
`;
      const { issues } = detector.detect(code, "defaults.py");

      expect(issues.map((issue) => issue.title)).toEqual([
        "Mutable Default Argument: collect",
        "Mutable Default Argument: tags",
      ]);
      expect(issues[0].severity).toBe("high");
      expect(issues[0].category).toBe("bug");
    });
  });

  describe("identity comparisons", () => {
    it("should flag 'is' and 'is not' against literals", () => {
      const code = `if count is 5:
    pass
if name is not "admin":
    pass
if value is None:
    pass
`;
      const { issues } = detector.detect(code, "identity.py");

      expect(issues.map((issue) => [issue.title, issue.location.lineStart])).toEqual([
        ["Identity Check with Literal", 1],
        ["Identity Check with Literal", 3],
      ]);
      expect(issues[0].description).toBe("Use '==' for value comparison, not 'is'");
    });
  });

  describe("size and complexity", () => {
    it("should flag functions longer than the limit", () => {
      const strict = new PythonDetector({ maxFunctionLength: 3, maxParameters: 5, maxComplexity: 15 });
      const code = `def long_one():
    a = 1
    b = 2
    c = 3
    return a + b + c
`;
      const { issues } = strict.detect(code, "long.py");

      expect(issues).toHaveLength(1);
      expect(issues[0].title).toBe("Long Function: long_one");
      expect(issues[0].description).toBe("Function has 4 lines, exceeding the recommended 3 lines");
      expect(issues[0].location).toEqual({ filePath: "long.py", lineStart: 1, lineEnd: 5 });
    });

    it("should flag complexity above the limit and report metrics", () => {
      const strict = new PythonDetector({ maxFunctionLength: 50, maxParameters: 5, maxComplexity: 2 });
      const code = `def branchy(x):
    if x > 1:
        return 1
    elif x < 0:
        return 2
    return 3
`;
      const { issues, metrics } = strict.detect(code, "branchy.py");

      expect(issues).toHaveLength(1);
      expect(issues[0].title).toBe("High Complexity: branchy");
      expect(issues[0].description).toBe("Cyclomatic complexity of 3 exceeds threshold of 2");
      expect(metrics).toEqual({
        linesOfCode: 6,
        sourceLinesOfCode: 6,
        commentLines: 0,
        blankLines: 0,
        cyclomaticComplexity: 3,
        maxComplexity: 3,
        functionCount: 1,
      });
    });

    it("should not count nested functions toward the outer complexity", () => {
      const strict = new PythonDetector({ maxFunctionLength: 50, maxParameters: 5, maxComplexity: 2 });
      const code = `def outer(x):
    def inner(y):
        if y:
            return 1
        return 0
    return inner(x)
`;
      const { metrics } = strict.detect(code, "nested.py");

      expect(metrics?.functionCount).toBe(2);
      expect(metrics?.maxComplexity).toBe(2);
      expect(metrics?.cyclomaticComplexity).toBe(1.5);
    });
  });

  it("should return no issues for clean code", () => {
    const code = `# helpers

def add(a, b):
    return a + b
`;
    const { issues, metrics } = detector.detect(code, "clean.py");

    expect(issues).toEqual([]);
    expect(metrics?.commentLines).toBe(1);
    expect(metrics?.blankLines).toBe(1);
  });

  it("should run the checks independently of each other", () => {
    const code = `from os import *

def process(a, b, c, d, e, f, g, items=[]):
    try:
        return a is 5
    except:
        pass
`;
    const { issues } = detector.detect(code, "all.py");

    expect(issues.map((issue) => issue.metadata.checkId)).toEqual([
      "many_params",
      "bare_except",
      "wildcard_import",
      "mutable_default",
      "is_literal",
    ]);
  });
});
