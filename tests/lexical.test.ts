/**
 * Tests for the line-scanning detectors.
 */

import { RuleCatalog } from "../src/analysis/catalog";
import { LexicalDetector, createLexicalDetectors } from "../src/analysis/detectors/lexical";

function detectorFor(language: string): LexicalDetector {
  const detector = createLexicalDetectors().find((candidate) => candidate.language === language);
  if (!detector) {
    throw new Error(`no lexical detector for ${language}`);
  }
  return detector;
}

describe("LexicalDetector", () => {
  it("should create one detector per language", () => {
    const detectors = createLexicalDetectors();

    expect(detectors.map((detector) => detector.language)).toEqual([
      "java",
      "go",
      "ruby",
      "php",
      "rust",
      "c",
      "cpp",
      "csharp",
      "swift",
      "kotlin",
      "shell",
    ]);
    expect(detectors[0].name).toBe("lexical:java");
  });

  it("should match files by extension", () => {
    const ruby = detectorFor("ruby");

    expect(ruby.canAnalyze("lib/tasks/build.rake")).toBe(true);
    expect(ruby.canAnalyze("app/models/user.RB")).toBe(true);
    expect(ruby.canAnalyze("app.py")).toBe(false);
  });

  it("should flag debug output with its exact columns", () => {
    const { issues } = detectorFor("go").detect('func main() {\n\tfmt.Println("x")\n}\n', "main.go");

    expect(issues).toHaveLength(1);
    expect(issues[0].ruleId).toBe("debug-output-go");
    expect(issues[0].location).toEqual({
      filePath: "main.go",
      lineStart: 2,
      lineEnd: 2,
      columnStart: 2,
      columnEnd: 13,
    });
    expect(issues[0].autoFixable).toBe(true);
  });

  it("should only run the rules of its own language", () => {
    const content = 'puts "hello"\neval(input)\n';

    expect(detectorFor("ruby").detect(content, "a.rb").issues.map((issue) => issue.ruleId)).toEqual([
      "debug-output-ruby",
      "eval-usage",
    ]);
    expect(detectorFor("kotlin").detect(content, "a.kt").issues).toEqual([]);
  });

  it("should tell loose from strict equality in PHP", () => {
    const { issues } = detectorFor("php").detect("if ($a == $b) {}\nif ($a === $b) {}\n", "cmp.php");

    expect(issues).toHaveLength(1);
    expect(issues[0].title).toBe("Loose Equality Comparison");
    expect(issues[0].location.lineStart).toBe(1);
    expect(issues[0].location.columnStart).toBe(8);
  });

  it("should report line metrics without functions", () => {
    const { metrics } = detectorFor("shell").detect("#!/bin/sh\n\n# build\nmake all\n", "build.sh");

    expect(metrics).toEqual({
      linesOfCode: 4,
      sourceLinesOfCode: 1,
      commentLines: 2,
      blankLines: 1,
      cyclomaticComplexity: 0,
      maxComplexity: 0,
      functionCount: 0,
    });
  });

  it("should accept a caller supplied catalog", () => {
    const catalog = new RuleCatalog([
      {
        id: "no-unwrap",
        name: "Unwrap Call",
        description: "unwrap() panics on None",
        pattern: "\\.unwrap\\(\\)",
        severity: "low",
        category: "bug",
        languages: ["rust"],
        message: "Handle the error instead of unwrapping",
      },
    ]);
    const rust = createLexicalDetectors(catalog).find((detector) => detector.language === "rust");

    expect(catalog.isFrozen).toBe(true);
    expect(rust?.detect("let v = read().unwrap();\n", "main.rs").issues.map((issue) => issue.title)).toEqual([
      "Unwrap Call",
    ]);
  });
});
