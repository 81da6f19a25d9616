/**
 * Tests for project-level orchestration, using an in-memory file tree.
 */

import { parseConfig } from "../src/config/loader";
import { AnalysisAbortedError, FileAccessError } from "../src/errors";
import { withEnrichment } from "../src/analysis/issues";
import { DetectorRegistry } from "../src/analysis/detectors/registry";
import { AnalysisEngine, EngineOptions, ProgressEvent, repartition } from "../src/analysis/orchestration";
import { Issue } from "../src/analysis/types";

const ROOT = "/proj";

const FILES: Record<string, string> = {
  "/proj/src/a.py": "def check(value):\n    return value is 5\n",
  "/proj/src/b.py": 'password = "test-secret"\n',
  "/proj/src/c.js": "if (a == b) {}\n",
  "/proj/notes.xyz": "plain text\n",
};

function engineFor(files: Record<string, string>, options: EngineOptions = {}): AnalysisEngine {
  return new AnalysisEngine({
    discover: async () => Object.keys(files),
    reader: async (absolutePath) => {
      const content = files[absolutePath];
      if (content === undefined) {
        throw new FileAccessError("Cannot read file: ENOENT", absolutePath);
      }
      return content;
    },
    ...options,
  });
}

function titles(issues: readonly Issue[]): string[] {
  return issues.map((issue) => issue.title);
}

describe("AnalysisEngine", () => {
  describe("analyzeProject", () => {
    it("should produce one record per file, sorted by path", async () => {
      const result = await engineFor(FILES).analyzeProject(ROOT);

      expect(result.files.map((file) => file.filePath)).toEqual(["notes.xyz", "src/a.py", "src/b.py", "src/c.js"]);
      expect(result.totalFiles).toBe(4);
      expect(result.projectPath).toBe(ROOT);
    });

    it("should record unsupported files as failures", async () => {
      const result = await engineFor(FILES).analyzeProject(ROOT);
      const notes = result.files[0];

      expect(notes.success).toBe(false);
      expect(notes.language).toBe("unknown");
      expect(notes.error).toBe("Unsupported file type: .xyz");
      expect(notes.issues).toEqual([]);
    });

    it("should rank issues and put them back on their files", async () => {
      const result = await engineFor(FILES).analyzeProject(ROOT);

      expect(result.totalIssues).toBe(3);
      expect(titles(result.files[1].issues)).toEqual(["Identity Check with Literal"]);
      expect(titles(result.files[2].issues)).toEqual(["Hardcoded Password"]);
      expect(titles(result.files[3].issues)).toEqual(["Loose Equality Comparison"]);
      expect(result.summary.severityCounts).toEqual({ info: 0, low: 0, medium: 2, high: 0, critical: 1 });
      expect(result.languages).toEqual({ unknown: 1, python: 2, javascript: 1 });
    });

    it("should turn read failures into failed records", async () => {
      const engine = new AnalysisEngine({
        discover: async () => ["/proj/gone.py"],
        reader: async (absolutePath) => {
          throw new FileAccessError("Cannot read file: ENOENT", absolutePath);
        },
      });

      const result = await engine.analyzeProject(ROOT);

      expect(result.files).toHaveLength(1);
      expect(result.files[0]).toMatchObject({
        filePath: "gone.py",
        language: "python",
        success: false,
        error: "Cannot read file: ENOENT",
      });
    });

    it("should record detector faults without stopping the run", async () => {
      const registry = new DetectorRegistry([
        {
          name: "exploding",
          language: "python",
          canAnalyze: (filePath: string) => filePath.endsWith(".py"),
          detect: () => {
            throw new Error("parser crashed");
          },
        },
      ]);

      const result = await engineFor(FILES, { registry }).analyzeProject(ROOT);

      expect(result.files[1]).toMatchObject({
        filePath: "src/a.py",
        success: false,
        error: "exploding failed: parser crashed",
        issues: [],
      });
      expect(result.files[3].error).toBe("Unsupported file type: .js");
    });

    it("should record a failing detector lookup without rejecting the run", async () => {
      const registry = new DetectorRegistry([
        {
          name: "picky",
          language: "python",
          canAnalyze: (filePath: string) => {
            if (filePath === "bad.py") {
              throw new Error("lookup exploded");
            }
            return filePath.endsWith(".py");
          },
          detect: () => ({ issues: [] }),
        },
      ]);
      const files = { "/proj/bad.py": "x = 1\n", "/proj/good.py": "y = 2\n" };

      const result = await engineFor(files, { registry }).analyzeProject(ROOT);

      expect(result.files.map((record) => [record.filePath, record.success])).toEqual([
        ["bad.py", false],
        ["good.py", true],
      ]);
      expect(result.files[0]).toMatchObject({ language: "unknown", error: "lookup exploded", issues: [] });
    });

    it("should drop duplicates reported by the detector and the security scan", async () => {
      const result = await engineFor({ "/proj/run.js": "const x = eval(code);\n" }).analyzeProject(ROOT);

      expect(titles(result.files[0].issues)).toEqual(["Use of eval()", "Cross-Site Scripting (XSS)"]);
    });

    it("should skip the security scan when disabled", async () => {
      const result = await engineFor({ "/proj/run.js": "const x = eval(code);\n" }, { securityScan: false }).analyzeProject(
        ROOT
      );

      expect(titles(result.files[0].issues)).toEqual(["Use of eval()"]);
    });

    it("should apply the configured minimum severity", async () => {
      const config = parseConfig({ analysis: { min_severity: "high" } });

      const result = await engineFor(FILES, { config }).analyzeProject(ROOT);

      expect(result.totalIssues).toBe(1);
      expect(titles(result.files[2].issues)).toEqual(["Hardcoded Password"]);
      expect(result.files[1].success).toBe(true);
      expect(result.files[1].issues).toEqual([]);
    });

    it("should report a single file relative to its directory", async () => {
      const engine = new AnalysisEngine({
        discover: async (root) => [root],
        reader: async () => "x = 1\n",
      });

      const result = await engine.analyzeProject("/proj/src/one.py");

      expect(result.files.map((file) => file.filePath)).toEqual(["one.py"]);
      expect(result.files[0].success).toBe(true);
    });

    it("should emit progress for every file", async () => {
      const events: ProgressEvent[] = [];

      await engineFor(FILES).analyzeProject(ROOT, { onProgress: (event) => events.push(event) });

      expect(events.filter((event) => event.state === "pending")).toHaveLength(4);
      expect(events.filter((event) => event.state === "analyzing")).toHaveLength(4);
      expect(events.filter((event) => event.state === "succeeded").map((event) => event.filePath).sort()).toEqual([
        "src/a.py",
        "src/b.py",
        "src/c.js",
      ]);
      expect(events.filter((event) => event.state === "failed").map((event) => event.filePath)).toEqual(["notes.xyz"]);
      expect(events[events.length - 1]).toMatchObject({ completed: 4, total: 4 });
    });

    it("should finish even when the progress callback throws", async () => {
      const result = await engineFor(FILES).analyzeProject(ROOT, {
        onProgress: () => {
          throw new Error("listener broke");
        },
      });

      expect(result.totalIssues).toBe(3);
    });

    it("should reject with AnalysisAbortedError when aborted", async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(engineFor(FILES).analyzeProject(ROOT, { signal: controller.signal })).rejects.toBeInstanceOf(
        AnalysisAbortedError
      );
    });

    it("should hand the ranked list to the enricher", async () => {
      const received: string[] = [];
      const enricher = async (issues: readonly Issue[]) => {
        received.push(...titles(issues));
        return issues.map((issue) => withEnrichment(issue, { aiExplanation: "explained" }));
      };

      const result = await engineFor(FILES).analyzeProject(ROOT, { enricher });

      expect(received).toEqual(["Hardcoded Password", "Identity Check with Literal", "Loose Equality Comparison"]);
      expect(result.files[2].issues[0].aiExplanation).toBe("explained");
    });

    it("should keep ranked issues when the enricher fails", async () => {
      const result = await engineFor(FILES).analyzeProject(ROOT, {
        enricher: async () => {
          throw new Error("model unavailable");
        },
      });

      expect(result.totalIssues).toBe(3);
      expect(result.files[2].issues[0].aiExplanation).toBeUndefined();
    });

    it("should freeze the registry and catalog for the run", async () => {
      const engine = engineFor(FILES);
      await engine.analyzeProject(ROOT);

      expect(engine.registry.isFrozen).toBe(true);
      expect(engine.catalog.isFrozen).toBe(true);
    });
  });

  describe("concurrency", () => {
    it("should use max_workers only when parallel analysis is on", () => {
      expect(new AnalysisEngine({ config: parseConfig({ analysis: { max_workers: 8 } }) }).concurrency).toBe(8);
      expect(
        new AnalysisEngine({ config: parseConfig({ analysis: { max_workers: 8, parallel_analysis: false } }) })
          .concurrency
      ).toBe(1);
    });
  });

  describe("repartition", () => {
    it("should keep failed records empty", () => {
      const records = [
        { filePath: "a.py", language: "python", issues: [], durationMs: 0, success: false, error: "boom" },
      ];

      expect(repartition(records, [])).toEqual(records);
    });
  });
});
