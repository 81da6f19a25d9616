/**
 * Tests for the security scan layer.
 */

import { SecurityScanner, shannonEntropy } from "../src/analysis/security/scanner";

describe("shannonEntropy", () => {
  it("should be zero for empty and uniform strings", () => {
    expect(shannonEntropy("")).toBe(0);
    expect(shannonEntropy("aaaa")).toBe(0);
  });

  it("should be log2 of the alphabet for evenly spread characters", () => {
    expect(shannonEntropy("abcd")).toBe(2);
    expect(shannonEntropy("abababab")).toBe(1);
  });
});

describe("SecurityScanner", () => {
  describe("secrets", () => {
    it("should skip low-entropy values at the default threshold", () => {
      const scanner = new SecurityScanner();

      expect(scanner.run('password = "test-secret"\n', "app.py", "python")).toEqual([]);
    });

    it("should report values above a lower threshold", () => {
      const scanner = new SecurityScanner({ enableSecretsScan: true, enableOwaspScan: true, minEntropy: 2 });

      const issues = scanner.run('x = 1\npassword = "test-secret"\n', "app.py", "python");

      expect(issues).toHaveLength(1);
      expect(issues[0].title).toBe("Hardcoded Secret: Hardcoded Password");
      expect(issues[0].description).toBe("Potential hardcoded password detected");
      expect(issues[0].severity).toBe("critical");
      expect(issues[0].location).toEqual({ filePath: "app.py", lineStart: 2, lineEnd: 2 });
      expect(issues[0].metadata.entropy).toBe(2.41);
    });

    it("should not scan secrets when disabled", () => {
      const scanner = new SecurityScanner({ enableSecretsScan: false, enableOwaspScan: true, minEntropy: 0 });

      expect(scanner.run('password = "test-secret"\n', "app.py", "python")).toEqual([]);
    });
  });

  describe("injection", () => {
    const line = 'cursor.execute("SELECT * FROM users WHERE id=" + user_id)\n';

    it("should flag SQL built by concatenation", () => {
      const issues = new SecurityScanner().run(line, "db.py", "python");

      expect(issues.map((issue) => [issue.title, issue.description])).toEqual([
        ["SQL Injection", "SQL Injection via string concatenation"],
      ]);
      expect(issues[0].severity).toBe("high");
    });

    it("should run for every language", () => {
      expect(new SecurityScanner().run(line, "Db.java", "java")).toHaveLength(1);
    });

    it("should be skipped when the OWASP scan is off", () => {
      const scanner = new SecurityScanner({ enableSecretsScan: true, enableOwaspScan: false, minEntropy: 4.5 });

      expect(scanner.run(line, "db.py", "python")).toEqual([]);
    });
  });

  describe("language checks", () => {
    it("should apply Python patterns to Python only", () => {
      const content = "import pickle\nobj = pickle.loads(blob)\n";

      expect(new SecurityScanner().run(content, "load.py", "python").map((issue) => issue.title)).toEqual([
        "Unsafe Pickle Deserialization",
      ]);
      expect(new SecurityScanner().run(content, "load.rb", "ruby")).toEqual([]);
    });

    it("should apply script patterns to JavaScript and TypeScript", () => {
      const content = "localStorage.setItem('password', value);\n";

      const issues = new SecurityScanner().run(content, "store.ts", "typescript");

      expect(issues.map((issue) => [issue.title, issue.severity])).toEqual([["Password in LocalStorage", "critical"]]);
    });
  });
});
