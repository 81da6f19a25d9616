#!/usr/bin/env node
/**
 * code-auditor CLI entry point
 *
 * Commands:
 * - analyze - Analyze a file or directory
 * - init    - Write a default .codeauditor.yml
 * - report  - Re-render a saved JSON result
 */

import chalk from "chalk";
import { Command } from "commander";
import { CodeAuditorError } from "../errors";
import { errorMessage } from "../logger";
import { VERSION } from "../version";
import { CommandOutcome, EXIT_USAGE, analyzeCommand, applyVerbosity, initCommand, reportCommand } from "./commands";

export function formatError(error: unknown): string {
  return chalk.red(`Error: ${errorMessage(error)}`);
}

function finish(outcome: CommandOutcome): void {
  if (outcome.output) {
    process.stdout.write(outcome.output.endsWith("\n") ? outcome.output : `${outcome.output}\n`);
  }
  process.exitCode = outcome.exitCode;
}

function fail(error: unknown): void {
  console.error(formatError(error));
  process.exitCode = error instanceof CodeAuditorError ? EXIT_USAGE : 1;
}

export function createProgram(): Command {
  const program = new Command();

  program.name("code-auditor").description("Static code analysis with ranked, deduplicated issues").version(VERSION);

  program
    .command("analyze <path>")
    .description("Analyze a file or directory")
    .option("-f, --format <format>", "Output format: console, json, sarif")
    .option("-o, --output <file>", "Write the report to a file instead of stdout")
    .option("-s, --severity <level>", "Minimum severity: critical, high, medium, low, info")
    .option("--security", "Enable the security scanner")
    .option("--no-security", "Disable the security scanner")
    .option("--ai", "Enrich top issues with AI explanations and fixes")
    .option("--no-ai", "Disable AI enrichment")
    .option("-c, --config <file>", "Config file (default: .codeauditor.yml in the project)")
    .option("-r, --rules <file>", "Extra custom rules file (JSON or YAML)")
    .option("-w, --workers <n>", "Maximum concurrent files")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action(async (target: string, options: Record<string, unknown>) => {
      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once("SIGINT", onSigint);
      try {
        finish(
          await analyzeCommand(
            target,
            {
              format: optionalString(options["format"]),
              output: optionalString(options["output"]),
              severity: optionalString(options["severity"]),
              security: optionalBoolean(options["security"]),
              ai: optionalBoolean(options["ai"]),
              config: optionalString(options["config"]),
              rules: optionalString(options["rules"]),
              workers: optionalString(options["workers"]),
              verbose: options["verbose"] === true,
              quiet: options["quiet"] === true,
            },
            { signal: controller.signal }
          )
        );
      } catch (error) {
        fail(error);
      } finally {
        process.removeListener("SIGINT", onSigint);
      }
    });

  program
    .command("init [directory]")
    .description("Write a default .codeauditor.yml")
    .option("--force", "Overwrite an existing config")
    .action((directory: string | undefined, options: Record<string, unknown>) => {
      try {
        finish(initCommand(directory ?? process.cwd(), { force: options["force"] === true }));
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("report <result>")
    .description("Re-render a JSON result saved by analyze")
    .option("-f, --format <format>", "Output format: console, json, sarif", "console")
    .option("-o, --output <file>", "Write the report to a file instead of stdout")
    .option("--no-snippets", "Hide code snippets")
    .option("-v, --verbose", "Show AI explanations")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action((resultPath: string, options: Record<string, unknown>) => {
      const verbose = options["verbose"] === true;
      applyVerbosity({ verbose, quiet: options["quiet"] === true });
      try {
        finish(
          reportCommand(resultPath, {
            format: optionalString(options["format"]),
            output: optionalString(options["output"]),
            snippets: optionalBoolean(options["snippets"]),
            verbose,
          })
        );
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => fail(error));
}
