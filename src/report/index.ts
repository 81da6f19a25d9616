import { ProjectResult } from "../analysis/types";
import { OutputFormat } from "../config/schema";
import { ConsoleReportOptions, renderConsole } from "./console";
import { renderJson } from "./json";
import { renderSarif } from "./sarif";

export { renderConsole, renderJson, renderSarif };
export { parseResultJson } from "./json";
export { buildSarif, severityToSarifLevel, sarifRuleId } from "./sarif";
export type { ConsoleReportOptions } from "./console";
export type { SarifLog, SarifLevel } from "./sarif";

export function renderReport(result: ProjectResult, format: OutputFormat, options: ConsoleReportOptions): string {
  switch (format) {
    case "json":
      return renderJson(result);
    case "sarif":
      return renderSarif(result);
    case "console":
      return renderConsole(result, options);
  }
}
