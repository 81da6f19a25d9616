/**
 * SARIF 2.1.0 output.
 *
 * @see https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html
 */

import { Issue, ProjectResult, Severity, allIssues } from "../analysis/types";
import { TOOL_NAME, VERSION } from "../version";

export const SARIF_VERSION = "2.1.0";
export const SARIF_SCHEMA =
  "https://raw.githubusercontent.com/oasis-tcs/sarif-spec/master/Schemata/sarif-schema-2.1.0.json";

export type SarifLevel = "none" | "note" | "warning" | "error";

export interface SarifRegion {
  startLine: number;
  endLine: number;
  startColumn?: number;
  endColumn?: number;
}

export interface SarifResult {
  ruleId: string;
  ruleIndex: number;
  level: SarifLevel;
  message: { text: string };
  locations: Array<{
    physicalLocation: {
      artifactLocation: { uri: string; uriBaseId: string };
      region: SarifRegion;
    };
  }>;
  fingerprints: Record<string, string>;
  fixes?: Array<{ description: { text: string } }>;
  properties: Record<string, unknown>;
}

export interface SarifRule {
  id: string;
  name: string;
  shortDescription: { text: string };
  defaultConfiguration: { level: SarifLevel };
  properties: { tags: string[] };
}

export interface SarifLog {
  $schema: string;
  version: string;
  runs: Array<{
    tool: { driver: { name: string; version: string; semanticVersion: string; rules: SarifRule[] } };
    invocations: Array<{ executionSuccessful: boolean; startTimeUtc: string }>;
    results: SarifResult[];
  }>;
}

const LEVELS: Record<Severity, SarifLevel> = {
  critical: "error",
  high: "error",
  medium: "warning",
  low: "note",
  info: "none",
};

export function severityToSarifLevel(severity: Severity): SarifLevel {
  return LEVELS[severity];
}

/**
 * Pattern rules carry their rule id; structural checks record theirs in
 * metadata.checkId.
 */
export function sarifRuleId(issue: Issue): string {
  if (issue.ruleId) return issue.ruleId;
  const checkId = issue.metadata.checkId;
  return typeof checkId === "string" ? checkId : issue.id;
}

function toRegion(issue: Issue): SarifRegion {
  const { lineStart, lineEnd, columnStart, columnEnd } = issue.location;
  return {
    startLine: lineStart,
    endLine: lineEnd,
    ...(columnStart !== undefined ? { startColumn: columnStart } : {}),
    ...(columnEnd !== undefined ? { endColumn: columnEnd + 1 } : {}),
  };
}

export function buildSarif(result: ProjectResult): SarifLog {
  const issues = allIssues(result);
  const rules: SarifRule[] = [];
  const ruleIndex = new Map<string, number>();

  for (const issue of issues) {
    const id = sarifRuleId(issue);
    if (ruleIndex.has(id)) continue;
    ruleIndex.set(id, rules.length);
    rules.push({
      id,
      name: issue.title,
      shortDescription: { text: issue.title },
      defaultConfiguration: { level: severityToSarifLevel(issue.severity) },
      properties: { tags: [issue.category] },
    });
  }

  const results = issues.map((issue): SarifResult => {
    const id = sarifRuleId(issue);
    return {
      ruleId: id,
      ruleIndex: ruleIndex.get(id) ?? 0,
      level: severityToSarifLevel(issue.severity),
      message: { text: issue.description },
      locations: [
        {
          physicalLocation: {
            artifactLocation: { uri: issue.location.filePath, uriBaseId: "%SRCROOT%" },
            region: toRegion(issue),
          },
        },
      ],
      fingerprints: { primary: issue.id },
      ...(issue.suggestedFix ? { fixes: [{ description: { text: issue.fixDescription ?? "Suggested fix" } }] } : {}),
      properties: {
        category: issue.category,
        confidence: issue.confidence,
        autoFixable: issue.autoFixable,
      },
    };
  });

  return {
    $schema: SARIF_SCHEMA,
    version: SARIF_VERSION,
    runs: [
      {
        tool: { driver: { name: TOOL_NAME, version: VERSION, semanticVersion: VERSION, rules } },
        invocations: [{ executionSuccessful: true, startTimeUtc: result.timestamp }],
        results,
      },
    ],
  };
}

export function renderSarif(result: ProjectResult): string {
  return JSON.stringify(buildSarif(result), null, 2);
}
