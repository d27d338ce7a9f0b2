import type { Finding, ReviewReport, Severity, UnitReport } from "../review/types.js";
import { compareStrings } from "../utils/compare.js";

const SEVERITY_EMOJI: Record<Severity, string> = {
  error: "🔴",
  warning: "🟡",
  info: "ℹ️",
};

const SEVERITY_HEADINGS: ReadonlyArray<[Severity, string]> = [
  ["error", "Errors"],
  ["warning", "Warnings"],
  ["info", "Suggestions"],
];

/**
 * Human-readable projection: one section per unit, findings grouped by
 * severity and kept in report order inside each group.
 */
export function renderMarkdown(report: ReviewReport): string {
  const { metadata } = report;
  const parts: string[] = [];

  parts.push("# Code Review Report\n");
  parts.push(
    `Generated ${metadata.generatedAt} | ${report.units.length} files | ` +
      `${metadata.counts.error} errors | ${metadata.counts.warning} warnings | ` +
      `${metadata.counts.info} suggestions\n`
  );
  if (metadata.cancelled) {
    parts.push("> **Run cancelled.** Only files completed before cancellation are included.\n");
  }

  parts.push("| Severity | Count |");
  parts.push("| --- | ---: |");
  for (const [severity, heading] of SEVERITY_HEADINGS) {
    parts.push(`| ${SEVERITY_EMOJI[severity]} ${heading} | ${metadata.counts[severity]} |`);
  }
  parts.push("");

  const tools = Object.entries(metadata.tools).sort(([a], [b]) => compareStrings(a, b));
  if (tools.length > 0) {
    parts.push("### Tools\n");
    for (const [name, version] of tools) {
      parts.push(`- \`${name}\`: ${version}`);
    }
    parts.push("");
  }

  for (const unit of report.units) {
    parts.push(...renderUnit(unit));
  }

  return `${parts.join("\n").trimEnd()}\n`;
}

function renderUnit({ unit, findings, metrics, assessment }: UnitReport): string[] {
  const lines: string[] = [];
  lines.push(`## \`${unit.path}\` (${unit.language})\n`);
  lines.push(
    `Lines of code: ${metrics.linesOfCode} | Complexity: ${metrics.complexity} | ` +
      `Maintainability index: ${metrics.maintainabilityIndex.toFixed(1)}\n`
  );

  if (assessment) {
    const score = assessment.score !== undefined ? ` (${assessment.score}/10)` : "";
    lines.push(`> **AI assessment**${score}: ${assessment.summary.replace(/\s+/g, " ")}\n`);
  }

  if (findings.length === 0) {
    lines.push("No issues found.\n");
    return lines;
  }

  for (const [severity, heading] of SEVERITY_HEADINGS) {
    const group = findings.filter((f) => f.severity === severity);
    if (group.length === 0) continue;
    lines.push(`### ${heading}\n`);
    for (const f of group) lines.push(...formatFinding(f));
    lines.push("");
  }
  return lines;
}

function formatFinding(f: Finding): string[] {
  const range = f.lineStart === f.lineEnd ? `L${f.lineStart}` : `L${f.lineStart}-${f.lineEnd}`;
  const rule = f.rule ? ` (\`${f.rule}\`)` : "";
  const lines = [
    `- ${SEVERITY_EMOJI[f.severity]} **${range}** \`${f.category}\` ${f.message}${rule} _(${f.source})_`,
  ];

  if (f.fix !== undefined) {
    const fence = "`".repeat(Math.max(3, longestBacktickRun(f.fix) + 1));
    lines.push(`  ${fence}`);
    for (const fixLine of f.fix.split("\n")) {
      lines.push(fixLine === "" ? "" : `  ${fixLine}`);
    }
    lines.push(`  ${fence}`);
  }
  return lines;
}

function longestBacktickRun(text: string): number {
  const runs = text.match(/`+/g) ?? [];
  return runs.reduce((max, run) => Math.max(max, run.length), 0);
}
