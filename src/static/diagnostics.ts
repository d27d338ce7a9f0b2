import { basename } from "node:path";
import type { RawFinding } from "../review/types.js";
import { categorizeDiagnostic } from "./categories.js";

export interface ParsedDiagnostics {
  findings: RawFinding[];
  /** Non-blank lines the pattern did not match. */
  dropped: number;
}

/**
 * Best-effort, line-by-line extraction of diagnostics from tool output.
 * Diagnostics whose `file` group names a different file (headers pulled in
 * by a C++ tool, for instance) are ignored.
 */
export function parseDiagnostics(
  output: string,
  pattern: RegExp,
  unitPath: string
): ParsedDiagnostics {
  const findings: RawFinding[] = [];
  const unitName = basename(unitPath);
  let dropped = 0;

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    if (line.trim() === "") continue;

    const groups = pattern.exec(line)?.groups;
    const lineNumber = groups ? parseInt(groups.line ?? "", 10) : NaN;
    if (!groups || Number.isNaN(lineNumber) || !groups.severity || !groups.message) {
      dropped++;
      continue;
    }

    if (groups.file && basename(groups.file.trim()) !== unitName) continue;

    const endLine = parseInt(groups.endLine ?? "", 10);
    const rule = groups.rule?.trim() || undefined;
    findings.push({
      line: lineNumber,
      ...(Number.isNaN(endLine) ? {} : { endLine }),
      severity: groups.severity,
      category: categorizeDiagnostic(groups.severity, rule),
      message: groups.message,
      source: "static",
      ...(rule ? { rule } : {}),
    });
  }

  return { findings, dropped };
}
