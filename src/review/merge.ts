import type {
  Finding,
  FindingSource,
  ReportMetadata,
  ReviewReport,
  Severity,
  SeverityCounts,
  UnitReport,
} from "./types.js";
import { messagesMatch } from "./similarity.js";
import { compareStrings } from "../utils/compare.js";

export function severityRank(s: Severity): number {
  return s === "error" ? 3 : s === "warning" ? 2 : 1;
}

const SOURCE_RANK: Record<FindingSource, number> = { static: 0, merged: 1, ai: 2 };

/**
 * Report order: start line ascending, severity descending, static before
 * ai. End line, category and message break any remaining ties.
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    a.lineStart - b.lineStart ||
    severityRank(b.severity) - severityRank(a.severity) ||
    SOURCE_RANK[a.source] - SOURCE_RANK[b.source] ||
    a.lineEnd - b.lineEnd ||
    compareStrings(a.category, b.category) ||
    compareStrings(a.message, b.message)
  );
}

export function rangesOverlap(a: Finding, b: Finding): boolean {
  return a.lineStart <= b.lineEnd && b.lineStart <= a.lineEnd;
}

export function isDuplicate(a: Finding, b: Finding, threshold: number): boolean {
  return (
    a.category === b.category &&
    rangesOverlap(a, b) &&
    messagesMatch(a.message, b.message, threshold)
  );
}

function combineFixes(first?: string, second?: string): string | undefined {
  if (!first) return second;
  if (!second || first.includes(second)) return first;
  return `${first}\n${second}`;
}

/**
 * Collapses a duplicate pair. The higher-severity finding is the
 * representative (the one ordered first on a tie); fixes are concatenated and
 * the source becomes "merged" when both analyzers reported it.
 */
function collapse(a: Finding, b: Finding): Finding {
  const [first, second] = compareFindings(a, b) <= 0 ? [a, b] : [b, a];
  const [rep, other] =
    severityRank(second.severity) > severityRank(first.severity)
      ? [second, first]
      : [first, second];
  const fix = combineFixes(rep.fix, other.fix);
  const rule = rep.rule ?? other.rule;

  return {
    unit: rep.unit,
    lineStart: rep.lineStart,
    lineEnd: rep.lineEnd,
    severity: rep.severity,
    category: rep.category,
    message: rep.message,
    source: a.source === b.source ? a.source : "merged",
    ...(fix !== undefined ? { fix } : {}),
    ...(rule !== undefined ? { rule } : {}),
  };
}

/**
 * Dedups and orders one unit's findings from every analyzer. Pure.
 *
 * A collapse can move the representative's range and message, so the result
 * is folded again into the kept list until no kept pair is a duplicate.
 */
export function mergeFindings(findings: readonly Finding[], similarityThreshold: number): Finding[] {
  const kept: Finding[] = [];
  for (const f of [...findings].sort(compareFindings)) {
    let current = f;
    for (;;) {
      const idx = kept.findIndex((k) => isDuplicate(k, current, similarityThreshold));
      if (idx === -1) break;
      current = collapse(kept[idx], current);
      kept.splice(idx, 1);
    }
    kept.push(current);
  }
  return kept.sort(compareFindings);
}

export function countSeverities(units: readonly UnitReport[]): SeverityCounts {
  const counts: SeverityCounts = { info: 0, warning: 0, error: 0 };
  for (const { findings } of units) {
    for (const f of findings) counts[f.severity]++;
  }
  return counts;
}

/**
 * Assembles the run's report. Units are ordered by path; every finding must
 * belong to the unit it is filed under.
 */
export function buildReport(
  units: readonly UnitReport[],
  meta: Omit<ReportMetadata, "counts">
): ReviewReport {
  const ordered = [...units].sort((a, b) => compareStrings(a.unit.path, b.unit.path));
  for (const { unit, findings } of ordered) {
    const stray = findings.find((f) => f.unit !== unit.path);
    if (stray) {
      throw new Error(`Finding for ${stray.unit} filed under ${unit.path}`);
    }
  }

  return {
    units: ordered,
    metadata: {
      generatedAt: meta.generatedAt,
      tools: meta.tools,
      cancelled: meta.cancelled,
      counts: countSeverities(ordered),
    },
  };
}
