import type { Finding, ReviewReport, UnitReport } from "../review/types.js";
import { compareStrings } from "../utils/compare.js";

export interface JsonFinding {
  line_start: number;
  line_end: number;
  severity: string;
  category: string;
  message: string;
  source: string;
  rule?: string;
  fix?: string;
}

export interface JsonUnit {
  path: string;
  language: string;
  hash: string;
  metrics: { lines_of_code: number; complexity: number; maintainability_index: number };
  assessment?: { summary: string; score?: number };
  findings: JsonFinding[];
}

export interface JsonReport {
  units: JsonUnit[];
  summary: { error: number; warning: number; info: number };
  metadata: {
    generated_at: string;
    units_processed: number;
    cancelled: boolean;
    tools: Record<string, string>;
  };
}

function toJsonFinding(f: Finding): JsonFinding {
  return {
    line_start: f.lineStart,
    line_end: f.lineEnd,
    severity: f.severity,
    category: f.category,
    message: f.message,
    source: f.source,
    ...(f.rule !== undefined ? { rule: f.rule } : {}),
    ...(f.fix !== undefined ? { fix: f.fix } : {}),
  };
}

function toJsonUnit({ unit, findings, metrics, assessment }: UnitReport): JsonUnit {
  return {
    path: unit.path,
    language: unit.language,
    hash: unit.hash,
    metrics: {
      lines_of_code: metrics.linesOfCode,
      complexity: metrics.complexity,
      maintainability_index: metrics.maintainabilityIndex,
    },
    ...(assessment
      ? {
          assessment: {
            summary: assessment.summary,
            ...(assessment.score !== undefined ? { score: assessment.score } : {}),
          },
        }
      : {}),
    findings: findings.map(toJsonFinding),
  };
}

/** Canonical machine-readable shape. Keys are built in a fixed order. */
export function toJsonReport(report: ReviewReport): JsonReport {
  const { counts, tools } = report.metadata;
  return {
    units: report.units.map(toJsonUnit),
    summary: { error: counts.error, warning: counts.warning, info: counts.info },
    metadata: {
      generated_at: report.metadata.generatedAt,
      units_processed: report.units.length,
      cancelled: report.metadata.cancelled,
      tools: Object.fromEntries(
        Object.entries(tools).sort(([a], [b]) => compareStrings(a, b))
      ),
    },
  };
}

export function renderJson(report: ReviewReport): string {
  return `${JSON.stringify(toJsonReport(report), null, 2)}\n`;
}
