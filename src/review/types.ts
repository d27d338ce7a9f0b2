import type { Language } from "../walker/languages.js";

export const SEVERITIES = ["info", "warning", "error"] as const;
export type Severity = (typeof SEVERITIES)[number];

/** Categories an analyzer can report on its own. */
export const REVIEW_CATEGORIES = [
  "style",
  "bug",
  "security",
  "semantic",
  "best-practice",
] as const;
export type ReviewCategory = (typeof REVIEW_CATEGORIES)[number];

/** Categories that mark infrastructure failures rather than code issues. */
export type SyntheticCategory =
  | "tooling-error"
  | "ai-unavailable"
  | "unparsed-ai-response";

export type FindingCategory = ReviewCategory | SyntheticCategory;

export type AnalyzerKind = "static" | "ai";
export type FindingSource = AnalyzerKind | "merged";

/** One source file, read once by the walker and never mutated. */
export interface ReviewUnit {
  /** Path relative to the review root, always with forward slashes. */
  readonly path: string;
  readonly absolutePath: string;
  readonly language: Language;
  /** sha256 of the file content, hex encoded. */
  readonly hash: string;
  readonly lines: readonly string[];
}

/** What an adapter emits before normalization. */
export interface RawFinding {
  line?: number;
  endLine?: number;
  /** Tool- or model-specific severity token, e.g. "convention", "Error", "warn". */
  severity: string;
  category: FindingCategory;
  message: string;
  source: AnalyzerKind;
  fix?: string;
  rule?: string;
}

export interface Finding {
  /** Path of the owning ReviewUnit. */
  readonly unit: string;
  readonly lineStart: number;
  readonly lineEnd: number;
  readonly severity: Severity;
  readonly category: FindingCategory;
  readonly message: string;
  readonly source: FindingSource;
  readonly fix?: string;
  readonly rule?: string;
}

/** Overall verdict the AI reviewer gave for a unit, when it gave one. */
export interface UnitAssessment {
  summary: string;
  /** 1-10, 10 being production ready. */
  score?: number;
}

export interface AnalyzerResult {
  findings: RawFinding[];
  assessment?: UnitAssessment;
}

export type SeverityCounts = Record<Severity, number>;

export interface ReportMetadata {
  generatedAt: string;
  tools: Record<string, string>;
  cancelled: boolean;
  counts: SeverityCounts;
}

export interface UnitMetrics {
  /** Non-blank lines. */
  linesOfCode: number;
  /** Estimated cyclomatic complexity: 1 + decision points. */
  complexity: number;
  /** 0-100, higher is easier to maintain. One decimal place. */
  maintainabilityIndex: number;
}

export interface UnitReport {
  unit: ReviewUnit;
  findings: Finding[];
  metrics: UnitMetrics;
  assessment?: UnitAssessment;
}

export interface ReviewReport {
  /** Units in walk order (lexicographic by path). */
  units: UnitReport[];
  metadata: ReportMetadata;
}
