import type { AnalyzerKind, AnalyzerResult, ReviewUnit } from "../review/types.js";

/**
 * A producer of findings for one unit. Implementations must not reject for
 * expected failures (missing tool, exhausted retries, bad output): those
 * come back as synthetic findings so the unit still completes.
 */
export interface Analyzer {
  readonly kind: AnalyzerKind;
  analyze(unit: ReviewUnit): Promise<AnalyzerResult>;
}
