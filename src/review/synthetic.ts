import type { AnalyzerKind, RawFinding, SyntheticCategory } from "./types.js";

const SYNTHETIC_SEVERITY: Record<SyntheticCategory, string> = {
  "tooling-error": "warning",
  "ai-unavailable": "warning",
  "unparsed-ai-response": "info",
};

/** A finding that reports an infrastructure failure instead of a code issue. */
export function syntheticFinding(
  category: SyntheticCategory,
  source: AnalyzerKind,
  message: string,
  line = 1,
  endLine = line
): RawFinding {
  return {
    line,
    endLine,
    severity: SYNTHETIC_SEVERITY[category],
    category,
    message,
    source,
  };
}

