import type { ReviewUnit, UnitMetrics } from "./types.js";
import type { Language } from "../walker/languages.js";

const LONG_LINE = 120;

const C_FAMILY_DECISIONS: readonly RegExp[] = [
  /\bif\s*\(/g,
  /\bfor\s*\(/g,
  /\bwhile\s*\(/g,
  /\bcase\b/g,
  /\bcatch\b/g,
  /\s\?\s/g,
  /&&/g,
  /\|\|/g,
];

const PYTHON_DECISIONS: readonly RegExp[] = [
  /\bif\b/g,
  /\belif\b/g,
  /\bfor\b/g,
  /\bwhile\b/g,
  /\bexcept\b/g,
  /\band\b/g,
  /\bor\b/g,
];

const DECISIONS: Record<Language, readonly RegExp[]> = {
  python: PYTHON_DECISIONS,
  javascript: C_FAMILY_DECISIONS,
  typescript: C_FAMILY_DECISIONS,
  java: C_FAMILY_DECISIONS,
  cpp: C_FAMILY_DECISIONS,
  c: C_FAMILY_DECISIONS,
};

function isCommentLine(line: string, language: Language): boolean {
  if (language === "python") return line.startsWith("#");
  return line.startsWith("//") || line.startsWith("/*") || line.startsWith("*");
}

/**
 * Heuristic size and complexity figures for one unit. Decision points are
 * counted per code line by keyword and operator patterns; comment lines
 * are left out of the count.
 */
export function measureUnit(unit: ReviewUnit): UnitMetrics {
  const lines = unit.lines.map((l) => l.trim()).filter((l) => l !== "");
  if (lines.length === 0) {
    return { linesOfCode: 0, complexity: 1, maintainabilityIndex: 100 };
  }

  let complexity = 1;
  let commentLines = 0;
  let longLines = 0;
  for (const line of lines) {
    if (line.length > LONG_LINE) longLines++;
    if (isCommentLine(line, unit.language)) {
      commentLines++;
      continue;
    }
    for (const pattern of DECISIONS[unit.language]) {
      complexity += line.match(pattern)?.length ?? 0;
    }
  }

  const total = lines.length;
  const index =
    100 - complexity * 2 - (longLines / total) * 20 + (commentLines / total) * 10;

  return {
    linesOfCode: total,
    complexity,
    maintainabilityIndex: Math.round(Math.max(0, Math.min(100, index)) * 10) / 10,
  };
}
