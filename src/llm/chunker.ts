import type { ReviewUnit } from "../review/types.js";

export interface UnitChunk {
  /** 1-based, inclusive. */
  startLine: number;
  endLine: number;
  lines: readonly string[];
  index: number;
  total: number;
}

const CHARS_PER_TOKEN = 4; // rough estimate

export function estimateTokens(chars: number): number {
  return Math.ceil(chars / CHARS_PER_TOKEN);
}

export function unitChars(unit: ReviewUnit): number {
  return unit.lines.reduce((sum, line) => sum + line.length + 1, 0);
}

/**
 * Splits a unit on line boundaries into consecutive chunks of at most
 * `maxChars` characters (newlines included). A single line longer than the
 * budget becomes a chunk of its own. An empty unit has no chunks.
 */
export function chunkUnit(unit: ReviewUnit, maxChars: number): UnitChunk[] {
  const ranges: Array<{ start: number; end: number }> = [];
  let start = 0;
  let size = 0;

  unit.lines.forEach((line, i) => {
    const cost = line.length + 1;
    if (i > start && size + cost > maxChars) {
      ranges.push({ start, end: i });
      start = i;
      size = 0;
    }
    size += cost;
  });
  if (unit.lines.length > start) {
    ranges.push({ start, end: unit.lines.length });
  }

  return ranges.map((r, index) => ({
    startLine: r.start + 1,
    endLine: r.end,
    lines: unit.lines.slice(r.start, r.end),
    index,
    total: ranges.length,
  }));
}
