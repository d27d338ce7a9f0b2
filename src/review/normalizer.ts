import type { Finding, RawFinding, ReviewUnit, Severity } from "./types.js";

/**
 * Tool and model severity vocabularies, lower-cased. Covers pylint
 * categories, eslint/clang-tidy/checkstyle levels and the usual
 * high/medium/low wording. Anything else is a warning.
 */
const SEVERITY_LOOKUP: Readonly<Record<string, Severity>> = {
  error: "error",
  err: "error",
  e: "error",
  fatal: "error",
  f: "error",
  critical: "error",
  blocker: "error",
  severe: "error",
  high: "error",

  warning: "warning",
  warn: "warning",
  w: "warning",
  medium: "warning",
  moderate: "warning",
  major: "warning",

  info: "info",
  information: "info",
  i: "info",
  note: "info",
  hint: "info",
  suggestion: "info",
  convention: "info",
  c: "info",
  refactor: "info",
  r: "info",
  low: "info",
  minor: "info",
};

export function normalizeSeverity(token: string): Severity {
  return SEVERITY_LOOKUP[token.trim().toLowerCase()] ?? "warning";
}

export function normalizeMessage(message: string): string {
  const collapsed = message.replace(/\s+/g, " ").trim();
  return collapsed || "(no message)";
}

/** Clamps a line range into [1, max(1, lineCount)], keeping start <= end. */
export function clampRange(
  line: number | undefined,
  endLine: number | undefined,
  lineCount: number
): { lineStart: number; lineEnd: number } {
  const max = Math.max(1, lineCount);
  const clamp = (n: number) => Math.min(max, Math.max(1, Math.trunc(n)));

  const lineStart = line !== undefined && Number.isFinite(line) ? clamp(line) : 1;
  const lineEnd =
    endLine !== undefined && Number.isFinite(endLine)
      ? Math.max(lineStart, clamp(endLine))
      : lineStart;
  return { lineStart, lineEnd };
}

function normalizeFix(fix: string | undefined): string | undefined {
  if (fix === undefined) return undefined;
  const cleaned = fix.replace(/^(?:[ \t]*\r?\n)+/, "").trimEnd();
  return cleaned === "" ? undefined : cleaned;
}

/** Maps an adapter record onto the canonical Finding for `unit`. Pure. */
export function normalizeFinding(raw: RawFinding, unit: ReviewUnit): Finding {
  const { lineStart, lineEnd } = clampRange(raw.line, raw.endLine, unit.lines.length);
  const fix = normalizeFix(raw.fix);
  const rule = raw.rule?.trim();

  return {
    unit: unit.path,
    lineStart,
    lineEnd,
    severity: normalizeSeverity(raw.severity),
    category: raw.category,
    message: normalizeMessage(raw.message),
    source: raw.source,
    ...(fix !== undefined ? { fix } : {}),
    ...(rule ? { rule } : {}),
  };
}

export function normalizeFindings(raws: readonly RawFinding[], unit: ReviewUnit): Finding[] {
  return raws.map((raw) => normalizeFinding(raw, unit));
}
