import { z } from "zod";
import type { RawFinding, ReviewCategory, UnitAssessment } from "../review/types.js";
import { REVIEW_CATEGORIES } from "../review/types.js";
import { ParseError, errorMessage } from "../utils/errors.js";

const aiFindingSchema = z.object({
  line: z.coerce.number().int(),
  endLine: z.coerce.number().int().nullish(),
  severity: z.string().min(1),
  category: z.string().min(1),
  message: z.string().min(1),
  fix: z.string().nullish(),
});

const aiResponseSchema = z.object({
  findings: z.array(z.unknown()),
  assessment: z.string().nullish(),
  score: z.unknown(),
});

const CATEGORY_ALIASES: Readonly<Record<string, ReviewCategory>> = {
  bugs: "bug",
  correctness: "bug",
  "best practice": "best-practice",
  "best practices": "best-practice",
  best_practice: "best-practice",
  bestpractice: "best-practice",
  performance: "best-practice",
  maintainability: "best-practice",
  readability: "style",
  formatting: "style",
  logic: "semantic",
};

export type ParsedAiResponse =
  | { ok: true; findings: RawFinding[]; dropped: number; assessment?: UnitAssessment }
  | { ok: false; error: ParseError };

export function normalizeAiCategory(category: string): ReviewCategory {
  const key = category.trim().toLowerCase();
  const direct = REVIEW_CATEGORIES.find((c) => c === key);
  return direct ?? CATEGORY_ALIASES[key] ?? "semantic";
}

/**
 * Pulls the JSON payload out of a ```json fence, or failing that takes the
 * text from the first `{` to the last `}`. Only a fence alone on its line
 * closes the block; `fix` strings may contain fences.
 */
export function extractJsonBlock(text: string): string | null {
  const fenced = /```(?:json)?[ \t]*\r?\n([\s\S]*?)\r?\n[ \t]*```[ \t]*$/im.exec(text);
  if (fenced) return fenced[1].trim();
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

/**
 * Parses a reviewer response. Individually malformed findings are dropped
 * and counted; a response without a valid top-level object is a ParseError.
 */
export function parseAiResponse(text: string): ParsedAiResponse {
  if (text.trim() === "") {
    return { ok: false, error: new ParseError("Empty response from AI reviewer", text) };
  }

  const block = extractJsonBlock(text);
  if (block === null) {
    return { ok: false, error: new ParseError("No JSON block in AI response", text) };
  }

  let json: unknown;
  try {
    json = JSON.parse(block);
  } catch (err) {
    return {
      ok: false,
      error: new ParseError(`Invalid JSON in AI response: ${errorMessage(err)}`, text, {
        cause: err,
      }),
    };
  }

  const parsed = aiResponseSchema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      error: new ParseError("AI response does not match the expected shape", text, {
        cause: parsed.error,
      }),
    };
  }

  const findings: RawFinding[] = [];
  let dropped = 0;
  for (const item of parsed.data.findings) {
    const f = aiFindingSchema.safeParse(item);
    if (!f.success) {
      dropped++;
      continue;
    }
    findings.push({
      line: f.data.line,
      ...(f.data.endLine != null ? { endLine: f.data.endLine } : {}),
      severity: f.data.severity,
      category: normalizeAiCategory(f.data.category),
      message: f.data.message,
      source: "ai",
      ...(f.data.fix ? { fix: f.data.fix } : {}),
    });
  }

  const { assessment } = parsed.data;
  const score = toScore(parsed.data.score);
  return {
    ok: true,
    findings,
    dropped,
    ...(assessment
      ? {
          assessment: {
            summary: assessment.trim(),
            ...(score !== undefined ? { score } : {}),
          },
        }
      : {}),
  };
}

function toScore(value: unknown): number | undefined {
  const n =
    typeof value === "number"
      ? value
      : typeof value === "string"
        ? parseFloat(value)
        : NaN;
  return Number.isFinite(n) ? Math.max(1, Math.min(10, Math.round(n))) : undefined;
}
