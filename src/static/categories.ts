import type { ReviewCategory } from "../review/types.js";

/** First match wins; checked against the rule id the tool printed. */
const RULE_CATEGORIES: ReadonlyArray<{ pattern: RegExp; category: ReviewCategory }> = [
  { pattern: /security|insecure|injection|secret|crypt|eval|^cert-|^bandit/i, category: "security" },
  { pattern: /^(bugprone|clang-analyzer)-|no-undef|no-unreachable|no-dupe|no-func-assign|undefined-variable/i, category: "bug" },
  { pattern: /^(modernize|performance|cppcoreguidelines|hicpp)-|complexity|too-many|max-/i, category: "best-practice" },
  { pattern: /^(readability|google|llvm)-|indent|whitespace|naming|line-too-long|linelength/i, category: "style" },
];

const TOKEN_CATEGORIES: Readonly<Record<string, ReviewCategory>> = {
  error: "bug",
  fatal: "bug",
  refactor: "best-practice",
  convention: "style",
};

export function categorizeDiagnostic(severityToken: string, rule?: string): ReviewCategory {
  if (rule) {
    for (const { pattern, category } of RULE_CATEGORIES) {
      if (pattern.test(rule)) return category;
    }
  }
  return TOKEN_CATEGORIES[severityToken.trim().toLowerCase()] ?? "style";
}
