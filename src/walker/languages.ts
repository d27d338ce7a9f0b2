import { ConfigError } from "../utils/errors.js";

export const LANGUAGES = [
  "python",
  "javascript",
  "typescript",
  "java",
  "cpp",
  "c",
] as const;
export type Language = (typeof LANGUAGES)[number];

const EXTENSION_LANGUAGE: Record<string, Language> = {
  ".py": "python",
  ".js": "javascript", ".jsx": "javascript", ".mjs": "javascript", ".cjs": "javascript",
  ".ts": "typescript", ".tsx": "typescript", ".mts": "typescript", ".cts": "typescript",
  ".java": "java",
  ".cpp": "cpp", ".cc": "cpp", ".cxx": "cpp", ".hpp": "cpp", ".hh": "cpp",
  ".c": "c", ".h": "c",
};

export function isLanguage(value: string): value is Language {
  return (LANGUAGES as readonly string[]).includes(value);
}

export function languageForPath(path: string): Language | undefined {
  const slash = path.lastIndexOf("/");
  const name = path.slice(slash + 1);
  const dot = name.lastIndexOf(".");
  if (dot <= 0) return undefined;
  return EXTENSION_LANGUAGE[name.slice(dot).toLowerCase()];
}

/**
 * Parses a CLI language selector: `all`, or a comma-separated list of tags.
 * @throws ConfigError on an empty selector or an unknown tag
 */
export function parseLanguageSelector(selector: string): Language[] {
  const trimmed = selector.trim().toLowerCase();
  if (trimmed === "all") return [...LANGUAGES];

  const tags = trimmed
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean);
  if (tags.length === 0) {
    throw new ConfigError("Language selector is empty");
  }

  const unknown = tags.filter((t) => !isLanguage(t));
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown language(s): ${unknown.join(", ")}. Supported: ${LANGUAGES.join(", ")}, all`
    );
  }
  return [...new Set(tags.filter(isLanguage))];
}
