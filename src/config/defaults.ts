import type { ReviewConfig } from "../config-loader/schema.js";

const CLANG_TIDY_PATTERN = String.raw`^(?<file>.+?):(?<line>\d+):(?<column>\d+): (?<severity>warning|error|note): (?<message>.+?)(?: \[(?<rule>[^\]]+)\])?$`;

export const DEFAULT_CONFIG: ReviewConfig = {
  concurrency: 4,
  filters: {
    excludePaths: [
      "node_modules/",
      "dist/",
      "build/",
      ".git/",
      "venv/",
      ".venv/",
      "__pycache__/",
      "*.min.js",
    ],
    maxFileSizeKB: 200,
  },
  static: {
    enabled: true,
    timeoutMs: 30000,
    tools: {
      python: {
        command: "pylint",
        args: [
          "--output-format=text",
          "--score=n",
          "--msg-template={path}:{line}:{column}: {category}: {msg} ({symbol})",
          "{file}",
        ],
        versionArgs: ["--version"],
        pattern: String.raw`^(?<file>.+?):(?<line>\d+):(?<column>\d+): (?<severity>[a-z]+): (?<message>.+?)(?: \((?<rule>[a-z0-9-]+)\))?$`,
      },
      javascript: {
        command: "eslint",
        args: ["--format", "unix", "{file}"],
        versionArgs: ["--version"],
        pattern: String.raw`^(?<file>.+?):(?<line>\d+):(?<column>\d+): (?<message>.+) \[(?<severity>[A-Za-z]+)(?:\/(?<rule>[^\]]+))?\]$`,
      },
      typescript: {
        command: "eslint",
        args: ["--format", "unix", "{file}"],
        versionArgs: ["--version"],
        pattern: String.raw`^(?<file>.+?):(?<line>\d+):(?<column>\d+): (?<message>.+) \[(?<severity>[A-Za-z]+)(?:\/(?<rule>[^\]]+))?\]$`,
      },
      cpp: {
        command: "clang-tidy",
        args: ["{file}", "--quiet", "--", "-std=c++17"],
        versionArgs: ["--version"],
        pattern: CLANG_TIDY_PATTERN,
      },
      c: {
        command: "clang-tidy",
        args: ["{file}", "--quiet", "--", "-std=c11"],
        versionArgs: ["--version"],
        pattern: CLANG_TIDY_PATTERN,
      },
      java: {
        command: "checkstyle",
        args: ["-c", "/google_checks.xml", "{file}"],
        versionArgs: ["--version"],
        pattern: String.raw`^\[(?<severity>[A-Z]+)\] (?<file>.+?):(?<line>\d+)(?::(?<column>\d+))?: (?<message>.+?)(?: \[(?<rule>\w+)\])?$`,
      },
    },
  },
  ai: {
    enabled: true,
    model: "claude-sonnet-4-20250514",
    maxTokens: 4096,
    temperature: 0,
    timeoutMs: 60000,
    maxChunkChars: 12000,
    rateLimit: { requests: 20, windowMs: 60000 },
    retry: { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 30000 },
  },
  merge: {
    similarityThreshold: 0.8,
  },
};
