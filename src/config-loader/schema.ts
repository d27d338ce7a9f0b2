import { z } from "zod";
import { LANGUAGES } from "../walker/languages.js";

const REQUIRED_GROUPS = ["line", "severity", "message"] as const;

function isDiagnosticPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
  } catch {
    return false;
  }
  return REQUIRED_GROUPS.every((g) => pattern.includes(`(?<${g}>`));
}

const staticToolSchema = z.object({
  command: z.string().min(1),
  /** `{file}` is replaced by the unit's absolute path. */
  args: z.array(z.string()).default(["{file}"]),
  versionArgs: z.array(z.string()).default(["--version"]),
  /** One diagnostic per output line; named groups line, severity, message (+ endLine, column, rule). */
  pattern: z.string().refine(isDiagnosticPattern, {
    message:
      "must be a valid regular expression with named groups line, severity and message",
  }),
});

export type StaticToolConfig = z.infer<typeof staticToolSchema>;

const reviewConfigSchema = z.object({
  languages: z.array(z.enum(LANGUAGES)).optional(),
  concurrency: z.number().int().min(1).max(64).default(4),
  filters: z
    .object({
      excludePaths: z.array(z.string()).default([]),
      maxFileSizeKB: z.number().positive().default(200),
    })
    .default({}),
  static: z
    .object({
      enabled: z.boolean().default(true),
      timeoutMs: z.number().int().positive().default(30000),
      tools: z.record(z.enum(LANGUAGES), staticToolSchema).default({}),
    })
    .default({}),
  ai: z
    .object({
      enabled: z.boolean().default(true),
      model: z.string().default("claude-sonnet-4-20250514"),
      maxTokens: z.number().int().positive().default(4096),
      temperature: z.number().min(0).max(1).default(0),
      timeoutMs: z.number().int().positive().default(60000),
      maxChunkChars: z.number().int().min(200).default(12000),
      customInstructions: z.string().optional(),
      rateLimit: z
        .object({
          requests: z.number().int().positive().default(20),
          windowMs: z.number().int().positive().default(60000),
        })
        .default({}),
      retry: z
        .object({
          maxAttempts: z.number().int().min(1).max(10).default(4),
          baseDelayMs: z.number().int().nonnegative().default(1000),
          maxDelayMs: z.number().int().nonnegative().default(30000),
        })
        .default({}),
    })
    .default({}),
  merge: z
    .object({
      similarityThreshold: z.number().min(0).max(1).default(0.8),
    })
    .default({}),
});

export type ReviewConfig = z.infer<typeof reviewConfigSchema>;

export function parseReviewConfig(raw: unknown): ReviewConfig {
  return reviewConfigSchema.parse(raw ?? {});
}
