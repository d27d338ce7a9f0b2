import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

const envSchema = z.object({
  // Anthropic
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  CODEREVIEW_MODEL: z.string().min(1).optional(),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (_env && source === process.env) return _env;

  const raw = { ...source };
  // An exported-but-empty key means "not configured".
  if (raw.ANTHROPIC_API_KEY === "") delete raw.ANTHROPIC_API_KEY;
  if (raw.CODEREVIEW_MODEL === "") delete raw.CODEREVIEW_MODEL;

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const invalid = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid environment variables:\n${invalid}`);
  }

  if (source === process.env) _env = result.data;
  return result.data;
}
