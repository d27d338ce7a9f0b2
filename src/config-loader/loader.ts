import { readFile } from "node:fs/promises";
import { join } from "node:path";
import yaml from "js-yaml";
import { ZodError } from "zod";
import { parseReviewConfig, type ReviewConfig } from "./schema.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { ConfigError, errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "config-loader" });

export const CONFIG_FILENAME = ".codereview.yml";

/**
 * Loads `.codereview.yml` from the review root (or `explicitPath`) and merges
 * it over the defaults. A missing implicit file means defaults; a missing
 * explicit file or an invalid one is a ConfigError.
 */
export async function loadReviewConfig(
  root: string,
  explicitPath?: string
): Promise<ReviewConfig> {
  const path = explicitPath ?? join(root, CONFIG_FILENAME);

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (!explicitPath && isNotFound(err)) {
      log.debug({ root }, `No ${CONFIG_FILENAME} found, using defaults`);
      return DEFAULT_CONFIG;
    }
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  return mergeConfigs(DEFAULT_CONFIG, parseConfigText(content, path));
}

export function parseConfigText(content: string, origin = "<inline>"): ReviewConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${origin}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  try {
    return parseReviewConfig(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues
        .map((i) => `  ${i.path.join(".")}: ${i.message}`)
        .join("\n");
      throw new ConfigError(`Invalid config in ${origin}:\n${issues}`, { cause: err });
    }
    throw err;
  }
}

export function mergeConfigs(
  defaults: ReviewConfig,
  overrides: ReviewConfig
): ReviewConfig {
  return {
    languages: overrides.languages ?? defaults.languages,
    concurrency: overrides.concurrency,
    filters: {
      ...defaults.filters,
      ...overrides.filters,
      excludePaths: [
        ...new Set([
          ...defaults.filters.excludePaths,
          ...overrides.filters.excludePaths,
        ]),
      ],
    },
    static: {
      ...defaults.static,
      ...overrides.static,
      tools: { ...defaults.static.tools, ...overrides.static.tools },
    },
    ai: {
      ...defaults.ai,
      ...overrides.ai,
      rateLimit: { ...defaults.ai.rateLimit, ...overrides.ai.rateLimit },
      retry: { ...defaults.ai.retry, ...overrides.ai.retry },
    },
    merge: { ...defaults.merge, ...overrides.merge },
  };
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
