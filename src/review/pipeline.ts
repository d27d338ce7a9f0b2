import type { Analyzer } from "../analyzers/types.js";
import type { ReviewConfig } from "../config-loader/schema.js";
import { loadReviewConfig } from "../config-loader/loader.js";
import { loadEnv } from "../config/env.js";
import { createAnthropicProvider, type CompletionProvider } from "../llm/client.js";
import { createAiReviewer } from "../llm/reviewer.js";
import { createStaticAnalyzer } from "../static/adapter.js";
import type { ProcessRunner } from "../static/runner.js";
import { probeToolVersions } from "../static/versions.js";
import { LANGUAGES, parseLanguageSelector, type Language } from "../walker/languages.js";
import { assertReviewRoot } from "../walker/source-walker.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import type { RetryOptions } from "../utils/retry.js";
import { createChildLogger } from "../utils/logger.js";
import { orchestrateReview } from "./orchestrator.js";
import type { ReviewReport } from "./types.js";

const log = createChildLogger({ module: "pipeline" });

export interface ReviewRequest {
  root: string;
  /** `all` or a comma-separated list of language tags; defaults to the config, then all. */
  languages?: string;
  configPath?: string;
  /** CLI switches; `false` disables the analyzer regardless of config. */
  ai?: boolean;
  static?: boolean;
  concurrency?: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  /** Test seams. */
  provider?: CompletionProvider;
  runner?: ProcessRunner;
  sleep?: RetryOptions["sleep"];
  now?: () => Date;
}

/**
 * Core entry contract: validates the setup (ConfigError aborts before any
 * unit is read), assembles the analyzers and runs the review.
 */
export async function reviewRepository(req: ReviewRequest): Promise<ReviewReport> {
  const root = await assertReviewRoot(req.root);
  const env = loadEnv(req.env);
  const config = applyOverrides(await loadReviewConfig(root, req.configPath), req);
  const languages = resolveLanguages(req.languages, config);

  const analyzers: Analyzer[] = [];
  const tools: Record<string, string> = {};

  if (config.static.enabled) {
    analyzers.push(
      createStaticAnalyzer({
        tools: config.static.tools,
        timeoutMs: config.static.timeoutMs,
        runner: req.runner,
      })
    );
    Object.assign(tools, await probeToolVersions(config.static.tools, languages, req.runner));
  }

  if (config.ai.enabled) {
    const model = env.CODEREVIEW_MODEL ?? config.ai.model;
    const provider =
      req.provider ??
      (env.ANTHROPIC_API_KEY
        ? createAnthropicProvider({
            apiKey: env.ANTHROPIC_API_KEY,
            model,
            maxTokens: config.ai.maxTokens,
            temperature: config.ai.temperature,
            timeoutMs: config.ai.timeoutMs,
          })
        : null);

    if (provider) {
      analyzers.push(
        createAiReviewer({
          provider,
          limiter: new RateLimiter(config.ai.rateLimit),
          maxChunkChars: config.ai.maxChunkChars,
          retry: config.ai.retry,
          customInstructions: config.ai.customInstructions,
          signal: req.signal,
          sleep: req.sleep,
        })
      );
      tools.ai = provider.model;
    } else {
      log.warn("ANTHROPIC_API_KEY is not set, running static analysis only");
      tools.ai = "disabled";
    }
  }

  log.info(
    { root, languages, analyzers: analyzers.map((a) => a.kind), concurrency: config.concurrency },
    "Starting review"
  );

  return orchestrateReview({
    root,
    languages,
    analyzers,
    concurrency: config.concurrency,
    similarityThreshold: config.merge.similarityThreshold,
    excludePaths: config.filters.excludePaths,
    maxFileSizeKB: config.filters.maxFileSizeKB,
    tools,
    signal: req.signal,
    now: req.now,
  });
}

function applyOverrides(config: ReviewConfig, req: ReviewRequest): ReviewConfig {
  return {
    ...config,
    concurrency: req.concurrency ?? config.concurrency,
    static: { ...config.static, enabled: config.static.enabled && req.static !== false },
    ai: { ...config.ai, enabled: config.ai.enabled && req.ai !== false },
  };
}

function resolveLanguages(selector: string | undefined, config: ReviewConfig): Language[] {
  if (selector !== undefined) return parseLanguageSelector(selector);
  return config.languages ? [...config.languages] : [...LANGUAGES];
}
