export { reviewRepository, type ReviewRequest } from "./review/pipeline.js";
export { orchestrateReview, type OrchestrateOptions } from "./review/orchestrator.js";
export { SourceWalker, createReviewUnit, assertReviewRoot } from "./walker/source-walker.js";
export { LANGUAGES, parseLanguageSelector, type Language } from "./walker/languages.js";
export { normalizeFinding, normalizeFindings, normalizeSeverity } from "./review/normalizer.js";
export { mergeFindings, buildReport, compareFindings } from "./review/merge.js";
export { measureUnit } from "./review/metrics.js";
export { createStaticAnalyzer, type StaticAnalyzerOptions } from "./static/adapter.js";
export { runProcess, type ProcessRunner, type ProcessResult } from "./static/runner.js";
export { createAiReviewer, type AiReviewerOptions } from "./llm/reviewer.js";
export { createAnthropicProvider, type CompletionProvider } from "./llm/client.js";
export { RateLimiter, type RateLimiterOptions } from "./utils/rate-limiter.js";
export { runWithRetry, transition, type RetryPolicy, type RetryState } from "./utils/retry.js";
export { renderReport, parseReportFormat, type ReportFormat } from "./report/index.js";
export { renderJson, toJsonReport, type JsonReport } from "./report/json.js";
export { renderMarkdown } from "./report/markdown.js";
export { loadReviewConfig, parseConfigText } from "./config-loader/loader.js";
export type { ReviewConfig, StaticToolConfig } from "./config-loader/schema.js";
export type { Analyzer } from "./analyzers/types.js";
export * from "./review/types.js";
export * from "./utils/errors.js";
