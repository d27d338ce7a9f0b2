import type { Analyzer } from "../analyzers/types.js";
import type { AnalyzerResult, RawFinding, ReviewUnit, UnitAssessment } from "../review/types.js";
import { syntheticFinding } from "../review/synthetic.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import { runWithRetry, type RetryOptions, type RetryPolicy } from "../utils/retry.js";
import { errorMessage } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { chunkUnit, estimateTokens, unitChars, type UnitChunk } from "./chunker.js";
import { isTransientFailure, type CompletionProvider } from "./client.js";
import { buildSystemPrompt, buildUserPrompt } from "./prompts.js";
import { parseAiResponse } from "./response-parser.js";

const log = createChildLogger({ module: "llm-reviewer" });

export interface AiReviewerOptions {
  provider: CompletionProvider;
  /** Shared by every worker of the run. */
  limiter: RateLimiter;
  maxChunkChars: number;
  retry: RetryPolicy;
  customInstructions?: string;
  /** Run cancellation: a unit waiting in backoff gives up instead of retrying. */
  signal?: AbortSignal;
  sleep?: RetryOptions["sleep"];
  random?: RetryOptions["random"];
}

type ChunkOutcome =
  | { kind: "reviewed"; findings: RawFinding[]; assessment?: UnitAssessment }
  | { kind: "unparsed"; finding: RawFinding }
  | { kind: "unavailable"; attempts: number; error: unknown };

export function createAiReviewer(opts: AiReviewerOptions): Analyzer {
  const system = buildSystemPrompt(opts.customInstructions);

  const reviewChunk = async (unit: ReviewUnit, chunk: UnitChunk): Promise<ChunkOutcome> => {
    const prompt = buildUserPrompt(unit, chunk);
    const outcome = await runWithRetry(
      async () => {
        await opts.limiter.acquire();
        return opts.provider.complete({ system, prompt });
      },
      {
        ...opts.retry,
        retryOn: isTransientFailure,
        signal: opts.signal,
        sleep: opts.sleep,
        random: opts.random,
      }
    );

    if (!outcome.ok) {
      return { kind: "unavailable", attempts: outcome.attempts, error: outcome.error };
    }

    const parsed = parseAiResponse(outcome.value);
    if (!parsed.ok) {
      log.warn(
        { path: unit.path, chunk: chunk.index, reason: parsed.error.message },
        "Unparsable AI response"
      );
      return {
        kind: "unparsed",
        finding: syntheticFinding(
          "unparsed-ai-response",
          "ai",
          parsed.error.raw.trim() || parsed.error.message,
          chunk.startLine,
          chunk.endLine
        ),
      };
    }
    if (parsed.dropped > 0) {
      log.info(
        { path: unit.path, chunk: chunk.index, dropped: parsed.dropped },
        "Dropped malformed AI findings"
      );
    }
    return { kind: "reviewed", findings: parsed.findings, assessment: parsed.assessment };
  };

  return {
    kind: "ai",
    async analyze(unit: ReviewUnit): Promise<AnalyzerResult> {
      const chunks = chunkUnit(unit, opts.maxChunkChars);
      if (chunks.length === 0) return { findings: [] };

      log.debug(
        {
          path: unit.path,
          chunks: chunks.length,
          estimatedTokens: estimateTokens(unitChars(unit)),
        },
        "Starting AI review"
      );

      const findings: RawFinding[] = [];
      const assessments: UnitAssessment[] = [];

      for (const chunk of chunks) {
        const outcome = await reviewChunk(unit, chunk);
        switch (outcome.kind) {
          case "unavailable": {
            const message = `AI review unavailable after ${outcome.attempts} attempt(s): ${errorMessage(outcome.error)}`;
            log.warn({ path: unit.path, chunk: chunk.index, attempts: outcome.attempts }, message);
            // Partial AI output for a unit is discarded.
            return { findings: [syntheticFinding("ai-unavailable", "ai", message)] };
          }
          case "unparsed":
            findings.push(outcome.finding);
            break;
          case "reviewed":
            findings.push(...outcome.findings);
            if (outcome.assessment) assessments.push(outcome.assessment);
            break;
        }
      }

      const assessment = combineAssessments(assessments);
      return assessment ? { findings, assessment } : { findings };
    },
  };
}

function combineAssessments(assessments: UnitAssessment[]): UnitAssessment | undefined {
  if (assessments.length === 0) return undefined;
  if (assessments.length === 1) return assessments[0];

  const scores = assessments
    .map((a) => a.score)
    .filter((s): s is number => s !== undefined);
  const summary = assessments.map((a) => a.summary).join(" ");
  return scores.length > 0
    ? { summary, score: Math.round(scores.reduce((a, b) => a + b, 0) / scores.length) }
    : { summary };
}
