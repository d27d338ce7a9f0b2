import { afterEach, describe, it, expect, vi } from "vitest";
import type { CompletionProvider } from "../../src/llm/client.js";
import { createAiReviewer, type AiReviewerOptions } from "../../src/llm/reviewer.js";
import { RateLimiter } from "../../src/utils/rate-limiter.js";
import { ServiceError } from "../../src/utils/errors.js";
import { makeUnit } from "../fixtures/units.js";

function reply(payload: unknown): string {
  return `\`\`\`json\n${JSON.stringify(payload)}\n\`\`\``;
}

function stubProvider(complete: CompletionProvider["complete"]) {
  return { model: "test-model", complete: vi.fn(complete) };
}

function reviewer(provider: CompletionProvider, overrides: Partial<AiReviewerOptions> = {}) {
  return createAiReviewer({
    provider,
    limiter: new RateLimiter({ requests: 100, windowMs: 1000 }),
    maxChunkChars: 10000,
    retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 10 },
    sleep: async () => {},
    ...overrides,
  });
}

const unit = makeUnit("app.py", ["import os", "def f(x):", "    return eval(x)"]);

describe("createAiReviewer", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the model's findings and assessment", async () => {
    const provider = stubProvider(async () =>
      reply({
        findings: [{ line: 3, severity: "error", category: "security", message: "eval on input" }],
        assessment: "Risky.",
        score: 3,
      })
    );

    const result = await reviewer(provider).analyze(unit);

    expect(result).toEqual({
      findings: [
        { line: 3, severity: "error", category: "security", message: "eval on input", source: "ai" },
      ],
      assessment: { summary: "Risky.", score: 3 },
    });
    const [request] = provider.complete.mock.calls[0];
    expect(request.prompt).toContain("File: app.py");
    expect(request.system).toContain("## Output Format");
  });

  it("retries transient failures and acquires the limiter on every attempt", async () => {
    let calls = 0;
    const provider = stubProvider(async () => {
      calls++;
      if (calls < 3) throw new ServiceError("AI request failed: overloaded", true, 529);
      return reply({ findings: [] });
    });
    const limiter = new RateLimiter({ requests: 100, windowMs: 1000 });
    const acquire = vi.spyOn(limiter, "acquire");

    const result = await reviewer(provider, { limiter }).analyze(unit);

    expect(result).toEqual({ findings: [] });
    expect(provider.complete).toHaveBeenCalledTimes(3);
    expect(acquire).toHaveBeenCalledTimes(3);
  });

  it("emits exactly one ai-unavailable finding once retries are exhausted", async () => {
    const provider = stubProvider(async () => {
      throw new ServiceError("AI request failed: overloaded", true, 529);
    });

    const result = await reviewer(provider).analyze(unit);

    expect(provider.complete).toHaveBeenCalledTimes(3);
    expect(result).toEqual({
      findings: [
        {
          line: 1,
          endLine: 1,
          severity: "warning",
          category: "ai-unavailable",
          message: "AI review unavailable after 3 attempt(s): AI request failed: overloaded",
          source: "ai",
        },
      ],
    });
  });

  it("does not retry a non-retryable failure", async () => {
    const provider = stubProvider(async () => {
      throw new ServiceError("AI request failed: invalid x-api-key", false, 401);
    });

    const result = await reviewer(provider).analyze(unit);

    expect(provider.complete).toHaveBeenCalledTimes(1);
    expect(result.findings.map((f) => f.message)).toEqual([
      "AI review unavailable after 1 attempt(s): AI request failed: invalid x-api-key",
    ]);
  });

  it("discards the unit's partial AI output when a later chunk fails", async () => {
    const big = makeUnit(
      "big.py",
      Array.from({ length: 6 }, (_, i) => `value_${i} = ${i}`)
    );
    let calls = 0;
    const provider = stubProvider(async () => {
      calls++;
      if (calls === 1) {
        return reply({
          findings: [{ line: 1, severity: "info", category: "style", message: "ok" }],
        });
      }
      throw new ServiceError("AI request timed out", true);
    });

    const result = await reviewer(provider, { maxChunkChars: 40 }).analyze(big);

    expect(result.findings).toHaveLength(1);
    expect(result.findings[0].category).toBe("ai-unavailable");
  });

  it("keeps an unparsable response as an unparsed-ai-response finding", async () => {
    const provider = stubProvider(async () => "Sorry, I can only review code in English.");

    const result = await reviewer(provider).analyze(unit);

    expect(result).toEqual({
      findings: [
        {
          line: 1,
          endLine: 3,
          severity: "info",
          category: "unparsed-ai-response",
          message: "Sorry, I can only review code in English.",
          source: "ai",
        },
      ],
    });
  });

  it("combines assessments across chunks", async () => {
    const big = makeUnit(
      "big.py",
      Array.from({ length: 6 }, (_, i) => `value_${i} = ${i}`)
    );
    const replies = [
      reply({ findings: [], assessment: "First half is fine.", score: 6 }),
      reply({ findings: [], assessment: "Second half is great.", score: 9 }),
    ];
    let calls = 0;
    const provider = stubProvider(async () => replies[calls++]);

    const result = await reviewer(provider, { maxChunkChars: 40 }).analyze(big);

    expect(result.assessment).toEqual({
      summary: "First half is fine. Second half is great.",
      score: 8,
    });
  });

  it("makes no call for an empty unit", async () => {
    const provider = stubProvider(async () => reply({ findings: [] }));

    expect(await reviewer(provider).analyze(makeUnit("empty.py", []))).toEqual({ findings: [] });
    expect(provider.complete).not.toHaveBeenCalled();
  });

  it("shares one rate limit across concurrently reviewed units", async () => {
    vi.useFakeTimers();
    const start = Date.now();
    const callTimes: number[] = [];
    const provider = stubProvider(async () => {
      callTimes.push(Date.now() - start);
      return reply({ findings: [] });
    });
    const shared = reviewer(provider, {
      limiter: new RateLimiter({ requests: 2, windowMs: 1000 }),
    });

    const runs = ["a.py", "b.py", "c.py", "d.py"].map((path) =>
      shared.analyze(makeUnit(path, ["x = 1"]))
    );
    await vi.advanceTimersByTimeAsync(1500);
    await Promise.all(runs);

    expect(callTimes).toEqual([0, 0, 1000, 1000]);
  });
});
