import { describe, it, expect, vi } from "vitest";
import {
  backoffDelay,
  runWithRetry,
  transition,
  type RetryPolicy,
  type RetryState,
} from "../../src/utils/retry.js";

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 };
const noJitter = () => 1;

describe("backoffDelay", () => {
  it("doubles per attempt up to the cap", () => {
    expect(backoffDelay(1, policy, noJitter)).toBe(100);
    expect(backoffDelay(2, policy, noJitter)).toBe(200);
    expect(backoffDelay(5, policy, noJitter)).toBe(1000);
  });

  it("applies jitter down to half the delay", () => {
    expect(backoffDelay(2, policy, () => 0)).toBe(100);
  });
});

describe("transition", () => {
  const failed = (retryable: boolean) =>
    ({ type: "failed", error: new Error("boom"), retryable }) as const;

  it("starts the first attempt", () => {
    expect(transition({ phase: "idle" }, { type: "start" }, policy)).toEqual({
      phase: "attempting",
      attempt: 1,
    });
  });

  it("backs off after a retryable failure", () => {
    const next = transition({ phase: "attempting", attempt: 1 }, failed(true), policy, noJitter);
    expect(next).toMatchObject({ phase: "backoff", attempt: 1, delayMs: 100 });
  });

  it("gives up immediately on a non-retryable failure", () => {
    const next = transition({ phase: "attempting", attempt: 1 }, failed(false), policy);
    expect(next).toMatchObject({ phase: "exhausted", attempts: 1, reason: "non-retryable" });
  });

  it("is exhausted after the last allowed attempt fails", () => {
    const next = transition({ phase: "attempting", attempt: 3 }, failed(true), policy);
    expect(next).toMatchObject({ phase: "exhausted", attempts: 3, reason: "max-attempts" });
  });

  it("moves from backoff to the next attempt", () => {
    const state: RetryState = { phase: "backoff", attempt: 2, delayMs: 200, error: null };
    expect(transition(state, { type: "backoff-elapsed" }, policy)).toEqual({
      phase: "attempting",
      attempt: 3,
    });
  });

  it("cancels during backoff", () => {
    const state: RetryState = { phase: "backoff", attempt: 2, delayMs: 200, error: "x" };
    expect(transition(state, { type: "cancelled" }, policy)).toEqual({
      phase: "exhausted",
      attempts: 2,
      error: "x",
      reason: "cancelled",
    });
  });

  it("lets an in-flight attempt finish when cancelled", () => {
    const state: RetryState = { phase: "attempting", attempt: 1 };
    expect(transition(state, { type: "cancelled" }, policy)).toBe(state);
  });

  it("never leaves a terminal state", () => {
    const done: RetryState = { phase: "success", attempts: 1 };
    expect(transition(done, { type: "start" }, policy)).toBe(done);
  });
});

describe("runWithRetry", () => {
  function flaky(failures: number) {
    let calls = 0;
    return vi.fn(async () => {
      calls++;
      if (calls <= failures) throw new Error(`failure ${calls}`);
      return "ok";
    });
  }

  it("retries transient failures with growing delays", async () => {
    const delays: number[] = [];
    const fn = flaky(2);

    const outcome = await runWithRetry(fn, {
      ...policy,
      random: noJitter,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    expect(outcome).toEqual({ ok: true, value: "ok", attempts: 3 });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
  });

  it("reports exhaustion after the maximum attempts", async () => {
    const fn = flaky(10);
    const outcome = await runWithRetry(fn, { ...policy, sleep: async () => {} });

    expect(outcome).toMatchObject({ ok: false, attempts: 3, reason: "max-attempts" });
    expect(outcome.ok ? null : String(outcome.error)).toBe("Error: failure 3");
  });

  it("does not retry errors the predicate rejects", async () => {
    const sleep = vi.fn(async () => {});
    const fn = flaky(10);
    const outcome = await runWithRetry(fn, { ...policy, retryOn: () => false, sleep });

    expect(outcome).toMatchObject({ ok: false, attempts: 1, reason: "non-retryable" });
    expect(sleep).not.toHaveBeenCalled();
  });

  it("stops retrying when the signal aborts during backoff", async () => {
    const controller = new AbortController();
    const fn = flaky(10);
    const outcome = await runWithRetry(fn, {
      ...policy,
      signal: controller.signal,
      sleep: async () => {
        controller.abort();
      },
    });

    expect(outcome).toMatchObject({ ok: false, attempts: 1, reason: "cancelled" });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("makes no attempt when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = flaky(0);
    const outcome = await runWithRetry(fn, { ...policy, signal: controller.signal });

    expect(outcome).toMatchObject({ ok: false, attempts: 0, reason: "cancelled" });
    expect(fn).not.toHaveBeenCalled();
  });

  it("reports every state it passes through", async () => {
    const phases: string[] = [];
    await runWithRetry(flaky(1), {
      ...policy,
      sleep: async () => {},
      onTransition: (s) => phases.push(s.phase),
    });
    expect(phases).toEqual(["attempting", "backoff", "attempting", "success"]);
  });
});
