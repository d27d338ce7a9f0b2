import { getLogger } from "./logger.js";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Retry lifecycle. `idle` → `attempting` → (`backoff` → `attempting`)* →
 * `success` | `exhausted`. Terminal states never transition again.
 */
export type RetryState =
  | { phase: "idle" }
  | { phase: "attempting"; attempt: number }
  | { phase: "backoff"; attempt: number; delayMs: number; error: unknown }
  | { phase: "success"; attempts: number }
  | {
      phase: "exhausted";
      attempts: number;
      error: unknown;
      reason: "max-attempts" | "non-retryable" | "cancelled";
    };

export type RetryEvent =
  | { type: "start" }
  | { type: "succeeded" }
  | { type: "failed"; error: unknown; retryable: boolean }
  | { type: "backoff-elapsed" }
  | { type: "cancelled" };

/** Exponential delay for the backoff that follows `attempt`, scaled by a jitter factor in [0.5, 1]. */
export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const delay = Math.min(
    policy.baseDelayMs * 2 ** (attempt - 1),
    policy.maxDelayMs
  );
  return Math.round(delay * (0.5 + random() * 0.5));
}

export function transition(
  state: RetryState,
  event: RetryEvent,
  policy: RetryPolicy,
  random: () => number = Math.random
): RetryState {
  switch (state.phase) {
    case "idle":
      if (event.type === "start") return { phase: "attempting", attempt: 1 };
      if (event.type === "cancelled") {
        return {
          phase: "exhausted",
          attempts: 0,
          error: new Error("Cancelled before first attempt"),
          reason: "cancelled",
        };
      }
      return state;

    case "attempting":
      if (event.type === "succeeded") {
        return { phase: "success", attempts: state.attempt };
      }
      if (event.type === "failed") {
        if (!event.retryable) {
          return {
            phase: "exhausted",
            attempts: state.attempt,
            error: event.error,
            reason: "non-retryable",
          };
        }
        if (state.attempt >= policy.maxAttempts) {
          return {
            phase: "exhausted",
            attempts: state.attempt,
            error: event.error,
            reason: "max-attempts",
          };
        }
        return {
          phase: "backoff",
          attempt: state.attempt,
          delayMs: backoffDelay(state.attempt, policy, random),
          error: event.error,
        };
      }
      // An in-flight attempt is allowed to finish; cancellation is observed in backoff.
      return state;

    case "backoff":
      if (event.type === "backoff-elapsed") {
        return { phase: "attempting", attempt: state.attempt + 1 };
      }
      if (event.type === "cancelled") {
        return {
          phase: "exhausted",
          attempts: state.attempt,
          error: state.error,
          reason: "cancelled",
        };
      }
      return state;

    case "success":
    case "exhausted":
      return state;
  }
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | {
      ok: false;
      error: unknown;
      attempts: number;
      reason: "max-attempts" | "non-retryable" | "cancelled";
    };

export interface RetryOptions extends RetryPolicy {
  retryOn?: (error: unknown) => boolean;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  onTransition?: (state: RetryState) => void;
}

/** Resolves after `ms`, or early (without rejecting) when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Drives the retry state machine around `fn`. Never throws for failures of
 * `fn`; the outcome says whether it succeeded and how many attempts it took.
 */
export async function runWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions
): Promise<RetryOutcome<T>> {
  const {
    retryOn = () => true,
    signal,
    sleep: wait = sleep,
    random = Math.random,
    onTransition,
  } = opts;
  const log = getLogger();
  const advance = (from: RetryState, event: RetryEvent): RetryState => {
    const next = transition(from, event, opts, random);
    onTransition?.(next);
    return next;
  };

  let state = advance(
    { phase: "idle" },
    signal?.aborted ? { type: "cancelled" } : { type: "start" }
  );

  for (;;) {
    switch (state.phase) {
      case "attempting": {
        const attempt = state.attempt;
        let value: T;
        try {
          value = await fn(attempt);
        } catch (error) {
          state = advance(state, {
            type: "failed",
            error,
            retryable: retryOn(error),
          });
          break;
        }
        advance(state, { type: "succeeded" });
        return { ok: true, value, attempts: attempt };
      }
      case "backoff": {
        log.warn(
          {
            attempt: state.attempt,
            maxAttempts: opts.maxAttempts,
            delayMs: state.delayMs,
          },
          "Retrying after error"
        );
        await wait(state.delayMs, signal);
        state = advance(
          state,
          signal?.aborted ? { type: "cancelled" } : { type: "backoff-elapsed" }
        );
        break;
      }
      case "exhausted":
        return {
          ok: false,
          error: state.error,
          attempts: state.attempts,
          reason: state.reason,
        };
      case "idle":
      case "success":
        throw new Error(`Unexpected retry phase: ${state.phase}`);
    }
  }
}
