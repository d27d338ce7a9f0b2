import Anthropic from "@anthropic-ai/sdk";
import { ServiceError, errorMessage } from "../utils/errors.js";

export interface CompletionRequest {
  system: string;
  prompt: string;
}

/** Text-completion backend for the AI reviewer. Failures reject with ServiceError. */
export interface CompletionProvider {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

export interface AnthropicProviderOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export function createAnthropicProvider(opts: AnthropicProviderOptions): CompletionProvider {
  // Retries are driven by the reviewer's own state machine.
  const client = new Anthropic({ apiKey: opts.apiKey, maxRetries: 0 });

  return {
    model: opts.model,
    async complete({ system, prompt }) {
      let response: Anthropic.Message;
      try {
        response = await client.messages.create(
          {
            model: opts.model,
            max_tokens: opts.maxTokens,
            temperature: opts.temperature,
            system,
            messages: [{ role: "user", content: prompt }],
          },
          { timeout: opts.timeoutMs }
        );
      } catch (err) {
        throw toServiceError(err);
      }

      return response.content
        .filter((b): b is Anthropic.TextBlock => b.type === "text")
        .map((b) => b.text)
        .join("");
    },
  };
}

const RETRYABLE_STATUS = new Set([408, 409, 429, 500, 502, 503, 504, 529]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS.has(status) || status >= 500;
}

export function toServiceError(err: unknown): ServiceError {
  if (err instanceof ServiceError) return err;
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new ServiceError("AI request timed out", true, undefined, { cause: err });
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new ServiceError(`AI connection failed: ${err.message}`, true, undefined, {
      cause: err,
    });
  }
  if (err instanceof Anthropic.APIError) {
    const status = err.status;
    const retryable = status === undefined || isRetryableStatus(status);
    return new ServiceError(`AI request failed: ${err.message}`, retryable, status, {
      cause: err,
    });
  }
  return new ServiceError(`AI request failed: ${errorMessage(err)}`, false, undefined, {
    cause: err,
  });
}

export function isTransientFailure(err: unknown): boolean {
  return err instanceof ServiceError && err.retryable;
}
