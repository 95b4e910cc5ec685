import {
  EmptyContentError,
  describeError,
} from "../../domain/common/errors";
import { linearBackoffMs, type Sleep } from "../../infrastructure/llm/retry/backoff";
import { withRetry } from "../../infrastructure/llm/retry/retry";
import { noopLogger, type Logger } from "../../infrastructure/logging/logger";
import type {
  ChatMessage,
  CompletionClient,
  ExtraOptions,
} from "../../infrastructure/llm/types";

export type CallWithRetryOptions = {
  /** Names the operation in logs and in the final error. */
  description: string;
  maxAttempts?: number;
  /** Attempt n (n >= 2) is preceded by `baseDelayMs * n`. */
  baseDelayMs?: number;
  model?: string;
  temperature?: number;
  options?: ExtraOptions;
  logger?: Logger;
  sleep?: Sleep;
};

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 5_000;
export const DEFAULT_RETRY_MODEL = "deepseek-reasoner";
export const DEFAULT_RETRY_TEMPERATURE = 0.2;

/**
 * Application-tier retry around {@link CompletionClient.complete}.
 *
 * Sits on top of the transport's own retries: transport failures, malformed
 * bodies and blank content all count as failed attempts here. Resolves with
 * the first non-blank content or rejects with `ExhaustedRetriesError`.
 */
export async function callWithRetry(
  client: CompletionClient,
  messages: readonly ChatMessage[],
  opts: CallWithRetryOptions,
): Promise<string> {
  const logger = opts.logger ?? noopLogger;
  const maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = opts.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;

  return withRetry(
    async () => {
      const res = await client.complete({
        messages,
        model: opts.model ?? DEFAULT_RETRY_MODEL,
        temperature: opts.temperature ?? DEFAULT_RETRY_TEMPERATURE,
        options: opts.options,
      });
      if (res.content.trim().length === 0) {
        throw new EmptyContentError(
          `Model returned empty content for ${opts.description}`,
        );
      }
      return res.content;
    },
    {
      description: opts.description,
      maxAttempts,
      delayMs: (attempt) => linearBackoffMs(attempt, baseDelayMs),
      sleep: opts.sleep,
      onAttempt: (attempt) =>
        logger.info(`Attempt ${attempt} of ${maxAttempts} for ${opts.description}`),
      onFailedAttempt: (failure) =>
        logger.error(
          `Attempt ${failure.attempt} for ${opts.description} failed: ${describeError(failure.error)}` +
            (failure.nextDelayMs !== undefined
              ? `; retrying in ${failure.nextDelayMs}ms`
              : ""),
        ),
    },
  );
}
