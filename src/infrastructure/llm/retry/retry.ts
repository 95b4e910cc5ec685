import {
  ConfigError,
  ExhaustedRetriesError,
  ValidationError,
} from "../../../domain/common/errors";
import { sleep as defaultSleep, type Sleep } from "./backoff";

/** One failed attempt; lives only for the duration of a retry loop. */
export type RetryAttempt = {
  attempt: number;
  error: unknown;
  /** Delay before the next attempt, absent when none follows. */
  nextDelayMs?: number;
};

export type RetryConfig = {
  description: string;
  maxAttempts: number;
  /** Delay to wait before attempt `attempt` (always >= 2). */
  delayMs: (attempt: number) => number;
  isRetryable?: (error: unknown) => boolean;
  onAttempt?: (attempt: number) => void;
  onFailedAttempt?: (failure: RetryAttempt) => void;
  sleep?: Sleep;
};

export function isRetryableError(error: unknown): boolean {
  return !(error instanceof ValidationError || error instanceof ConfigError);
}

/**
 * Runs `fn` until it resolves or `maxAttempts` attempts have failed, in
 * which case {@link ExhaustedRetriesError} carries the last error.
 * Errors rejected by `isRetryable` are rethrown as they are.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig,
): Promise<T> {
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new ValidationError(
      `maxAttempts must be a positive integer (got ${config.maxAttempts})`,
    );
  }
  const isRetryable = config.isRetryable ?? isRetryableError;
  const wait = config.sleep ?? defaultSleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    if (attempt > 1) await wait(config.delayMs(attempt));
    config.onAttempt?.(attempt);
    try {
      return await fn(attempt);
    } catch (error) {
      if (!isRetryable(error)) throw error;
      lastError = error;
      config.onFailedAttempt?.({
        attempt,
        error,
        nextDelayMs:
          attempt < config.maxAttempts
            ? config.delayMs(attempt + 1)
            : undefined,
      });
    }
  }
  throw new ExhaustedRetriesError({
    description: config.description,
    attempts: config.maxAttempts,
    lastError,
  });
}
