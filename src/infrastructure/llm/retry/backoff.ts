export type BackoffConfig = {
  baseMs: number;
  maxMs: number;
  jitter: number;
};

/** Exponential delay before retry number `attempt` (1-based). */
export function computeBackoffMs(
  attempt: number,
  config: BackoffConfig,
): number {
  const exp = config.baseMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(exp, config.maxMs);
  const jitter = 1 + (Math.random() * 2 - 1) * config.jitter;
  return Math.max(0, Math.round(capped * jitter));
}

/** Linear delay: the attempt number times a fixed unit. */
export function linearBackoffMs(attempt: number, baseMs: number): number {
  return Math.max(0, baseMs * attempt);
}

/**
 * Parses a `Retry-After` header: either delta-seconds or an HTTP date.
 * Returns undefined when the value is absent or unreadable.
 */
export function parseRetryAfterMs(
  value: string | null | undefined,
  now: number = Date.now(),
): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

export type Sleep = (ms: number) => Promise<void>;

export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}
