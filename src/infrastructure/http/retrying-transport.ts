import {
  TransportError,
  describeError,
  type TransportFailureReason,
} from "../../domain/common/errors";
import {
  computeBackoffMs,
  parseRetryAfterMs,
  sleep as defaultSleep,
  type Sleep,
} from "../llm/retry/backoff";
import { noopLogger, type Logger } from "../logging/logger";

export type FetchLike = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type TransportRetryPolicy = {
  total: number;
  connect: number;
  read: number;
  status: number;
  backoffFactorMs: number;
  maxBackoffMs: number;
  statusForcelist: readonly number[];
  allowedMethods: readonly HttpMethod[];
  respectRetryAfter: boolean;
  raiseOnStatus: boolean;
};

export const DEFAULT_RETRY_POLICY: TransportRetryPolicy = {
  total: 3,
  connect: 3,
  read: 3,
  status: 3,
  backoffFactorMs: 2_000,
  maxBackoffMs: 120_000,
  statusForcelist: [429, 500, 502, 503, 504],
  allowedMethods: ["POST"],
  respectRetryAfter: true,
  raiseOnStatus: true,
};

export type RetryingTransportConfig = {
  policy?: Partial<TransportRetryPolicy>;
  provider?: string;
  logger?: Logger;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
};

export type HttpRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
};

export type HttpResponse = {
  url: string;
  status: number;
  headers: Headers;
  text: string;
  attempts: number;
};

type Budget = Record<"total" | TransportFailureReason, number>;

class AttemptFailure extends Error {
  constructor(
    readonly reason: Exclude<TransportFailureReason, "status">,
    readonly original: unknown,
    readonly timedOut: boolean,
  ) {
    super(describeError(original));
  }
}

/**
 * Single logical HTTP exchange with bounded transport-tier retries:
 * - retryable statuses, connection failures and read failures each draw
 *   from their own budget plus the shared `total` budget
 * - exponential backoff, replaced by `Retry-After` when the server sends one
 * - only methods in `allowedMethods` are ever reissued
 *
 * One instance is meant to be shared by every call of a client so that
 * keep-alive connections in fetch's pool are reused.
 */
export class RetryingTransport {
  readonly policy: TransportRetryPolicy;
  private readonly provider?: string;
  private readonly logger: Logger;
  private readonly fetchImpl?: FetchLike;
  private readonly sleep: Sleep;

  constructor(config: RetryingTransportConfig = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...config.policy };
    this.provider = config.provider;
    this.logger = config.logger ?? noopLogger;
    this.fetchImpl = config.fetchImpl;
    this.sleep = config.sleep ?? defaultSleep;
  }

  async post(request: Omit<HttpRequest, "method">): Promise<HttpResponse> {
    return this.send({ ...request, method: "POST" });
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const retriable = this.policy.allowedMethods.includes(request.method);
    const budget: Budget = {
      total: this.policy.total,
      connect: this.policy.connect,
      read: this.policy.read,
      status: this.policy.status,
    };
    let retries = 0;

    for (let attempt = 1; ; attempt++) {
      let response: HttpResponse;
      try {
        response = await this.attempt(request, attempt);
      } catch (error) {
        if (!(error instanceof AttemptFailure)) throw error;
        const label = error.timedOut
          ? `timed out after ${request.timeoutMs}ms`
          : `${error.reason} error: ${error.message}`;
        if (!retriable || this.exhausts(budget, error.reason)) {
          throw new TransportError({
            provider: this.provider,
            reason: error.reason,
            retryable: retriable,
            attempts: attempt,
            message: `${request.method} ${request.url} ${label} (attempt ${attempt})`,
            cause: error.original,
          });
        }
        retries += 1;
        const waitMs = this.backoff(retries);
        this.logger.warn(
          `${request.method} ${request.url} ${label}; retry ${retries} in ${waitMs}ms`,
        );
        await this.sleep(waitMs);
        continue;
      }

      if (!retriable || !this.policy.statusForcelist.includes(response.status)) {
        return response;
      }

      if (this.exhausts(budget, "status")) {
        if (!this.policy.raiseOnStatus) return response;
        throw new TransportError({
          provider: this.provider,
          reason: "status",
          retryable: true,
          statusCode: response.status,
          attempts: attempt,
          message: `${request.method} ${request.url} failed with status ${response.status} after ${attempt} attempt(s)`,
          cause: response.text,
        });
      }

      retries += 1;
      const retryAfterMs = this.policy.respectRetryAfter
        ? parseRetryAfterMs(response.headers.get("retry-after"))
        : undefined;
      const waitMs = retryAfterMs ?? this.backoff(retries);
      this.logger.warn(
        `${request.method} ${request.url} returned ${response.status}; retry ${retries} in ${waitMs}ms`,
      );
      await this.sleep(waitMs);
    }
  }

  private exhausts(budget: Budget, reason: TransportFailureReason): boolean {
    budget.total -= 1;
    budget[reason] -= 1;
    return budget.total < 0 || budget[reason] < 0;
  }

  private backoff(retry: number): number {
    return computeBackoffMs(retry, {
      baseMs: this.policy.backoffFactorMs,
      maxMs: this.policy.maxBackoffMs,
      jitter: 0,
    });
  }

  private async attempt(
    request: HttpRequest,
    attempt: number,
  ): Promise<HttpResponse> {
    const fetchImpl = this.fetchImpl ?? fetch;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      let res: Response;
      try {
        res = await fetchImpl(request.url, {
          method: request.method,
          headers: request.headers,
          body: request.body,
          signal: controller.signal,
        });
      } catch (error) {
        const timedOut = controller.signal.aborted;
        throw new AttemptFailure(timedOut ? "read" : "connect", error, timedOut);
      }

      let text: string;
      try {
        text = await res.text();
      } catch (error) {
        throw new AttemptFailure("read", error, controller.signal.aborted);
      }

      return {
        url: request.url,
        status: res.status,
        headers: res.headers,
        text,
        attempts: attempt,
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}
