import { describe, expect, it } from "vitest";
import { TransportError } from "../../src/domain/common/errors";
import {
  RetryingTransport,
  type FetchLike,
  type TransportRetryPolicy,
} from "../../src/infrastructure/http/retrying-transport";
import { jsonResponse, recordingSleep, scriptedFetch } from "../helpers";

const ENDPOINT = "https://api.example.test/v1/chat/completions";

class BrokenBodyResponse extends Response {
  override async text(): Promise<string> {
    throw new Error("socket hang up");
  }
}

function transport(
  fetchImpl: FetchLike,
  policy: Partial<TransportRetryPolicy> = {},
) {
  const clock = recordingSleep();
  const t = new RetryingTransport({
    policy: { backoffFactorMs: 100, ...policy },
    fetchImpl,
    sleep: clock.sleep,
  });
  return { t, delays: clock.delays };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error("expected a rejection");
    },
    (error: unknown) => error,
  );
}

describe("RetryingTransport", () => {
  it("retries 429 with exponential backoff until success", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      jsonResponse(429, {}),
      jsonResponse(429, {}),
      jsonResponse(429, {}),
      new Response("ok", { status: 200 }),
    ]);
    const { t, delays } = transport(fetchImpl);

    const res = await t.post({ url: ENDPOINT, body: "{}", timeoutMs: 1_000 });

    expect(res.status).toBe(200);
    expect(res.text).toBe("ok");
    expect(res.attempts).toBe(4);
    expect(calls).toHaveLength(4);
    expect(delays).toEqual([100, 200, 400]);
  });

  it("prefers Retry-After over the computed delay", async () => {
    const { fetchImpl } = scriptedFetch([
      jsonResponse(503, {}, { "retry-after": "2" }),
      new Response("ok", { status: 200 }),
    ]);
    const { t, delays } = transport(fetchImpl);

    await t.post({ url: ENDPOINT, timeoutMs: 1_000 });

    expect(delays).toEqual([2_000]);
  });

  it("ignores Retry-After when told to", async () => {
    const { fetchImpl } = scriptedFetch([
      jsonResponse(503, {}, { "retry-after": "2" }),
      new Response("ok", { status: 200 }),
    ]);
    const { t, delays } = transport(fetchImpl, { respectRetryAfter: false });

    await t.post({ url: ENDPOINT, timeoutMs: 1_000 });

    expect(delays).toEqual([100]);
  });

  it("raises once the status budget is spent", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      jsonResponse(503, {}),
      jsonResponse(503, {}),
      jsonResponse(503, {}),
    ]);
    const { t } = transport(fetchImpl, { status: 1 });

    const error = await rejection(t.post({ url: ENDPOINT, timeoutMs: 1_000 }));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      reason: "status",
      statusCode: 503,
      attempts: 2,
      retryable: true,
    });
    expect(calls).toHaveLength(2);
  });

  it("counts every retry against the total budget", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      new TypeError("fetch failed"),
      jsonResponse(500, {}),
      jsonResponse(500, {}),
    ]);
    const { t } = transport(fetchImpl, { total: 1 });

    const error = await rejection(t.post({ url: ENDPOINT, timeoutMs: 1_000 }));

    expect(error).toMatchObject({ reason: "status", statusCode: 500 });
    expect(calls).toHaveLength(2);
  });

  it("returns the last response when raiseOnStatus is off", async () => {
    const { fetchImpl, calls } = scriptedFetch([jsonResponse(502, {})]);
    const { t } = transport(fetchImpl, { status: 0, raiseOnStatus: false });

    const res = await t.post({ url: ENDPOINT, timeoutMs: 1_000 });

    expect(res.status).toBe(502);
    expect(calls).toHaveLength(1);
  });

  it("returns non-retryable statuses without retrying", async () => {
    const { fetchImpl, calls } = scriptedFetch([jsonResponse(404, {})]);
    const { t, delays } = transport(fetchImpl);

    const res = await t.post({ url: ENDPOINT, timeoutMs: 1_000 });

    expect(res.status).toBe(404);
    expect(calls).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it("retries connection failures", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      new TypeError("fetch failed"),
      new TypeError("fetch failed"),
      new Response("ok", { status: 200 }),
    ]);
    const { t, delays } = transport(fetchImpl);

    const res = await t.post({ url: ENDPOINT, timeoutMs: 1_000 });

    expect(res.status).toBe(200);
    expect(calls).toHaveLength(3);
    expect(delays).toEqual([100, 200]);
  });

  it("raises a connect error once the connect budget is spent", async () => {
    const cause = new TypeError("fetch failed");
    const { fetchImpl, calls } = scriptedFetch([cause, cause, cause]);
    const { t } = transport(fetchImpl, { connect: 1 });

    const error = await rejection(t.post({ url: ENDPOINT, timeoutMs: 1_000 }));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ reason: "connect", attempts: 2, cause });
    expect(calls).toHaveLength(2);
  });

  it("treats a timeout as a read failure", async () => {
    const fetchImpl: FetchLike = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () =>
          reject(new Error("aborted")),
        );
      });
    const { t } = transport(fetchImpl, { read: 0 });

    const error = await rejection(t.post({ url: ENDPOINT, timeoutMs: 20 }));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ reason: "read", attempts: 1 });
    expect(error instanceof Error ? error.message : "").toBe(
      `POST ${ENDPOINT} timed out after 20ms (attempt 1)`,
    );
  });

  it("retries a failed body read", async () => {
    const broken = new BrokenBodyResponse(null, { status: 200 });
    const { fetchImpl, calls } = scriptedFetch([
      broken,
      new Response("ok", { status: 200 }),
    ]);
    const { t, delays } = transport(fetchImpl);

    const res = await t.post({ url: ENDPOINT, timeoutMs: 1_000 });

    expect(res.text).toBe("ok");
    expect(calls).toHaveLength(2);
    expect(delays).toEqual([100]);
  });

  it("never retries methods outside allowedMethods", async () => {
    const { fetchImpl, calls } = scriptedFetch([jsonResponse(503, {})]);
    const { t } = transport(fetchImpl);

    const res = await t.send({ url: ENDPOINT, method: "GET", timeoutMs: 1_000 });

    expect(res.status).toBe(503);
    expect(calls).toHaveLength(1);

    const failing = scriptedFetch([new TypeError("fetch failed")]);
    const { t: t2 } = transport(failing.fetchImpl);
    const error = await rejection(
      t2.send({ url: ENDPOINT, method: "GET", timeoutMs: 1_000 }),
    );
    expect(error).toMatchObject({ reason: "connect", retryable: false });
    expect(failing.calls).toHaveLength(1);
  });

  it("sends the request as given", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      new Response("ok", { status: 200 }),
    ]);
    const { t } = transport(fetchImpl);

    await t.post({
      url: ENDPOINT,
      headers: { "Content-Type": "application/json" },
      body: "{\"a\":1}",
      timeoutMs: 1_000,
    });

    expect(calls[0]?.url).toBe(ENDPOINT);
    expect(calls[0]?.init.method).toBe("POST");
    expect(calls[0]?.init.body).toBe("{\"a\":1}");
    expect(new Headers(calls[0]?.init.headers).get("content-type")).toBe(
      "application/json",
    );
  });
});
