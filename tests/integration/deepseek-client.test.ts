import { describe, expect, it } from "vitest";
import nock from "nock";
import { DeepSeekClient } from "../../src/infrastructure/llm/providers/deepseek";
import { TransportError } from "../../src/domain/common/errors";

function client(): DeepSeekClient {
  return new DeepSeekClient({
    apiKey: "test-secret",
    baseUrl: "https://api.deepseek.com/v1",
    timeoutMs: 10_000,
    sleep: async () => undefined,
  });
}

describe("DeepSeekClient over HTTP", () => {
  it("sends the bearer token and JSON body", async () => {
    const scope = nock("https://api.deepseek.com")
      .matchHeader("authorization", "Bearer test-secret")
      .matchHeader("content-type", "application/json")
      .post("/v1/chat/completions", {
        model: "deepseek-chat",
        messages: [{ role: "user", content: "ping" }],
        temperature: 0.7,
        stream: false,
      })
      .reply(200, {
        choices: [{ message: { content: "pong" } }],
        usage: { total_tokens: 5 },
      });

    const c = client();
    const res = await c.complete({
      messages: [{ role: "user", content: "ping" }],
      model: "deepseek-chat",
    });

    expect(res.content).toBe("pong");
    expect(c.getCallHistory()[0]?.tokensUsed).toBe(5);
    expect(scope.isDone()).toBe(true);
  });

  it("rides out three 429 responses", async () => {
    const scope = nock("https://api.deepseek.com")
      .post("/v1/chat/completions")
      .times(3)
      .reply(429, { error: { message: "rate limited" } })
      .post("/v1/chat/completions")
      .reply(200, { choices: [{ message: { content: "pong" } }] });

    const c = client();
    const res = await c.complete({
      messages: [{ role: "user", content: "ping" }],
    });

    expect(res.content).toBe("pong");
    expect(c.getCallHistory()).toHaveLength(1);
    expect(scope.isDone()).toBe(true);
  });

  it("surfaces a 401 without retrying", async () => {
    nock("https://api.deepseek.com")
      .post("/v1/chat/completions")
      .reply(401, { error: { message: "Authentication Fails" } });

    await expect(
      client().complete({ messages: [{ role: "user", content: "ping" }] }),
    ).rejects.toThrow(
      new TransportError({
        message: "DeepSeek request failed (401): Authentication Fails",
        reason: "status",
        retryable: false,
      }),
    );
  });
});
