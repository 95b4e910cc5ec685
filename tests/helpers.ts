import type { FetchLike } from "../src/infrastructure/http/retrying-transport";

export type RecordedCall = {
  url: string;
  init: RequestInit;
};

type Step = Response | Error | (() => Response | Promise<Response>);

/** A fetch stand-in that replays `steps` in order and records each call. */
export function scriptedFetch(steps: Step[]): {
  fetchImpl: FetchLike;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const step = steps[calls.length];
    calls.push({ url: String(input), init: init ?? {} });
    if (step === undefined) throw new Error("unexpected fetch call");
    if (typeof step === "function") return step();
    if (step instanceof Response) return step;
    throw step;
  };
  return { fetchImpl, calls };
}

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export function completionBody(content: string, totalTokens?: number) {
  return {
    id: "cmpl-1",
    model: "deepseek-reasoner",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content },
        finish_reason: "stop",
      },
    ],
    ...(totalTokens !== undefined ? { usage: { total_tokens: totalTokens } } : {}),
  };
}

export function recordingSleep(): {
  sleep: (ms: number) => Promise<void>;
  delays: number[];
} {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

export function requestBody(call: RecordedCall | undefined): unknown {
  const body = call?.init.body;
  return typeof body === "string" ? JSON.parse(body) : undefined;
}
