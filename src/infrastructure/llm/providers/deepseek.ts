import { z } from "zod";
import {
  ConfigError,
  MalformedResponseError,
  TransportError,
  ValidationError,
  describeError,
} from "../../../domain/common/errors";
import {
  RetryingTransport,
  type FetchLike,
  type HttpResponse,
  type TransportRetryPolicy,
} from "../../http/retrying-transport";
import { noopLogger, type Logger } from "../../logging/logger";
import type { Sleep } from "../retry/backoff";
import { CallHistory } from "../history/call-history";
import { parseSseText } from "../stream/sse";
import {
  CODE_GENERATOR_TEMPERATURE,
  buildCodeGenerationMessages,
} from "../../../prompts/v1/code-generator.system";
import {
  RESERVED_OPTION_KEYS,
  SUPPORTED_MODELS,
  type CallRecord,
  type ChatCompletionResponse,
  type ChatMessage,
  type CompletionChoice,
  type CompletionClient,
  type CompletionRequest,
  type DeepSeekModel,
  type ExtraOptions,
  type LlmUsage,
} from "../types";

export const DEEPSEEK_API_KEY_ENV = "DEEPSEEK_API_KEY";
export const DEEPSEEK_BASE_URL = "https://api.deepseek.com/v1";
export const DEFAULT_MODEL: DeepSeekModel = "deepseek-reasoner";
export const DEFAULT_TEMPERATURE = 0.7;

// Only `choices[].message.content` is required; metadata that does not
// match its expected type is dropped instead of failing the call.
const tokenCount = z.number().int().nonnegative().nullish().catch(undefined);
const optionalString = z.string().nullish().catch(undefined);
const optionalIndex = z.number().int().nullish().catch(undefined);

const UsageSchema = z
  .object({
    prompt_tokens: tokenCount,
    completion_tokens: tokenCount,
    total_tokens: tokenCount,
  })
  .nullish()
  .catch(undefined);

const ChatCompletionBodySchema = z.object({
  id: optionalString,
  model: optionalString,
  choices: z
    .array(
      z.object({
        index: optionalIndex,
        message: z.object({
          role: optionalString,
          content: z.string(),
          reasoning_content: optionalString,
        }),
        finish_reason: optionalString,
      }),
    )
    .min(1),
  usage: UsageSchema,
});

const ChatCompletionChunkSchema = z.object({
  id: optionalString,
  model: optionalString,
  choices: z
    .array(
      z.object({
        index: optionalIndex,
        delta: z
          .object({
            role: optionalString,
            content: z.string().nullish(),
            reasoning_content: optionalString,
          })
          .default({}),
        finish_reason: optionalString,
      }),
    )
    .default([]),
  usage: UsageSchema,
});

type ChatCompletionBody = z.infer<typeof ChatCompletionBodySchema>;

export type DeepSeekClientConfig = {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  transport?: Partial<TransportRetryPolicy>;
  logger?: Logger;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  now?: () => number;
};

export type GenerateCodeOptions = {
  model?: string;
  language?: string;
  options?: ExtraOptions;
};

/**
 * Chat-completions client for the DeepSeek API.
 *
 * Requests go through one shared {@link RetryingTransport}; every response
 * that parses is recorded in the client's {@link CallHistory}.
 */
export class DeepSeekClient implements CompletionClient {
  readonly provider = "deepseek" as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly transport: RetryingTransport;
  private readonly history = new CallHistory();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(config: DeepSeekClientConfig = {}) {
    const apiKey =
      config.apiKey?.trim() || process.env[DEEPSEEK_API_KEY_ENV]?.trim();
    if (!apiKey) {
      throw new ConfigError(
        `API key must be provided or set in the ${DEEPSEEK_API_KEY_ENV} environment variable`,
      );
    }
    this.apiKey = apiKey;
    this.baseUrl = config.baseUrl ?? DEEPSEEK_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? 90_000;
    this.logger = config.logger ?? noopLogger;
    this.now = config.now ?? Date.now;
    this.transport = new RetryingTransport({
      provider: this.provider,
      policy: {
        ...(config.maxRetries !== undefined ? { total: config.maxRetries } : {}),
        ...config.transport,
      },
      logger: this.logger,
      fetchImpl: config.fetchImpl,
      sleep: config.sleep,
    });
  }

  async complete(request: CompletionRequest): Promise<ChatCompletionResponse> {
    const model = request.model ?? DEFAULT_MODEL;
    if (request.messages.length === 0) {
      throw new ValidationError("messages must not be empty");
    }
    if (!isSupportedModel(model)) {
      throw new ValidationError(
        `Unsupported model "${model}" (expected one of ${SUPPORTED_MODELS.join(", ")})`,
      );
    }

    const messages: ChatMessage[] = request.messages.map((m) => ({
      role: m.role,
      content: m.content,
    }));
    const stream = request.stream ?? false;
    const body = {
      model,
      messages,
      temperature: request.temperature ?? DEFAULT_TEMPERATURE,
      stream,
      ...this.extraOptions(request.options),
    };

    const startedAt = this.now();
    let res: HttpResponse;
    try {
      res = await this.transport.post({
        url: joinUrl(this.baseUrl, "/chat/completions"),
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          Accept: stream ? "text/event-stream" : "application/json",
        },
        body: JSON.stringify(body),
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      this.logger.error(`API call to ${model} failed: ${describeError(error)}`);
      throw error;
    }

    if (res.status < 200 || res.status >= 300) {
      const error = new TransportError({
        provider: this.provider,
        reason: "status",
        retryable: false,
        statusCode: res.status,
        attempts: res.attempts,
        message: `DeepSeek request failed (${res.status}): ${errorMessageOf(res.text)}`,
        cause: res.text,
      });
      this.logger.error(`API call to ${model} failed: ${error.message}`);
      throw error;
    }

    const parsed = stream
      ? parseStreamBody(res)
      : parseCompletionBody(res);
    const completion = toCompletion(parsed, model, res.status);

    const record: CallRecord = {
      timestamp: new Date(startedAt).toISOString(),
      model,
      messages,
      durationMs: this.now() - startedAt,
      status: res.status,
      tokensUsed: completion.usage?.totalTokens ?? 0,
    };
    this.history.append(record);
    this.logger.info(
      `Call to ${model} succeeded: ${record.tokensUsed} tokens used`,
    );

    return completion;
  }

  async generateCode(
    prompt: string,
    options: GenerateCodeOptions = {},
  ): Promise<string> {
    const res = await this.complete({
      messages: buildCodeGenerationMessages(prompt, options.language),
      model: options.model,
      temperature: CODE_GENERATOR_TEMPERATURE,
      options: options.options,
    });
    return res.content;
  }

  getCallHistory(): readonly Readonly<CallRecord>[] {
    return this.history.snapshot();
  }

  private extraOptions(options: ExtraOptions | undefined): ExtraOptions {
    const out: ExtraOptions = {};
    if (!options) return out;
    const reserved: readonly string[] = RESERVED_OPTION_KEYS;
    for (const [key, value] of Object.entries(options)) {
      if (reserved.includes(key)) {
        this.logger.warn(`Ignoring option "${key}": it is set by the client`);
        continue;
      }
      out[key] = value;
    }
    return out;
  }
}

function joinUrl(baseUrl: string, pathname: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  const path = pathname.startsWith("/") ? pathname : `/${pathname}`;
  return `${base}${path}`;
}

export function isSupportedModel(model: string): model is DeepSeekModel {
  const supported: readonly string[] = SUPPORTED_MODELS;
  return supported.includes(model);
}

const ErrorBodySchema = z.object({ error: z.object({ message: z.string() }) });

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function errorMessageOf(text: string): string {
  const parsed = ErrorBodySchema.safeParse(tryParseJson(text));
  if (parsed.success) return parsed.data.error.message;
  return text.slice(0, 200) || "empty body";
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

function parseJson(res: HttpResponse, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError({
      message: "Response body is not valid JSON",
      statusCode: res.status,
      body: res.text,
      cause: error,
    });
  }
}

function parseCompletionBody(res: HttpResponse): ChatCompletionBody {
  const validated = ChatCompletionBodySchema.safeParse(
    parseJson(res, res.text),
  );
  if (!validated.success) {
    throw new MalformedResponseError({
      message: `Response body has an unexpected shape: ${formatIssues(validated.error.issues)}`,
      statusCode: res.status,
      body: res.text,
      cause: validated.error,
    });
  }
  return validated.data;
}

/** Folds streamed delta chunks into the shape of a non-streamed body. */
function parseStreamBody(res: HttpResponse): ChatCompletionBody {
  const events = parseSseText(res.text);
  if (events.length === 0) {
    throw new MalformedResponseError({
      message: "Stream contained no data events",
      statusCode: res.status,
      body: res.text,
    });
  }

  let id: string | undefined;
  let model: string | undefined;
  let usage: ChatCompletionBody["usage"];
  let role = "assistant";
  let content = "";
  let reasoning = "";
  let finishReason: string | null | undefined;

  for (const data of events) {
    const chunk = ChatCompletionChunkSchema.safeParse(parseJson(res, data));
    if (!chunk.success) {
      throw new MalformedResponseError({
        message: `Stream chunk has an unexpected shape: ${formatIssues(chunk.error.issues)}`,
        statusCode: res.status,
        body: res.text,
        cause: chunk.error,
      });
    }
    id ??= chunk.data.id ?? undefined;
    model ??= chunk.data.model ?? undefined;
    if (chunk.data.usage) usage = chunk.data.usage;
    const choice = chunk.data.choices[0];
    if (!choice) continue;
    if (choice.delta.role) role = choice.delta.role;
    content += choice.delta.content ?? "";
    reasoning += choice.delta.reasoning_content ?? "";
    if (choice.finish_reason) finishReason = choice.finish_reason;
  }

  return {
    id,
    model,
    choices: [
      {
        index: 0,
        message: {
          role,
          content,
          reasoning_content: reasoning || undefined,
        },
        finish_reason: finishReason,
      },
    ],
    usage,
  };
}

function toCompletion(
  body: ChatCompletionBody,
  requestedModel: string,
  status: number,
): ChatCompletionResponse {
  const choices: CompletionChoice[] = body.choices.map((c, i) => ({
    index: c.index ?? i,
    message: {
      role: c.message.role ?? "assistant",
      content: c.message.content,
      reasoningContent: c.message.reasoning_content ?? undefined,
    },
    finishReason: c.finish_reason ?? undefined,
  }));
  const usage: LlmUsage | undefined = body.usage
    ? {
        promptTokens: body.usage.prompt_tokens ?? undefined,
        completionTokens: body.usage.completion_tokens ?? undefined,
        totalTokens: body.usage.total_tokens ?? undefined,
      }
    : undefined;
  return {
    id: body.id ?? undefined,
    model: body.model ?? requestedModel,
    content: choices[0]?.message.content ?? "",
    choices,
    usage,
    status,
  };
}
