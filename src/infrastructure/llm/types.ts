export const SUPPORTED_MODELS = ["deepseek-chat", "deepseek-reasoner"] as const;

export type DeepSeekModel = (typeof SUPPORTED_MODELS)[number];

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

/** Body keys owned by the client; extra options may not replace them. */
export const RESERVED_OPTION_KEYS = [
  "model",
  "messages",
  "temperature",
  "stream",
] as const;

export type ExtraOptions = Record<string, unknown>;

export type CompletionRequest = {
  messages: readonly ChatMessage[];
  /** One of {@link SUPPORTED_MODELS}; checked at call time. */
  model?: string;
  temperature?: number;
  stream?: boolean;
  options?: ExtraOptions;
};

export type LlmUsage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
};

export type CompletionChoice = {
  index: number;
  message: {
    role: string;
    content: string;
    reasoningContent?: string;
  };
  finishReason?: string;
};

export type ChatCompletionResponse = {
  id?: string;
  model: string;
  /** Text of the first choice. */
  content: string;
  choices: CompletionChoice[];
  usage?: LlmUsage;
  status: number;
};

export type CallRecord = {
  timestamp: string;
  model: string;
  messages: readonly Readonly<ChatMessage>[];
  durationMs: number;
  status: number;
  tokensUsed: number;
};

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<ChatCompletionResponse>;
}
