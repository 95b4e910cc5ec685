export { createDeepSeekClient } from "./factory";
export {
  DeepSeekClient,
  isSupportedModel,
  type DeepSeekClientConfig,
  type GenerateCodeOptions,
} from "./providers/deepseek";
export { CallHistory } from "./history/call-history";
export { withRetry, type RetryAttempt, type RetryConfig } from "./retry/retry";
export type {
  CallRecord,
  ChatCompletionResponse,
  ChatMessage,
  ChatRole,
  CompletionClient,
  CompletionRequest,
  DeepSeekModel,
  ExtraOptions,
} from "./types";
