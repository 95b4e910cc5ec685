export * from "./domain/common/errors";
export * from "./infrastructure/llm";
export {
  RetryingTransport,
  DEFAULT_RETRY_POLICY,
  type FetchLike,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type TransportRetryPolicy,
} from "./infrastructure/http/retrying-transport";
export { loadConfig, type LoadConfigArgs } from "./infrastructure/config/load";
export { AppConfigSchema, type AppConfig } from "./infrastructure/config/schema";
export {
  createLogger,
  noopLogger,
  type Logger,
  type LogLevel,
} from "./infrastructure/logging/logger";
export {
  callWithRetry,
  type CallWithRetryOptions,
} from "./application/completion/call-with-retry";
export {
  loadBatchFile,
  runBatch,
  type BatchFile,
  type BatchJob,
  type BatchJobResult,
  type BatchSummary,
} from "./application/batch/run-batch";
export { buildCodeGenerationMessages } from "./prompts/v1/code-generator.system";
