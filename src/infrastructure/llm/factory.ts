import type { AppConfig } from "../config/schema";
import type { Logger } from "../logging/logger";
import { DeepSeekClient } from "./providers/deepseek";

export function createDeepSeekClient(
  config: AppConfig,
  logger: Logger,
): DeepSeekClient {
  const deepseek = config.providers.deepseek;
  return new DeepSeekClient({
    apiKey: deepseek.apiKey,
    baseUrl: deepseek.baseUrl,
    timeoutMs: deepseek.timeoutMs,
    maxRetries: deepseek.maxRetries,
    transport: {
      connect: deepseek.transport.connectRetries,
      read: deepseek.transport.readRetries,
      status: deepseek.transport.statusRetries,
      backoffFactorMs: deepseek.transport.backoffFactorMs,
      maxBackoffMs: deepseek.transport.maxBackoffMs,
      statusForcelist: deepseek.transport.statusForcelist,
      respectRetryAfter: deepseek.transport.respectRetryAfter,
    },
    logger,
  });
}
