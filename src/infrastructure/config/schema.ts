import { z } from "zod";
import { SUPPORTED_MODELS } from "../llm/types";

export const LogLevelSchema = z
  .enum(["silent", "error", "warn", "info", "debug"])
  .default("info");

export const TransportSchema = z.object({
  /** Retries for connection failures. */
  connectRetries: z.number().int().min(0).default(3),
  /** Retries for read failures, timeouts included. */
  readRetries: z.number().int().min(0).default(3),
  /** Retries for statuses in `statusForcelist`. */
  statusRetries: z.number().int().min(0).default(3),
  backoffFactorMs: z.number().int().min(0).default(2_000),
  maxBackoffMs: z.number().int().positive().default(120_000),
  statusForcelist: z
    .array(z.number().int().min(100).max(599))
    .default([429, 500, 502, 503, 504]),
  respectRetryAfter: z.boolean().default(true),
});

export const ProviderDeepSeekSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default("https://api.deepseek.com/v1"),
  model: z.enum(SUPPORTED_MODELS).default("deepseek-reasoner"),
  timeoutMs: z.number().int().positive().default(90_000),
  /** Overall transport-tier retry budget. */
  maxRetries: z.number().int().min(0).default(3),
  transport: TransportSchema.default({}),
});

export const RetrySchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().int().min(0).default(5_000),
  temperature: z.number().default(0.2),
});

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema,
  providers: z
    .object({
      deepseek: ProviderDeepSeekSchema.default({}),
    })
    .default({}),
  retry: RetrySchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
