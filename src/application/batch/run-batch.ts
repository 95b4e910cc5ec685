import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import {
  ConfigError,
  ValidationError,
  describeError,
} from "../../domain/common/errors";
import { sleep as defaultSleep, type Sleep } from "../../infrastructure/llm/retry/backoff";
import type { ChatMessage, CompletionClient } from "../../infrastructure/llm/types";
import { noopLogger, type Logger } from "../../infrastructure/logging/logger";
import { callWithRetry, type CallWithRetryOptions } from "../completion/call-with-retry";

export const BatchJobSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1).optional(),
  system: z.string().min(1).optional(),
  prompt: z.string().min(1),
  /** Path of the output file, relative to the run's output directory. */
  output: z.string().min(1),
  model: z.string().min(1).optional(),
  temperature: z.number().optional(),
});

export const BatchFileSchema = z.object({
  delayBetweenMs: z.number().int().min(0).default(0),
  jobs: z.array(BatchJobSchema).min(1),
  /** Extra JSON artifact written alongside the generated files. */
  params: z
    .object({
      file: z.string().min(1),
      data: z.record(z.unknown()),
    })
    .optional(),
});

export type BatchJob = z.infer<typeof BatchJobSchema>;
export type BatchFile = z.infer<typeof BatchFileSchema>;

export type BatchJobResult =
  | { name: string; ok: true; outputPath: string; chars: number }
  | { name: string; ok: false; error: string };

export type RunBatchOptions = {
  outDir: string;
  parallel?: boolean;
  retry?: Pick<
    CallWithRetryOptions,
    "maxAttempts" | "baseDelayMs" | "model" | "temperature"
  >;
  logger?: Logger;
  sleep?: Sleep;
};

export type BatchSummary = {
  results: BatchJobResult[];
  paramsPath?: string;
};

export async function loadBatchFile(filePath: string): Promise<BatchFile> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read batch file: ${filePath}`, error);
  }

  let data: unknown;
  try {
    const ext = path.extname(filePath).toLowerCase();
    data = ext === ".json" ? JSON.parse(raw) : YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(`Failed to parse batch file: ${filePath}`, error);
  }

  const parsed = BatchFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ValidationError(`Invalid batch file:\n${issues}`, parsed.error);
  }
  return parsed.data;
}

export function jobMessages(job: BatchJob): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (job.system) messages.push({ role: "system", content: job.system });
  messages.push({ role: "user", content: job.prompt });
  return messages;
}

/**
 * Runs every job through the application retry loop and writes each result
 * to its output file. A failing job is reported in the summary and does not
 * stop the others.
 */
export async function runBatch(
  client: CompletionClient,
  batch: BatchFile,
  opts: RunBatchOptions,
): Promise<BatchSummary> {
  const logger = opts.logger ?? noopLogger;
  const wait = opts.sleep ?? defaultSleep;
  await mkdir(opts.outDir, { recursive: true });

  const runJob = async (job: BatchJob): Promise<BatchJobResult> => {
    try {
      const text = await callWithRetry(client, jobMessages(job), {
        description: job.description ?? job.name,
        ...opts.retry,
        ...(job.model ? { model: job.model } : {}),
        ...(job.temperature !== undefined
          ? { temperature: job.temperature }
          : {}),
        logger,
        sleep: opts.sleep,
      });
      const outputPath = path.join(opts.outDir, job.output);
      await mkdir(path.dirname(outputPath), { recursive: true });
      await writeFile(outputPath, text, "utf8");
      logger.info(`${job.name}: wrote ${outputPath}`);
      return { name: job.name, ok: true, outputPath, chars: text.length };
    } catch (error) {
      logger.error(`${job.name}: ${describeError(error)}`);
      return { name: job.name, ok: false, error: describeError(error) };
    }
  };

  let results: BatchJobResult[];
  if (opts.parallel) {
    results = await Promise.all(batch.jobs.map(runJob));
  } else {
    results = [];
    for (const [i, job] of batch.jobs.entries()) {
      if (i > 0 && batch.delayBetweenMs > 0) await wait(batch.delayBetweenMs);
      results.push(await runJob(job));
    }
  }

  let paramsPath: string | undefined;
  if (batch.params) {
    paramsPath = path.join(opts.outDir, batch.params.file);
    await mkdir(path.dirname(paramsPath), { recursive: true });
    await writeFile(
      paramsPath,
      JSON.stringify(batch.params.data, null, 4),
      "utf8",
    );
    logger.info(`Wrote parameters to ${paramsPath}`);
  }

  return { results, paramsPath };
}
