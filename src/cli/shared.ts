import type { Command } from "commander";
import { z } from "zod";
import { loadConfig } from "../infrastructure/config/load";
import type { AppConfig } from "../infrastructure/config/schema";
import { createDeepSeekClient } from "../infrastructure/llm/factory";
import type { DeepSeekClient } from "../infrastructure/llm/providers/deepseek";
import { createLogger, type Logger } from "../infrastructure/logging/logger";
import { toAppError } from "../domain/common/errors";
import { ExitCode, exitCodeFor } from "./exit-codes";

export const CommonArgsSchema = z.object({
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
});

export function withCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes stack traces)");
}

export function parseArgs<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  opts: unknown,
): T {
  const parsed = schema.safeParse(opts);
  if (!parsed.success) {
    console.error(parsed.error.issues.map((i) => i.message).join("\n"));
    process.exit(ExitCode.usage);
  }
  return parsed.data;
}

export type Runtime = {
  config: AppConfig;
  logger: Logger;
  client: DeepSeekClient;
};

export async function createRuntime(
  args: z.infer<typeof CommonArgsSchema>,
): Promise<Runtime> {
  const logLevel = args.debug ? "debug" : args.verbose ? "info" : undefined;
  const config = await loadConfig({
    configPath: args.config,
    overrides: { logLevel },
  });
  const logger = createLogger(config);
  const client = createDeepSeekClient(config, logger);
  return { config, logger, client };
}

export function printCallHistory(client: DeepSeekClient): void {
  console.error("Call history:");
  for (const call of client.getCallHistory()) {
    console.error(
      `- ${call.timestamp}: ${call.model} status=${call.status} ${call.tokensUsed} tokens ${call.durationMs}ms`,
    );
  }
}

export function fail(error: unknown, debug: boolean | undefined): never {
  const appError = toAppError(error);
  const original = appError.kind === "unknown" ? appError.cause : appError;
  console.error(
    debug && original instanceof Error
      ? (original.stack ?? original.message)
      : appError.message,
  );
  process.exit(exitCodeFor(appError));
}
